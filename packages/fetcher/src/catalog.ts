/**
 * Model catalog
 * =============
 * The fixed, ordered list of artifacts grouped by logical model. Shared files
 * (text encoders, VAEs) are declared once, in the first group that needs them;
 * later groups rely on them being present.
 *
 * The catalog lives in data/catalog.json and is validated on load.
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from '@model-bootstrap/utils';
import { destinationNameOf } from './destination.js';
import { MODEL_SUBDIRS } from './layout.js';
import type { ArtifactSpec } from './types.js';

export const DEFAULT_CATALOG_URL = new URL('../data/catalog.json', import.meta.url);

const catalogArtifactSchema = z.object({
  sourceId: z.string().min(1).regex(/^[^/\s]+\/[^/\s]+$/, 'expected "<owner>/<name>"'),
  sourcePath: z.string().min(1),
  subdir: z.enum(MODEL_SUBDIRS),
  destinationName: z.string().min(1).optional(),
  sharedWith: z.array(z.string()).optional(),
  notes: z.string().optional(),
});

const catalogGroupSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'expected a lowercase slug'),
  title: z.string().min(1),
  gated: z.boolean().default(false),
  licenseUrl: z.string().url().optional(),
  notes: z.string().optional(),
  artifacts: z.array(catalogArtifactSchema).min(1),
});

export const catalogSchema = z.object({
  groups: z.array(catalogGroupSchema).min(1),
});

export type CatalogArtifact = z.infer<typeof catalogArtifactSchema>;
export type CatalogGroup = z.infer<typeof catalogGroupSchema>;
export type Catalog = z.infer<typeof catalogSchema>;

/**
 * Validate a parsed catalog document and its authoring invariants
 */
export function parseCatalog(raw: unknown): Catalog {
  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ValidationError(`Invalid catalog: ${issues}`, { issues: result.error.issues });
  }

  const catalog = result.data;
  const groupIds = new Set<string>();
  const destinations = new Map<string, string>();

  for (const group of catalog.groups) {
    if (groupIds.has(group.id)) {
      throw new ValidationError(`Invalid catalog: duplicate group id '${group.id}'`);
    }
    groupIds.add(group.id);

    for (const artifact of group.artifacts) {
      const key = `${artifact.subdir}/${destinationNameOf(artifact)}`;
      const owner = destinations.get(key);
      if (owner !== undefined) {
        throw new ValidationError(
          `Invalid catalog: ${key} is declared in both '${owner}' and '${group.id}'; ` +
            `declare shared files once`,
          { destination: key }
        );
      }
      destinations.set(key, group.id);
    }
  }

  for (const group of catalog.groups) {
    for (const artifact of group.artifacts) {
      for (const shared of artifact.sharedWith ?? []) {
        if (!groupIds.has(shared)) {
          throw new ValidationError(
            `Invalid catalog: '${group.id}' shares ${artifact.sourcePath} with unknown group '${shared}'`
          );
        }
      }
    }
  }

  return catalog;
}

export function loadCatalog(source: string | URL = DEFAULT_CATALOG_URL): Catalog {
  const text = readFileSync(source, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Catalog is not valid JSON: ${String(source)}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseCatalog(raw);
}

/**
 * Restrict the catalog to the given group ids, keeping catalog order
 */
export function selectGroups(catalog: Catalog, only?: readonly string[]): CatalogGroup[] {
  if (!only || only.length === 0) {
    return catalog.groups;
  }

  const known = new Set(catalog.groups.map((group) => group.id));
  const unknown = only.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown catalog group(s): ${unknown.join(', ')}. Known groups: ${[...known].join(', ')}`
    );
  }

  const wanted = new Set(only);
  return catalog.groups.filter((group) => wanted.has(group.id));
}

export function toArtifactSpec(artifact: CatalogArtifact, modelsDir: string): ArtifactSpec {
  return {
    sourceId: artifact.sourceId,
    sourcePath: artifact.sourcePath,
    destinationDir: path.join(modelsDir, artifact.subdir),
    destinationName: artifact.destinationName,
  };
}
