/**
 * Bootstrap run
 * =============
 * Walks the catalog top to bottom, one artifact at a time:
 *
 * 1. validate the credential (when one is set)
 * 2. create the model directory layout
 * 3. fetch every artifact of every selected group; gated groups are skipped
 *    without any network call when there is no credential
 * 4. take the on-disk inventory
 *
 * Individual failures never stop the run; they are tallied in the summary.
 */

import { createLogger, errorMessage } from '@model-bootstrap/utils';
import type { ModelHub } from '@model-bootstrap/hub-client';
import { selectGroups, toArtifactSpec } from './catalog.js';
import type { Catalog, CatalogGroup } from './catalog.js';
import { fetchArtifact } from './ensure-local.js';
import { collectInventory } from './inventory.js';
import type { Inventory } from './inventory.js';
import { prepareLayout } from './layout.js';
import { FetchStatus, isSuccessfulOutcome, silentReporter } from './types.js';
import type { FetchOutcome, FetchReporter } from './types.js';

const logger = createLogger('bootstrap');

export interface BootstrapOptions {
  comfyuiDir: string;
  /** Hub token; gated groups are skipped when undefined */
  credential?: string;
  hub: ModelHub;
  catalog: Catalog;
  /** Restrict the run to these group ids */
  only?: readonly string[];
  reporter?: FetchReporter;
}

export interface SkippedGroup {
  id: string;
  title: string;
  licenseUrl?: string;
}

export interface BootstrapSummary {
  modelsDir: string;
  loggedInAs?: string;
  outcomes: FetchOutcome[];
  counts: Record<FetchStatus, number>;
  failed: FetchOutcome[];
  skipped: SkippedGroup[];
  inventory: Inventory;
}

function emptyCounts(): Record<FetchStatus, number> {
  return {
    [FetchStatus.AlreadyPresent]: 0,
    [FetchStatus.Downloaded]: 0,
    [FetchStatus.NotFound]: 0,
    [FetchStatus.Unauthorized]: 0,
    [FetchStatus.TransferFailed]: 0,
  };
}

async function login(
  hub: ModelHub,
  credential: string | undefined,
  reporter: FetchReporter
): Promise<string | undefined> {
  if (!credential) {
    reporter.notice('HF_TOKEN not set — gated models will be skipped');
    return undefined;
  }

  try {
    const account = await hub.whoAmI(credential);
    reporter.notice(`Logged in to the model hub as ${account.name}`);
    logger.info('Token accepted', { account: account.name });
    return account.name;
  } catch (error) {
    // The token stays in use: gated downloads fail one by one as Unauthorized
    reporter.warn(`Hub rejected the token check: ${errorMessage(error)}`);
    logger.warn('Token check failed', { reason: errorMessage(error) });
    return undefined;
  }
}

function skipGatedGroup(group: CatalogGroup, reporter: FetchReporter): SkippedGroup {
  const hint = group.licenseUrl
    ? `Set HF_TOKEN and accept the license at:\n${group.licenseUrl}`
    : 'Set HF_TOKEN to download this group';
  reporter.skipped('Skipped (no token)', hint);
  logger.info('Gated group skipped', { group: group.id });
  return { id: group.id, title: group.title, licenseUrl: group.licenseUrl };
}

export async function runBootstrap(options: BootstrapOptions): Promise<BootstrapSummary> {
  const reporter = options.reporter ?? silentReporter;
  const groups = selectGroups(options.catalog, options.only);

  const loggedInAs = await login(options.hub, options.credential, reporter);
  const modelsDir = await prepareLayout(options.comfyuiDir);

  const outcomes: FetchOutcome[] = [];
  const skipped: SkippedGroup[] = [];
  const counts = emptyCounts();

  for (const group of groups) {
    reporter.section(group.title);

    if (group.gated && !options.credential) {
      skipped.push(skipGatedGroup(group, reporter));
      continue;
    }

    for (const artifact of group.artifacts) {
      const spec = toArtifactSpec(artifact, modelsDir);
      const outcome = await fetchArtifact(spec, options.credential, {
        hub: options.hub,
        reporter,
      });
      outcomes.push(outcome);
      counts[outcome.status] += 1;
    }
  }

  const failed = outcomes.filter((outcome) => !isSuccessfulOutcome(outcome));

  logger.info('Bootstrap finished', { modelsDir, ...counts, skipped: skipped.length });

  return {
    modelsDir,
    loggedInAs,
    outcomes,
    counts,
    failed,
    skipped,
    inventory: await collectInventory(modelsDir),
  };
}
