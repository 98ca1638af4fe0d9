import * as path from 'path';
import type { ArtifactSpec } from './types.js';

/**
 * Local file name of an artifact: the override, or the last segment of its
 * source path (`split_files/vae/flux2-vae.safetensors` -> `flux2-vae.safetensors`).
 */
export function destinationNameOf(spec: Pick<ArtifactSpec, 'sourcePath' | 'destinationName'>): string {
  if (spec.destinationName) {
    return spec.destinationName;
  }
  const segments = spec.sourcePath.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? spec.sourcePath;
}

export function resolveDestination(spec: ArtifactSpec): string {
  return path.join(spec.destinationDir, destinationNameOf(spec));
}
