/**
 * ComfyUI model directory taxonomy
 */

import { mkdir } from 'fs/promises';
import * as path from 'path';

/**
 * Every model subdirectory ComfyUI looks in. The catalog fills the first four;
 * the rest are created empty so manual additions have a home.
 */
export const MODEL_SUBDIRS = [
  'checkpoints',
  'diffusion_models',
  'text_encoders',
  'vae',
  'loras',
  'controlnet',
  'clip_vision',
  'upscale_models',
] as const;

export type ModelSubdir = (typeof MODEL_SUBDIRS)[number];

export function modelsDirOf(comfyuiDir: string): string {
  return path.join(comfyuiDir, 'models');
}

/**
 * Create `<root>/models/<subdir>` for every subdir; safe to repeat
 */
export async function prepareLayout(comfyuiDir: string): Promise<string> {
  const modelsDir = modelsDirOf(comfyuiDir);
  for (const subdir of MODEL_SUBDIRS) {
    await mkdir(path.join(modelsDir, subdir), { recursive: true });
  }
  return modelsDir;
}
