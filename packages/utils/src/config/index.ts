/**
 * Configuration loading from environment variables
 *
 * Provides the typed bootstrap configuration: ComfyUI root, hub credential,
 * hub endpoint and download cache.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_COMFYUI_DIR = '/workspace/ComfyUI';
export const DEFAULT_HUB_ENDPOINT = 'https://huggingface.co';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// Unset and empty variables are the same thing
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

export const envSchema = z.object({
  COMFYUI_DIR: optionalString,
  HF_TOKEN: optionalString,
  HF_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  HF_HOME: optionalString,
  HF_HUB_CACHE: optionalString,
  HF_REQUEST_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
  LOG_LEVEL: optionalString.pipe(z.enum(['error', 'warn', 'info', 'debug']).optional()),
  LOG_FILE: optionalString.pipe(z.enum(['true', 'false']).optional()),
  LOG_DIR: optionalString,
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface BootstrapConfig {
  /** ComfyUI root; models are placed under `<comfyuiDir>/models` */
  comfyuiDir: string;
  /** Hub access token; undefined disables gated artifacts */
  hubToken?: string;
  hubEndpoint: string;
  hubCacheDir: string;
  requestTimeoutMs: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  /** Write rotating log files under `logDir` */
  logToFile: boolean;
  logDir: string;
}

/**
 * Resolve the hub download cache the way the hub tooling does:
 * HF_HUB_CACHE, else HF_HOME/hub, else ~/.cache/huggingface/hub
 */
export function resolveHubCacheDir(env: Pick<EnvConfig, 'HF_HOME' | 'HF_HUB_CACHE'>): string {
  if (env.HF_HUB_CACHE) {
    return path.resolve(env.HF_HUB_CACHE);
  }
  if (env.HF_HOME) {
    return path.resolve(env.HF_HOME, 'hub');
  }
  return path.join(os.homedir(), '.cache', 'huggingface', 'hub');
}

/**
 * Parse bootstrap configuration from an environment map
 */
export function parseBootstrapConfig(env: NodeJS.ProcessEnv): BootstrapConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');

    throw new ConfigurationError(`Configuration validation failed: ${errors}`, undefined, {
      errors: result.error.issues,
    });
  }

  const parsed = result.data;

  return {
    comfyuiDir: path.resolve(parsed.COMFYUI_DIR ?? DEFAULT_COMFYUI_DIR),
    hubToken: parsed.HF_TOKEN,
    hubEndpoint: (parsed.HF_ENDPOINT ?? DEFAULT_HUB_ENDPOINT).replace(/\/+$/, ''),
    hubCacheDir: resolveHubCacheDir(parsed),
    requestTimeoutMs: parsed.HF_REQUEST_TIMEOUT_MS ?? DEFAULT_REQUEST_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL ?? 'warn',
    logToFile: parsed.LOG_FILE === 'true',
    logDir: path.resolve(parsed.LOG_DIR ?? 'logs'),
  };
}

let config: BootstrapConfig | null = null;

/**
 * Load configuration from process.env (cached)
 */
export function loadConfig(): BootstrapConfig {
  if (!config) {
    config = parseBootstrapConfig(process.env);
  }
  return config;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}
