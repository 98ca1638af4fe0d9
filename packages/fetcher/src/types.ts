/**
 * Fetcher domain types
 */

import type { DownloadProgress } from '@model-bootstrap/hub-client';

/**
 * One downloadable file. `destinationDir / destinationName` is its on-disk
 * identity: a second spec resolving to the same path is a no-op.
 */
export interface ArtifactSpec {
  /** Remote collection (repository) id, e.g. `Comfy-Org/Qwen-Image_ComfyUI` */
  sourceId: string;
  /** Path of the file inside the collection */
  sourcePath: string;
  destinationDir: string;
  /** Defaults to the last segment of `sourcePath` */
  destinationName?: string;
}

export enum FetchStatus {
  AlreadyPresent = 'already-present',
  Downloaded = 'downloaded',
  NotFound = 'not-found',
  Unauthorized = 'unauthorized',
  TransferFailed = 'transfer-failed',
}

export interface FetchOutcome {
  status: FetchStatus;
  name: string;
  destination: string;
  source: string;
  /** Set for Downloaded */
  sizeBytes?: number;
  /** Set for every failure status */
  reason?: string;
}

export function isSuccessfulOutcome(outcome: FetchOutcome): boolean {
  return outcome.status === FetchStatus.AlreadyPresent || outcome.status === FetchStatus.Downloaded;
}

/**
 * Receives human-readable progress events. The fetcher never writes to the
 * console itself.
 */
export interface FetchReporter {
  section(title: string): void;
  notice(message: string): void;
  warn(message: string): void;
  alreadyPresent(name: string): void;
  downloading(name: string, source: string): void;
  progress(name: string, progress: DownloadProgress): void;
  done(name: string, sizeBytes: number): void;
  failed(name: string, reason: string): void;
  skipped(title: string, hint?: string): void;
}

export const silentReporter: FetchReporter = {
  section: () => undefined,
  notice: () => undefined,
  warn: () => undefined,
  alreadyPresent: () => undefined,
  downloading: () => undefined,
  progress: () => undefined,
  done: () => undefined,
  failed: () => undefined,
  skipped: () => undefined,
};
