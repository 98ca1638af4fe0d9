/**
 * Idempotent fetch
 * ================
 * Makes sure one artifact exists at its destination. Presence of a file with
 * the right name is the only completeness check: no size or hash comparison,
 * so a truncated file is never re-fetched.
 *
 * Failures are outcomes, not exceptions: the caller moves on to the next artifact.
 */

import { chmod, copyFile, mkdir, rm, stat, utimes } from 'fs/promises';
import {
  NotFoundError,
  UnauthorizedError,
  createLogger,
  errorMessage,
} from '@model-bootstrap/utils';
import type { ModelHub } from '@model-bootstrap/hub-client';
import { destinationNameOf, resolveDestination } from './destination.js';
import { FetchStatus, isSuccessfulOutcome, silentReporter } from './types.js';
import type { ArtifactSpec, FetchOutcome, FetchReporter } from './types.js';

const logger = createLogger('fetcher');

export interface FetchContext {
  hub: ModelHub;
  reporter?: FetchReporter;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Copy a file keeping its permission bits and timestamps
 */
export async function copyPreservingMetadata(source: string, destination: string): Promise<void> {
  await copyFile(source, destination);
  const sourceStats = await stat(source);
  await chmod(destination, sourceStats.mode & 0o777);
  await utimes(destination, sourceStats.atime, sourceStats.mtime);
}

export function classifyFailure(error: unknown): FetchStatus {
  if (error instanceof UnauthorizedError) {
    return FetchStatus.Unauthorized;
  }
  if (error instanceof NotFoundError) {
    return FetchStatus.NotFound;
  }
  return FetchStatus.TransferFailed;
}

async function removePartial(destination: string): Promise<void> {
  try {
    await rm(destination, { force: true });
  } catch (error) {
    logger.error('Could not remove partial file', error, { destination });
  }
}

/**
 * Fetch one artifact and report what happened
 */
export async function fetchArtifact(
  spec: ArtifactSpec,
  credential: string | undefined,
  context: FetchContext
): Promise<FetchOutcome> {
  const reporter = context.reporter ?? silentReporter;
  const name = destinationNameOf(spec);
  const destination = resolveDestination(spec);
  const source = `${spec.sourceId}/${spec.sourcePath}`;
  const log = logger.child({ artifact: name, sourceId: spec.sourceId });

  const fail = (error: unknown): FetchOutcome => {
    const status = classifyFailure(error);
    const reason = errorMessage(error);
    reporter.failed(name, reason);
    log.error('Fetch failed', error, { status, destination });
    return { status, name, destination, source, reason };
  };

  let present: boolean;
  try {
    present = await pathExists(destination);
  } catch (error) {
    // The destination could not be inspected, so it is left untouched
    return fail(error);
  }

  if (present) {
    log.debug('Already present', { destination });
    reporter.alreadyPresent(name);
    return { status: FetchStatus.AlreadyPresent, name, destination, source };
  }

  try {
    await mkdir(spec.destinationDir, { recursive: true });
    reporter.downloading(name, source);
    log.info('Downloading', { source, destination });

    const cached = await context.hub.downloadToCache(spec.sourceId, spec.sourcePath, {
      token: credential,
      onProgress: (progress) => reporter.progress(name, progress),
    });

    await copyPreservingMetadata(cached, destination);
    const { size } = await stat(destination);

    reporter.done(name, size);
    log.info('Downloaded', { destination, sizeBytes: size });
    return { status: FetchStatus.Downloaded, name, destination, source, sizeBytes: size };
  } catch (error) {
    const outcome = fail(error);
    // Nothing existed at the destination before this call
    await removePartial(destination);
    return outcome;
  }
}

/**
 * Ensure the artifact exists locally; true when it is present afterwards
 */
export async function ensureLocal(
  spec: ArtifactSpec,
  credential: string | undefined,
  context: FetchContext
): Promise<boolean> {
  const outcome = await fetchArtifact(spec, credential, context);
  return isSuccessfulOutcome(outcome);
}
