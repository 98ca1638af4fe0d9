/**
 * Local download cache under the hub's repository folders:
 *
 *   <cacheDir>/models--<org>--<name>/snapshots/<revision>/<path in repo>
 *
 * Files the hub's own tooling cached, under `snapshots/<commit>` with
 * `refs/<revision>` naming the commit, are found and reused too.
 */

import * as path from 'path';
import { readFile, stat } from 'fs/promises';

export const INCOMPLETE_SUFFIX = '.incomplete';

export function repoFolderName(sourceId: string): string {
  return `models--${sourceId.split('/').join('--')}`;
}

export function cachePathFor(
  cacheDir: string,
  sourceId: string,
  sourcePath: string,
  revision: string
): string {
  const segments = sourcePath.split('/').filter((segment) => segment.length > 0);
  return path.join(cacheDir, repoFolderName(sourceId), 'snapshots', revision, ...segments);
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return stats.isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function readRef(repoDir: string, revision: string): Promise<string | undefined> {
  try {
    const commit = (await readFile(path.join(repoDir, 'refs', revision), 'utf8')).trim();
    return /^[0-9a-f]{7,64}$/.test(commit) ? commit : undefined;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Path of an already cached copy of the file, if any
 */
export async function findCachedFile(
  cacheDir: string,
  sourceId: string,
  sourcePath: string,
  revision: string
): Promise<string | undefined> {
  const candidates: string[] = [];
  const commit = await readRef(path.join(cacheDir, repoFolderName(sourceId)), revision);
  if (commit !== undefined) {
    candidates.push(cachePathFor(cacheDir, sourceId, sourcePath, commit));
  }
  candidates.push(cachePathFor(cacheDir, sourceId, sourcePath, revision));

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
