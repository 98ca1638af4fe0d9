/**
 * Progress bar rendering for downloads
 */

import { formatGigabytes } from '@model-bootstrap/utils';

/**
 * Create a progress bar string
 */
export function createProgressBar(current: number, total: number, width = 30): string {
  if (total <= 0) return '[' + ' '.repeat(width) + '] 0%';

  const percent = Math.min(100, Math.round((current / total) * 100));
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;

  const bar = '█'.repeat(filled) + '░'.repeat(empty);
  return `[${bar}] ${percent}%`;
}

/**
 * Byte progress: a bar with GB counts when the total is known, the running
 * count alone otherwise
 */
export function createDownloadProgress(receivedBytes: number, totalBytes?: number): string {
  if (totalBytes === undefined || totalBytes <= 0) {
    return `${formatGigabytes(receivedBytes)} GB`;
  }
  return `${createProgressBar(receivedBytes, totalBytes)} (${formatGigabytes(receivedBytes)}/${formatGigabytes(totalBytes)} GB)`;
}
