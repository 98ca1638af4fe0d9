/**
 * Size formatting for progress lines and the inventory.
 * Sizes are decimal gigabytes (1 GB = 1e9 bytes), one fractional digit.
 */

export const BYTES_PER_GB = 1e9;

export function formatGigabytes(bytes: number): string {
  return (bytes / BYTES_PER_GB).toFixed(1);
}

/**
 * Right-aligned GB column, e.g. `  4.3 GB`
 */
export function formatSizeColumn(bytes: number, width = 5): string {
  return `${formatGigabytes(bytes).padStart(width)} GB`;
}

export function formatElapsedTime(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
