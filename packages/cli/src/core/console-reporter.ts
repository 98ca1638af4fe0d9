/**
 * Console Reporter - the human-readable per-artifact status lines
 *
 *   ✓  name                      already present
 *   ↓  name  ←  owner/repo/path  downloading
 *   ✓  name done (4.3 GB)        downloaded
 *   ✗  name FAILED: reason       failed
 */

import { formatGigabytes } from '@model-bootstrap/utils';
import type { DownloadProgress } from '@model-bootstrap/hub-client';
import type { FetchReporter } from '@model-bootstrap/fetcher';
import type { Output } from './output.js';
import { createDownloadProgress } from './progress-indicator.js';

export const RULE_WIDTH = 60;

export class ConsoleReporter implements FetchReporter {
  private progressActive = false;
  private lastProgressLabel = '';

  constructor(private readonly output: Output) {}

  section(title: string): void {
    this.endProgress();
    this.output.line();
    this.output.line('─'.repeat(RULE_WIDTH));
    this.output.line(`  ${title}`);
    this.output.line('─'.repeat(RULE_WIDTH));
  }

  notice(message: string): void {
    this.endProgress();
    this.output.line(`ℹ  ${message}`);
  }

  warn(message: string): void {
    this.endProgress();
    this.output.line(`⚠  ${message}`);
  }

  alreadyPresent(name: string): void {
    this.endProgress();
    this.output.line(`  ✓  ${name}`);
  }

  downloading(name: string, source: string): void {
    this.endProgress();
    this.output.line(`  ↓  ${name}  ←  ${source}`);
  }

  progress(_name: string, progress: DownloadProgress): void {
    if (!this.output.isTTY) {
      return;
    }
    const label = `     ${createDownloadProgress(progress.receivedBytes, progress.totalBytes)}`;
    // Redraw only when the visible text changes
    if (label !== this.lastProgressLabel) {
      this.output.overwrite(label);
      this.lastProgressLabel = label;
      this.progressActive = true;
    }
  }

  done(name: string, sizeBytes: number): void {
    this.endProgress();
    this.output.line(`  ✓  ${name} done (${formatGigabytes(sizeBytes)} GB)`);
  }

  failed(name: string, reason: string): void {
    this.endProgress();
    this.output.line(`  ✗  ${name} FAILED: ${reason}`);
  }

  skipped(title: string, hint?: string): void {
    this.endProgress();
    this.output.line(`  ⚠  ${title}`);
    for (const hintLine of hint ? hint.split('\n') : []) {
      this.output.line(`     ${hintLine}`);
    }
  }

  private endProgress(): void {
    if (this.progressActive) {
      this.output.line();
      this.progressActive = false;
      this.lastProgressLabel = '';
    }
  }
}
