import type { Output } from '../../core/output.js';
import { RULE_WIDTH } from '../../core/console-reporter.js';

export function printBanner(output: Output, title: string): void {
  output.line('═'.repeat(RULE_WIDTH));
  output.line(`  ${title}`);
  output.line('═'.repeat(RULE_WIDTH));
}
