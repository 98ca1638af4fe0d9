import * as path from 'path';
import { formatElapsedTime } from '@model-bootstrap/utils';
import { formatInventory, runBootstrap } from '@model-bootstrap/fetcher';
import type { BootstrapSummary } from '@model-bootstrap/fetcher';
import type { CommandContext } from '../../core/command-context.js';
import type { BootstrapArgs } from '../../command-defs/bootstrap.js';
import { ConsoleReporter } from '../../core/console-reporter.js';
import type { Output } from '../../core/output.js';
import { printBanner } from './banner.js';

export const COMFYUI_URL = 'http://localhost:8188';

function printFailures(output: Output, summary: BootstrapSummary): void {
  if (summary.failed.length === 0) {
    return;
  }
  output.line();
  output.line(`  ${summary.failed.length} artifact(s) failed:`);
  for (const outcome of summary.failed) {
    output.line(`    ✗  ${outcome.name} (${outcome.status}): ${outcome.reason ?? 'unknown error'}`);
  }
}

/**
 * Fetch the catalog into the ComfyUI layout and print the inventory.
 * Returns the process exit code.
 */
export async function runBootstrapHandler(args: BootstrapArgs, ctx: CommandContext): Promise<number> {
  const { output } = ctx;
  const comfyuiDir = path.resolve(args.comfyuiDir ?? ctx.config.comfyuiDir);
  const startTime = Date.now();

  printBanner(output, 'ComfyUI model bootstrap');
  output.line(`  Models: ${path.join(comfyuiDir, 'models')}`);

  const summary = await runBootstrap({
    comfyuiDir,
    credential: ctx.config.hubToken,
    hub: ctx.hub,
    catalog: ctx.catalog,
    only: args.only,
    reporter: new ConsoleReporter(output),
  });

  output.line();
  printBanner(output, 'Download complete. Model inventory:');
  for (const line of formatInventory(summary.inventory)) {
    output.line(line);
  }

  printFailures(output, summary);

  output.line();
  output.line(`  ComfyUI root: ${comfyuiDir}`);
  output.line(`  Start ComfyUI and open ${COMFYUI_URL}`);
  output.line(`  Finished in ${formatElapsedTime(Date.now() - startTime)}`);

  return summary.failed.length > 0 && !args.allowPartial ? 1 : 0;
}
