import * as path from 'path';
import { collectInventory, formatInventory, modelsDirOf } from '@model-bootstrap/fetcher';
import type { CommandContext } from '../../core/command-context.js';
import type { BootstrapArgs } from '../../command-defs/bootstrap.js';

/**
 * Print what is on disk without fetching anything
 */
export async function showInventoryHandler(args: BootstrapArgs, ctx: CommandContext): Promise<number> {
  const { output } = ctx;
  const modelsDir = modelsDirOf(path.resolve(args.comfyuiDir ?? ctx.config.comfyuiDir));
  const inventory = await collectInventory(modelsDir);

  if (inventory.length === 0) {
    output.line(`No model files under ${modelsDir}`);
    return 0;
  }

  output.line(`Model inventory of ${modelsDir}:`);
  for (const line of formatInventory(inventory)) {
    output.line(line);
  }
  return 0;
}
