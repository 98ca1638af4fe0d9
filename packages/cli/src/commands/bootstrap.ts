/**
 * Bootstrap Command
 *
 * Commander owns flags and parsing; the schema validates the option shape and
 * the handlers do the work. Every path out of runCli is an exit code.
 */

import { Command, CommanderError } from 'commander';
import { ValidationError } from '@model-bootstrap/utils';
import { bootstrapSchema } from '../command-defs/bootstrap.js';
import type { BootstrapArgs } from '../command-defs/bootstrap.js';
import { createCommandContext } from '../core/command-context.js';
import type { CommandContext } from '../core/command-context.js';
import { handleError } from '../core/error-handler.js';
import {
  listCatalogHandler,
  runBootstrapHandler,
  showInventoryHandler,
} from '../handlers/bootstrap/index.js';

export const PROGRAM_NAME = 'model-bootstrap';

function withoutTrailingNewline(text: string): string {
  return text.replace(/\n$/, '');
}

export function parseBootstrapArgs(rawOptions: Record<string, unknown>): BootstrapArgs {
  const result = bootstrapSchema.safeParse(rawOptions);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join(', ');
    throw new ValidationError(`Invalid options: ${issues}`, { issues: result.error.issues });
  }
  return result.data;
}

async function dispatch(args: BootstrapArgs, ctx: CommandContext): Promise<number> {
  if (args.list) {
    return listCatalogHandler(args, ctx);
  }
  if (args.inventory) {
    return showInventoryHandler(args, ctx);
  }
  return runBootstrapHandler(args, ctx);
}

/**
 * Build the commander program; `onRun` receives the validated options
 */
export function buildProgram(ctx: CommandContext, onRun: (args: BootstrapArgs) => Promise<void>): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Fetch the model catalog from the hub into a ComfyUI models directory')
    .version('1.0.0')
    .option('--comfyui-dir <path>', 'ComfyUI root (defaults to COMFYUI_DIR)')
    .option('--only <groups...>', 'Only fetch these catalog group ids')
    .option('--list', 'Print the catalog groups and exit')
    .option('--inventory', 'Print the on-disk model inventory and exit')
    .option('--allow-partial', 'Exit 0 even when some artifacts failed')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.output.line(withoutTrailingNewline(str)),
      writeErr: (str) => ctx.output.error(withoutTrailingNewline(str)),
    })
    .action(async (options: Record<string, unknown>) => {
      await onRun(parseBootstrapArgs(options));
    });

  return program;
}

/**
 * Run the CLI against `argv` (without the node and script entries)
 */
export async function runCli(
  argv: readonly string[],
  contextFactory: () => CommandContext = () => createCommandContext()
): Promise<number> {
  const ctx = contextFactory();
  let exitCode = 0;

  const program = buildProgram(ctx, async (args) => {
    exitCode = await dispatch(args, ctx);
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed its own message
      return error.exitCode;
    }
    const message = handleError(error, { argv: argv.join(' ') });
    ctx.output.error(`Error: ${message}`);
    return 1;
  }
}
