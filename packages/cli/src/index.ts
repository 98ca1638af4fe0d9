/**
 * @model-bootstrap/cli - Command line entry point
 */

export { runCli, buildProgram, parseBootstrapArgs, PROGRAM_NAME } from './commands/bootstrap.js';
export { bootstrapSchema } from './command-defs/bootstrap.js';
export type { BootstrapArgs } from './command-defs/bootstrap.js';
export { CommandContext, createCommandContext } from './core/command-context.js';
export type { CommandContextOptions } from './core/command-context.js';
export { ConsoleOutput, BufferedOutput } from './core/output.js';
export type { Output } from './core/output.js';
export { ConsoleReporter } from './core/console-reporter.js';
export { createProgressBar, createDownloadProgress } from './core/progress-indicator.js';
export { formatError, handleError, sanitizeErrorMessage } from './core/error-handler.js';
export {
  runBootstrapHandler,
  listCatalogHandler,
  showInventoryHandler,
  COMFYUI_URL,
} from './handlers/bootstrap/index.js';
