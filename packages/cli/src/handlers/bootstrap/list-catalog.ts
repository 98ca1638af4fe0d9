import { selectGroups } from '@model-bootstrap/fetcher';
import type { CommandContext } from '../../core/command-context.js';
import type { BootstrapArgs } from '../../command-defs/bootstrap.js';

/**
 * Print the catalog groups and their files. No network activity.
 */
export function listCatalogHandler(args: BootstrapArgs, ctx: CommandContext): number {
  const { output } = ctx;

  for (const group of selectGroups(ctx.catalog, args.only)) {
    output.line(`${group.id}${group.gated ? '  [gated]' : ''}  ${group.title}`);
    for (const artifact of group.artifacts) {
      const name = artifact.destinationName ? `  ->  ${artifact.destinationName}` : '';
      output.line(`    ${artifact.subdir}/  ${artifact.sourceId}/${artifact.sourcePath}${name}`);
    }
  }

  return 0;
}
