import { Command } from 'commander';
import pc from 'picocolors';

import type { InstalledMod } from '../types/index.js';
import { createCliContext, getGlobalOptions } from '../cli/context.js';
import type { OutputPort } from '../core/ports/output.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount, formatFileSize, formatTimestamp, renderTable } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { LogLevel } from '../types/index.js';

interface ListOptions {
  json?: boolean;
}

export function renderModTable(mods: InstalledMod[]): string[] {
  const sorted = [...mods].sort((a, b) => a.slug.localeCompare(b.slug));
  return renderTable(sorted, [
    { header: 'MOD', accessor: mod => mod.slug },
    { header: 'VERSION', accessor: mod => mod.version },
    { header: 'AUTO', accessor: mod => (mod.autoUpdate ? 'yes' : 'no') },
    { header: 'SIZE', accessor: mod => formatFileSize(mod.fileSize) },
    { header: 'INSTALLED', accessor: mod => formatTimestamp(mod.installedAt) }
  ]);
}

function printMods(mods: InstalledMod[], output: OutputPort): void {
  if (mods.length === 0) {
    output.info('No mods installed.');
    return;
  }
  for (const line of renderModTable(mods)) {
    output.info(line);
  }
  output.info(pc.dim(`Total: ${formatCount(mods.length, 'mod')}`));
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed mods')
    .option('--json', 'print the ledger entries as JSON')
    .action(withErrorHandling(async (options: ListOptions, command: Command) => {
      if (options.json) {
        // Keep stdout parseable
        logger.setLevel(LogLevel.ERROR);
      }
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const mods = app.installer.listInstalled();

      if (options.json) {
        console.log(JSON.stringify(mods, null, 2));
        return;
      }
      printMods(mods, output);
    }));
}
