import { Command } from 'commander';

import { createCliContext, getGlobalOptions } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatPathForDisplay, formatTimestamp } from '../utils/formatters.js';

export function setupInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show the detected server environment and mod count')
    .action(withErrorHandling(async (_options: unknown, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const summary = app.installer.getSummary();

      output.note(
        [
          `Server:       ${formatPathForDisplay(summary.serverPath)}`,
          `Game version: ${summary.gameVersion}`,
          `Loader:       ${summary.loader}`,
          `Mods:         ${summary.modCount}`,
          `Auto-update:  ${summary.autoUpdateEnabled ? 'enabled' : 'disabled'}`,
          `Last check:   ${formatTimestamp(summary.lastUpdateCheck)}`
        ].join('\n'),
        'Server'
      );
    }));
}
