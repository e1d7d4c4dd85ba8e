import { Command } from 'commander';

import { createCliContext, getGlobalOptions } from '../cli/context.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';

interface RemoveCommandOptions {
  yes?: boolean;
}

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .argument('<mod>', 'slug of an installed mod')
    .description('Delete an installed mod and forget it')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(withErrorHandling(async (mod: string, options: RemoveCommandOptions, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));

      const installed = app.ledger.get(mod);
      if (!installed) {
        throw new ValidationError(`'${mod}' is not installed`);
      }

      if (!options.yes) {
        const dependents = app.installer
          .listInstalled()
          .filter(other => other.slug !== mod && other.dependencies.includes(mod))
          .map(other => other.slug);
        const warning = dependents.length > 0 ? ` (installed together with ${dependents.join(', ')})` : '';
        const confirmed = await output.confirm(`Remove ${mod}@${installed.version}${warning}?`, { initial: false });
        if (!confirmed) {
          output.info('Nothing removed. Pass --yes to remove without asking.');
          return;
        }
      }

      await app.installer.remove(mod);
      output.success(`Removed ${mod}@${installed.version}`);
    }));
}
