import { Command } from 'commander';

import { createCliContext, getGlobalOptions } from '../cli/context.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .argument('<mod>', 'slug of an installed mod')
    .description('Update an installed mod to its newest compatible version')
    .action(withErrorHandling(async (mod: string, _options: unknown, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const outcome = await app.installer.checkAndUpdate(mod);

      switch (outcome.kind) {
        case 'not-installed':
          throw new ValidationError(`'${mod}' is not installed`);
        case 'current':
          output.success(`${mod}@${outcome.version} is already the newest compatible version`);
          break;
        case 'no-compatible':
          output.warn(`No compatible version of ${mod} for ${app.environment.gameVersion}/${app.environment.loader}`);
          break;
        case 'updated':
          output.success(`Updated ${mod} ${outcome.from} -> ${outcome.to}`);
          break;
        case 'failed':
          output.error(`Failed to update ${mod}: ${outcome.error}`);
          process.exitCode = 1;
          break;
      }
    }));
}
