import { Command } from 'commander';

import type { CommandResult, InstallSummary } from '../types/index.js';
import { createCliContext, getGlobalOptions, type CliContext } from '../cli/context.js';
import { displayInstallationResults } from '../core/install/install-reporting.js';
import { withErrorHandling } from '../utils/errors.js';

interface InstallCommandOptions {
  force?: boolean;
  autoUpdate: boolean;
}

export async function installCommand(
  mod: string,
  options: InstallCommandOptions,
  ctx: CliContext
): Promise<CommandResult<InstallSummary>> {
  const spinner = ctx.output.spinner();
  spinner.start(`Resolving ${mod} for ${ctx.app.environment.gameVersion}/${ctx.app.environment.loader}`);
  const result = await ctx.app.installer.install(mod, {
    forceUpdate: options.force === true,
    autoUpdate: options.autoUpdate
  });
  spinner.stop(result.success ? 'Done' : 'Stopped');

  displayInstallationResults(mod, result, ctx.output);
  return result;
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('<mod>', 'mod slug, project id or project page URL')
    .description('Install a mod and its dependencies into the server')
    .option('-f, --force', 'reinstall even when the same version is installed')
    .option('--no-auto-update', 'exclude this mod from scheduled updates')
    .action(withErrorHandling(async (mod: string, options: InstallCommandOptions, command: Command) => {
      const ctx = await createCliContext(getGlobalOptions(command));
      const result = await installCommand(mod, options, ctx);
      if (!result.success) {
        process.exitCode = 1;
      }
    }));
}
