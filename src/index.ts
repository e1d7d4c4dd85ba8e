#!/usr/bin/env node

import { Command } from 'commander';
import { stat } from 'fs/promises';
import { resolve } from 'path';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupInstallCommand } from './commands/install.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupListCommand } from './commands/list.js';
import { setupInfoCommand } from './commands/info.js';
import { setupSearchCommand } from './commands/search.js';
import { setupAutoUpdateCommand } from './commands/auto-update.js';
import { setupDaemonCommand } from './commands/daemon.js';

/**
 * modkeeper CLI - Main entry point
 *
 * Keeps a game server's mods installed, compatible and up to date.
 */

const program = new Command();

program
  .name('modkeeper')
  .description('Install, update and auto-update mods on a game server')
  .version(getVersion())
  .option('-c, --config <path>', 'config file (default: modkeeper.jsonc or modkeeper.json in the working directory)')
  .option('--cwd <dir>', 'directory to look for the config file and resolve relative paths in')
  .showHelpAfterError();

// === MOD COMMANDS ===
setupInstallCommand(program);
setupUpdateCommand(program);
setupRemoveCommand(program);
setupListCommand(program);
setupInfoCommand(program);
setupSearchCommand(program);

// === SCHEDULED UPDATES ===
setupAutoUpdateCommand(program);
setupDaemonCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();
  if (typeof opts.cwd !== 'string') {
    logger.debug(`Working directory: ${process.cwd()}`);
    return;
  }

  const resolvedCwd = resolve(process.cwd(), opts.cwd);
  const stats = await stat(resolvedCwd).catch(() => null);
  if (!stats?.isDirectory()) {
    console.error(`❌ Invalid --cwd '${opts.cwd}': not a directory`);
    process.exit(1);
  }
  logger.debug(`Working directory will be: ${resolvedCwd}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', error);
  console.error('❌ An unexpected error occurred. Run with MODKEEPER_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', reason);
  console.error('❌ An unexpected error occurred. Run with MODKEEPER_VERBOSE=1 for details.');
  process.exit(1);
});

export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', error);
  console.error('❌ Command execution failed. Use --help for usage information.');
  process.exit(1);
});
