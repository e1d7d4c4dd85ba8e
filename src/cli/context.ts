/**
 * CLI Context Factory
 *
 * Loads configuration, picks the output port for the session and builds the
 * application context commands run against.
 */

import type { Command } from 'commander';
import { createAppContext, type AppContext } from '../core/app-context.js';
import { ConfigManager } from '../core/config.js';
import type { OutputPort } from '../core/ports/output.js';
import { logger } from '../utils/logger.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

export interface GlobalOptions {
  config?: string;
  cwd?: string;
}

export interface CliContext {
  app: AppContext;
  output: OutputPort;
}

let cachedClackOutput: OutputPort | undefined;

/** Interactive when stdout is a TTY and not running under CI */
function detectInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export function getCliOutput(interactive: boolean = detectInteractive()): OutputPort {
  if (interactive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return createPlainOutput();
}

/**
 * Read the root program's --config / --cwd options from any subcommand.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  return {
    config: typeof opts.config === 'string' ? opts.config : undefined,
    cwd: typeof opts.cwd === 'string' ? opts.cwd : undefined
  };
}

export async function createCliContext(
  globals: GlobalOptions,
  options: { interactive?: boolean } = {}
): Promise<CliContext> {
  const configManager = new ConfigManager({ cwd: globals.cwd, configPath: globals.config });
  const config = await configManager.load();
  if (process.env.MODKEEPER_VERBOSE !== '1') {
    logger.setLevel(config.logLevel);
  }

  const app = await createAppContext(config);
  return { app, output: getCliOutput(options.interactive) };
}
