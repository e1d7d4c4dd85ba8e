import { Command } from 'commander';

import { createCliContext, getGlobalOptions } from '../cli/context.js';
import { ConfigError, withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Resolves on the first SIGINT or SIGTERM.
 */
function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function setupDaemonCommand(program: Command): void {
  program
    .command('daemon')
    .description('Run scheduled updates in the foreground until interrupted')
    .option('--run-now', 'start an update check immediately')
    .action(withErrorHandling(async (options: { runNow?: boolean }, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command), { interactive: false });
      if (!app.config.enableAutoUpdate) {
        throw new ConfigError('Auto-update is disabled (enableAutoUpdate: false); nothing to run');
      }

      app.scheduler.start();
      const status = app.scheduler.status();
      output.success(`Watching ${app.config.serverPath} every ${status.intervalHours} h; next check ${status.nextCheck ?? 'unscheduled'}`);
      if (options.runNow) {
        app.scheduler.runNow();
      }

      const signal = await waitForSignal();
      logger.info(`Received ${signal}, shutting down`);
      await app.shutdown();
      output.info('Stopped.');
    }));
}
