import { Command } from 'commander';
import pc from 'picocolors';

import { SCHEDULER } from '../constants/index.js';
import { createCliContext, getGlobalOptions } from '../cli/context.js';
import type { BatchResult, UpdateLogEntry } from '../core/scheduler/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { formatTimestamp } from '../utils/formatters.js';

const STATUS_COLORS: Record<UpdateLogEntry['status'], (text: string) => string> = {
  success: pc.green,
  skipped: pc.dim,
  failed: pc.red
};

export function formatLogEntry(entry: UpdateLogEntry): string {
  const versions = entry.newVersion && entry.newVersion !== entry.oldVersion
    ? `${entry.oldVersion ?? '?'} -> ${entry.newVersion}`
    : entry.oldVersion ?? '-';
  const status = STATUS_COLORS[entry.status](entry.status.padEnd(7));
  return `${formatTimestamp(entry.timestamp)}  ${status}  ${entry.slug} ${versions}  ${pc.dim(entry.message)}`;
}

/**
 * Lines reporting one manual batch, in the order the mods were checked.
 */
export function describeBatch(result: BatchResult): string[] {
  switch (result.status) {
    case 'locked':
      return ['Another modkeeper process is running an update check; try again later.'];
    case 'failed':
      return [`Update check failed: ${result.error}`];
    case 'completed':
      return result.entries.length === 0
        ? ['No mods have auto-update enabled.']
        : result.entries.map(formatLogEntry);
  }
}

function parseLimit(value: string | undefined): number {
  if (value === undefined) return SCHEDULER.DEFAULT_LOG_LIMIT;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`--limit must be a positive integer, got '${value}'`);
  }
  return limit;
}

export function setupAutoUpdateCommand(program: Command): void {
  const autoUpdate = program
    .command('auto-update')
    .description('Inspect and drive scheduled updates');

  autoUpdate
    .command('status')
    .description('Show scheduler settings and the last check')
    .action(withErrorHandling(async (_options: unknown, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const status = app.scheduler.status();
      const tracked = app.installer.listInstalled().filter(mod => mod.autoUpdate).length;
      output.note(
        [
          `Enabled:     ${status.enabled ? 'yes' : 'no'}`,
          `Interval:    every ${status.intervalHours} h`,
          `Last check:  ${formatTimestamp(status.lastCheck)}`,
          `Tracked:     ${tracked} of ${app.ledger.size} mods`
        ].join('\n'),
        'Auto-update'
      );
    }));

  autoUpdate
    .command('run')
    .description('Check every auto-update mod now and wait for the result')
    .action(withErrorHandling(async (_options: unknown, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const started = app.scheduler.runNow();
      if (started.status === 'busy') {
        output.warn('An update check is already running');
        return;
      }

      const spinner = output.spinner();
      spinner.start('Checking for updates');
      const result = await started.done;
      spinner.stop('Update check finished');

      const lines = describeBatch(result);
      for (const line of lines) {
        output.info(line);
      }
      const failed = result.status === 'failed'
        || (result.status === 'completed' && result.entries.some(entry => entry.status === 'failed'));
      if (failed) {
        process.exitCode = 1;
      }
    }));

  autoUpdate
    .command('logs')
    .description('Show recent update results, newest first')
    .option('-l, --limit <n>', `number of entries (default ${SCHEDULER.DEFAULT_LOG_LIMIT})`)
    .action(withErrorHandling(async (options: { limit?: string }, command: Command) => {
      const limit = parseLimit(options.limit);
      const { app, output } = await createCliContext(getGlobalOptions(command));
      const entries = app.scheduler.getLogs(limit);
      if (entries.length === 0) {
        output.info('No update results recorded.');
        return;
      }
      for (const entry of entries) {
        output.info(formatLogEntry(entry));
      }
    }));

  autoUpdate
    .command('clear-logs')
    .description('Delete all recorded update results')
    .action(withErrorHandling(async (_options: unknown, command: Command) => {
      const { app, output } = await createCliContext(getGlobalOptions(command));
      await app.scheduler.clearLogs();
      output.success('Update log cleared');
    }));

  for (const [name, enabled] of [['enable', true], ['disable', false]] as const) {
    autoUpdate
      .command(name)
      .argument('<mod>', 'slug of an installed mod')
      .description(`${enabled ? 'Include' : 'Exclude'} a mod ${enabled ? 'in' : 'from'} scheduled updates`)
      .action(withErrorHandling(async (mod: string, _options: unknown, command: Command) => {
        const { app, output } = await createCliContext(getGlobalOptions(command));
        const changed = await app.installer.setAutoUpdate(mod, enabled);
        if (!changed) {
          throw new ValidationError(`'${mod}' is not installed`);
        }
        output.success(`Auto-update ${enabled ? 'enabled' : 'disabled'} for ${mod}`);
      }));
  }
}
