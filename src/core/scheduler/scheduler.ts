import { SCHEDULER } from '../../constants/index.js';
import type { InstalledMod } from '../../types/index.js';
import { describeError } from '../../utils/errors.js';
import { tryFileLock } from '../../utils/file-lock.js';
import { logger } from '../../utils/logger.js';
import { nextWeeklyOccurrence, sleep } from '../../utils/time.js';
import type { UpdateOutcome } from '../install/installer.js';
import { UpdateLog, type UpdateLogEntry } from './update-log.js';

/**
 * What the scheduler reconciles against. Implemented by the Installer.
 */
export interface UpdateTarget {
  /** Reload installed state before a batch reads it */
  refresh(): Promise<void>;
  listInstalled(): InstalledMod[];
  checkAndUpdate(slug: string): Promise<UpdateOutcome>;
}

/**
 * Where the time of the last completed check is persisted. Implemented by
 * the LedgerStore.
 */
export interface UpdateCheckRecorder {
  setLastUpdateCheck(iso: string): Promise<void>;
}

export interface AutoUpdaterOptions {
  target: UpdateTarget;
  recorder: UpdateCheckRecorder;
  enabled: boolean;
  intervalHours: number;
  /** Pause between two mods of one batch */
  pauseMs?: number;
  log?: UpdateLog;
  /** Last completed check known from an earlier run */
  lastCheck?: string | null;
  /**
   * Lock path shared by every process managing the same server. A batch that
   * finds it held by someone else does not run.
   */
  batchLockPath?: string;
  now?: () => Date;
}

export type BatchResult =
  | { status: 'completed'; entries: UpdateLogEntry[] }
  | { status: 'locked' }
  | { status: 'failed'; error: string };

export type RunNowResult = { status: 'started'; done: Promise<BatchResult> } | { status: 'busy' };

export interface SchedulerStatus {
  enabled: boolean;
  running: boolean;
  intervalHours: number;
  lastCheck: string | null;
  nextCheck: string | null;
  inProgress: boolean;
}

const HOUR_MS = 60 * 60 * 1000;
/** Longest delay a Node timer honours; longer ones fire after 1 ms */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

type TimerSlot = 'check' | 'trim';

/**
 * Periodically brings every auto-update mod to its newest compatible
 * version and keeps an audit log of what happened.
 *
 * At most one batch runs at a time. Scheduled ticks that find a batch in
 * flight are dropped; manual runs report `busy`. With `batchLockPath` the
 * same holds across processes.
 */
export class AutoUpdater {
  readonly log: UpdateLog;
  private readonly target: UpdateTarget;
  private readonly recorder: UpdateCheckRecorder;
  private readonly enabled: boolean;
  private readonly intervalHours: number;
  private readonly pauseMs: number;
  private readonly now: () => Date;
  private readonly batchLockPath: string | undefined;

  private readonly timers = new Map<TimerSlot, NodeJS.Timeout>();
  private running = false;
  private nextCheckAt: Date | null = null;
  private lastCheck: Date | null = null;
  private batch: Promise<BatchResult> | null = null;

  constructor(options: AutoUpdaterOptions) {
    this.target = options.target;
    this.recorder = options.recorder;
    this.enabled = options.enabled;
    this.intervalHours = options.intervalHours;
    this.pauseMs = options.pauseMs ?? SCHEDULER.BATCH_PAUSE_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? new UpdateLog({ now: this.now });
    this.lastCheck = options.lastCheck ? new Date(options.lastCheck) : null;
    this.batchLockPath = options.batchLockPath;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get inProgress(): boolean {
    return this.batch !== null;
  }

  start(): void {
    if (!this.enabled) {
      logger.info('Auto-update is disabled in configuration');
      return;
    }
    if (this.isRunning) {
      logger.warn('Auto-update scheduler is already running');
      return;
    }

    this.running = true;
    this.scheduleCheck();
    this.scheduleTrim();

    logger.info(`Auto-update scheduler started (every ${this.intervalHours} h)`);
  }

  /** Cancel future runs. A batch already in flight runs to completion. */
  stop(): void {
    if (!this.isRunning) {
      return;
    }
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.running = false;
    this.nextCheckAt = null;
    logger.info('Auto-update scheduler stopped');
  }

  runNow(): RunNowResult {
    if (this.inProgress) {
      return { status: 'busy' };
    }
    return { status: 'started', done: this.launchBatch() };
  }

  /** Resolves once no batch is in flight */
  async waitForIdle(): Promise<void> {
    while (this.batch) {
      await this.batch;
    }
  }

  async shutdown(): Promise<void> {
    this.stop();
    await this.waitForIdle();
  }

  status(): SchedulerStatus {
    return {
      enabled: this.enabled,
      running: this.isRunning,
      intervalHours: this.intervalHours,
      lastCheck: this.lastCheck ? this.lastCheck.toISOString() : null,
      nextCheck: this.nextCheckAt ? this.nextCheckAt.toISOString() : null,
      inProgress: this.inProgress
    };
  }

  getLogs(limit?: number): UpdateLogEntry[] {
    return this.log.getLogs(limit);
  }

  clearLogs(): Promise<void> {
    return this.log.clear();
  }

  private launchBatch(): Promise<BatchResult> {
    const batch = this.runBatch()
      .catch((error: unknown): BatchResult => {
        logger.error(`Auto-update batch failed: ${describeError(error)}`, error);
        return { status: 'failed', error: describeError(error) };
      })
      .finally(() => {
        this.batch = null;
      });
    this.batch = batch;
    return batch;
  }

  private async runBatch(): Promise<BatchResult> {
    if (!this.batchLockPath) {
      return { status: 'completed', entries: await this.reconcile() };
    }

    const release = await tryFileLock(this.batchLockPath);
    if (!release) {
      logger.warn('Another process is running an update check; skipping this one');
      return { status: 'locked' };
    }
    try {
      return { status: 'completed', entries: await this.reconcile() };
    } finally {
      await release();
    }
  }

  /** Returns the batch's audit entries in the order they were made */
  private async reconcile(): Promise<UpdateLogEntry[]> {
    const checkedAt = this.now();
    this.lastCheck = checkedAt;

    await this.target.refresh();
    const mods = this.target.listInstalled().filter(mod => mod.autoUpdate);
    logger.info(`Checking ${mods.length} mod(s) for updates`);

    const entries: UpdateLogEntry[] = [];
    for (const [index, mod] of mods.entries()) {
      if (index > 0 && this.pauseMs > 0) {
        await sleep(this.pauseMs);
      }
      entries.push(await this.reconcileOne(mod));
    }

    await this.recorder.setLastUpdateCheck(checkedAt.toISOString());
    const updated = entries.filter(entry => entry.status === 'success').length;
    const failed = entries.filter(entry => entry.status === 'failed').length;
    logger.info(`Update check finished: ${updated} updated, ${failed} failed`);
    return entries;
  }

  private async reconcileOne(mod: InstalledMod): Promise<UpdateLogEntry> {
    let outcome: UpdateOutcome;
    try {
      outcome = await this.target.checkAndUpdate(mod.slug);
    } catch (error) {
      logger.error(`Failed to update ${mod.slug}: ${describeError(error)}`);
      return this.log.add({
        slug: mod.slug,
        oldVersion: mod.version,
        newVersion: mod.version,
        status: 'failed',
        message: describeError(error)
      });
    }

    switch (outcome.kind) {
      case 'updated':
        return this.log.add({
          slug: mod.slug,
          oldVersion: outcome.from,
          newVersion: outcome.to,
          status: 'success',
          message: 'Updated'
        });
      case 'current':
        return this.log.add({
          slug: mod.slug,
          oldVersion: outcome.version,
          newVersion: outcome.version,
          status: 'skipped',
          message: 'Already up to date'
        });
      case 'no-compatible':
        return this.log.add({
          slug: mod.slug,
          oldVersion: outcome.version,
          newVersion: null,
          status: 'skipped',
          message: 'No compatible version available'
        });
      case 'not-installed':
        return this.log.add({
          slug: mod.slug,
          oldVersion: mod.version,
          newVersion: null,
          status: 'skipped',
          message: 'No longer installed'
        });
      case 'failed':
        return this.log.add({
          slug: mod.slug,
          oldVersion: outcome.version,
          newVersion: outcome.version,
          status: 'failed',
          message: outcome.error
        });
    }
  }

  private scheduleCheck(): void {
    const intervalMs = this.intervalHours * HOUR_MS;
    this.nextCheckAt = new Date(this.now().getTime() + intervalMs);
    this.arm('check', intervalMs, () => {
      this.scheduleCheck();
      if (this.inProgress) {
        logger.warn('Previous update batch still running; skipping this check');
        return;
      }
      void this.launchBatch();
    });
  }

  private scheduleTrim(): void {
    const from = this.now();
    const at = nextWeeklyOccurrence(from, SCHEDULER.TRIM_DAY_OF_WEEK, SCHEDULER.TRIM_HOUR);
    this.arm('trim', at.getTime() - from.getTime(), () => {
      this.log
        .trim(SCHEDULER.LOG_TRIM_TO)
        .catch((error: unknown) => logger.error(`Update log trim failed: ${describeError(error)}`))
        .finally(() => {
          if (this.isRunning) this.scheduleTrim();
        });
    });
  }

  /**
   * Call `fire` after `delayMs`. Delays past the timer limit are waited out
   * in chunks.
   */
  private arm(slot: TimerSlot, delayMs: number, fire: () => void): void {
    const chunk = Math.min(Math.max(delayMs, 0), MAX_TIMER_DELAY_MS);
    const previous = this.timers.get(slot);
    if (previous) clearTimeout(previous);
    this.timers.set(slot, setTimeout(() => {
      if (delayMs > chunk) {
        this.arm(slot, delayMs - chunk, fire);
      } else {
        fire();
      }
    }, chunk));
  }
}
