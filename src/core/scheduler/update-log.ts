import { SCHEDULER } from '../../constants/index.js';
import { AsyncMutex } from '../../utils/async-mutex.js';
import { describeError } from '../../utils/errors.js';
import { withFileLock } from '../../utils/file-lock.js';
import { exists, readTextFile, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export type UpdateStatus = 'success' | 'skipped' | 'failed';

const STATUSES: readonly string[] = ['success', 'skipped', 'failed'];

export interface UpdateLogEntry {
  timestamp: string;
  slug: string;
  oldVersion: string | null;
  newVersion: string | null;
  status: UpdateStatus;
  message: string;
}

export interface UpdateLogOptions {
  capacity?: number;
  /** Mirror entries to this JSON file so other processes can read them */
  filePath?: string;
  now?: () => Date;
}

function isUpdateStatus(value: unknown): value is UpdateStatus {
  return typeof value === 'string' && STATUSES.includes(value);
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function parseEntry(raw: unknown): UpdateLogEntry | null {
  if (typeof raw !== 'object' || raw === null) return null;
  if (!('timestamp' in raw) || !('slug' in raw) || !('status' in raw)) return null;
  const { timestamp, slug, status } = raw;
  if (typeof timestamp !== 'string' || typeof slug !== 'string' || !isUpdateStatus(status)) {
    return null;
  }
  return {
    timestamp,
    slug,
    oldVersion: 'oldVersion' in raw ? nullableString(raw.oldVersion) : null,
    newVersion: 'newVersion' in raw ? nullableString(raw.newVersion) : null,
    status,
    message: 'message' in raw && typeof raw.message === 'string' ? raw.message : ''
  };
}

/**
 * Bounded audit trail of reconciliation results, oldest first internally.
 * Oldest entries fall off once `capacity` is reached.
 *
 * A file-backed log is shared with other processes: each change reloads the
 * file and rewrites it under a file lock.
 */
export class UpdateLog {
  private entries: UpdateLogEntry[] = [];
  private readonly capacity: number;
  private readonly filePath: string | undefined;
  private readonly now: () => Date;
  private readonly mutex = new AsyncMutex();

  constructor(options: UpdateLogOptions = {}) {
    this.capacity = options.capacity ?? SCHEDULER.LOG_CAPACITY;
    this.filePath = options.filePath;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create a log backed by `options.filePath`, loading what is already there.
   * An unreadable file is reported and replaced on the next write.
   */
  static async open(options: UpdateLogOptions): Promise<UpdateLog> {
    const log = new UpdateLog(options);
    await log.load();
    return log;
  }

  get size(): number {
    return this.entries.length;
  }

  async add(entry: Omit<UpdateLogEntry, 'timestamp'>): Promise<UpdateLogEntry> {
    const stamped: UpdateLogEntry = { timestamp: this.now().toISOString(), ...entry };
    await this.change(() => {
      this.entries.push(stamped);
      if (this.entries.length > this.capacity) {
        this.entries = this.entries.slice(-this.capacity);
      }
      return true;
    });
    logger.info(`Update log: ${entry.slug} ${entry.oldVersion ?? '-'} -> ${entry.newVersion ?? '-'} (${entry.status})`);
    return stamped;
  }

  /** Newest first */
  getLogs(limit: number = SCHEDULER.DEFAULT_LOG_LIMIT): UpdateLogEntry[] {
    if (limit <= 0) {
      return [];
    }
    return this.entries.slice(-limit).reverse();
  }

  /** Keep only the newest `keep` entries; returns how many were dropped */
  async trim(keep: number = SCHEDULER.LOG_TRIM_TO): Promise<number> {
    let dropped = 0;
    await this.change(() => {
      dropped = Math.max(0, this.entries.length - keep);
      this.entries = this.entries.slice(dropped);
      return dropped > 0;
    });
    if (dropped > 0) {
      logger.info(`Trimmed update log to ${this.entries.length} entries`);
    }
    return dropped;
  }

  async clear(): Promise<void> {
    await this.change(() => {
      this.entries = [];
      return true;
    });
    logger.info('Update log cleared');
  }

  /**
   * Apply `mutate` to the freshest entries and save them when it returns
   * true. Without a file the change stays in memory.
   */
  private change(mutate: () => boolean): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const filePath = this.filePath;
      if (!filePath) {
        mutate();
        return;
      }
      try {
        await withFileLock(filePath, async () => {
          await this.load();
          if (mutate()) {
            await this.persist();
          }
        });
      } catch (error) {
        // Locking failed before anything was applied; keep this process's view current
        logger.error(`Could not update log ${filePath}: ${describeError(error)}`);
        mutate();
      }
    });
  }

  private async load(): Promise<void> {
    if (!this.filePath) {
      return;
    }
    if (!(await exists(this.filePath))) {
      this.entries = [];
      return;
    }
    try {
      const raw: unknown = JSON.parse(await readTextFile(this.filePath));
      const list = Array.isArray(raw) ? raw : [];
      this.entries = list
        .map(parseEntry)
        .filter((entry): entry is UpdateLogEntry => entry !== null)
        .slice(-this.capacity);
    } catch (error) {
      logger.warn(`Ignoring unreadable update log ${this.filePath}: ${describeError(error)}`);
    }
  }

  private async persist(): Promise<void> {
    if (!this.filePath) {
      return;
    }
    try {
      await writeJsonFile(this.filePath, this.entries);
    } catch (error) {
      // The in-memory log stays authoritative for this process
      logger.error(`Could not write update log ${this.filePath}: ${describeError(error)}`);
    }
  }
}
