import { FILE_PATTERNS } from '../../constants/index.js';
import type { InstalledMod, InstalledModPatch, LedgerData, LedgerMetadata } from '../../types/index.js';
import { AsyncMutex } from '../../utils/async-mutex.js';
import { describeError, FileSystemError, LedgerError } from '../../utils/errors.js';
import { acquireFileLock, type ReleaseLock } from '../../utils/file-lock.js';
import { copyFile, exists, readTextFile, renamePath, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { timestampId } from '../../utils/time.js';
import { createEmptyLedger, deserializeLedger, LedgerCorruptionError, serializeLedger } from './ledger-schema.js';

export interface LedgerStoreOptions {
  filePath: string;
  /** Copy the current file to `<file>.backup` before each overwrite */
  backup?: boolean;
  now?: () => Date;
}

/**
 * View of the ledger handed to a transaction. Reads see the file as it was
 * when the transaction started plus the transaction's own writes; each write
 * is saved immediately.
 */
export interface LedgerTransaction {
  get(slug: string): InstalledMod | undefined;
  has(slug: string): boolean;
  list(): InstalledMod[];
  add(mod: InstalledMod): Promise<void>;
  remove(slug: string): Promise<boolean>;
  update(slug: string, patch: InstalledModPatch): Promise<boolean>;
  setLastUpdateCheck(iso: string): Promise<void>;
}

function cloneMod(mod: InstalledMod): InstalledMod {
  return {
    ...mod,
    dependencies: [...mod.dependencies],
    gameVersions: [...mod.gameVersions]
  };
}

/**
 * Durable record of installed mods, persisted as one JSON document.
 *
 * Several processes may share the file, so every mutation runs as a
 * transaction: take the in-process mutex and the file lock, reload the file,
 * apply the change and rewrite the whole document. Reads are served from the
 * last loaded state and return copies.
 */
export class LedgerStore {
  readonly filePath: string;
  private readonly backup: boolean;
  private readonly now: () => Date;
  private readonly mutex = new AsyncMutex();
  private readonly writer: LedgerTransaction;
  private data: LedgerData;

  private constructor(options: LedgerStoreOptions) {
    this.filePath = options.filePath;
    this.backup = options.backup ?? true;
    this.now = options.now ?? (() => new Date());
    this.data = createEmptyLedger(this.now());
    this.writer = {
      get: slug => this.get(slug),
      has: slug => this.has(slug),
      list: () => this.list(),
      add: mod => this.addEntry(mod),
      remove: slug => this.removeEntry(slug),
      update: (slug, patch) => this.updateEntry(slug, patch),
      setLastUpdateCheck: iso => this.writeLastUpdateCheck(iso)
    };
  }

  /**
   * Open the ledger at `filePath`, creating it when missing and quarantining
   * it when it cannot be read as a ledger.
   */
  static async open(options: LedgerStoreOptions): Promise<LedgerStore> {
    const store = new LedgerStore(options);
    await store.refresh();
    return store;
  }

  /**
   * Run `task` holding the ledger exclusively, against freshly loaded state.
   * Use the transaction view for every read and write inside `task`.
   */
  transaction<T>(task: (ledger: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      let release: ReleaseLock;
      try {
        release = await acquireFileLock(this.filePath);
      } catch (error) {
        throw new LedgerError(describeError(error), { filePath: this.filePath });
      }
      try {
        await this.load();
        return await task(this.writer);
      } finally {
        await release();
      }
    });
  }

  /** Pick up changes other processes saved since the last load */
  refresh(): Promise<void> {
    return this.transaction(async () => undefined);
  }

  private async load(): Promise<void> {
    if (!(await exists(this.filePath))) {
      logger.info(`Creating new ledger at ${this.filePath}`);
      this.data = createEmptyLedger(this.now());
      await this.persist();
      return;
    }

    let text: string;
    try {
      text = await readTextFile(this.filePath);
    } catch (error) {
      if (!(error instanceof FileSystemError)) throw error;
      await this.quarantine(error.message);
      return;
    }

    try {
      this.data = deserializeLedger(text, this.now());
      logger.debug(`Loaded ledger with ${this.data.mods.size} mod(s) from ${this.filePath}`);
    } catch (error) {
      if (!(error instanceof LedgerCorruptionError)) throw error;
      await this.quarantine(error.message);
    }
  }

  /** Copy the unreadable file aside and replace it with an empty ledger */
  private async quarantine(reason: string): Promise<void> {
    const target = `${this.filePath}${FILE_PATTERNS.LEDGER_CORRUPT_SUFFIX}-${timestampId(this.now())}`;
    try {
      await copyFile(this.filePath, target);
    } catch (error) {
      throw new LedgerError(`cannot read ${this.filePath} and cannot move it aside: ${describeError(error)}`, {
        filePath: this.filePath
      });
    }

    logger.error(`Ledger ${this.filePath} is unreadable (${reason}); saved a copy to ${target} and started empty`);
    this.data = createEmptyLedger(this.now());
    await this.persist({ backup: false });
  }

  /**
   * Write the whole ledger. The new content goes to a sibling file first and
   * replaces the ledger with a rename.
   */
  private async persist(options: { backup?: boolean } = {}): Promise<void> {
    this.data.metadata.updatedAt = this.now().toISOString();
    const content = serializeLedger(this.data);
    const tempPath = `${this.filePath}.tmp`;
    const backup = options.backup ?? this.backup;

    try {
      if (backup && (await exists(this.filePath))) {
        await copyFile(this.filePath, `${this.filePath}${FILE_PATTERNS.LEDGER_BACKUP_SUFFIX}`);
      }
      await writeTextFile(tempPath, content);
      await renamePath(tempPath, this.filePath);
    } catch (error) {
      throw new LedgerError(`failed to save ${this.filePath}: ${describeError(error)}`, { filePath: this.filePath });
    }
  }

  get(slug: string): InstalledMod | undefined {
    const mod = this.data.mods.get(slug);
    return mod ? cloneMod(mod) : undefined;
  }

  has(slug: string): boolean {
    return this.data.mods.has(slug);
  }

  list(): InstalledMod[] {
    return Array.from(this.data.mods.values(), cloneMod);
  }

  get size(): number {
    return this.data.mods.size;
  }

  getMetadata(): LedgerMetadata {
    return { ...this.data.metadata };
  }

  /** Insert or replace the entry for `mod.slug` */
  add(mod: InstalledMod): Promise<void> {
    return this.transaction(ledger => ledger.add(mod));
  }

  /** Returns false, writing nothing, when `slug` is not recorded */
  remove(slug: string): Promise<boolean> {
    return this.transaction(ledger => ledger.remove(slug));
  }

  /** Merge `patch` into an existing entry. Returns false when `slug` is not recorded. */
  update(slug: string, patch: InstalledModPatch): Promise<boolean> {
    return this.transaction(ledger => ledger.update(slug, patch));
  }

  setLastUpdateCheck(iso: string): Promise<void> {
    return this.transaction(ledger => ledger.setLastUpdateCheck(iso));
  }

  private async addEntry(mod: InstalledMod): Promise<void> {
    this.data.mods.set(mod.slug, cloneMod(mod));
    await this.persist();
    logger.debug(`Recorded ${mod.slug}@${mod.version} in ledger`);
  }

  private async removeEntry(slug: string): Promise<boolean> {
    if (!this.data.mods.delete(slug)) {
      return false;
    }
    await this.persist();
    logger.debug(`Removed ${slug} from ledger`);
    return true;
  }

  private async updateEntry(slug: string, patch: InstalledModPatch): Promise<boolean> {
    const current = this.data.mods.get(slug);
    if (!current) {
      return false;
    }
    this.data.mods.set(slug, cloneMod({ ...current, ...patch, slug }));
    await this.persist();
    return true;
  }

  private async writeLastUpdateCheck(iso: string): Promise<void> {
    this.data.metadata.lastUpdateCheck = iso;
    await this.persist();
  }
}
