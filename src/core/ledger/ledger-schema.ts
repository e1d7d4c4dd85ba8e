import { LEDGER } from '../../constants/index.js';
import { isModLoader, type InstalledMod, type LedgerData, type LedgerMetadata, type ModLoader } from '../../types/index.js';
import { LedgerError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Persisted ledger format.
 *
 * Schema 2 (current):
 *   { schemaVersion: 2, mods: { <slug>: PersistedMod }, metadata: PersistedMetadata }
 *
 * Schema 1 (no `schemaVersion` field) is the layout of the first releases:
 * mods carry `minecraft_versions` and `mod_loader` instead of `game_versions`
 * and `loader`. It is migrated on read and written back as schema 2.
 */

export interface PersistedMod {
  slug: string;
  name: string;
  version: string;
  file_name: string;
  installed_at: string;
  auto_update: boolean;
  dependencies: string[];
  game_versions: string[];
  loader: ModLoader;
  project_id: string;
  version_id: string;
  file_size: number;
}

export interface PersistedMetadata {
  created_at: string;
  updated_at: string | null;
  last_update_check: string | null;
}

export interface PersistedLedger {
  schemaVersion: number;
  mods: Record<string, PersistedMod>;
  metadata: PersistedMetadata;
}

/**
 * The persisted file is not a ledger at all. Callers quarantine the file
 * instead of failing.
 */
export class LedgerCorruptionError extends LedgerError {
  constructor(reason: string) {
    super(`corrupted ledger file (${reason})`);
    this.name = 'LedgerCorruptionError';
  }
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

export function createEmptyLedger(now: Date): LedgerData {
  return {
    mods: new Map(),
    metadata: {
      createdAt: now.toISOString(),
      updatedAt: null,
      lastUpdateCheck: null
    }
  };
}

function toPersistedMod(mod: InstalledMod): PersistedMod {
  return {
    slug: mod.slug,
    name: mod.name,
    version: mod.version,
    file_name: mod.fileName,
    installed_at: mod.installedAt,
    auto_update: mod.autoUpdate,
    dependencies: [...mod.dependencies],
    game_versions: [...mod.gameVersions],
    loader: mod.loader,
    project_id: mod.projectId,
    version_id: mod.versionId,
    file_size: mod.fileSize
  };
}

export function toPersistedLedger(data: LedgerData): PersistedLedger {
  const mods: Record<string, PersistedMod> = {};
  for (const [slug, mod] of data.mods) {
    mods[slug] = toPersistedMod(mod);
  }

  return {
    schemaVersion: LEDGER.SCHEMA_VERSION,
    mods,
    metadata: {
      created_at: data.metadata.createdAt,
      updated_at: data.metadata.updatedAt,
      last_update_check: data.metadata.lastUpdateCheck
    }
  };
}

export function serializeLedger(data: LedgerData): string {
  return JSON.stringify(toPersistedLedger(data), null, 2) + '\n';
}

/**
 * Map one persisted mod entry (either schema) to an InstalledMod.
 * Returns null for entries missing the fields an install cannot do without.
 */
function readMod(key: string, raw: unknown, schemaVersion: number): InstalledMod | null {
  if (!isRecord(raw)) {
    return null;
  }

  const version = raw.version;
  const fileName = raw.file_name;
  if (typeof version !== 'string' || typeof fileName !== 'string' || fileName.length === 0) {
    return null;
  }

  const loaderValue = schemaVersion === 1 ? raw.mod_loader : raw.loader;
  if (typeof loaderValue !== 'string' || !isModLoader(loaderValue)) {
    return null;
  }

  const installedAt = raw.installed_at;
  return {
    slug: key,
    name: stringOr(raw.name, key),
    version,
    fileName,
    installedAt: typeof installedAt === 'string' ? installedAt : new Date(0).toISOString(),
    autoUpdate: raw.auto_update !== false,
    dependencies: stringList(raw.dependencies),
    gameVersions: stringList(schemaVersion === 1 ? raw.minecraft_versions : raw.game_versions),
    loader: loaderValue,
    projectId: stringOr(raw.project_id, ''),
    versionId: stringOr(raw.version_id, ''),
    fileSize: typeof raw.file_size === 'number' ? raw.file_size : 0
  };
}

function readMetadata(raw: unknown, now: Date): LedgerMetadata {
  if (!isRecord(raw)) {
    return createEmptyLedger(now).metadata;
  }
  return {
    createdAt: stringOr(raw.created_at, now.toISOString()),
    updatedAt: nullableString(raw.updated_at),
    lastUpdateCheck: nullableString(raw.last_update_check)
  };
}

/**
 * Parse persisted ledger text.
 *
 * @throws LedgerCorruptionError when the text is not a ledger
 * @throws LedgerError when the file was written by a newer schema
 */
export function deserializeLedger(text: string, now: Date = new Date()): LedgerData {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new LedgerCorruptionError('invalid JSON');
  }

  if (!isRecord(raw)) {
    throw new LedgerCorruptionError('root is not an object');
  }

  const schemaVersion = raw.schemaVersion === undefined ? 1 : raw.schemaVersion;
  if (typeof schemaVersion !== 'number' || !Number.isInteger(schemaVersion) || schemaVersion < 1) {
    throw new LedgerCorruptionError('invalid schemaVersion');
  }
  if (schemaVersion > LEDGER.SCHEMA_VERSION) {
    throw new LedgerError(
      `ledger schema ${schemaVersion} is newer than supported schema ${LEDGER.SCHEMA_VERSION}; upgrade modkeeper`
    );
  }

  const rawMods = raw.mods === undefined ? {} : raw.mods;
  if (!isRecord(rawMods)) {
    throw new LedgerCorruptionError("'mods' is not an object");
  }

  const mods = new Map<string, InstalledMod>();
  for (const [slug, entry] of Object.entries(rawMods)) {
    const mod = readMod(slug, entry, schemaVersion);
    if (mod) {
      mods.set(slug, mod);
    } else {
      logger.error(`Dropping unreadable ledger entry '${slug}'`);
    }
  }

  if (schemaVersion < LEDGER.SCHEMA_VERSION) {
    logger.info(`Migrating ledger from schema ${schemaVersion} to ${LEDGER.SCHEMA_VERSION}`);
  }

  return { mods, metadata: readMetadata(raw.metadata, now) };
}
