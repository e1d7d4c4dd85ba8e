/**
 * Shared constants for the modkeeper CLI application
 * Single source of truth for file names, registry endpoints and scheduler limits.
 */

export const FILE_PATTERNS = {
  CONFIG_FILES: ['modkeeper.jsonc', 'modkeeper.json'],
  SERVER_PROPERTIES: 'server.properties',
  LATEST_LOG: 'latest.log',
  /** Extension of installable package archives */
  ARCHIVE_EXTENSION: '.jar',
  PARTIAL_DOWNLOAD_SUFFIX: '.part',
  LEDGER_BACKUP_SUFFIX: '.backup',
  LEDGER_CORRUPT_SUFFIX: '.corrupt'
} as const;

export const SERVER_DIRS = {
  MODS: 'mods',
  LOGS: 'logs'
} as const;

export const REGISTRY = {
  DEFAULT_API_BASE_URL: 'https://api.modrinth.com/v2',
  DEFAULT_HOST: 'modrinth.com',
  /** First path segment of a project page URL */
  PROJECT_URL_KINDS: ['mod', 'plugin', 'datapack', 'resourcepack', 'shader', 'modpack', 'project'],
  DEFAULT_SEARCH_LIMIT: 10
} as const;

export const LEDGER = {
  SCHEMA_VERSION: 2,
  DEFAULT_FILE_NAME: 'mod_manager_state.json'
} as const;

export const SCHEDULER = {
  /** Audit log ring capacity */
  LOG_CAPACITY: 1000,
  /** Entries kept by the weekly trim */
  LOG_TRIM_TO: 500,
  DEFAULT_LOG_LIMIT: 50,
  /** Audit log file, kept beside the ledger */
  LOG_FILE_NAME: 'modkeeper-update-log.json',
  /** Pause between mods in a reconciliation batch */
  BATCH_PAUSE_MS: 1000,
  /** Lock held by whichever process is running a batch */
  BATCH_LOCK_NAME: 'modkeeper-update-batch',
  /** Weekly log trim: Sunday 02:00 local time */
  TRIM_DAY_OF_WEEK: 0,
  TRIM_HOUR: 2
} as const;

export const LOCKS = {
  /** A lock not refreshed for this long is considered abandoned */
  STALE_MS: 10_000,
  RETRY_INTERVAL_MS: 500,
  /** Retries before giving up; with the interval above, ten minutes */
  MAX_RETRIES: 1200
} as const;

export const RESOLVER = {
  DEFAULT_MAX_NODES: 10_000
} as const;

export const LOADER_MARKERS = {
  fabric: ['fabric-server-mc.*.jar', 'fabric-loader-*.jar', '.fabric'],
  forge: ['forge-*.jar', 'minecraft_server.*.jar', 'libraries/net/minecraftforge']
} as const;
