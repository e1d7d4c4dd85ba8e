import { join, resolve } from 'path';

import { FILE_PATTERNS, LEDGER, REGISTRY, SCHEDULER, SERVER_DIRS } from '../constants/index.js';
import { isModLoader, LogLevel, type ModkeeperConfig, type ModLoader } from '../types/index.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { ensureDir, exists, isDirectory, isWritable, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger, parseLogLevel } from '../utils/logger.js';
import { getVersion } from '../utils/package.js';

/**
 * Configuration for the modkeeper CLI.
 *
 * Precedence, lowest first: built-in defaults, the config file
 * (`modkeeper.jsonc` / `modkeeper.json` or an explicit path), then
 * MODKEEPER_* environment variables.
 */

export const DEFAULT_CONFIG: ModkeeperConfig = {
  serverPath: '/home/mc/server',
  loader: 'fabric',
  enableAutoUpdate: true,
  updateIntervalHours: 2,
  apiBaseUrl: REGISTRY.DEFAULT_API_BASE_URL,
  registryHost: REGISTRY.DEFAULT_HOST,
  apiCacheTtlSeconds: 300,
  requestTimeoutSeconds: 30,
  downloadTimeoutSeconds: 300,
  backupLedger: true,
  ledgerFileName: LEDGER.DEFAULT_FILE_NAME,
  includeOptionalDependencies: true,
  preferStable: true,
  logLevel: LogLevel.INFO,
  userAgent: `modkeeper/${getVersion()}`
};

/** Environment variable → config key */
const ENV_OVERRIDES: ReadonlyArray<[string, keyof ModkeeperConfig]> = [
  ['MODKEEPER_SERVER_PATH', 'serverPath'],
  ['MODKEEPER_LOADER', 'loader'],
  ['MODKEEPER_GAME_VERSION', 'gameVersion'],
  ['MODKEEPER_SERVER_PROPERTIES', 'serverPropertiesPath'],
  ['MODKEEPER_AUTO_UPDATE', 'enableAutoUpdate'],
  ['MODKEEPER_UPDATE_INTERVAL_HOURS', 'updateIntervalHours'],
  ['MODKEEPER_API_BASE_URL', 'apiBaseUrl'],
  ['MODKEEPER_API_CACHE_TTL', 'apiCacheTtlSeconds'],
  ['MODKEEPER_REQUEST_TIMEOUT', 'requestTimeoutSeconds'],
  ['MODKEEPER_DOWNLOAD_TIMEOUT', 'downloadTimeoutSeconds'],
  ['MODKEEPER_BACKUP_LEDGER', 'backupLedger'],
  ['MODKEEPER_LOG_LEVEL', 'logLevel']
];

const KNOWN_KEYS = new Set<string>([...Object.keys(DEFAULT_CONFIG), 'gameVersion', 'serverPropertiesPath']);

type RawSettings = Record<string, unknown>;

function isRecord(value: unknown): value is RawSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: RawSettings, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Invalid '${key}': expected a non-empty string`);
  }
  return value.trim();
}

function readOptionalString(raw: RawSettings, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Invalid '${key}': expected a string`);
  }
  return value.trim();
}

function readPositiveNumber(raw: RawSettings, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid '${key}': expected a positive number, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function readBoolean(raw: RawSettings, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }
  throw new ConfigError(`Invalid '${key}': expected a boolean, got ${JSON.stringify(value)}`);
}

function readLoader(raw: RawSettings, fallback: ModLoader): ModLoader {
  const value = readString(raw, 'loader', fallback).toLowerCase();
  if (!isModLoader(value)) {
    throw new ConfigError(`Invalid 'loader': unknown mod loader '${value}'`);
  }
  return value;
}

function readLogLevel(raw: RawSettings, fallback: LogLevel): LogLevel {
  const value = readString(raw, 'logLevel', fallback);
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(`Invalid 'logLevel': unknown log level '${value}'`);
  }
  return level;
}

/**
 * Merge file settings and environment overrides onto the defaults and
 * validate the result. Relative paths resolve against `cwd`.
 */
export function resolveConfig(fileSettings: unknown, env: NodeJS.ProcessEnv, cwd: string): ModkeeperConfig {
  if (fileSettings !== undefined && !isRecord(fileSettings)) {
    throw new ConfigError('Invalid configuration: expected an object at the top level');
  }

  const raw: RawSettings = { ...(fileSettings ?? {}) };
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Ignoring unknown configuration key '${key}'`);
    }
  }
  for (const [envName, key] of ENV_OVERRIDES) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const serverPath = resolve(cwd, readString(raw, 'serverPath', DEFAULT_CONFIG.serverPath));
  const serverPropertiesPath = readOptionalString(raw, 'serverPropertiesPath');

  return {
    serverPath,
    loader: readLoader(raw, DEFAULT_CONFIG.loader),
    gameVersion: readOptionalString(raw, 'gameVersion'),
    serverPropertiesPath: serverPropertiesPath ? resolve(serverPath, serverPropertiesPath) : undefined,
    enableAutoUpdate: readBoolean(raw, 'enableAutoUpdate', DEFAULT_CONFIG.enableAutoUpdate),
    updateIntervalHours: readPositiveNumber(raw, 'updateIntervalHours', DEFAULT_CONFIG.updateIntervalHours),
    apiBaseUrl: readString(raw, 'apiBaseUrl', DEFAULT_CONFIG.apiBaseUrl).replace(/\/+$/, ''),
    registryHost: readString(raw, 'registryHost', DEFAULT_CONFIG.registryHost),
    apiCacheTtlSeconds: readPositiveNumber(raw, 'apiCacheTtlSeconds', DEFAULT_CONFIG.apiCacheTtlSeconds),
    requestTimeoutSeconds: readPositiveNumber(raw, 'requestTimeoutSeconds', DEFAULT_CONFIG.requestTimeoutSeconds),
    downloadTimeoutSeconds: readPositiveNumber(raw, 'downloadTimeoutSeconds', DEFAULT_CONFIG.downloadTimeoutSeconds),
    backupLedger: readBoolean(raw, 'backupLedger', DEFAULT_CONFIG.backupLedger),
    ledgerFileName: readString(raw, 'ledgerFileName', DEFAULT_CONFIG.ledgerFileName),
    includeOptionalDependencies: readBoolean(
      raw,
      'includeOptionalDependencies',
      DEFAULT_CONFIG.includeOptionalDependencies
    ),
    preferStable: readBoolean(raw, 'preferStable', DEFAULT_CONFIG.preferStable),
    logLevel: readLogLevel(raw, DEFAULT_CONFIG.logLevel),
    userAgent: readString(raw, 'userAgent', DEFAULT_CONFIG.userAgent)
  };
}

export interface ConfigManagerOptions {
  cwd?: string;
  /** Explicit config file; must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

class ConfigManager {
  private config: ModkeeperConfig | null = null;
  private configPath: string | null = null;
  private readonly cwd: string;
  private readonly explicitPath: string | undefined;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.explicitPath = options.configPath ? resolve(this.cwd, options.configPath) : undefined;
    this.env = options.env ?? process.env;
  }

  private async findConfigFile(): Promise<string | null> {
    if (this.explicitPath) {
      if (!(await exists(this.explicitPath))) {
        throw new ConfigError(`Config file not found: ${this.explicitPath}`);
      }
      return this.explicitPath;
    }
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.cwd, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration once; later calls return the cached result.
   */
  async load(): Promise<ModkeeperConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    let fileSettings: unknown;
    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      try {
        fileSettings = await readJsonOrJsoncFile(configPath);
      } catch (error) {
        throw new ConfigError(`Failed to load configuration: ${describeError(error)}`, { configPath });
      }
    } else {
      logger.debug('Config file not found, using defaults');
    }

    this.configPath = configPath;
    this.config = resolveConfig(fileSettings, this.env, this.cwd);
    return this.config;
  }

  /** Path of the file the configuration came from, null when defaults only */
  getConfigFilePath(): string | null {
    return this.configPath;
  }
}

export { ConfigManager };

/** Mods directory under the server root */
export function getModsDir(config: ModkeeperConfig): string {
  return join(config.serverPath, SERVER_DIRS.MODS);
}

export function getLedgerPath(config: ModkeeperConfig): string {
  return join(config.serverPath, config.ledgerFileName);
}

export function getUpdateLogPath(config: ModkeeperConfig): string {
  return join(config.serverPath, SCHEDULER.LOG_FILE_NAME);
}

/** Lock taken by the process running an update batch */
export function getBatchLockPath(config: ModkeeperConfig): string {
  return join(config.serverPath, SCHEDULER.BATCH_LOCK_NAME);
}

/**
 * Check that the server layout is usable. Returns one message per problem;
 * an empty list means the paths are fine. Creates the mods directory when
 * it is missing.
 */
export async function validatePaths(config: ModkeeperConfig): Promise<string[]> {
  const problems: string[] = [];

  if (!(await exists(config.serverPath))) {
    problems.push(`Server directory does not exist: ${config.serverPath}`);
    return problems;
  }
  if (!(await isDirectory(config.serverPath))) {
    problems.push(`Server path is not a directory: ${config.serverPath}`);
    return problems;
  }

  const modsDir = getModsDir(config);
  try {
    await ensureDir(modsDir);
  } catch (error) {
    problems.push(`Cannot create mods directory ${modsDir}: ${describeError(error)}`);
    return problems;
  }

  if (!(await isWritable(modsDir))) {
    problems.push(`Mods directory is not writable: ${modsDir}`);
  }

  return problems;
}
