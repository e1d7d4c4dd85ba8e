import { join } from 'path';
import { minimatch } from 'minimatch';

import { FILE_PATTERNS, LOADER_MARKERS, SERVER_DIRS } from '../constants/index.js';
import type { ModkeeperConfig, ModLoader, ServerEnvironment } from '../types/index.js';
import { NotInitializedError } from '../utils/errors.js';
import { exists, isDirectory, listEntries, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

const PROPERTY_KEYS = ['version', 'minecraft-version'];

/** Tried in order against each log line, newest line first */
const LOG_VERSION_PATTERNS = [
  /Starting minecraft server version (\d+\.\d+(?:\.\d+)?)/i,
  /Loading Minecraft (\d+\.\d+(?:\.\d+)?)/i,
  /minecraft.*?(\d+\.\d+(?:\.\d+)?)/i
];

const LOG_TAIL_LINES = 100;

export function parseVersionFromProperties(content: string): string | null {
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    if (separator <= 0) continue;
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    if (PROPERTY_KEYS.includes(key) && value.length > 0) {
      return value;
    }
  }
  return null;
}

export function parseVersionFromLog(content: string): string | null {
  const lines = content.split(/\r?\n/).slice(-LOG_TAIL_LINES).reverse();
  for (const line of lines) {
    for (const pattern of LOG_VERSION_PATTERNS) {
      const match = pattern.exec(line);
      if (match?.[1]) {
        return match[1];
      }
    }
  }
  return null;
}

async function readIfExists(path: string): Promise<string | null> {
  if (!(await exists(path))) {
    logger.debug(`Not found: ${path}`);
    return null;
  }
  return readTextFile(path);
}

/**
 * Game version the server runs: the configured value, else server.properties,
 * else the tail of logs/latest.log.
 */
export async function detectGameVersion(config: ModkeeperConfig): Promise<string | null> {
  if (config.gameVersion) {
    return config.gameVersion;
  }

  const propertiesPath = config.serverPropertiesPath ?? join(config.serverPath, FILE_PATTERNS.SERVER_PROPERTIES);
  const properties = await readIfExists(propertiesPath);
  const fromProperties = properties ? parseVersionFromProperties(properties) : null;
  if (fromProperties) {
    logger.debug(`Game version from ${propertiesPath}: ${fromProperties}`);
    return fromProperties;
  }

  const logPath = join(config.serverPath, SERVER_DIRS.LOGS, FILE_PATTERNS.LATEST_LOG);
  const log = await readIfExists(logPath);
  const fromLog = log ? parseVersionFromLog(log) : null;
  if (fromLog) {
    logger.debug(`Game version from ${logPath}: ${fromLog}`);
  }
  return fromLog;
}

async function hasMarker(serverPath: string, entries: string[], marker: string): Promise<boolean> {
  if (marker.includes('/')) {
    return exists(join(serverPath, marker));
  }
  return entries.some(entry => minimatch(entry, marker, { dot: true }));
}

/**
 * Loader installed in the server root, judged by its marker files. Falls back
 * to the configured loader.
 */
export async function detectLoader(config: ModkeeperConfig): Promise<ModLoader> {
  const entries = (await isDirectory(config.serverPath)) ? await listEntries(config.serverPath) : [];

  const candidates: Array<[ModLoader, readonly string[]]> = [
    ['fabric', LOADER_MARKERS.fabric],
    ['forge', LOADER_MARKERS.forge]
  ];
  for (const [loader, markers] of candidates) {
    for (const marker of markers) {
      if (await hasMarker(config.serverPath, entries, marker)) {
        logger.debug(`Detected ${loader} loader (marker '${marker}')`);
        return loader;
      }
    }
  }

  return config.loader;
}

/**
 * @throws NotInitializedError when no game version can be determined
 */
export async function detectServerEnvironment(config: ModkeeperConfig): Promise<ServerEnvironment> {
  const gameVersion = await detectGameVersion(config);
  if (!gameVersion) {
    throw new NotInitializedError(
      `Could not determine the game version of the server at ${config.serverPath}. ` +
      `Set 'gameVersion' in modkeeper.jsonc or MODKEEPER_GAME_VERSION.`,
      { serverPath: config.serverPath }
    );
  }

  const loader = await detectLoader(config);
  logger.info(`Server environment: ${gameVersion} / ${loader}`);
  return { gameVersion, loader };
}
