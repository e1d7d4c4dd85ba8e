import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  getLedgerPath,
  getModsDir,
  getUpdateLogPath,
  resolveConfig,
  validatePaths
} from '../../src/core/config.js';
import { LogLevel } from '../../src/types/index.js';
import { ConfigError } from '../../src/utils/errors.js';
import { isDirectory } from '../../src/utils/fs.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

function configError(message: string) {
  return (error: unknown): boolean => error instanceof ConfigError && error.message === message;
}

describe('resolveConfig', () => {
  it('returns the defaults without settings', () => {
    assert.deepEqual(resolveConfig(undefined, {}, '/srv'), {
      ...DEFAULT_CONFIG,
      gameVersion: undefined,
      serverPropertiesPath: undefined
    });
  });

  it('resolves paths against the working directory and the server', () => {
    const config = resolveConfig(
      { serverPath: 'server', serverPropertiesPath: 'conf/server.properties', apiBaseUrl: 'https://api.example.test/v2/' },
      {},
      '/srv'
    );

    assert.equal(config.serverPath, '/srv/server');
    assert.equal(config.serverPropertiesPath, '/srv/server/conf/server.properties');
    assert.equal(config.apiBaseUrl, 'https://api.example.test/v2');
  });

  it('lets environment variables override the file', () => {
    const config = resolveConfig(
      { loader: 'fabric', updateIntervalHours: 2, enableAutoUpdate: true },
      {
        MODKEEPER_LOADER: 'Forge',
        MODKEEPER_UPDATE_INTERVAL_HOURS: '6',
        MODKEEPER_AUTO_UPDATE: 'off',
        MODKEEPER_GAME_VERSION: '1.20.4',
        MODKEEPER_LOG_LEVEL: 'DEBUG',
        MODKEEPER_API_CACHE_TTL: ''
      },
      '/srv'
    );

    assert.equal(config.loader, 'forge');
    assert.equal(config.updateIntervalHours, 6);
    assert.equal(config.enableAutoUpdate, false);
    assert.equal(config.gameVersion, '1.20.4');
    assert.equal(config.logLevel, LogLevel.DEBUG);
    assert.equal(config.apiCacheTtlSeconds, 300);
  });

  it('rejects invalid values', () => {
    assert.throws(
      () => resolveConfig({ updateIntervalHours: 0 }, {}, '/srv'),
      configError("Invalid 'updateIntervalHours': expected a positive number, got 0")
    );
    assert.throws(
      () => resolveConfig({ loader: 'bukkit' }, {}, '/srv'),
      configError("Invalid 'loader': unknown mod loader 'bukkit'")
    );
    assert.throws(
      () => resolveConfig({}, { MODKEEPER_BACKUP_LEDGER: 'maybe' }, '/srv'),
      configError(`Invalid 'backupLedger': expected a boolean, got "maybe"`)
    );
    assert.throws(
      () => resolveConfig({ logLevel: 'loud' }, {}, '/srv'),
      configError("Invalid 'logLevel': unknown log level 'loud'")
    );
    assert.throws(
      () => resolveConfig(['not', 'an', 'object'], {}, '/srv'),
      configError('Invalid configuration: expected an object at the top level')
    );
  });

  it('derives file locations from the server path', () => {
    const config = resolveConfig({ serverPath: '/srv/mc' }, {}, '/');

    assert.equal(getModsDir(config), '/srv/mc/mods');
    assert.equal(getLedgerPath(config), '/srv/mc/mod_manager_state.json');
    assert.equal(getUpdateLogPath(config), '/srv/mc/modkeeper-update-log.json');
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('config');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('reads modkeeper.jsonc with comments', async () => {
    await writeFile(
      join(dir, 'modkeeper.jsonc'),
      [
        '{',
        '  // where the server lives',
        '  "serverPath": "server",',
        '  "gameVersion": "1.20.1",',
        '}'
      ].join('\n')
    );
    const manager = new ConfigManager({ cwd: dir, env: {} });

    const config = await manager.load();

    assert.equal(config.serverPath, join(dir, 'server'));
    assert.equal(config.gameVersion, '1.20.1');
    assert.equal(manager.getConfigFilePath(), join(dir, 'modkeeper.jsonc'));
    assert.equal(await manager.load(), config);
  });

  it('uses defaults when no file exists', async () => {
    const manager = new ConfigManager({ cwd: dir, env: {} });

    assert.equal((await manager.load()).loader, 'fabric');
    assert.equal(manager.getConfigFilePath(), null);
  });

  it('requires an explicit config file to exist', async () => {
    const manager = new ConfigManager({ cwd: dir, configPath: 'missing.jsonc', env: {} });

    await assert.rejects(manager.load(), configError(`Config file not found: ${join(dir, 'missing.jsonc')}`));
  });
});

describe('validatePaths', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('paths');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('creates the mods directory for a usable server', async () => {
    const config = resolveConfig({ serverPath: dir }, {}, '/');

    assert.deepEqual(await validatePaths(config), []);
    assert.equal(await isDirectory(join(dir, 'mods')), true);
  });

  it('reports a missing server directory', async () => {
    const serverPath = join(dir, 'nowhere');
    const config = resolveConfig({ serverPath }, {}, '/');

    assert.deepEqual(await validatePaths(config), [`Server directory does not exist: ${serverPath}`]);
  });

  it('reports a server path that is a file', async () => {
    const serverPath = join(dir, 'server.jar');
    await writeFile(serverPath, '');
    const config = resolveConfig({ serverPath }, {}, '/');

    assert.deepEqual(await validatePaths(config), [`Server path is not a directory: ${serverPath}`]);
  });
});
