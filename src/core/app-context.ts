import type { ModkeeperConfig, ServerEnvironment } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { HttpClient, type FetchLike } from '../utils/http-client.js';
import { logger } from '../utils/logger.js';
import { getBatchLockPath, getLedgerPath, getModsDir, getUpdateLogPath, validatePaths } from './config.js';
import { DependencyResolver } from './dependency-resolver/index.js';
import { Installer } from './install/installer.js';
import { LedgerStore } from './ledger/index.js';
import { RegistryClient } from './registry/index.js';
import { AutoUpdater, UpdateLog } from './scheduler/index.js';
import { detectServerEnvironment } from './server-environment.js';

/**
 * Everything a command needs, built once per process.
 */
export interface AppContext {
  config: ModkeeperConfig;
  environment: ServerEnvironment;
  registry: RegistryClient;
  ledger: LedgerStore;
  installer: Installer;
  scheduler: AutoUpdater;
  /** Stop the scheduler and wait for any in-flight batch */
  shutdown(): Promise<void>;
}

export interface AppContextOverrides {
  fetchImpl?: FetchLike;
  environment?: ServerEnvironment;
  batchPauseMs?: number;
}

export async function createAppContext(
  config: ModkeeperConfig,
  overrides: AppContextOverrides = {}
): Promise<AppContext> {
  const problems = await validatePaths(config);
  if (problems.length > 0) {
    throw new ConfigError(`Server layout is not usable:\n  - ${problems.join('\n  - ')}`, { problems });
  }

  const environment = overrides.environment ?? (await detectServerEnvironment(config));

  const http = new HttpClient({
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutSeconds * 1000,
    userAgent: config.userAgent,
    fetchImpl: overrides.fetchImpl
  });
  const registry = new RegistryClient({
    http,
    cacheTtlMs: config.apiCacheTtlSeconds * 1000,
    downloadTimeoutMs: config.downloadTimeoutSeconds * 1000,
    registryHost: config.registryHost
  });

  const ledger = await LedgerStore.open({ filePath: getLedgerPath(config), backup: config.backupLedger });

  const resolver = new DependencyResolver(registry, {
    includeOptionalDependencies: config.includeOptionalDependencies,
    preferStable: config.preferStable
  });

  const installer = new Installer({
    registry,
    resolver,
    ledger,
    environment,
    serverPath: config.serverPath,
    modsDir: getModsDir(config),
    autoUpdateEnabled: config.enableAutoUpdate,
    registryHost: config.registryHost,
    preferStable: config.preferStable
  });

  const scheduler = new AutoUpdater({
    target: installer,
    recorder: ledger,
    enabled: config.enableAutoUpdate,
    intervalHours: config.updateIntervalHours,
    pauseMs: overrides.batchPauseMs,
    log: await UpdateLog.open({ filePath: getUpdateLogPath(config) }),
    lastCheck: ledger.getMetadata().lastUpdateCheck,
    batchLockPath: getBatchLockPath(config)
  });

  logger.debug('Application context ready', { serverPath: config.serverPath, environment });

  return {
    config,
    environment,
    registry,
    ledger,
    installer,
    scheduler,
    shutdown: () => scheduler.shutdown()
  };
}
