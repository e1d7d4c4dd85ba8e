/**
 * Common types and interfaces for the modkeeper CLI application
 */

export * from './registry.js';
export * from './ledger.js';

// Core application types

export type ModLoader = 'fabric' | 'forge' | 'neoforge' | 'quilt';

export const MOD_LOADERS: readonly ModLoader[] = ['fabric', 'forge', 'neoforge', 'quilt'];

export function isModLoader(value: string): value is ModLoader {
  return (MOD_LOADERS as readonly string[]).includes(value);
}

/**
 * The fixed target every resolution and install runs against.
 */
export interface ServerEnvironment {
  gameVersion: string;
  loader: ModLoader;
}

export interface ModkeeperConfig {
  serverPath: string;
  loader: ModLoader;
  gameVersion?: string;
  serverPropertiesPath?: string;
  enableAutoUpdate: boolean;
  updateIntervalHours: number;
  apiBaseUrl: string;
  registryHost: string;
  apiCacheTtlSeconds: number;
  requestTimeoutSeconds: number;
  downloadTimeoutSeconds: number;
  backupLedger: boolean;
  ledgerFileName: string;
  includeOptionalDependencies: boolean;
  preferStable: boolean;
  logLevel: LogLevel;
  userAgent: string;
}

// Command option types

export interface InstallOptions {
  forceUpdate?: boolean;
  autoUpdate?: boolean;
}

export interface InstallSummary {
  installed: string[];
  updated: string[];
  skipped: string[];
}

export interface ServerSummary {
  gameVersion: string;
  loader: ModLoader;
  serverPath: string;
  modCount: number;
  autoUpdateEnabled: boolean;
  lastUpdateCheck: string | null;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ModkeeperError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModkeeperError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  REGISTRY_ERROR = 'REGISTRY_ERROR',
  NO_COMPATIBLE_VERSION = 'NO_COMPATIBLE_VERSION',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  LEDGER_ERROR = 'LEDGER_ERROR',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
