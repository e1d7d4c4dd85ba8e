import { ModkeeperError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the modkeeper CLI
 */

export type RegistryErrorReason =
  | 'network'
  | 'timeout'
  | 'rate-limited'
  | 'not-found'
  | 'http'
  | 'invalid-url'
  | 'invalid-response';

export class RegistryError extends ModkeeperError {
  public readonly reason: RegistryErrorReason;
  public readonly status?: number;

  constructor(message: string, reason: RegistryErrorReason, details: { endpoint?: string; status?: number; cause?: unknown } = {}) {
    super(message, ErrorCodes.REGISTRY_ERROR, { reason, ...details });
    this.name = 'RegistryError';
    this.reason = reason;
    this.status = details.status;
  }
}

export class NoCompatibleVersionError extends ModkeeperError {
  constructor(slug: string, gameVersion: string, loader: string) {
    super(
      `No compatible version of '${slug}' for ${gameVersion}/${loader}`,
      ErrorCodes.NO_COMPATIBLE_VERSION,
      { slug, gameVersion, loader }
    );
    this.name = 'NoCompatibleVersionError';
  }
}

export class DownloadError extends ModkeeperError {
  constructor(fileName: string, details?: Record<string, unknown>) {
    super(`Failed to download file: ${fileName}`, ErrorCodes.DOWNLOAD_FAILED, { fileName, ...details });
    this.name = 'DownloadError';
  }
}

export class LedgerError extends ModkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Ledger error: ${message}`, ErrorCodes.LEDGER_ERROR, details);
    this.name = 'LedgerError';
  }
}

export class NotInitializedError extends ModkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.NOT_INITIALIZED, details);
    this.name = 'NotInitializedError';
  }
}

export class FileSystemError extends ModkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends ModkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends ModkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult<never> {
  if (error instanceof ModkeeperError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
