import type { Logger } from './cli-utils';

export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  TYPESCRIPT_CONFIG_ERROR = 'TYPESCRIPT_CONFIG_ERROR',

  // Analysis errors
  PARSING_FAILED = 'PARSING_FAILED',
  FILE_NOT_ACCESSIBLE = 'FILE_NOT_ACCESSIBLE',
  ANALYSIS_FAILED = 'ANALYSIS_FAILED',
  NO_FILES_FOUND = 'NO_FILES_FOUND',

  // Generic errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

export interface ParamguardError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  recoverable: boolean;
  recoveryActions?: string[];
  originalError?: Error;
  stack?: string;
}

/**
 * Thrown by the config layer when a config file exists but cannot be used
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.INVALID_CONFIG,
    public readonly filepath?: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export interface ErrorHandlerOptions {
  enableRecovery: boolean;
  exit: (code: number) => never;
}

export class ErrorHandler {
  private logger: Logger;
  private options: ErrorHandlerOptions;

  constructor(logger: Logger, options: Partial<ErrorHandlerOptions> = {}) {
    this.logger = logger;
    this.options = {
      enableRecovery: true,
      exit: (code: number) => process.exit(code),
      ...options,
    };
  }

  createError(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    originalError?: Error
  ): ParamguardError {
    const errorInfo = this.getErrorInfo(code);

    const result: ParamguardError = {
      code,
      message,
      recoverable: errorInfo.recoverable,
    };

    const stack = originalError?.stack ?? new Error().stack;
    if (stack) result.stack = stack;
    if (details) result.details = details;
    if (errorInfo.recoveryActions) result.recoveryActions = errorInfo.recoveryActions;
    if (originalError) result.originalError = originalError;

    return result;
  }

  /**
   * Map a thrown value onto a ParamguardError
   */
  fromUnknown(error: unknown, fallbackCode: ErrorCode = ErrorCode.UNKNOWN_ERROR): ParamguardError {
    if (error instanceof ConfigLoadError) {
      return this.createError(
        error.code,
        error.message,
        error.filepath ? { filepath: error.filepath } : undefined,
        error.originalError ?? error
      );
    }
    if (error instanceof Error) {
      return this.createError(fallbackCode, error.message, undefined, error);
    }
    return this.createError(fallbackCode, String(error));
  }

  getErrorInfo(code: ErrorCode): { recoverable: boolean; recoveryActions?: string[] } {
    switch (code) {
      case ErrorCode.INVALID_CONFIG:
        return {
          recoverable: true,
          recoveryActions: [
            'Check the syntax of your .paramguardrc file',
            'Remove unknown or mistyped keys',
            'Run with --no-config to use the defaults',
          ],
        };

      case ErrorCode.CONFIG_NOT_FOUND:
        return {
          recoverable: true,
          recoveryActions: ['Check the path passed to --config'],
        };

      case ErrorCode.TYPESCRIPT_CONFIG_ERROR:
        return {
          recoverable: true,
          recoveryActions: [
            'Ensure tsconfig.json is valid',
            'Pass a different file with --tsconfig',
          ],
        };

      case ErrorCode.PARSING_FAILED:
        return {
          recoverable: true,
          recoveryActions: [
            'Check TypeScript syntax errors',
            'Use exclude patterns to skip problematic files',
          ],
        };

      case ErrorCode.FILE_NOT_ACCESSIBLE:
        return {
          recoverable: true,
          recoveryActions: ['Check file permissions', 'Verify the path exists'],
        };

      case ErrorCode.NO_FILES_FOUND:
        return {
          recoverable: true,
          recoveryActions: [
            'Pass the files or directories to check as arguments',
            'Adjust the include patterns in your config',
          ],
        };

      case ErrorCode.ANALYSIS_FAILED:
        return {
          recoverable: true,
          recoveryActions: [
            'Re-run with --verbose to collect detailed logs',
            'Narrow the analysis scope using include/exclude filters',
          ],
        };

      default:
        return { recoverable: false };
    }
  }

  handleError(error: ParamguardError | Error): never {
    const paramguardError = error instanceof Error ? this.fromUnknown(error) : error;

    this.logError(paramguardError);

    if (paramguardError.recoverable && this.options.enableRecovery) {
      this.suggestRecovery(paramguardError);
    }

    return this.options.exit(this.getExitCode(paramguardError.code));
  }

  private logError(error: ParamguardError): void {
    this.logger.error(`[${error.code}] ${error.message}`);

    if (error.details) {
      this.logger.error('Details:', error.details);
    }

    if (error.originalError) {
      this.logger.debug('Original error:', error.originalError);
    }
  }

  private suggestRecovery(error: ParamguardError): void {
    if (error.recoveryActions && error.recoveryActions.length > 0) {
      this.logger.info('Suggested recovery actions:');
      error.recoveryActions.forEach((action, index) => {
        this.logger.info(`   ${index + 1}. ${action}`);
      });
    }
  }

  getExitCode(errorCode: ErrorCode): number {
    switch (errorCode) {
      case ErrorCode.INVALID_CONFIG:
      case ErrorCode.CONFIG_NOT_FOUND:
        return 1; // Configuration/setup errors

      case ErrorCode.FILE_NOT_ACCESSIBLE:
        return 2; // Permission/access errors

      case ErrorCode.PARSING_FAILED:
      case ErrorCode.TYPESCRIPT_CONFIG_ERROR:
      case ErrorCode.ANALYSIS_FAILED:
      case ErrorCode.NO_FILES_FOUND:
        return 4; // Analysis errors

      case ErrorCode.OPERATION_CANCELLED:
        return 130; // User cancellation (SIGINT)

      default:
        return 1; // Generic error
    }
  }
}

// Convenience function for creating a global error handler
export function createErrorHandler(logger: Logger): ErrorHandler {
  return new ErrorHandler(logger);
}

// Process-level error handlers
export function setupGlobalErrorHandlers(errorHandler: ErrorHandler): void {
  process.on('uncaughtException', error => {
    const paramguardError = errorHandler.createError(
      ErrorCode.UNKNOWN_ERROR,
      'Uncaught exception',
      {},
      error
    );
    errorHandler.handleError(paramguardError);
  });

  process.on('unhandledRejection', reason => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    const paramguardError = errorHandler.createError(
      ErrorCode.UNKNOWN_ERROR,
      'Unhandled promise rejection',
      {},
      error
    );
    errorHandler.handleError(paramguardError);
  });

  process.on('SIGINT', () => {
    const paramguardError = errorHandler.createError(
      ErrorCode.OPERATION_CANCELLED,
      'Operation cancelled by user'
    );
    errorHandler.handleError(paramguardError);
  });
}
