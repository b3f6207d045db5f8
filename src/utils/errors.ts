import { RunExampleError, ErrorCodes, type CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for each way a run can stop before the example is launched
 */

export class PreconditionError extends RunExampleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PRECONDITION_FAILED, details);
    this.name = 'PreconditionError';
  }
}

export class ModuleNotFoundError extends RunExampleError {
  constructor(identifier: string, details?: Record<string, unknown>) {
    super(`Could not find module for example '${identifier}'`, ErrorCodes.MODULE_NOT_FOUND, { identifier, ...details });
    this.name = 'ModuleNotFoundError';
  }
}

export class ArtifactNotFoundError extends RunExampleError {
  constructor(moduleName: string, pattern: string, buildCommand: string) {
    super(
      `Could not find tests jar matching '${pattern}' in module '${moduleName}'. ` +
        `Run '${buildCommand} install -DskipTests' in the project root first.`,
      ErrorCodes.ARTIFACT_NOT_FOUND,
      { moduleName, pattern }
    );
    this.name = 'ArtifactNotFoundError';
  }
}

export class ExampleNotFoundError extends RunExampleError {
  constructor(identifier: string, details?: Record<string, unknown>) {
    super(`Could not find example script '${identifier}'`, ErrorCodes.EXAMPLE_NOT_FOUND, { identifier, ...details });
    this.name = 'ExampleNotFoundError';
  }
}

export class VersionUnavailableError extends RunExampleError {
  constructor(expression: string, modulePath: string, reason: string) {
    super(
      `Could not determine '${expression}' for module ${modulePath}: ${reason}`,
      ErrorCodes.VERSION_UNAVAILABLE,
      { expression, modulePath, reason }
    );
    this.name = 'VersionUnavailableError';
  }
}

export class FileSystemError extends RunExampleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends RunExampleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends RunExampleError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class LaunchError extends RunExampleError {
  constructor(command: string, cause: string) {
    super(`Failed to launch '${command}': ${cause}`, ErrorCodes.LAUNCH_FAILED, { command });
    this.name = 'LaunchError';
  }
}

/**
 * Errors after which the usage text is shown, since the identifier itself is the likely culprit
 */
export function shouldShowUsage(error: unknown): boolean {
  return error instanceof ModuleNotFoundError || error instanceof ExampleNotFoundError;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof RunExampleError) {
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
  fn: (...args: T) => Promise<void>,
  printUsage: () => void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      if (shouldShowUsage(error)) {
        printUsage();
      }
      process.exit(1);
    }
  };
}
