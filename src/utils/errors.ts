import { QuiverError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes raised across plan generation and execution
 */

export class GenerationError extends QuiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.GENERATION_ERROR, details);
    this.name = 'GenerationError';
  }
}

/**
 * Raised while decomposing a single recipe step; the message is prefixed with
 * the step position so users can find it in the recipe.
 */
export class StepGenerationError extends GenerationError {
  constructor(stepIndex: number, action: string, reason: string) {
    super(`steps[${stepIndex}] (${action}): ${reason}`, { stepIndex, action, reason });
    this.name = 'StepGenerationError';
  }
}

export class DependencyError extends QuiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.DEPENDENCY_ERROR, details);
    this.name = 'DependencyError';
  }
}

export class MissingDependencyError extends DependencyError {
  public readonly tool: string;

  constructor(tool: string, requiredBy?: string) {
    const suffix = requiredBy ? ` (required by '${requiredBy}')` : '';
    super(`No recipe found for dependency '${tool}'${suffix}`, { tool, requiredBy });
    this.name = 'MissingDependencyError';
    this.tool = tool;
  }
}

export class DependencyCycleError extends DependencyError {
  public readonly tool: string;
  public readonly chain: string[];

  constructor(tool: string, chain: string[]) {
    super(`Dependency cycle detected at '${tool}': ${[...chain, tool].join(' -> ')}`, { tool, chain });
    this.name = 'DependencyCycleError';
    this.tool = tool;
    this.chain = chain;
  }
}

export type VersionResolutionErrorKind = 'network' | 'not_found' | 'invalid_constraint' | 'unknown_source';

export class VersionResolutionError extends QuiverError {
  public readonly kind: VersionResolutionErrorKind;

  constructor(kind: VersionResolutionErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VERSION_RESOLUTION_ERROR, { kind, ...details });
    this.name = 'VersionResolutionError';
    this.kind = kind;
  }
}

export class CacheValidationError extends QuiverError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Cached plan is stale: ${reason}`, ErrorCodes.CACHE_VALIDATION_ERROR, { reason, ...details });
    this.name = 'CacheValidationError';
  }
}

export interface ChecksumMismatchDetails {
  tool: string;
  version: string;
  url: string;
  expected: string;
  actual: string;
  /** Set when the download belongs to one of the plan's dependencies */
  dependency?: string;
}

export class ChecksumMismatchError extends QuiverError {
  public readonly tool: string;
  public readonly version: string;
  public readonly url: string;
  public readonly expected: string;
  public readonly actual: string;
  public readonly dependency?: string;

  constructor(info: ChecksumMismatchDetails) {
    super(
      [
        info.dependency
          ? `checksum mismatch for ${info.url} (dependency '${info.dependency}')`
          : `checksum mismatch for ${info.url}`,
        '',
        `Expected: ${info.expected}`,
        `Got:      ${info.actual}`,
        '',
        'The upstream asset has changed since the installation plan was generated.',
        'This may be a re-tagged release or a modified download.',
        '',
        'To proceed with the new asset, regenerate the plan:',
        `    quiver install ${info.tool}@${info.version} --fresh`
      ].join('\n'),
      ErrorCodes.CHECKSUM_MISMATCH,
      { ...info }
    );
    this.name = 'ChecksumMismatchError';
    this.tool = info.tool;
    this.version = info.version;
    this.url = info.url;
    this.expected = info.expected;
    this.actual = info.actual;
    this.dependency = info.dependency;
  }
}

export class ExecutionError extends QuiverError {
  public readonly stepIndex: number;
  public readonly action: string;

  constructor(stepIndex: number, action: string, cause: unknown, tool?: string) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = tool ? `${tool} step ${stepIndex}` : `step ${stepIndex}`;
    super(`${where} (${action}) failed: ${reason}`, ErrorCodes.EXECUTION_ERROR, { stepIndex, action, tool });
    this.name = 'ExecutionError';
    this.stepIndex = stepIndex;
    this.action = action;
    this.cause = cause;
  }
}

export class PlanValidationError extends QuiverError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid plan:\n  - ${issues.join('\n  - ')}`, ErrorCodes.PLAN_VALIDATION_ERROR, { issues });
    this.name = 'PlanValidationError';
    this.issues = issues;
  }
}

export class RecipeValidationError extends QuiverError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid recipe: ${reason}`, ErrorCodes.INVALID_RECIPE, details);
    this.name = 'RecipeValidationError';
  }
}

export class FileSystemError extends QuiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends QuiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class LockError extends QuiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.LOCK_ERROR, details);
    this.name = 'LockError';
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
export function handleError(error: unknown): CommandResult {
  if (error instanceof QuiverError) {
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
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}

/**
 * True for errors the OS reports with the given errno code (ENOENT, EEXIST, ...)
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
