/**
 * Common types and interfaces for the Quiver installer
 */

// Re-export domain types
export * from './platform.js';
export * from './recipe.js';
export * from './plan.js';

export interface QuiverDirectories {
  home: string;
  config: string;
  recipes: string;
  state: string;
  tools: string;
  cache: string;
  locks: string;
  runtime: string;
}

export interface QuiverConfig {
  /** Extra directories searched for recipes, before the home recipes directory */
  recipeDirs: string[];
  /** Install missing eval-time dependencies without asking */
  autoInstallEvalDeps: boolean;
  /** How long an install waits for another install of the same tool@version */
  lockTimeoutMs: number;
  /** Token sent to the GitHub API by the github version provider */
  githubToken?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class QuiverError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'QuiverError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  GENERATION_ERROR = 'GENERATION_ERROR',
  DEPENDENCY_ERROR = 'DEPENDENCY_ERROR',
  VERSION_RESOLUTION_ERROR = 'VERSION_RESOLUTION_ERROR',
  CACHE_VALIDATION_ERROR = 'CACHE_VALIDATION_ERROR',
  CHECKSUM_MISMATCH = 'CHECKSUM_MISMATCH',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  PLAN_VALIDATION_ERROR = 'PLAN_VALIDATION_ERROR',
  INVALID_RECIPE = 'INVALID_RECIPE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  LOCK_ERROR = 'LOCK_ERROR'
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
