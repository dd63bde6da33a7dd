/**
 * Common types and interfaces for monoversion
 */

export * from './workspace.js';
export * from './graph.js';
export * from './changeset.js';
export * from './attribution.js';
export * from './plan.js';
export * from './validation.js';
export * from './config.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  exitCode?: number;
  warnings?: string[];
}

// Error types
export type ErrorKind =
  | 'workspace'
  | 'graph'
  | 'attribution'
  | 'changeset'
  | 'planning'
  | 'validation'
  | 'provider'
  | 'configuration'
  | 'cancelled';

export class MonoversionError extends Error {
  public kind: ErrorKind;
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, kind: ErrorKind, code: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MonoversionError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  NO_ROOT_MANIFEST = 'NO_ROOT_MANIFEST',
  PATTERN_COVERAGE = 'PATTERN_COVERAGE',
  DUPLICATE_PACKAGE_NAME = 'DUPLICATE_PACKAGE_NAME',
  MANIFEST_PARSE = 'MANIFEST_PARSE',
  DANGLING_REFERENCE = 'DANGLING_REFERENCE',
  UNMAPPED_FILE = 'UNMAPPED_FILE',
  INVALID_CHANGESET = 'INVALID_CHANGESET',
  CHANGESET_NOT_FOUND = 'CHANGESET_NOT_FOUND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  STORE_LOCKED = 'STORE_LOCKED',
  STORE_WRITE_FAILED = 'STORE_WRITE_FAILED',
  PLAN_CONFLICT = 'PLAN_CONFLICT',
  STALE_MANIFEST = 'STALE_MANIFEST',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VCS_ERROR = 'VCS_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CANCELLED = 'CANCELLED'
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
