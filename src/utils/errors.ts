import { MonoversionError, ErrorCodes, CommandResult, Diagnostic, PlanConflict, ValidationIssue } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for each failure kind of the engine
 */

export class WorkspaceError extends MonoversionError {
  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'workspace', code, details, cause);
    this.name = 'WorkspaceError';
  }
}

export class GraphError extends MonoversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'graph', ErrorCodes.DANGLING_REFERENCE, details);
    this.name = 'GraphError';
  }
}

export class AttributionError extends MonoversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'attribution', ErrorCodes.UNMAPPED_FILE, details);
    this.name = 'AttributionError';
  }
}

export class ChangesetError extends MonoversionError {
  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'changeset', code, details, cause);
    this.name = 'ChangesetError';
  }
}

export class PlanningError extends MonoversionError {
  public conflicts: PlanConflict[];

  constructor(conflicts: PlanConflict[]) {
    const first = conflicts[0];
    const suffix = conflicts.length > 1 ? ` (and ${conflicts.length - 1} more)` : '';
    super(
      `Cannot build version plan: ${first ? first.message : 'unknown conflict'}${suffix}`,
      'planning',
      ErrorCodes.PLAN_CONFLICT,
      { conflicts }
    );
    this.name = 'PlanningError';
    this.conflicts = conflicts;
  }
}

export class ValidationError extends MonoversionError {
  public issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const errors = issues.filter(issue => issue.severity === 'error');
    super(`Validation failed with ${errors.length} error(s)`, 'validation', ErrorCodes.VALIDATION_FAILED, { issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ProviderError extends MonoversionError {
  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'provider', code, details, cause);
    this.name = 'ProviderError';
  }
}

export class FileSystemError extends ProviderError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details, cause);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends MonoversionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'configuration', ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class CancelledError extends MonoversionError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'cancelled', ErrorCodes.CANCELLED);
    this.name = 'CancelledError';
  }
}

export const EXIT_CODES = {
  SUCCESS: 0,
  VALIDATION: 1,
  CONFIGURATION: 2,
  CONFLICT: 3,
  PROVIDER: 4,
  CANCELLED: 130
} as const;

/**
 * Map an error to the process exit code of engine-driven CLIs
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof MonoversionError)) {
    return EXIT_CODES.PROVIDER;
  }
  switch (error.kind) {
    case 'cancelled':
      return EXIT_CODES.CANCELLED;
    case 'configuration':
      return EXIT_CODES.CONFIGURATION;
    case 'planning':
      return EXIT_CODES.CONFLICT;
    case 'provider':
      return EXIT_CODES.PROVIDER;
    case 'changeset':
      return error.code === ErrorCodes.STORE_LOCKED || error.code === ErrorCodes.STORE_WRITE_FAILED
        ? EXIT_CODES.PROVIDER
        : EXIT_CODES.VALIDATION;
    default:
      return EXIT_CODES.VALIDATION;
  }
}

/**
 * Messages of an error followed by its cause chain
 */
export function causeChain(error: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = error;
  while (current !== undefined && messages.length < 10) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }
  return messages;
}

/**
 * Render any failure as a diagnostic list
 */
export function toDiagnostics(error: unknown): Diagnostic[] {
  if (error instanceof PlanningError) {
    return error.conflicts.map(conflict => ({
      severity: 'error',
      category: conflict.kind,
      message: conflict.message,
      packages: conflict.packages
    }));
  }
  if (error instanceof ValidationError) {
    return error.issues.map(issue => ({ ...issue }));
  }
  if (error instanceof MonoversionError) {
    const packages = packagesFromDetails(error.details);
    return [{
      severity: 'error',
      category: error.code,
      message: causeChain(error).join(': '),
      packages
    }];
  }
  return [{
    severity: 'error',
    category: 'UNEXPECTED',
    message: causeChain(error).join(': '),
    packages: []
  }];
}

function packagesFromDetails(details: Record<string, unknown> | undefined): string[] {
  if (!details) return [];
  const names = new Set<string>();
  const single = details.packageName;
  if (typeof single === 'string') names.add(single);
  const many = details.packages;
  if (Array.isArray(many)) {
    for (const name of many) {
      if (typeof name === 'string') names.add(name);
    }
  }
  return Array.from(names).sort();
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof MonoversionError) {
    logger.debug(error.message, { kind: error.kind, code: error.code, details: error.details });
    return {
      success: false,
      error: causeChain(error).join(': '),
      exitCode: exitCodeFor(error)
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message,
      exitCode: exitCodeFor(error)
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred',
      exitCode: exitCodeFor(error)
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
      const result = handleError(error);
      for (const diagnostic of toDiagnostics(error)) {
        const scope = diagnostic.packages.length > 0 ? ` [${diagnostic.packages.join(', ')}]` : '';
        console.error(`${diagnostic.severity}: ${diagnostic.category}: ${diagnostic.message}${scope}`);
      }
      process.exitCode = result.exitCode ?? EXIT_CODES.VALIDATION;
    }
  };
}
