/**
 * CLI Errors - Structured error types for the command-line host
 *
 * The solver core cannot fail on a valid board, so the errors here are about
 * how the program was started: unknown flags and invalid configuration.
 * Each code maps to a process exit status.
 *
 * Usage:
 * ```typescript
 * import { UsageError, getExitCode } from './errors';
 *
 * throw new UsageError('-x');
 *
 * // later
 * process.exitCode = getExitCode(error);
 * ```
 *
 * @module CliErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum CliErrorCode {
  USAGE_INVALID_FLAG = 'USAGE_INVALID_FLAG',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit status for each error code (78 and 70 follow sysexits.h).
 */
export const ERROR_EXIT_CODE: Record<CliErrorCode, number> = {
  [CliErrorCode.USAGE_INVALID_FLAG]: 1,
  [CliErrorCode.CONFIGURATION_ERROR]: 78,
  [CliErrorCode.INTERNAL_ERROR]: 70,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class CliError extends Error {
  /** Error code for programmatic handling */
  readonly code: CliErrorCode;

  /** Additional context for logs */
  readonly context: Record<string, unknown>;

  constructor(code: CliErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.context = context;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, CliError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODE[this.code] ?? 1;
  }

  toJSON(): CliErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      exitCode: this.exitCode,
    };
  }
}

export interface CliErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  exitCode: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Unknown command-line flag.
 */
export class UsageError extends CliError {
  readonly flag: string;

  constructor(flag: string, context: Record<string, unknown> = {}) {
    super(CliErrorCode.USAGE_INVALID_FLAG, `Unknown option: ${flag}`, { flag, ...context });
    this.name = 'UsageError';
    this.flag = flag;
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Environment variables that fail validation.
 */
export class ConfigurationError extends CliError {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[], context: Record<string, unknown> = {}) {
    super(CliErrorCode.CONFIGURATION_ERROR, 'Invalid environment configuration', {
      issues,
      ...context,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

export function getExitCode(error: unknown): number {
  if (isCliError(error)) {
    return error.exitCode;
  }
  return ERROR_EXIT_CODE[CliErrorCode.INTERNAL_ERROR];
}

/**
 * Wrap an unknown error in a CliError.
 */
export function wrapCliError(error: unknown, context: Record<string, unknown> = {}): CliError {
  if (isCliError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CliError(CliErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalError: error instanceof Error ? error.name : typeof error,
  });
}
