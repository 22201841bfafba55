/**
 * Error codes used throughout the validation engine.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'SchemaError'
  | 'GenerationError'
  | 'SandboxError'
  | 'CancelledError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all engine errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('SandboxError', 'Sandbox root is not writable', {
 *   cause: originalError,
 *   details: { rootDir: '/tmp/exval' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI or API usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A single problem found while checking a schema description.
 */
export interface SchemaIssue {
  /** Dotted location inside the raw description, e.g. `parameters.0.max` */
  path: string;
  message: string;
}

/**
 * Error thrown when an exercise schema is malformed or internally inconsistent.
 * Fatal for the schema; never retried.
 */
export class SchemaError extends AppError {
  public readonly issues: SchemaIssue[];

  constructor(message: string, options: AppErrorOptions & { issues?: SchemaIssue[] } = {}) {
    const issues = options.issues ?? [];
    super('SchemaError', message, {
      cause: options.cause,
      details: options.details ?? (issues.length > 0 ? { issues } : undefined),
    });
    this.issues = issues;
  }
}

/**
 * Error thrown when test cases cannot be generated for a schema,
 * e.g. a mandatory parameter whose domain is empty.
 */
export class GenerationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('GenerationError', message, options);
  }
}

/**
 * Error thrown when the sandbox itself cannot be prepared.
 * Failures of executed code are never reported this way; they become outcomes.
 */
export class SandboxError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SandboxError', message, options);
  }
}

/**
 * Error thrown when the caller aborts an in-flight operation.
 */
export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled', options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

/**
 * Maps an error to the process exit code used by the CLI.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
