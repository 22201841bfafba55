import type { ExvalEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the engine.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'ValidationStarted', ... });
 *
 * // Standard logging
 * logger.info('Validation completed');
 * logger.error(new Error('Failed'), 'Sandbox setup failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ candidate: 'c1' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured engine event.
   */
  log(event: ExvalEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * Combines structured event data with a human-readable summary.
   */
  trace(event: ExvalEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
