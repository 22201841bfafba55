import type { ExvalEvent } from '../types/events';
import type { LogLevel } from '../config/schema';
import { isLevelEnabled } from './levels';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'debug';
  }

  log(event: ExvalEvent): void {
    if (!this.enabled('debug')) return;
    console.log(JSON.stringify(event));
  }

  trace(event: ExvalEvent, message: string): void {
    if (!this.enabled('debug')) return;
    console.log(message, JSON.stringify(event));
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return isLevelEnabled(level, this.level);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: ExvalEvent) {
    return this.base.log(event);
  }

  trace(event: ExvalEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
