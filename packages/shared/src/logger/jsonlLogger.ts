import * as fs from 'fs/promises';
import { ensureDir } from '../fs/io';
import type { ExvalEvent } from '../types/events';
import type { LogLevel } from '../config/schema';
import { isLevelEnabled } from './levels';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL file; plain messages go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, level: LogLevel = 'debug') {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
  }

  async log(event: ExvalEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await ensureDir(this.filePath);
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: a broken log file must not fail the validation run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: ExvalEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
