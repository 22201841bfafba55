import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { NoopLogger } from './noopLogger';
import type { LoggingConfig } from '../config/schema';
import type { Logger } from './types';
export type { Logger, MaybePromise } from './types';

export { ConsoleLogger, JsonlLogger, NoopLogger };

/**
 * Builds the logger described by the logging section of the engine config.
 */
export function createLogger(config: LoggingConfig): Logger {
  if (config.jsonlPath) {
    return new JsonlLogger(config.jsonlPath, {}, config.level);
  }
  return new ConsoleLogger({ level: config.level });
}
