import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  EngineConfigSchema,
  LogLevelSchema,
  type EngineConfig,
} from '@exval/shared';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Record<string, unknown>; // CLI flags, shaped like the config file
  cwd?: string; // Directory holding the project config
  env?: NodeJS.ProcessEnv; // Environment variables
}

export const USER_CONFIG_DIR = '.exval';
export const PROJECT_CONFIG_FILE = '.exval.yaml';
export const LOG_LEVEL_ENV = 'EXVAL_LOG_LEVEL';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): EngineConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.exval/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Project config: <cwd>/.exval.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      const explicitPath = path.resolve(cwd, options.configPath);
      if (!fs.existsSync(explicitPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(explicitPath);
    }

    // 4. CLI flags
    const flagConfig = options.flags || {};

    // Merge in order of precedence: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const envLevel = env[LOG_LEVEL_ENV];
    if (envLevel) {
      const level = LogLevelSchema.safeParse(envLevel);
      if (!level.success) {
        throw new ConfigError(
          `${LOG_LEVEL_ENV} must be one of ${LogLevelSchema.options.join(', ')}, got "${envLevel}"`,
        );
      }
      merged = this.mergeConfigs(merged, { logging: { level: level.data } });
    }

    const result = EngineConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
      });
    }
    return result.data;
  }
}
