/**
 * Configuration system with YAML and JSON support
 *
 * Values come from three layers, later ones winning: built-in defaults, the
 * config file, and explicit overrides (command-line flags).
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import YAML from 'js-yaml';
import { AppError, isLogLevel, logger } from './logger.js';
import type { LogLevel } from './logger.js';
import { parseSortPolicy } from './sort-policy.js';
import type { SortPolicy } from './sort-policy.js';

export interface AppConfig {
  /** Input directories, not searched recursively */
  inputs: string[];
  /** Output root of the library */
  output?: string;
  /** Extensions to capture within the inputs */
  extensions: string[];
  sortPolicy: SortPolicy;
  /** Unset leaves the level from LOG_LEVEL in place */
  logLevel?: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;

export const DEFAULT_CONFIG_PATH = 'po.yaml';

export const DEFAULT_CONFIG: AppConfig = {
  inputs: [],
  extensions: ['jpg', 'jpeg', 'png', 'heic'],
  sortPolicy: 'move-to-root',
};

function cloneConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    inputs: [...config.inputs],
    extensions: [...config.extensions],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(message: string, configPath: string): AppError {
  return new AppError(`${message} (${configPath})`, 'CONFIG_ERROR', { path: configPath });
}

function readStringList(value: unknown, key: string, configPath: string): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw configError(`"${key}" must be a string or a list of strings`, configPath);
}

/**
 * Narrow a parsed config document into typed values. Relative paths are
 * resolved against the directory holding the config file.
 */
export function coerceConfig(raw: unknown, configPath: string): ConfigOverrides {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw configError('Config file must contain a mapping', configPath);
  }

  const baseDir = dirname(resolve(configPath));
  const result: ConfigOverrides = {};

  if (raw.inputs !== undefined) {
    result.inputs = readStringList(raw.inputs, 'inputs', configPath).map((input) => resolve(baseDir, input));
  }

  if (raw.output !== undefined) {
    if (typeof raw.output !== 'string') {
      throw configError('"output" must be a string', configPath);
    }
    result.output = resolve(baseDir, raw.output);
  }

  if (raw.extensions !== undefined) {
    result.extensions = readStringList(raw.extensions, 'extensions', configPath);
  }

  const policy = raw.sortPolicy ?? raw.sort_policy;
  if (policy !== undefined) {
    if (typeof policy !== 'string') {
      throw configError('"sortPolicy" must be a string', configPath);
    }
    try {
      result.sortPolicy = parseSortPolicy(policy);
    } catch (error) {
      throw configError(error instanceof Error ? error.message : String(error), configPath);
    }
  }

  const level = raw.logLevel ?? raw.log_level;
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw configError(`Invalid log level: ${String(level)}`, configPath);
    }
    result.logLevel = level;
  }

  return result;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH, overrides: ConfigOverrides = {}) {
    this.configPath = configPath;
    this.config = this.mergeConfigs(this.loadConfig(), overrides);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw configError(
        `Failed to load app config: ${error instanceof Error ? error.message : String(error)}`,
        this.configPath
      );
    }

    logger.info(
      `Loaded configuration from ${this.configPath}`,
      undefined,
      'ConfigManager'
    );

    return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), coerceConfig(parsed, this.configPath));
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: AppConfig, user: ConfigOverrides): AppConfig {
    const merged = cloneConfig(defaults);

    if (user.inputs !== undefined) merged.inputs = [...user.inputs];
    if (user.output !== undefined) merged.output = user.output;
    if (user.extensions !== undefined) merged.extensions = [...user.extensions];
    if (user.sortPolicy !== undefined) merged.sortPolicy = user.sortPolicy;
    if (user.logLevel !== undefined) merged.logLevel = user.logLevel;

    return merged;
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.getAll()[key];
  }

  /**
   * Validate configuration
   */
  validate(options: { requireInputs?: boolean } = {}): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!this.config.output) {
      errors.push('An output root is required (--output or "output" in the config file)');
    }

    if (options.requireInputs && this.config.inputs.length === 0) {
      errors.push('At least one input directory is required (--input or "inputs")');
    }

    if (options.requireInputs && this.config.extensions.length === 0) {
      errors.push('At least one extension is required (--extension or "extensions")');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
