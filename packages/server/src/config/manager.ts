/**
 * Configuration Manager
 *
 * YAML-based configuration management with:
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Configuration validation
 * - Default value application
 * - CLI argument overrides
 */

import * as fs from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { z, type ZodError } from 'zod';
import { isLogLevelName } from '../utils/logger.js';
import { DEFAULT_CONFIG, VALID_LOG_FORMATS, VALID_LOG_LEVELS } from './types.js';
import type { CliOverrides, ServerConfig } from './types.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';

export interface ConfigManagerOptions {
  configPath?: string;
  /** Locations tried in order when no explicit path is given */
  searchPaths?: string[];
  envPrefix?: string;
  cliArgs?: CliOverrides;
}

// Default search paths for configuration files
const DEFAULT_SEARCH_PATHS = [
  './logic-net.yaml',
  join(homedir(), '.logic-net', 'config.yaml'),
];

/**
 * Shape of a configuration file after substitution; every key optional,
 * unknown keys rejected
 */
const fileConfigSchema = z
  .object({
    server: z
      .object({
        port: z.number().optional(),
        host: z.string().nullable().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(VALID_LOG_LEVELS).optional(),
        format: z.enum(VALID_LOG_FORMATS).optional(),
      })
      .strict()
      .optional(),
    training: z
      .object({
        maxEpochs: z.number().optional(),
        defaultLearningRate: z.number().optional(),
        progressInterval: z.number().optional(),
      })
      .strict()
      .optional(),
    cors: z
      .object({
        enabled: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

export class ConfigManager {
  private config: ServerConfig = structuredClone(DEFAULT_CONFIG);

  constructor(private options: ConfigManagerOptions = {}) {}

  async load(): Promise<ServerConfig> {
    let loadedConfig: FileConfig = {};

    // Determine config path from CLI args or options
    const configPath = this.options.cliArgs?.config ?? this.options.configPath;

    if (configPath) {
      if (!fs.existsSync(configPath)) {
        throw new ConfigLoadError(`Config file not found: ${configPath}`, configPath);
      }
      loadedConfig = this.readConfigFile(configPath);
    } else {
      const foundPath = this.findConfigFile();
      if (foundPath) {
        loadedConfig = this.readConfigFile(foundPath);
      }
    }

    this.config = this.mergeWithDefaults(loadedConfig);

    if (this.options.cliArgs) {
      this.applyCliOverrides(this.options.cliArgs);
    }

    this.validateConfig(this.config);

    return this.get();
  }

  get(): ServerConfig {
    return structuredClone(this.config);
  }

  private findConfigFile(): string | null {
    for (const searchPath of this.options.searchPaths ?? DEFAULT_SEARCH_PATHS) {
      if (fs.existsSync(searchPath)) {
        return searchPath;
      }
    }
    return null;
  }

  private readConfigFile(path: string): FileConfig {
    const parsed = this.parseYaml(this.loadFile(path), path);
    const converted = this.convertTypes(this.substituteEnvVars(parsed));

    const result = fileConfigSchema.safeParse(converted);
    if (!result.success) {
      throw this.toValidationError(result.error, converted);
    }
    return result.data;
  }

  private loadFile(path: string): string {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (e) {
      throw new ConfigLoadError(`Failed to read config file: ${path}`, path, e);
    }
  }

  private parseYaml(content: string, path: string): unknown {
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML syntax', path, e);
    }
    return parsed ?? {};
  }

  private substituteEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      // Match ${VAR} or ${VAR:-default}
      return value.replace(
        /\$\{(\w+)(?::-([^}]*))?\}/g,
        (_match: string, name: string, defaultVal: string | undefined) => {
          const envName = this.options.envPrefix ? `${this.options.envPrefix}${name}` : name;
          const envValue = process.env[envName];

          // Empty counts as unset when a default is given
          if (envValue === '' && defaultVal !== undefined) {
            return defaultVal;
          }

          if (envValue === undefined && defaultVal === undefined) {
            throw new ConfigLoadError(`Required environment variable '${envName}' not set`);
          }
          return envValue ?? defaultVal ?? '';
        }
      );
    }
    if (Array.isArray(value)) {
      return value.map((v: unknown) => this.substituteEnvVars(v));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k, this.substituteEnvVars(v)])
      );
    }
    return value;
  }

  /**
   * Substituted values arrive as strings; turn numeric and boolean strings
   * back into their YAML types
   */
  private convertTypes(value: unknown): unknown {
    if (typeof value === 'string') {
      if (/^\d+(\.\d+)?$/.test(value)) return Number(value);
      if (value === 'true') return true;
      if (value === 'false') return false;
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((v: unknown) => this.convertTypes(v));
    }
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(
        Object.entries(value).map(([k, v]) => [k, this.convertTypes(v)])
      );
    }
    return value;
  }

  private mergeWithDefaults(loaded: FileConfig): ServerConfig {
    const defaults = structuredClone(DEFAULT_CONFIG);

    return {
      server: {
        port: loaded.server?.port ?? defaults.server.port,
        host: loaded.server?.host ?? defaults.server.host,
      },
      logging: {
        level: loaded.logging?.level ?? defaults.logging.level,
        format: loaded.logging?.format ?? defaults.logging.format,
      },
      training: {
        maxEpochs: loaded.training?.maxEpochs ?? defaults.training.maxEpochs,
        defaultLearningRate:
          loaded.training?.defaultLearningRate ?? defaults.training.defaultLearningRate,
        progressInterval: loaded.training?.progressInterval ?? defaults.training.progressInterval,
      },
      cors: {
        enabled: loaded.cors?.enabled ?? defaults.cors.enabled,
      },
    };
  }

  private applyCliOverrides(cliArgs: CliOverrides): void {
    if (cliArgs.port !== undefined) {
      this.config.server.port = cliArgs.port;
    }
    if (cliArgs.host !== undefined) {
      this.config.server.host = cliArgs.host;
    }

    const level = cliArgs['log-level'];
    if (level !== undefined) {
      if (!isLogLevelName(level)) {
        throw new ConfigValidationError(
          `Invalid log level '${level}'. Valid options: ${VALID_LOG_LEVELS.join(', ')}`,
          'logging.level',
          level
        );
      }
      this.config.logging.level = level;
    }
  }

  private validateConfig(config: ServerConfig): void {
    if (!Number.isInteger(config.server.port)) {
      throw new ConfigValidationError(
        `Invalid value for server.port: expected integer, got '${config.server.port}'`,
        'server.port',
        config.server.port,
        'integer'
      );
    }

    if (config.server.port < 1 || config.server.port > 65535) {
      throw new ConfigValidationError(
        `Port out of range (1-65535): ${config.server.port}`,
        'server.port',
        config.server.port
      );
    }

    if (config.server.host.trim() === '') {
      throw new ConfigValidationError('Server host must not be empty', 'server.host', config.server.host);
    }

    if (!Number.isInteger(config.training.maxEpochs) || config.training.maxEpochs < 1) {
      throw new ConfigValidationError(
        `training.maxEpochs must be a positive integer, got ${config.training.maxEpochs}`,
        'training.maxEpochs',
        config.training.maxEpochs,
        'integer'
      );
    }

    if (!(config.training.defaultLearningRate > 0)) {
      throw new ConfigValidationError(
        `training.defaultLearningRate must be positive, got ${config.training.defaultLearningRate}`,
        'training.defaultLearningRate',
        config.training.defaultLearningRate,
        'number'
      );
    }

    if (!Number.isInteger(config.training.progressInterval) || config.training.progressInterval < 1) {
      throw new ConfigValidationError(
        `training.progressInterval must be a positive integer, got ${config.training.progressInterval}`,
        'training.progressInterval',
        config.training.progressInterval,
        'integer'
      );
    }
  }

  private toValidationError(error: ZodError, raw: unknown): ConfigValidationError {
    const issue = error.issues[0];

    if (issue.code === 'unrecognized_keys') {
      const field = [...issue.path, issue.keys[0]].join('.');
      return new ConfigValidationError(
        `Unknown configuration key: '${field}'`,
        field,
        valueAt(raw, [...issue.path, issue.keys[0]])
      );
    }

    const field = issue.path.join('.');
    const value = valueAt(raw, issue.path);

    if (issue.code === 'invalid_enum_value') {
      return new ConfigValidationError(
        `Invalid value '${String(value)}' for ${field}. Valid options: ${issue.options.join(', ')}`,
        field,
        value
      );
    }

    const expected = issue.code === 'invalid_type' ? issue.expected : undefined;
    return new ConfigValidationError(
      `Invalid value for ${field}: expected ${expected ?? 'a valid value'}, got '${String(value)}'`,
      field,
      value,
      expected
    );
  }
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}
