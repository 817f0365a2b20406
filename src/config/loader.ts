/**
 * Configuration loader for benchctl.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Environment overrides for the settings most often changed per run
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  AppConfig,
  CorsConfig,
  ServerConfig,
  StorageConfig,
  DevicesConfig,
  SchedulerConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { createLogger, isLogLevel } from '../logging/logger.js';

const log = createLogger('config');

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Environment used for substitution and overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    log.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function assertPositiveNumber(value: unknown, path: string): void {
  if (value !== undefined && (typeof value !== 'number' || !Number.isFinite(value) || value <= 0)) {
    throw new ConfigValidationError('must be a positive number', path, value);
  }
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is PartialAppConfig['server'] {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.port !== undefined && (typeof config.port !== 'number' || config.port < 1 || config.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, config.port);
  }

  if (config.host !== undefined && typeof config.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, config.host);
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error, silent', `${path}.logLevel`, config.logLevel);
  }

  if (config.cors !== undefined) {
    if (!isRecord(config.cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, config.cors);
    }
    if (config.cors.enabled !== undefined && typeof config.cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, config.cors.enabled);
    }
    const origins = config.cors.origins;
    if (origins !== undefined && (!Array.isArray(origins) || !origins.every((origin) => typeof origin === 'string'))) {
      throw new ConfigValidationError('origins must be an array of strings', `${path}.cors.origins`, origins);
    }
  }
}

/**
 * Validate storage configuration.
 */
function validateStorageConfig(config: unknown, path = 'storage'): asserts config is Partial<StorageConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.dataDir !== undefined && (typeof config.dataDir !== 'string' || config.dataDir.length === 0)) {
    throw new ConfigValidationError('dataDir must be a non-empty string', `${path}.dataDir`, config.dataDir);
  }

  assertPositiveNumber(config.lockTimeoutMs, `${path}.lockTimeoutMs`);
}

/**
 * Validate device configuration.
 */
function validateDevicesConfig(config: unknown, path = 'devices'): asserts config is Partial<DevicesConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.hardwareMock !== undefined && typeof config.hardwareMock !== 'boolean') {
    throw new ConfigValidationError('hardwareMock must be a boolean', `${path}.hardwareMock`, config.hardwareMock);
  }

  if (config.resources !== undefined) {
    if (!Array.isArray(config.resources)) {
      throw new ConfigValidationError('must be an array', `${path}.resources`, config.resources);
    }
    config.resources.forEach((resource, index) => {
      if (typeof resource !== 'string' || resource.trim().length === 0) {
        throw new ConfigValidationError('must be a non-empty string', `${path}.resources[${index}]`, resource);
      }
    });
  }

  assertPositiveNumber(config.probeTimeoutMs, `${path}.probeTimeoutMs`);
  assertPositiveNumber(config.monitorIntervalMs, `${path}.monitorIntervalMs`);

  if (
    config.oscilloscopeBufferSize !== undefined &&
    (typeof config.oscilloscopeBufferSize !== 'number' || !Number.isInteger(config.oscilloscopeBufferSize) || config.oscilloscopeBufferSize < 1)
  ) {
    throw new ConfigValidationError('oscilloscopeBufferSize must be a positive integer', `${path}.oscilloscopeBufferSize`, config.oscilloscopeBufferSize);
  }
}

/**
 * Validate scheduler configuration.
 */
function validateSchedulerConfig(config: unknown, path = 'scheduler'): asserts config is Partial<SchedulerConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  assertPositiveNumber(config.tickIntervalMs, `${path}.tickIntervalMs`);
  assertPositiveNumber(config.taskTimeoutMs, `${path}.taskTimeoutMs`);
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.storage !== undefined) {
    validateStorageConfig(config.storage);
  }

  if (config.devices !== undefined) {
    validateDevicesConfig(config.devices);
  }

  if (config.scheduler !== undefined) {
    validateSchedulerConfig(config.scheduler);
  }
}

type PartialAppConfig = {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  storage?: Partial<StorageConfig>;
  devices?: Partial<DevicesConfig>;
  scheduler?: Partial<SchedulerConfig>;
};

function parseBooleanFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Apply environment overrides on top of a merged configuration.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result: AppConfig = {
    server: { ...config.server },
    storage: { ...config.storage },
    devices: { ...config.devices },
    scheduler: { ...config.scheduler },
  };

  const hardwareMock = env['HARDWARE_MOCK'];
  if (hardwareMock !== undefined) {
    const flag = parseBooleanFlag(hardwareMock);
    if (flag !== undefined) result.devices.hardwareMock = flag;
  }

  const dataDir = env['DATA_DIR'];
  if (dataDir) result.storage.dataDir = dataDir;

  const port = env['PORT'] ? Number.parseInt(env['PORT'], 10) : Number.NaN;
  if (Number.isFinite(port) && port > 0 && port <= 65535) result.server.port = port;

  const host = env['HOST'];
  if (host) result.server.host = host;

  const level = env['LOG_LEVEL'];
  if (isLogLevel(level)) result.server.logLevel = level;

  return result;
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env['CONFIG_PATH']
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    log.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyEnvOverrides(DEFAULT_CONFIG, env);
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content) ?? {};
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed, env);

  validateConfig(substituted);

  // Merge with defaults
  const config: AppConfig = {
    server: {
      ...DEFAULT_CONFIG.server,
      ...substituted.server,
      cors: { ...DEFAULT_CONFIG.server.cors, ...substituted.server?.cors },
    },
    storage: { ...DEFAULT_CONFIG.storage, ...substituted.storage },
    devices: { ...DEFAULT_CONFIG.devices, ...substituted.devices },
    scheduler: { ...DEFAULT_CONFIG.scheduler, ...substituted.scheduler },
  };

  return applyEnvOverrides(config, env);
}
