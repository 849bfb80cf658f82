/**
 * Configuration loader for the users MCP server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - DATABASE_PATH / PORT / HOST overrides
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, DatabaseConfig, LogLevel, ServerConfig } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS } from './types.js';

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
 * Shape of a config file after validation: every section and key optional.
 */
export interface PartialAppConfig {
  server?: Partial<ServerConfig>;
  database?: Partial<DatabaseConfig>;
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
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    // Return empty string if no value and no default
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
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
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, env);
    }
    return result;
  }
  return obj;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Numbers in YAML may arrive as strings after ${VAR} substitution.
 */
function coercePort(value: unknown): unknown {
  return typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): Partial<ServerConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const result: Partial<ServerConfig> = {};
  const port = coercePort(config['port']);

  if (port !== undefined) {
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, port);
    }
    result.port = port;
  }

  const host = config['host'];
  if (host !== undefined) {
    if (typeof host !== 'string') {
      throw new ConfigValidationError('host must be a string', `${path}.host`, host);
    }
    result.host = host;
  }

  const logLevel = config['logLevel'];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.logLevel`, logLevel);
    }
    result.logLevel = logLevel;
  }

  const cors = config['cors'];
  if (cors !== undefined) {
    if (typeof cors !== 'boolean') {
      throw new ConfigValidationError('cors must be a boolean', `${path}.cors`, cors);
    }
    result.cors = cors;
  }

  return result;
}

/**
 * Validate database configuration.
 */
function validateDatabaseConfig(config: unknown, path = 'database'): Partial<DatabaseConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const dbPath = config['path'];
  if (dbPath === undefined) {
    return {};
  }
  if (typeof dbPath !== 'string' || dbPath.trim().length === 0) {
    throw new ConfigValidationError('path must be a non-empty string', `${path}.path`, dbPath);
  }
  return { path: dbPath };
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): PartialAppConfig {
  if (config === null || config === undefined) {
    return {};
  }
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const result: PartialAppConfig = {};
  if (config['server'] !== undefined) {
    result.server = validateServerConfig(config['server']);
  }
  if (config['database'] !== undefined) {
    result.database = validateDatabaseConfig(config['database']);
  }
  return result;
}

/**
 * Merge a validated partial config over the defaults.
 */
export function mergeConfig(partial: PartialAppConfig): AppConfig {
  return {
    server: { ...DEFAULT_CONFIG.server, ...partial.server },
    database: { ...DEFAULT_CONFIG.database, ...partial.database },
  };
}

/**
 * Apply DATABASE_PATH, PORT and HOST from the environment.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const overrides: PartialAppConfig = {};

  if (env['PORT'] !== undefined || env['HOST'] !== undefined) {
    overrides.server = validateServerConfig({
      ...(env['PORT'] !== undefined ? { port: env['PORT'] } : {}),
      ...(env['HOST'] !== undefined ? { host: env['HOST'] } : {}),
    }, 'env');
  }
  if (env['DATABASE_PATH'] !== undefined) {
    overrides.database = validateDatabaseConfig({ path: env['DATABASE_PATH'] }, 'env');
  }

  return {
    server: { ...config.server, ...overrides.server },
    database: { ...config.database, ...overrides.database },
  };
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
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyEnvOverrides(mergeConfig({}), env);
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Substitute environment variables
  const substituted = substituteEnvVarsRecursive(parsed, env);

  const partialConfig = validateConfig(substituted);

  return applyEnvOverrides(mergeConfig(partialConfig), env);
}
