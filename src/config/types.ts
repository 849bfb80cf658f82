/**
 * Configuration types for the users MCP server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Top-level server configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
}

/**
 * HTTP server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Whether CORS is enabled (default: true) */
  cors: boolean;
}

/**
 * SQLite settings.
 */
export interface DatabaseConfig {
  /** Database file, relative to the base path, or ':memory:' (default: 'users.db') */
  path: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: true,
  },
  database: {
    path: 'users.db',
  },
};
