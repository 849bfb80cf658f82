/**
 * users-mcp-server — CRUD tools for a SQLite users table over MCP.
 *
 * This is the main entry point for the library.
 */

// Response envelope
export * from './types/ResponseEnvelope.js';

// User store and storage engine
export * from './store/index.js';

// Argument validation
export * from './validation/index.js';

// Tool dispatch
export {
  UserToolDispatcher,
  createUserToolDispatcher,
  isUserToolName,
  USER_TOOL_NAMES,
} from './dispatch/UserToolDispatcher.js';
export type { UserToolName } from './dispatch/UserToolDispatcher.js';

// Configuration
export { loadConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { AppConfig, ServerConfig, DatabaseConfig, LogLevel } from './config/types.js';

// MCP layer
export * from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer, closeApp } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
