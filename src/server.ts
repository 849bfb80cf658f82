/**
 * Server entry point for the users MCP server.
 *
 * This module:
 * - Initializes all components (config, SQLite engine, user store, dispatcher)
 * - Creates a Fastify server exposing MCP over Streamable HTTP plus /health
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { isAbsolute, resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createSqliteEngine, MEMORY_PATH, type SqliteEngine } from './store/SqliteEngine.js';
import { createUserStore, USERS_SCHEMA, type SqliteUserStore } from './store/SqliteUserStore.js';
import { createUserToolDispatcher, type UserToolDispatcher } from './dispatch/UserToolDispatcher.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  engine: SqliteEngine;
  store: SqliteUserStore;
  dispatcher: UserToolDispatcher;
}

/**
 * Options for initializeApp.
 */
export interface InitializeOptions {
  /** Use this config instead of loading config.yaml */
  config?: AppConfig;
  /** Path to config.yaml (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
}

/**
 * Resolve the database path against the base path; ':memory:' passes through.
 */
export function resolveDatabasePath(basePath: string, dbPath: string): string {
  if (dbPath === MEMORY_PATH || isAbsolute(dbPath)) {
    return dbPath;
  }
  return resolve(basePath, dbPath);
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const config = options.config ?? await loadConfig({
    configPath: options.configPath ?? process.env['CONFIG_PATH'] ?? resolve(basePath, 'config.yaml'),
  });

  const engine = createSqliteEngine({
    path: resolveDatabasePath(basePath, config.database.path),
    schema: USERS_SCHEMA,
  });
  const store = createUserStore(engine);
  const dispatcher = createUserToolDispatcher(store);

  console.log(`App initialized (${store.count()} users, tools: ${dispatcher.toolNames().join(', ')})`);

  return { config, engine, store, dispatcher };
}

/**
 * Release resources held by the app context.
 */
export function closeApp(ctx: AppContext): void {
  ctx.engine.close();
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<ReturnType<typeof Fastify>> {
  const { server: serverConfig } = ctx.config;

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: serverConfig.logLevel,
    },
  });

  // Register CORS if enabled
  if (serverConfig.cors) {
    await fastify.register(cors, {
      origin: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Mcp-Protocol-Version'],
      exposedHeaders: ['Mcp-Session-Id'],
    });
  }

  // Register MCP server on /mcp
  await fastify.register(mcpPlugin, {
    prefix: '/mcp',
    createMcpServer: () => createMcpServer(ctx),
  });

  fastify.get('/health', async (_request, reply) => {
    const timestamp = new Date().toISOString();
    try {
      return {
        status: 'ok',
        timestamp,
        components: {
          database: { path: ctx.engine.path, users: ctx.store.count() },
        },
      };
    } catch (err) {
      reply.status(503);
      return {
        status: 'error',
        timestamp,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(basePath: string): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath);

    // Create server
    const fastify = await createServer(ctx);
    const { port, host } = ctx.config.server;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);
    console.log(`MCP endpoint: http://${host}:${port}/mcp`);

    // Handle shutdown
    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      closeApp(ctx);
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env['APP_BASE_PATH'] || process.cwd();
  await startServer(basePath);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
