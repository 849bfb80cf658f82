#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Runs the users MCP server over stdio (no HTTP server needed).
 * Usage: npx tsx src/mcp-stdio.ts [basePath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { closeApp, initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const basePath = process.argv[2] || process.env['APP_BASE_PATH'] || process.cwd();

  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  const toStderr = (...args: unknown[]) => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  console.log = toStderr;
  console.warn = toStderr;
  console.error = toStderr;

  console.log(`Starting users MCP server (base: ${basePath})`);

  const ctx = await initializeApp(basePath);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  transport.onclose = () => closeApp(ctx);
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
