/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer, SERVER_NAME, SERVER_VERSION } from './McpServerFactory.js';
export { mcpPlugin } from './fastifyPlugin.js';
export type { McpPluginOptions } from './fastifyPlugin.js';
export { jsonResult, toolResult } from './helpers.js';
