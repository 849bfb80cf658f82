/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isErrorEnvelope, type ToolEnvelope } from '../types/ResponseEnvelope.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Render a tool envelope. Error envelopes are flagged with `isError`.
 */
export function toolResult(envelope: ToolEnvelope): CallToolResult {
  const result = jsonResult(envelope);
  return isErrorEnvelope(envelope) ? { ...result, isError: true } : result;
}
