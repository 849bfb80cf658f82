/**
 * MCP tools for user CRUD operations.
 *
 * The input shapes declare argument types for clients; range and format
 * rules are enforced by the dispatcher so violations come back as error
 * envelopes.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { UserToolDispatcher } from '../../dispatch/UserToolDispatcher.js';
import { toolResult } from '../helpers.js';

export function registerUserTools(server: McpServer, dispatcher: UserToolDispatcher): void {
  // create_user — Insert a new user
  server.tool(
    'create_user',
    'Create a new user record with name and email. The email must be unique.',
    {
      name: z.string().describe("User's full name"),
      email: z.string().describe("User's email address"),
    },
    async (args) => toolResult(dispatcher.dispatch('create_user', args))
  );

  // read_user — Fetch one user
  server.tool(
    'read_user',
    'Read a specific user by ID.',
    { user_id: z.number().describe("The user's ID") },
    async (args) => toolResult(dispatcher.dispatch('read_user', args))
  );

  // read_all_users — Page through users in ID order
  server.tool(
    'read_all_users',
    'Read all users with pagination support, ordered by ID.',
    {
      limit: z.number().optional().describe('Number of records to return (default: 100, max: 1000)'),
      offset: z.number().optional().describe('Number of records to skip (default: 0)'),
    },
    async (args) => toolResult(dispatcher.dispatch('read_all_users', args))
  );

  // update_user — Change name and/or email
  server.tool(
    'update_user',
    "Update an existing user's name and/or email. At least one of the two is required.",
    {
      user_id: z.number().describe("The user's ID"),
      name: z.string().nullish().describe('New name (omit or null to keep)'),
      email: z.string().nullish().describe('New email (omit or null to keep)'),
    },
    async (args) => toolResult(dispatcher.dispatch('update_user', args))
  );

  // delete_user — Remove a user permanently
  server.tool(
    'delete_user',
    'Delete a user record by ID. Returns the deleted record.',
    { user_id: z.number().describe("The user's ID") },
    async (args) => toolResult(dispatcher.dispatch('delete_user', args))
  );
}
