/**
 * UserToolDispatcher — maps a tool name to validate → store call → envelope.
 *
 * Transport-neutral: the MCP layer forwards raw arguments here and renders
 * the returned envelope. Every failure comes back as an error envelope.
 */

import { isUserStoreError } from '../store/errors.js';
import type { UserRecord, UserStore } from '../store/types.js';
import {
  errorEnvelope,
  pageEnvelope,
  successEnvelope,
  type ToolEnvelope,
} from '../types/ResponseEnvelope.js';
import {
  validateArgs,
  validateEmail,
  validateLimit,
  validateName,
  validateOffset,
  validateUpdateFields,
  validateUserId,
} from '../validation/userValidation.js';

export const USER_TOOL_NAMES = [
  'create_user',
  'read_user',
  'read_all_users',
  'update_user',
  'delete_user',
] as const;

export type UserToolName = (typeof USER_TOOL_NAMES)[number];

type ToolHandler = (args: Record<string, unknown>) => ToolEnvelope<UserRecord | UserRecord[]>;

export function isUserToolName(name: string): name is UserToolName {
  return USER_TOOL_NAMES.some((tool) => tool === name);
}

export class UserToolDispatcher {
  private readonly handlers: Record<UserToolName, ToolHandler>;

  constructor(private readonly store: UserStore) {
    this.handlers = {
      create_user: (args) => {
        const name = validateName(args['name']);
        const email = validateEmail(args['email']);
        return successEnvelope(this.store.create(name, email), 'User created successfully');
      },

      read_user: (args) => {
        const id = validateUserId(args['user_id']);
        return successEnvelope(this.store.getById(id));
      },

      read_all_users: (args) => {
        const limit = validateLimit(args['limit']);
        const offset = validateOffset(args['offset']);
        const { records, total } = this.store.listPage(limit, offset);
        return pageEnvelope(records, { total, limit, offset });
      },

      update_user: (args) => {
        const id = validateUserId(args['user_id']);
        const fields = validateUpdateFields(args['name'], args['email']);
        return successEnvelope(this.store.updatePartial(id, fields), 'User updated successfully');
      },

      delete_user: (args) => {
        const id = validateUserId(args['user_id']);
        return successEnvelope(this.store.delete(id), `User ${id} deleted successfully`);
      },
    };
  }

  /** Names of the tools this dispatcher serves. */
  toolNames(): readonly UserToolName[] {
    return USER_TOOL_NAMES;
  }

  /**
   * Run a tool. Never throws.
   */
  dispatch(toolName: string, rawArgs: unknown): ToolEnvelope<UserRecord | UserRecord[]> {
    if (!isUserToolName(toolName)) {
      return errorEnvelope(`Unknown tool: ${toolName}`);
    }

    try {
      return this.handlers[toolName](validateArgs(rawArgs));
    } catch (err) {
      if (isUserStoreError(err)) {
        if (err.code !== 'STORE_UNAVAILABLE') {
          console.warn(`${toolName} rejected (${err.code}): ${err.message}`);
        }
        return errorEnvelope(err.message);
      }
      const message = err instanceof Error ? err.message : String(err);
      console.error(`${toolName} failed: ${message}`);
      return errorEnvelope(`Unexpected error: ${message}`);
    }
  }
}

/**
 * Create a dispatcher bound to a user store.
 */
export function createUserToolDispatcher(store: UserStore): UserToolDispatcher {
  return new UserToolDispatcher(store);
}
