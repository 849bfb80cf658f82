/**
 * Tests for the user tool dispatcher.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { createSqliteEngine, type SqliteEngine } from '../store/SqliteEngine.js';
import { createUserStore, USERS_SCHEMA } from '../store/SqliteUserStore.js';
import type { StorageEngine, UserRecord, UserStore } from '../store/types.js';
import type { ToolEnvelope } from '../types/ResponseEnvelope.js';
import { MESSAGES } from '../validation/userValidation.js';
import { createUserToolDispatcher, USER_TOOL_NAMES, type UserToolDispatcher } from './UserToolDispatcher.js';

function recordOf(envelope: ToolEnvelope<UserRecord | UserRecord[]>): UserRecord | undefined {
  return envelope.success && !Array.isArray(envelope.data) ? envelope.data : undefined;
}

function listOf(envelope: ToolEnvelope<UserRecord | UserRecord[]>): UserRecord[] {
  return envelope.success && Array.isArray(envelope.data) ? envelope.data : [];
}

describe('UserToolDispatcher', () => {
  let testDir: string;
  let engine: SqliteEngine;
  let dispatcher: UserToolDispatcher;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    testDir = join(tmpdir(), `users-dispatch-${randomUUID()}`);
    engine = createSqliteEngine({ path: join(testDir, 'users.db'), schema: USERS_SCHEMA });
    dispatcher = createUserToolDispatcher(createUserStore(engine));
  });

  afterEach(async () => {
    engine.close();
    await rm(testDir, { recursive: true, force: true });
  });

  function seed(count: number): void {
    for (let i = 1; i <= count; i++) {
      dispatcher.dispatch('create_user', { name: `User ${i}`, email: `user${i}@example.com` });
    }
  }

  it('serves the five user tools', () => {
    expect(dispatcher.toolNames()).toEqual([
      'create_user',
      'read_user',
      'read_all_users',
      'update_user',
      'delete_user',
    ]);
    expect(dispatcher.toolNames()).toBe(USER_TOOL_NAMES);
  });

  describe('create_user', () => {
    it('returns the created record with a confirmation message', () => {
      const envelope = dispatcher.dispatch('create_user', { name: ' Ada Lovelace ', email: ' ada@example.com ' });

      expect(envelope).toMatchObject({
        success: true,
        message: 'User created successfully',
        data: { id: 1, name: 'Ada Lovelace', email: 'ada@example.com' },
      });
    });

    it('reports a duplicate email', () => {
      seed(1);

      expect(dispatcher.dispatch('create_user', { name: 'Copy', email: 'user1@example.com' })).toEqual({
        success: false,
        error: 'Email already exists',
      });
    });

    it('stores SQL-looking text verbatim', () => {
      seed(2);
      const name = "Robert'); DROP TABLE users;--";

      const envelope = dispatcher.dispatch('create_user', { name, email: 'bobby@example.com' });

      expect(envelope).toMatchObject({ success: true, data: { id: 3, name } });
      expect(dispatcher.dispatch('read_all_users', {})).toMatchObject({ pagination: { total: 3 } });
    });
  });

  describe('read_user', () => {
    it('returns the matching record', () => {
      seed(2);

      expect(dispatcher.dispatch('read_user', { user_id: 2 })).toMatchObject({
        success: true,
        data: { id: 2, name: 'User 2', email: 'user2@example.com' },
      });
    });

    it('has no message on success', () => {
      seed(1);

      expect(dispatcher.dispatch('read_user', { user_id: 1 })).not.toHaveProperty('message');
    });

    it('reports a missing user', () => {
      expect(dispatcher.dispatch('read_user', { user_id: 99 })).toEqual({
        success: false,
        error: 'User with ID 99 not found',
      });
    });
  });

  describe('read_all_users', () => {
    it('applies default pagination', () => {
      seed(3);

      const envelope = dispatcher.dispatch('read_all_users', {});

      expect(envelope).toMatchObject({ success: true, pagination: { total: 3, limit: 100, offset: 0 } });
      expect(listOf(envelope).map((u) => u.id)).toEqual([1, 2, 3]);
    });

    it('returns the requested page of 15 users', () => {
      seed(15);

      const envelope = dispatcher.dispatch('read_all_users', { limit: 10, offset: 0 });

      expect(envelope).toMatchObject({ pagination: { total: 15, limit: 10, offset: 0 } });
      expect(listOf(envelope).map((u) => u.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it('reports the clamped limit', () => {
      seed(1);

      expect(dispatcher.dispatch('read_all_users', { limit: 5000 })).toMatchObject({
        pagination: { total: 1, limit: 1000, offset: 0 },
      });
    });

    it('clamps a limit beyond the safe integer range', () => {
      seed(2);

      const envelope = dispatcher.dispatch('read_all_users', { limit: 1e16 });

      expect(envelope).toMatchObject({ success: true, pagination: { total: 2, limit: 1000, offset: 0 } });
      expect(listOf(envelope).map((u) => u.id)).toEqual([1, 2]);
    });

    it('returns an empty page for a huge offset', () => {
      seed(2);

      expect(dispatcher.dispatch('read_all_users', { offset: 1e16 })).toEqual({
        success: true,
        data: [],
        pagination: { total: 2, limit: 100, offset: Number.MAX_SAFE_INTEGER },
      });
    });
  });

  describe('update_user', () => {
    it('updates only the supplied fields', () => {
      seed(1);
      const before = dispatcher.dispatch('read_user', { user_id: 1 });

      const after = dispatcher.dispatch('update_user', { user_id: 1, name: 'Renamed' });

      expect(after).toMatchObject({ success: true, message: 'User updated successfully' });
      expect(recordOf(before)).toBeDefined();
      expect(recordOf(after)).toEqual({ ...recordOf(before), name: 'Renamed' });
    });

    it('reports a missing user', () => {
      expect(dispatcher.dispatch('update_user', { user_id: 5, email: 'new@example.com' })).toEqual({
        success: false,
        error: 'User with ID 5 not found',
      });
    });

    it('reports an email collision', () => {
      seed(2);

      expect(dispatcher.dispatch('update_user', { user_id: 2, email: 'user1@example.com' })).toEqual({
        success: false,
        error: 'Email already exists',
      });
    });
  });

  describe('delete_user', () => {
    it('returns the deleted record and removes it', () => {
      seed(1);

      expect(dispatcher.dispatch('delete_user', { user_id: 1 })).toMatchObject({
        success: true,
        message: 'User 1 deleted successfully',
        data: { id: 1, email: 'user1@example.com' },
      });
      expect(dispatcher.dispatch('read_user', { user_id: 1 })).toEqual({
        success: false,
        error: 'User with ID 1 not found',
      });
    });
  });

  it('reports an unknown tool', () => {
    expect(dispatcher.dispatch('drop_users', {})).toEqual({ success: false, error: 'Unknown tool: drop_users' });
  });

  it('rejects injection attempts through user_id and keeps the table', () => {
    seed(3);

    for (const tool of ['read_user', 'update_user', 'delete_user']) {
      expect(dispatcher.dispatch(tool, { user_id: '1; DROP TABLE users', name: 'x' })).toEqual({
        success: false,
        error: MESSAGES.id,
      });
    }

    expect(dispatcher.dispatch('read_all_users', {})).toMatchObject({ success: true, pagination: { total: 3 } });
  });
});

describe('UserToolDispatcher validation', () => {
  const withConnection = vi.fn();
  const spyEngine: StorageEngine = { withConnection, close: vi.fn() };

  beforeEach(() => {
    withConnection.mockReset();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it.each([
    ['create_user', { name: '   ', email: 'ada@example.com' }, MESSAGES.name],
    ['create_user', { name: 'Ada', email: 'ada.example.com' }, MESSAGES.email],
    ['read_user', { user_id: 0 }, MESSAGES.id],
    ['read_user', { user_id: -4 }, MESSAGES.id],
    ['read_all_users', { limit: 0 }, MESSAGES.limit],
    ['read_all_users', { limit: -1 }, MESSAGES.limit],
    ['read_all_users', { offset: -1 }, MESSAGES.offset],
    ['update_user', { user_id: 1 }, MESSAGES.fields],
    ['update_user', { user_id: 1, name: '' }, MESSAGES.name],
    ['delete_user', { user_id: 1.5 }, MESSAGES.id],
    ['delete_user', 'user_id=1', MESSAGES.args],
  ])('%s %j fails with "%s" before touching storage', (tool, args, message) => {
    const dispatcher = createUserToolDispatcher(createUserStore(spyEngine));

    expect(dispatcher.dispatch(tool, args)).toEqual({ success: false, error: message });
    expect(withConnection).not.toHaveBeenCalled();
  });
});

describe('UserToolDispatcher unexpected errors', () => {
  it('converts non-store errors into an error envelope', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const store: UserStore = {
      create: vi.fn(() => {
        throw new TypeError('boom');
      }),
      getById: vi.fn(),
      listPage: vi.fn(),
      updatePartial: vi.fn(),
      delete: vi.fn(),
      count: vi.fn(),
    };

    expect(createUserToolDispatcher(store).dispatch('create_user', { name: 'Ada', email: 'ada@example.com' })).toEqual({
      success: false,
      error: 'Unexpected error: boom',
    });
  });
});
