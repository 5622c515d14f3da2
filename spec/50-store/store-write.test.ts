/**
 * Store Write Tests
 *
 * insert / update / save / delete against the in-process database
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
    NotPersistedError,
    NotWritableError,
    PreconditionError,
} from '@src/lib/errors/orm-error.js';
import { asc, eq } from '@src/lib/predicate.js';
import { CategoryRecord, makePost, makeUser } from '@spec/helpers/fixtures.js';
import { createTestDatabase, statementLog } from '@spec/helpers/test-database.js';

describe('Store writes', () => {
  let env: ReturnType<typeof createTestDatabase>;

  beforeEach(() => {
    env = createTestDatabase();
  });

  describe('insert()', () => {
    test('should insert and assign the generated key', async () => {
      const user = makeUser('ada@example.com', 'Ada');

      await env.users.insert(user);

      expect(user.id).toBe(1);
      expect(user.isPersisted()).toBe(true);
      expect(env.memory.rows('users')).toEqual([
        { id: 1, email: 'ada@example.com', name: 'Ada', settings: null, tags: [] },
      ]);
    });

    test('should run a plain insert without a transaction', async () => {
      await env.users.insert(makeUser('ada@example.com'));

      expect(statementLog(env.memory)).toEqual(['insert users']);
    });

    test('should round-trip JSON and array columns', async () => {
      const user = makeUser('ada@example.com');
      user.settings = { theme: 'dark', panels: [1, { pinned: true }] };
      user.tags = ['admin', 'ops'];
      await env.users.insert(user);

      const loaded = await env.users.findOne(env.users.query().where(eq('id', user.id)));

      expect(loaded.settings).toEqual({ theme: 'dark', panels: [1, { pinned: true }] });
      expect(loaded.tags).toEqual(['admin', 'ops']);
      expect(loaded.settings).not.toBe(user.settings);
    });

    test('should round-trip JSON documents that are plain strings', async () => {
      const word = makeUser('ada@example.com');
      word.settings = 'dark';
      const digits = makeUser('bob@example.com');
      digits.settings = '42';
      await env.users.insert(word);
      await env.users.insert(digits);

      const loaded = await env.users.findAll(env.users.query().order(asc('id')));

      expect(loaded.map(user => user.settings)).toEqual(['dark', '42']);
    });

    test('should round-trip scalar JSON documents', async () => {
      const user = makeUser('ada@example.com');
      user.settings = 42;
      await env.users.insert(user);

      const loaded = await env.users.findOne(env.users.query().where(eq('id', user.id)));

      expect(loaded.settings).toBe(42);
    });

    test('should write caller-assigned keys', async () => {
      const category = new CategoryRecord();
      category.code = 'news';
      category.label = 'News';

      await env.categories.insert(category);

      expect(env.memory.rows('categories')).toEqual([{ code: 'news', label: 'News' }]);
    });

    test('should reject an empty caller-assigned key', async () => {
      const category = new CategoryRecord();
      category.label = 'Nameless';

      await expect(env.categories.insert(category)).rejects.toThrow('Category: primary key is not set');
      expect(statementLog(env.memory)).toEqual([]);
    });

    test('should reject a record that is already persisted', async () => {
      const user = makeUser('ada@example.com');
      await env.users.insert(user);

      await expect(env.users.insert(user)).rejects.toThrow(PreconditionError);
    });

    test('should surface constraint violations as execution errors', async () => {
      const user = makeUser('ada@example.com');
      await env.users.insert(user);

      const clash = makeUser('other@example.com');
      clash.id = 1;

      await expect(env.users.insert(clash)).rejects.toThrow(
        'duplicate key value violates unique constraint "users_pkey"'
      );
      expect(clash.isPersisted()).toBe(false);
    });
  });

  describe('update()', () => {
    test('should write every column and report one modified row', async () => {
      const user = makeUser('ada@example.com', 'Ada');
      await env.users.insert(user);
      user.name = 'Ada L.';

      expect(await env.users.update(user)).toBe(1);
      expect(env.memory.rows('users')[0].name).toBe('Ada L.');
    });

    test('should write only the named columns', async () => {
      const user = makeUser('ada@example.com', 'Ada');
      await env.users.insert(user);
      user.name = 'Changed';
      user.email = 'changed@example.com';

      await env.users.update(user, 'name');

      expect(env.memory.rows('users')[0]).toMatchObject({ email: 'ada@example.com', name: 'Changed' });
    });

    test('should reject unknown column names', async () => {
      const user = makeUser('ada@example.com');
      await env.users.insert(user);

      await expect(env.users.update(user, 'nickname')).rejects.toThrow("User: unknown column 'nickname'");
    });

    test('should report zero when the row no longer exists', async () => {
      const user = makeUser('ghost@example.com');
      user.id = 99;
      user.setPersisted(true);

      expect(await env.users.update(user)).toBe(0);
    });

    test('should reject records that were never persisted', async () => {
      await expect(env.users.update(makeUser('ada@example.com'))).rejects.toThrow(NotPersistedError);
    });

    test('should reject records read through a partial projection', async () => {
      await env.users.insert(makeUser('ada@example.com', 'Ada'));
      const [partial] = await env.users.findAll(env.users.query().select('email'));

      await expect(env.users.update(partial)).rejects.toThrow(
        'User: record was loaded partially and cannot be written'
      );
      await expect(env.users.update(partial)).rejects.toBeInstanceOf(NotWritableError);
    });

    test('should make a partial record writable again after reload()', async () => {
      await env.users.insert(makeUser('ada@example.com', 'Ada'));
      const [partial] = await env.users.findAll(env.users.query().select('email'));
      expect(partial.name).toBeNull();

      await env.users.reload(partial);
      partial.name = 'Reloaded';

      expect(partial.isWritable()).toBe(true);
      expect(await env.users.update(partial)).toBe(1);
      expect(env.memory.rows('users')[0].name).toBe('Reloaded');
    });
  });

  describe('save()', () => {
    test('should insert first and update afterwards', async () => {
      const user = makeUser('ada@example.com');

      expect(await env.users.save(user)).toBe('inserted');
      user.name = 'Ada';
      expect(await env.users.save(user)).toBe('updated');

      expect(env.memory.rows('users')).toHaveLength(1);
      expect(env.memory.rows('users')[0].name).toBe('Ada');
    });

    test('should update a persisted unmodified record on every call', async () => {
      const user = makeUser('ada@example.com', 'Ada');
      await env.users.insert(user);

      expect(await env.users.save(user)).toBe('updated');
      expect(await env.users.save(user)).toBe('updated');

      expect(statementLog(env.memory)).toEqual(['insert users', 'update users', 'update users']);
      expect(env.memory.rows('users')).toHaveLength(1);
    });
  });

  describe('delete()', () => {
    test('should delete the row and clear the persisted flag', async () => {
      const user = makeUser('ada@example.com');
      await env.users.insert(user);

      expect(await env.users.delete(user)).toBe(1);
      expect(user.isPersisted()).toBe(false);
      expect(env.memory.rows('users')).toEqual([]);
    });

    test('should delete records read through a partial projection', async () => {
      await env.users.insert(makeUser('ada@example.com'));
      const [partial] = await env.users.findAll(env.users.query().select('email'));

      expect(await env.users.delete(partial)).toBe(1);
    });

    test('should leave related rows in place', async () => {
      const user = makeUser('ada@example.com');
      user.posts = [makePost('kept')];
      await env.users.insert(user);

      await env.users.delete(user);

      expect(env.memory.rows('posts').map(row => row.title)).toEqual(['kept']);
    });

    test('should reject records that were never persisted', async () => {
      await expect(env.users.delete(makeUser('ada@example.com'))).rejects.toThrow(
        'User: record has not been persisted'
      );
    });
  });

  describe('reload()', () => {
    test('should discard local changes', async () => {
      const user = makeUser('ada@example.com', 'Ada');
      await env.users.insert(user);
      user.name = 'Unsaved';

      await env.users.reload(user);

      expect(user.name).toBe('Ada');
    });

    test('should fail when the row is gone', async () => {
      const user = makeUser('ada@example.com');
      await env.users.insert(user);
      env.memory.delete({ type: 'delete', table: 'users', where: eq('id', 1) });

      await expect(env.users.reload(user)).rejects.toThrow('User: no rows in result set');
    });
  });
});
