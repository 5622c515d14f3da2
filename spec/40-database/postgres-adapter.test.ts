/**
 * PostgresAdapter Tests
 *
 * Runs against an in-process fake pool that records every SQL string, so
 * the statement sequence (BEGIN / DECLARE / FETCH / CLOSE / COMMIT) can be asserted.
 */

import { describe, test, expect } from 'vitest';
import { ExecutionError } from '@src/lib/errors/orm-error.js';
import { PostgresAdapter, type PgClient, type PgPool } from '@src/lib/database/postgres-adapter.js';
import type { Row } from '@src/lib/database/statement.js';
import { eq } from '@src/lib/predicate.js';
import { Query } from '@src/lib/query.js';
import { FieldKind } from '@src/lib/schema/types.js';
import { Category, schema } from '@spec/helpers/fixtures.js';

type Responder = (text: string) => { rows: Row[]; rowCount: number | null };

class FakeClient implements PgClient {
    readonly queries: string[] = [];
    readonly values: unknown[][] = [];
    readonly released: (Error | boolean | undefined)[] = [];
    failOn: string | null = null;

    constructor(private readonly respond: Responder = () => ({ rows: [], rowCount: 0 })) {}

    async query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }> {
        this.queries.push(text);
        this.values.push(values ?? []);
        if (this.failOn !== null && text.startsWith(this.failOn)) {
            throw new Error(`${this.failOn} refused`);
        }
        return this.respond(text);
    }

    release(err?: Error | boolean): void {
        this.released.push(err);
    }
}

function fakePool(client: FakeClient): PgPool {
    return { connect: async () => client };
}

const selectCategories = new Query(Category, { schema, batchSize: 50 }).where(eq('label', 'News')).compile();

describe('PostgresAdapter', () => {
  describe('Connection lifecycle', () => {
    test('should wrap pool failures in ExecutionError', async () => {
      const adapter = new PostgresAdapter({
        connect: async () => {
          throw new Error('connection refused');
        },
      });

      await expect(adapter.connect()).rejects.toThrow('Failed to acquire database connection: connection refused');
      expect(adapter.isConnected()).toBe(false);
    });

    test('should release the client on disconnect', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      await adapter.disconnect();

      expect(client.queries).toEqual([]);
      expect(client.released).toEqual([undefined]);
      expect(adapter.isConnected()).toBe(false);
    });

    test('should refuse statements before connect()', async () => {
      const adapter = new PostgresAdapter(fakePool(new FakeClient()));

      await expect(adapter.beginTransaction()).rejects.toThrow('PostgresAdapter: Not connected. Call connect() first.');
    });
  });

  describe('execute()', () => {
    test('should send rendered SQL with parameters', async () => {
      const client = new FakeClient(() => ({ rows: [{ code: 'news' }], rowCount: 1 }));
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      const result = await adapter.execute({
        type: 'insert',
        table: 'categories',
        values: [
          { column: 'code', kind: FieldKind.Scalar, value: 'news' },
          { column: 'label', kind: FieldKind.Scalar, value: 'News' },
        ],
        returning: ['code'],
      });

      expect(client.queries).toEqual(['INSERT INTO "categories" ("code", "label") VALUES ($1, $2) RETURNING "code"']);
      expect(client.values).toEqual([['news', 'News']]);
      expect(result).toEqual({ rowCount: 1, rows: [{ code: 'news' }] });
    });

    test('should read the count column of a count statement', async () => {
      const client = new FakeClient(() => ({ rows: [{ count: '42' }], rowCount: 1 }));
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      const result = await adapter.execute(new Query(Category, { schema, batchSize: 50 }).compileCount());

      expect(result.rowCount).toBe(42);
      expect(client.queries).toEqual(['SELECT COUNT(*) AS "count" FROM "categories" AS "categories"']);
    });

    test('should wrap driver errors', async () => {
      const client = new FakeClient();
      client.failOn = 'DELETE';
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      const error = await adapter.execute({ type: 'delete', table: 'categories', where: eq('code', 'x') }).catch(
        (caught: unknown) => caught
      );

      expect(error).toBeInstanceOf(ExecutionError);
      expect(error).toHaveProperty('message', 'Statement failed: DELETE refused');
    });
  });

  describe('cursor()', () => {
    test('should open a read scope outside a transaction and commit it on close', async () => {
      const client = new FakeClient(text => (
        text.startsWith('FETCH') ? { rows: [{ code: 'news', label: 'News' }], rowCount: 1 } : { rows: [], rowCount: null }
      ));
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      const cursor = await adapter.cursor(selectCategories);
      const rows = await cursor.read(25);
      await cursor.close();

      const declare = client.queries[1];
      const name = /^DECLARE "(rowsmith_cursor_\d+)"/.exec(declare)?.[1];
      expect(name).toBeDefined();
      expect(client.queries).toEqual([
        'BEGIN',
        `DECLARE "${name}" NO SCROLL CURSOR FOR SELECT "categories"."code" AS "code", "categories"."label" AS "label" ` +
        'FROM "categories" AS "categories" WHERE "categories"."label" = $1',
        `FETCH FORWARD 25 FROM "${name}"`,
        `CLOSE "${name}"`,
        'COMMIT',
      ]);
      expect(client.values[1]).toEqual(['News']);
      expect(rows).toEqual([{ code: 'news', label: 'News' }]);
    });

    test('should keep the read scope open until the last cursor closes', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      const first = await adapter.cursor(selectCategories);
      const second = await adapter.cursor(selectCategories);
      await first.close();
      await second.close();

      expect(client.queries.filter(query => query === 'BEGIN')).toHaveLength(1);
      expect(client.queries[client.queries.length - 1]).toBe('COMMIT');
      expect(client.queries.filter(query => query === 'COMMIT')).toHaveLength(1);
    });

    test('should not begin or commit around cursors inside a transaction', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();
      await adapter.beginTransaction();

      const cursor = await adapter.cursor(selectCategories);
      await cursor.close();
      await adapter.commit();

      expect(client.queries.filter(query => query === 'BEGIN')).toHaveLength(1);
      expect(client.queries.filter(query => query === 'COMMIT')).toHaveLength(1);
      expect(client.queries[client.queries.length - 1]).toBe('COMMIT');
    });

    test('should skip CLOSE for a cursor whose transaction already ended', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();
      await adapter.beginTransaction();
      const cursor = await adapter.cursor(selectCategories);
      await adapter.commit();

      await cursor.close();

      expect(client.queries.some(query => query.startsWith('CLOSE'))).toBe(false);
    });

    test('should refuse a transaction while a read scope is open', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();
      await adapter.cursor(selectCategories);

      await expect(adapter.beginTransaction()).rejects.toThrow(
        'PostgresAdapter: Cannot begin a transaction while a cursor is open outside one'
      );
    });
  });

  describe('Transactions', () => {
    test('should issue BEGIN and COMMIT', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      await adapter.beginTransaction();
      expect(adapter.isInTransaction()).toBe(true);
      await adapter.commit();

      expect(client.queries).toEqual(['BEGIN', 'COMMIT']);
      expect(adapter.isInTransaction()).toBe(false);
    });

    test('should roll back an open transaction on disconnect', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();
      await adapter.beginTransaction();

      await adapter.disconnect();

      expect(client.queries).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.released).toEqual([undefined]);
    });

    test('should discard the client when rollback fails', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();
      await adapter.beginTransaction();
      client.failOn = 'ROLLBACK';

      await expect(adapter.rollback()).rejects.toThrow('Statement failed: ROLLBACK refused');
      expect(adapter.isInTransaction()).toBe(true);

      await adapter.disconnect();

      expect(client.queries).toEqual(['BEGIN', 'ROLLBACK', 'ROLLBACK']);
      expect(client.released).toHaveLength(1);
      expect(client.released[0]).toBeInstanceOf(Error);
    });

    test('should ignore rollback without a transaction', async () => {
      const client = new FakeClient();
      const adapter = new PostgresAdapter(fakePool(client));
      await adapter.connect();

      await adapter.rollback();

      expect(client.queries).toEqual([]);
    });

    test('should describe statements as SQL', () => {
      const adapter = new PostgresAdapter(fakePool(new FakeClient()));

      expect(adapter.describe({ type: 'delete', table: 'categories', where: eq('code', 'x') })).toBe(
        'DELETE FROM "categories" WHERE "code" = $1'
      );
    });
  });
});
