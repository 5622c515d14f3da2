/**
 * PostgreSQL Database Adapter
 *
 * Renders statement IR with FilterSqlGenerator and runs it on one pooled
 * client. Result sets use SQL cursors (DECLARE / FETCH / CLOSE) on that same
 * client, so child queries can run while a parent cursor is still open.
 */

import type pg from 'pg';
import { ExecutionError, OrmErrors } from '@src/lib/errors/orm-error.js';
import { FilterSqlGenerator } from '@src/lib/filter-sql-generator.js';
import type { DatabaseAdapter, DatabaseType } from '@src/lib/database/adapter.js';
import type {
    CountStatement,
    QueryResult,
    Row,
    RowCursor,
    SelectStatement,
    Statement,
    WriteStatement,
} from '@src/lib/database/statement.js';
import { logger } from '@src/lib/logger.js';

/**
 * The slice of pg.PoolClient the adapter uses
 */
export interface PgClient {
    query(text: string, values?: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
    release(err?: Error | boolean): void;
}

export interface PgPool {
    connect(): Promise<PgClient>;
}

/**
 * Narrow a pg.Pool to the client surface the adapter needs
 */
export function wrapPool(pool: pg.Pool): PgPool {
    return {
        async connect(): Promise<PgClient> {
            const client = await pool.connect();
            return {
                async query(text: string, values?: unknown[]) {
                    const result = await client.query(text, values);
                    return { rows: result.rows, rowCount: result.rowCount };
                },
                release(err?: Error | boolean): void {
                    client.release(err);
                },
            };
        },
    };
}

let cursorSequence = 0;

/**
 * PostgreSQL implementation of DatabaseAdapter
 *
 * Lifecycle:
 * 1. connect() - Acquires client from pool
 * 2. execute()/cursor() - Runs statements through client
 * 3. beginTransaction/commit/rollback - Transaction control
 * 4. disconnect() - Releases client back to pool
 *
 * A cursor opened outside a transaction runs inside a read scope the adapter
 * begins itself and commits when its last cursor closes.
 */
export class PostgresAdapter implements DatabaseAdapter {
    private client: PgClient | null = null;
    private inTransaction = false;
    private readScope = false;
    private openCursors = 0;
    // Bumped whenever a transaction or read scope ends; cursors from an older scope are already gone
    private scopeGeneration = 0;

    constructor(private readonly pool: PgPool) {}

    /**
     * Acquire client from pool
     */
    async connect(): Promise<void> {
        if (this.client) {
            return; // Already connected
        }

        try {
            this.client = await this.pool.connect();
        } catch (error) {
            throw OrmErrors.execution('Failed to acquire database connection', error);
        }
    }

    /**
     * Release client back to pool
     */
    async disconnect(): Promise<void> {
        const client = this.client;
        if (!client) {
            return; // Not connected
        }

        // Rollback any uncommitted transaction or read scope
        let releaseError: Error | undefined;
        if (this.inTransaction || this.readScope) {
            try {
                await client.query('ROLLBACK');
            } catch (error) {
                releaseError = error instanceof Error ? error : new Error(String(error));
                logger.warn('Rollback during disconnect failed', { error: releaseError.message });
            }
            this.endScope();
        }

        // A client whose rollback failed is discarded rather than reused
        client.release(releaseError);
        this.client = null;
    }

    isConnected(): boolean {
        return this.client !== null;
    }

    async execute(statement: WriteStatement | CountStatement): Promise<QueryResult> {
        const { query, params } = FilterSqlGenerator.toSQL(statement);
        const result = await this.run(query, params);

        if (statement.type === 'count') {
            return { rowCount: Number(result.rows[0]?.count ?? 0), rows: [] };
        }

        return { rowCount: result.rowCount ?? 0, rows: result.rows };
    }

    async cursor(statement: SelectStatement): Promise<RowCursor> {
        const { query, params } = FilterSqlGenerator.toSelectSQL(statement);
        const name = `rowsmith_cursor_${++cursorSequence}`;

        if (!this.inTransaction && !this.readScope) {
            await this.run('BEGIN');
            this.readScope = true;
        }

        await this.run(`DECLARE "${name}" NO SCROLL CURSOR FOR ${query}`, params);
        this.openCursors++;

        const generation = this.scopeGeneration;
        let closed = false;

        return {
            read: async (count: number): Promise<Row[]> => {
                if (closed) {
                    return [];
                }
                const result = await this.run(`FETCH FORWARD ${Math.max(1, Math.floor(count))} FROM "${name}"`);
                return result.rows;
            },
            close: async (): Promise<void> => {
                if (closed) {
                    return;
                }
                closed = true;

                if (generation !== this.scopeGeneration || !this.client) {
                    return; // Scope already ended; PostgreSQL dropped the cursor
                }

                this.openCursors--;
                await this.run(`CLOSE "${name}"`);

                if (this.readScope && this.openCursors === 0) {
                    await this.run('COMMIT');
                    this.endScope();
                }
            },
        };
    }

    async beginTransaction(): Promise<void> {
        if (this.inTransaction) {
            throw new ExecutionError('PostgresAdapter: Transaction already in progress');
        }
        if (this.readScope) {
            throw new ExecutionError('PostgresAdapter: Cannot begin a transaction while a cursor is open outside one');
        }

        await this.run('BEGIN');
        this.inTransaction = true;
    }

    async commit(): Promise<void> {
        if (!this.inTransaction) {
            throw new ExecutionError('PostgresAdapter: No transaction in progress');
        }

        await this.run('COMMIT');
        this.endScope();
    }

    async rollback(): Promise<void> {
        if (!this.inTransaction) {
            // Silently ignore rollback when no transaction
            return;
        }

        // On failure the scope stays open so disconnect() retries and discards the client
        await this.run('ROLLBACK');
        this.endScope();
    }

    isInTransaction(): boolean {
        return this.inTransaction;
    }

    getType(): DatabaseType {
        return 'postgresql';
    }

    describe(statement: Statement): string {
        return FilterSqlGenerator.toSQL(statement).query;
    }

    private endScope(): void {
        this.inTransaction = false;
        this.readScope = false;
        this.openCursors = 0;
        this.scopeGeneration++;
    }

    private async run(query: string, params: unknown[] = []): Promise<{ rows: Row[]; rowCount: number | null }> {
        if (!this.client) {
            throw new ExecutionError('PostgresAdapter: Not connected. Call connect() first.');
        }

        try {
            return params.length > 0 ? await this.client.query(query, params) : await this.client.query(query);
        } catch (error) {
            throw OrmErrors.execution('Statement failed', error);
        }
    }
}
