/**
 * Memory Database Adapter
 *
 * DatabaseAdapter over a shared MemoryDatabase. Transactions snapshot the
 * whole database on begin and restore it on rollback; concurrent writers on
 * other adapters are not isolated from each other.
 */

import { ExecutionError } from '@src/lib/errors/orm-error.js';
import type { DatabaseAdapter, DatabaseType } from '@src/lib/database/adapter.js';
import type { MemoryDatabase, MemorySnapshot } from '@src/lib/database/memory-database.js';
import type {
    CountStatement,
    QueryResult,
    Row,
    RowCursor,
    SelectStatement,
    Statement,
    WriteStatement,
} from '@src/lib/database/statement.js';

export class MemoryAdapter implements DatabaseAdapter {
    private connected = false;
    private snapshot: MemorySnapshot | null = null;

    constructor(private readonly database: MemoryDatabase) {}

    async connect(): Promise<void> {
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        if (!this.connected) {
            return;
        }

        // Rollback any uncommitted transaction
        if (this.snapshot) {
            this.database.restore(this.snapshot);
            this.snapshot = null;
        }
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    async execute(statement: WriteStatement | CountStatement): Promise<QueryResult> {
        this.requireConnection();

        switch (statement.type) {
            case 'count':
                return { rowCount: this.database.count(statement), rows: [] };
            case 'insert':
                return this.database.insert(statement);
            case 'update':
                return this.database.update(statement);
            case 'delete':
                return this.database.delete(statement);
        }
    }

    /**
     * Rows are materialized when the cursor opens, like a cursor reading a snapshot
     */
    async cursor(statement: SelectStatement): Promise<RowCursor> {
        this.requireConnection();

        let pending: Row[] | null = this.database.select(statement);

        return {
            read: async (count: number): Promise<Row[]> => {
                if (!pending) {
                    return [];
                }
                return pending.splice(0, Math.max(1, Math.floor(count)));
            },
            close: async (): Promise<void> => {
                pending = null;
            },
        };
    }

    async beginTransaction(): Promise<void> {
        this.requireConnection();
        if (this.snapshot) {
            throw new ExecutionError('MemoryAdapter: Transaction already in progress');
        }

        this.database.record('begin');
        this.snapshot = this.database.snapshot();
    }

    async commit(): Promise<void> {
        this.requireConnection();
        if (!this.snapshot) {
            throw new ExecutionError('MemoryAdapter: No transaction in progress');
        }

        this.database.record('commit');
        this.snapshot = null;
    }

    async rollback(): Promise<void> {
        const snapshot = this.snapshot;
        if (!snapshot) {
            // Silently ignore rollback when no transaction
            return;
        }

        this.snapshot = null;
        this.database.restore(snapshot);
        this.database.record('rollback');
    }

    isInTransaction(): boolean {
        return this.snapshot !== null;
    }

    getType(): DatabaseType {
        return 'memory';
    }

    describe(statement: Statement): string {
        return `${statement.type.toUpperCase()} ${statement.table}`;
    }

    private requireConnection(): void {
        if (!this.connected) {
            throw new ExecutionError('MemoryAdapter: Not connected. Call connect() first.');
        }
    }
}
