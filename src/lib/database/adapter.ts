/**
 * Database Adapter Interface
 *
 * Abstraction over the execution backends (PostgreSQL, in-process memory).
 * Adapters take statement IR rather than SQL text, so each backend owns its
 * dialect.
 *
 * Design:
 * - Adapters are per-operation instances (or per-transaction, or per result set)
 * - Connection lifecycle managed by adapter
 * - Driver failures surface as ExecutionError
 */

import type { AdapterType } from '@src/lib/filter-types.js';
import type {
    CountStatement,
    QueryResult,
    RowCursor,
    SelectStatement,
    Statement,
    WriteStatement,
} from '@src/lib/database/statement.js';

export type DatabaseType = AdapterType;

export interface DatabaseAdapter {
    /**
     * Acquire the underlying connection
     */
    connect(): Promise<void>;

    /**
     * Release connection resources, rolling back anything left open
     */
    disconnect(): Promise<void>;

    isConnected(): boolean;

    /**
     * Run a write or count statement to completion
     */
    execute(statement: WriteStatement | CountStatement): Promise<QueryResult>;

    /**
     * Open a forward-only cursor over a SELECT
     *
     * Other statements may run on the same adapter while the cursor is open.
     */
    cursor(statement: SelectStatement): Promise<RowCursor>;

    beginTransaction(): Promise<void>;
    commit(): Promise<void>;
    /** No-op when no transaction is open */
    rollback(): Promise<void>;
    isInTransaction(): boolean;

    getType(): DatabaseType;

    /**
     * Human-readable form of a statement for logs (SQL text for PostgreSQL)
     */
    describe(statement: Statement): string;
}

/**
 * Builds a fresh, unconnected adapter
 */
export type AdapterFactory = () => DatabaseAdapter;
