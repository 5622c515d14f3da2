/**
 * Database Module
 *
 * Exports:
 * - Database adapter factory for low-level connections
 * - Statement IR and backend implementations
 */

export type { DatabaseAdapter, DatabaseType, AdapterFactory } from '@src/lib/database/adapter.js';
export type * from '@src/lib/database/statement.js';
export { PostgresAdapter, wrapPool, type PgClient, type PgPool } from '@src/lib/database/postgres-adapter.js';
export { MemoryAdapter } from '@src/lib/database/memory-adapter.js';
export {
    MemoryDatabase,
    type MemoryTableDefinition,
    type MemoryColumnDefinition,
    type StatementKind,
    type StatementLogEntry,
} from '@src/lib/database/memory-database.js';

import type { AdapterFactory, DatabaseAdapter, DatabaseType } from '@src/lib/database/adapter.js';
import { MemoryAdapter } from '@src/lib/database/memory-adapter.js';
import type { MemoryDatabase } from '@src/lib/database/memory-database.js';
import { PostgresAdapter, wrapPool } from '@src/lib/database/postgres-adapter.js';
import { DatabaseConnection } from '@src/lib/database-connection.js';

/**
 * Configuration for creating a database adapter
 */
export type AdapterConfig =
    | {
        dbType: 'postgresql';
        /** Defaults to DATABASE_URL */
        connectionString?: string;
        /** Defaults to ROWSMITH_POOL_MAX */
        maxConnections?: number;
    }
    | {
        dbType: 'memory';
        database: MemoryDatabase;
    };

/**
 * Create a database adapter based on configuration
 *
 * @returns Database adapter instance (not yet connected)
 *
 * @example
 * const adapter = createAdapter({ dbType: 'postgresql' });
 * await adapter.connect();
 */
export function createAdapter(config: AdapterConfig): DatabaseAdapter {
    switch (config.dbType) {
        case 'memory':
            return new MemoryAdapter(config.database);

        case 'postgresql':
            return new PostgresAdapter(
                wrapPool(DatabaseConnection.getPool(config.connectionString, config.maxConnections))
            );
    }
}

/**
 * Bind a configuration into a factory producing one adapter per call
 */
export function createAdapterFactory(config: AdapterConfig): AdapterFactory {
    return () => createAdapter(config);
}

/**
 * Check if a database type is supported
 */
export function isSupportedDatabaseType(dbType: string): dbType is DatabaseType {
    return dbType === 'postgresql' || dbType === 'memory';
}
