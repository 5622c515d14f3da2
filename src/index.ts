/**
 * rowsmith - Main Entry Point
 *
 * Public surface of the engine:
 * - Schema metadata (defineModel, Schema) and the record capability
 * - Predicates and the Query builder
 * - Database, Store and ResultSet
 * - Adapters (PostgreSQL, in-process memory) and connection pooling
 * - Error types, logging and configuration
 */

// Schema metadata
export * from '@src/lib/schema/index.js';

// Records
export * from '@src/lib/model-record.js';
export type { HookName, HookResult, LifecycleHooks, WriteOperation } from '@src/lib/hooks.js';

// Predicates and queries
export * from '@src/lib/predicate.js';
export { FilterOp, type LogicalOp, type SortDirection, type ConditionNode, type LogicalNode, type OrderSpec, type Predicate } from '@src/lib/filter-types.js';
export { Query, type Inclusion, type QueryOptions } from '@src/lib/query.js';

// Engine
export { Database, type DatabaseOptions } from '@src/lib/database.js';
export { Store, type SaveResult } from '@src/lib/store.js';
export { ResultSet, type ResultSetOptions } from '@src/lib/result-set.js';
export { BatchingResultSet } from '@src/lib/relationship-loader.js';
export { runTransaction, TransactionJournal, type TransactionOptions } from '@src/lib/transaction.js';

// Backends
export * from '@src/lib/database/index.js';
export { FilterSqlGenerator, type SqlQuery } from '@src/lib/filter-sql-generator.js';
export { DatabaseConnection } from '@src/lib/database-connection.js';

// Ambient
export * from '@src/lib/errors/orm-error.js';
export { Logger, logger, type LogLevel, type LogMeta } from '@src/lib/logger.js';
export { RowsmithEnv, DEFAULT_BATCH_SIZE, DEFAULT_FETCH_SIZE, DEFAULT_POOL_MAX } from '@src/lib/config.js';
