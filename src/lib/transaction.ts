/**
 * Transaction Runner
 *
 * Core transaction lifecycle management for one adapter:
 * 1. Connects the adapter and begins a transaction
 * 2. Executes the handler
 * 3. Commits on success, rolls back on error
 * 4. Releases the connection
 *
 * Records the handler marks persisted (or deleted) are noted in a journal so
 * a rollback also restores their in-memory state. A joined scope that fails
 * marks the journal rollback-only: the transaction then rolls back even when
 * the handler caught that failure and resolved.
 */

import { describeCause, isOrmError, TransactionError } from '@src/lib/errors/orm-error.js';
import type { DatabaseAdapter } from '@src/lib/database/adapter.js';
import { logger as defaultLogger, type Logger, type LogMeta } from '@src/lib/logger.js';
import type { Persistable } from '@src/lib/model-record.js';
import type { ModelDescriptor } from '@src/lib/schema/types.js';

/**
 * Options for transaction execution
 */
export interface TransactionOptions {
    logger?: Logger;
    /** Custom logging context for debugging */
    logContext?: LogMeta;
}

/**
 * Undo log of record state changed inside a transaction
 */
export class TransactionJournal {
    private readonly entries: (() => void)[] = [];
    private failure: { cause: unknown } | null = null;

    /**
     * Note the record's persisted flag and primary key before the engine changes them
     */
    remember(record: Persistable, model: ModelDescriptor): void {
        const persisted = record.isPersisted();
        const column = model.primaryKey.column;
        const key = record.value(column);

        this.entries.push(() => {
            record.setPersisted(persisted);
            record.setValue(column, key);
        });
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Keep the first failure; the transaction can no longer commit
     */
    markRollbackOnly(cause: unknown): void {
        if (this.failure === null) {
            this.failure = { cause };
        }
    }

    isRollbackOnly(): boolean {
        return this.failure !== null;
    }

    get rollbackCause(): unknown {
        return this.failure?.cause;
    }

    /**
     * Restore noted state, newest first
     */
    undo(): void {
        for (const entry of this.entries.reverse()) {
            entry();
        }
        this.entries.length = 0;
    }
}

/**
 * Run `handler` inside a transaction on `adapter`
 *
 * @returns The result of the handler function
 * @throws The handler's error after rollback (with `rolledBack` set on engine errors),
 * a TransactionError (ROLLBACK_ONLY) when the handler resolved on a journal marked
 * rollback-only, or a TransactionError when the commit or the rollback fails
 *
 * @example
 * const count = await runTransaction(adapter, async journal => {
 *     await adapter.execute(insertStatement);
 *     return 1;
 * });
 */
export async function runTransaction<T>(
    adapter: DatabaseAdapter,
    handler: (journal: TransactionJournal) => Promise<T>,
    options: TransactionOptions = {}
): Promise<T> {
    const log = options.logger ?? defaultLogger;
    const logContext: LogMeta = {
        dbType: adapter.getType(),
        ...options.logContext,
    };
    const journal = new TransactionJournal();

    try {
        // Connect and begin transaction
        await adapter.connect();
        await adapter.beginTransaction();
        log.info('Transaction started', logContext);

        const result = await handler(journal);

        if (journal.isRollbackOnly()) {
            throw new TransactionError(
                `Transaction is rollback-only: ${describeCause(journal.rollbackCause)}`,
                journal.rollbackCause,
                undefined,
                'ROLLBACK_ONLY'
            );
        }

        await commit(adapter);
        log.info('Transaction committed', logContext);

        return result;

    } catch (error) {
        journal.undo();
        await rollback(adapter, error, log, logContext);

        // Re-throw original error for caller to handle
        throw error;

    } finally {
        // Always clean up
        await adapter.disconnect();
    }
}

async function commit(adapter: DatabaseAdapter): Promise<void> {
    try {
        await adapter.commit();
    } catch (error) {
        throw new TransactionError(`Commit failed: ${describeCause(error)}`, error, undefined, 'COMMIT_FAILED');
    }
}

async function rollback(adapter: DatabaseAdapter, error: unknown, log: Logger, logContext: LogMeta): Promise<void> {
    try {
        await adapter.rollback();
    } catch (rollbackError) {
        log.warn('Failed to rollback transaction', {
            ...logContext,
            error: describeCause(error),
            rollbackError: describeCause(rollbackError),
        });
        throw new TransactionError(
            `Rollback failed after: ${describeCause(error)}`,
            error,
            rollbackError,
            'ROLLBACK_FAILED'
        );
    }

    if (isOrmError(error)) {
        error.rolledBack = true;
    }

    log.info('Transaction rolled back', {
        ...logContext,
        error: describeCause(error),
    });
}
