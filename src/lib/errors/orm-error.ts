/**
 * ORM Error Types
 *
 * Categorized error kinds for the persistence engine. Every error raised by a
 * store operation is one of these; none are retried internally.
 */

import type { HookName } from '@src/lib/hooks.js';

/**
 * Base class for all engine errors
 */
export abstract class OrmError extends Error {
    public readonly code: string;

    /**
     * Set when the error aborted a transaction and the rollback succeeded
     */
    public rolledBack = false;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * PreconditionError - missing/invalid primary key or record state before a write
 */
export class PreconditionError extends OrmError {
    constructor(message: string, code = 'PRECONDITION_FAILED') {
        super(message, code);
    }
}

/**
 * NotPersistedError - update/delete/reload on a record that was never saved
 */
export class NotPersistedError extends OrmError {
    constructor(message: string, code = 'RECORD_NOT_PERSISTED') {
        super(message, code);
    }
}

/**
 * NotWritableError - write attempted on a record obtained from a partial projection
 * or from a filtered relationship load
 */
export class NotWritableError extends OrmError {
    constructor(message: string, code = 'RECORD_NOT_WRITABLE') {
        super(message, code);
    }
}

/**
 * NoRowsError - a single-row read matched nothing
 */
export class NoRowsError extends OrmError {
    constructor(message: string, code = 'NO_ROWS') {
        super(message, code);
    }
}

/**
 * ExecutionError - the execution capability reported a failure
 * (connectivity, constraint violation, syntax)
 */
export class ExecutionError extends OrmError {
    constructor(message: string, cause?: unknown, code = 'EXECUTION_FAILED') {
        super(message, code, { cause });
    }
}

/**
 * HookError - a lifecycle hook reported a failure
 */
export class HookError extends OrmError {
    public readonly hook: HookName;
    public readonly model: string;

    constructor(hook: HookName, model: string, cause: unknown) {
        super(`${model}.${hook} failed: ${describeCause(cause)}`, 'HOOK_FAILED', { cause });
        this.hook = hook;
        this.model = model;
    }
}

/**
 * TransactionError - commit or rollback failure, wrapping the error that
 * caused the transaction to end
 */
export class TransactionError extends OrmError {
    public readonly rollbackError?: unknown;

    constructor(message: string, cause: unknown, rollbackError?: unknown, code = 'TRANSACTION_FAILED') {
        super(message, code, { cause });
        this.rollbackError = rollbackError;
    }
}

/**
 * QueryError - a query was built with unknown columns, relationships or bad bounds
 */
export class QueryError extends OrmError {
    constructor(message: string, code = 'INVALID_QUERY') {
        super(message, code);
    }
}

/**
 * SchemaError - model metadata is internally inconsistent
 */
export class SchemaError extends OrmError {
    constructor(message: string, code = 'INVALID_SCHEMA') {
        super(message, code);
    }
}

/**
 * ResultSetClosedError - read from a result set that was exhausted or closed
 */
export class ResultSetClosedError extends OrmError {
    constructor(message = 'Result set is closed', code = 'RESULT_SET_CLOSED') {
        super(message, code);
    }
}

/**
 * Factory methods for common error scenarios
 */
export class OrmErrors {
    static emptyPrimaryKey(model: string) {
        return new PreconditionError(`${model}: primary key is not set`, 'EMPTY_PRIMARY_KEY');
    }

    static alreadyPersisted(model: string) {
        return new PreconditionError(`${model}: record is already persisted`, 'RECORD_ALREADY_PERSISTED');
    }

    static notPersisted(model: string) {
        return new NotPersistedError(`${model}: record has not been persisted`);
    }

    static notWritable(model: string) {
        return new NotWritableError(`${model}: record was loaded partially and cannot be written`);
    }

    static noRows(model: string) {
        return new NoRowsError(`${model}: no rows in result set`);
    }

    static invalidValue(column: string, expected: string, value: unknown) {
        const actual = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
        return new PreconditionError(`Column '${column}': expected ${expected}, got ${actual}`, 'INVALID_VALUE');
    }

    static unknownColumn(model: string, column: string) {
        return new QueryError(`${model}: unknown column '${column}'`, 'UNKNOWN_COLUMN');
    }

    static unknownRelationship(model: string, relationship: string) {
        return new QueryError(`${model}: unknown relationship '${relationship}'`, 'UNKNOWN_RELATIONSHIP');
    }

    static execution(message: string, cause: unknown) {
        return new ExecutionError(`${message}: ${describeCause(cause)}`, cause);
    }

    /**
     * Wrap anything thrown by a driver into an ExecutionError, leaving engine errors untouched
     */
    static wrapExecution(message: string, error: unknown): OrmError {
        return error instanceof OrmError ? error : OrmErrors.execution(message, error);
    }
}

/**
 * Type guard for engine errors
 */
export function isOrmError(error: unknown): error is OrmError {
    return error instanceof OrmError;
}

export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
