/**
 * Database - entry point of the engine
 *
 * Binds a validated Schema to an adapter source. Outside a transaction every
 * operation borrows its own adapter and releases it when done (result sets
 * hold theirs until closed). Inside `transaction()` every operation runs on
 * the transaction's adapter, and nested calls join the open transaction.
 *
 * @example
 * const db = new Database({
 *     schema: new Schema([User, Post]),
 *     adapter: { dbType: 'postgresql' },
 * });
 * const users = db.store(User);
 * await users.insert(user);
 */

import { RowsmithEnv } from '@src/lib/config.js';
import { QueryError, SchemaError } from '@src/lib/errors/orm-error.js';
import type { AdapterFactory, DatabaseAdapter } from '@src/lib/database/adapter.js';
import { createAdapterFactory, type AdapterConfig } from '@src/lib/database/index.js';
import type { CountStatement, QueryResult, WriteStatement } from '@src/lib/database/statement.js';
import { logger as defaultLogger, type Logger } from '@src/lib/logger.js';
import type { Persistable } from '@src/lib/model-record.js';
import { Query } from '@src/lib/query.js';
import type { Schema } from '@src/lib/schema/schema.js';
import type { ModelDescriptor } from '@src/lib/schema/types.js';
import { Session, type SessionLease, type StatementLogLevel } from '@src/lib/session.js';
import { Store } from '@src/lib/store.js';
import { runTransaction, type TransactionJournal } from '@src/lib/transaction.js';

export interface DatabaseOptions {
    schema: Schema;
    /** Adapter configuration, or a factory returning a fresh unconnected adapter per call */
    adapter: AdapterConfig | AdapterFactory;
    /** Defaults to the global logger */
    logger?: Logger;
    /** Log statements at info instead of debug; defaults to ROWSMITH_DEBUG */
    debug?: boolean;
    /** Rows pulled per cursor read; defaults to ROWSMITH_FETCH_SIZE */
    fetchSize?: number;
}

interface TransactionScope {
    readonly adapter: DatabaseAdapter;
    readonly journal: TransactionJournal;
}

interface DatabaseState {
    readonly factory: AdapterFactory;
    readonly logger: Logger;
    readonly debug: boolean;
    readonly fetchSize: number;
    readonly scope: TransactionScope | null;
}

export class Database {
    readonly schema: Schema;
    private state: DatabaseState;

    constructor(options: DatabaseOptions) {
        const fetchSize = options.fetchSize ?? RowsmithEnv.fetchSize();
        if (!Number.isInteger(fetchSize) || fetchSize <= 0) {
            throw new QueryError(`fetchSize must be a positive integer, got ${fetchSize}`, 'INVALID_BOUND');
        }

        this.schema = options.schema;
        this.state = {
            factory: typeof options.adapter === 'function' ? options.adapter : createAdapterFactory(options.adapter),
            logger: options.logger ?? defaultLogger,
            debug: options.debug ?? RowsmithEnv.debug(),
            fetchSize,
            scope: null,
        };
    }

    get logger(): Logger {
        return this.state.logger;
    }

    get fetchSize(): number {
        return this.state.fetchSize;
    }

    isDebug(): boolean {
        return this.state.debug;
    }

    isInTransaction(): boolean {
        return this.state.scope !== null;
    }

    /**
     * Undo log of the open transaction, null outside one
     */
    get journal(): TransactionJournal | null {
        return this.state.scope?.journal ?? null;
    }

    /**
     * Store for a registered model
     */
    store<T extends Persistable>(model: ModelDescriptor<T>): Store<T> {
        if (!this.schema.has(model)) {
            throw new SchemaError(`Model '${model.name}' is not registered in this schema`, 'MODEL_NOT_REGISTERED');
        }
        return new Store(this, model);
    }

    query<T extends Persistable>(model: ModelDescriptor<T>): Query<T> {
        return new Query(model, { schema: this.schema });
    }

    /**
     * The same database with statement logging at info (or back at debug)
     */
    withDebug(debug = true): Database {
        return this.derive({ debug });
    }

    /**
     * Run `fn` inside a transaction; joins the open one when already inside
     *
     * An error thrown by `fn` rolls the whole transaction back and is rethrown.
     * A nested call that fails marks the open transaction rollback-only, so the
     * outer one cannot commit even if its callback catches the error.
     */
    async transaction<R>(fn: (database: Database) => Promise<R>): Promise<R> {
        const scope = this.state.scope;
        if (scope) {
            try {
                return await fn(this);
            } catch (error) {
                scope.journal.markRollbackOnly(error);
                throw error;
            }
        }

        const adapter = this.state.factory();
        return runTransaction(adapter, journal => fn(this.derive({ scope: { adapter, journal } })), {
            logger: this.state.logger,
        });
    }

    /**
     * Run one write or count statement
     */
    async execute(statement: WriteStatement | CountStatement): Promise<QueryResult> {
        return this.run(session => session.execute(statement));
    }

    /**
     * Run `fn` with a connected session: the transaction's, or a fresh one released afterwards
     */
    async run<R>(fn: (session: Session) => Promise<R>): Promise<R> {
        const scope = this.state.scope;
        if (scope) {
            return fn(this.session(scope.adapter));
        }

        const adapter = this.state.factory();
        try {
            await adapter.connect();
            return await fn(this.session(adapter));
        } finally {
            await adapter.disconnect();
        }
    }

    /**
     * Borrow a session for a result set; the caller must release it
     */
    async lease(): Promise<SessionLease> {
        const scope = this.state.scope;
        if (scope) {
            return { session: this.session(scope.adapter), release: async () => {} };
        }

        const adapter = this.state.factory();
        try {
            await adapter.connect();
        } catch (error) {
            await adapter.disconnect();
            throw error;
        }

        let released = false;
        return {
            session: this.session(adapter),
            release: async () => {
                if (!released) {
                    released = true;
                    await adapter.disconnect();
                }
            },
        };
    }

    private session(adapter: DatabaseAdapter): Session {
        const level: StatementLogLevel = this.state.debug ? 'info' : 'debug';
        return new Session(adapter, this.state.logger, level);
    }

    private derive(patch: Partial<DatabaseState>): Database {
        const next = new Database({ schema: this.schema, adapter: this.state.factory, fetchSize: this.state.fetchSize });
        next.state = { ...this.state, ...patch };
        return next;
    }
}
