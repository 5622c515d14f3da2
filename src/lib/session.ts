/**
 * Session
 *
 * One connected adapter plus statement logging. Stores never talk to an
 * adapter directly; every statement goes through a session so it is logged
 * the same way whether it runs inside a transaction or not.
 */

import type { DatabaseAdapter } from '@src/lib/database/adapter.js';
import type {
    CountStatement,
    QueryResult,
    RowCursor,
    SelectStatement,
    Statement,
    WriteStatement,
} from '@src/lib/database/statement.js';
import type { Logger } from '@src/lib/logger.js';

export type StatementLogLevel = 'debug' | 'info';

export class Session {
    constructor(
        readonly adapter: DatabaseAdapter,
        private readonly logger: Logger,
        private readonly level: StatementLogLevel
    ) {}

    async execute(statement: WriteStatement | CountStatement): Promise<QueryResult> {
        const startTime = process.hrtime.bigint();
        this.log(statement);

        const result = await this.adapter.execute(statement);
        this.logger.time(`${statement.type} ${statement.table}`, startTime, { rowCount: result.rowCount });
        return result;
    }

    async cursor(statement: SelectStatement): Promise<RowCursor> {
        this.log(statement);
        return this.adapter.cursor(statement);
    }

    private log(statement: Statement): void {
        if (!this.logger.enabled(this.level)) {
            return;
        }

        const meta = { dbType: this.adapter.getType(), statement: this.adapter.describe(statement) };
        if (this.level === 'info') {
            this.logger.info('Executing statement', meta);
        } else {
            this.logger.debug('Executing statement', meta);
        }
    }
}

/**
 * A session borrowed for the lifetime of a result set
 */
export interface SessionLease {
    readonly session: Session;
    /** Idempotent; a no-op for sessions owned by a transaction */
    release(): Promise<void>;
}
