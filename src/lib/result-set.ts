/**
 * Result Set
 *
 * Lazy, forward-only iteration over the rows of a compiled query. Rows are
 * pulled from the cursor in chunks and decoded into fresh records; the cursor
 * (and the connection behind it) is released as soon as the rows run out.
 *
 * Not safe for concurrent use: one caller advances a result set at a time.
 */

import { RowsmithEnv } from '@src/lib/config.js';
import { OrmErrors, PreconditionError, ResultSetClosedError, describeCause } from '@src/lib/errors/orm-error.js';
import type { Row, RowCursor } from '@src/lib/database/statement.js';
import { logger } from '@src/lib/logger.js';
import type { Persistable } from '@src/lib/model-record.js';
import type { ModelPlan, RowPlan } from '@src/lib/query.js';
import { decodeInto } from '@src/lib/record-codec.js';
import type { ModelDescriptor } from '@src/lib/schema/types.js';

export interface ResultSetOptions {
    /** Rows pulled per cursor read; defaults to ROWSMITH_FETCH_SIZE */
    fetchSize?: number;
    /** Runs once after the cursor closes, e.g. to release the connection */
    onClose?: () => Promise<void>;
}

/**
 * Write one model's share of a row into `record`
 */
export function decodeModel(record: Persistable, plan: ModelPlan, row: Row): void {
    decodeInto(record, plan.columns, row, column => plan.prefix + column);
    for (const column of plan.virtualColumns) {
        record.setVirtualValue(column, row[plan.prefix + column] ?? null);
    }
    record.setPersisted(true);
}

/**
 * Build the root record for a row, with its one-to-one joins attached
 */
export function decodeRecord<T extends Persistable>(model: ModelDescriptor<T>, plan: RowPlan, row: Row): T {
    const record = model.create();
    decodeModel(record, plan.root, row);
    record.setWritable(plan.writable);

    for (const join of plan.joins) {
        const key = row[join.prefix + join.model.primaryKey.column];
        if (key === null || key === undefined) {
            record.setRelationship(join.relationship.name, null);
            continue;
        }

        const related = join.model.create();
        decodeModel(related, join, row);
        related.setWritable(true);
        record.setRelationship(join.relationship.name, related);
    }

    return record;
}

export class ResultSet<T extends Persistable> implements AsyncIterable<T> {
    protected readonly fetchSize: number;

    private buffer: T[] = [];
    private current: T | null = null;
    private drained = false;
    private closed = false;

    constructor(
        readonly model: ModelDescriptor<T>,
        private readonly cursor: RowCursor,
        protected readonly plan: RowPlan,
        private readonly options: ResultSetOptions = {}
    ) {
        this.fetchSize = options.fetchSize ?? RowsmithEnv.fetchSize();
    }

    /**
     * Advance to the next row
     *
     * Resolves false once the rows run out; the set is closed at that point
     * and any further call throws ResultSetClosedError.
     */
    async next(): Promise<boolean> {
        if (this.closed) {
            throw new ResultSetClosedError();
        }

        if (this.buffer.length === 0 && !this.drained) {
            this.buffer = await this.guard(() => this.fill());
        }

        const record = this.buffer.shift();
        if (record === undefined) {
            await this.close();
            return false;
        }

        this.current = record;
        return true;
    }

    /**
     * The record decoded from the current row
     */
    get(): T {
        if (this.closed) {
            throw new ResultSetClosedError();
        }
        if (this.current === null) {
            throw new PreconditionError(`${this.model.name}: no current row, call next() first`, 'NO_CURRENT_ROW');
        }
        return this.current;
    }

    /**
     * Release the cursor; safe to call repeatedly and after exhaustion
     */
    async close(): Promise<void> {
        if (this.closed) {
            return;
        }

        this.closed = true;
        this.buffer = [];
        this.current = null;

        try {
            await this.cursor.close();
        } finally {
            await this.options.onClose?.();
        }
    }

    isClosed(): boolean {
        return this.closed;
    }

    async all(): Promise<T[]> {
        const records: T[] = [];
        for await (const record of this) {
            records.push(record);
        }
        return records;
    }

    /**
     * First record; the set is closed afterwards
     */
    async one(): Promise<T> {
        try {
            if (!(await this.next())) {
                throw OrmErrors.noRows(this.model.name);
            }
            return this.get();
        } finally {
            await this.close();
        }
    }

    /**
     * Visit every record; returning false stops early and closes the set
     */
    async forEach(visit: (record: T) => boolean | void | Promise<boolean | void>): Promise<void> {
        for await (const record of this) {
            if ((await visit(record)) === false) {
                break;
            }
        }
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
        try {
            while (await this.next()) {
                yield this.get();
            }
        } finally {
            await this.close();
        }
    }

    /**
     * Rows requested per cursor read
     */
    protected chunkSize(): number {
        return this.fetchSize;
    }

    /**
     * Called with each freshly decoded chunk before it is handed out
     */
    protected async enrich(_records: T[]): Promise<void> {}

    private async fill(): Promise<T[]> {
        const count = this.chunkSize();
        const rows = await this.cursor.read(count);
        if (rows.length < count) {
            this.drained = true;
        }

        const records = rows.map(row => decodeRecord(this.model, this.plan, row));
        if (records.length > 0) {
            await this.enrich(records);
        }
        return records;
    }

    /**
     * Close the set when a read fails, keeping the read error
     */
    private async guard<R>(read: () => Promise<R>): Promise<R> {
        try {
            return await read();
        } catch (error) {
            await this.close().catch((closeError: unknown) => {
                logger.warn('Failed to close result set after a read error', {
                    model: this.model.name,
                    error: describeCause(closeError),
                });
            });
            throw error;
        }
    }
}
