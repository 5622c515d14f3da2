/**
 * Store - per-model persistence operations
 *
 * Write protocol (insert shown; update and delete follow the same shape):
 *
 *   beforeSave -> beforeInsert -> [forward targets] -> INSERT -> [inverse related] -> afterInsert -> afterSave
 *
 * A write runs inside a transaction when the record implements an after-hook
 * for the operation or carries related records to save; otherwise its single
 * statement runs on its own connection. Inside `transaction()` everything
 * joins the open transaction.
 */

import type { Database } from '@src/lib/database.js';
import { ExecutionError, OrmErrors, QueryError } from '@src/lib/errors/orm-error.js';
import type { Predicate } from '@src/lib/filter-types.js';
import type { ColumnValue } from '@src/lib/database/statement.js';
import { HOOK_SEQUENCE, hasAfterHooks, runHooks } from '@src/lib/hooks.js';
import { isRecordList, type Persistable } from '@src/lib/model-record.js';
import { and, eq } from '@src/lib/predicate.js';
import type { Query } from '@src/lib/query.js';
import { encodeColumns, primaryKeyOf, writeForeignKey } from '@src/lib/record-codec.js';
import { BatchingResultSet } from '@src/lib/relationship-loader.js';
import { ResultSet, decodeModel } from '@src/lib/result-set.js';
import {
    FieldKind,
    RelationshipDirection,
    RelationshipKind,
    type ModelDescriptor,
    type RelationshipDescriptor,
} from '@src/lib/schema/types.js';

export type SaveResult = 'inserted' | 'updated';

/**
 * Related records found in one relationship slot
 */
interface RelatedWrite {
    readonly relationship: RelationshipDescriptor;
    readonly records: readonly Persistable[];
}

export class Store<T extends Persistable> {
    constructor(
        private readonly database: Database,
        readonly model: ModelDescriptor<T>
    ) {}

    /**
     * A fresh query over this store's model
     */
    query(): Query<T> {
        return this.database.query(this.model);
    }

    /**
     * A store whose statements are logged at info level
     */
    debug(): Store<T> {
        return new Store(this.database.withDebug(), this.model);
    }

    /**
     * Run `fn` with a store bound to one transaction; nested calls join it
     */
    async transaction<R>(fn: (store: Store<T>) => Promise<R>): Promise<R> {
        return this.database.transaction(database => fn(new Store(database, this.model)));
    }

    //
    // Writes
    //

    /**
     * Insert the record and save the related records in its slots
     *
     * An unset caller-assigned key is rejected after the before-hooks have run,
     * so `beforeSave` or `beforeInsert` may assign it.
     */
    async insert(record: T): Promise<void> {
        if (record.isPersisted()) {
            throw OrmErrors.alreadyPersisted(this.model.name);
        }

        const related = this.relatedWrites(this.model, record);
        const promote = hasRelatedRecords(related) || hasAfterHooks(record, 'insert');
        await this.write(promote, database => this.insertWith(database, this.model, record, related));
    }

    /**
     * Write the record's columns (or only `columns`); resolves the number of rows modified
     */
    async update(record: T, ...columns: string[]): Promise<number> {
        this.checkUpdate(this.model, record);
        for (const column of columns) {
            if (!this.model.column(column)) {
                throw OrmErrors.unknownColumn(this.model.name, column);
            }
        }

        // A column subset is a targeted write; related slots are left alone
        const related = columns.length === 0 ? this.relatedWrites(this.model, record) : [];
        const promote = hasRelatedRecords(related) || hasAfterHooks(record, 'update');
        return this.write(promote, database => this.updateWith(database, this.model, record, columns, related));
    }

    async save(record: T): Promise<SaveResult> {
        if (record.isPersisted()) {
            await this.update(record);
            return 'updated';
        }

        await this.insert(record);
        return 'inserted';
    }

    /**
     * Delete the record's row; resolves the number of rows deleted. Related rows are not touched.
     */
    async delete(record: T): Promise<number> {
        this.checkPersisted(this.model, record);
        return this.write(hasAfterHooks(record, 'delete'), database => this.deleteWith(database, this.model, record, null));
    }

    /**
     * Delete related rows of an inverse relationship
     *
     * With records: each goes through the delete protocol, in one transaction;
     * a record that does not belong to the parent keeps its row and stays persisted.
     * Without: every related row of the parent goes in a single statement.
     */
    async removeRelated(record: T, relationship: string, related: readonly Persistable[] = []): Promise<number> {
        const descriptor = this.model.relationship(relationship);
        if (!descriptor) {
            throw OrmErrors.unknownRelationship(this.model.name, relationship);
        }
        if (descriptor.direction !== RelationshipDirection.Inverse) {
            throw new QueryError(
                `${this.model.name}.${relationship}: only inverse relationships can remove related records`,
                'INVALID_RELATIONSHIP'
            );
        }
        this.checkPersisted(this.model, record);

        const target = descriptor.target();
        const parentMatch = eq(descriptor.foreignKey, primaryKeyOf(record, this.model));
        const loaded = slotRecords(record.relationship(descriptor.name));

        if (related.length === 0) {
            const result = await this.database.execute({ type: 'delete', table: target.table, where: parentMatch });
            for (const child of loaded) {
                this.database.journal?.remember(child, target);
                child.setPersisted(false);
            }
            record.setRelationship(descriptor.name, descriptor.kind === RelationshipKind.OneToMany ? [] : null);
            return result.rowCount;
        }

        for (const child of related) {
            this.checkPersisted(target, child);
        }

        const removed = await this.database.transaction(async database => {
            let count = 0;
            for (const child of related) {
                count += await this.deleteWith(database, target, child, parentMatch);
            }
            return count;
        });

        if (record.relationship(descriptor.name) !== undefined) {
            const remaining = loaded.filter(child => !related.includes(child) || child.isPersisted());
            record.setRelationship(
                descriptor.name,
                descriptor.kind === RelationshipKind.OneToMany ? remaining : remaining[0] ?? null
            );
        }

        return removed;
    }

    //
    // Reads
    //

    /**
     * Re-read the full row, discarding local changes; relationships are left as they are
     */
    async reload(record: T): Promise<void> {
        this.checkPersisted(this.model, record);

        const query = this.query().where(eq(this.model.primaryKey.column, primaryKeyOf(record, this.model)));
        const statement = query.compile();

        const row = await this.database.run(async session => {
            const cursor = await session.cursor(statement);
            try {
                const rows = await cursor.read(1);
                return rows.length > 0 ? rows[0] : null;
            } finally {
                await cursor.close();
            }
        });

        if (row === null) {
            throw OrmErrors.noRows(this.model.name);
        }

        decodeModel(record, query.rowPlan().root, row);
        record.setWritable(true);
    }

    /**
     * Open a result set; the caller iterates it to the end or closes it
     */
    async find(query: Query<T> = this.query()): Promise<ResultSet<T>> {
        const bound = this.bind(query);
        const statement = bound.compile();
        const plan = bound.rowPlan();
        const inclusions = bound.oneToManyInclusions();

        const lease = await this.database.lease();
        try {
            const cursor = await lease.session.cursor(statement);
            const options = { fetchSize: this.database.fetchSize, onClose: lease.release };

            if (inclusions.length === 0) {
                return new ResultSet(this.model, cursor, plan, options);
            }

            return new BatchingResultSet(this.model, cursor, plan, {
                ...options,
                session: lease.session,
                schema: this.database.schema,
                inclusions,
                batchSize: bound.batchSizeValue,
            });
        } catch (error) {
            await lease.release();
            throw error;
        }
    }

    async findAll(query: Query<T> = this.query()): Promise<T[]> {
        const results = await this.find(query);
        return results.all();
    }

    /**
     * First matching record, or NoRowsError
     */
    async findOne(query: Query<T> = this.query()): Promise<T> {
        const results = await this.find(query.limitValue === undefined ? query.limit(1) : query);
        return results.one();
    }

    /**
     * Rows matching the query's predicate; ordering, limit, offset and inclusions do not apply
     */
    async count(query: Query<T> = this.query()): Promise<number> {
        const result = await this.database.execute(this.bind(query).compileCount());
        return result.rowCount;
    }

    //
    // Write protocol
    //

    private async write<R>(promote: boolean, fn: (database: Database) => Promise<R>): Promise<R> {
        return promote ? this.database.transaction(fn) : fn(this.database);
    }

    private async insertWith(
        database: Database,
        model: ModelDescriptor,
        record: Persistable,
        related: readonly RelatedWrite[]
    ): Promise<void> {
        await runHooks(record, HOOK_SEQUENCE.insert.before, model.name);
        await this.saveForward(database, model, record, related);

        const primaryKey = model.primaryKey;
        const generated = primaryKey.autoIncrement && primaryKey.isEmpty(primaryKeyOf(record, model));
        if (!generated && primaryKey.isEmpty(primaryKeyOf(record, model))) {
            throw OrmErrors.emptyPrimaryKey(model.name);
        }

        const columns = generated ? model.columns.filter(column => column.name !== primaryKey.column) : model.columns;
        const result = await database.execute({
            type: 'insert',
            table: model.table,
            values: [...encodeColumns(record, columns), ...this.foreignKeyValues(model, record)],
            returning: generated ? [primaryKey.column] : [],
        });

        database.journal?.remember(record, model);
        if (generated) {
            const key = result.rows.length > 0 ? result.rows[0][primaryKey.column] : undefined;
            if (primaryKey.isEmpty(key)) {
                throw new ExecutionError(`${model.name}: INSERT did not return a generated key`);
            }
            record.setValue(primaryKey.column, key);
        }
        record.setPersisted(true);

        await this.saveInverse(database, model, record, related);
        await runHooks(record, HOOK_SEQUENCE.insert.after, model.name);
    }

    private async updateWith(
        database: Database,
        model: ModelDescriptor,
        record: Persistable,
        columns: readonly string[],
        related: readonly RelatedWrite[]
    ): Promise<number> {
        await runHooks(record, HOOK_SEQUENCE.update.before, model.name);
        await this.saveForward(database, model, record, related);

        const primaryKey = model.primaryKey.column;
        const key = primaryKeyOf(record, model);
        const targets = model.columns.filter(column =>
            column.name !== primaryKey && (columns.length === 0 || columns.includes(column.name))
        );

        const values: ColumnValue[] = [
            ...encodeColumns(record, targets),
            ...(columns.length === 0 ? this.foreignKeyValues(model, record) : []),
        ];
        if (values.length === 0) {
            // Nothing but the key: still report whether the row exists
            values.push({ column: primaryKey, kind: FieldKind.Scalar, value: key });
        }

        const result = await database.execute({
            type: 'update',
            table: model.table,
            values,
            where: eq(primaryKey, key),
        });

        await this.saveInverse(database, model, record, related);
        await runHooks(record, HOOK_SEQUENCE.update.after, model.name);
        return result.rowCount;
    }

    private async deleteWith(
        database: Database,
        model: ModelDescriptor,
        record: Persistable,
        guard: Predicate | null
    ): Promise<number> {
        await runHooks(record, HOOK_SEQUENCE.delete.before, model.name);

        const match = eq(model.primaryKey.column, primaryKeyOf(record, model));
        const result = await database.execute({
            type: 'delete',
            table: model.table,
            where: guard ? and(match, guard) : match,
        });

        // A guarded delete that matched nothing left the row in place
        if (guard === null || result.rowCount > 0) {
            database.journal?.remember(record, model);
            record.setPersisted(false);
        }

        await runHooks(record, HOOK_SEQUENCE.delete.after, model.name);
        return result.rowCount;
    }

    /**
     * Insert-or-update of a related record; its own related slots are not followed
     */
    private async saveRelated(database: Database, model: ModelDescriptor, record: Persistable): Promise<void> {
        if (record.isPersisted()) {
            this.checkUpdate(model, record);
            await this.updateWith(database, model, record, [], []);
        } else {
            await this.insertWith(database, model, record, []);
        }
    }

    /**
     * Save forward targets first so the owner row can reference them
     */
    private async saveForward(
        database: Database,
        model: ModelDescriptor,
        record: Persistable,
        related: readonly RelatedWrite[]
    ): Promise<void> {
        for (const { relationship, records } of related) {
            if (relationship.direction !== RelationshipDirection.Forward) {
                continue;
            }

            if (records.length === 0) {
                writeForeignKey(record, model, relationship.foreignKey, null);
                continue;
            }

            const target = relationship.target();
            const targetRecord = records[0];
            await this.saveRelated(database, target, targetRecord);
            writeForeignKey(record, model, relationship.foreignKey, primaryKeyOf(targetRecord, target));
        }
    }

    private async saveInverse(
        database: Database,
        model: ModelDescriptor,
        record: Persistable,
        related: readonly RelatedWrite[]
    ): Promise<void> {
        const key = primaryKeyOf(record, model);

        for (const { relationship, records } of related) {
            if (relationship.direction !== RelationshipDirection.Inverse) {
                continue;
            }

            const target = relationship.target();
            for (const child of records) {
                writeForeignKey(child, target, relationship.foreignKey, key);
                await this.saveRelated(database, target, child);
            }
        }
    }

    //
    // Helpers
    //

    /**
     * Loaded or assigned relationship slots; slots never touched are skipped
     */
    private relatedWrites(model: ModelDescriptor, record: Persistable): RelatedWrite[] {
        const writes: RelatedWrite[] = [];
        for (const relationship of model.relationships) {
            const value = record.relationship(relationship.name);
            if (value !== undefined) {
                writes.push({ relationship, records: slotRecords(value) });
            }
        }
        return writes;
    }

    /**
     * Unmapped foreign key columns the record carries as virtual values
     */
    private foreignKeyValues(model: ModelDescriptor, record: Persistable): ColumnValue[] {
        const virtual = record.virtualColumns();
        return this.database.schema.foreignKeys(model)
            .filter(foreignKey => !model.column(foreignKey.column) && virtual.has(foreignKey.column))
            .map(foreignKey => ({ column: foreignKey.column, kind: FieldKind.Scalar, value: virtual.get(foreignKey.column) }));
    }

    private bind(query: Query<T>): Query<T> {
        if (query.model !== this.model) {
            throw new QueryError(`A ${query.model.name} query cannot run on the ${this.model.name} store`, 'MODEL_MISMATCH');
        }
        return query.withSchema(this.database.schema);
    }

    private checkPersisted(model: ModelDescriptor, record: Persistable): void {
        if (!record.isPersisted()) {
            throw OrmErrors.notPersisted(model.name);
        }
        if (model.primaryKey.isEmpty(primaryKeyOf(record, model))) {
            throw OrmErrors.emptyPrimaryKey(model.name);
        }
    }

    private checkUpdate(model: ModelDescriptor, record: Persistable): void {
        this.checkPersisted(model, record);
        if (!record.isWritable()) {
            throw OrmErrors.notWritable(model.name);
        }
    }
}

function slotRecords(value: Persistable | readonly Persistable[] | null | undefined): Persistable[] {
    if (value === null || value === undefined) {
        return [];
    }
    return isRecordList(value) ? [...value] : [value];
}

function hasRelatedRecords(related: readonly RelatedWrite[]): boolean {
    return related.some(write => write.records.length > 0);
}
