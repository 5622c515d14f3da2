/**
 * Relationship Loader
 *
 * One-to-one relationships arrive with the parent row through a LEFT JOIN
 * (see Query.compile). One-to-many relationships are loaded here: the
 * BatchingResultSet pulls parents `batchSize` at a time and issues one child
 * query per relationship per batch, instead of one query per parent.
 */

import type { RowCursor } from '@src/lib/database/statement.js';
import type { Persistable } from '@src/lib/model-record.js';
import { asc, inList } from '@src/lib/predicate.js';
import { Query, type Inclusion, type RowPlan } from '@src/lib/query.js';
import { keyString, primaryKeyOf, readForeignKey } from '@src/lib/record-codec.js';
import { ResultSet, type ResultSetOptions } from '@src/lib/result-set.js';
import type { Schema } from '@src/lib/schema/schema.js';
import type { ModelDescriptor } from '@src/lib/schema/types.js';
import type { Session } from '@src/lib/session.js';

export interface BatchingOptions extends ResultSetOptions {
    session: Session;
    schema: Schema;
    inclusions: readonly Inclusion[];
    batchSize: number;
}

export class BatchingResultSet<T extends Persistable> extends ResultSet<T> {
    private readonly session: Session;
    private readonly schema: Schema;
    private readonly inclusions: readonly Inclusion[];
    private readonly batchSize: number;

    constructor(model: ModelDescriptor<T>, cursor: RowCursor, plan: RowPlan, options: BatchingOptions) {
        super(model, cursor, plan, options);
        this.session = options.session;
        this.schema = options.schema;
        this.inclusions = options.inclusions;
        this.batchSize = options.batchSize;
    }

    protected override chunkSize(): number {
        return this.batchSize;
    }

    protected override async enrich(parents: T[]): Promise<void> {
        for (const inclusion of this.inclusions) {
            await loadOneToMany(this.session, this.schema, this.model, inclusion, parents, this.fetchSize);
        }
    }
}

/**
 * Fill `inclusion`'s slot on every parent with one child query
 *
 * Parents keep their order; children keep the child query's order (primary
 * key ascending). Parents without children get an empty array.
 */
export async function loadOneToMany(
    session: Session,
    schema: Schema,
    model: ModelDescriptor,
    inclusion: Inclusion,
    parents: readonly Persistable[],
    fetchSize: number
): Promise<void> {
    const relationship = inclusion.relationship;
    const target = relationship.target();
    const foreignKey = relationship.foreignKey;

    const keys = new Map<string, unknown>();
    for (const parent of parents) {
        const key = primaryKeyOf(parent, model);
        if (!model.primaryKey.isEmpty(key)) {
            keys.set(keyString(key), key);
        }
    }

    const groups = new Map<string, Persistable[]>();
    if (keys.size > 0) {
        let query = new Query(target, { schema })
            .where(inList(foreignKey, [...keys.values()]))
            .order(asc(target.primaryKey.column));
        if (inclusion.predicate) {
            query = query.where(inclusion.predicate);
        }

        const cursor = await session.cursor(query.compile());
        const children = await new ResultSet(target, cursor, query.rowPlan(), { fetchSize }).all();

        for (const child of children) {
            const key = keyString(readForeignKey(child, target, foreignKey));
            const group = groups.get(key);
            if (group) {
                group.push(child);
            } else {
                groups.set(key, [child]);
            }
        }
    }

    for (const parent of parents) {
        const key = keyString(primaryKeyOf(parent, model));
        parent.setRelationship(relationship.name, groups.get(key) ?? []);
    }
}
