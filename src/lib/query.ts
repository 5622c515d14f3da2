import { RowsmithEnv } from '@src/lib/config.js';
import { OrmErrors, QueryError } from '@src/lib/errors/orm-error.js';
import type { OrderSpec, Predicate } from '@src/lib/filter-types.js';
import type { CountStatement, JoinClause, SelectColumn, SelectStatement } from '@src/lib/database/statement.js';
import type { Persistable } from '@src/lib/model-record.js';
import { and, conditionsOf } from '@src/lib/predicate.js';
import type { Schema } from '@src/lib/schema/schema.js';
import {
    FieldKind,
    RelationshipDirection,
    RelationshipKind,
    type ColumnDescriptor,
    type ModelDescriptor,
    type RelationshipDescriptor,
} from '@src/lib/schema/types.js';

export interface Inclusion {
    readonly relationship: RelationshipDescriptor;
    /** Restricts which related rows load; marks parents not writable */
    readonly predicate: Predicate | null;
}

export interface QueryOptions {
    /** Resolves foreign key columns declared by other models */
    schema?: Schema;
    /** Defaults to ROWSMITH_BATCH_SIZE */
    batchSize?: number;
}

/**
 * How one model's columns are laid out in a result row
 */
export interface ModelPlan {
    readonly model: ModelDescriptor;
    readonly columns: readonly ColumnDescriptor[];
    /** Unmapped foreign key columns, decoded into virtual columns */
    readonly virtualColumns: readonly string[];
    /** Row key prefix; empty for the root model */
    readonly prefix: string;
}

export interface JoinPlan extends ModelPlan {
    readonly relationship: RelationshipDescriptor;
}

export interface RowPlan {
    readonly root: ModelPlan;
    readonly joins: readonly JoinPlan[];
    readonly writable: boolean;
}

interface QueryState {
    readonly where?: Predicate;
    readonly include: ReadonlySet<string> | null;
    readonly exclude: ReadonlySet<string> | null;
    readonly order: readonly OrderSpec[];
    readonly limit?: number;
    readonly offset?: number;
    readonly inclusions: readonly Inclusion[];
    readonly batchSize: number;
}

/**
 * Separator between relationship alias and column in joined result keys
 */
export const JOIN_COLUMN_SEPARATOR = '__';

/**
 * Query - immutable description of a read
 *
 * Every builder call returns a new Query; the receiver is never changed.
 *
 * @example
 * const recent = new Query(Post)
 *     .where(eq('published', true))
 *     .order(desc('created_at'))
 *     .limit(20)
 *     .with('author', null);
 */
export class Query<T extends Persistable = Persistable> {
    readonly model: ModelDescriptor<T>;
    private readonly schema: Schema | undefined;
    private state: QueryState;

    constructor(model: ModelDescriptor<T>, options: QueryOptions = {}) {
        this.model = model;
        this.schema = options.schema;

        const batchSize = options.batchSize ?? RowsmithEnv.batchSize();
        assertPositiveInteger('batchSize', batchSize);

        this.state = {
            include: null,
            exclude: null,
            order: [],
            inclusions: [],
            batchSize,
        };
    }

    /**
     * AND the predicate onto any existing one
     */
    where(predicate: Predicate): Query<T> {
        this.validatePredicate(predicate);
        const where = this.state.where ? and(this.state.where, predicate) : predicate;
        return this.derive({ where });
    }

    order(...orders: OrderSpec[]): Query<T> {
        for (const order of orders) {
            this.validateColumn(order.column, order.table);
        }
        return this.derive({ order: [...this.state.order, ...orders] });
    }

    limit(limit: number): Query<T> {
        assertNonNegativeInteger('limit', limit);
        return this.derive({ limit });
    }

    offset(offset: number): Query<T> {
        assertNonNegativeInteger('offset', offset);
        return this.derive({ offset });
    }

    batchSize(batchSize: number): Query<T> {
        assertPositiveInteger('batchSize', batchSize);
        return this.derive({ batchSize });
    }

    /**
     * Fetch only these columns (plus the primary key)
     */
    select(...columns: string[]): Query<T> {
        if (this.state.exclude) {
            throw new QueryError(`${this.model.name}: select() cannot be combined with selectNot()`, 'PROJECTION_CONFLICT');
        }
        this.validateProjection(columns);
        return this.derive({ include: new Set([...(this.state.include ?? []), ...columns]) });
    }

    /**
     * Fetch every column except these (the primary key is always fetched)
     */
    selectNot(...columns: string[]): Query<T> {
        if (this.state.include) {
            throw new QueryError(`${this.model.name}: selectNot() cannot be combined with select()`, 'PROJECTION_CONFLICT');
        }
        this.validateProjection(columns);
        return this.derive({ exclude: new Set([...(this.state.exclude ?? []), ...columns]) });
    }

    /**
     * Load a relationship alongside the records; a predicate filters which related rows load
     */
    with(relationship: string, predicate: Predicate | null = null): Query<T> {
        const descriptor = this.model.relationship(relationship);
        if (!descriptor) {
            throw OrmErrors.unknownRelationship(this.model.name, relationship);
        }
        if (descriptor.kind === RelationshipKind.OneToOne && descriptor.name === this.model.table) {
            throw new QueryError(`${this.model.name}: relationship '${descriptor.name}' collides with the table alias`, 'ALIAS_CONFLICT');
        }

        if (predicate) {
            const target = descriptor.target();
            for (const condition of conditionsOf(predicate)) {
                if (condition.table !== undefined) {
                    throw new QueryError(
                        `${this.model.name}.${relationship}: relationship predicates take unqualified columns`,
                        'INVALID_RELATIONSHIP_PREDICATE'
                    );
                }
                this.requireColumn(target, condition.column, this.virtualColumnsOf(target, descriptor));
            }
        }

        const inclusions = this.state.inclusions.filter(inclusion => inclusion.relationship.name !== relationship);
        return this.derive({ inclusions: [...inclusions, { relationship: descriptor, predicate }] });
    }

    /**
     * Independent clone; builder calls on either never affect the other
     */
    copy(): Query<T> {
        return this.derive({
            include: this.state.include ? new Set(this.state.include) : null,
            exclude: this.state.exclude ? new Set(this.state.exclude) : null,
            order: [...this.state.order],
            inclusions: [...this.state.inclusions],
        });
    }

    /**
     * The same query, resolving foreign key columns through `schema`
     */
    withSchema(schema: Schema): Query<T> {
        const next = new Query(this.model, { schema, batchSize: this.state.batchSize });
        next.state = this.state;
        return next;
    }

    /**
     * False when records read through this query would be partial
     */
    isWritable(): boolean {
        const complete = this.projectedColumns().length === this.model.columns.length;
        const unfiltered = this.state.inclusions.every(inclusion => inclusion.predicate === null);
        return complete && unfiltered;
    }

    //
    // Accessors
    //

    get predicate(): Predicate | undefined {
        return this.state.where;
    }

    get orders(): readonly OrderSpec[] {
        return this.state.order;
    }

    get limitValue(): number | undefined {
        return this.state.limit;
    }

    get offsetValue(): number | undefined {
        return this.state.offset;
    }

    get batchSizeValue(): number {
        return this.state.batchSize;
    }

    get inclusions(): readonly Inclusion[] {
        return this.state.inclusions;
    }

    oneToManyInclusions(): Inclusion[] {
        return this.state.inclusions.filter(inclusion => inclusion.relationship.kind === RelationshipKind.OneToMany);
    }

    /**
     * Mapped columns that will be fetched, in declaration order
     */
    projectedColumns(): ColumnDescriptor[] {
        const { include, exclude } = this.state;
        const primaryKey = this.model.primaryKey.column;

        return this.model.columns.filter(column => {
            if (column.name === primaryKey) {
                return true;
            }
            if (include) {
                return include.has(column.name);
            }
            if (exclude) {
                return !exclude.has(column.name);
            }
            return true;
        });
    }

    /**
     * Column layout of the compiled statement's rows
     */
    rowPlan(): RowPlan {
        const joins = this.oneToOneInclusions().map((inclusion): JoinPlan => {
            const target = inclusion.relationship.target();
            return {
                relationship: inclusion.relationship,
                model: target,
                columns: target.columns,
                virtualColumns: this.virtualColumnsOf(target, inclusion.relationship),
                prefix: `${inclusion.relationship.name}${JOIN_COLUMN_SEPARATOR}`,
            };
        });

        return {
            root: {
                model: this.model,
                columns: this.projectedColumns(),
                virtualColumns: this.virtualColumnsOf(this.model),
                prefix: '',
            },
            joins,
            writable: this.isWritable(),
        };
    }

    compile(): SelectStatement {
        const alias = this.model.table;
        const plan = this.rowPlan();
        this.assertQualifiersIncluded();

        const columns: SelectColumn[] = [
            ...plan.root.columns.map(column => selectColumn(alias, column.name, column.name, column.kind)),
            ...plan.root.virtualColumns.map(column => selectColumn(alias, column, column, FieldKind.Scalar)),
        ];

        for (const join of plan.joins) {
            const source = join.relationship.name;
            columns.push(
                ...join.columns.map(column => selectColumn(source, column.name, join.prefix + column.name, column.kind)),
                ...join.virtualColumns.map(column => selectColumn(source, column, join.prefix + column, FieldKind.Scalar))
            );
        }

        return {
            type: 'select',
            table: this.model.table,
            alias,
            columns,
            joins: this.compileJoins(),
            where: this.state.where,
            order: this.state.order,
            limit: this.state.limit,
            offset: this.state.offset,
        };
    }

    /**
     * COUNT over the predicate; ordering, limit and offset do not apply
     */
    compileCount(): CountStatement {
        this.assertQualifiersIncluded();
        return {
            type: 'count',
            table: this.model.table,
            alias: this.model.table,
            joins: this.compileJoins(),
            where: this.state.where,
        };
    }

    //
    // Internals
    //

    private derive(patch: Partial<QueryState>): Query<T> {
        const next = new Query(this.model, { schema: this.schema, batchSize: this.state.batchSize });
        next.state = { ...this.state, ...patch };
        return next;
    }

    private oneToOneInclusions(): Inclusion[] {
        return this.state.inclusions.filter(inclusion => inclusion.relationship.kind === RelationshipKind.OneToOne);
    }

    private compileJoins(): JoinClause[] {
        return this.oneToOneInclusions().map(inclusion => {
            const relationship = inclusion.relationship;
            const target = relationship.target();
            const inverse = relationship.direction === RelationshipDirection.Inverse;

            const join: JoinClause = {
                table: target.table,
                alias: relationship.name,
                column: inverse ? relationship.foreignKey : target.primaryKey.column,
                parentAlias: this.model.table,
                parentColumn: inverse ? this.model.primaryKey.column : relationship.foreignKey,
            };

            return inclusion.predicate ? { ...join, condition: inclusion.predicate } : join;
        });
    }

    /**
     * Unmapped foreign key columns stored on the model's table
     */
    private virtualColumnsOf(model: ModelDescriptor, via?: RelationshipDescriptor): string[] {
        const columns = new Set<string>();

        if (this.schema && this.schema.has(model)) {
            for (const foreignKey of this.schema.foreignKeys(model)) {
                columns.add(foreignKey.column);
            }
        } else {
            for (const relationship of model.relationships) {
                if (relationship.direction === RelationshipDirection.Forward) {
                    columns.add(relationship.foreignKey);
                }
            }
            if (via && via.direction === RelationshipDirection.Inverse) {
                columns.add(via.foreignKey);
            }
        }

        return [...columns].filter(column => !model.column(column));
    }

    private validateProjection(columns: readonly string[]): void {
        for (const column of columns) {
            if (!this.model.column(column)) {
                throw OrmErrors.unknownColumn(this.model.name, column);
            }
        }
    }

    private validatePredicate(predicate: Predicate): void {
        for (const condition of conditionsOf(predicate)) {
            this.validateColumn(condition.column, condition.table);
        }
    }

    /**
     * Unqualified columns belong to the model; qualified ones to a one-to-one relationship's target
     */
    private validateColumn(column: string, table: string | undefined): void {
        if (table === undefined) {
            this.requireColumn(this.model, column, this.virtualColumnsOf(this.model));
            return;
        }

        const relationship = this.model.relationship(table);
        if (!relationship || relationship.kind !== RelationshipKind.OneToOne) {
            throw OrmErrors.unknownRelationship(this.model.name, table);
        }

        const target = relationship.target();
        this.requireColumn(target, column, this.virtualColumnsOf(target, relationship));
    }

    private requireColumn(model: ModelDescriptor, column: string, virtualColumns: readonly string[]): void {
        if (!model.column(column) && !virtualColumns.includes(column)) {
            throw OrmErrors.unknownColumn(model.name, column);
        }
    }

    private assertQualifiersIncluded(): void {
        const included = new Set(this.oneToOneInclusions().map(inclusion => inclusion.relationship.name));
        const qualifiers = [
            ...(this.state.where ? conditionsOf(this.state.where) : []),
            ...this.state.order,
        ];

        for (const { table } of qualifiers) {
            if (table !== undefined && !included.has(table)) {
                throw new QueryError(
                    `${this.model.name}: '${table}' is referenced but not included with with()`,
                    'RELATIONSHIP_NOT_INCLUDED'
                );
            }
        }
    }
}

function selectColumn(source: string, column: string, alias: string, kind: SelectColumn['kind']): SelectColumn {
    return { source, column, alias, kind };
}

function assertNonNegativeInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new QueryError(`${name} must be a non-negative integer, got ${value}`, 'INVALID_BOUND');
    }
}

function assertPositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new QueryError(`${name} must be a positive integer, got ${value}`, 'INVALID_BOUND');
    }
}
