/**
 * In-process relational store backing MemoryAdapter
 *
 * One table per model, built from the Schema: mapped columns plus the
 * foreign key columns relationships place on the table. Enforces primary key
 * uniqueness, NOT NULL and unknown-column errors with PostgreSQL's messages.
 * JSON columns are held as JSON text and parsed on the way out, so values
 * never share references with the records that wrote them.
 */

import { ExecutionError } from '@src/lib/errors/orm-error.js';
import type { Predicate } from '@src/lib/filter-types.js';
import {
    compareForOrder,
    evaluate,
    isAbsent,
    valuesEqual,
    type ColumnResolver,
} from '@src/lib/database/memory-evaluator.js';
import type {
    CountStatement,
    DeleteStatement,
    InsertStatement,
    JoinClause,
    QueryResult,
    Row,
    SelectStatement,
    UpdateStatement,
} from '@src/lib/database/statement.js';
import type { Schema } from '@src/lib/schema/schema.js';
import { FieldKind, type ColumnKind } from '@src/lib/schema/types.js';

export type StatementKind = 'begin' | 'commit' | 'rollback' | 'select' | 'count' | 'insert' | 'update' | 'delete';

export interface StatementLogEntry {
    readonly kind: StatementKind;
    readonly table?: string;
}

export interface MemoryColumnDefinition {
    name: string;
    kind?: ColumnKind;
    nullable?: boolean;
}

export interface MemoryTableDefinition {
    name: string;
    primaryKey: string;
    autoIncrement?: boolean;
    columns: readonly MemoryColumnDefinition[];
}

interface MemoryColumn {
    readonly name: string;
    readonly kind: ColumnKind;
    readonly nullable: boolean;
}

interface MemoryTable {
    readonly name: string;
    readonly primaryKey: string;
    readonly autoIncrement: boolean;
    readonly columns: ReadonlyMap<string, MemoryColumn>;
    rows: Row[];
    sequence: number;
}

export interface MemorySnapshot {
    readonly tables: ReadonlyMap<string, { rows: Row[]; sequence: number }>;
}

type Tuple = Map<string, Row | null>;

export class MemoryDatabase {
    private readonly tables = new Map<string, MemoryTable>();
    private readonly entries: StatementLogEntry[] = [];
    private readonly failures = new Map<StatementKind, Error>();

    /**
     * Build one table per registered model
     */
    static fromSchema(schema: Schema): MemoryDatabase {
        const database = new MemoryDatabase();

        for (const model of schema.models) {
            const mapped = new Set(model.columns.map(column => column.name));
            const foreignKeys = schema.foreignKeys(model)
                .filter(foreignKey => !mapped.has(foreignKey.column))
                .map(foreignKey => ({ name: foreignKey.column }));

            database.defineTable({
                name: model.table,
                primaryKey: model.primaryKey.column,
                autoIncrement: model.primaryKey.autoIncrement,
                columns: [
                    ...model.columns.map(column => ({ name: column.name, kind: column.kind, nullable: column.nullable })),
                    ...foreignKeys,
                ],
            });
        }

        return database;
    }

    defineTable(definition: MemoryTableDefinition): void {
        if (this.tables.has(definition.name)) {
            throw new ExecutionError(`relation "${definition.name}" already exists`);
        }

        const columns = new Map<string, MemoryColumn>();
        for (const column of definition.columns) {
            columns.set(column.name, {
                name: column.name,
                kind: column.kind ?? FieldKind.Scalar,
                nullable: column.name === definition.primaryKey ? false : column.nullable ?? true,
            });
        }
        if (!columns.has(definition.primaryKey)) {
            throw new ExecutionError(`column "${definition.primaryKey}" named in key does not exist`);
        }

        this.tables.set(definition.name, {
            name: definition.name,
            primaryKey: definition.primaryKey,
            autoIncrement: definition.autoIncrement ?? false,
            columns,
            rows: [],
            sequence: 0,
        });
    }

    //
    // Inspection helpers
    //

    /**
     * Statements executed so far, optionally of one kind
     */
    statements(kind?: StatementKind): StatementLogEntry[] {
        return kind ? this.entries.filter(entry => entry.kind === kind) : [...this.entries];
    }

    clearLog(): void {
        this.entries.length = 0;
    }

    /**
     * Decoded copies of every row of a table, in insertion order
     */
    rows(table: string): Row[] {
        const memoryTable = this.table(table);
        return memoryTable.rows.map(row => this.decodeRow(memoryTable, row));
    }

    /**
     * Insert rows directly, bypassing the statement log
     */
    seed(table: string, rows: readonly Row[]): void {
        const memoryTable = this.table(table);
        for (const row of rows) {
            this.insertRow(memoryTable, Object.entries(row).map(([column, value]) => ({ column, value })));
        }
    }

    /**
     * Make the next statement of the given kind fail with `error`
     */
    failNext(kind: StatementKind, error: Error): void {
        this.failures.set(kind, error);
    }

    //
    // Engine-facing operations
    //

    record(kind: StatementKind, table?: string): void {
        this.entries.push(table === undefined ? { kind } : { kind, table });

        const failure = this.failures.get(kind);
        if (failure) {
            this.failures.delete(kind);
            throw failure;
        }
    }

    select(statement: SelectStatement): Row[] {
        this.record('select', statement.table);

        const aliases = this.aliasTables(statement.table, statement.alias, statement.joins);
        let tuples = this.filter(this.joinedTuples(statement.table, statement.alias, statement.joins), aliases, statement.alias, statement.where);

        if (statement.order.length > 0) {
            const keyed = tuples.map(tuple => ({
                tuple,
                keys: statement.order.map(order => this.resolver(tuple, aliases, statement.alias)(order.column, order.table)),
            }));
            keyed.sort((left, right) => {
                for (let i = 0; i < statement.order.length; i++) {
                    const result = compareForOrder(left.keys[i], right.keys[i], statement.order[i].sort);
                    if (result !== 0) {
                        return result;
                    }
                }
                return 0;
            });
            tuples = keyed.map(entry => entry.tuple);
        }

        const start = statement.offset ?? 0;
        const end = statement.limit === undefined ? undefined : start + statement.limit;
        tuples = tuples.slice(start, end);

        return tuples.map(tuple => {
            const resolve = this.resolver(tuple, aliases, statement.alias);
            const row: Row = {};
            for (const column of statement.columns) {
                row[column.alias] = resolve(column.column, column.source);
            }
            return row;
        });
    }

    count(statement: CountStatement): number {
        this.record('count', statement.table);

        const aliases = this.aliasTables(statement.table, statement.alias, statement.joins);
        return this.filter(this.joinedTuples(statement.table, statement.alias, statement.joins), aliases, statement.alias, statement.where).length;
    }

    insert(statement: InsertStatement): QueryResult {
        this.record('insert', statement.table);

        const memoryTable = this.table(statement.table);
        const row = this.insertRow(memoryTable, statement.values);
        const decoded = this.decodeRow(memoryTable, row);

        const returned: Row = {};
        for (const column of statement.returning) {
            this.column(memoryTable, column);
            returned[column] = decoded[column];
        }

        return { rowCount: 1, rows: statement.returning.length > 0 ? [returned] : [] };
    }

    update(statement: UpdateStatement): QueryResult {
        this.record('update', statement.table);

        const memoryTable = this.table(statement.table);
        const matches = this.matchingRows(memoryTable, statement.where);

        const updated = matches.map(row => {
            const candidate: Row = { ...row };
            for (const value of statement.values) {
                candidate[value.column] = this.encodeValue(this.column(memoryTable, value.column), value.value);
            }
            this.checkNotNull(memoryTable, candidate);
            return { row, candidate };
        });

        for (const { row, candidate } of updated) {
            this.checkUnique(memoryTable, candidate, row);
        }
        for (const { row, candidate } of updated) {
            Object.assign(row, candidate);
        }

        return { rowCount: updated.length, rows: [] };
    }

    delete(statement: DeleteStatement): QueryResult {
        this.record('delete', statement.table);

        const memoryTable = this.table(statement.table);
        const doomed = new Set(this.matchingRows(memoryTable, statement.where));
        memoryTable.rows = memoryTable.rows.filter(row => !doomed.has(row));

        return { rowCount: doomed.size, rows: [] };
    }

    snapshot(): MemorySnapshot {
        const tables = new Map<string, { rows: Row[]; sequence: number }>();
        for (const [name, table] of this.tables) {
            tables.set(name, { rows: structuredClone(table.rows), sequence: table.sequence });
        }
        return { tables };
    }

    restore(snapshot: MemorySnapshot): void {
        for (const [name, state] of snapshot.tables) {
            const table = this.tables.get(name);
            if (table) {
                table.rows = structuredClone(state.rows);
                table.sequence = state.sequence;
            }
        }
    }

    //
    // Internals
    //

    private table(name: string): MemoryTable {
        const table = this.tables.get(name);
        if (!table) {
            throw new ExecutionError(`relation "${name}" does not exist`);
        }
        return table;
    }

    private column(table: MemoryTable, name: string): MemoryColumn {
        const column = table.columns.get(name);
        if (!column) {
            throw new ExecutionError(`column "${name}" of relation "${table.name}" does not exist`);
        }
        return column;
    }

    private insertRow(table: MemoryTable, values: readonly { column: string; value: unknown }[]): Row {
        const row: Row = {};
        for (const column of table.columns.keys()) {
            row[column] = null;
        }
        for (const value of values) {
            row[value.column] = this.encodeValue(this.column(table, value.column), value.value);
        }

        const key = row[table.primaryKey];
        if (table.autoIncrement) {
            if (isAbsent(key)) {
                row[table.primaryKey] = ++table.sequence;
            } else if (typeof key === 'number') {
                table.sequence = Math.max(table.sequence, key);
            }
        }

        this.checkNotNull(table, row);
        this.checkUnique(table, row, undefined);
        table.rows.push(row);
        return row;
    }

    private checkNotNull(table: MemoryTable, row: Row): void {
        for (const column of table.columns.values()) {
            if (!column.nullable && isAbsent(row[column.name])) {
                throw new ExecutionError(
                    `null value in column "${column.name}" of relation "${table.name}" violates not-null constraint`
                );
            }
        }
    }

    private checkUnique(table: MemoryTable, row: Row, self: Row | undefined): void {
        const key = row[table.primaryKey];
        const clash = table.rows.some(existing => existing !== self && valuesEqual(existing[table.primaryKey], key));
        if (clash) {
            throw new ExecutionError(`duplicate key value violates unique constraint "${table.name}_pkey"`);
        }
    }

    private encodeValue(column: MemoryColumn, value: unknown): unknown {
        if (isAbsent(value)) {
            return null;
        }

        switch (column.kind) {
            case FieldKind.Json:
                return JSON.stringify(value);
            case FieldKind.Array:
                if (!Array.isArray(value)) {
                    throw new ExecutionError(`malformed array literal for column "${column.name}"`);
                }
                return structuredClone(value);
            case FieldKind.Scalar:
                return value instanceof Date ? new Date(value.getTime()) : value;
        }
    }

    private decodeValue(column: MemoryColumn, value: unknown): unknown {
        if (isAbsent(value)) {
            return null;
        }
        if (column.kind === FieldKind.Json && typeof value === 'string') {
            const parsed: unknown = JSON.parse(value);
            return parsed;
        }
        return structuredClone(value);
    }

    private decodeRow(table: MemoryTable, row: Row): Row {
        const decoded: Row = {};
        for (const column of table.columns.values()) {
            decoded[column.name] = this.decodeValue(column, row[column.name]);
        }
        return decoded;
    }

    private aliasTables(table: string, alias: string, joins: readonly JoinClause[]): Map<string, MemoryTable> {
        const aliases = new Map<string, MemoryTable>([[alias, this.table(table)]]);
        for (const join of joins) {
            aliases.set(join.alias, this.table(join.table));
        }
        return aliases;
    }

    private joinedTuples(table: string, alias: string, joins: readonly JoinClause[]): Tuple[] {
        const root = this.table(table);

        return root.rows.map(row => {
            const tuple: Tuple = new Map([[alias, row]]);

            for (const join of joins) {
                const joined = this.table(join.table);
                this.column(joined, join.column);

                const parent = tuple.get(join.parentAlias) ?? null;
                const parentValue = parent ? parent[join.parentColumn] : null;
                const condition = join.condition;
                const match = isAbsent(parentValue)
                    ? undefined
                    : joined.rows.find(candidate => {
                        if (!valuesEqual(candidate[join.column], parentValue)) {
                            return false;
                        }
                        if (!condition) {
                            return true;
                        }
                        const scope: Tuple = new Map([[join.alias, candidate]]);
                        return evaluate(condition, this.resolver(scope, new Map([[join.alias, joined]]), join.alias)) === true;
                    });

                tuple.set(join.alias, match ?? null);
            }

            return tuple;
        });
    }

    private resolver(tuple: Tuple, aliases: ReadonlyMap<string, MemoryTable>, rootAlias: string): ColumnResolver {
        return (column, table) => {
            const alias = table ?? rootAlias;
            const memoryTable = aliases.get(alias);
            if (!memoryTable) {
                throw new ExecutionError(`missing FROM-clause entry for table "${alias}"`);
            }

            const definition = memoryTable.columns.get(column);
            if (!definition) {
                throw new ExecutionError(`column ${alias}.${column} does not exist`);
            }

            const row = tuple.get(alias) ?? null;
            return row ? this.decodeValue(definition, row[column]) : null;
        };
    }

    private filter(tuples: Tuple[], aliases: ReadonlyMap<string, MemoryTable>, rootAlias: string, where: Predicate | undefined): Tuple[] {
        if (!where) {
            return tuples;
        }
        return tuples.filter(tuple => evaluate(where, this.resolver(tuple, aliases, rootAlias)) === true);
    }

    private matchingRows(table: MemoryTable, where: Predicate): Row[] {
        const aliases = new Map([[table.name, table]]);
        return table.rows.filter(row => {
            const tuple: Tuple = new Map([[table.name, row]]);
            return evaluate(where, this.resolver(tuple, aliases, table.name)) === true;
        });
    }
}
