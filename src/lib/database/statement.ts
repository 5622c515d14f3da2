/**
 * Statement IR
 *
 * Backend-neutral description of the statements the engine issues. The
 * PostgreSQL adapter renders these to SQL; the memory adapter interprets them.
 */

import type { OrderSpec, Predicate } from '@src/lib/filter-types.js';
import type { ColumnKind } from '@src/lib/schema/types.js';

export type Row = Record<string, unknown>;

/**
 * A column read by a SELECT, returned under `alias`
 */
export interface SelectColumn {
    /** Table alias the column is read from */
    readonly source: string;
    readonly column: string;
    readonly alias: string;
    readonly kind: ColumnKind;
}

/**
 * LEFT JOIN `table` AS `alias` ON alias.column = parentAlias.parentColumn [AND condition]
 */
export interface JoinClause {
    readonly table: string;
    readonly alias: string;
    readonly column: string;
    readonly parentAlias: string;
    readonly parentColumn: string;
    /** Extra match condition; unqualified columns belong to the joined table */
    readonly condition?: Predicate;
}

export interface SelectStatement {
    readonly type: 'select';
    readonly table: string;
    readonly alias: string;
    readonly columns: readonly SelectColumn[];
    readonly joins: readonly JoinClause[];
    /** Leaf conditions without a table qualifier apply to the root alias */
    readonly where?: Predicate;
    readonly order: readonly OrderSpec[];
    readonly limit?: number;
    readonly offset?: number;
}

/**
 * Joins are kept only so qualified conditions resolve; one-to-one joins never change the count
 */
export interface CountStatement {
    readonly type: 'count';
    readonly table: string;
    readonly alias: string;
    readonly joins: readonly JoinClause[];
    readonly where?: Predicate;
}

export interface ColumnValue {
    readonly column: string;
    readonly kind: ColumnKind;
    readonly value: unknown;
}

export interface InsertStatement {
    readonly type: 'insert';
    readonly table: string;
    readonly values: readonly ColumnValue[];
    /** Columns the backend reports back, e.g. a generated primary key */
    readonly returning: readonly string[];
}

export interface UpdateStatement {
    readonly type: 'update';
    readonly table: string;
    readonly values: readonly ColumnValue[];
    readonly where: Predicate;
}

export interface DeleteStatement {
    readonly type: 'delete';
    readonly table: string;
    readonly where: Predicate;
}

export type WriteStatement = InsertStatement | UpdateStatement | DeleteStatement;

export type Statement = SelectStatement | CountStatement | WriteStatement;

export interface QueryResult {
    /** Rows affected by a write, or the count of a count statement */
    readonly rowCount: number;
    readonly rows: readonly Row[];
}

/**
 * Forward-only cursor over the rows of a SELECT
 */
export interface RowCursor {
    /** Up to `count` rows; an empty array means the cursor is exhausted */
    read(count: number): Promise<Row[]>;
    /** Idempotent */
    close(): Promise<void>;
}
