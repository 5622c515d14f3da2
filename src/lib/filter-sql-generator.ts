import { QueryError } from '@src/lib/errors/orm-error.js';
import { FilterOrder } from '@src/lib/filter-order.js';
import { FilterWhere } from '@src/lib/filter-where.js';
import type {
    ColumnValue,
    CountStatement,
    DeleteStatement,
    InsertStatement,
    SelectStatement,
    Statement,
    UpdateStatement,
} from '@src/lib/database/statement.js';
import { isValidIdentifier } from '@src/lib/schema/naming.js';
import { FieldKind } from '@src/lib/schema/types.js';

export interface SqlQuery {
    query: string;
    params: unknown[];
}

/**
 * FilterSqlGenerator - PostgreSQL text for the statement IR
 *
 * Pure functions from statement to SQL + parameters. WHERE and ORDER BY are
 * delegated to FilterWhere and FilterOrder; placeholders continue after any
 * parameters the statement itself uses (SET values come first).
 */
export class FilterSqlGenerator {
    static toSQL(statement: Statement): SqlQuery {
        switch (statement.type) {
            case 'select':
                return this.toSelectSQL(statement);
            case 'count':
                return this.toCountSQL(statement);
            case 'insert':
                return this.toInsertSQL(statement);
            case 'update':
                return this.toUpdateSQL(statement);
            case 'delete':
                return this.toDeleteSQL(statement);
        }
    }

    /**
     * SELECT with aliased columns, LEFT JOINs, WHERE, ORDER BY and LIMIT/OFFSET
     */
    static toSelectSQL(statement: SelectStatement): SqlQuery {
        if (statement.columns.length === 0) {
            throw new QueryError(`SELECT on ${statement.table} has no columns`, 'FILTER_EMPTY_SELECT');
        }

        const selectClause = statement.columns
            .map(column => `${this.qualify(column.source, column.column)} AS ${this.quote(column.alias)}`)
            .join(', ');

        const joins = this.buildJoinClauses(statement.joins);
        const { whereClause, params } = FilterWhere.generate(statement.where, joins.params.length, {
            defaultAlias: statement.alias,
        });
        const orderClause = FilterOrder.generate(statement.order, statement.alias);

        const query = [
            `SELECT ${selectClause}`,
            `FROM ${this.quote(statement.table)} AS ${this.quote(statement.alias)}`,
            ...joins.clauses,
            statement.where ? `WHERE ${whereClause}` : '',
            orderClause,
            this.buildLimitClause(statement.limit, statement.offset),
        ].filter(Boolean).join(' ');

        return { query, params: [...joins.params, ...params] };
    }

    static toCountSQL(statement: CountStatement): SqlQuery {
        const joins = this.buildJoinClauses(statement.joins);
        const { whereClause, params } = FilterWhere.generate(statement.where, joins.params.length, {
            defaultAlias: statement.alias,
        });

        const query = [
            `SELECT COUNT(*) AS "count" FROM ${this.quote(statement.table)} AS ${this.quote(statement.alias)}`,
            ...joins.clauses,
            statement.where ? `WHERE ${whereClause}` : '',
        ].filter(Boolean).join(' ');

        return { query, params: [...joins.params, ...params] };
    }

    static toInsertSQL(statement: InsertStatement): SqlQuery {
        const returning = statement.returning.length > 0
            ? ` RETURNING ${statement.returning.map(column => this.quote(column)).join(', ')}`
            : '';

        if (statement.values.length === 0) {
            return { query: `INSERT INTO ${this.quote(statement.table)} DEFAULT VALUES${returning}`, params: [] };
        }

        const columns = statement.values.map(value => this.quote(value.column)).join(', ');
        const placeholders = statement.values.map((_value, index) => `$${index + 1}`).join(', ');

        return {
            query: `INSERT INTO ${this.quote(statement.table)} (${columns}) VALUES (${placeholders})${returning}`,
            params: statement.values.map(value => this.encodeValue(value)),
        };
    }

    static toUpdateSQL(statement: UpdateStatement): SqlQuery {
        if (statement.values.length === 0) {
            throw new QueryError(`UPDATE on ${statement.table} sets no columns`, 'FILTER_EMPTY_UPDATE');
        }

        const setClause = statement.values
            .map((value, index) => `${this.quote(value.column)} = $${index + 1}`)
            .join(', ');
        const { whereClause, params } = FilterWhere.generate(statement.where, statement.values.length);

        return {
            query: `UPDATE ${this.quote(statement.table)} SET ${setClause} WHERE ${whereClause}`,
            params: [...statement.values.map(value => this.encodeValue(value)), ...params],
        };
    }

    static toDeleteSQL(statement: DeleteStatement): SqlQuery {
        const { whereClause, params } = FilterWhere.generate(statement.where);
        return { query: `DELETE FROM ${this.quote(statement.table)} WHERE ${whereClause}`, params };
    }

    /**
     * JSON documents travel as text so arrays are not sent as PostgreSQL arrays
     */
    static encodeValue(value: ColumnValue): unknown {
        if (value.kind === FieldKind.Json && value.value !== null && value.value !== undefined) {
            return JSON.stringify(value.value);
        }
        return value.value ?? null;
    }

    // ============================================================================
    // Private Helper Methods
    // ============================================================================

    /**
     * LEFT JOIN clauses; join conditions take the first placeholders
     */
    private static buildJoinClauses(joins: SelectStatement['joins']): { clauses: string[]; params: unknown[] } {
        const clauses: string[] = [];
        const params: unknown[] = [];

        for (const join of joins) {
            let clause =
                `LEFT JOIN ${this.quote(join.table)} AS ${this.quote(join.alias)} ` +
                `ON ${this.qualify(join.alias, join.column)} = ${this.qualify(join.parentAlias, join.parentColumn)}`;

            if (join.condition) {
                const condition = FilterWhere.generate(join.condition, params.length, { defaultAlias: join.alias });
                clause += ` AND ${condition.whereClause}`;
                params.push(...condition.params);
            }

            clauses.push(clause);
        }

        return { clauses, params };
    }

    private static buildLimitClause(limit?: number, offset?: number): string {
        const parts: string[] = [];
        if (limit !== undefined) {
            parts.push(`LIMIT ${limit}`);
        }
        if (offset !== undefined && offset > 0) {
            parts.push(`OFFSET ${offset}`);
        }
        return parts.join(' ');
    }

    private static quote(identifier: string): string {
        if (!isValidIdentifier(identifier)) {
            throw new QueryError(`Invalid identifier format: ${identifier}`, 'FILTER_INVALID_FIELD_FORMAT');
        }
        return `"${identifier}"`;
    }

    private static qualify(alias: string, column: string): string {
        return `${this.quote(alias)}.${this.quote(column)}`;
    }
}
