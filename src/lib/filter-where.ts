import { QueryError } from '@src/lib/errors/orm-error.js';
import { FilterOp, LIST_OPERATORS, type ConditionNode, type LogicalNode, type Predicate } from '@src/lib/filter-types.js';
import { isValidIdentifier } from '@src/lib/schema/naming.js';

export interface FilterWhereOptions {
    /** Alias used to qualify conditions that name no table; unqualified columns when absent */
    defaultAlias?: string;
}

/**
 * FilterWhere - PostgreSQL WHERE clause generation
 *
 * Renders a predicate tree into parameterized SQL. Identifiers are validated
 * and double-quoted; every operand becomes a `$n` placeholder.
 *
 * Quick Examples:
 * - Simple: `FilterWhere.generate(eq('name', 'John'))` → `"name" = $1`
 * - Offset: `FilterWhere.generate(eq('id', 7), 2)` → uses $3
 * - Qualified: `FilterWhere.generate(eq('profile.bio', 'x'), 0, { defaultAlias: 'users' })`
 */
export class FilterWhere {
    private _paramValues: unknown[] = [];
    private _paramIndex: number;

    constructor(
        private readonly startingParamIndex: number = 0,
        private readonly options: FilterWhereOptions = {}
    ) {
        this._paramIndex = startingParamIndex;
    }

    /**
     * Add parameter to collection and return PostgreSQL placeholder
     */
    private PARAM(value: unknown): string {
        this._paramValues.push(value);
        return `$${++this._paramIndex}`;
    }

    /**
     * Static entry point for WHERE clause generation with validation.
     * An absent predicate renders as `1=1`.
     */
    static generate(
        predicate: Predicate | undefined,
        startingParamIndex: number = 0,
        options: FilterWhereOptions = {}
    ): { whereClause: string; params: unknown[] } {
        if (predicate) {
            FilterWhere.validate(predicate);
        }
        return new FilterWhere(startingParamIndex, options).build(predicate);
    }

    /**
     * Validate identifiers and operand shapes without generating SQL
     */
    static validate(predicate: Predicate): void {
        if (predicate.type === 'logical') {
            if (predicate.op === '$not' && predicate.children.length !== 1) {
                throw new QueryError('$not requires exactly one condition', 'FILTER_INVALID_NOT_CONDITION');
            }
            predicate.children.forEach(child => FilterWhere.validate(child));
            return;
        }

        FilterWhere.validateCondition(predicate);
    }

    private static validateCondition(condition: ConditionNode): void {
        if (!isValidIdentifier(condition.column)) {
            throw new QueryError(`Invalid field name format: ${condition.column}`, 'FILTER_INVALID_FIELD_FORMAT');
        }
        if (condition.table !== undefined && !isValidIdentifier(condition.table)) {
            throw new QueryError(`Invalid table name format: ${condition.table}`, 'FILTER_INVALID_FIELD_FORMAT');
        }

        const { operator, value } = condition;

        if (LIST_OPERATORS.has(operator) && !Array.isArray(value)) {
            throw new QueryError(`Operator ${operator} requires array data`, 'FILTER_OPERATOR_REQUIRES_ARRAY');
        }

        switch (operator) {
            case FilterOp.LIKE:
            case FilterOp.NLIKE:
            case FilterOp.ILIKE:
            case FilterOp.NILIKE:
            case FilterOp.SIMILAR:
            case FilterOp.NSIMILAR:
            case FilterOp.REGEX:
            case FilterOp.IREGEX:
            case FilterOp.NREGEX:
            case FilterOp.JSON_HAS_KEY:
                if (typeof value !== 'string') {
                    throw new QueryError(`Operator ${operator} requires a string`, 'FILTER_OPERATOR_REQUIRES_STRING');
                }
                break;
            case FilterOp.GT:
            case FilterOp.GTE:
            case FilterOp.LT:
            case FilterOp.LTE:
                if (value === null || value === undefined) {
                    throw new QueryError(`Operator ${operator} requires a non-null value`, 'FILTER_OPERATOR_REQUIRES_VALUE');
                }
                break;
            default:
                break;
        }
    }

    /**
     * Build WHERE clause from a predicate tree
     */
    build(predicate: Predicate | undefined): { whereClause: string; params: unknown[] } {
        this._paramValues = [];
        this._paramIndex = this.startingParamIndex;

        const whereClause = predicate ? this.buildNode(predicate) : '1=1';
        return { whereClause, params: this._paramValues };
    }

    /**
     * Number of the last placeholder used, for statements that append parameters
     */
    get paramIndex(): number {
        return this._paramIndex;
    }

    private buildNode(node: Predicate): string {
        return node.type === 'logical' ? this.buildLogicalSQL(node) : this.buildSQLCondition(node);
    }

    private quoteField(condition: ConditionNode): string {
        const alias = condition.table ?? this.options.defaultAlias;
        return alias ? `"${alias}"."${condition.column}"` : `"${condition.column}"`;
    }

    /**
     * Build individual SQL condition with proper parameterization
     */
    private buildSQLCondition(condition: ConditionNode): string {
        const quotedField = this.quoteField(condition);
        const data = condition.value;

        switch (condition.operator) {
            case FilterOp.EQ:
                if (data === null || data === undefined) {
                    return `${quotedField} IS NULL`;
                }
                return `${quotedField} = ${this.PARAM(data)}`;

            case FilterOp.NEQ:
                if (data === null || data === undefined) {
                    return `${quotedField} IS NOT NULL`;
                }
                return `${quotedField} != ${this.PARAM(data)}`;

            case FilterOp.GT:
                return `${quotedField} > ${this.PARAM(data)}`;

            case FilterOp.GTE:
                return `${quotedField} >= ${this.PARAM(data)}`;

            case FilterOp.LT:
                return `${quotedField} < ${this.PARAM(data)}`;

            case FilterOp.LTE:
                return `${quotedField} <= ${this.PARAM(data)}`;

            case FilterOp.NULL:
                return `${quotedField} IS NULL`;

            case FilterOp.NOT_NULL:
                return `${quotedField} IS NOT NULL`;

            case FilterOp.LIKE:
                return `${quotedField} LIKE ${this.PARAM(data)}`;

            case FilterOp.NLIKE:
                return `${quotedField} NOT LIKE ${this.PARAM(data)}`;

            case FilterOp.ILIKE:
                return `${quotedField} ILIKE ${this.PARAM(data)}`;

            case FilterOp.NILIKE:
                return `${quotedField} NOT ILIKE ${this.PARAM(data)}`;

            case FilterOp.SIMILAR:
                return `${quotedField} SIMILAR TO ${this.PARAM(data)}`;

            case FilterOp.NSIMILAR:
                return `${quotedField} NOT SIMILAR TO ${this.PARAM(data)}`;

            case FilterOp.REGEX:
                return `${quotedField} ~ ${this.PARAM(data)}`;

            case FilterOp.IREGEX:
                return `${quotedField} ~* ${this.PARAM(data)}`;

            case FilterOp.NREGEX:
                return `${quotedField} !~ ${this.PARAM(data)}`;

            case FilterOp.IN: {
                const values = asList(data);
                if (values.length === 0) {
                    return '1=0'; // No values = always false
                }
                return `${quotedField} IN (${values.map(v => this.PARAM(v)).join(', ')})`;
            }

            case FilterOp.NIN: {
                const values = asList(data);
                if (values.length === 0) {
                    return '1=1'; // No values = always true
                }
                return `${quotedField} NOT IN (${values.map(v => this.PARAM(v)).join(', ')})`;
            }

            case FilterOp.CONTAINS:
                return `${quotedField} @> ${this.arrayLiteral(data)}`;

            case FilterOp.CONTAINED:
                return `${quotedField} <@ ${this.arrayLiteral(data)}`;

            case FilterOp.OVERLAP:
                return `${quotedField} && ${this.arrayLiteral(data)}`;

            case FilterOp.JSON_CONTAINS:
                return `${quotedField} @> ${this.PARAM(JSON.stringify(data))}::jsonb`;

            case FilterOp.JSON_CONTAINED:
                return `${quotedField} <@ ${this.PARAM(JSON.stringify(data))}::jsonb`;

            case FilterOp.JSON_HAS_KEY:
                return `${quotedField} ? ${this.PARAM(data)}`;

            case FilterOp.JSON_HAS_ANY:
                return `${quotedField} ?| ${this.PARAM(asList(data))}::text[]`;

            case FilterOp.JSON_HAS_ALL:
                return `${quotedField} ?& ${this.PARAM(asList(data))}::text[]`;

            case FilterOp.JSON_PATH:
                return `${quotedField} #> ${this.PARAM(asList(data))}::text[] IS NOT NULL`;

            case FilterOp.JSON_OBJECT:
                return `jsonb_typeof(${quotedField}) = 'object'`;

            case FilterOp.JSON_ARRAY:
                return `jsonb_typeof(${quotedField}) = 'array'`;
        }
    }

    /**
     * ARRAY[$1, $2] for PostgreSQL array operators; an empty list is the empty array literal
     */
    private arrayLiteral(data: unknown): string {
        const values = asList(data);
        if (values.length === 0) {
            return `'{}'`;
        }
        return `ARRAY[${values.map(v => this.PARAM(v)).join(', ')}]`;
    }

    /**
     * Build SQL for logical operators
     */
    private buildLogicalSQL(node: LogicalNode): string {
        const clauses = node.children.map(child => this.buildNode(child));

        switch (node.op) {
            case '$and':
                if (clauses.length === 0) {
                    return '1=1'; // Empty AND = always true
                }
                return `(${clauses.join(' AND ')})`;

            case '$or':
                if (clauses.length === 0) {
                    return '1=0'; // Empty OR = always false
                }
                return `(${clauses.join(' OR ')})`;

            case '$not':
                return `NOT (${clauses.join(' AND ')})`;
        }
    }
}

function asList(data: unknown): readonly unknown[] {
    return Array.isArray(data) ? data : [data];
}
