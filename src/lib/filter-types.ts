/**
 * Shared types and enums for the predicate system
 *
 * Predicates are plain frozen trees. FilterWhere renders them to PostgreSQL,
 * the memory backend evaluates them directly.
 */

export enum FilterOp {
    // Comparison operators
    EQ = '$eq',
    NEQ = '$neq',
    GT = '$gt',
    GTE = '$gte',
    LT = '$lt',
    LTE = '$lte',

    // Existence operators
    NULL = '$null',
    NOT_NULL = '$notnull',

    // Pattern matching operators
    LIKE = '$like',
    NLIKE = '$nlike',
    ILIKE = '$ilike',
    NILIKE = '$nilike',
    SIMILAR = '$similar',
    NSIMILAR = '$nsimilar',
    REGEX = '$regex',   // ~
    IREGEX = '$iregex', // ~* (case-insensitive)
    NREGEX = '$nregex', // !~

    // Set membership operators
    IN = '$in',
    NIN = '$nin',

    // PostgreSQL array operations
    CONTAINS = '$contains',   // tags @> ARRAY['a', 'b']
    CONTAINED = '$contained', // tags <@ ARRAY['a', 'b']
    OVERLAP = '$overlap',     // tags && ARRAY['a', 'b']

    // jsonb operations
    JSON_CONTAINS = '$jcontains',   // doc @> '{"a":1}'::jsonb
    JSON_CONTAINED = '$jcontained', // doc <@ '{"a":1}'::jsonb
    JSON_HAS_KEY = '$haskey',       // doc ? 'a'
    JSON_HAS_ANY = '$hasany',       // doc ?| ARRAY['a', 'b']
    JSON_HAS_ALL = '$hasall',       // doc ?& ARRAY['a', 'b']
    JSON_PATH = '$path',            // doc #> ARRAY['a', 'b'] IS NOT NULL
    JSON_OBJECT = '$isobject',      // jsonb_typeof(doc) = 'object'
    JSON_ARRAY = '$isarray',        // jsonb_typeof(doc) = 'array'
}

export type LogicalOp = '$and' | '$or' | '$not';

/**
 * Leaf node: one column compared with one operand
 */
export interface ConditionNode {
    readonly type: 'condition';
    readonly column: string;
    /** Included relationship the column belongs to; the root model when absent */
    readonly table?: string;
    readonly operator: FilterOp;
    readonly value: unknown;
}

export interface LogicalNode {
    readonly type: 'logical';
    readonly op: LogicalOp;
    readonly children: readonly Predicate[];
}

export type Predicate = ConditionNode | LogicalNode;

export type SortDirection = 'asc' | 'desc';

export interface OrderSpec {
    readonly column: string;
    readonly table?: string;
    readonly sort: SortDirection;
}

export type AdapterType = 'postgresql' | 'memory';

/**
 * Operators that take no operand
 */
export const UNARY_OPERATORS: ReadonlySet<FilterOp> = new Set([
    FilterOp.NULL,
    FilterOp.NOT_NULL,
    FilterOp.JSON_OBJECT,
    FilterOp.JSON_ARRAY,
]);

/**
 * Operators whose operand is a list
 */
export const LIST_OPERATORS: ReadonlySet<FilterOp> = new Set([
    FilterOp.IN,
    FilterOp.NIN,
    FilterOp.CONTAINS,
    FilterOp.CONTAINED,
    FilterOp.OVERLAP,
    FilterOp.JSON_HAS_ANY,
    FilterOp.JSON_HAS_ALL,
    FilterOp.JSON_PATH,
]);
