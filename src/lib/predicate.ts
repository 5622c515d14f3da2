/**
 * Predicate builders
 *
 * Every builder returns a frozen node. A column may be qualified with the
 * name of an included one-to-one relationship: `eq('profile.bio', 'x')`.
 */

import { FilterOp, type ConditionNode, type LogicalNode, type OrderSpec, type Predicate } from '@src/lib/filter-types.js';
import type { JsonValue } from '@src/lib/model-record.js';

function splitColumn(column: string): { column: string; table?: string } {
    const dot = column.indexOf('.');
    if (dot === -1) {
        return { column };
    }
    return { table: column.slice(0, dot), column: column.slice(dot + 1) };
}

function condition(column: string, operator: FilterOp, value: unknown): ConditionNode {
    return Object.freeze({ type: 'condition', ...splitColumn(column), operator, value });
}

function list<T>(values: readonly T[]): readonly T[] {
    return Object.freeze([...values]);
}

function logical(op: LogicalNode['op'], children: readonly Predicate[]): LogicalNode {
    return Object.freeze({ type: 'logical', op, children: list(children) });
}

// Comparison

export function eq(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.EQ, value);
}

export function neq(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.NEQ, value);
}

export function gt(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.GT, value);
}

export function gte(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.GTE, value);
}

export function lt(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.LT, value);
}

export function lte(column: string, value: unknown): Predicate {
    return condition(column, FilterOp.LTE, value);
}

export function isNull(column: string): Predicate {
    return condition(column, FilterOp.NULL, null);
}

export function isNotNull(column: string): Predicate {
    return condition(column, FilterOp.NOT_NULL, null);
}

// Pattern matching

export function like(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.LIKE, pattern);
}

export function notLike(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.NLIKE, pattern);
}

export function ilike(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.ILIKE, pattern);
}

export function notIlike(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.NILIKE, pattern);
}

export function similarTo(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.SIMILAR, pattern);
}

export function notSimilarTo(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.NSIMILAR, pattern);
}

export function matchRegex(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.REGEX, pattern);
}

/**
 * Case-insensitive regular expression match (`~*`)
 */
export function matchRegexCase(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.IREGEX, pattern);
}

export function notMatchRegex(column: string, pattern: string): Predicate {
    return condition(column, FilterOp.NREGEX, pattern);
}

// Set membership

/**
 * An empty list never matches
 */
export function inList(column: string, values: readonly unknown[]): Predicate {
    return condition(column, FilterOp.IN, list(values));
}

/**
 * An empty list always matches
 */
export function notInList(column: string, values: readonly unknown[]): Predicate {
    return condition(column, FilterOp.NIN, list(values));
}

// Array columns

export function arrayContains(column: string, values: readonly unknown[]): Predicate {
    return condition(column, FilterOp.CONTAINS, list(values));
}

export function arrayContainedBy(column: string, values: readonly unknown[]): Predicate {
    return condition(column, FilterOp.CONTAINED, list(values));
}

export function arrayOverlap(column: string, values: readonly unknown[]): Predicate {
    return condition(column, FilterOp.OVERLAP, list(values));
}

// JSON documents

export function jsonContains(column: string, document: JsonValue): Predicate {
    return condition(column, FilterOp.JSON_CONTAINS, structuredClone(document));
}

export function jsonContainedBy(column: string, document: JsonValue): Predicate {
    return condition(column, FilterOp.JSON_CONTAINED, structuredClone(document));
}

export function jsonHasKey(column: string, key: string): Predicate {
    return condition(column, FilterOp.JSON_HAS_KEY, key);
}

/**
 * Matches when at least one of the keys is present at the top level
 */
export function jsonHasAnyKey(column: string, keys: readonly string[]): Predicate {
    return condition(column, FilterOp.JSON_HAS_ANY, list(keys));
}

export function jsonHasAllKeys(column: string, keys: readonly string[]): Predicate {
    return condition(column, FilterOp.JSON_HAS_ALL, list(keys));
}

/**
 * Matches when the document has a value at the path (`#>` yields non-NULL)
 */
export function jsonPathExists(column: string, path: readonly string[]): Predicate {
    return condition(column, FilterOp.JSON_PATH, list(path));
}

export function jsonIsObject(column: string): Predicate {
    return condition(column, FilterOp.JSON_OBJECT, null);
}

export function jsonIsArray(column: string): Predicate {
    return condition(column, FilterOp.JSON_ARRAY, null);
}

// Combinators

export function and(...predicates: Predicate[]): Predicate {
    return logical('$and', predicates);
}

export function or(...predicates: Predicate[]): Predicate {
    return logical('$or', predicates);
}

export function not(predicate: Predicate): Predicate {
    return logical('$not', [predicate]);
}

// Ordering

export function asc(column: string): OrderSpec {
    return Object.freeze({ ...splitColumn(column), sort: 'asc' });
}

export function desc(column: string): OrderSpec {
    return Object.freeze({ ...splitColumn(column), sort: 'desc' });
}

/**
 * Walk every leaf of the tree
 */
export function conditionsOf(predicate: Predicate): ConditionNode[] {
    if (predicate.type === 'condition') {
        return [predicate];
    }
    return predicate.children.flatMap(conditionsOf);
}
