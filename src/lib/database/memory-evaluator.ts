/**
 * Predicate evaluation for the memory backend
 *
 * Follows SQL three-valued logic: a comparison against NULL is unknown
 * (`null`), NOT of unknown stays unknown, and only rows evaluating to `true`
 * pass a WHERE clause.
 */

import { isDeepStrictEqual } from 'util';
import { ExecutionError } from '@src/lib/errors/orm-error.js';
import { FilterOp, type ConditionNode, type Predicate, type SortDirection } from '@src/lib/filter-types.js';

export type Truth = boolean | null;

/**
 * Resolves a (possibly qualified) column of the current row to its decoded value
 */
export type ColumnResolver = (column: string, table: string | undefined) => unknown;

export function evaluate(predicate: Predicate, resolve: ColumnResolver): Truth {
    if (predicate.type === 'condition') {
        return evaluateCondition(predicate, resolve(predicate.column, predicate.table));
    }

    const results = predicate.children.map(child => evaluate(child, resolve));

    switch (predicate.op) {
        case '$and':
            if (results.includes(false)) {
                return false;
            }
            return results.includes(null) ? null : true;
        case '$or':
            if (results.includes(true)) {
                return true;
            }
            return results.includes(null) ? null : false;
        case '$not': {
            const inner = results[0] ?? null;
            return inner === null ? null : !inner;
        }
    }
}

function evaluateCondition(condition: ConditionNode, actual: unknown): Truth {
    const operand = condition.value;
    const operator = condition.operator;

    if (operator === FilterOp.NULL) {
        return isAbsent(actual);
    }
    if (operator === FilterOp.NOT_NULL) {
        return !isAbsent(actual);
    }

    // Mirrors FilterWhere: eq/neq against null render as IS [NOT] NULL
    if (operator === FilterOp.EQ && isAbsent(operand)) {
        return isAbsent(actual);
    }
    if (operator === FilterOp.NEQ && isAbsent(operand)) {
        return !isAbsent(actual);
    }

    if (isAbsent(actual)) {
        return null;
    }

    switch (operator) {
        case FilterOp.EQ:
            return valuesEqual(actual, operand);
        case FilterOp.NEQ:
            return !valuesEqual(actual, operand);
        case FilterOp.GT:
            return compareValues(actual, operand) > 0;
        case FilterOp.GTE:
            return compareValues(actual, operand) >= 0;
        case FilterOp.LT:
            return compareValues(actual, operand) < 0;
        case FilterOp.LTE:
            return compareValues(actual, operand) <= 0;

        case FilterOp.LIKE:
            return likePattern(operand, '').test(String(actual));
        case FilterOp.NLIKE:
            return !likePattern(operand, '').test(String(actual));
        case FilterOp.ILIKE:
            return likePattern(operand, 'i').test(String(actual));
        case FilterOp.NILIKE:
            return !likePattern(operand, 'i').test(String(actual));
        case FilterOp.SIMILAR:
            return similarPattern(operand).test(String(actual));
        case FilterOp.NSIMILAR:
            return !similarPattern(operand).test(String(actual));
        case FilterOp.REGEX:
            return regexPattern(operand, '').test(String(actual));
        case FilterOp.IREGEX:
            return regexPattern(operand, 'i').test(String(actual));
        case FilterOp.NREGEX:
            return !regexPattern(operand, '').test(String(actual));

        case FilterOp.IN:
            return inList(actual, asList(operand));
        case FilterOp.NIN: {
            const found = inList(actual, asList(operand));
            return found === null ? null : !found;
        }

        case FilterOp.CONTAINS:
            return asList(operand).every(item => asArrayColumn(actual).some(element => valuesEqual(element, item)));
        case FilterOp.CONTAINED:
            return asArrayColumn(actual).every(element => asList(operand).some(item => valuesEqual(element, item)));
        case FilterOp.OVERLAP:
            return asArrayColumn(actual).some(element => asList(operand).some(item => valuesEqual(element, item)));

        case FilterOp.JSON_CONTAINS:
            return jsonContains(actual, operand, true);
        case FilterOp.JSON_CONTAINED:
            return jsonContains(operand, actual, true);
        case FilterOp.JSON_HAS_KEY:
            return jsonHasKey(actual, String(operand));
        case FilterOp.JSON_HAS_ANY:
            return asList(operand).some(key => jsonHasKey(actual, String(key)));
        case FilterOp.JSON_HAS_ALL:
            return asList(operand).every(key => jsonHasKey(actual, String(key)));
        case FilterOp.JSON_PATH:
            return jsonPathExists(actual, asList(operand));
        case FilterOp.JSON_OBJECT:
            return isPlainObject(actual);
        case FilterOp.JSON_ARRAY:
            return Array.isArray(actual);
    }
}

/**
 * SQL IN: unknown when nothing matched and the list holds a NULL
 */
function inList(actual: unknown, values: readonly unknown[]): Truth {
    if (values.some(value => !isAbsent(value) && valuesEqual(actual, value))) {
        return true;
    }
    return values.some(isAbsent) ? null : false;
}

export function isAbsent(value: unknown): value is null | undefined {
    return value === null || value === undefined;
}

function asList(value: unknown): readonly unknown[] {
    return Array.isArray(value) ? value : [value];
}

function asArrayColumn(value: unknown): readonly unknown[] {
    if (!Array.isArray(value)) {
        throw new ExecutionError('operator does not exist: array operator applied to a non-array column');
    }
    return value;
}

function normalize(value: unknown): unknown {
    if (value instanceof Date) {
        return value.getTime();
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    return value;
}

/**
 * Align a numeric string with a number the way PostgreSQL coerces literals
 */
function coercePair(left: unknown, right: unknown): [unknown, unknown] {
    const a = normalize(left);
    const b = normalize(right);

    if (typeof a === 'number' && typeof b === 'string' && b.trim() !== '' && Number.isFinite(Number(b))) {
        return [a, Number(b)];
    }
    if (typeof a === 'string' && typeof b === 'number' && a.trim() !== '' && Number.isFinite(Number(a))) {
        return [Number(a), b];
    }
    return [a, b];
}

export function valuesEqual(left: unknown, right: unknown): boolean {
    const [a, b] = coercePair(left, right);
    if (typeof a === 'object' || typeof b === 'object') {
        return isDeepStrictEqual(a, b);
    }
    return a === b;
}

/**
 * Total order over non-null values of the same column
 */
export function compareValues(left: unknown, right: unknown): number {
    const [a, b] = coercePair(left, right);

    if (typeof a === 'number' && typeof b === 'number') {
        return a - b;
    }
    if (typeof a === 'boolean' && typeof b === 'boolean') {
        return Number(a) - Number(b);
    }

    const x = typeof a === 'string' ? a : JSON.stringify(a);
    const y = typeof b === 'string' ? b : JSON.stringify(b);
    return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * ORDER BY comparison: NULLS LAST for ascending, NULLS FIRST for descending
 */
export function compareForOrder(left: unknown, right: unknown, sort: SortDirection): number {
    const leftAbsent = isAbsent(left);
    const rightAbsent = isAbsent(right);

    if (leftAbsent || rightAbsent) {
        if (leftAbsent && rightAbsent) {
            return 0;
        }
        const nullsHigh = leftAbsent ? 1 : -1;
        return sort === 'asc' ? nullsHigh : -nullsHigh;
    }

    const result = compareValues(left, right);
    return sort === 'asc' ? result : -result;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function likePattern(pattern: unknown, flags: string): RegExp {
    const text = String(pattern);
    let source = '';

    for (let i = 0; i < text.length; i++) {
        const ch = text.charAt(i);
        if (ch === '\\' && i + 1 < text.length) {
            source += escapeRegExp(text.charAt(++i));
        } else if (ch === '%') {
            source += '[\\s\\S]*';
        } else if (ch === '_') {
            source += '[\\s\\S]';
        } else {
            source += escapeRegExp(ch);
        }
    }

    return new RegExp(`^${source}$`, flags);
}

/**
 * SIMILAR TO: LIKE wildcards plus regular expression alternation, grouping and repetition
 */
function similarPattern(pattern: unknown): RegExp {
    const text = String(pattern);
    let source = '';

    for (let i = 0; i < text.length; i++) {
        const ch = text.charAt(i);
        if (ch === '\\' && i + 1 < text.length) {
            source += escapeRegExp(text.charAt(++i));
        } else if (ch === '%') {
            source += '[\\s\\S]*';
        } else if (ch === '_') {
            source += '[\\s\\S]';
        } else if (ch === '.' || ch === '^' || ch === '$') {
            source += `\\${ch}`;
        } else {
            source += ch;
        }
    }

    return compile(`^(?:${source})$`, '');
}

function regexPattern(pattern: unknown, flags: string): RegExp {
    return compile(String(pattern), flags);
}

function compile(source: string, flags: string): RegExp {
    try {
        return new RegExp(source, flags);
    } catch (error) {
        throw new ExecutionError(`invalid regular expression: ${source}`, error);
    }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * jsonb containment (`@>`): objects match by key subset, arrays by element
 * subset, and a top-level array contains a bare scalar it holds
 */
export function jsonContains(document: unknown, candidate: unknown, topLevel: boolean): boolean {
    if (Array.isArray(document)) {
        const elements: readonly unknown[] = document;
        if (Array.isArray(candidate)) {
            return candidate.every(item => elements.some(element => jsonContains(element, item, false)));
        }
        if (topLevel && !isPlainObject(candidate)) {
            return elements.some(element => jsonContains(element, candidate, false));
        }
        return false;
    }

    if (isPlainObject(document)) {
        const record = document;
        if (!isPlainObject(candidate)) {
            return false;
        }
        return Object.entries(candidate).every(
            ([key, value]) => Object.hasOwn(record, key) && jsonContains(record[key], value, false)
        );
    }

    return !Array.isArray(candidate) && !isPlainObject(candidate) && document === candidate;
}

function jsonHasKey(document: unknown, key: string): boolean {
    if (isPlainObject(document)) {
        return Object.hasOwn(document, key);
    }
    if (Array.isArray(document)) {
        return document.some(element => element === key);
    }
    return document === key;
}

function jsonPathExists(document: unknown, path: readonly unknown[]): boolean {
    let current: unknown = document;

    for (const segment of path) {
        const key = String(segment);

        if (Array.isArray(current)) {
            if (!/^-?\d+$/.test(key)) {
                return false;
            }
            const raw = Number(key);
            const index = raw < 0 ? current.length + raw : raw;
            if (index < 0 || index >= current.length) {
                return false;
            }
            current = current[index];
        } else if (isPlainObject(current) && Object.hasOwn(current, key)) {
            current = current[key];
        } else {
            return false;
        }
    }

    return true;
}
