import { OrmErrors } from '@src/lib/errors/orm-error.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type RelationshipValue = Persistable | readonly Persistable[] | null;

/**
 * Record capability consumed by the engine
 *
 * Application types expose their mapped columns and relationship slots by
 * name. The engine never inspects fields any other way.
 */
export interface Persistable {
    value(column: string): unknown;
    setValue(column: string, value: unknown): void;

    /** Current slot content; undefined when the slot was never loaded or assigned */
    relationship(name: string): RelationshipValue | undefined;
    setRelationship(name: string, value: RelationshipValue): void;

    isPersisted(): boolean;
    setPersisted(persisted: boolean): void;
    isWritable(): boolean;
    setWritable(writable: boolean): void;

    virtualValue(column: string): unknown;
    setVirtualValue(column: string, value: unknown): void;
    virtualColumns(): ReadonlyMap<string, unknown>;
    clearVirtualColumns(): void;
}

export type RecordClass<T> = new (...args: never[]) => T;

/**
 * Base class for application records
 *
 * Holds the engine-managed state: persisted and writable flags plus virtual
 * columns (foreign keys the type does not map as fields). Subclasses implement
 * the column and relationship accessors.
 */
export abstract class ModelRecord implements Persistable {
    private persisted = false;
    private writable = true;
    private readonly virtual = new Map<string, unknown>();

    abstract value(column: string): unknown;
    abstract setValue(column: string, value: unknown): void;
    abstract relationship(name: string): RelationshipValue | undefined;
    abstract setRelationship(name: string, value: RelationshipValue): void;

    isPersisted(): boolean {
        return this.persisted;
    }

    setPersisted(persisted: boolean): void {
        this.persisted = persisted;
    }

    /**
     * False for records decoded from a partial projection or a filtered relationship load
     */
    isWritable(): boolean {
        return this.writable;
    }

    setWritable(writable: boolean): void {
        this.writable = writable;
    }

    virtualValue(column: string): unknown {
        return this.virtual.get(column);
    }

    setVirtualValue(column: string, value: unknown): void {
        this.virtual.set(column, value);
    }

    virtualColumns(): ReadonlyMap<string, unknown> {
        return this.virtual;
    }

    clearVirtualColumns(): void {
        this.virtual.clear();
    }
}

//
// Narrowing helpers for hand-written accessors
//

export function expectString(value: unknown, column: string): string {
    if (typeof value !== 'string') {
        throw OrmErrors.invalidValue(column, 'string', value);
    }
    return value;
}

export function optionalString(value: unknown, column: string): string | null {
    return value === null || value === undefined ? null : expectString(value, column);
}

/**
 * Accepts numeric strings as well: PostgreSQL returns bigint and numeric columns as text
 */
export function expectNumber(value: unknown, column: string): number {
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) {
            return parsed;
        }
    }
    throw OrmErrors.invalidValue(column, 'number', value);
}

export function optionalNumber(value: unknown, column: string): number | null {
    return value === null || value === undefined ? null : expectNumber(value, column);
}

export function expectBoolean(value: unknown, column: string): boolean {
    if (typeof value !== 'boolean') {
        throw OrmErrors.invalidValue(column, 'boolean', value);
    }
    return value;
}

export function expectDate(value: unknown, column: string): Date {
    if (value instanceof Date) {
        return value;
    }
    if (typeof value === 'string' || typeof value === 'number') {
        const date = new Date(value);
        if (!Number.isNaN(date.getTime())) {
            return date;
        }
    }
    throw OrmErrors.invalidValue(column, 'date', value);
}

export function optionalDate(value: unknown, column: string): Date | null {
    return value === null || value === undefined ? null : expectDate(value, column);
}

export function expectArray(value: unknown, column: string): unknown[] {
    if (!Array.isArray(value)) {
        throw OrmErrors.invalidValue(column, 'array', value);
    }
    return [...value];
}

export function expectStringArray(value: unknown, column: string): string[] {
    return expectArray(value, column).map(item => expectString(item, column));
}

export function expectNumberArray(value: unknown, column: string): number[] {
    return expectArray(value, column).map(item => expectNumber(item, column));
}

export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isJsonValue);
    }
    if (typeof value === 'object') {
        const proto: unknown = Object.getPrototypeOf(value);
        return (proto === Object.prototype || proto === null) && Object.values(value).every(isJsonValue);
    }
    return false;
}

export function expectJson(value: unknown, column: string): JsonValue {
    if (!isJsonValue(value)) {
        throw OrmErrors.invalidValue(column, 'JSON value', value);
    }
    return value;
}

/**
 * Narrow a one-to-one slot value to the record type
 */
export function oneOf<T>(value: RelationshipValue, type: RecordClass<T>, name: string): T | null {
    if (value === null) {
        return null;
    }
    if (value instanceof type) {
        return value;
    }
    throw OrmErrors.invalidValue(name, type.name, value);
}

/**
 * Narrow a one-to-many slot value to an array of the record type
 */
export function manyOf<T>(value: RelationshipValue, type: RecordClass<T>, name: string): T[] {
    if (value === null) {
        return [];
    }
    if (!isRecordList(value)) {
        throw OrmErrors.invalidValue(name, `${type.name}[]`, value);
    }

    return value.map(item => {
        if (item instanceof type) {
            return item;
        }
        throw OrmErrors.invalidValue(name, type.name, item);
    });
}

export function isRecordList(value: RelationshipValue | undefined): value is readonly Persistable[] {
    return Array.isArray(value);
}
