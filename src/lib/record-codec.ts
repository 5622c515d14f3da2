/**
 * Conversion between records and row values
 *
 * Encoding reads mapped columns through the record capability; decoding
 * writes decoded values back through it. Adapters hand back JSON columns as
 * parsed documents, so a string value is a JSON string document; array
 * columns must arrive as arrays.
 */

import { OrmErrors } from '@src/lib/errors/orm-error.js';
import type { ColumnValue, Row } from '@src/lib/database/statement.js';
import type { Persistable } from '@src/lib/model-record.js';
import { FieldKind, type ColumnDescriptor, type ModelDescriptor } from '@src/lib/schema/types.js';

export function encodeColumns(record: Persistable, columns: readonly ColumnDescriptor[]): ColumnValue[] {
    return columns.map(column => ({ column: column.name, kind: column.kind, value: record.value(column.name) }));
}

export function decodeValue(column: ColumnDescriptor, raw: unknown): unknown {
    if (raw === null || raw === undefined) {
        return null;
    }

    switch (column.kind) {
        case FieldKind.Json:
            return raw;
        case FieldKind.Array:
            if (!Array.isArray(raw)) {
                throw OrmErrors.invalidValue(column.name, 'array', raw);
            }
            return raw;
        case FieldKind.Scalar:
            return raw;
    }
}

/**
 * Write the selected columns of a row into the record; `alias` maps a column to its key in the row
 */
export function decodeInto(
    record: Persistable,
    columns: readonly ColumnDescriptor[],
    row: Row,
    alias: (column: string) => string = column => column
): void {
    for (const column of columns) {
        record.setValue(column.name, decodeValue(column, row[alias(column.name)]));
    }
}

export function primaryKeyOf(record: Persistable, model: ModelDescriptor): unknown {
    return record.value(model.primaryKey.column);
}

/**
 * Merge key for identifier values; identifiers compare by value
 */
export function keyString(value: unknown): string {
    if (value instanceof Date) {
        return value.toISOString();
    }
    return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Foreign keys go through the mapped column when the model maps one, else a virtual column
 */
export function writeForeignKey(record: Persistable, model: ModelDescriptor, column: string, value: unknown): void {
    if (model.column(column)) {
        record.setValue(column, value);
    } else {
        record.setVirtualValue(column, value);
    }
}

export function readForeignKey(record: Persistable, model: ModelDescriptor, column: string): unknown {
    return model.column(column) ? record.value(column) : record.virtualValue(column);
}
