/**
 * Schema Metadata Types
 *
 * Static, read-only description of each model: table, columns, primary key and
 * relationships. Produced by defineModel() and validated as a whole by Schema.
 */

import type { Persistable } from '@src/lib/model-record.js';

/**
 * Closed classification of field storage, resolved once when the model is defined
 */
export enum FieldKind {
    Scalar = 'scalar',  // Plain column
    Array = 'array',    // Native array column (text[], int[], ...)
    Json = 'json',      // jsonb document column
    Inline = 'inline',  // Embedded value flattened into the owning table
}

export type ColumnKind = Exclude<FieldKind, FieldKind.Inline>;

export enum RelationshipKind {
    OneToOne = 'one-to-one',
    OneToMany = 'one-to-many',
}

export enum RelationshipDirection {
    Forward = 'forward',  // The owning table stores the foreign key
    Inverse = 'inverse',  // The related table stores the foreign key
}

export interface FieldDescriptor {
    readonly name: string;
    /** Column name; for inline fields, the prefix applied to nested columns */
    readonly column: string;
    readonly kind: FieldKind;
    readonly nullable: boolean;
    /** Nested fields of an inline field, empty otherwise */
    readonly fields: readonly FieldDescriptor[];
}

/**
 * A physical column of the model's table, after inline fields are flattened
 */
export interface ColumnDescriptor {
    readonly name: string;
    /** Dotted field path, e.g. `address.city` */
    readonly field: string;
    readonly kind: ColumnKind;
    readonly nullable: boolean;
}

export interface PrimaryKeyDescriptor {
    readonly field: string;
    readonly column: string;
    readonly autoIncrement: boolean;
    /** True when the value counts as "unset" */
    isEmpty(value: unknown): boolean;
}

export interface RelationshipDescriptor {
    /** Slot name on the owning record */
    readonly name: string;
    readonly kind: RelationshipKind;
    readonly direction: RelationshipDirection;
    /** Foreign key column: on the owner's table for Forward, on the target's table for Inverse */
    readonly foreignKey: string;
    target(): ModelDescriptor;
}

export interface ModelDescriptor<T extends Persistable = Persistable> {
    readonly name: string;
    readonly table: string;
    readonly fields: readonly FieldDescriptor[];
    readonly columns: readonly ColumnDescriptor[];
    readonly primaryKey: PrimaryKeyDescriptor;
    readonly relationships: readonly RelationshipDescriptor[];
    /** Build an empty record; decoded rows are written into it */
    create(): T;
    column(name: string): ColumnDescriptor | undefined;
    relationship(name: string): RelationshipDescriptor | undefined;
}

/**
 * A foreign key column physically stored on a model's table
 */
export interface ForeignKeyColumn {
    readonly column: string;
    /** Model whose primary key the column references */
    readonly references: ModelDescriptor;
    /** Model declaring the relationship */
    readonly owner: ModelDescriptor;
    readonly relationship: RelationshipDescriptor;
}
