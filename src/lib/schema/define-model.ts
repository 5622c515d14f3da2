import { SchemaError } from '@src/lib/errors/orm-error.js';
import type { Persistable } from '@src/lib/model-record.js';
import { defaultForeignKey, isValidIdentifier, toSnakeCase } from '@src/lib/schema/naming.js';
import {
    FieldKind,
    RelationshipDirection,
    RelationshipKind,
    type ColumnDescriptor,
    type FieldDescriptor,
    type ModelDescriptor,
    type PrimaryKeyDescriptor,
    type RelationshipDescriptor,
} from '@src/lib/schema/types.js';

export interface FieldDefinition {
    name: string;
    /** Defaults to the snake_case field name; an inline field uses it as the prefix of its nested columns */
    column?: string;
    kind?: FieldKind;
    nullable?: boolean;
    /** Nested fields, inline fields only */
    fields?: readonly (FieldDefinition | string)[];
}

export interface PrimaryKeyDefinition {
    field: string;
    autoIncrement?: boolean;
    isEmpty?: (value: unknown) => boolean;
}

export interface RelationshipDefinition {
    name: string;
    kind: RelationshipKind;
    /** Defaults to Inverse */
    direction?: RelationshipDirection;
    foreignKey?: string;
    target: () => ModelDescriptor;
}

export interface ModelDefinition<T extends Persistable> {
    name: string;
    /** Defaults to the snake_case model name */
    table?: string;
    create: () => T;
    primaryKey: PrimaryKeyDefinition;
    /** A bare string declares a nullable scalar field */
    fields: readonly (FieldDefinition | string)[];
    relationships?: readonly RelationshipDefinition[];
}

/**
 * Default "unset" check for primary key values
 */
export function isEmptyKey(value: unknown): boolean {
    return value === null || value === undefined || value === 0 || value === 0n || value === '';
}

class Relationship implements RelationshipDescriptor {
    readonly name: string;
    readonly kind: RelationshipKind;
    readonly direction: RelationshipDirection;

    private readonly explicitForeignKey: string | undefined;
    private readonly ownerName: string;
    private readonly resolveTarget: () => ModelDescriptor;

    constructor(ownerName: string, definition: RelationshipDefinition) {
        this.name = definition.name;
        this.kind = definition.kind;
        this.direction = definition.direction ?? RelationshipDirection.Inverse;
        this.explicitForeignKey = definition.foreignKey;
        this.ownerName = ownerName;
        this.resolveTarget = definition.target;
        Object.freeze(this);
    }

    // Forward keys reference the target, which may not be declared yet, so the default resolves lazily
    get foreignKey(): string {
        if (this.explicitForeignKey !== undefined) {
            return this.explicitForeignKey;
        }

        return this.direction === RelationshipDirection.Inverse
            ? defaultForeignKey(this.ownerName)
            : defaultForeignKey(this.resolveTarget().name);
    }

    target(): ModelDescriptor {
        return this.resolveTarget();
    }
}

class Model<T extends Persistable> implements ModelDescriptor<T> {
    readonly name: string;
    readonly table: string;
    readonly fields: readonly FieldDescriptor[];
    readonly columns: readonly ColumnDescriptor[];
    readonly primaryKey: PrimaryKeyDescriptor;
    readonly relationships: readonly RelationshipDescriptor[];

    private readonly factory: () => T;
    private readonly columnIndex: ReadonlyMap<string, ColumnDescriptor>;
    private readonly relationshipIndex: ReadonlyMap<string, RelationshipDescriptor>;

    constructor(definition: ModelDefinition<T>) {
        this.name = definition.name;
        this.table = definition.table ?? toSnakeCase(definition.name);
        this.factory = definition.create;

        if (!isValidIdentifier(this.table)) {
            throw new SchemaError(`${this.name}: invalid table name '${this.table}'`);
        }

        this.fields = Object.freeze(definition.fields.map(field => buildField(this.name, field)));
        assertUnique(this.name, 'field', this.fields.map(field => field.name));

        this.columns = Object.freeze(flattenColumns(this.fields, '', ''));
        assertUnique(this.name, 'column', this.columns.map(column => column.name));
        this.columnIndex = new Map(this.columns.map(column => [column.name, column]));

        this.primaryKey = buildPrimaryKey(this.name, this.fields, definition.primaryKey);

        this.relationships = Object.freeze(
            (definition.relationships ?? []).map(relationship => buildRelationship(this.name, relationship))
        );
        assertUnique(this.name, 'relationship', this.relationships.map(relationship => relationship.name));
        this.relationshipIndex = new Map(this.relationships.map(relationship => [relationship.name, relationship]));

        Object.freeze(this);
    }

    create(): T {
        return this.factory();
    }

    column(name: string): ColumnDescriptor | undefined {
        return this.columnIndex.get(name);
    }

    relationship(name: string): RelationshipDescriptor | undefined {
        return this.relationshipIndex.get(name);
    }
}

/**
 * Build the immutable descriptor for one application type
 *
 * @example
 * const User = defineModel({
 *     name: 'User',
 *     table: 'users',
 *     create: () => new UserRecord(),
 *     primaryKey: { field: 'id', autoIncrement: true },
 *     fields: ['id', 'email', { name: 'settings', kind: FieldKind.Json }],
 *     relationships: [{ name: 'posts', kind: RelationshipKind.OneToMany, target: () => Post }],
 * });
 */
export function defineModel<T extends Persistable>(definition: ModelDefinition<T>): ModelDescriptor<T> {
    return new Model(definition);
}

/**
 * Physical columns of the model, inline fields flattened
 */
export function columnsOf(descriptor: ModelDescriptor): readonly ColumnDescriptor[] {
    return descriptor.columns;
}

function buildField(model: string, input: FieldDefinition | string): FieldDescriptor {
    const definition: FieldDefinition = typeof input === 'string' ? { name: input } : input;
    const kind = definition.kind ?? FieldKind.Scalar;
    const nested = definition.fields ?? [];

    if (kind === FieldKind.Inline) {
        if (nested.length === 0) {
            throw new SchemaError(`${model}.${definition.name}: inline field declares no nested fields`);
        }
    } else if (nested.length > 0) {
        throw new SchemaError(`${model}.${definition.name}: only inline fields may declare nested fields`);
    }

    // Inline fields contribute no column, so their default prefix is empty
    const column = definition.column ?? (kind === FieldKind.Inline ? '' : toSnakeCase(definition.name));
    if (kind !== FieldKind.Inline && !isValidIdentifier(column)) {
        throw new SchemaError(`${model}.${definition.name}: invalid column name '${column}'`);
    }

    return Object.freeze({
        name: definition.name,
        column,
        kind,
        nullable: definition.nullable ?? true,
        fields: Object.freeze(nested.map(field => buildField(model, field))),
    });
}

function flattenColumns(fields: readonly FieldDescriptor[], prefix: string, path: string): ColumnDescriptor[] {
    const columns: ColumnDescriptor[] = [];

    for (const field of fields) {
        const kind = field.kind;
        if (kind === FieldKind.Inline) {
            columns.push(...flattenColumns(field.fields, prefix + field.column, `${path}${field.name}.`));
            continue;
        }

        columns.push(Object.freeze({
            name: prefix + field.column,
            field: path + field.name,
            kind,
            nullable: field.nullable,
        }));
    }

    return columns;
}

function buildPrimaryKey(
    model: string,
    fields: readonly FieldDescriptor[],
    definition: PrimaryKeyDefinition
): PrimaryKeyDescriptor {
    const field = fields.find(candidate => candidate.name === definition.field);

    if (!field) {
        throw new SchemaError(`${model}: primary key field '${definition.field}' is not declared`);
    }
    if (field.kind !== FieldKind.Scalar) {
        throw new SchemaError(`${model}: primary key field '${field.name}' must be a scalar field`);
    }

    return Object.freeze({
        field: field.name,
        column: field.column,
        autoIncrement: definition.autoIncrement ?? false,
        isEmpty: definition.isEmpty ?? isEmptyKey,
    });
}

function buildRelationship(model: string, definition: RelationshipDefinition): RelationshipDescriptor {
    const relationship = new Relationship(model, definition);

    if (relationship.kind === RelationshipKind.OneToMany && relationship.direction === RelationshipDirection.Forward) {
        throw new SchemaError(`${model}.${relationship.name}: one-to-many relationships must be inverse`);
    }
    if (definition.foreignKey !== undefined && !isValidIdentifier(definition.foreignKey)) {
        throw new SchemaError(`${model}.${relationship.name}: invalid foreign key '${definition.foreignKey}'`);
    }

    return relationship;
}

function assertUnique(model: string, what: string, names: readonly string[]): void {
    const seen = new Set<string>();
    for (const name of names) {
        if (seen.has(name)) {
            throw new SchemaError(`${model}: duplicate ${what} '${name}'`);
        }
        seen.add(name);
    }
}
