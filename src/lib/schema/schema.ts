import { SchemaError } from '@src/lib/errors/orm-error.js';
import {
    FieldKind,
    RelationshipDirection,
    type ForeignKeyColumn,
    type ModelDescriptor,
} from '@src/lib/schema/types.js';

/**
 * Schema - the validated set of models a Database works with
 *
 * Resolves every relationship once and indexes the foreign key columns each
 * table carries. A mapped scalar column may double as a foreign key; any
 * other collision is an error.
 */
export class Schema {
    private readonly registered: ReadonlySet<ModelDescriptor>;
    private readonly byName: ReadonlyMap<string, ModelDescriptor>;
    private readonly foreignKeyIndex: ReadonlyMap<ModelDescriptor, readonly ForeignKeyColumn[]>;

    constructor(models: readonly ModelDescriptor[]) {
        this.registered = new Set(models);
        this.byName = indexModels(models);
        this.foreignKeyIndex = indexForeignKeys(models, this.registered);
    }

    get models(): readonly ModelDescriptor[] {
        return [...this.registered];
    }

    has(model: ModelDescriptor): boolean {
        return this.registered.has(model);
    }

    model(name: string): ModelDescriptor | undefined {
        return this.byName.get(name);
    }

    /**
     * Foreign key columns stored on the model's table
     */
    foreignKeys(model: ModelDescriptor): readonly ForeignKeyColumn[] {
        return this.foreignKeyIndex.get(model) ?? [];
    }

    /**
     * Every physical column of the model's table: mapped columns first, then
     * foreign keys that no field maps
     */
    tableColumns(model: ModelDescriptor): readonly string[] {
        const columns = model.columns.map(column => column.name);
        for (const foreignKey of this.foreignKeys(model)) {
            if (!columns.includes(foreignKey.column)) {
                columns.push(foreignKey.column);
            }
        }
        return columns;
    }
}

function indexModels(models: readonly ModelDescriptor[]): Map<string, ModelDescriptor> {
    const byName = new Map<string, ModelDescriptor>();
    const tables = new Set<string>();

    for (const model of models) {
        if (byName.has(model.name)) {
            throw new SchemaError(`Duplicate model name '${model.name}'`);
        }
        if (tables.has(model.table)) {
            throw new SchemaError(`Duplicate table name '${model.table}' (model ${model.name})`);
        }
        byName.set(model.name, model);
        tables.add(model.table);
    }

    return byName;
}

function indexForeignKeys(
    models: readonly ModelDescriptor[],
    registered: ReadonlySet<ModelDescriptor>
): Map<ModelDescriptor, ForeignKeyColumn[]> {
    const index = new Map<ModelDescriptor, ForeignKeyColumn[]>(models.map(model => [model, []]));

    for (const owner of models) {
        for (const relationship of owner.relationships) {
            const target = relationship.target();
            if (!registered.has(target)) {
                throw new SchemaError(
                    `${owner.name}.${relationship.name}: target model '${target.name}' is not registered`
                );
            }

            const inverse = relationship.direction === RelationshipDirection.Inverse;
            const table = inverse ? target : owner;
            const entry: ForeignKeyColumn = {
                column: relationship.foreignKey,
                references: inverse ? owner : target,
                owner,
                relationship,
            };

            const mapped = table.column(entry.column);
            if (mapped && mapped.kind !== FieldKind.Scalar) {
                throw new SchemaError(
                    `${owner.name}.${relationship.name}: foreign key '${entry.column}' collides with ${mapped.kind} column of ${table.name}`
                );
            }
            if (entry.column === table.primaryKey.column) {
                throw new SchemaError(
                    `${owner.name}.${relationship.name}: foreign key '${entry.column}' is the primary key of ${table.name}`
                );
            }

            const columns = index.get(table) ?? [];
            const clash = columns.find(existing => existing.column === entry.column);
            if (clash && clash.references === entry.references) {
                continue; // Both sides of one link, e.g. User.posts and Post.author
            }
            if (clash) {
                throw new SchemaError(
                    `${owner.name}.${relationship.name}: foreign key '${entry.column}' on ${table.table} is already used by ${clash.owner.name}.${clash.relationship.name}`
                );
            }
            columns.push(Object.freeze(entry));
            index.set(table, columns);
        }
    }

    return index;
}
