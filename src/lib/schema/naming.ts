/**
 * Identifier naming helpers shared by the schema builder and SQL rendering
 */

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Convert a field or model name to its default column/table name
 *
 * Examples: `createdAt` → `created_at`, `HTTPStatus` → `http_status`, `User` → `user`
 */
export function toSnakeCase(name: string): string {
    return name
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .replace(/[-\s]+/g, '_')
        .toLowerCase();
}

export function isValidIdentifier(name: string): boolean {
    return IDENTIFIER_PATTERN.test(name);
}

/**
 * Default foreign key column for a key referencing the named model
 */
export function defaultForeignKey(modelName: string): string {
    return `${toSnakeCase(modelName)}_id`;
}
