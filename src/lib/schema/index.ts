export * from '@src/lib/schema/types.js';
export * from '@src/lib/schema/define-model.js';
export * from '@src/lib/schema/schema.js';
export { toSnakeCase, defaultForeignKey } from '@src/lib/schema/naming.js';
