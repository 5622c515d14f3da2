/**
 * Schema Tests
 *
 * Whole-graph validation and the foreign key index.
 */

import { describe, test, expect } from 'vitest';
import { SchemaError } from '@src/lib/errors/orm-error.js';
import {
    RelationshipDirection,
    RelationshipKind,
    Schema,
    defineModel,
    type RelationshipDefinition,
} from '@src/lib/schema/index.js';
import { CategoryRecord, Category, Post, Profile, User, schema } from '@spec/helpers/fixtures.js';

function categoryModel(name: string, table: string, relationships: RelationshipDefinition[] = []) {
  return defineModel({
    name,
    table,
    create: () => new CategoryRecord(),
    primaryKey: { field: 'code' },
    fields: ['code', 'label'],
    relationships,
  });
}

describe('Schema', () => {
  test('should index registered models', () => {
    expect(schema.models).toEqual([User, Post, Profile, Category]);
    expect(schema.has(User)).toBe(true);
    expect(schema.model('Post')).toBe(Post);
    expect(schema.model('Missing')).toBeUndefined();
  });

  test('should list foreign keys stored on each table', () => {
    expect(schema.foreignKeys(Post).map(foreignKey => [foreignKey.column, foreignKey.references.name])).toEqual([
      ['user_id', 'User'],
    ]);
    expect(schema.foreignKeys(Profile).map(foreignKey => foreignKey.column)).toEqual(['user_id']);
    expect(schema.foreignKeys(User)).toEqual([]);
  });

  test('should list table columns with unmapped foreign keys last', () => {
    expect(schema.tableColumns(Profile)).toEqual(['id', 'bio', 'location_city', 'location_country', 'user_id']);
    expect(schema.tableColumns(Post)).toEqual(['id', 'title', 'published', 'views', 'user_id']);
  });

  test('should reject unregistered relationship targets', () => {
    expect(() => new Schema([User, Post])).toThrow("target model 'Profile' is not registered");
  });

  test('should reject duplicate table names', () => {
    expect(() => new Schema([categoryModel('A', 'same'), categoryModel('B', 'same')])).toThrow(
      "Duplicate table name 'same' (model B)"
    );
  });

  test('should reject duplicate model names', () => {
    expect(() => new Schema([categoryModel('A', 'first'), categoryModel('A', 'second')])).toThrow(SchemaError);
  });

  test('should reject a foreign key on the primary key column', () => {
    const owner = categoryModel('Owner', 'owners', [
      { name: 'child', kind: RelationshipKind.OneToOne, foreignKey: 'code', target: () => Category },
    ]);

    expect(() => new Schema([owner, Category])).toThrow("foreign key 'code' is the primary key of Category");
  });

  test('should reject two relationships sharing a column for different models', () => {
    const first = categoryModel('First', 'firsts', [
      { name: 'item', kind: RelationshipKind.OneToOne, foreignKey: 'parent_id', target: () => Category },
    ]);
    const second = categoryModel('Second', 'seconds', [
      { name: 'item', kind: RelationshipKind.OneToOne, foreignKey: 'parent_id', target: () => Category },
    ]);

    expect(() => new Schema([first, second, Category])).toThrow("foreign key 'parent_id' on categories is already used");
  });

  test('should accept both sides of one link', () => {
    const link = categoryModel('Link', 'links', [
      {
        name: 'category',
        kind: RelationshipKind.OneToOne,
        direction: RelationshipDirection.Forward,
        target: () => Category,
      },
    ]);

    const linked = new Schema([link, Category]);
    expect(linked.foreignKeys(link).map(foreignKey => foreignKey.column)).toEqual(['category_id']);
  });
});
