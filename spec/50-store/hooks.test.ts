/**
 * Lifecycle Hook Tests
 *
 * Hook order per operation, transaction promotion for after-hooks, and failure handling
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { HookError } from '@src/lib/errors/orm-error.js';
import type { HookName, LifecycleHooks } from '@src/lib/hooks.js';
import { hasAfterHooks, hasHook } from '@src/lib/hooks.js';
import { CategoryRecord } from '@spec/helpers/fixtures.js';
import { createTestDatabase, statementLog } from '@spec/helpers/test-database.js';

class AuditedCategory extends CategoryRecord implements LifecycleHooks {
    readonly calls: HookName[] = [];
    failOn: HookName | null = null;

    beforeInsert(): void { this.note('beforeInsert'); }
    beforeUpdate(): void { this.note('beforeUpdate'); }
    beforeSave(): void { this.note('beforeSave'); }
    beforeDelete(): void { this.note('beforeDelete'); }
    async afterInsert(): Promise<void> { this.note('afterInsert'); }
    async afterUpdate(): Promise<void> { this.note('afterUpdate'); }
    async afterSave(): Promise<void> { this.note('afterSave'); }
    async afterDelete(): Promise<void> { this.note('afterDelete'); }

    private note(hook: HookName): void {
        this.calls.push(hook);
        if (this.failOn === hook) {
            throw new Error(`${hook} refused`);
        }
    }
}

class NormalizedCategory extends CategoryRecord {
    beforeSave(): void {
        this.label = this.label.trim();
    }
}

class SluggedCategory extends CategoryRecord {
    beforeInsert(): void {
        if (this.code === '') {
            this.code = this.label.toLowerCase().replace(/\s+/g, '-');
        }
    }
}

function audited(code = 'news'): AuditedCategory {
    const category = new AuditedCategory();
    category.code = code;
    category.label = 'News';
    return category;
}

describe('Lifecycle hooks', () => {
  let env: ReturnType<typeof createTestDatabase>;

  beforeEach(() => {
    env = createTestDatabase();
  });

  test('should detect hooks by name', () => {
    expect(hasHook(new NormalizedCategory(), 'beforeSave')).toBe(true);
    expect(hasHook(new NormalizedCategory(), 'afterSave')).toBe(false);
    expect(hasAfterHooks(new NormalizedCategory(), 'insert')).toBe(false);
    expect(hasAfterHooks(audited(), 'delete')).toBe(true);
  });

  test('should run insert hooks around the statement', async () => {
    const category = audited();

    await env.categories.insert(category);

    expect(category.calls).toEqual(['beforeSave', 'beforeInsert', 'afterInsert', 'afterSave']);
    expect(statementLog(env.memory)).toEqual(['begin', 'insert categories', 'commit']);
  });

  test('should run update hooks around the statement', async () => {
    const category = audited();
    await env.categories.insert(category);
    category.calls.length = 0;

    await env.categories.update(category);

    expect(category.calls).toEqual(['beforeSave', 'beforeUpdate', 'afterUpdate', 'afterSave']);
  });

  test('should run delete hooks around the statement', async () => {
    const category = audited();
    await env.categories.insert(category);
    category.calls.length = 0;

    await env.categories.delete(category);

    expect(category.calls).toEqual(['beforeDelete', 'afterDelete']);
  });

  test('should apply changes made by a before-hook', async () => {
    const category = new NormalizedCategory();
    category.code = 'news';
    category.label = '  News  ';

    await env.categories.insert(category);

    expect(env.memory.rows('categories')).toEqual([{ code: 'news', label: 'News' }]);
    expect(statementLog(env.memory)).toEqual(['insert categories']);
  });

  test('should let a before-hook assign the caller key', async () => {
    const category = new SluggedCategory();
    category.label = 'Weekly News';

    await env.categories.insert(category);

    expect(category.code).toBe('weekly-news');
    expect(env.memory.rows('categories')).toEqual([{ code: 'weekly-news', label: 'Weekly News' }]);
  });

  test('should reject an unset caller key once the before-hooks have run', async () => {
    const category = new CategoryRecord();
    category.label = 'News';

    const error = await env.categories.insert(category).catch((caught: unknown) => caught);

    expect(error).toHaveProperty('code', 'EMPTY_PRIMARY_KEY');
    expect(category.isPersisted()).toBe(false);
    expect(statementLog(env.memory)).toEqual([]);
  });

  test('should abort before the statement when a before-hook fails', async () => {
    const category = audited();
    category.failOn = 'beforeInsert';

    const error = await env.categories.insert(category).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HookError);
    expect(error).toHaveProperty('hook', 'beforeInsert');
    expect(error).toHaveProperty('model', 'Category');
    expect(category.calls).toEqual(['beforeSave', 'beforeInsert']);
    expect(statementLog(env.memory)).toEqual(['begin', 'rollback']);
  });

  test('should roll back the write when an after-hook fails', async () => {
    const category = audited();
    category.failOn = 'afterSave';

    const error = await env.categories.insert(category).catch((caught: unknown) => caught);

    expect(error).toHaveProperty('message', 'Category.afterSave failed: afterSave refused');
    expect(error).toHaveProperty('rolledBack', true);
    expect(env.memory.rows('categories')).toEqual([]);
    expect(category.isPersisted()).toBe(false);
  });

  test('should restore the persisted flag when an after-delete hook fails', async () => {
    const category = audited();
    await env.categories.insert(category);
    category.failOn = 'afterDelete';

    await expect(env.categories.delete(category)).rejects.toThrow('Category.afterDelete failed: afterDelete refused');

    expect(category.isPersisted()).toBe(true);
    expect(env.memory.rows('categories')).toHaveLength(1);
  });
});
