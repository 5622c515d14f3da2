/**
 * Lifecycle Hooks
 *
 * Records may implement any subset of the eight hooks below. The store checks
 * each hook by name before invoking it; there is no base class to inherit.
 * A hook fails by throwing (or rejecting); the failure surfaces as a HookError.
 */

import { HookError } from '@src/lib/errors/orm-error.js';

export type HookResult = void | Promise<void>;

export interface LifecycleHooks {
    beforeInsert(): HookResult;
    beforeUpdate(): HookResult;
    beforeSave(): HookResult;
    beforeDelete(): HookResult;
    afterInsert(): HookResult;
    afterUpdate(): HookResult;
    afterSave(): HookResult;
    afterDelete(): HookResult;
}

export type HookName = keyof LifecycleHooks;

/**
 * Write operations that run hooks
 */
export type WriteOperation = 'insert' | 'update' | 'delete';

/**
 * Hook execution matrix - which hooks run before and after the statement for each operation
 */
export const HOOK_SEQUENCE = {
    insert: { before: ['beforeSave', 'beforeInsert'], after: ['afterInsert', 'afterSave'] },
    update: { before: ['beforeSave', 'beforeUpdate'], after: ['afterUpdate', 'afterSave'] },
    delete: { before: ['beforeDelete'], after: ['afterDelete'] },
} as const satisfies Record<WriteOperation, { before: readonly HookName[]; after: readonly HookName[] }>;

export function hasHook<K extends HookName>(record: object, hook: K): record is Pick<LifecycleHooks, K> {
    return typeof Reflect.get(record, hook) === 'function';
}

/**
 * True when the record implements any after-hook for the operation.
 * Such a record forces the operation into a transaction so the write can be
 * rolled back when the hook fails.
 */
export function hasAfterHooks(record: object, operation: WriteOperation): boolean {
    return HOOK_SEQUENCE[operation].after.some(hook => hasHook(record, hook));
}

/**
 * Run the named hooks in order, stopping at the first failure
 */
export async function runHooks(record: object, hooks: readonly HookName[], model: string): Promise<void> {
    for (const hook of hooks) {
        if (!hasHook(record, hook)) {
            continue;
        }

        try {
            await record[hook]();
        } catch (error) {
            throw new HookError(hook, model, error);
        }
    }
}
