import { QueryError } from '@src/lib/errors/orm-error.js';
import type { OrderSpec, SortDirection } from '@src/lib/filter-types.js';
import { isValidIdentifier } from '@src/lib/schema/naming.js';

/**
 * FilterOrder - ORDER BY clause generation
 *
 * Matches FilterWhere: identifiers are validated then double-quoted, and a
 * column without a table qualifier is read from the default alias.
 *
 * Quick Examples:
 * - `FilterOrder.generate([desc('created_at')])` → `ORDER BY "created_at" DESC`
 * - `FilterOrder.generate([asc('name')], 'users')` → `ORDER BY "users"."name" ASC`
 */
export class FilterOrder {
    static generate(orders: readonly OrderSpec[], defaultAlias?: string): string {
        FilterOrder.validate(orders);

        if (orders.length === 0) {
            return '';
        }

        const orderClauses = orders.map(order => {
            const alias = order.table ?? defaultAlias;
            const field = alias ? `"${alias}"."${order.column}"` : `"${order.column}"`;
            return `${field} ${order.sort.toUpperCase()}`;
        });

        return `ORDER BY ${orderClauses.join(', ')}`;
    }

    /**
     * Validate field names and sort directions without generating SQL
     */
    static validate(orders: readonly OrderSpec[]): void {
        orders.forEach((order, index) => {
            if (!isValidIdentifier(order.column) || (order.table !== undefined && !isValidIdentifier(order.table))) {
                throw new QueryError(
                    `Invalid order specification at index ${index}: invalid field name format`,
                    'FILTER_INVALID_ORDER_FIELD_FORMAT'
                );
            }
            if (!isSortDirection(order.sort)) {
                throw new QueryError(
                    `Invalid order specification at index ${index}: sort must be 'asc' or 'desc'`,
                    'FILTER_INVALID_SORT_DIRECTION'
                );
            }
        });
    }
}

function isSortDirection(value: string): value is SortDirection {
    return value === 'asc' || value === 'desc';
}
