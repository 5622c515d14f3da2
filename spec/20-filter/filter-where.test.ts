/**
 * FilterWhere Unit Tests
 *
 * WHERE clause generation from predicate trees with proper parameterization
 */

import { describe, test, expect } from 'vitest';
import { QueryError } from '@src/lib/errors/orm-error.js';
import { FilterOp } from '@src/lib/filter-types.js';
import { FilterWhere } from '@src/lib/filter-where.js';
import {
    and,
    arrayContainedBy,
    arrayContains,
    arrayOverlap,
    eq,
    gt,
    gte,
    ilike,
    inList,
    isNotNull,
    isNull,
    jsonContainedBy,
    jsonContains,
    jsonHasAllKeys,
    jsonHasAnyKey,
    jsonHasKey,
    jsonIsArray,
    jsonIsObject,
    jsonPathExists,
    like,
    lt,
    lte,
    matchRegex,
    matchRegexCase,
    neq,
    not,
    notIlike,
    notInList,
    notLike,
    notMatchRegex,
    notSimilarTo,
    or,
    similarTo,
} from '@src/lib/predicate.js';

describe('FilterWhere', () => {
  describe('Comparison operators', () => {
    test('should generate simple equality condition', () => {
      const { whereClause, params } = FilterWhere.generate(eq('name', 'John'));

      expect(whereClause).toBe('"name" = $1');
      expect(params).toEqual(['John']);
    });

    test('should render null equality as IS NULL', () => {
      expect(FilterWhere.generate(eq('deleted_reason', null))).toEqual({
        whereClause: '"deleted_reason" IS NULL',
        params: [],
      });
      expect(FilterWhere.generate(neq('deleted_reason', null)).whereClause).toBe('"deleted_reason" IS NOT NULL');
    });

    test('should generate ordering comparisons', () => {
      const { whereClause, params } = FilterWhere.generate(
        and(gt('age', 18), lt('age', 65), gte('score', 80), lte('score', 100), neq('status', 'banned'))
      );

      expect(whereClause).toBe('("age" > $1 AND "age" < $2 AND "score" >= $3 AND "score" <= $4 AND "status" != $5)');
      expect(params).toEqual([18, 65, 80, 100, 'banned']);
    });

    test('should generate existence checks without parameters', () => {
      expect(FilterWhere.generate(or(isNull('a'), isNotNull('b')))).toEqual({
        whereClause: '("a" IS NULL OR "b" IS NOT NULL)',
        params: [],
      });
    });
  });

  describe('Pattern operators', () => {
    test('should generate every pattern operator', () => {
      const { whereClause, params } = FilterWhere.generate(and(
        like('a', 'x%'),
        notLike('b', 'x%'),
        ilike('c', '%y'),
        notIlike('d', '%y'),
        similarTo('e', '(a|b)%'),
        notSimilarTo('f', '(a|b)%'),
        matchRegex('g', '^a'),
        matchRegexCase('h', '^a'),
        notMatchRegex('i', '^a')
      ));

      expect(whereClause).toBe(
        '("a" LIKE $1 AND "b" NOT LIKE $2 AND "c" ILIKE $3 AND "d" NOT ILIKE $4 AND ' +
        '"e" SIMILAR TO $5 AND "f" NOT SIMILAR TO $6 AND "g" ~ $7 AND "h" ~* $8 AND "i" !~ $9)'
      );
      expect(params).toEqual(['x%', 'x%', '%y', '%y', '(a|b)%', '(a|b)%', '^a', '^a', '^a']);
    });
  });

  describe('Set membership', () => {
    test('should generate IN and NOT IN lists', () => {
      const { whereClause, params } = FilterWhere.generate(
        and(inList('status', ['active', 'pending']), notInList('priority', [1, 2, 3]))
      );

      expect(whereClause).toBe('("status" IN ($1, $2) AND "priority" NOT IN ($3, $4, $5))');
      expect(params).toEqual(['active', 'pending', 1, 2, 3]);
    });

    test('should treat an empty IN as false and an empty NOT IN as true', () => {
      expect(FilterWhere.generate(inList('id', [])).whereClause).toBe('1=0');
      expect(FilterWhere.generate(notInList('id', [])).whereClause).toBe('1=1');
    });
  });

  describe('Array and JSON operators', () => {
    test('should generate array operators with ARRAY literals', () => {
      const { whereClause, params } = FilterWhere.generate(
        and(arrayContains('tags', ['a', 'b']), arrayContainedBy('tags', ['c']), arrayOverlap('tags', []))
      );

      expect(whereClause).toBe(`("tags" @> ARRAY[$1, $2] AND "tags" <@ ARRAY[$3] AND "tags" && '{}')`);
      expect(params).toEqual(['a', 'b', 'c']);
    });

    test('should send JSON documents as jsonb text', () => {
      const { whereClause, params } = FilterWhere.generate(
        and(jsonContains('settings', { theme: 'dark' }), jsonContainedBy('settings', [1, 2]))
      );

      expect(whereClause).toBe('("settings" @> $1::jsonb AND "settings" <@ $2::jsonb)');
      expect(params).toEqual(['{"theme":"dark"}', '[1,2]']);
    });

    test('should generate key and path operators', () => {
      const { whereClause, params } = FilterWhere.generate(and(
        jsonHasKey('settings', 'theme'),
        jsonHasAnyKey('settings', ['a', 'b']),
        jsonHasAllKeys('settings', ['c']),
        jsonPathExists('settings', ['ui', 'theme'])
      ));

      expect(whereClause).toBe(
        '("settings" ? $1 AND "settings" ?| $2::text[] AND "settings" ?& $3::text[] AND "settings" #> $4::text[] IS NOT NULL)'
      );
      expect(params).toEqual(['theme', ['a', 'b'], ['c'], ['ui', 'theme']]);
    });

    test('should generate type checks', () => {
      expect(FilterWhere.generate(or(jsonIsObject('doc'), jsonIsArray('doc'))).whereClause).toBe(
        `(jsonb_typeof("doc") = 'object' OR jsonb_typeof("doc") = 'array')`
      );
    });
  });

  describe('Logical operators and qualification', () => {
    test('should render NOT around its child', () => {
      expect(FilterWhere.generate(not(eq('a', 1))).whereClause).toBe('NOT ("a" = $1)');
    });

    test('should render empty combinators as constants', () => {
      expect(FilterWhere.generate(and()).whereClause).toBe('1=1');
      expect(FilterWhere.generate(or()).whereClause).toBe('1=0');
    });

    test('should render an absent predicate as 1=1', () => {
      expect(FilterWhere.generate(undefined)).toEqual({ whereClause: '1=1', params: [] });
    });

    test('should continue numbering from the starting index', () => {
      const { whereClause, params } = FilterWhere.generate(eq('id', 7), 2);

      expect(whereClause).toBe('"id" = $3');
      expect(params).toEqual([7]);
    });

    test('should qualify columns with the default alias or their own table', () => {
      const { whereClause } = FilterWhere.generate(and(eq('email', 'a'), eq('profile.bio', 'b')), 0, {
        defaultAlias: 'users',
      });

      expect(whereClause).toBe('("users"."email" = $1 AND "profile"."bio" = $2)');
    });
  });

  describe('Validation', () => {
    test('should reject invalid column names', () => {
      expect(() => FilterWhere.generate(eq('name; DROP TABLE users', 1))).toThrow(QueryError);
    });

    test('should reject null operands for ordering comparisons', () => {
      expect(() => FilterWhere.generate(gt('age', null))).toThrow('requires a non-null value');
    });

    test('should reject non-string patterns', () => {
      expect(() => FilterWhere.generate({ type: 'condition', column: 'name', operator: FilterOp.LIKE, value: 5 })).toThrow(
        'requires a string'
      );
    });
  });
});
