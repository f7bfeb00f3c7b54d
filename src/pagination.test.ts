/**
 * Unit tests for the pagination module.
 */

import { describe, expect, it } from 'vitest';
import * as z from 'zod';
import { forwardPageArgs, forwardPageSchema, pageOf } from './pagination.js';
import { NO_PARAMS } from './params.js';
import { objectType } from './result-types.js';
import { Scalars } from './scalars.js';

const Bill = objectType(z.object({ id: Scalars.ID.schema, amount: Scalars.Int.schema }));

describe('Pagination Module', () => {
  describe('pageOf', () => {
    it('should select page info and edge nodes', () => {
      expect(pageOf(Bill).renderSelectionSet(NO_PARAMS, '')).toBe(
        ' { pageInfo { startCursor hasNextPage } edges { node { id amount } } }',
      );
    });

    it('should decode a page', () => {
      const page = pageOf(Bill).schema.parse({
        pageInfo: { startCursor: 'c0', hasNextPage: true },
        edges: [{ node: { id: 'B1', amount: 4212 } }, { node: { id: 'B2', amount: 1 } }],
      });

      expect(page.pageInfo.hasNextPage).toBe(true);
      expect(page.edges.map((edge) => edge.node.id)).toEqual(['B1', 'B2']);
    });

    it('should reject a page without page info', () => {
      const result = forwardPageSchema(Bill.schema).safeParse({ edges: [] });
      expect(result.success).toBe(false);
    });
  });

  describe('forwardPageArgs', () => {
    it('should declare first and after', () => {
      const args = forwardPageArgs({ first: 10 });

      expect(args.renderFormal()).toBe('($first: Int, $after: String)');
      expect(args.renderActual('bills_')).toBe('(first: $bills_first, after: $bills_after)');
      expect(args.renderVariableMap()).toEqual({ first: 10, after: null });
    });

    it('should carry a cursor', () => {
      expect(forwardPageArgs({ first: 5, after: 'c9' }).renderVariableMap()).toEqual({
        first: 5,
        after: 'c9',
      });
    });
  });
});
