/**
 * graphql-param-client
 *
 * Pagination Module
 *
 * Forward (cursor) pagination: the `{ pageInfo, edges { node } }` envelope,
 * its result type, and the `first`/`after` arguments that drive it.
 */

import * as z from 'zod';
import { group, param, type QueryParams } from './params.js';
import { ResultType } from './result-types.js';
import { Scalars } from './scalars.js';

export const ForwardPageInfoSchema = z.object({
  startCursor: z.string(),
  hasNextPage: z.boolean(),
});

export type ForwardPageInfo = z.infer<typeof ForwardPageInfoSchema>;

/**
 * Schema of one page of `node` values.
 */
export function forwardPageSchema<S extends z.ZodType>(nodeSchema: S) {
  return z.object({
    pageInfo: ForwardPageInfoSchema,
    edges: z.array(z.object({ node: nodeSchema })),
  });
}

export type ForwardPageSchema<S extends z.ZodType> = ReturnType<typeof forwardPageSchema<S>>;

/** Decoded page of `T` values. */
export interface ForwardPage<T> {
  pageInfo: ForwardPageInfo;
  edges: Array<{ node: T }>;
}

class PageResultType<S extends z.ZodType, P extends QueryParams> extends ResultType<
  ForwardPageSchema<S>,
  P
> {
  constructor(private readonly node: ResultType<S, P>) {
    super(forwardPageSchema(node.schema));
  }

  renderSelectionBody(params: P, prefix: string): string {
    const node = `node${this.node.renderSelectionSet(params, prefix)}`;
    return `pageInfo { startCursor hasNextPage } edges { ${node} }`;
  }
}

/**
 * Result type of a page of `node` values. The node's selection set is
 * rendered with the page's parameters and prefix.
 *
 * @example
 * ```typescript
 * const Bills = pageOf(Bill);
 * Bills.renderSelectionSet(NO_PARAMS, '');
 * // ' { pageInfo { startCursor hasNextPage } edges { node { id amount } } }'
 * ```
 */
export function pageOf<S extends z.ZodType, P extends QueryParams>(
  node: ResultType<S, P>,
): ResultType<ForwardPageSchema<S>, P> {
  return new PageResultType<S, P>(node);
}

/**
 * Arguments for a forward-paginated field.
 */
export function forwardPageArgs(options: { first?: number | null; after?: string | null } = {}) {
  return group({
    first: param(Scalars.Int, options.first ?? null),
    after: param(Scalars.String, options.after ?? null),
  });
}

export type ForwardPageArgs = ReturnType<typeof forwardPageArgs>;
