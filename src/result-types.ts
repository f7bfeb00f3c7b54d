/**
 * graphql-param-client
 *
 * Result Types Module
 *
 * A result type pairs the zod schema that decodes a response value with the
 * selection set that asks the server for that value. Object types render
 * their fields in schema order; nested fields extend the variable prefix the
 * same way parameter groups do, so arguments bound inside a selection line
 * up with the variables declared for the operation.
 */

import * as z from 'zod';
import { joinPrefix } from './buffers.js';
import { InvalidInputError } from './errors.js';
import { assertName, NO_PARAMS, type NoParams, type QueryParams } from './params.js';
import type { ScalarCodec } from './scalars.js';

/**
 * Renders one field of an object selection.
 */
export interface FieldSelection<P extends QueryParams = QueryParams> {
  render(name: string, params: P, prefix: string): string;
}

/**
 * Decoder and selection renderer for the value of one field.
 */
export abstract class ResultType<S extends z.ZodType, P extends QueryParams = QueryParams> {
  constructor(readonly schema: S) {}

  /** Fields to select, without braces; `''` for scalars. */
  abstract renderSelectionBody(params: P, prefix: string): string;

  /** Body wrapped as ` { ... }`, or `''` when there is nothing to select. */
  renderSelectionSet(params: P, prefix: string): string {
    const body = this.renderSelectionBody(params, prefix);
    return body === '' ? '' : ` { ${body} }`;
  }
}

/** Decoded value of a result type. */
export type ResultOf<R> = R extends { readonly schema: infer S extends z.ZodType }
  ? z.output<S>
  : never;

/** Field selections of an object type, keyed by field name. */
export type SelectionMap<S extends z.ZodObject, P extends QueryParams> = {
  [K in keyof S['shape'] & string]?: FieldSelection<P>;
};

class ScalarResultType<S extends z.ZodType, P extends QueryParams> extends ResultType<S, P> {
  renderSelectionBody(): string {
    return '';
  }
}

class ObjectResultType<S extends z.ZodObject, P extends QueryParams> extends ResultType<S, P> {
  private readonly fields: ReadonlyArray<readonly [string, FieldSelection<P> | undefined]>;

  constructor(schema: S, selections: SelectionMap<S, P>) {
    super(schema);
    const byName: Partial<Record<string, FieldSelection<P>>> = selections;
    const names = Object.keys(schema.shape);

    for (const name of names) {
      assertName(name, 'field name');
    }
    for (const name of Object.keys(byName)) {
      if (!names.includes(name)) {
        throw new InvalidInputError(`Selection given for unknown field "${name}"`, name);
      }
    }

    this.fields = names.map((name) => [name, byName[name]] as const);
  }

  renderSelectionBody(params: P, prefix: string): string {
    return this.fields
      .map(([name, selection]) => (selection ? selection.render(name, params, prefix) : name))
      .join(' ');
  }
}

class WrappedResultType<S extends z.ZodType, P extends QueryParams> extends ResultType<S, P> {
  constructor(
    schema: S,
    private readonly inner: ResultType<z.ZodType, P>,
  ) {
    super(schema);
  }

  renderSelectionBody(params: P, prefix: string): string {
    return this.inner.renderSelectionBody(params, prefix);
  }
}

/**
 * Result type of a scalar field; selects nothing below it.
 */
export function scalarResult<S extends z.ZodType, P extends QueryParams = QueryParams>(
  codec: ScalarCodec<S>,
): ResultType<S, P> {
  return new ScalarResultType<S, P>(codec.schema);
}

/**
 * Result type of an object. Every key of the schema is selected, in order;
 * fields without a selection are rendered bare.
 *
 * @throws {InvalidInputError} If a selection names a field the schema lacks
 *
 * @example
 * ```typescript
 * const Bill = objectType(z.object({ id: Scalars.ID.schema, amount: Scalars.Int.schema }));
 *
 * const Account = objectType(
 *   z.object({ id: Scalars.ID.schema, owner: Owner.schema }),
 *   { owner: nested(Owner) },
 * );
 * ```
 */
export function objectType<S extends z.ZodObject, P extends QueryParams = QueryParams>(
  schema: S,
  selections: SelectionMap<S, P> = {},
): ResultType<S, P> {
  return new ObjectResultType<S, P>(schema, selections);
}

/**
 * Result type of a list; selects the same fields as its element type.
 */
export function listOf<S extends z.ZodType, P extends QueryParams>(
  type: ResultType<S, P>,
): ResultType<z.ZodArray<S>, P> {
  return new WrappedResultType<z.ZodArray<S>, P>(z.array(type.schema), type);
}

/**
 * Result type of a nullable value; selects the same fields as the inner type.
 */
export function nullableOf<S extends z.ZodType, P extends QueryParams>(
  type: ResultType<S, P>,
): ResultType<z.ZodNullable<S>, P> {
  return new WrappedResultType<z.ZodNullable<S>, P>(z.nullable(type.schema), type);
}

/**
 * Selects a field whose type takes no arguments.
 */
export function nested<S extends z.ZodType>(type: ResultType<S, NoParams>): FieldSelection {
  return {
    render: (name, _params, prefix) =>
      `${name}${type.renderSelectionSet(NO_PARAMS, joinPrefix(prefix, name))}`,
  };
}

/**
 * Selects a field that takes arguments. `select` picks the field's own
 * parameter tree out of the enclosing one; its arguments are bound here,
 * under the field's prefix.
 *
 * @example
 * ```typescript
 * const Account = objectType<typeof AccountSchema, AccountParams>(AccountSchema, {
 *   bills: nestedWith(listOf(Bill), (params) => params.fields.bills),
 * });
 * // account(id: $id) { id bills(first: $bills_first) { id amount } }
 * ```
 */
export function nestedWith<S extends z.ZodType, P extends QueryParams, Q extends QueryParams>(
  type: ResultType<S, Q>,
  select: (params: P) => Q,
): FieldSelection<P> {
  return {
    render: (name, params, prefix) => {
      const sub = select(params);
      const childPrefix = joinPrefix(prefix, name);
      return `${name}${sub.renderActual(childPrefix)}${type.renderSelectionSet(sub, childPrefix)}`;
    },
  };
}
