/**
 * graphql-param-client
 *
 * Query Parameters Module
 *
 * Parameter trees describe the arguments of a query. Every node writes its
 * formal declarations, actual bindings and variable values into the buffers
 * under a prefix supplied by its parent, so the same parameter type can be
 * embedded at several places in one document without its variable names
 * colliding.
 */

import type * as z from 'zod';
import { joinPrefix, type JsonValue, ParamBuffer, VariableBuffer } from './buffers.js';
import { InvalidInputError, SerializationError } from './errors.js';
import type { ScalarCodec } from './scalars.js';

const NAME_PATTERN = /^[_A-Za-z][_0-9A-Za-z]*$/;

/**
 * Throws unless `name` is a valid GraphQL name.
 *
 * @throws {InvalidInputError}
 */
export function assertName(name: string, kind = 'name'): void {
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidInputError(`Invalid GraphQL ${kind}: "${name}"`, name);
  }
}

/**
 * A node in a parameter tree.
 *
 * Subclasses implement the three `contribute*` operations; the `render*`
 * operations are built on them and are not meant to be overridden.
 */
export abstract class QueryParams {
  /** Pushes `$<prefix><name>: <type>` declarations for this node and its children. */
  abstract contributeFormal(buffer: ParamBuffer, prefix: string): void;

  /** Pushes `<name>: $<prefix><name>` bindings for this node's own arguments. */
  abstract contributeActual(buffer: ParamBuffer, prefix: string): void;

  /** Pushes the JSON value of every argument in this node and its children. */
  abstract contributeVariables(buffer: VariableBuffer, prefix: string): void;

  /** Operation signature, e.g. `($id: ID!, $account_first: Int)`. */
  renderFormal(): string {
    const buffer = new ParamBuffer();
    this.contributeFormal(buffer, '');
    return buffer.consume();
  }

  /** Field arguments for this node rendered under `prefix`. */
  renderActual(prefix: string): string {
    const buffer = new ParamBuffer();
    this.contributeActual(buffer, prefix);
    return buffer.consume();
  }

  /**
   * Flattened variables of the whole tree.
   *
   * @throws {SerializationError} If a value cannot be encoded or two names collide
   */
  renderVariableMap(): Record<string, JsonValue> {
    const buffer = new VariableBuffer();
    this.contributeVariables(buffer, '');
    return buffer.toMap();
  }

  /** Flattened variables of the whole tree as indented JSON. */
  renderVariables(): string {
    const buffer = new VariableBuffer();
    this.contributeVariables(buffer, '');
    return buffer.toJsonString();
  }
}

/**
 * A query without arguments.
 */
export class NoParams extends QueryParams {
  contributeFormal(): void {}

  contributeActual(): void {}

  contributeVariables(): void {}
}

export const NO_PARAMS = new NoParams();

/**
 * A single argument: a value, its GraphQL type and the schema that encodes it.
 *
 * The argument's name is the key it is stored under in its {@link ParamGroup}.
 */
export class Param<S extends z.ZodType = z.ZodType> {
  constructor(
    /** GraphQL type as written in the operation signature, e.g. `Int` or `ID!` */
    readonly wireType: string,
    readonly schema: S,
    readonly value: z.output<S> | null,
  ) {}

  /** Same argument declared as non-null. */
  required(): Param<S> {
    if (this.wireType.endsWith('!')) return this;
    return new Param(`${this.wireType}!`, this.schema, this.value);
  }

  get isRequired(): boolean {
    return this.wireType.endsWith('!');
  }

  /**
   * Encodes the value for the variables payload.
   *
   * @param name - Variable name reported in errors
   * @throws {SerializationError}
   */
  toJsonValue(name?: string): unknown {
    if (this.value === null) {
      if (this.isRequired) {
        throw new SerializationError(
          `Required ${this.wireType} argument${name ? ` ${name}` : ''} has no value`,
          name,
        );
      }
      return null;
    }

    const encoded = this.schema.safeEncode(this.value);
    if (!encoded.success) {
      const reason = encoded.error.issues[0]?.message ?? 'invalid value';
      throw new SerializationError(
        `Cannot encode ${this.wireType} argument${name ? ` ${name}` : ''}: ${reason}`,
        name,
      );
    }
    return encoded.data;
  }
}

/** A child of a {@link ParamGroup}. */
export type ParamField = Param | QueryParams;

export type ParamFields = Record<string, ParamField>;

/**
 * A named set of arguments and nested parameter trees.
 *
 * - Formals: every argument of the whole subtree, prefixed by its path.
 * - Actuals: only this group's own arguments. A nested group is bound at the
 *   selection that uses it, see `nestedWith` in the result types module.
 * - Variables: every argument of the whole subtree, prefixed by its path.
 *
 * @example
 * ```typescript
 * const params = group({
 *   id: param(Scalars.ID, 'A1').required(),
 *   bills: group({ first: param(Scalars.Int, 10) }),
 * });
 *
 * params.renderFormal();      // '($id: ID!, $bills_first: Int)'
 * params.renderActual('');    // '(id: $id)'
 * params.renderVariableMap(); // { id: 'A1', bills_first: 10 }
 * ```
 */
export class ParamGroup<F extends ParamFields = ParamFields> extends QueryParams {
  readonly fields: Readonly<F>;
  private readonly entries: ReadonlyArray<readonly [string, ParamField]>;

  constructor(fields: F) {
    super();
    const record: ParamFields = fields;
    const entries = Object.entries(record);
    for (const [name] of entries) {
      assertName(name, 'argument name');
    }
    this.fields = { ...fields };
    this.entries = entries;
  }

  contributeFormal(buffer: ParamBuffer, prefix: string): void {
    for (const [name, field] of this.entries) {
      if (field instanceof QueryParams) {
        field.contributeFormal(buffer, joinPrefix(prefix, name));
      } else {
        buffer.pushFormal(prefix, name, field.wireType);
      }
    }
  }

  contributeActual(buffer: ParamBuffer, prefix: string): void {
    for (const [name, field] of this.entries) {
      if (!(field instanceof QueryParams)) {
        buffer.pushActual(prefix, name);
      }
    }
  }

  contributeVariables(buffer: VariableBuffer, prefix: string): void {
    for (const [name, field] of this.entries) {
      if (field instanceof QueryParams) {
        field.contributeVariables(buffer, joinPrefix(prefix, name));
      } else {
        buffer.pushVariable(prefix, name, field.toJsonValue(`${prefix}${name}`));
      }
    }
  }
}

/**
 * Creates an argument from a scalar codec.
 */
export function param<S extends z.ZodType>(
  codec: ScalarCodec<S>,
  value: z.output<S> | null,
): Param<S> {
  return new Param(codec.wireType, codec.schema, value);
}

/**
 * Creates a parameter group.
 */
export function group<F extends ParamFields>(fields: F): ParamGroup<F> {
  return new ParamGroup(fields);
}
