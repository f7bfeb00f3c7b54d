/**
 * graphql-param-client
 *
 * Buffers Module
 *
 * Single-use accumulators that parameter trees write into while a document
 * is rendered: {@link ParamBuffer} collects the formal declarations or actual
 * bindings of one level, {@link VariableBuffer} collects the flat variable
 * payload of the whole request.
 */

import * as z from 'zod';
import { InternalError, SerializationError } from './errors.js';

/** A JSON value as accepted in the variables payload. */
export type JsonValue = z.infer<ReturnType<typeof z.json>>;

const JsonValueSchema = z.json();

/**
 * Extends a variable-name prefix with one path segment.
 *
 * An empty segment leaves the prefix unchanged; otherwise the segment and a
 * trailing `_` are appended, so `joinPrefix('account_', 'bills')` is
 * `'account_bills_'`.
 */
export function joinPrefix(parent: string, segment: string): string {
  if (segment === '') return parent;
  return `${parent}${segment}_`;
}

/**
 * Accumulates a parenthesized, comma-separated parameter list.
 *
 * @example
 * ```typescript
 * const buffer = new ParamBuffer();
 * buffer.pushFormal('account_', 'first', 'Int');
 * buffer.pushFormal('', 'id', 'ID!');
 * buffer.consume(); // '($account_first: Int, $id: ID!)'
 * ```
 */
export class ParamBuffer {
  private text = '';
  private count = 0;
  private consumed = false;

  /** Number of fragments pushed so far. */
  get size(): number {
    return this.count;
  }

  push(fragment: string): void {
    this.assertOpen();
    this.text += this.count === 0 ? `(${fragment}` : `, ${fragment}`;
    this.count += 1;
  }

  /** Pushes a declaration `$<prefix><name>: <wireType>`. */
  pushFormal(prefix: string, name: string, wireType: string): void {
    this.push(`$${prefix}${name}: ${wireType}`);
  }

  /** Pushes a binding `<name>: $<prefix><name>`. */
  pushActual(prefix: string, name: string): void {
    this.push(`${name}: $${prefix}${name}`);
  }

  /**
   * Closes the list and returns it, or `''` when nothing was pushed.
   *
   * @throws {InternalError} If the buffer was already consumed
   */
  consume(): string {
    this.assertOpen();
    this.consumed = true;
    return this.count === 0 ? '' : `${this.text})`;
  }

  private assertOpen(): void {
    if (this.consumed) {
      throw new InternalError('ParamBuffer used after consume()');
    }
  }
}

/**
 * Accumulates the flattened variables of one request.
 *
 * Keys are unique: writing the same fully prefixed name twice is a
 * {@link SerializationError}. Once read through {@link toMap} or
 * {@link toJsonString} the buffer is finalized and rejects further writes.
 */
export class VariableBuffer {
  private readonly variables = new Map<string, JsonValue>();
  private finalized = false;

  /** Number of variables pushed so far. */
  get size(): number {
    return this.variables.size;
  }

  /**
   * Stores `value` under `prefix + name`.
   *
   * @throws {SerializationError} If the value is not JSON or the key is taken
   * @throws {InternalError} If the buffer was already finalized
   */
  pushVariable(prefix: string, name: string, value: unknown): void {
    if (this.finalized) {
      throw new InternalError('VariableBuffer used after it was finalized');
    }

    const key = `${prefix}${name}`;
    if (this.variables.has(key)) {
      throw new SerializationError(`Duplicate variable name: ${key}`, key);
    }

    const parsed = JsonValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new SerializationError(`Variable ${key} is not a JSON value`, key);
    }
    this.variables.set(key, parsed.data);
  }

  /** Returns a copy of the accumulated variables. */
  toMap(): Record<string, JsonValue> {
    this.finalized = true;
    return Object.fromEntries(this.variables);
  }

  /** Returns the accumulated variables as indented JSON. */
  toJsonString(): string {
    return JSON.stringify(this.toMap(), null, 2);
  }
}
