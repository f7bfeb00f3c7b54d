/**
 * graphql-param-client
 *
 * Custom Error Classes
 *
 * Every failure surfaced by the client is one of the classes below. They all
 * extend {@link ClientError}, so callers can branch on `instanceof` or on the
 * stable `code` string.
 */

import type { WireError } from './envelope.js';

/**
 * Base class for all errors raised by this package.
 */
export class ClientError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
    Object.setPrototypeOf(this, ClientError.prototype);
  }
}

/**
 * Error thrown when the endpoint answers with a non-2xx HTTP status.
 *
 * The response body is never parsed in this case.
 *
 * @example
 * ```typescript
 * try {
 *   await client.execute('GetAccount', 'account', params, Account);
 * } catch (error) {
 *   if (error instanceof TransportError && error.status === 401) {
 *     await refreshToken();
 *   }
 * }
 * ```
 */
export class TransportError extends ClientError {
  public readonly status: number;

  constructor(status: number, statusText = '', code = 'TRANSPORT_ERROR') {
    super(statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`, code);
    this.name = 'TransportError';
    this.status = status;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Error thrown when the request never produced a response: DNS or connection
 * failures, aborted requests and timeouts.
 */
export class NetworkError extends ClientError {
  constructor(message: string, cause?: unknown, code = 'NETWORK_ERROR') {
    super(message, code);
    this.name = 'NetworkError';
    this.cause = cause;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Error thrown when a response body is not JSON, or does not match the
 * response envelope or the declared result type.
 */
export class DecodeError extends ClientError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], code = 'DECODE_ERROR') {
    super(message, code);
    this.name = 'DecodeError';
    this.issues = issues;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Error thrown when the endpoint executed the request and reported one or
 * more errors in the response envelope. Any `data` sent alongside is ignored.
 *
 * @example
 * ```typescript
 * try {
 *   await client.execute('GetAccount', 'account', params, Account);
 * } catch (error) {
 *   if (error instanceof GraphqlError) {
 *     for (const wireError of error.errors) {
 *       console.error(wireError.message, wireError.extensions.errorCode);
 *     }
 *   }
 * }
 * ```
 */
export class GraphqlError extends ClientError {
  public readonly errors: WireError[];

  constructor(errors: WireError[], code = 'GRAPHQL_ERROR') {
    super(
      `GraphQL errors: ${errors.map((e) => e.message ?? '(no message)').join(', ')}`,
      code,
    );
    this.name = 'GraphqlError';
    this.errors = errors;
    Object.setPrototypeOf(this, GraphqlError.prototype);
  }
}

/**
 * Error thrown when a parameter value cannot be converted to JSON, or when two
 * parameters resolve to the same variable name.
 */
export class SerializationError extends ClientError {
  public readonly variableName?: string;

  constructor(message: string, variableName?: string, code = 'SERIALIZATION_ERROR') {
    super(message, code);
    this.name = 'SerializationError';
    this.variableName = variableName;
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Error thrown on a contract mismatch between caller and server, such as a
 * response without an entry for the requested query name, or on misuse of a
 * single-use buffer.
 */
export class InternalError extends ClientError {
  constructor(message: string, code = 'INTERNAL_ERROR') {
    super(message, code);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

/**
 * Error thrown when text cannot be parsed as a scalar, or when a name used in
 * a document is not a valid GraphQL name.
 */
export class InvalidInputError extends ClientError {
  public readonly input?: string;

  constructor(message: string, input?: string, code = 'INVALID_INPUT') {
    super(message, code);
    this.name = 'InvalidInputError';
    this.input = input;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * Error thrown when configuration values are invalid.
 *
 * @example
 * ```typescript
 * try {
 *   configure({ timeout: -1 });
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error('Invalid config key:', error.configKey);
 *   }
 * }
 * ```
 *
 * @see {@link configure} for configuration options
 */
export class ConfigurationError extends ClientError {
  public readonly configKey: string;

  constructor(message: string, configKey: string, code = 'CONFIGURATION_ERROR') {
    super(message, code);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard for errors raised by this package.
 */
export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}
