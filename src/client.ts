/**
 * graphql-param-client
 *
 * Client Module
 *
 * Sends documents to a GraphQL endpoint over HTTP and turns the response into
 * either a decoded result or exactly one typed error. The client keeps no
 * per-request state, so one instance can serve concurrent calls.
 */

import type * as z from 'zod';
import { assertValidDocument, buildRequest } from './builder.js';
import { getConfig } from './config.js';
import { formatIssues, unwrapEnvelope } from './envelope.js';
import {
  ClientError,
  ConfigurationError,
  DecodeError,
  GraphqlError,
  InternalError,
  NetworkError,
  SerializationError,
  TransportError,
} from './errors.js';
import { type ClientLogger, createConsolaLogger } from './logger.js';
import type { QueryParams } from './params.js';
import type { ResultType } from './result-types.js';

/**
 * Options for creating a {@link GraphQLClient}. Anything left out falls back
 * to the global configuration.
 */
export interface GraphQLClientOptions {
  /** Absolute URL of the GraphQL endpoint */
  endpoint: string;
  /** Custom fetch implementation */
  fetch?: typeof fetch;
  /** Request timeout in milliseconds, 0 to disable */
  timeout?: number;
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Logger for request diagnostics */
  logger?: ClientLogger;
  /** Parse every generated document before sending it */
  validateDocuments?: boolean;
}

/** Per-call headers, as a record or as name/value pairs. */
export type RequestHeaders = Record<string, string> | Iterable<readonly [string, string]>;

/**
 * Client for a GraphQL endpoint.
 *
 * @example
 * ```typescript
 * const client = GraphQLClient.builder()
 *   .withUrl('https://api.example.com/graphql')
 *   .withTimeout(5000)
 *   .build();
 *
 * const params = group({ id: param(Scalars.ID, 'A1').required() });
 * const account = await client.execute('GetAccount', 'account', params, Account);
 * ```
 */
export class GraphQLClient {
  readonly endpoint: string;
  protected readonly timeout: number;
  protected readonly headers: Record<string, string>;
  protected readonly logger: ClientLogger;
  protected readonly validateDocuments: boolean;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GraphQLClientOptions) {
    const config = getConfig();

    if (!URL.canParse(options.endpoint)) {
      throw new ConfigurationError(
        `endpoint must be an absolute URL, got "${options.endpoint}"`,
        'endpoint',
      );
    }
    const timeout = options.timeout ?? config.timeout;
    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new ConfigurationError('timeout must be a non-negative number', 'timeout');
    }

    this.endpoint = options.endpoint;
    this.timeout = timeout;
    this.headers = { ...config.headers, ...options.headers };
    this.logger = options.logger ?? createConsolaLogger(config.logLevel);
    this.validateDocuments = options.validateDocuments ?? config.validateDocuments;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Starts building a client.
   */
  static builder(): ClientBuilder {
    return new ClientBuilder();
  }

  /**
   * Runs one query built from a parameter tree and decodes the entry for
   * `queryName` with the result type's schema.
   *
   * @throws {SerializationError} If a parameter cannot be encoded
   * @throws {InvalidInputError} If a name in the document is invalid
   * @throws {TransportError} On a non-2xx status
   * @throws {NetworkError} If no response arrives
   * @throws {DecodeError} If the body or the entry does not decode
   * @throws {GraphqlError} If the endpoint reports errors
   * @throws {InternalError} If the response has no entry for `queryName`
   */
  async execute<S extends z.ZodType, P extends QueryParams>(
    operationName: string,
    queryName: string,
    params: P,
    resultType: ResultType<S, P>,
    headers?: RequestHeaders,
  ): Promise<z.output<S>> {
    const request = buildRequest(operationName, queryName, params, resultType);
    if (this.validateDocuments) {
      assertValidDocument(request.query);
    }

    const data = await this.call(operationName, request.query, request.variables, headers);

    if (!Object.hasOwn(data, queryName)) {
      throw new InternalError(`no response found for ${queryName}`);
    }

    const decoded = resultType.schema.safeParse(data[queryName]);
    if (!decoded.success) {
      const issues = formatIssues(decoded.error);
      this.logger.error(
        `${operationName}: ${queryName} did not decode (${issues.length} issues)`,
      );
      throw new DecodeError(`Response for ${queryName} does not match the result type`, issues);
    }
    return decoded.data;
  }

  /**
   * Posts a prepared document and returns the raw `data` map.
   *
   * @throws {SerializationError} If the variables cannot be serialized
   * @throws {TransportError} On a non-2xx status
   * @throws {NetworkError} If no response arrives
   * @throws {DecodeError} If the body is not a GraphQL response
   * @throws {GraphqlError} If the endpoint reports errors
   */
  async call(
    operationName: string,
    query: string,
    variables: unknown,
    headers?: RequestHeaders,
  ): Promise<Record<string, unknown>> {
    const body = serializeRequest(operationName, query, variables);
    const requestHeaders = this.buildHeaders(headers);
    this.logger.debug(`POST ${this.endpoint} ${body}`);

    const controller = new AbortController();
    const timeoutId =
      this.timeout > 0 ? setTimeout(() => controller.abort(), this.timeout) : undefined;

    let text: string;
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: requestHeaders,
        body,
        signal: controller.signal,
      });
      this.logger.debug(`${operationName}: HTTP ${response.status}`);

      if (!response.ok) {
        const detail = await response
          .text()
          .catch((error: unknown) => `<unreadable body: ${describe(error)}>`);
        this.logger.warn(`${operationName}: HTTP ${response.status} from ${this.endpoint}`);
        this.logger.debug(`${operationName}: error body ${detail}`);
        throw new TransportError(response.status, response.statusText);
      }

      text = await response.text();
    } catch (error) {
      if (error instanceof ClientError) {
        throw error;
      }
      if (controller.signal.aborted) {
        this.logger.warn(`${operationName}: timed out after ${this.timeout}ms`);
        throw new NetworkError(`Request timeout after ${this.timeout}ms`, error);
      }
      this.logger.warn(`${operationName}: request failed: ${describe(error)}`);
      throw new NetworkError(describe(error), error);
    } finally {
      clearTimeout(timeoutId);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`Response body is not JSON: ${describe(error)}`);
    }

    try {
      return unwrapEnvelope(payload);
    } catch (error) {
      if (error instanceof GraphqlError) {
        this.logger.warn(`${operationName}: ${error.errors.length} GraphQL error(s)`);
      }
      throw error;
    }
  }

  /**
   * Headers added for authentication.
   * Subclasses override this to provide credentials.
   */
  protected getAuthHeaders(): Record<string, string> {
    return {};
  }

  private buildHeaders(extra?: RequestHeaders): Headers {
    const headers = new Headers({ 'Content-Type': 'application/json' });
    const layers = [this.getAuthHeaders(), this.headers, extra ?? {}];
    for (const layer of layers) {
      for (const [name, value] of isHeaderPairs(layer) ? layer : Object.entries(layer)) {
        headers.set(name, value);
      }
    }
    return headers;
  }
}

/**
 * Client that authenticates with a bearer token.
 *
 * @example
 * ```typescript
 * const client = new BearerAuthClient('test-token', {
 *   endpoint: 'https://api.example.com/graphql',
 * });
 * ```
 */
export class BearerAuthClient extends GraphQLClient {
  constructor(
    private readonly token: string,
    options: GraphQLClientOptions,
  ) {
    super(options);
  }

  protected override getAuthHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
    };
  }
}

/**
 * Client that authenticates with fixed headers, such as an API key.
 *
 * @example
 * ```typescript
 * const client = new HeaderAuthClient(
 *   { 'X-API-Key': 'test-key' },
 *   { endpoint: 'https://api.example.com/graphql' },
 * );
 * ```
 */
export class HeaderAuthClient extends GraphQLClient {
  constructor(
    private readonly authHeaders: Record<string, string>,
    options: GraphQLClientOptions,
  ) {
    super(options);
  }

  protected override getAuthHeaders(): Record<string, string> {
    return this.authHeaders;
  }
}

/**
 * Fluent builder for {@link GraphQLClient}.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder()
 *   .withUrlIfNotSet('http://localhost:4000/graphql')
 *   .withHeader('X-Client', 'billing')
 *   .withBearerToken('test-token')
 *   .build();
 * ```
 */
export class ClientBuilder {
  private url?: string;
  private fetchImpl?: typeof fetch;
  private timeout?: number;
  private readonly headers: Record<string, string> = {};
  private logger?: ClientLogger;
  private validateDocuments?: boolean;
  private token?: string;

  withUrl(url: string): this {
    this.url = url;
    return this;
  }

  /** Sets the URL unless one was set before. */
  withUrlIfNotSet(url: string): this {
    this.url ??= url;
    return this;
  }

  withFetch(fetchImpl: typeof fetch): this {
    this.fetchImpl = fetchImpl;
    return this;
  }

  withTimeout(timeout: number): this {
    this.timeout = timeout;
    return this;
  }

  withHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  withLogger(logger: ClientLogger): this {
    this.logger = logger;
    return this;
  }

  withDocumentValidation(enabled = true): this {
    this.validateDocuments = enabled;
    return this;
  }

  withBearerToken(token: string): this {
    this.token = token;
    return this;
  }

  /**
   * Creates the client. The endpoint falls back to the configured one.
   *
   * @throws {ConfigurationError} If no valid endpoint is available
   */
  build(): GraphQLClient {
    const endpoint = this.url ?? getConfig().endpoint;
    if (!endpoint) {
      throw new ConfigurationError('No endpoint URL set', 'endpoint');
    }

    const options: GraphQLClientOptions = {
      endpoint,
      fetch: this.fetchImpl,
      timeout: this.timeout,
      headers: this.headers,
      logger: this.logger,
      validateDocuments: this.validateDocuments,
    };
    return this.token === undefined
      ? new GraphQLClient(options)
      : new BearerAuthClient(this.token, options);
  }
}

// === Internal helpers ===

function serializeRequest(operationName: string, query: string, variables: unknown): string {
  try {
    return JSON.stringify({ query, variables, operationName });
  } catch (error) {
    throw new SerializationError(`Cannot serialize request variables: ${describe(error)}`);
  }
}

function isHeaderPairs(headers: RequestHeaders): headers is Iterable<readonly [string, string]> {
  return Symbol.iterator in headers;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
