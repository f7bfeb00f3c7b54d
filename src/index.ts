/**
 * graphql-param-client
 *
 * A typed client for GraphQL endpoints. Argument trees and result types are
 * composed as values; the library renders them into one query document with
 * prefixed, collision-free variables, sends it over HTTP and decodes the reply
 * through zod schemas.
 *
 * The core workflow:
 * 1. Describe arguments with param() and group()
 * 2. Describe the selection with objectType(), listOf() and pageOf()
 * 3. Run the operation with GraphQLClient.execute()
 *
 * @example
 * ```typescript
 * import * as z from 'zod';
 * import { GraphQLClient, group, objectType, param, Scalars } from 'graphql-param-client';
 *
 * const User = objectType(z.object({ id: Scalars.ID.schema, name: Scalars.String.schema }));
 * const client = GraphQLClient.builder().withUrl('https://api.example.com/graphql').build();
 *
 * const user = await client.execute(
 *   'GetUser',
 *   'user',
 *   group({ id: param(Scalars.ID, '42').required() }),
 *   User,
 * );
 * ```
 */

// === Scalars ===
export type { ScalarCodec } from './scalars.js';
export {
  asDecimal,
  BooleanSchema,
  CalendarDate,
  DateSchema,
  DateTime,
  DateTimeSchema,
  FloatSchema,
  IdSchema,
  IntSchema,
  Scalars,
  StringSchema,
} from './scalars.js';

// === Parameters ===
export type { JsonValue } from './buffers.js';
export { joinPrefix, ParamBuffer, VariableBuffer } from './buffers.js';
export type { ParamField, ParamFields } from './params.js';
export {
  assertName,
  group,
  NO_PARAMS,
  NoParams,
  Param,
  param,
  ParamGroup,
  QueryParams,
} from './params.js';

// === Result Types ===
export type { FieldSelection, ResultOf, SelectionMap } from './result-types.js';
export {
  listOf,
  nested,
  nestedWith,
  nullableOf,
  objectType,
  ResultType,
  scalarResult,
} from './result-types.js';

// === Pagination ===
export type {
  ForwardPage,
  ForwardPageArgs,
  ForwardPageInfo,
  ForwardPageSchema,
} from './pagination.js';
export { ForwardPageInfoSchema, forwardPageArgs, forwardPageSchema, pageOf } from './pagination.js';

// === Documents ===
export type { DocumentValidationResult, GraphQLRequest } from './builder.js';
export { assertValidDocument, buildDocument, buildRequest, validateDocument } from './builder.js';

// === Responses ===
export type { ErrorExtensions, ResponseEnvelope, WireError } from './envelope.js';
export {
  ErrorExtensionsSchema,
  ErrorLocationSchema,
  formatIssues,
  ResponseEnvelopeSchema,
  unwrapEnvelope,
  ValidationErrorSchema,
  WireErrorSchema,
} from './envelope.js';

// === Client ===
export type { GraphQLClientOptions, RequestHeaders } from './client.js';
export { BearerAuthClient, ClientBuilder, GraphQLClient, HeaderAuthClient } from './client.js';

// === Configuration ===
export type { ClientConfig, ConfigProvider, InitializeConfigOptions } from './config.js';
export {
  CONFIG_KEY,
  configure,
  createNodeConfigProvider,
  getConfig,
  getConfigFromEnv,
  initializeConfig,
  resetConfig,
} from './config.js';

// === Logging ===
export type { ClientLogger } from './logger.js';
export { createConsolaLogger, createSilentLogger, LOGGER_TAG } from './logger.js';

// === Errors ===
export {
  ClientError,
  ConfigurationError,
  DecodeError,
  GraphqlError,
  InternalError,
  InvalidInputError,
  isClientError,
  NetworkError,
  SerializationError,
  TransportError,
} from './errors.js';
