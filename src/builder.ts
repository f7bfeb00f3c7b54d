/**
 * graphql-param-client
 *
 * Document Builder Module
 *
 * Assembles the request document from a parameter tree and a result type:
 * the operation signature from the tree's formals, the root field's bindings,
 * and the selection set rendered by the result type.
 */

import { type DocumentNode, parse } from 'graphql';
import type * as z from 'zod';
import type { JsonValue } from './buffers.js';
import { InternalError, InvalidInputError } from './errors.js';
import { assertName, type QueryParams } from './params.js';
import type { ResultType } from './result-types.js';

/**
 * The JSON payload POSTed to the endpoint.
 */
export interface GraphQLRequest {
  query: string;
  variables: Record<string, JsonValue>;
  operationName: string;
}

/**
 * Result of a syntax check.
 */
export interface DocumentValidationResult {
  valid: boolean;
  /** Parsed document, when valid */
  document?: DocumentNode;
  /** Parse errors, when invalid */
  errors: string[];
}

const VARIABLE_PATTERN = /\$([_A-Za-z][_0-9A-Za-z]*)/g;

/**
 * Builds the query document for one root field.
 *
 * @param operationName - Name of the operation, e.g. `GetAccount`
 * @param queryName - Root field to query, e.g. `account`
 * @throws {InvalidInputError} If a name is invalid, or the parameter tree and
 * result type disagree on which variables are bound
 *
 * @example
 * ```typescript
 * const params = group({ id: param(Scalars.ID, 'A1').required() });
 * buildDocument('GetAccount', 'account', params, Account);
 * // 'query GetAccount($id: ID!) { account(id: $id) { id name } }'
 * ```
 */
export function buildDocument<S extends z.ZodType, P extends QueryParams>(
  operationName: string,
  queryName: string,
  params: P,
  resultType: ResultType<S, P>,
): string {
  assertName(operationName, 'operation name');
  assertName(queryName, 'query name');

  const formal = params.renderFormal();
  const body = `${queryName}${params.renderActual('')}${resultType.renderSelectionSet(params, '')}`;
  assertBindings(formal, body);

  return `query ${operationName}${formal} { ${body} }`;
}

/**
 * Builds the full request payload: document, variables and operation name.
 *
 * @throws {SerializationError} If a parameter value cannot be encoded
 */
export function buildRequest<S extends z.ZodType, P extends QueryParams>(
  operationName: string,
  queryName: string,
  params: P,
  resultType: ResultType<S, P>,
): GraphQLRequest {
  return {
    query: buildDocument(operationName, queryName, params, resultType),
    variables: params.renderVariableMap(),
    operationName,
  };
}

/**
 * Checks a document for syntax errors with graphql-js.
 *
 * This is a syntax check only; the document is not validated against a
 * schema.
 */
export function validateDocument(document: string): DocumentValidationResult {
  try {
    return { valid: true, document: parse(document), errors: [] };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { valid: false, errors: [errorMessage] };
  }
}

/**
 * Parses a document, throwing on syntax errors.
 *
 * @throws {InternalError} If the document does not parse
 */
export function assertValidDocument(document: string): DocumentNode {
  const result = validateDocument(document);
  if (!result.valid || !result.document) {
    throw new InternalError(`Generated document is not valid GraphQL: ${result.errors.join(', ')}`);
  }
  return result.document;
}

function assertBindings(formal: string, body: string): void {
  const declared = new Set(Array.from(formal.matchAll(VARIABLE_PATTERN), (match) => match[1]));
  const bound = new Set(Array.from(body.matchAll(VARIABLE_PATTERN), (match) => match[1]));

  for (const name of declared) {
    if (!bound.has(name)) {
      throw new InvalidInputError(
        `Variable $${name} is declared but not bound by the result type`,
        name,
      );
    }
  }
  for (const name of bound) {
    if (!declared.has(name)) {
      throw new InvalidInputError(`Variable $${name} is bound but never declared`, name);
    }
  }
}
