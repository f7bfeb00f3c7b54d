/**
 * graphql-param-client
 *
 * Unit tests for the errors module.
 */

import { describe, expect, it } from 'vitest';
import {
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

describe('TransportError', () => {
  it('should carry the status', () => {
    const error = new TransportError(500, 'Internal Server Error');

    expect(error).toBeInstanceOf(ClientError);
    expect(error).toBeInstanceOf(TransportError);
    expect(error.name).toBe('TransportError');
    expect(error.message).toBe('HTTP 500: Internal Server Error');
    expect(error.status).toBe(500);
    expect(error.code).toBe('TRANSPORT_ERROR');
  });

  it('should omit an empty status text', () => {
    expect(new TransportError(502).message).toBe('HTTP 502');
  });
});

describe('NetworkError', () => {
  it('should keep the cause', () => {
    const cause = new TypeError('fetch failed');
    const error = new NetworkError('fetch failed', cause);

    expect(error.name).toBe('NetworkError');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('NETWORK_ERROR');
  });
});

describe('DecodeError', () => {
  it('should default to no issues', () => {
    const error = new DecodeError('Response body is not JSON');

    expect(error.issues).toEqual([]);
    expect(error.code).toBe('DECODE_ERROR');
  });
});

describe('GraphqlError', () => {
  it('should join the wire messages', () => {
    const error = new GraphqlError([
      { message: 'boom', locations: [], path: [], extensions: {} },
      { locations: [], path: ['account'], extensions: { errorCode: 'E1' } },
    ]);

    expect(error.name).toBe('GraphqlError');
    expect(error.message).toBe('GraphQL errors: boom, (no message)');
    expect(error.errors).toHaveLength(2);
    expect(error.code).toBe('GRAPHQL_ERROR');
  });
});

describe('SerializationError', () => {
  it('should name the variable', () => {
    const error = new SerializationError('Duplicate variable name: a_b', 'a_b');

    expect(error.variableName).toBe('a_b');
    expect(error.code).toBe('SERIALIZATION_ERROR');
  });
});

describe('InternalError', () => {
  it('should accept custom error code', () => {
    const error = new InternalError('no response found for account', 'MISSING_ENTRY');

    expect(error.name).toBe('InternalError');
    expect(error.code).toBe('MISSING_ENTRY');
  });
});

describe('InvalidInputError', () => {
  it('should keep the rejected input', () => {
    const error = new InvalidInputError('Invalid Date value', '444.');

    expect(error.input).toBe('444.');
    expect(error.code).toBe('INVALID_INPUT');
  });
});

describe('ConfigurationError', () => {
  it('should create error with message and config key', () => {
    const error = new ConfigurationError('Invalid config', 'timeout');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid config');
    expect(error.configKey).toBe('timeout');
    expect(error.code).toBe('CONFIGURATION_ERROR');
  });
});

describe('isClientError', () => {
  it('should recognise errors from this package only', () => {
    expect(isClientError(new InternalError('x'))).toBe(true);
    expect(isClientError(new Error('x'))).toBe(false);
    expect(isClientError('x')).toBe(false);
  });
});
