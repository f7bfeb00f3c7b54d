/**
 * graphql-param-client
 *
 * Configuration Module
 *
 * Holds the process-wide defaults that clients fall back to when a value is
 * not given explicitly: endpoint, timeout, headers, log level and document
 * validation. Values can be set in code, read from environment variables, or
 * loaded from an external configuration provider.
 */

import * as z from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Configuration for the client.
 */
export interface ClientConfig {
  /** Default endpoint URL; required before a client can be built */
  endpoint?: string;
  /** Request timeout in milliseconds, 0 to disable (default: 30000) */
  timeout: number;
  /** Headers sent with every request */
  headers: Record<string, string>;
  /** consola log level, 0 (silent) to 4 (debug) (default: 3) */
  logLevel: number;
  /** Parse every generated document before sending it (default: false) */
  validateDocuments: boolean;
}

/**
 * Source of configuration values, such as node-config or a secrets store.
 */
export interface ConfigProvider {
  get(key: string): unknown;
  has(key: string): boolean;
}

/**
 * Options for {@link initializeConfig}.
 */
export interface InitializeConfigOptions {
  /** Provider to read the `graphqlParamClient` key from */
  provider?: ConfigProvider;
  /** Whether to apply GRAPHQL_PARAM_CLIENT_* environment variables (default: true) */
  useEnv?: boolean;
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Key under which providers store the client configuration. */
export const CONFIG_KEY = 'graphqlParamClient';

const ENV_PREFIX = 'GRAPHQL_PARAM_CLIENT_';

const DEFAULT_CONFIG: ClientConfig = {
  timeout: 30000,
  headers: {},
  logLevel: 3,
  validateDocuments: false,
};

const ProviderConfigSchema = z
  .object({
    endpoint: z.string(),
    timeout: z.number(),
    headers: z.record(z.string(), z.string()),
    logLevel: z.number(),
    validateDocuments: z.boolean(),
  })
  .partial();

let currentConfig: ClientConfig = { ...DEFAULT_CONFIG, headers: {} };

/**
 * Updates the global client configuration.
 *
 * @param options - Configuration options to apply
 * @throws {ConfigurationError} If any configuration value is invalid
 *
 * @example
 * ```typescript
 * configure({
 *   endpoint: 'https://api.example.com/graphql',
 *   timeout: 10000,
 *   headers: { 'X-Client': 'billing' },
 * });
 * ```
 *
 * @remarks
 * Configuration is global and affects every client built afterwards.
 */
export function configure(options: Partial<ClientConfig>): void {
  if (options.endpoint !== undefined) {
    if (typeof options.endpoint !== 'string' || !URL.canParse(options.endpoint)) {
      throw new ConfigurationError('endpoint must be an absolute URL', 'endpoint');
    }
  }
  if (
    options.timeout !== undefined &&
    (typeof options.timeout !== 'number' || !Number.isFinite(options.timeout) || options.timeout < 0)
  ) {
    throw new ConfigurationError('timeout must be a non-negative number', 'timeout');
  }
  if (
    options.headers !== undefined &&
    (typeof options.headers !== 'object' ||
      options.headers === null ||
      Object.values(options.headers).some((value) => typeof value !== 'string'))
  ) {
    throw new ConfigurationError('headers must be an object of strings', 'headers');
  }
  if (
    options.logLevel !== undefined &&
    (!Number.isInteger(options.logLevel) || options.logLevel < 0 || options.logLevel > 5)
  ) {
    throw new ConfigurationError('logLevel must be an integer between 0 and 5', 'logLevel');
  }
  if (options.validateDocuments !== undefined && typeof options.validateDocuments !== 'boolean') {
    throw new ConfigurationError('validateDocuments must be a boolean', 'validateDocuments');
  }

  currentConfig = {
    ...currentConfig,
    ...options,
    headers: { ...currentConfig.headers, ...options.headers },
  };
}

/**
 * Retrieves a copy of the current configuration.
 */
export function getConfig(): ClientConfig {
  return { ...currentConfig, headers: { ...currentConfig.headers } };
}

/**
 * Resets configuration to default values.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG, headers: {} };
}

/**
 * Reads configuration from GRAPHQL_PARAM_CLIENT_* environment variables.
 *
 * Supported variables:
 * - GRAPHQL_PARAM_CLIENT_ENDPOINT
 * - GRAPHQL_PARAM_CLIENT_TIMEOUT
 * - GRAPHQL_PARAM_CLIENT_LOG_LEVEL
 * - GRAPHQL_PARAM_CLIENT_VALIDATE_DOCUMENTS (`true`/`false`/`1`/`0`)
 * - GRAPHQL_PARAM_CLIENT_HEADERS (JSON object)
 *
 * @throws {ConfigurationError} If a variable cannot be parsed
 */
export function getConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
  const result: Partial<ClientConfig> = {};

  const endpoint = env[`${ENV_PREFIX}ENDPOINT`];
  if (endpoint) result.endpoint = endpoint;

  const timeout = env[`${ENV_PREFIX}TIMEOUT`];
  if (timeout) result.timeout = parseNumber(timeout, 'timeout');

  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (logLevel) result.logLevel = parseNumber(logLevel, 'logLevel');

  const validate = env[`${ENV_PREFIX}VALIDATE_DOCUMENTS`];
  if (validate) result.validateDocuments = parseFlag(validate, 'validateDocuments');

  const headers = env[`${ENV_PREFIX}HEADERS`];
  if (headers) result.headers = parseHeaders(headers);

  return result;
}

/**
 * Initializes configuration from defaults, an optional provider, and the
 * environment, in that order of precedence (environment wins).
 *
 * @returns The resulting configuration
 *
 * @example
 * ```typescript
 * import config from 'config';
 *
 * initializeConfig({ provider: createNodeConfigProvider(config) });
 * ```
 */
export function initializeConfig(options: InitializeConfigOptions = {}): ClientConfig {
  resetConfig();

  if (options.provider?.has(CONFIG_KEY)) {
    const parsed = ProviderConfigSchema.safeParse(options.provider.get(CONFIG_KEY));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const key = issue && issue.path.length > 0 ? String(issue.path[0]) : CONFIG_KEY;
      throw new ConfigurationError(
        `Invalid ${CONFIG_KEY} configuration: ${issue?.message ?? 'unknown issue'}`,
        key,
      );
    }
    configure(parsed.data);
  }

  if (options.useEnv !== false) {
    configure(getConfigFromEnv(options.env));
  }

  return getConfig();
}

/**
 * Wraps a node-config style object (`config.has` / `config.get`) as a
 * {@link ConfigProvider}.
 */
export function createNodeConfigProvider(nodeConfig: {
  has(key: string): boolean;
  get(key: string): unknown;
}): ConfigProvider {
  return {
    has: (key) => nodeConfig.has(key),
    get: (key) => (nodeConfig.has(key) ? nodeConfig.get(key) : undefined),
  };
}

// === Internal helpers ===

function parseNumber(value: string, key: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got "${value}"`, key);
  }
  return parsed;
}

function parseFlag(value: string, key: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${key} must be true or false, got "${value}"`, key);
  }
}

function parseHeaders(value: string): Record<string, string> {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    throw new ConfigurationError('headers must be a JSON object', 'headers');
  }
  const parsed = z.record(z.string(), z.string()).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('headers must be a JSON object of strings', 'headers');
  }
  return parsed.data;
}
