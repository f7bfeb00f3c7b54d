/**
 * graphql-param-client
 *
 * Logger Module
 *
 * A small logging abstraction so the client can write through consola by
 * default, through a host application's logger, or not at all in tests.
 */

import { createConsola, LogLevels } from 'consola';

/**
 * Logger used by the client.
 */
export interface ClientLogger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Tag attached to every consola message. */
export const LOGGER_TAG = 'graphql-param-client';

/**
 * Creates a logger that writes through consola.
 *
 * @param level - consola log level (0 silent ... 4 debug); defaults to info
 */
export function createConsolaLogger(level: number = LogLevels.info): ClientLogger {
  const instance = createConsola({ level }).withTag(LOGGER_TAG);

  return {
    debug: (message) => instance.debug(message),
    warn: (message) => instance.warn(message),
    error: (message) => instance.error(message),
  };
}

/**
 * Creates a logger that drops every message.
 */
export function createSilentLogger(): ClientLogger {
  const noop = () => {};
  return {
    debug: noop,
    warn: noop,
    error: noop,
  };
}
