/**
 * cql-schema-generator - Logging
 *
 * Thin wrapper over `debug` namespaces.
 */

import debug from 'debug';

const BASE_NAMESPACE = 'cql-schema';

/**
 * Creates a namespaced debug logger.
 *
 * `createLogger('generator')` logs under `cql-schema:generator`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
  return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enables logging programmatically, e.g. `enableLogging('cql-schema:admin')`.
 *
 * @param pattern - Debug pattern to enable (default: 'cql-schema:*')
 * @param logFn - Optional sink; defaults to debug's own stderr writer
 */
export function enableLogging(
  pattern: string = `${BASE_NAMESPACE}:*`,
  logFn?: (...args: unknown[]) => void
): void {
  if (logFn) {
    debug.log = logFn;
  }
  debug.enable(pattern);
}

/**
 * Disables all debug logging.
 */
export function disableLogging(): void {
  debug.disable();
}

export function isLoggingEnabled(namespace: string): boolean {
  return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
