/**
 * cql-schema-generator - Logging Tests
 */

import { format } from 'node:util';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, disableLogging, enableLogging, isLoggingEnabled } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    disableLogging();
  });

  it('namespaces loggers under cql-schema', () => {
    expect(createLogger('admin').namespace).toBe('cql-schema:admin');
  });

  it('enables and disables namespaces', () => {
    enableLogging('cql-schema:admin');

    expect(isLoggingEnabled('admin')).toBe(true);
    expect(isLoggingEnabled('generator')).toBe(false);

    disableLogging();

    expect(isLoggingEnabled('admin')).toBe(false);
  });

  it('enables every namespace by default', () => {
    enableLogging();

    expect(isLoggingEnabled('generator')).toBe(true);
    expect(isLoggingEnabled('keyspace-actions')).toBe(true);
  });

  it('writes to the given sink', () => {
    const sink = vi.fn();
    enableLogging('cql-schema:test', sink);

    createLogger('test')('hello %s', 'world');

    expect(sink).toHaveBeenCalledTimes(1);
    expect(format(...(sink.mock.calls[0] ?? []))).toContain('hello world');
  });
});
