/**
 * cql-schema-generator - Schema Admin
 *
 * Hands generated statements to whatever executes CQL (typically a
 * cassandra-driver `Client`).
 *
 * @example
 * ```typescript
 * import { Client } from 'cassandra-driver';
 *
 * const admin = new SchemaAdmin(new Client({ contactPoints: ['127.0.0.1'], localDataCenter: 'dc1' }));
 * await admin.execute(createKeyspace('shop').ifNotExists().build());
 * ```
 */

import { toCql } from '../generator/cql-generator.js';
import { createLogger } from '../logger.js';
import type { Specification } from '../types.js';

const log = createLogger('admin');
const errorLog = log.extend('error');

/**
 * Anything that can execute a CQL string.
 */
export interface StatementExecutor {
  execute(cql: string): Promise<unknown>;
}

/**
 * Options for {@link SchemaAdmin}.
 */
export interface SchemaAdminOptions {
  /**
   * Generate and log statements without executing them.
   * @default false
   */
  dryRun?: boolean;
}

interface ResolvedSchemaAdminOptions {
  dryRun: boolean;
}

function resolveOptions(options?: SchemaAdminOptions): ResolvedSchemaAdminOptions {
  return {
    dryRun: options?.dryRun ?? false,
  };
}

export class SchemaAdmin {
  private readonly executor: StatementExecutor;
  private readonly options: ResolvedSchemaAdminOptions;

  constructor(executor: StatementExecutor, options?: SchemaAdminOptions) {
    this.executor = executor;
    this.options = resolveOptions(options);
  }

  /**
   * Generates the statement and executes it.
   *
   * Generation errors reject before anything reaches the executor; executor
   * errors are rethrown as-is.
   *
   * @returns The statement that was executed
   */
  async execute(specification: Specification): Promise<string> {
    const cql = toCql(specification);

    if (this.options.dryRun) {
      log('dry run, not executing: %s', cql);
      return cql;
    }

    log('executing: %s', cql);
    try {
      await this.executor.execute(cql);
    } catch (error) {
      errorLog('statement failed: %s %O', cql, error);
      throw error;
    }
    return cql;
  }

  /**
   * Executes specifications one after another, stopping at the first failure.
   */
  async executeAll(specifications: readonly Specification[]): Promise<string[]> {
    const executed: string[] = [];
    for (const specification of specifications) {
      executed.push(await this.execute(specification));
    }
    return executed;
  }
}
