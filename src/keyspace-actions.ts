/**
 * cql-schema-generator - Keyspace Actions
 *
 * Turns declarative keyspace configuration into the specifications to run when
 * an application starts and stops.
 *
 * @example
 * ```typescript
 * const { startup, shutdown } = resolveKeyspaceActions({
 *   name: 'shop',
 *   action: 'CREATE_DROP',
 *   ifNotExists: true,
 *   replication: { strategy: 'NetworkTopologyStrategy', dataCenters: [{ name: 'dc1', replicationFactor: 3 }] },
 * });
 * ```
 */

import { z } from 'zod';
import { SpecificationValidationError } from './errors.js';
import { alterKeyspace, createKeyspace, dropKeyspace, type KeyspaceOptionsBuilder } from './keyspace/keyspace.js';
import { createLogger } from './logger.js';
import type { KeyspaceSpecification } from './types.js';

const log = createLogger('keyspace-actions');

const DataCenterSchema = z.object({
  name: z.string().min(1),
  replicationFactor: z.number().int().positive(),
});

const ReplicationSchema = z.discriminatedUnion('strategy', [
  z.object({
    strategy: z.literal('SimpleStrategy'),
    replicationFactor: z.number().int().positive().default(1),
  }),
  z.object({
    strategy: z.literal('NetworkTopologyStrategy'),
    dataCenters: z.array(DataCenterSchema).min(1),
  }),
]);

/**
 * What to do with the keyspace:
 * - CREATE: create on startup
 * - CREATE_DROP: create on startup, drop on shutdown
 * - ALTER: alter on startup
 * - NONE: nothing
 */
export const KeyspaceAction = z.enum(['CREATE', 'CREATE_DROP', 'ALTER', 'NONE']);
export type KeyspaceAction = z.infer<typeof KeyspaceAction>;

export const KeyspaceActionsConfigSchema = z.object({
  name: z.string().min(1),
  action: KeyspaceAction,
  ifNotExists: z.boolean().default(false),
  /** Defaults to `false` on create; ALTER only changes it when set */
  durableWrites: z.boolean().optional(),
  replication: ReplicationSchema.optional(),
});

/**
 * Keyspace configuration as written by the user (defaults optional).
 */
export type KeyspaceActionsConfig = z.input<typeof KeyspaceActionsConfigSchema>;

/**
 * Keyspace configuration with defaults applied.
 */
export type ResolvedKeyspaceActionsConfig = z.output<typeof KeyspaceActionsConfigSchema>;

export interface KeyspaceActions {
  readonly startup: readonly KeyspaceSpecification[];
  readonly shutdown: readonly KeyspaceSpecification[];
}

/**
 * Validates raw configuration and applies defaults.
 *
 * @throws SpecificationValidationError listing every invalid field
 */
export function parseKeyspaceActionsConfig(config: unknown): ResolvedKeyspaceActionsConfig {
  const result = KeyspaceActionsConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SpecificationValidationError(`Invalid keyspace configuration: ${issues.join('; ')}`);
  }
  return result.data;
}

function withReplication<B extends KeyspaceOptionsBuilder>(builder: B, config: ResolvedKeyspaceActionsConfig): B {
  const { replication } = config;
  if (!replication) {
    return builder;
  }

  switch (replication.strategy) {
    case 'SimpleStrategy':
      return builder.withSimpleReplication(replication.replicationFactor);
    case 'NetworkTopologyStrategy':
      return builder.withNetworkReplication(
        ...replication.dataCenters.map(dc => ({ dataCenter: dc.name, replicationFactor: dc.replicationFactor }))
      );
  }
}

function create(config: ResolvedKeyspaceActionsConfig): KeyspaceSpecification {
  return withReplication(createKeyspace(config.name).ifNotExists(config.ifNotExists), config)
    .withDurableWrites(config.durableWrites ?? false)
    .build();
}

function alter(config: ResolvedKeyspaceActionsConfig): KeyspaceSpecification {
  const builder = withReplication(alterKeyspace(config.name), config);
  if (config.durableWrites !== undefined) {
    builder.withDurableWrites(config.durableWrites);
  }
  return builder.build();
}

/**
 * Resolves the startup and shutdown specifications for a keyspace.
 *
 * @throws SpecificationValidationError for invalid configuration, or for an
 * ALTER that changes nothing
 */
export function resolveKeyspaceActions(config: KeyspaceActionsConfig): KeyspaceActions {
  const resolved = parseKeyspaceActionsConfig(config);
  log('resolving %s actions for keyspace %s', resolved.action, resolved.name);

  switch (resolved.action) {
    case 'CREATE':
      return { startup: [create(resolved)], shutdown: [] };
    case 'CREATE_DROP':
      return { startup: [create(resolved)], shutdown: [dropKeyspace(resolved.name).ifExists().build()] };
    case 'ALTER':
      return { startup: [alter(resolved)], shutdown: [] };
    case 'NONE':
      return { startup: [], shutdown: [] };
  }
}
