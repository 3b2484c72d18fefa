/**
 * cql-schema-generator - Keyspace Specifications
 *
 * Builders for CREATE / ALTER / DROP KEYSPACE.
 *
 * @example
 * ```typescript
 * const spec = createKeyspace('shop')
 *   .ifNotExists()
 *   .withNetworkReplication({ dataCenter: 'dc1', replicationFactor: 3 })
 *   .with(KeyspaceOption.DURABLE_WRITES, true)
 *   .build();
 * ```
 */

import { SpecificationValidationError } from '../errors.js';
import { Identifier, toIdentifier, type IdentifierLike } from '../cql/identifier.js';
import type {
  AlterKeyspaceSpecification,
  CreateKeyspaceSpecification,
  DropKeyspaceSpecification,
} from '../types.js';
import {
  KeyspaceOption,
  ReplicationOption,
  ReplicationStrategy,
  dataCenterOption,
  type NestedOptionMap,
  type Option,
  type ScalarOptionValue,
} from './option.js';
import { OptionsBuilder, freezeSpecification, putOption } from './options-builder.js';

/**
 * Replication factor of one datacenter.
 */
export interface DataCenterReplication {
  readonly dataCenter: string;
  readonly replicationFactor: number;
}

/**
 * Replication map for SimpleStrategy.
 */
export function simpleReplication(replicationFactor = 1): NestedOptionMap {
  return new Map<Option, ScalarOptionValue | null>([
    [ReplicationOption.CLASS, ReplicationStrategy.SIMPLE_STRATEGY],
    [ReplicationOption.REPLICATION_FACTOR, replicationFactor],
  ]);
}

/**
 * Replication map for NetworkTopologyStrategy, one entry per datacenter.
 */
export function networkReplication(dataCenters: readonly DataCenterReplication[]): NestedOptionMap {
  const replication = new Map<Option, ScalarOptionValue | null>([
    [ReplicationOption.CLASS, ReplicationStrategy.NETWORK_TOPOLOGY_STRATEGY],
  ]);
  for (const { dataCenter, replicationFactor } of dataCenters) {
    putOption(replication, dataCenterOption(dataCenter), replicationFactor);
  }
  return replication;
}

export abstract class KeyspaceOptionsBuilder extends OptionsBuilder {
  protected readonly name: Identifier;

  constructor(name: IdentifierLike) {
    super();
    this.name = toIdentifier(name);
  }

  withSimpleReplication(replicationFactor = 1): this {
    return this.with(KeyspaceOption.REPLICATION, simpleReplication(replicationFactor));
  }

  withNetworkReplication(...dataCenters: DataCenterReplication[]): this {
    return this.with(KeyspaceOption.REPLICATION, networkReplication(dataCenters));
  }

  withDurableWrites(durableWrites: boolean): this {
    return this.with(KeyspaceOption.DURABLE_WRITES, durableWrites);
  }
}

export class CreateKeyspaceBuilder extends KeyspaceOptionsBuilder {
  private ifNotExistsFlag = false;

  ifNotExists(ifNotExists = true): this {
    this.ifNotExistsFlag = ifNotExists;
    return this;
  }

  /**
   * Missing `replication` and `durable_writes` are filled in when the
   * statement is generated, not here.
   */
  build(): CreateKeyspaceSpecification {
    return freezeSpecification<CreateKeyspaceSpecification>({
      kind: 'createKeyspace',
      name: this.name,
      ifNotExists: this.ifNotExistsFlag,
      options: this.snapshotOptions(),
    });
  }
}

export class AlterKeyspaceBuilder extends KeyspaceOptionsBuilder {
  build(): AlterKeyspaceSpecification {
    if (this.options.size === 0) {
      throw new SpecificationValidationError(`ALTER KEYSPACE ${this.name.render()} requires at least one option`);
    }

    return freezeSpecification<AlterKeyspaceSpecification>({
      kind: 'alterKeyspace',
      name: this.name,
      options: this.snapshotOptions(),
    });
  }
}

export class DropKeyspaceBuilder {
  private readonly name: Identifier;
  private ifExistsFlag = false;

  constructor(name: IdentifierLike) {
    this.name = toIdentifier(name);
  }

  ifExists(ifExists = true): this {
    this.ifExistsFlag = ifExists;
    return this;
  }

  build(): DropKeyspaceSpecification {
    return freezeSpecification<DropKeyspaceSpecification>({
      kind: 'dropKeyspace',
      name: this.name,
      ifExists: this.ifExistsFlag,
    });
  }
}

export function createKeyspace(name: IdentifierLike): CreateKeyspaceBuilder {
  return new CreateKeyspaceBuilder(name);
}

export function alterKeyspace(name: IdentifierLike): AlterKeyspaceBuilder {
  return new AlterKeyspaceBuilder(name);
}

export function dropKeyspace(name: IdentifierLike): DropKeyspaceBuilder {
  return new DropKeyspaceBuilder(name);
}
