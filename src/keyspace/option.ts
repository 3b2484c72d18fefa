/**
 * cql-schema-generator - Options
 *
 * Named configuration keys used in `WITH` clauses and nested option maps.
 */

import { SpecificationValidationError } from '../errors.js';
import { escapeSingle, singleQuote } from '../cql/quoting.js';

/**
 * Kind of value an option accepts. `void` options take no value
 * (e.g. `COMPACT STORAGE`).
 */
export type OptionValueType = 'string' | 'number' | 'boolean' | 'map' | 'void';

export type ScalarOptionValue = string | number | bigint | boolean;

/**
 * Option map nested under a top-level option (replication, compaction, ...).
 * Values are scalars; a nested map never nests further.
 */
export type NestedOptionMap = ReadonlyMap<Option, ScalarOptionValue | null>;

export type OptionValue = ScalarOptionValue | NestedOptionMap | null;

/**
 * Top-level option map of a specification, in render order.
 */
export type OptionMap = ReadonlyMap<Option, OptionValue>;

export interface OptionFlags {
  /** A `null` value is rejected */
  readonly requiresValue?: boolean;
  /** Embedded single quotes are doubled on render */
  readonly escapesValue?: boolean;
  /** The rendered value is wrapped in single quotes */
  readonly quotesValue?: boolean;
}

/**
 * Whether an option value is a nested option map rather than a scalar.
 */
export function isNestedOptionMap(value: OptionValue | undefined): value is NestedOptionMap {
  return value instanceof Map;
}

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * An option key with its rendering hints. Two options are equal when their
 * names are equal.
 */
export class Option {
  readonly name: string;
  readonly type: OptionValueType;
  readonly requiresValue: boolean;
  readonly escapesValue: boolean;
  readonly quotesValue: boolean;

  constructor(name: string, type: OptionValueType, flags: OptionFlags = {}) {
    if (name.trim() === '') {
      throw new SpecificationValidationError('Option name must not be empty');
    }

    this.name = name;
    this.type = type;
    this.requiresValue = flags.requiresValue ?? false;
    this.escapesValue = flags.escapesValue ?? false;
    this.quotesValue = flags.quotesValue ?? false;
    Object.freeze(this);
  }

  get takesValue(): boolean {
    return this.type !== 'void';
  }

  equals(other: Option): boolean {
    return this.name === other.name;
  }

  /**
   * Whether a non-null value can stand for this option's type.
   */
  isCoercible(value: OptionValue): boolean {
    if (value === null) {
      return true;
    }

    switch (this.type) {
      case 'void':
        return true;
      case 'map':
        return isNestedOptionMap(value) && [...value.values()].every(entry => !isNestedOptionMap(entry));
      case 'number':
        return typeof value === 'number'
          ? Number.isFinite(value)
          : typeof value === 'bigint' || (typeof value === 'string' && NUMERIC.test(value));
      case 'boolean':
        return typeof value === 'boolean' || (typeof value === 'string' && /^(true|false)$/i.test(value));
      case 'string':
        return !isNestedOptionMap(value);
    }
  }

  /**
   * Validates a value against this option.
   *
   * @throws SpecificationValidationError when the value is missing, present on a
   * valueless option, or not coercible to the option's type
   */
  checkValue(value: OptionValue | undefined): void {
    if (!this.takesValue) {
      if (value !== null && value !== undefined) {
        throw new SpecificationValidationError(`Option [${this.name}] takes no value`);
      }
      return;
    }

    if (value === null || value === undefined) {
      if (this.requiresValue) {
        throw new SpecificationValidationError(`Option [${this.name}] requires a value`);
      }
      return;
    }

    if (!this.isCoercible(value)) {
      throw new SpecificationValidationError(
        `Option [${this.name}] takes value coercible to type [${this.type}]`
      );
    }
  }

  /**
   * Renders a scalar value: `null` renders empty, otherwise the value is
   * stringified, then escaped and quoted as the flags say.
   */
  renderValue(value: ScalarOptionValue | null): string {
    if (value === null) {
      return '';
    }

    this.checkValue(value);

    let rendered = String(value);
    if (this.escapesValue) {
      rendered = escapeSingle(rendered);
    }
    if (this.quotesValue) {
      rendered = singleQuote(rendered);
    }
    return rendered;
  }

  toString(): string {
    return `[name=${this.name}, type=${this.type}, requiresValue=${this.requiresValue}, escapesValue=${this.escapesValue}, quotesValue=${this.quotesValue}]`;
  }
}

/**
 * Keyspace options.
 */
export const KeyspaceOption = {
  REPLICATION: new Option('replication', 'map', { requiresValue: true }),
  DURABLE_WRITES: new Option('durable_writes', 'boolean', { requiresValue: true }),
} as const;

/**
 * Keys of the replication map.
 */
export const ReplicationOption = {
  CLASS: new Option('class', 'string', { requiresValue: true, quotesValue: true }),
  REPLICATION_FACTOR: new Option('replication_factor', 'number', { requiresValue: true }),
} as const;

export const ReplicationStrategy = {
  SIMPLE_STRATEGY: 'SimpleStrategy',
  NETWORK_TOPOLOGY_STRATEGY: 'NetworkTopologyStrategy',
} as const;

export type ReplicationStrategy = (typeof ReplicationStrategy)[keyof typeof ReplicationStrategy];

/**
 * Per-datacenter replication factor key of a NetworkTopologyStrategy map.
 */
export function dataCenterOption(dataCenter: string): Option {
  return new Option(dataCenter, 'number', { requiresValue: true });
}

/**
 * Table options.
 */
export const TableOption = {
  COMMENT: new Option('comment', 'string', { requiresValue: true, escapesValue: true, quotesValue: true }),
  COMPACT_STORAGE: new Option('COMPACT STORAGE', 'void'),
  COMPACTION: new Option('compaction', 'map', { requiresValue: true }),
  COMPRESSION: new Option('compression', 'map', { requiresValue: true }),
  CACHING: new Option('caching', 'map', { requiresValue: true }),
  BLOOM_FILTER_FP_CHANCE: new Option('bloom_filter_fp_chance', 'number', { requiresValue: true }),
  READ_REPAIR_CHANCE: new Option('read_repair_chance', 'number', { requiresValue: true }),
  DCLOCAL_READ_REPAIR_CHANCE: new Option('dclocal_read_repair_chance', 'number', { requiresValue: true }),
  GC_GRACE_SECONDS: new Option('gc_grace_seconds', 'number', { requiresValue: true }),
  DEFAULT_TIME_TO_LIVE: new Option('default_time_to_live', 'number', { requiresValue: true }),
  CDC: new Option('cdc', 'boolean', { requiresValue: true }),
  SPECULATIVE_RETRY: new Option('speculative_retry', 'string', {
    requiresValue: true,
    escapesValue: true,
    quotesValue: true,
  }),
  MEMTABLE_FLUSH_PERIOD_IN_MS: new Option('memtable_flush_period_in_ms', 'number', { requiresValue: true }),
  CRC_CHECK_CHANCE: new Option('crc_check_chance', 'number', { requiresValue: true }),
  MIN_INDEX_INTERVAL: new Option('min_index_interval', 'number', { requiresValue: true }),
  MAX_INDEX_INTERVAL: new Option('max_index_interval', 'number', { requiresValue: true }),
  READ_REPAIR: new Option('read_repair', 'string', { requiresValue: true, escapesValue: true, quotesValue: true }),
} as const;

/**
 * Keys of the `caching` map.
 */
export const CachingOption = {
  KEYS: new Option('keys', 'string', { requiresValue: true, quotesValue: true }),
  ROWS_PER_PARTITION: new Option('rows_per_partition', 'string', { requiresValue: true, quotesValue: true }),
} as const;

export const KeyCachingOption = {
  ALL: 'all',
  NONE: 'none',
} as const;

/**
 * Keys of the `compaction` map.
 */
export const CompactionOption = {
  CLASS: new Option('class', 'string', { requiresValue: true, quotesValue: true }),
  TOMBSTONE_THRESHOLD: new Option('tombstone_threshold', 'number', { requiresValue: true }),
  TOMBSTONE_COMPACTION_INTERVAL: new Option('tombstone_compaction_interval', 'number', { requiresValue: true }),
  MIN_SSTABLE_SIZE: new Option('min_sstable_size', 'number', { requiresValue: true }),
  MIN_THRESHOLD: new Option('min_threshold', 'number', { requiresValue: true }),
  MAX_THRESHOLD: new Option('max_threshold', 'number', { requiresValue: true }),
  BUCKET_LOW: new Option('bucket_low', 'number', { requiresValue: true }),
  BUCKET_HIGH: new Option('bucket_high', 'number', { requiresValue: true }),
  SSTABLE_SIZE_IN_MB: new Option('sstable_size_in_mb', 'number', { requiresValue: true }),
} as const;

/**
 * Keys of the `compression` map.
 */
export const CompressionOption = {
  SSTABLE_COMPRESSION: new Option('sstable_compression', 'string', { requiresValue: true, quotesValue: true }),
  CHUNK_LENGTH_KB: new Option('chunk_length_kb', 'number', { requiresValue: true }),
  CRC_CHECK_CHANCE: new Option('crc_check_chance', 'number', { requiresValue: true }),
} as const;

/**
 * Finds a table option by name, ignoring case.
 */
export function findTableOption(name: string): Option | undefined {
  const wanted = name.toLowerCase();
  return Object.values(TableOption).find(option => option.name.toLowerCase() === wanted);
}

/**
 * Looks up an option in a map by name rather than by reference.
 */
export function hasOption(options: ReadonlyMap<Option, unknown>, option: Option): boolean {
  for (const key of options.keys()) {
    if (key.equals(option)) {
      return true;
    }
  }
  return false;
}
