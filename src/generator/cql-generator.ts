/**
 * cql-schema-generator - CQL Generator
 *
 * Single entry point turning any specification into its statement.
 */

import { UnsupportedSpecificationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Specification } from '../types.js';
import { createIndexCql, dropIndexCql } from './index-cql.js';
import { alterKeyspaceCql, createKeyspaceCql, dropKeyspaceCql } from './keyspace-cql.js';
import { alterTableCql, createTableCql, dropTableCql } from './table-cql.js';
import { alterUserTypeCql, createUserTypeCql, dropUserTypeCql } from './user-type-cql.js';

const log = createLogger('generator');

function describe(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function unsupported(specification: never): never {
  throw new UnsupportedSpecificationError(describe(specification));
}

function generate(specification: Specification): string {
  switch (specification.kind) {
    case 'createKeyspace':
      return createKeyspaceCql(specification);
    case 'alterKeyspace':
      return alterKeyspaceCql(specification);
    case 'dropKeyspace':
      return dropKeyspaceCql(specification);
    case 'createTable':
      return createTableCql(specification);
    case 'alterTable':
      return alterTableCql(specification);
    case 'dropTable':
      return dropTableCql(specification);
    case 'createIndex':
      return createIndexCql(specification);
    case 'dropIndex':
      return dropIndexCql(specification);
    case 'createUserType':
      return createUserTypeCql(specification);
    case 'alterUserType':
      return alterUserTypeCql(specification);
    case 'dropUserType':
      return dropUserTypeCql(specification);
    default:
      return unsupported(specification);
  }
}

/**
 * Generates the statement for a specification, terminated by `;`.
 *
 * @throws UnsupportedSpecificationError for anything that is not a known
 * specification
 * @throws IllegalOptionError if an option is not legal for the statement
 */
export function toCql(specification: Specification): string {
  if (typeof specification !== 'object' || specification === null) {
    return unsupported(specification);
  }

  const cql = generate(specification);
  log('generated %s: %s', specification.kind, cql);
  return cql;
}
