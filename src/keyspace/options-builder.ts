/**
 * cql-schema-generator - Options Builder
 *
 * Shared `with(...)` handling for specification builders that carry options.
 */

import { SpecificationValidationError } from '../errors.js';
import { toIdentifier, type IdentifierLike } from '../cql/identifier.js';
import type { QualifiedName, Specification } from '../types.js';
import {
  Option,
  isNestedOptionMap,
  type OptionFlags,
  type OptionMap,
  type OptionValue,
  type OptionValueType,
} from './option.js';

/**
 * Sets `option` in `options`, replacing an entry with the same name in place
 * so that render order stays the order of first insertion.
 */
export function putOption<V>(options: Map<Option, V>, option: Option, value: V): void {
  const existing = [...options.keys()].find(key => key.equals(option));
  if (!existing) {
    options.set(option, value);
    return;
  }

  const entries = [...options.entries()].map(([key, current]): [Option, V] =>
    key === existing ? [option, value] : [key, current]
  );
  options.clear();
  for (const [key, current] of entries) {
    options.set(key, current);
  }
}

function inferValueType(value: OptionValue): OptionValueType {
  if (value === null) {
    return 'void';
  }
  if (isNestedOptionMap(value)) {
    return 'map';
  }
  switch (typeof value) {
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'string';
  }
}

/**
 * Base for builders whose statement ends in a `WITH` clause.
 */
export abstract class OptionsBuilder {
  protected readonly options = new Map<Option, OptionValue>();

  /**
   * Adds an option. Valueless options (e.g. `TableOption.COMPACT_STORAGE`)
   * are added without a value. A nested map is copied, so later changes to
   * the caller's map do not reach the built specification.
   *
   * @throws SpecificationValidationError if the value does not suit the option
   */
  with(option: Option, value: OptionValue = null): this {
    option.checkValue(value);
    putOption(this.options, option, isNestedOptionMap(value) ? new Map(value) : value);
    return this;
  }

  /**
   * Adds an ad-hoc option by name, e.g. one the server knows but this library
   * does not.
   */
  withOption(name: string, value: OptionValue, flags: Omit<OptionFlags, 'requiresValue'> = {}): this {
    return this.with(new Option(name, inferValueType(value), flags), value);
  }

  protected snapshotOptions(): OptionMap {
    return new Map(this.options);
  }
}

/**
 * Splits the `(name)` / `(keyspace, name)` factory arguments.
 */
export function qualifiedName(first: IdentifierLike | undefined, second?: IdentifierLike): QualifiedName {
  if (second === undefined) {
    if (first === undefined) {
      throw new SpecificationValidationError('Name must not be empty');
    }
    return { name: toIdentifier(first) };
  }

  return {
    keyspace: first === undefined ? undefined : toIdentifier(first),
    name: toIdentifier(second),
  };
}


/**
 * Freezes a built specification.
 */
export function freezeSpecification<T extends Specification>(specification: T): T {
  Object.freeze(specification);
  return specification;
}
