/**
 * cql-schema-generator - Script Generator
 *
 * Generates versioned CQL script files.
 */

import { renderQualifiedName, type Identifier } from '../cql/identifier.js';
import { toCql } from '../generator/cql-generator.js';
import { dropIndex } from '../keyspace/index-specification.js';
import { dropKeyspace } from '../keyspace/keyspace.js';
import { dropTable } from '../keyspace/table.js';
import { dropType } from '../keyspace/user-type.js';
import type {
  CqlScript,
  ResolvedScriptGeneratorOptions,
  ScriptGeneratorOptions,
  Specification,
} from '../types.js';

/**
 * Resolves options with defaults.
 */
function resolveOptions(options?: ScriptGeneratorOptions): ResolvedScriptGeneratorOptions {
  return {
    generateDown: options?.generateDown ?? true,
    startVersion: options?.startVersion ?? 1,
    versionPadding: options?.versionPadding ?? 4,
  };
}

/**
 * Converts camelCase to snake_case.
 */
export function toSnakeCase(str: string): string {
  return str.replace(/[A-Z]/g, letter => `_${letter.toLowerCase()}`).replace(/^_/, '');
}

/**
 * Formats version number with padding.
 */
function formatVersion(version: number, padding: number): string {
  return String(version).padStart(padding, '0');
}

/**
 * Generates file name for a script.
 */
function generateFileName(version: number, name: string, padding: number): string {
  return `${formatVersion(version, padding)}_${name}.cql`;
}

/**
 * Lowercases a name and replaces anything unsafe in a file name with `_`.
 */
function toFileSlug(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_]+/g, '_');
}

function targetOf(specification: Specification): { keyspace?: Identifier | undefined; name: Identifier } {
  switch (specification.kind) {
    case 'createKeyspace':
    case 'alterKeyspace':
    case 'dropKeyspace':
      return { name: specification.name };
    case 'createIndex':
      return { keyspace: specification.keyspace, name: specification.name ?? specification.table };
    default:
      return { keyspace: specification.keyspace, name: specification.name };
  }
}

/**
 * The statement undoing a create, or undefined when there is none (other
 * statements, and indexes created without a name).
 */
export function inverseStatement(specification: Specification): string | undefined {
  switch (specification.kind) {
    case 'createKeyspace':
      return toCql(dropKeyspace(specification.name).ifExists().build());
    case 'createTable':
      return toCql(dropTable(specification.keyspace, specification.name).ifExists().build());
    case 'createIndex':
      return specification.name
        ? toCql(dropIndex(specification.keyspace, specification.name).ifExists().build())
        : undefined;
    case 'createUserType':
      return toCql(dropType(specification.keyspace, specification.name).ifExists().build());
    default:
      return undefined;
  }
}

/**
 * `createUserType` -> `Create user type`.
 */
function describeKind(kind: string): string {
  const words = toSnakeCase(kind).replace(/_/g, ' ');
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Generates a single script from a specification.
 */
export function generateScript(
  specification: Specification,
  options?: ScriptGeneratorOptions & { version?: number }
): CqlScript {
  const resolved = resolveOptions(options);
  const version = options?.version ?? resolved.startVersion;

  const target = targetOf(specification);
  const targetName = renderQualifiedName(target.keyspace, target.name);
  const slug = toFileSlug([target.keyspace?.name, target.name.name].filter(part => part !== undefined).join('_'));
  const name = `${toSnakeCase(specification.kind)}_${slug}`;

  const lines: string[] = [
    `-- Migration: ${describeKind(specification.kind)} ${targetName}`,
    '-- Generated by cql-schema-generator',
    '',
    toCql(specification),
  ];

  const down = resolved.generateDown ? inverseStatement(specification) : undefined;
  if (down) {
    lines.push('');
    lines.push('-- Down migration');
    lines.push(`-- ${down}`);
  }

  return {
    version,
    name,
    fileName: generateFileName(version, name, resolved.versionPadding),
    content: lines.join('\n'),
    kind: specification.kind,
    target: targetName,
  };
}

/**
 * Generates one script per specification, numbered in order.
 */
export function generateScripts(
  specifications: readonly Specification[],
  options?: ScriptGeneratorOptions
): CqlScript[] {
  const resolved = resolveOptions(options);

  return specifications.map((specification, index) =>
    generateScript(specification, { ...resolved, version: resolved.startVersion + index })
  );
}

/**
 * Gets the file path for a script.
 */
export function getScriptPath(script: CqlScript, basePath: string = 'migrations'): string {
  return `${basePath}/${script.fileName}`;
}
