import { ColumnSpec, SemanticType, TableIdentifier } from '../types/reconciliation';
import { isIsoDate } from './dates';

const SIMPLE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
const COLUMN_NAME = /^[a-z_][a-z0-9_]*$/;

export const SQL_TYPES: Record<SemanticType, string> = {
  string: 'VARCHAR',
  integer: 'NUMBER(38, 0)',
  numeric: 'NUMBER(38, 6)',
  date: 'DATE',
  boolean: 'BOOLEAN',
};

/**
 * Quote SQL identifiers to handle special characters and reserved words
 */
export function quoteIdentifier(identifier: string): string {
  if (identifier.startsWith('"') && identifier.endsWith('"')) {
    return identifier;
  }
  const escaped = identifier.replace(/"/g, '""');
  return `"${escaped}"`;
}

/**
 * Identifier taken from configuration: plain names stay unquoted so the
 * warehouse resolves them case-insensitively, anything else is quoted.
 */
export function configIdentifier(identifier: string): string {
  return SIMPLE_IDENTIFIER.test(identifier) ? identifier : quoteIdentifier(identifier);
}

// Discovered tables carry the exact catalog spelling, so every part is quoted
export function qualifiedName(table: TableIdentifier): string {
  return [table.catalog, table.schema, table.table].map(quoteIdentifier).join('.');
}

export function configQualifiedName(table: TableIdentifier): string {
  return [table.catalog, table.schema, table.table].map(configIdentifier).join('.');
}

export function displayName(table: TableIdentifier): string {
  return `${table.catalog}.${table.schema}.${table.table}`;
}

export function assertColumnName(name: string): string {
  if (!COLUMN_NAME.test(name)) {
    throw new Error(`Unsafe column name "${name}"`);
  }
  return name;
}

export function stringLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function numberLiteral(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot render non-finite number ${value} as SQL`);
  }
  return String(value);
}

export function dateLiteral(value: string): string {
  if (!isIsoDate(value)) {
    throw new Error(`Cannot render "${value}" as a SQL date`);
  }
  return `${stringLiteral(value)}::DATE`;
}

export function castNull(column: ColumnSpec): string {
  return `CAST(NULL AS ${SQL_TYPES[column.type]}) AS ${assertColumnName(column.name)}`;
}

export function castColumn(column: ColumnSpec, qualifier?: string): string {
  const name = assertColumnName(column.name);
  const ref = qualifier ? `${qualifier}.${name}` : name;
  return `CAST(${ref} AS ${SQL_TYPES[column.type]}) AS ${name}`;
}

/**
 * Escape a literal token for use inside a LIKE/ILIKE pattern with ESCAPE '!'
 */
export function escapeLikeToken(token: string): string {
  return token.replace(/[!%_]/g, (ch) => `!${ch}`);
}

export function indent(sql: string, spaces = 2): string {
  const pad = ' '.repeat(spaces);
  return sql
    .split('\n')
    .map((line) => (line.length > 0 ? pad + line : line))
    .join('\n');
}
