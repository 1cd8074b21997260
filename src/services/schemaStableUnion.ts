import { z } from 'zod';
import {
  ColumnSpec,
  Relation,
  SemanticType,
  SqlBind,
  TableIdentifier,
  Warehouse,
} from '../types/reconciliation';
import { SchemaMismatchError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { normalizeRows } from '../utils/rows';
import { castColumn, castNull, configIdentifier, displayName, qualifiedName } from '../utils/sql';

const logger = createLogger('union');

// INFORMATION_SCHEMA.COLUMNS.DATA_TYPE values accepted for each declared type
const TYPE_FAMILIES: Record<SemanticType, readonly string[]> = {
  string: ['TEXT', 'VARCHAR', 'STRING', 'CHAR', 'CHARACTER'],
  integer: ['NUMBER', 'DECIMAL', 'NUMERIC', 'INT', 'INTEGER', 'BIGINT', 'SMALLINT'],
  numeric: ['NUMBER', 'DECIMAL', 'NUMERIC', 'INT', 'INTEGER', 'BIGINT', 'SMALLINT', 'FLOAT', 'DOUBLE', 'REAL'],
  date: ['DATE', 'DATETIME', 'TIMESTAMP', 'TIMESTAMP_NTZ', 'TIMESTAMP_LTZ', 'TIMESTAMP_TZ'],
  boolean: ['BOOLEAN'],
};

const columnRowSchema = z.object({
  table_catalog: z.string(),
  table_schema: z.string(),
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
});

export type CatalogColumn = z.infer<typeof columnRowSchema>;

export interface SchemaExpectation {
  tables: readonly TableIdentifier[];
  schema: readonly ColumnSpec[];
}

export function emptyRelation<T>(schema: readonly ColumnSpec[]): Relation<T> {
  return { schema, rows: [] };
}

/**
 * In-process UNION ALL: duplicates are kept and the declared schema is
 * carried even when there are no parts.
 */
export function unionRows<T>(schema: readonly ColumnSpec[], parts: readonly (readonly T[])[]): Relation<T> {
  const relation = emptyRelation<T>(schema);
  for (const part of parts) {
    relation.rows.push(...part);
  }
  return relation;
}

export function buildEmptyRelationSql(schema: readonly ColumnSpec[]): string {
  return [
    `SELECT ${schema.map(castNull).join(',\n  ')}`,
    'FROM (SELECT 1 AS one) AS empty_source',
    'WHERE 1 = 0',
  ].join('\n');
}

export function buildUnionSql(tables: readonly TableIdentifier[], schema: readonly ColumnSpec[]): string {
  if (tables.length === 0) {
    return buildEmptyRelationSql(schema);
  }
  const projection = schema.map((column) => castColumn(column)).join(',\n  ');
  return tables.map((table) => `SELECT ${projection}\nFROM ${qualifiedName(table)}`).join('\nUNION ALL\n');
}

export function buildColumnsQuery(tables: readonly TableIdentifier[]): { sqlText: string; binds: SqlBind[] } {
  const byCatalog = new Map<string, TableIdentifier[]>();
  for (const table of tables) {
    const list = byCatalog.get(table.catalog) ?? [];
    list.push(table);
    byCatalog.set(table.catalog, list);
  }

  const binds: SqlBind[] = [];
  const selects = [...byCatalog.entries()].map(([catalog, catalogTables]) => {
    const predicates = catalogTables.map((table) => {
      binds.push(table.schema, table.table);
      return '(TABLE_SCHEMA = ? AND TABLE_NAME = ?)';
    });
    return [
      'SELECT TABLE_CATALOG AS table_catalog, TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name,',
      '  COLUMN_NAME AS column_name, DATA_TYPE AS data_type',
      `FROM ${configIdentifier(catalog)}.INFORMATION_SCHEMA.COLUMNS`,
      `WHERE ${predicates.join('\n  OR ')}`,
    ].join('\n');
  });

  return {
    sqlText: `${selects.join('\nUNION ALL\n')}\nORDER BY table_catalog, table_schema, table_name, column_name`,
    binds,
  };
}

function tableKey(catalog: string, schema: string, table: string): string {
  return [catalog, schema, table].map((part) => part.toLowerCase()).join('.');
}

/**
 * Check every discovered table against its declared columns. Any missing
 * column or incompatible type fails the whole run; nothing is coerced.
 */
export function assertTableSchemas(columns: readonly CatalogColumn[], expectations: readonly SchemaExpectation[]): void {
  const catalogTables = new Map<string, Map<string, string>>();
  for (const column of columns) {
    const key = tableKey(column.table_catalog, column.table_schema, column.table_name);
    const tableColumns = catalogTables.get(key) ?? new Map<string, string>();
    tableColumns.set(column.column_name.toLowerCase(), column.data_type.toUpperCase());
    catalogTables.set(key, tableColumns);
  }

  const problems: string[] = [];
  for (const { tables, schema } of expectations) {
    for (const table of tables) {
      const actual = catalogTables.get(tableKey(table.catalog, table.schema, table.table));
      if (!actual) {
        problems.push(`${displayName(table)}: table not found`);
        continue;
      }
      for (const column of schema) {
        const dataType = actual.get(column.name);
        if (dataType === undefined) {
          problems.push(`${displayName(table)}: missing column ${column.name}`);
        } else if (!TYPE_FAMILIES[column.type].includes(dataType)) {
          problems.push(`${displayName(table)}: column ${column.name} is ${dataType}, expected ${column.type}`);
        }
      }
    }
  }

  if (problems.length > 0) {
    throw new SchemaMismatchError(`Source tables do not match the declared schema: ${problems.join('; ')}`, {
      problems,
    });
  }
}

export async function validateSourceSchemas(
  warehouse: Warehouse,
  expectations: readonly SchemaExpectation[]
): Promise<void> {
  const tables = expectations.flatMap((expectation) => expectation.tables);
  if (tables.length === 0) {
    logger.debug('No source tables to validate');
    return;
  }

  const { sqlText, binds } = buildColumnsQuery(tables);
  const result = await warehouse.executeQuery(sqlText, binds);
  const parsed = z.array(columnRowSchema).safeParse(normalizeRows(result.rows));
  if (!parsed.success) {
    throw new SchemaMismatchError('Unexpected column metadata returned by the warehouse', {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  assertTableSchemas(parsed.data, expectations);
  logger.info('Source schemas validated', { tables: tables.length });
}
