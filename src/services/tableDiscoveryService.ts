import { z } from 'zod';
import {
  DataDomain,
  NameMatcher,
  NamingPattern,
  SqlBind,
  TableIdentifier,
  Warehouse,
} from '../types/reconciliation';
import { DiscoveryError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { normalizeRows } from '../utils/rows';
import { configIdentifier, escapeLikeToken } from '../utils/sql';

const logger = createLogger('discovery');

const catalogRowSchema = z.object({
  table_catalog: z.string(),
  table_schema: z.string(),
  table_name: z.string(),
});

export interface DiscoveryQuery {
  sqlText: string;
  binds: SqlBind[];
}

export function matchesNamingPattern(name: string, matcher: NameMatcher): boolean {
  const value = name.toLowerCase();
  if (matcher.prefix && !value.startsWith(matcher.prefix.toLowerCase())) return false;
  if (matcher.suffix && !value.endsWith(matcher.suffix.toLowerCase())) return false;
  if (matcher.contains && !value.includes(matcher.contains.toLowerCase())) return false;
  return true;
}

function isExcluded(table: TableIdentifier, excludeMarker: string): boolean {
  const marker = excludeMarker.toLowerCase();
  return table.schema.toLowerCase().includes(marker) || table.table.toLowerCase().includes(marker);
}

function matcherClauses(column: string, matcher: NameMatcher, binds: SqlBind[]): string[] {
  const clauses: string[] = [];
  const add = (pattern: string) => {
    clauses.push(`${column} ILIKE ? ESCAPE '!'`);
    binds.push(pattern);
  };
  if (matcher.prefix) add(`${escapeLikeToken(matcher.prefix)}%`);
  if (matcher.suffix) add(`%${escapeLikeToken(matcher.suffix)}`);
  if (matcher.contains) add(`%${escapeLikeToken(matcher.contains)}%`);
  return clauses;
}

/**
 * Metadata-only lookup of tables whose schema and table names match the
 * pattern. The exclusion marker keeps the engine from reading its own output.
 */
export function buildDiscoveryQuery(catalog: string, pattern: NamingPattern, excludeMarker: string): DiscoveryQuery {
  const binds: SqlBind[] = [];
  const excluded = `%${escapeLikeToken(excludeMarker)}%`;

  const conditions = [
    `TABLE_SCHEMA <> 'INFORMATION_SCHEMA'`,
    ...matcherClauses('TABLE_SCHEMA', pattern.schema, binds),
    ...matcherClauses('TABLE_NAME', pattern.table, binds),
    `TABLE_SCHEMA NOT ILIKE ? ESCAPE '!'`,
    `TABLE_NAME NOT ILIKE ? ESCAPE '!'`,
  ];
  binds.push(excluded, excluded);

  const sqlText = [
    'SELECT TABLE_CATALOG AS table_catalog, TABLE_SCHEMA AS table_schema, TABLE_NAME AS table_name',
    `FROM ${configIdentifier(catalog)}.INFORMATION_SCHEMA.TABLES`,
    `WHERE ${conditions.join('\n  AND ')}`,
    'ORDER BY table_schema, table_name',
  ].join('\n');

  return { sqlText, binds };
}

function compareTables(a: TableIdentifier, b: TableIdentifier): number {
  return a.schema.localeCompare(b.schema, 'en') || a.table.localeCompare(b.table, 'en');
}

export class TableDiscoveryService {
  constructor(
    private readonly warehouse: Warehouse,
    private readonly catalog: string,
    private readonly excludeMarker: string
  ) {}

  /**
   * Tables of one domain in the configured catalog. No match is a valid
   * outcome and yields an empty list.
   */
  async discoverTables(domain: DataDomain, pattern: NamingPattern): Promise<TableIdentifier[]> {
    const { sqlText, binds } = buildDiscoveryQuery(this.catalog, pattern, this.excludeMarker);
    logger.debug('Discovering source tables', { domain, catalog: this.catalog, pattern });

    const rows = await this.warehouse.executeQuery(sqlText, binds).then(
      (result) => normalizeRows(result.rows),
      (error: unknown) => {
        throw new DiscoveryError(`Table discovery for ${domain} failed: ${errorMessage(error)}`, {
          domain,
          catalog: this.catalog,
        });
      }
    );

    const parsed = z.array(catalogRowSchema).safeParse(rows);
    if (!parsed.success) {
      throw new DiscoveryError(`Unexpected catalog metadata for ${domain}`, {
        domain,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    // ILIKE narrows the scan; the same predicate is re-applied here so the
    // result never depends on warehouse collation
    const tables = parsed.data
      .map(
        (row): TableIdentifier => ({
          catalog: row.table_catalog,
          schema: row.table_schema,
          table: row.table_name,
        })
      )
      .filter(
        (table) =>
          matchesNamingPattern(table.schema, pattern.schema) &&
          matchesNamingPattern(table.table, pattern.table) &&
          !isExcluded(table, this.excludeMarker)
      )
      .sort(compareTables);

    if (tables.length === 0) {
      logger.warn('No source tables matched; continuing with an empty relation', { domain, catalog: this.catalog });
    } else {
      logger.info('Discovered source tables', { domain, count: tables.length });
    }

    return tables;
  }
}
