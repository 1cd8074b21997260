/**
 * Query builder for paginated reads of the published mart, with exact-match
 * filters passed as binds
 */

import { SqlBind, TableIdentifier } from '../types/reconciliation';
import { configQualifiedName, quoteIdentifier } from './sql';

export type FilterOptions = Record<string, SqlBind | readonly SqlBind[] | undefined>;

function isBindList(value: SqlBind | readonly SqlBind[]): value is readonly SqlBind[] {
  return typeof value === 'object';
}

export interface BuiltQuery {
  dataQuery: string;
  countQuery: string;
  /** Binds shared by both queries */
  binds: SqlBind[];
}

export class QueryBuilder {
  private readonly columnNames: ReadonlySet<string>;

  constructor(
    private readonly table: TableIdentifier,
    columnNames: readonly string[]
  ) {
    this.columnNames = new Set(columnNames);
  }

  /**
   * Columns are created unquoted, so the warehouse stores them upper-cased
   */
  quoteColumn(column: string): string {
    return quoteIdentifier(column.toUpperCase());
  }

  getFullTableName(): string {
    return configQualifiedName(this.table);
  }

  /**
   * Build WHERE clause from filters. Unknown columns and empty values are
   * skipped.
   */
  buildFilterClause(filters: FilterOptions, binds: SqlBind[]): string {
    const conditions: string[] = [];

    Object.entries(filters).forEach(([column, value]) => {
      if (value === undefined || !this.columnNames.has(column)) return;

      if (isBindList(value)) {
        if (value.length === 0) return;
        conditions.push(`${this.quoteColumn(column)} IN (${value.map(() => '?').join(', ')})`);
        binds.push(...value);
      } else {
        conditions.push(`${this.quoteColumn(column)} = ?`);
        binds.push(value);
      }
    });

    return conditions.join(' AND ');
  }

  buildQuery(options: {
    filters?: FilterOptions;
    page?: number;
    pageSize?: number;
    orderBy?: readonly string[];
  }): BuiltQuery {
    const { filters = {}, page = 1, pageSize = 50, orderBy = [] } = options;

    const binds: SqlBind[] = [];
    const filterClause = this.buildFilterClause(filters, binds);
    const whereClause = filterClause ? `WHERE ${filterClause}` : '';
    const tableName = this.getFullTableName();

    const orderColumns = orderBy.filter((column) => this.columnNames.has(column)).map((column) => this.quoteColumn(column));
    const orderClause = orderColumns.length > 0 ? `ORDER BY ${orderColumns.join(', ')}` : '';

    const countQuery = `SELECT COUNT(*) AS total_count FROM ${tableName} ${whereClause}`.trim();

    const offset = (page - 1) * pageSize;
    const dataQuery = [`SELECT * FROM ${tableName}`, whereClause, orderClause, `LIMIT ${pageSize} OFFSET ${offset}`]
      .filter((part) => part.length > 0)
      .join(' ');

    return { dataQuery, countQuery, binds };
  }
}
