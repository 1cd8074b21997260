import { z } from 'zod';
import { KEY_FIELDS, KeyField, TableIdentifier, Warehouse, WarehouseRow } from '../types/reconciliation';
import { OUTPUT_SCHEMA } from '../config/tableSchemas';
import { FilterOptions, QueryBuilder } from '../utils/queryBuilder';
import { normalizeRows } from '../utils/rows';

const CACHE_PREFIX = 'mart:';
const SUMMARY_CACHE_TTL = 600;
const LIST_CACHE_TTL = 300;

export type MartFilters = Partial<Record<KeyField | 'status' | 'personnel', string>>;

export interface MartPage {
  rows: WarehouseRow[];
  total: number;
  executionTime: number;
}

export interface StatusSummary {
  status: string;
  rowCount: number;
  totalBudget: number | null;
  totalSpend: number | null;
}

const totalRowSchema = z.object({ total_count: z.coerce.number().int().nonnegative() });

const summaryRowSchema = z.object({
  status: z.string(),
  row_count: z.coerce.number().int().nonnegative(),
  total_budget: z.coerce.number().nullable(),
  total_spend: z.coerce.number().nullable(),
});

// Read side of the published mart, cached for the API
export class MartQueryService {
  private readonly builder: QueryBuilder;

  constructor(
    private readonly warehouse: Warehouse,
    private readonly target: TableIdentifier
  ) {
    this.builder = new QueryBuilder(
      target,
      OUTPUT_SCHEMA.map((column) => column.name)
    );
  }

  async list(options: { filters: MartFilters; page: number; limit: number }): Promise<MartPage> {
    const filters: FilterOptions = { ...options.filters };
    if (filters.year !== undefined) {
      filters.year = Number(filters.year);
    }

    const { dataQuery, countQuery, binds } = this.builder.buildQuery({
      filters,
      page: options.page,
      pageSize: options.limit,
      orderBy: [...KEY_FIELDS, 'personnel'],
    });

    const cacheKey = `${CACHE_PREFIX}${JSON.stringify([this.target, binds, dataQuery])}`;
    const [data, count] = await Promise.all([
      this.warehouse.executeQuery(dataQuery, binds, { useCache: true, cacheKey, cacheTTL: LIST_CACHE_TTL }),
      this.warehouse.executeQuery(countQuery, binds, {
        useCache: true,
        cacheKey: `${cacheKey}:count`,
        cacheTTL: LIST_CACHE_TTL,
      }),
    ]);

    const total = totalRowSchema.parse(normalizeRows(count.rows)[0] ?? { total_count: 0 }).total_count;
    return {
      rows: normalizeRows(data.rows),
      total,
      executionTime: data.executionTime + count.executionTime,
    };
  }

  async summary(): Promise<StatusSummary[]> {
    const sqlText = [
      'SELECT STATUS AS status, COUNT(*) AS row_count,',
      '  SUM(ACTUAL_BUDGET) AS total_budget, SUM(SPEND) AS total_spend',
      `FROM ${this.builder.getFullTableName()}`,
      'GROUP BY STATUS',
      'ORDER BY row_count DESC, status',
    ].join('\n');

    const result = await this.warehouse.executeQuery(sqlText, [], {
      useCache: true,
      cacheKey: `${CACHE_PREFIX}summary:${this.builder.getFullTableName()}`,
      cacheTTL: SUMMARY_CACHE_TTL,
    });

    return z
      .array(summaryRowSchema)
      .parse(normalizeRows(result.rows))
      .map((row) => ({
        status: row.status,
        rowCount: row.row_count,
        totalBudget: row.total_budget,
        totalSpend: row.total_spend,
      }));
  }

  // Cached pages and summaries describe the previous mart once a run replaces it
  invalidate(): void {
    this.warehouse.clearCache(CACHE_PREFIX);
  }
}
