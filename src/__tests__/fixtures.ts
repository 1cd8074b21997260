import {
  BudgetRecord,
  DimensionalKey,
  QueryCacheOptions,
  QueryResult,
  RawSpendRecord,
  ReconciliationRow,
  SqlBind,
  Warehouse,
  WarehouseRow,
} from '../types/reconciliation';

export const BASE_KEY: DimensionalKey = {
  budget_group_1: 'MKT',
  budget_group_2: 'MKT-BRAND',
  region: 'north',
  category_level_1: 'snacks',
  track_group: 'always-on',
  pillar_group: 'awareness',
  content_group: 'video',
  platform: 'meta',
  objective: 'reach',
  month: '2024-06',
  year: 2024,
};

export function reconciliationRow(overrides: Partial<ReconciliationRow> = {}): ReconciliationRow {
  return {
    ...BASE_KEY,
    personnel: null,
    initial_budget: null,
    adjusted_budget: null,
    additional_budget: null,
    actual_budget: 1000,
    grouped_marketing_budget: null,
    grouped_supplier_budget: null,
    grouped_store_retail: null,
    grouped_customer_budget: null,
    grouped_recruitment_budget: null,
    start_date: '2024-06-01',
    end_date: '2024-06-30',
    total_effective_time: null,
    total_passed_time: null,
    spend: 500,
    active: true,
    ...overrides,
  };
}

export function budgetRecord(overrides: Partial<BudgetRecord> = {}): BudgetRecord {
  return {
    ...BASE_KEY,
    initial_budget: 900,
    adjusted_budget: 50,
    additional_budget: 50,
    actual_budget: 1000,
    grouped_marketing_budget: 1000,
    grouped_supplier_budget: null,
    grouped_store_retail: null,
    grouped_customer_budget: null,
    grouped_recruitment_budget: null,
    start_date: '2024-06-01',
    end_date: '2024-06-30',
    total_effective_time: 30,
    total_passed_time: 14,
    ...overrides,
  };
}

export function spendRecord(overrides: Partial<RawSpendRecord> = {}): RawSpendRecord {
  return {
    ...BASE_KEY,
    spend: 100,
    campaign_status: '🟢',
    ...overrides,
  };
}

export interface RecordedStatement {
  sqlText: string;
  binds: SqlBind[];
  options: QueryCacheOptions;
}

export type QueryHandler = (sqlText: string, binds: SqlBind[]) => WarehouseRow[] | Error;

/**
 * In-process warehouse: records every statement and answers from a handler.
 */
export class FakeWarehouse implements Warehouse {
  readonly statements: RecordedStatement[] = [];
  readonly clearedCaches: (string | undefined)[] = [];

  constructor(private readonly handler: QueryHandler = () => []) {}

  async executeQuery(
    sqlText: string,
    binds: SqlBind[] = [],
    options: QueryCacheOptions = {}
  ): Promise<QueryResult<WarehouseRow>> {
    this.statements.push({ sqlText, binds, options });
    const outcome = this.handler(sqlText, binds);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return { rows: outcome, totalCount: outcome.length, executionTime: 1 };
  }

  clearCache(pattern?: string): void {
    this.clearedCaches.push(pattern);
  }

  sqlTexts(): string[] {
    return this.statements.map((statement) => statement.sqlText);
  }
}
