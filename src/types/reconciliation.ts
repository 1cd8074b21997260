// Core types for budget/spend reconciliation shared by the pipeline, the SQL builders and the API

export const KEY_FIELDS = [
  'budget_group_1',
  'budget_group_2',
  'region',
  'category_level_1',
  'track_group',
  'pillar_group',
  'content_group',
  'platform',
  'objective',
  'month',
  'year',
] as const;

export type KeyField = (typeof KEY_FIELDS)[number];

export interface DimensionalKey {
  budget_group_1: string | null;
  budget_group_2: string | null;
  region: string | null;
  category_level_1: string | null;
  track_group: string | null;
  pillar_group: string | null;
  content_group: string | null;
  platform: string | null;
  objective: string | null;
  /** Reporting month as YYYY-MM */
  month: string | null;
  year: number | null;
}

// One row of a per-platform campaign performance table
export interface RawSpendRecord extends DimensionalKey {
  spend: number | null;
  campaign_status: string | null;
  personnel?: string | null;
}

export interface AggregatedSpend extends DimensionalKey {
  personnel: string | null;
  spend: number;
  active: boolean;
}

export const BUDGET_AMOUNT_FIELDS = [
  'initial_budget',
  'adjusted_budget',
  'additional_budget',
  'actual_budget',
  'grouped_marketing_budget',
  'grouped_supplier_budget',
  'grouped_store_retail',
  'grouped_customer_budget',
  'grouped_recruitment_budget',
] as const;

export type BudgetAmountField = (typeof BUDGET_AMOUNT_FIELDS)[number];

export interface BudgetRecord extends DimensionalKey, Record<BudgetAmountField, number | null> {
  /** Effective window, ISO dates (YYYY-MM-DD) */
  start_date: string | null;
  end_date: string | null;
  total_effective_time: number | null;
  total_passed_time: number | null;
}

export interface ReconciliationRow extends DimensionalKey, Record<BudgetAmountField, number | null> {
  personnel: string | null;
  start_date: string | null;
  end_date: string | null;
  total_effective_time: number | null;
  total_passed_time: number | null;
  spend: number | null;
  /** null when no spend rows exist for the key */
  active: boolean | null;
}

export const STATUS_LABELS = {
  SPEND_WITHOUT_BUDGET_ACTIVE: '🔴 Spend without Budget',
  SPEND_WITHOUT_BUDGET_INACTIVE: '⚪ Spend without Budget',
  NO_BUDGET: '🚫 No Budget',
  NOT_YET_STARTED: '🕓 Not Yet Started',
  NOT_SET: '⚪ Not Set',
  DELAYED: '🟠 Delayed',
  ENDED_WITHOUT_SPEND: '🔒 Ended without Spend',
  OVER_BUDGET_ACTIVE: '🔴 Over Budget',
  OVER_BUDGET_INACTIVE: '⚪ Over Budget',
  COMPLETED: '🔵 Completed',
  NEAR_COMPLETION: '🟢 Near Completion',
  LOW_SPEND: '🟡 Low Spend',
  HIGH_SPEND: '🟣 High Spend',
  OFF: '⚫ Off',
  IN_PROGRESS: '🟢 In Progress',
  UNRECOGNIZED: '❓ Unrecognized',
} as const;

export type StatusLabel = (typeof STATUS_LABELS)[keyof typeof STATUS_LABELS];

export interface ClassifiedRow extends ReconciliationRow {
  status: StatusLabel;
  as_of_date: string;
}

export type DataDomain = 'spend' | 'budget';

export interface TableIdentifier {
  catalog: string;
  schema: string;
  table: string;
}

/**
 * Name tokens matched case-insensitively; every token that is set must match.
 */
export interface NameMatcher {
  prefix?: string;
  suffix?: string;
  contains?: string;
}

export interface NamingPattern {
  schema: NameMatcher;
  table: NameMatcher;
}

export type SemanticType = 'string' | 'integer' | 'numeric' | 'date' | 'boolean';

export interface ColumnSpec {
  name: string;
  type: SemanticType;
}

/**
 * A relation with a declared, ordered schema. An empty relation still carries
 * its full schema so downstream stages never see a missing column.
 */
export interface Relation<T> {
  schema: readonly ColumnSpec[];
  rows: T[];
}

// Warehouse access

export type SqlBind = string | number;

export type WarehouseRow = Record<string, unknown>;

export interface QueryResult<T> {
  rows: T[];
  totalCount: number;
  executionTime: number;
}

export interface QueryCacheOptions {
  useCache?: boolean;
  cacheKey?: string;
  cacheTTL?: number;
}

export interface Warehouse {
  executeQuery(
    sqlText: string,
    binds?: SqlBind[],
    options?: QueryCacheOptions
  ): Promise<QueryResult<WarehouseRow>>;
  /** Drop cached results whose key contains `pattern`, or all of them */
  clearCache(pattern?: string): void;
}

// API envelope

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export interface ApiResponse<T> {
  success: boolean;
  data: T;
  message?: string;
  pagination?: PaginationInfo;
  metadata?: Record<string, unknown>;
}

export interface PaginationInfo {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}
