import { RECONCILIATION_SCHEMA } from '../config/tableSchemas';
import {
  AggregatedSpend,
  BUDGET_AMOUNT_FIELDS,
  BudgetRecord,
  DimensionalKey,
  KEY_FIELDS,
  ReconciliationRow,
  Relation,
} from '../types/reconciliation';

const BUDGET_DETAIL_FIELDS = [
  ...BUDGET_AMOUNT_FIELDS,
  'start_date',
  'end_date',
  'total_effective_time',
  'total_passed_time',
] as const;

// Null-safe: two missing values compare equal
function joinKey(row: DimensionalKey): string {
  return JSON.stringify(KEY_FIELDS.map((field) => row[field]));
}

function coalesceKey(budget: DimensionalKey | null, spend: DimensionalKey | null): DimensionalKey {
  return {
    budget_group_1: budget?.budget_group_1 ?? spend?.budget_group_1 ?? null,
    budget_group_2: budget?.budget_group_2 ?? spend?.budget_group_2 ?? null,
    region: budget?.region ?? spend?.region ?? null,
    category_level_1: budget?.category_level_1 ?? spend?.category_level_1 ?? null,
    track_group: budget?.track_group ?? spend?.track_group ?? null,
    pillar_group: budget?.pillar_group ?? spend?.pillar_group ?? null,
    content_group: budget?.content_group ?? spend?.content_group ?? null,
    platform: budget?.platform ?? spend?.platform ?? null,
    objective: budget?.objective ?? spend?.objective ?? null,
    month: budget?.month ?? spend?.month ?? null,
    year: budget?.year ?? spend?.year ?? null,
  };
}

function joinedRow(budget: BudgetRecord | null, spend: AggregatedSpend | null): ReconciliationRow {
  return {
    ...coalesceKey(budget, spend),
    personnel: spend?.personnel ?? null,
    initial_budget: budget?.initial_budget ?? null,
    adjusted_budget: budget?.adjusted_budget ?? null,
    additional_budget: budget?.additional_budget ?? null,
    actual_budget: budget?.actual_budget ?? null,
    grouped_marketing_budget: budget?.grouped_marketing_budget ?? null,
    grouped_supplier_budget: budget?.grouped_supplier_budget ?? null,
    grouped_store_retail: budget?.grouped_store_retail ?? null,
    grouped_customer_budget: budget?.grouped_customer_budget ?? null,
    grouped_recruitment_budget: budget?.grouped_recruitment_budget ?? null,
    start_date: budget?.start_date ?? null,
    end_date: budget?.end_date ?? null,
    total_effective_time: budget?.total_effective_time ?? null,
    total_passed_time: budget?.total_passed_time ?? null,
    spend: spend ? spend.spend : null,
    active: spend ? spend.active : null,
  };
}

/**
 * Full outer join on the dimensional key. Budget rows come first in input
 * order, each fanned out over its matching spend rows; spend rows that match
 * no budget follow.
 */
export function joinBudgetSpend(
  budget: Relation<BudgetRecord>,
  spend: Relation<AggregatedSpend>
): Relation<ReconciliationRow> {
  const spendByKey = new Map<string, AggregatedSpend[]>();
  for (const row of spend.rows) {
    const key = joinKey(row);
    const matches = spendByKey.get(key) ?? [];
    matches.push(row);
    spendByKey.set(key, matches);
  }

  const rows: ReconciliationRow[] = [];
  const matchedKeys = new Set<string>();

  for (const budgetRow of budget.rows) {
    const key = joinKey(budgetRow);
    const matches = spendByKey.get(key);
    if (!matches) {
      rows.push(joinedRow(budgetRow, null));
      continue;
    }
    matchedKeys.add(key);
    for (const spendRow of matches) {
      rows.push(joinedRow(budgetRow, spendRow));
    }
  }

  for (const spendRow of spend.rows) {
    if (!matchedKeys.has(joinKey(spendRow))) {
      rows.push(joinedRow(null, spendRow));
    }
  }

  return { schema: RECONCILIATION_SCHEMA, rows };
}

export function buildJoinSql(budgetRelation: string, spendRelation: string): string {
  const keys = KEY_FIELDS.map((field) => `COALESCE(b.${field}, s.${field}) AS ${field}`);
  const details = BUDGET_DETAIL_FIELDS.map((field) => `b.${field}`);
  const conditions = KEY_FIELDS.map((field) => `EQUAL_NULL(b.${field}, s.${field})`);

  return [
    'SELECT',
    `  ${[...keys, 's.personnel', ...details, 's.spend', 's.active'].join(',\n  ')}`,
    `FROM ${budgetRelation} AS b`,
    `FULL OUTER JOIN ${spendRelation} AS s`,
    `  ON ${conditions.join('\n  AND ')}`,
  ].join('\n');
}
