/**
 * Declared column contracts for the source domains and the published mart.
 * Source tables are asserted against these before they are unioned.
 */

import { BUDGET_AMOUNT_FIELDS, ColumnSpec, KEY_FIELDS, KeyField } from '../types/reconciliation';

const keyType = (field: KeyField): ColumnSpec => ({
  name: field,
  type: field === 'year' ? 'integer' : 'string',
});

export const KEY_COLUMNS: readonly ColumnSpec[] = KEY_FIELDS.map(keyType);

const PERSONNEL_COLUMN: ColumnSpec = { name: 'personnel', type: 'string' };

export function spendSourceSchema(includePersonnel: boolean): readonly ColumnSpec[] {
  return [
    ...KEY_COLUMNS,
    ...(includePersonnel ? [PERSONNEL_COLUMN] : []),
    { name: 'spend', type: 'numeric' },
    { name: 'campaign_status', type: 'string' },
  ];
}

export const AGGREGATED_SPEND_SCHEMA: readonly ColumnSpec[] = [
  ...KEY_COLUMNS,
  PERSONNEL_COLUMN,
  { name: 'spend', type: 'numeric' },
  { name: 'active', type: 'boolean' },
];

const BUDGET_DETAIL_COLUMNS: readonly ColumnSpec[] = [
  ...BUDGET_AMOUNT_FIELDS.map((name): ColumnSpec => ({ name, type: 'numeric' })),
  { name: 'start_date', type: 'date' },
  { name: 'end_date', type: 'date' },
  { name: 'total_effective_time', type: 'integer' },
  { name: 'total_passed_time', type: 'integer' },
];

export const BUDGET_SOURCE_SCHEMA: readonly ColumnSpec[] = [...KEY_COLUMNS, ...BUDGET_DETAIL_COLUMNS];

// Joined relation before classification
export const RECONCILIATION_SCHEMA: readonly ColumnSpec[] = [
  ...KEY_COLUMNS,
  PERSONNEL_COLUMN,
  ...BUDGET_DETAIL_COLUMNS,
  { name: 'spend', type: 'numeric' },
  { name: 'active', type: 'boolean' },
];

export const OUTPUT_SCHEMA: readonly ColumnSpec[] = [
  ...RECONCILIATION_SCHEMA,
  { name: 'status', type: 'string' },
  { name: 'as_of_date', type: 'date' },
];
