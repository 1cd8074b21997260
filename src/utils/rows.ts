import { WarehouseRow } from '../types/reconciliation';

function normalizeValue(value: unknown): unknown {
  if (value instanceof Date) {
    const iso = value.toISOString();
    // DATE columns arrive as midnight UTC
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  return value;
}

/**
 * Warehouse rows come back with upper-cased column names and driver date
 * objects. Lower-case the keys and turn dates into ISO strings so rows can be
 * validated against the lower-case contracts.
 */
export function normalizeRow(row: WarehouseRow): WarehouseRow {
  const normalized: WarehouseRow = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key.toLowerCase()] = normalizeValue(value);
  }
  return normalized;
}

export function normalizeRows(rows: WarehouseRow[]): WarehouseRow[] {
  return rows.map(normalizeRow);
}
