import { AGGREGATED_SPEND_SCHEMA } from '../config/tableSchemas';
import { AggregatedSpend, KEY_FIELDS, RawSpendRecord, Relation } from '../types/reconciliation';
import { stringLiteral } from '../utils/sql';

export interface AggregationOptions {
  /** Keep one row per personnel within each key */
  groupByPersonnel: boolean;
  /** campaign_status values that count as active */
  activeMarkers: readonly string[];
}

function groupKey(record: RawSpendRecord, personnel: string | null): string {
  return JSON.stringify([...KEY_FIELDS.map((field) => record[field]), personnel]);
}

/**
 * One row per key (and personnel, when grouped): spend summed with missing
 * values as 0, active when any record carries an active marker. Keys without
 * spend records stay absent.
 */
export function aggregateSpend(
  relation: Relation<RawSpendRecord>,
  options: AggregationOptions
): Relation<AggregatedSpend> {
  const markers = new Set(options.activeMarkers);
  const groups = new Map<string, AggregatedSpend>();

  for (const record of relation.rows) {
    const personnel = options.groupByPersonnel ? record.personnel ?? null : null;
    const key = groupKey(record, personnel);
    const isActive = record.campaign_status !== null && markers.has(record.campaign_status);
    const existing = groups.get(key);

    if (existing) {
      existing.spend += record.spend ?? 0;
      existing.active = existing.active || isActive;
      continue;
    }

    groups.set(key, {
      budget_group_1: record.budget_group_1,
      budget_group_2: record.budget_group_2,
      region: record.region,
      category_level_1: record.category_level_1,
      track_group: record.track_group,
      pillar_group: record.pillar_group,
      content_group: record.content_group,
      platform: record.platform,
      objective: record.objective,
      month: record.month,
      year: record.year,
      personnel,
      spend: record.spend ?? 0,
      active: isActive,
    });
  }

  return { schema: AGGREGATED_SPEND_SCHEMA, rows: [...groups.values()] };
}

export function buildAggregationSql(sourceRelation: string, options: AggregationOptions): string {
  const groupColumns = options.groupByPersonnel ? [...KEY_FIELDS, 'personnel'] : [...KEY_FIELDS];
  const personnel = options.groupByPersonnel ? 'personnel' : 'CAST(NULL AS VARCHAR) AS personnel';
  const markers = options.activeMarkers.map(stringLiteral).join(', ');

  return [
    'SELECT',
    `  ${KEY_FIELDS.join(',\n  ')},`,
    `  ${personnel},`,
    '  SUM(COALESCE(spend, 0)) AS spend,',
    `  MAX(IFF(campaign_status IN (${markers}), 1, 0)) = 1 AS active`,
    `FROM ${sourceRelation}`,
    `GROUP BY ${groupColumns.join(', ')}`,
  ].join('\n');
}
