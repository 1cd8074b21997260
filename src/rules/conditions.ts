/**
 * Condition interpreters. Every condition has two renderings that must agree:
 * an in-process evaluation over RowFacts and a SQL predicate over the joined
 * relation's columns. A comparison against a missing value never holds, which
 * is how the SQL CASE treats NULL as well.
 */

import { ReconciliationRow } from '../types/reconciliation';
import { toEpochDay } from '../utils/dates';
import { dateLiteral, numberLiteral } from '../utils/sql';
import { ClassifierParameters, Condition, RatioBound, RowFacts } from './types';

// Decimal places kept by the warehouse when dividing NUMBER columns
const DIVISION_SCALE = 1e12;

/**
 * Zero or missing denominator gives 0; missing numerator stays missing.
 * Quotients are rounded to the warehouse's division scale, so 2.97 / 3 is
 * exactly 0.99 here as it is in DIV0NULL.
 */
export function safeDivide(numerator: number | null, denominator: number | null): number | null {
  if (denominator === null || denominator === 0) return 0;
  if (numerator === null) return null;
  return Math.round((numerator / denominator) * DIVISION_SCALE) / DIVISION_SCALE;
}

export function deriveFacts(row: ReconciliationRow, asOf: string): RowFacts {
  const asOfDay = toEpochDay(asOf, 'asOf');
  const startDate = row.start_date === null ? null : toEpochDay(row.start_date, 'start_date');
  const endDate = row.end_date === null ? null : toEpochDay(row.end_date, 'end_date');

  const windowDays = startDate !== null && endDate !== null ? endDate - startDate : null;
  const daysSinceStart = startDate !== null ? asOfDay - startDate : null;
  const elapsed =
    windowDays !== null && daysSinceStart !== null
      ? Math.min(Math.max(daysSinceStart, 0), windowDays)
      : null;

  return {
    budget: row.actual_budget ?? 0,
    spend: row.spend,
    active: row.active ?? false,
    statusRecorded: row.active !== null,
    asOf: asOfDay,
    startDate,
    endDate,
    ratio: safeDivide(row.spend, row.actual_budget),
    windowDays,
    daysSinceStart,
    expectedPacing: elapsed === null ? null : safeDivide(elapsed, windowDays),
  };
}

function withinBound(value: number, bound: RatioBound, side: 'above' | 'below', params: ClassifierParameters): boolean {
  const threshold = params[bound.threshold];
  if (side === 'above') {
    return bound.inclusive ? value >= threshold : value > threshold;
  }
  return bound.inclusive ? value <= threshold : value < threshold;
}

type Schedule = Extract<Condition, { kind: 'schedule' }>['is'];

function scheduleHolds(schedule: Schedule, { asOf, startDate, endDate }: RowFacts): boolean {
  switch (schedule) {
    case 'beforeStart':
      return startDate !== null && asOf < startDate;
    case 'started':
      return startDate !== null && asOf >= startDate;
    case 'inWindow':
      return startDate !== null && endDate !== null && asOf >= startDate && asOf <= endDate;
    case 'ended':
      return endDate !== null && asOf > endDate;
  }
}

export function evaluateCondition(condition: Condition, facts: RowFacts, params: ClassifierParameters): boolean {
  switch (condition.kind) {
    case 'spend':
      return condition.is === 'positive' ? facts.spend !== null && facts.spend > 0 : (facts.spend ?? 0) === 0;
    case 'budget':
      return condition.is === 'present' ? facts.budget > 0 : facts.budget <= 0;
    case 'active':
      return facts.active === condition.is;
    case 'statusRecorded':
      return facts.statusRecorded === condition.is;
    case 'schedule':
      return scheduleHolds(condition.is, facts);
    case 'grace':
      if (facts.daysSinceStart === null) return false;
      return condition.is === 'within'
        ? facts.daysSinceStart <= params.graceDays
        : facts.daysSinceStart > params.graceDays;
    case 'ratio': {
      const { ratio } = facts;
      if (ratio === null) return false;
      if (condition.above && !withinBound(ratio, condition.above, 'above', params)) return false;
      if (condition.below && !withinBound(ratio, condition.below, 'below', params)) return false;
      return true;
    }
    case 'window':
      return facts.windowDays !== null && facts.windowDays > 0;
    case 'pacing': {
      const { ratio, expectedPacing } = facts;
      if (ratio === null || expectedPacing === null) return false;
      return condition.is === 'behind'
        ? expectedPacing - ratio > params.pacingMargin
        : ratio - expectedPacing > params.pacingMargin;
    }
    default: {
      const unsupported: never = condition;
      throw new Error(`Unsupported condition ${JSON.stringify(unsupported)}`);
    }
  }
}

// SQL renderings of the derived facts over the joined relation
export function factExpressions(asOf: string) {
  const asOfSql = dateLiteral(asOf);
  const windowDays = `DATEDIFF('day', start_date, end_date)`;
  const daysSinceStart = `DATEDIFF('day', start_date, ${asOfSql})`;
  return {
    asOf: asOfSql,
    budget: 'COALESCE(actual_budget, 0)',
    spend: 'spend',
    active: 'COALESCE(active, FALSE)',
    ratio: 'DIV0NULL(spend, actual_budget)',
    windowDays,
    daysSinceStart,
    expectedPacing: `DIV0NULL(LEAST(GREATEST(${daysSinceStart}, 0), ${windowDays}), ${windowDays})`,
  };
}

function scheduleSql(schedule: Schedule, asOfSql: string): string {
  switch (schedule) {
    case 'beforeStart':
      return `${asOfSql} < start_date`;
    case 'started':
      return `${asOfSql} >= start_date`;
    case 'inWindow':
      return `${asOfSql} BETWEEN start_date AND end_date`;
    case 'ended':
      return `${asOfSql} > end_date`;
  }
}

export function conditionSql(condition: Condition, asOf: string, params: ClassifierParameters): string {
  const f = factExpressions(asOf);
  switch (condition.kind) {
    case 'spend':
      return condition.is === 'positive' ? `${f.spend} > 0` : `COALESCE(${f.spend}, 0) = 0`;
    case 'budget':
      return condition.is === 'present' ? `${f.budget} > 0` : `${f.budget} <= 0`;
    case 'active':
      return condition.is ? f.active : `NOT ${f.active}`;
    case 'statusRecorded':
      return condition.is ? 'active IS NOT NULL' : 'active IS NULL';
    case 'schedule':
      return scheduleSql(condition.is, f.asOf);
    case 'grace':
      return `${f.daysSinceStart} ${condition.is === 'within' ? '<=' : '>'} ${numberLiteral(params.graceDays)}`;
    case 'ratio': {
      const parts: string[] = [];
      if (condition.above) {
        const op = condition.above.inclusive ? '>=' : '>';
        parts.push(`${f.ratio} ${op} ${numberLiteral(params[condition.above.threshold])}`);
      }
      if (condition.below) {
        const op = condition.below.inclusive ? '<=' : '<';
        parts.push(`${f.ratio} ${op} ${numberLiteral(params[condition.below.threshold])}`);
      }
      return parts.length > 0 ? parts.join(' AND ') : `${f.ratio} IS NOT NULL`;
    }
    case 'window':
      return `${f.windowDays} > 0`;
    case 'pacing':
      return condition.is === 'behind'
        ? `${f.expectedPacing} - ${f.ratio} > ${numberLiteral(params.pacingMargin)}`
        : `${f.ratio} - ${f.expectedPacing} > ${numberLiteral(params.pacingMargin)}`;
    default: {
      const unsupported: never = condition;
      throw new Error(`Unsupported condition ${JSON.stringify(unsupported)}`);
    }
  }
}
