import { OUTPUT_SCHEMA } from '../config/tableSchemas';
import { conditionSql, deriveFacts, evaluateCondition } from '../rules/conditions';
import { Classification, EvaluationContext, RuleSet } from '../rules/types';
import { ClassifiedRow, ReconciliationRow, Relation, StatusLabel } from '../types/reconciliation';
import { InputValidationError } from '../utils/errors';
import { indent, stringLiteral } from '../utils/sql';

export interface ExplainedRow extends ClassifiedRow {
  rule_id: string | null;
}

const CHECKED_AMOUNTS = ['actual_budget', 'spend'] as const;

function assertWellFormed(row: ReconciliationRow): void {
  for (const field of CHECKED_AMOUNTS) {
    const value = row[field];
    if (value !== null && !Number.isFinite(value)) {
      throw new InputValidationError(`Invalid ${field} ${String(value)}: expected a finite number`, {
        field,
        value: String(value),
      });
    }
  }
}

/**
 * First rule whose conditions all hold decides the status. Rows no rule
 * matches get the rule set's fallback label.
 */
export function classifyRow(row: ReconciliationRow, ruleSet: RuleSet, context: EvaluationContext): Classification {
  assertWellFormed(row);
  const facts = deriveFacts(row, context.asOf);
  const rule = ruleSet.rules.find((candidate) =>
    candidate.when.every((condition) => evaluateCondition(condition, facts, context.parameters))
  );
  return rule ? { status: rule.label, ruleId: rule.id } : { status: ruleSet.fallback, ruleId: null };
}

function withStatus(row: ReconciliationRow, status: StatusLabel, asOf: string): ClassifiedRow {
  return { ...row, status, as_of_date: asOf };
}

export function explainRows(rows: readonly ReconciliationRow[], ruleSet: RuleSet, context: EvaluationContext): ExplainedRow[] {
  return rows.map((row) => {
    const { status, ruleId } = classifyRow(row, ruleSet, context);
    return { ...withStatus(row, status, context.asOf), rule_id: ruleId };
  });
}

export function classifyRows(
  relation: Relation<ReconciliationRow>,
  ruleSet: RuleSet,
  context: EvaluationContext
): Relation<ClassifiedRow> {
  return {
    schema: OUTPUT_SCHEMA,
    rows: relation.rows.map((row) => withStatus(row, classifyRow(row, ruleSet, context).status, context.asOf)),
  };
}

// The same chain as one CASE expression over the joined relation
export function buildStatusCaseSql(ruleSet: RuleSet, context: EvaluationContext): string {
  const branches = ruleSet.rules.map((rule) => {
    const predicate =
      rule.when.length > 0
        ? rule.when.map((condition) => `(${conditionSql(condition, context.asOf, context.parameters)})`).join(' AND ')
        : 'TRUE';
    return `WHEN ${predicate}\n  THEN ${stringLiteral(rule.label)}`;
  });
  return ['CASE', indent(branches.join('\n')), `  ELSE ${stringLiteral(ruleSet.fallback)}`, 'END'].join('\n');
}
