/**
 * Rule table types. A rule set is an ordered list of rules; the first rule
 * whose conditions all hold assigns the status label.
 */

import { StatusLabel } from '../types/reconciliation';

export type RuleSetName = 'pacing' | 'threshold';

export const RULE_SET_NAMES: readonly RuleSetName[] = ['pacing', 'threshold'];

export interface ClassifierParameters {
  /** Spend/budget ratio at which a budget counts as overspent */
  overBudgetRatio: number;
  /** Ratio above which a budget counts as completed */
  completedRatio: number;
  /** Lower edge of the near-completion band */
  nearCompletionRatio: number;
  /** Allowed gap between spend pacing and elapsed time before flagging */
  pacingMargin: number;
  /** Days after start before a budget with no activity is delayed */
  graceDays: number;
}

export const DEFAULT_CLASSIFIER_PARAMETERS: ClassifierParameters = {
  overBudgetRatio: 1.01,
  completedRatio: 0.99,
  nearCompletionRatio: 0.95,
  pacingMargin: 0.3,
  graceDays: 3,
};

export type RatioThreshold = 'overBudgetRatio' | 'completedRatio' | 'nearCompletionRatio';

export interface RatioBound {
  threshold: RatioThreshold;
  inclusive: boolean;
}

export type Condition =
  | { kind: 'spend'; is: 'positive' | 'zero' }
  | { kind: 'budget'; is: 'present' | 'absent' }
  | { kind: 'active'; is: boolean }
  | { kind: 'statusRecorded'; is: boolean }
  | { kind: 'schedule'; is: 'beforeStart' | 'started' | 'inWindow' | 'ended' }
  | { kind: 'grace'; is: 'within' | 'past' }
  | { kind: 'ratio'; above?: RatioBound; below?: RatioBound }
  | { kind: 'window'; is: 'positive' }
  | { kind: 'pacing'; is: 'behind' | 'ahead' };

export interface Rule {
  id: string;
  label: StatusLabel;
  when: readonly Condition[];
}

export interface RuleSet {
  name: RuleSetName;
  version: number;
  description: string;
  rules: readonly Rule[];
  fallback: StatusLabel;
}

/**
 * Everything a condition may look at, derived from one joined row and the
 * evaluation date. Dates are epoch days.
 */
export interface RowFacts {
  budget: number;
  spend: number | null;
  active: boolean;
  statusRecorded: boolean;
  asOf: number;
  startDate: number | null;
  endDate: number | null;
  ratio: number | null;
  windowDays: number | null;
  daysSinceStart: number | null;
  expectedPacing: number | null;
}

export interface EvaluationContext {
  /** Evaluation date, YYYY-MM-DD */
  asOf: string;
  parameters: ClassifierParameters;
}

export interface Classification {
  status: StatusLabel;
  /** null when the fallback label was used */
  ruleId: string | null;
}
