import { STATUS_LABELS } from '../types/reconciliation';
import { Condition, RuleSet } from './types';

const HAS_BUDGET: Condition = { kind: 'budget', is: 'present' };
const NO_BUDGET: Condition = { kind: 'budget', is: 'absent' };
const SPEND_POSITIVE: Condition = { kind: 'spend', is: 'positive' };
const SPEND_ZERO: Condition = { kind: 'spend', is: 'zero' };
const ACTIVE: Condition = { kind: 'active', is: true };
const INACTIVE: Condition = { kind: 'active', is: false };
const NO_STATUS: Condition = { kind: 'statusRecorded', is: false };
const OVER_BUDGET: Condition = {
  kind: 'ratio',
  above: { threshold: 'overBudgetRatio', inclusive: true },
};
const UNDER_NEAR_COMPLETION: Condition = {
  kind: 'ratio',
  below: { threshold: 'nearCompletionRatio', inclusive: false },
};

/**
 * Daily pacing rule set: schedule, grace window and spend-vs-elapsed-time
 * checks on top of the budget thresholds.
 */
export const PACING_RULE_SET: RuleSet = {
  name: 'pacing',
  version: 2,
  description: 'Budget thresholds with schedule, grace window and pacing deviation checks',
  fallback: STATUS_LABELS.UNRECOGNIZED,
  rules: [
    {
      id: 'spend-without-budget-active',
      label: STATUS_LABELS.SPEND_WITHOUT_BUDGET_ACTIVE,
      when: [SPEND_POSITIVE, NO_BUDGET, ACTIVE],
    },
    {
      id: 'spend-without-budget-inactive',
      label: STATUS_LABELS.SPEND_WITHOUT_BUDGET_INACTIVE,
      when: [SPEND_POSITIVE, NO_BUDGET, INACTIVE],
    },
    {
      id: 'no-budget',
      label: STATUS_LABELS.NO_BUDGET,
      when: [NO_BUDGET],
    },
    {
      id: 'not-yet-started',
      label: STATUS_LABELS.NOT_YET_STARTED,
      when: [HAS_BUDGET, { kind: 'schedule', is: 'beforeStart' }],
    },
    {
      id: 'not-set',
      label: STATUS_LABELS.NOT_SET,
      when: [HAS_BUDGET, { kind: 'schedule', is: 'started' }, SPEND_ZERO, NO_STATUS, { kind: 'grace', is: 'within' }],
    },
    {
      id: 'delayed',
      label: STATUS_LABELS.DELAYED,
      when: [HAS_BUDGET, { kind: 'schedule', is: 'inWindow' }, SPEND_ZERO, NO_STATUS, { kind: 'grace', is: 'past' }],
    },
    {
      id: 'ended-without-spend',
      label: STATUS_LABELS.ENDED_WITHOUT_SPEND,
      when: [HAS_BUDGET, { kind: 'schedule', is: 'ended' }, SPEND_ZERO],
    },
    {
      id: 'over-budget-active',
      label: STATUS_LABELS.OVER_BUDGET_ACTIVE,
      when: [HAS_BUDGET, OVER_BUDGET, ACTIVE],
    },
    {
      id: 'over-budget-inactive',
      label: STATUS_LABELS.OVER_BUDGET_INACTIVE,
      when: [HAS_BUDGET, OVER_BUDGET, INACTIVE],
    },
    {
      id: 'completed',
      label: STATUS_LABELS.COMPLETED,
      when: [
        HAS_BUDGET,
        {
          kind: 'ratio',
          above: { threshold: 'completedRatio', inclusive: false },
          below: { threshold: 'overBudgetRatio', inclusive: true },
        },
      ],
    },
    {
      id: 'near-completion',
      label: STATUS_LABELS.NEAR_COMPLETION,
      when: [
        HAS_BUDGET,
        ACTIVE,
        {
          kind: 'ratio',
          above: { threshold: 'nearCompletionRatio', inclusive: true },
          below: { threshold: 'completedRatio', inclusive: true },
        },
      ],
    },
    {
      id: 'low-spend',
      label: STATUS_LABELS.LOW_SPEND,
      when: [HAS_BUDGET, ACTIVE, UNDER_NEAR_COMPLETION, { kind: 'window', is: 'positive' }, { kind: 'pacing', is: 'behind' }],
    },
    {
      id: 'high-spend',
      label: STATUS_LABELS.HIGH_SPEND,
      when: [HAS_BUDGET, ACTIVE, UNDER_NEAR_COMPLETION, { kind: 'window', is: 'positive' }, { kind: 'pacing', is: 'ahead' }],
    },
    {
      id: 'off',
      label: STATUS_LABELS.OFF,
      when: [
        HAS_BUDGET,
        SPEND_POSITIVE,
        INACTIVE,
        { kind: 'ratio', below: { threshold: 'completedRatio', inclusive: false } },
      ],
    },
    {
      id: 'in-progress',
      label: STATUS_LABELS.IN_PROGRESS,
      when: [HAS_BUDGET, SPEND_POSITIVE, ACTIVE],
    },
  ],
};
