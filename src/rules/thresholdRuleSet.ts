import { STATUS_LABELS } from '../types/reconciliation';
import { RuleSet } from './types';

// Threshold-only chain used for the personnel-level output
export const THRESHOLD_RULE_SET: RuleSet = {
  name: 'threshold',
  version: 1,
  description: 'Budget thresholds and activity only, without grace window or pacing checks',
  fallback: STATUS_LABELS.UNRECOGNIZED,
  rules: [
    {
      id: 'spend-without-budget-active',
      label: STATUS_LABELS.SPEND_WITHOUT_BUDGET_ACTIVE,
      when: [
        { kind: 'spend', is: 'positive' },
        { kind: 'budget', is: 'absent' },
        { kind: 'active', is: true },
      ],
    },
    {
      id: 'spend-without-budget-inactive',
      label: STATUS_LABELS.SPEND_WITHOUT_BUDGET_INACTIVE,
      when: [
        { kind: 'spend', is: 'positive' },
        { kind: 'budget', is: 'absent' },
      ],
    },
    {
      id: 'no-budget',
      label: STATUS_LABELS.NO_BUDGET,
      when: [{ kind: 'budget', is: 'absent' }],
    },
    {
      id: 'not-yet-started',
      label: STATUS_LABELS.NOT_YET_STARTED,
      when: [
        { kind: 'budget', is: 'present' },
        { kind: 'schedule', is: 'beforeStart' },
      ],
    },
    {
      id: 'ended-without-spend',
      label: STATUS_LABELS.ENDED_WITHOUT_SPEND,
      when: [
        { kind: 'budget', is: 'present' },
        { kind: 'schedule', is: 'ended' },
        { kind: 'spend', is: 'zero' },
      ],
    },
    {
      id: 'over-budget',
      label: STATUS_LABELS.OVER_BUDGET_ACTIVE,
      when: [
        { kind: 'budget', is: 'present' },
        { kind: 'ratio', above: { threshold: 'overBudgetRatio', inclusive: false } },
      ],
    },
    {
      id: 'near-completion',
      label: STATUS_LABELS.NEAR_COMPLETION,
      when: [
        { kind: 'budget', is: 'present' },
        {
          kind: 'ratio',
          above: { threshold: 'nearCompletionRatio', inclusive: true },
          below: { threshold: 'completedRatio', inclusive: true },
        },
      ],
    },
    {
      id: 'in-progress',
      label: STATUS_LABELS.IN_PROGRESS,
      when: [
        { kind: 'budget', is: 'present' },
        { kind: 'active', is: true },
      ],
    },
  ],
};
