import { ConfigurationError } from '../utils/errors';
import { PACING_RULE_SET } from './pacingRuleSet';
import { THRESHOLD_RULE_SET } from './thresholdRuleSet';
import { RULE_SET_NAMES, RuleSet, RuleSetName } from './types';

export * from './types';
export { PACING_RULE_SET, THRESHOLD_RULE_SET };
export { deriveFacts, evaluateCondition, conditionSql, safeDivide } from './conditions';

export const RULE_SETS: Record<RuleSetName, RuleSet> = {
  pacing: PACING_RULE_SET,
  threshold: THRESHOLD_RULE_SET,
};

export function isRuleSetName(value: string): value is RuleSetName {
  return RULE_SET_NAMES.some((name) => name === value);
}

export function getRuleSet(name: string): RuleSet {
  if (!isRuleSetName(name)) {
    throw new ConfigurationError(`Unknown rule set "${name}". Available: ${RULE_SET_NAMES.join(', ')}`);
  }
  return RULE_SETS[name];
}
