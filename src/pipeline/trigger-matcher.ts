import type { TriggerEvent, TriggerRule } from './pipeline.types';

export function ruleMatches(rule: TriggerRule, event: TriggerEvent): boolean {
  return rule.kind === event.kind && rule.branches.includes(event.branch);
}

/** True iff any rule matches. No side effects. */
export function matchesAnyTrigger(rules: readonly TriggerRule[], event: TriggerEvent): boolean {
  return rules.some((rule) => ruleMatches(rule, event));
}
