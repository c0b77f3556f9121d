import type { PatternRecognizer } from './RuleStrategy';
import { RiichiRule } from './RiichiRule';

const RULES: PatternRecognizer[] = [new RiichiRule()];
const DEFAULT_RULE: PatternRecognizer = RULES[0] ?? new RiichiRule();

export function getRule(id: string | undefined | null): PatternRecognizer {
  const key = String(id ?? '').trim().toLowerCase();
  return RULES.find(r => r.id === key) ?? DEFAULT_RULE;
}

export function defaultRuleId(): string {
  return DEFAULT_RULE.id;
}

export function listRules(): Array<{ id: string; name: string }> {
  return RULES.map(r => ({ id: r.id, name: r.name }));
}
