import type { Issue, IssueCategory, Severity } from 'cta-audit/types';

import type { Rule, RuleContext } from './types.js';

/**
 * Input shape for `createRule(...)`.
 *
 * Mirrors the `Rule` interface for plugin rules that don't need a class.
 */
export interface CreateRuleInput {
  id: string;
  category: IssueCategory;
  description: string;

  /** Highest severity the rule raises. Defaults to `Medium`. */
  severity?: Severity;

  evaluate: (context: RuleContext) => Issue[];
}

/**
 * Shorthand factory for creating simple custom rules.
 */
export function createRule(input: CreateRuleInput): Rule {
  return {
    id: input.id,
    category: input.category,
    description: input.description,
    severity: input.severity ?? 'Medium',
    evaluate: input.evaluate,
  };
}
