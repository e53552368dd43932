import type { Issue } from 'cta-audit/types';

import type { RuleContext, RuleRunResult, RulesConfig } from './types.js';

import type { RuleRegistry } from './RuleRegistry.js';
import { createBuiltinRegistry } from './registerBuiltinRules.js';

let builtinRegistry: RuleRegistry | null = null;

function defaultRegistry(): RuleRegistry {
  builtinRegistry ??= createBuiltinRegistry();
  return builtinRegistry;
}

/**
 * Run all enabled rules against one element and aggregate their issues.
 *
 * - Rules run in registration order; issues keep that order
 * - A rule that throws is recorded in `errors` and does not stop the others
 */
export function runRules(options: {
  context: RuleContext;

  /** Defaults to the built-in rule set. */
  registry?: RuleRegistry;

  config?: RulesConfig;
}): RuleRunResult {
  const registry = options.registry ?? defaultRegistry();
  const issues: Issue[] = [];
  const errors: RuleRunResult['errors'] = [];

  for (const rule of registry.enabledRules(options.config)) {
    try {
      issues.push(...rule.evaluate(options.context));
    } catch (error) {
      errors.push({ ruleId: rule.id, error });
    }
  }

  return { issues, errors };
}

/**
 * Issues for one element from every enabled rule, in rule order.
 *
 * Throws the first rule error, if any; use `runRules` to collect errors
 * instead.
 */
export function detectIssues(
  context: RuleContext,
  registry?: RuleRegistry,
  config?: RulesConfig,
): Issue[] {
  const { issues, errors } = runRules({ context, registry, config });
  const [first] = errors;
  if (first) throw first.error;
  return issues;
}
