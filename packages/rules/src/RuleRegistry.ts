import type { IssueCategory } from 'cta-audit/types';

import type { Rule, RulesConfig } from './types.js';

/**
 * Ordered collection of rules.
 *
 * Registration order is evaluation order, so issue output is stable.
 */
export class RuleRegistry {
  private readonly rules = new Map<string, Rule>();

  /**
   * Create an empty registry.
   */
  static create(): RuleRegistry {
    return new RuleRegistry();
  }

  private constructor() {}

  /**
   * Register a rule. Throws if a rule with the same id already exists.
   */
  register(rule: Rule): void {
    if (this.rules.has(rule.id)) {
      throw new Error(`Rule already registered: ${rule.id}`);
    }
    this.rules.set(rule.id, rule);
  }

  get(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  /**
   * Get all rules in a stable registration order.
   */
  getAll(): Rule[] {
    return Array.from(this.rules.values());
  }

  getByCategory(category: IssueCategory): Rule[] {
    return this.getAll().filter((r) => r.category === category);
  }

  /**
   * Filter enabled rules based on a `RulesConfig`.
   *
   * Rules are enabled by default unless explicitly disabled.
   */
  enabledRules(config: RulesConfig = {}): Rule[] {
    const perRule = config.rules ?? {};
    return this.getAll().filter((rule) => perRule[rule.id]?.enabled !== false);
  }
}
