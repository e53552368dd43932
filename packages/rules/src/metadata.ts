import type { RuleInfo } from './types.js';

import type { RuleRegistry } from './RuleRegistry.js';

/**
 * Return metadata for the rules in `registry`, in evaluation order.
 */
export function getRuleMetadata(registry: RuleRegistry): RuleInfo[] {
  return registry.getAll().map((rule) => ({
    id: rule.id,
    category: rule.category,
    description: rule.description,
    severity: rule.severity,
  }));
}
