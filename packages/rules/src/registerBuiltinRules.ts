import { RuleRegistry } from './RuleRegistry.js';

import { TextQualityRule } from './rules/text-quality/TextQualityRule.js';
import { MissingLinkRule } from './rules/missing-link/MissingLinkRule.js';
import { HiddenElementRule } from './rules/hidden-element/HiddenElementRule.js';
import { AccessibleNameRule } from './rules/accessible-name/AccessibleNameRule.js';
import { ElementIdRule } from './rules/element-id/ElementIdRule.js';
import { LinkHealthRule } from './rules/link-health/LinkHealthRule.js';

/**
 * Register all built-in rules into a registry, in report order.
 */
export function registerBuiltinRules(registry: RuleRegistry): void {
  registry.register(new TextQualityRule());
  registry.register(new MissingLinkRule());
  registry.register(new HiddenElementRule());
  registry.register(new AccessibleNameRule());
  registry.register(new ElementIdRule());
  registry.register(new LinkHealthRule());
}

/**
 * A fresh registry holding the built-in rules.
 */
export function createBuiltinRegistry(): RuleRegistry {
  const registry = RuleRegistry.create();
  registerBuiltinRules(registry);
  return registry;
}
