export * from './types.js';
export * from './RuleRegistry.js';
export * from './BaseRule.js';
export * from './aggregator.js';
export * from './registerBuiltinRules.js';
export * from './createRule.js';
export * from './metadata.js';

export * from './rules/text-quality/TextQualityRule.js';
export * from './rules/missing-link/MissingLinkRule.js';
export * from './rules/hidden-element/HiddenElementRule.js';
export * from './rules/accessible-name/AccessibleNameRule.js';
export * from './rules/element-id/ElementIdRule.js';
export * from './rules/link-health/LinkHealthRule.js';
