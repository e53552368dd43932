import type {
  CtaElement,
  Issue,
  IssueCategory,
  MetricSet,
  RuleConfigMap,
  Severity,
  TextAnalysis,
} from 'cta-audit/types';

/**
 * Everything a rule may look at for one element.
 *
 * Rules are pure: the same context always yields the same issues.
 */
export interface RuleContext {
  /** Element after link validation (`element.link` is filled for checked hrefs). */
  element: CtaElement;
  metrics: MetricSet;
  textAnalysis: TextAnalysis;
}

/**
 * Rule-engine configuration.
 */
export interface RulesConfig {
  /**
   * Per-rule configuration map. Keys are rule ids.
   *
   * If a rule has `{ enabled: false }`, it will be skipped.
   */
  rules?: RuleConfigMap;
}

/**
 * Interface all rules must implement.
 */
export interface Rule {
  /** Stable identifier for registration, filtering, and config keys. */
  id: string;

  /** Category for grouping in reports. */
  category: IssueCategory;

  /** Short human-readable description of what this rule checks. */
  description: string;

  /** Highest severity the rule can raise. */
  severity: Severity;

  /**
   * Evaluate the rule against one element.
   *
   * A rule may raise several issues; they are reported in the order returned.
   */
  evaluate(context: RuleContext): Issue[];
}

/**
 * Metadata describing a registered rule.
 */
export interface RuleInfo {
  id: string;
  category: IssueCategory;
  description: string;
  severity: Severity;
}

/**
 * Output from running a set of rules against one element.
 */
export interface RuleRunResult {
  /** Issues in rule registration order. */
  issues: Issue[];

  /** Rule ids that threw and their errors. */
  errors: Array<{ ruleId: string; error: unknown }>;
}
