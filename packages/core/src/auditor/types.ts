import type { AuditResult, ElementAnalysis } from '../types/audit.js';
import type { AIProvider } from '../types/provider.js';
import type { AiProviderConfig, LinkValidationConfig } from '../types/config.js';
import type { LinkProgress } from '../links/LinkValidator.js';

import type { RuleRegistry, RulesConfig } from '@cta-audit/rules';

export const DEFAULT_ANALYSIS_TYPE = 'Comprehensive CTA Audit';

/**
 * Top-level audit configuration used by the orchestrator.
 *
 * Composes the smaller configs:
 * - link validation settings
 * - rules engine config (per-rule `enabled`)
 * - optional recommendation service
 */
export interface AuditConfig extends RulesConfig {
  /** Label copied into the result. Default: "Comprehensive CTA Audit". */
  analysisType?: string;

  /**
   * External recommendation service. When omitted no service is called and
   * `aiRecommendations` is absent from the result.
   */
  aiProvider?: AiProviderConfig;

  /** Ready-made service; takes precedence over `aiProvider`. */
  recommender?: AIProvider;

  links?: LinkValidationConfig;

  /** Rule set to run. Default: the built-in rules. */
  registry?: RuleRegistry;

  /** Clock for metadata timestamps. Default: `Date.now`. */
  now?: () => number;
}

/**
 * Typed events emitted by the auditor.
 */
export interface AuditorEvents {
  start: [url: string];
  'links:progress': [progress: LinkProgress];
  'links:complete': [summary: { checked: number; skipped: number }];
  'element:complete': [analysis: ElementAnalysis];
  'ai:error': [error: unknown];
  complete: [result: AuditResult];
}
