export * from './types/index.js';
export { parseSnapshot, SnapshotInvariantError, CtaElementSchema } from './snapshot/schema.js';

export { LinkValidator, DEFAULT_LINK_CONCURRENCY } from './links/LinkValidator.js';
export type { LinkProgress } from './links/LinkValidator.js';
export { checkLink, DEFAULT_LINK_TIMEOUT_MS, DEFAULT_USER_AGENT } from './links/checkLink.js';
export type { CheckLinkOptions } from './links/checkLink.js';
export { classifyHref, classifyStatus, classifyFetchError } from './links/classify.js';
export type { HrefClassification, LinkFailure } from './links/classify.js';
export { failedCheck, runLinkChecks } from './links/checkPool.js';
export type { CheckPoolOptions, PendingCheck } from './links/checkPool.js';

export { MetricScorer, METRIC_WEIGHTS, weightedOverall } from './scoring/MetricScorer.js';
export { analyzeText, countWords } from './scoring/textAnalysis.js';
export { VOCABULARY, containsTerm } from './scoring/vocabulary.js';

export {
  aggregateRecommendations,
  isPrimaryCta,
  recommendForElement,
} from './reporting/recommendations.js';
export { buildAuditResult, NO_CTAS_NOTE } from './reporting/ReportBuilder.js';
export type { BuildAuditResultInput } from './reporting/ReportBuilder.js';
export { ReportGenerator, METRIC_LABELS } from './reporting/ReportGenerator.js';
export type {
  Reporter,
  JsonReportOptions,
  MarkdownReportOptions,
  ConsoleReportOptions,
} from './reporting/ReportGenerator.js';

export { CtaAuditor, INVALID_URL_ERROR, isAuditableUrl } from './auditor/CtaAuditor.js';
export { DEFAULT_ANALYSIS_TYPE } from './auditor/types.js';
export type { AuditConfig, AuditorEvents } from './auditor/types.js';

export { makeElement, makeIssue, makeLinkCheck, makeMetrics } from './testing/fixtures.js';
export { expectAudit } from './testing/expect.js';

export { createAIProvider } from '@cta-audit/ai-providers';
export type { Rule, RuleContext, RuleInfo } from '@cta-audit/rules';
export { createRule, getRuleMetadata, RuleRegistry } from '@cta-audit/rules';

export { audit, auditSnapshot, normalizeProvider, toAuditConfig } from './api.js';
export type { AuditOptions, ProviderInput } from './api.js';
