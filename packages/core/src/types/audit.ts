import type { CtaElement, ElementType, Position } from './element.js';
import type { Issue, Severity } from './issue.js';
import type { MetricSet, TextAnalysis } from './metrics.js';

/**
 * Everything derived for one element during the analysis pass.
 */
export interface ElementAnalysis {
  /** Element after link validation. */
  element: CtaElement;
  metrics: MetricSet;
  textAnalysis: TextAnalysis;
  issues: Issue[];
  /** Per-element recommendations, before report-level deduplication. */
  recommendations: string[];
}

/**
 * Reporting buckets. They overlap: a link can be both `primary` and `link`.
 */
export interface CtaCounts {
  /** urgency > 60 and actionClarity > 70 */
  primary: number;
  /** Links that are not primary. */
  secondary: number;
  form: number;
  link: number;
  /** Types outside button/link/form/dropdown. */
  other: number;
}

/**
 * Mean of each sub-score across elements, rounded to integers.
 */
export type ScoringBreakdown = MetricSet;

/**
 * One positional data point for heatmap rendering.
 */
export interface HeatmapPoint {
  elementId: string;
  /** Bounding-box center. */
  center: Position;
  /** Text truncated to 30 characters (plus `...`). */
  text: string;
  elementType: ElementType;
  score: number;
  /** Comma-joined issue kinds, or `None`. */
  issues: string;
  severity: Severity | 'None';
}

/**
 * Name and message of the error behind a recovered failure.
 */
export interface ErrorSummary {
  name: string;
  message: string;
}

/**
 * A recovered, non-fatal error as it appears in the report.
 */
export interface AuditError {
  stage: string;
  message: string;
  cause?: ErrorSummary;
}

/**
 * A recovered error while the audit is running; `cause` is whatever was thrown.
 */
export interface RecoveredError {
  stage: string;
  message: string;
  cause?: unknown;
}

/**
 * Metadata captured during the audit pipeline execution.
 */
export interface AuditMetadata {
  /** Schema version for report stability. */
  schemaVersion: '1.0';

  /** ISO timestamp when the audit started. */
  startedAt: string;

  /** ISO timestamp when the audit completed. */
  completedAt: string;

  /** Total duration in ms. */
  durationMs: number;

  /** Recommendation provider id, or `none`. */
  aiProvider: string;

  /** Provider model id (when known). */
  model: string;

  /** Rule ids that were executed. */
  rulesExecuted: string[];

  /** Number of hrefs that went through a network check. */
  linksChecked: number;

  /** Number of hrefs classified as not checkable. */
  linksSkipped: number;
}

/**
 * Final output of a successful audit. Deep-frozen once built.
 */
export interface AuditResult {
  url: string;
  analysisType: string;
  totalCtas: number;

  /** `true` when the snapshot contained no elements. */
  noCtasFound: boolean;

  /** Explanatory note, set when `noCtasFound`. */
  note?: string;

  counts: CtaCounts;
  countsByType: Partial<Record<ElementType, number>>;

  issues: Issue[];
  totalIssues: number;

  /** Never empty for a non-empty snapshot. */
  strengths: string[];

  /** Deduplicated, first-seen order; includes external recommendations. */
  recommendations: string[];

  /** Rounded mean of per-element `overallScore` (0 with no elements). */
  score: number;
  scoringBreakdown: ScoringBreakdown;
  heatmapData: HeatmapPoint[];
  elements: ElementAnalysis[];

  /** Recommendations returned by the external service, when one was called. */
  aiRecommendations?: string[];

  metadata: AuditMetadata;

  /** Recovered errors (e.g. a failed recommendation call). */
  errors: AuditError[];
}

/**
 * Structured failure for input errors (invalid URL, snapshot capture failure).
 */
export interface AuditFailure {
  error: string;
}

export type AuditOutcome = AuditResult | AuditFailure;

/**
 * Narrow an `AuditOutcome` to the failure branch.
 */
export function isAuditFailure(outcome: AuditOutcome): outcome is AuditFailure {
  return 'error' in outcome && typeof outcome.error === 'string';
}
