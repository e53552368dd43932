import type {
  AuditError,
  AuditMetadata,
  AuditResult,
  CtaCounts,
  ElementAnalysis,
  ErrorSummary,
  HeatmapPoint,
  RecoveredError,
  ScoringBreakdown,
} from '../types/audit.js';
import type { ElementType } from '../types/element.js';
import type { Issue, Severity } from '../types/issue.js';
import type { MetricName } from '../types/metrics.js';
import { deepFreeze } from '../utils/freeze.js';

import { aggregateRecommendations, isPrimaryCta } from './recommendations.js';

export const NO_CTAS_NOTE = 'No CTA elements found on the website';

const HEATMAP_TEXT_LENGTH = 30;
const BUCKETED_TYPES = new Set<ElementType>(['button', 'link', 'form', 'dropdown']);
const SEVERITY_RANK: Record<Severity, number> = { High: 3, Medium: 2, Low: 1 };

export interface BuildAuditResultInput {
  url: string;
  analysisType: string;
  analyses: readonly ElementAnalysis[];

  /** External recommendations; `undefined` when no service was called. */
  aiRecommendations?: readonly string[];

  metadata: AuditMetadata;
  errors?: readonly RecoveredError[];
}

/**
 * Assemble the final, deep-frozen `AuditResult` from per-element analyses.
 *
 * With zero analyses every average is 0 and `noCtasFound` is set.
 */
export function buildAuditResult(input: BuildAuditResultInput): AuditResult {
  const analyses = [...input.analyses];
  const issues: Issue[] = analyses.flatMap((a) => a.issues);
  const { strengths, recommendations } = aggregateRecommendations(
    analyses,
    input.aiRecommendations,
  );
  const scoringBreakdown = averageScores(analyses);

  const result: AuditResult = {
    url: input.url,
    analysisType: input.analysisType,
    totalCtas: analyses.length,
    noCtasFound: analyses.length === 0,
    ...(analyses.length === 0 ? { note: NO_CTAS_NOTE } : {}),
    counts: countBuckets(analyses),
    countsByType: countByType(analyses),
    issues,
    totalIssues: issues.length,
    strengths,
    recommendations,
    score: scoringBreakdown.overallScore,
    scoringBreakdown,
    heatmapData: analyses.map(heatmapPoint),
    elements: analyses,
    ...(input.aiRecommendations ? { aiRecommendations: [...input.aiRecommendations] } : {}),
    metadata: input.metadata,
    errors: (input.errors ?? []).map(toAuditError),
  };

  return deepFreeze(result);
}

// The report is frozen, so thrown objects are copied rather than referenced.
function toAuditError(error: RecoveredError): AuditError {
  const { cause, ...rest } = error;
  return cause === undefined ? rest : { ...rest, cause: summarizeCause(cause) };
}

function summarizeCause(cause: unknown): ErrorSummary {
  if (cause instanceof Error) return { name: cause.name, message: cause.message };
  return { name: 'Error', message: String(cause) };
}

function countBuckets(analyses: readonly ElementAnalysis[]): CtaCounts {
  const counts: CtaCounts = { primary: 0, secondary: 0, form: 0, link: 0, other: 0 };

  for (const { element, metrics } of analyses) {
    const primary = isPrimaryCta(metrics);
    if (primary) counts.primary += 1;
    if (element.elementType === 'link' && !primary) counts.secondary += 1;
    if (element.elementType === 'form') counts.form += 1;
    if (element.elementType === 'link') counts.link += 1;
    if (!BUCKETED_TYPES.has(element.elementType)) counts.other += 1;
  }
  return counts;
}

function countByType(analyses: readonly ElementAnalysis[]): Partial<Record<ElementType, number>> {
  const counts: Partial<Record<ElementType, number>> = {};
  for (const { element } of analyses) {
    counts[element.elementType] = (counts[element.elementType] ?? 0) + 1;
  }
  return counts;
}

function averageScores(analyses: readonly ElementAnalysis[]): ScoringBreakdown {
  const mean = (pick: (a: ElementAnalysis) => number): number =>
    analyses.length === 0
      ? 0
      : Math.round(analyses.reduce((sum, a) => sum + pick(a), 0) / analyses.length);

  const metric = (name: MetricName): number => mean((a) => a.metrics[name]);

  return {
    visibility: metric('visibility'),
    urgency: metric('urgency'),
    actionClarity: metric('actionClarity'),
    accessibility: metric('accessibility'),
    mobileResponsiveness: metric('mobileResponsiveness'),
    colorContrast: metric('colorContrast'),
    conversionOptimization: metric('conversionOptimization'),
    linkValidity: metric('linkValidity'),
    overallScore: mean((a) => a.metrics.overallScore),
  };
}

function heatmapPoint({ element, metrics, issues }: ElementAnalysis): HeatmapPoint {
  const { text } = element;
  return {
    elementId: element.elementId,
    center: {
      x: element.position.x + element.size.width / 2,
      y: element.position.y + element.size.height / 2,
    },
    text: text.length > HEATMAP_TEXT_LENGTH ? `${text.slice(0, HEATMAP_TEXT_LENGTH)}...` : text,
    elementType: element.elementType,
    score: metrics.overallScore,
    issues: issues.length > 0 ? issues.map((i) => i.kind).join(', ') : 'None',
    severity: highestSeverity(issues),
  };
}

function highestSeverity(issues: readonly Issue[]): Severity | 'None' {
  let highest: Severity | 'None' = 'None';
  for (const { severity } of issues) {
    if (highest === 'None' || SEVERITY_RANK[severity] > SEVERITY_RANK[highest]) highest = severity;
  }
  return highest;
}
