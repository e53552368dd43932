import type { ElementAnalysis } from '../types/audit.js';
import type { MetricSet } from '../types/metrics.js';

const PRIMARY_MIN_URGENCY = 60;
const PRIMARY_MIN_CLARITY = 70;
const VARIETY_MIN_ELEMENTS = 5;
const SLOW_RESPONSE_MS = 2_000;

/**
 * A CTA counts as primary when it is both urgent and clear.
 */
export function isPrimaryCta(metrics: MetricSet): boolean {
  return metrics.urgency > PRIMARY_MIN_URGENCY && metrics.actionClarity > PRIMARY_MIN_CLARITY;
}

/**
 * Improvement suggestions for one analysed element.
 */
export function recommendForElement(
  analysis: Pick<ElementAnalysis, 'element' | 'metrics' | 'textAnalysis'>,
): string[] {
  const { element, metrics, textAnalysis } = analysis;
  const out: string[] = [];

  if (!textAnalysis.hasActionWord) {
    out.push('Add action-oriented words to make the CTA more compelling');
  }
  if (!textAnalysis.hasUrgencyWord) {
    out.push('Consider adding urgency words to create a sense of immediacy');
  }
  if (!textAnalysis.hasBenefit) {
    out.push('Include benefit words to highlight value proposition');
  }
  if (metrics.visibility < 70) {
    out.push('Improve CTA visibility with better positioning or styling');
  }
  if (metrics.actionClarity < 60) {
    out.push('Make the action more clear and specific');
  }
  if (metrics.linkValidity < 50) {
    out.push('Fix broken or invalid links to ensure CTAs are functional');
  }

  const responseTimeMs = element.link?.responseTimeMs;
  if (element.href && responseTimeMs != null && responseTimeMs > SLOW_RESPONSE_MS) {
    out.push('Optimize link performance to improve user experience');
  }

  return out;
}

export interface AggregatedRecommendations {
  strengths: string[];
  recommendations: string[];
}

/**
 * Merge per-element recommendations (and optional external ones) into one
 * deduplicated list in first-seen order, and derive the report strengths.
 *
 * With no elements both lists are empty.
 */
export function aggregateRecommendations(
  analyses: readonly ElementAnalysis[],
  external: readonly string[] = [],
): AggregatedRecommendations {
  const recommendations = new Set<string>();
  for (const analysis of analyses) {
    for (const recommendation of analysis.recommendations) recommendations.add(recommendation);
  }
  for (const recommendation of external) {
    const trimmed = recommendation.trim();
    if (trimmed) recommendations.add(trimmed);
  }

  return {
    strengths: analyses.length > 0 ? strengthsOf(analyses) : [],
    recommendations: [...recommendations],
  };
}

function strengthsOf(analyses: readonly ElementAnalysis[]): string[] {
  const strengths: string[] = [];

  const primary = analyses.filter((a) => isPrimaryCta(a.metrics)).length;
  if (primary > 0) strengths.push(`Found ${primary} strong primary CTAs`);
  if (analyses.some((a) => a.textAnalysis.hasUrgencyWord)) {
    strengths.push('Good use of urgency words in CTAs');
  }
  if (analyses.some((a) => a.textAnalysis.hasActionWord)) {
    strengths.push('Clear action-oriented language');
  }
  if (analyses.length > VARIETY_MIN_ELEMENTS) strengths.push('Good variety of CTA options');

  if (strengths.length === 0) strengths.push('Website has CTA elements present');
  return strengths;
}
