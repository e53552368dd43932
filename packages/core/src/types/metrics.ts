/**
 * Names of the eight per-element sub-scores.
 */
export const METRIC_NAMES = [
  'visibility',
  'urgency',
  'actionClarity',
  'accessibility',
  'mobileResponsiveness',
  'colorContrast',
  'conversionOptimization',
  'linkValidity',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/**
 * Per-element scores, each an integer in 0..100.
 */
export type MetricSet = Record<MetricName, number> & {
  /** Weighted combination of the sub-scores (see `METRIC_WEIGHTS`). */
  overallScore: number;
};

/**
 * Lexical features of a CTA's text, shared by the scorer, the issue rules and
 * the recommendation aggregator.
 */
export interface TextAnalysis {
  /** Character length of the raw text. */
  length: number;
  wordCount: number;
  hasActionWord: boolean;
  hasUrgencyWord: boolean;
  /** Exact match against a short list of generic phrases ("click here", ...). */
  isGeneric: boolean;
  hasBenefit: boolean;
  isNegative: boolean;
}
