import { MetricScorer, analyzeText, makeElement } from 'cta-audit';
import type { CtaElement } from 'cta-audit/types';

import type { RuleContext } from './types.js';

const scorer = new MetricScorer();

/**
 * Rule context for an element built from `makeElement` defaults.
 */
export function contextFor(overrides: Partial<CtaElement> = {}): RuleContext {
  const element = makeElement(overrides);
  return {
    element,
    metrics: scorer.score(element),
    textAnalysis: analyzeText(element.text),
  };
}
