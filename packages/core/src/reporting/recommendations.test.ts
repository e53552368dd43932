import { describe, expect, it } from 'vitest';

import { MetricScorer } from '../scoring/MetricScorer.js';
import { analyzeText } from '../scoring/textAnalysis.js';
import { makeElement, makeLinkCheck, makeMetrics } from '../testing/fixtures.js';
import type { ElementAnalysis } from '../types/audit.js';
import type { CtaElement } from '../types/element.js';

import { aggregateRecommendations, recommendForElement } from './recommendations.js';

function analysis(element: CtaElement, recommendations: string[] = []): ElementAnalysis {
  return {
    element,
    metrics: new MetricScorer().score(element),
    textAnalysis: analyzeText(element.text),
    issues: [],
    recommendations,
  };
}

describe('recommendForElement', () => {
  it('has nothing to add for a strong primary button', () => {
    expect(recommendForElement(analysis(makeElement({ text: 'Get Started Free Today' })))).toEqual([]);
  });

  it('lists every applicable suggestion in a fixed order', () => {
    const element = makeElement({
      elementType: 'link',
      text: 'Our pricing',
      href: 'https://example.com/pricing',
      link: makeLinkCheck({ responseTimeMs: 2_500 }),
    });

    const recommendations = recommendForElement({
      element,
      metrics: makeMetrics({ linkValidity: 40 }),
      textAnalysis: analyzeText(element.text),
    });

    expect(recommendations).toEqual([
      'Add action-oriented words to make the CTA more compelling',
      'Consider adding urgency words to create a sense of immediacy',
      'Include benefit words to highlight value proposition',
      'Improve CTA visibility with better positioning or styling',
      'Make the action more clear and specific',
      'Fix broken or invalid links to ensure CTAs are functional',
      'Optimize link performance to improve user experience',
    ]);
  });
});

describe('aggregateRecommendations', () => {
  it('deduplicates in first-seen order and appends external recommendations', () => {
    const analyses = [
      analysis(makeElement({ elementId: 'a' }), ['A', 'B']),
      analysis(makeElement({ elementId: 'b' }), ['B', 'C']),
    ];

    const { recommendations } = aggregateRecommendations(analyses, ['C', 'D', '  ']);

    expect(recommendations).toEqual(['A', 'B', 'C', 'D']);
  });

  it('is unchanged by an absent or empty external list', () => {
    const analyses = [analysis(makeElement(), ['A'])];
    expect(aggregateRecommendations(analyses)).toEqual(aggregateRecommendations(analyses, []));
  });

  it('derives strengths from the analysed elements', () => {
    const strong = Array.from({ length: 6 }, (_, i) =>
      analysis(makeElement({ elementId: `cta-${i}`, text: 'Get Started Free Today' })),
    );

    expect(aggregateRecommendations(strong).strengths).toEqual([
      'Found 6 strong primary CTAs',
      'Good use of urgency words in CTAs',
      'Clear action-oriented language',
      'Good variety of CTA options',
    ]);
  });

  it('falls back to a presence strength', () => {
    const weak = [analysis(makeElement({ text: 'Our pricing' }))];
    expect(aggregateRecommendations(weak).strengths).toEqual(['Website has CTA elements present']);
  });

  it('returns empty lists without elements', () => {
    expect(aggregateRecommendations([])).toEqual({ strengths: [], recommendations: [] });
  });
});
