import { describe, expect, it } from 'vitest';

import { analyzeText } from '../scoring/textAnalysis.js';
import { makeElement, makeIssue, makeMetrics } from '../testing/fixtures.js';
import type { AuditMetadata, ElementAnalysis } from '../types/audit.js';
import type { CtaElement } from '../types/element.js';
import type { Issue } from '../types/issue.js';
import type { MetricSet } from '../types/metrics.js';

import { NO_CTAS_NOTE, buildAuditResult } from './ReportBuilder.js';

const metadata: AuditMetadata = {
  schemaVersion: '1.0',
  startedAt: '2024-01-01T00:00:00.000Z',
  completedAt: '2024-01-01T00:00:01.000Z',
  durationMs: 1000,
  aiProvider: 'none',
  model: 'none',
  rulesExecuted: [],
  linksChecked: 0,
  linksSkipped: 0,
};

function analysis(
  element: Partial<CtaElement>,
  metrics: Partial<MetricSet> = {},
  issues: Issue[] = [],
  recommendations: string[] = [],
): ElementAnalysis {
  const full = makeElement(element);
  return {
    element: full,
    metrics: makeMetrics(metrics),
    textAnalysis: analyzeText(full.text),
    issues,
    recommendations,
  };
}

function build(analyses: ElementAnalysis[], aiRecommendations?: string[]) {
  return buildAuditResult({
    url: 'https://example.com',
    analysisType: 'Comprehensive CTA Audit',
    analyses,
    aiRecommendations,
    metadata,
  });
}

describe('buildAuditResult', () => {
  it('reports an explicit no-CTA result for an empty snapshot', () => {
    const result = build([]);

    expect(result).toEqual({
      url: 'https://example.com',
      analysisType: 'Comprehensive CTA Audit',
      totalCtas: 0,
      noCtasFound: true,
      note: NO_CTAS_NOTE,
      counts: { primary: 0, secondary: 0, form: 0, link: 0, other: 0 },
      countsByType: {},
      issues: [],
      totalIssues: 0,
      strengths: [],
      recommendations: [],
      score: 0,
      scoringBreakdown: makeMetrics({
        visibility: 0,
        urgency: 0,
        actionClarity: 0,
        accessibility: 0,
        mobileResponsiveness: 0,
        colorContrast: 0,
        conversionOptimization: 0,
        linkValidity: 0,
        overallScore: 0,
      }),
      heatmapData: [],
      elements: [],
      metadata,
      errors: [],
    });
  });

  it('counts overlapping buckets and element types', () => {
    const result = build([
      analysis({ elementId: 'a', elementType: 'link' }, { urgency: 80, actionClarity: 90 }),
      analysis({ elementId: 'b', elementType: 'link' }),
      analysis({ elementId: 'c', elementType: 'form' }),
      analysis({ elementId: 'd', elementType: 'button' }),
      analysis({ elementId: 'e', elementType: 'tab' }),
      analysis({ elementId: 'f', elementType: 'dropdown' }),
    ]);

    expect(result.counts).toEqual({ primary: 1, secondary: 1, form: 1, link: 2, other: 1 });
    expect(result.countsByType).toEqual({ link: 2, form: 1, button: 1, tab: 1, dropdown: 1 });
    expect(result.noCtasFound).toBe(false);
    expect(result.note).toBeUndefined();
  });

  it('averages and rounds scores', () => {
    const result = build([
      analysis({ elementId: 'a' }, { overallScore: 80, visibility: 90 }),
      analysis({ elementId: 'b' }, { overallScore: 75, visibility: 55 }),
    ]);

    expect(result.score).toBe(78);
    expect(result.scoringBreakdown.overallScore).toBe(78);
    expect(result.scoringBreakdown.visibility).toBe(73);
    expect(result.scoringBreakdown.urgency).toBe(50);
  });

  it('builds heatmap points with centre, truncated text and top severity', () => {
    const result = build([
      analysis(
        {
          elementId: 'a',
          text: 'Download the complete onboarding guide',
          position: { x: 10, y: 20 },
          size: { width: 100, height: 40 },
        },
        { overallScore: 64 },
        [
          makeIssue({ kind: 'Missing Element ID', severity: 'Low' }),
          makeIssue({ kind: 'Generic Text', severity: 'High' }),
        ],
      ),
      analysis({ elementId: 'b', text: 'Buy' }),
    ]);

    expect(result.heatmapData).toEqual([
      {
        elementId: 'a',
        center: { x: 60, y: 40 },
        text: 'Download the complete onboardi...',
        elementType: 'button',
        score: 64,
        issues: 'Missing Element ID, Generic Text',
        severity: 'High',
      },
      {
        elementId: 'b',
        center: { x: 120, y: 124 },
        text: 'Buy',
        elementType: 'button',
        score: 50,
        issues: 'None',
        severity: 'None',
      },
    ]);
    expect(result.totalIssues).toBe(2);
  });

  it('merges external recommendations into the deduplicated list', () => {
    const result = build([analysis({}, {}, [], ['A', 'B'])], ['B', 'C']);

    expect(result.recommendations).toEqual(['A', 'B', 'C']);
    expect(result.aiRecommendations).toEqual(['B', 'C']);
  });

  it('deep-freezes the result', () => {
    const result = build([analysis({}, {}, [makeIssue()])]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
    expect(Object.isFrozen(result.elements[0]?.element.position)).toBe(true);
    expect(Object.isFrozen(result.heatmapData[0]?.center)).toBe(true);
  });

  it('records thrown causes by name and message without freezing them', () => {
    const cause = new TypeError('quota exceeded');
    const result = buildAuditResult({
      url: 'https://example.com',
      analysisType: 'Comprehensive CTA Audit',
      analyses: [],
      metadata,
      errors: [
        { stage: 'ai', message: 'Recommendation service failed', cause },
        { stage: 'rules', message: 'Rule failed: test/odd (cta-1)', cause: 'odd value' },
        { stage: 'links', message: 'no cause' },
      ],
    });

    expect(result.errors).toEqual([
      {
        stage: 'ai',
        message: 'Recommendation service failed',
        cause: { name: 'TypeError', message: 'quota exceeded' },
      },
      {
        stage: 'rules',
        message: 'Rule failed: test/odd (cta-1)',
        cause: { name: 'Error', message: 'odd value' },
      },
      { stage: 'links', message: 'no cause' },
    ]);
    expect(Object.isFrozen(cause)).toBe(false);
  });
});
