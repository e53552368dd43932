import { z } from 'zod';

import type { AuditResult } from 'cta-audit';

/**
 * The part of a JSON report that `compare` needs.
 */
export const ReportSummarySchema = z.object({
  score: z.number(),
  totalIssues: z.number().int().nonnegative(),
});

export type ReportSummary = Pick<AuditResult, 'score' | 'totalIssues'>;

/**
 * Comparison between two audit runs.
 */
export interface ScoreComparison {
  /** Score from the previous report. */
  previousScore: number;

  /** Score from the current report. */
  currentScore: number;

  /** `currentScore - previousScore`. */
  delta: number;

  /** `current.totalIssues - previous.totalIssues`. */
  issueDelta: number;

  /** High-level direction derived from `delta`. */
  direction: 'improved' | 'regressed' | 'unchanged';
}

/**
 * Compare two audit reports by their score.
 */
export function compareWith(previous: ReportSummary, current: ReportSummary): ScoreComparison {
  const previousScore = previous.score;
  const currentScore = current.score;
  const delta = currentScore - previousScore;
  const direction = delta === 0 ? 'unchanged' : delta > 0 ? 'improved' : 'regressed';
  return {
    previousScore,
    currentScore,
    delta,
    issueDelta: current.totalIssues - previous.totalIssues,
    direction,
  };
}

/**
 * Validate parsed report JSON before comparing it.
 */
export function parseReportSummary(raw: unknown, source: string): ReportSummary {
  const parsed = ReportSummarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${source} is not a cta-audit JSON report`);
  }
  return parsed.data;
}

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

/**
 * Lines printed by `cta-audit compare`.
 */
export function formatComparison(cmp: ScoreComparison): string[] {
  return [
    `Previous: ${cmp.previousScore}`,
    `Current:  ${cmp.currentScore}`,
    `Delta:    ${signed(cmp.delta)} (${cmp.direction})`,
    `Issues:   ${signed(cmp.issueDelta)}`,
  ];
}
