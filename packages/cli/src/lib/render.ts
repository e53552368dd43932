import { ReportGenerator } from 'cta-audit';
import type { AuditResult } from 'cta-audit';

import type { ReportFormat } from './config.js';

/**
 * Render a result in the requested CLI format.
 */
export function renderReport(
  result: AuditResult,
  format: ReportFormat,
  options: { noColor?: boolean } = {},
): string {
  const reporter = new ReportGenerator();

  switch (format) {
    case 'json':
      return reporter.generateJSON(result);
    case 'md':
      return reporter.generateMarkdown(result);
    case 'sarif':
      return reporter.generateSARIF(result);
    case 'console':
      return reporter.generateConsole(result, { noColor: options.noColor });
  }
}

/**
 * 0 when the score reaches the threshold, 1 below it.
 */
export function exitCodeFor(score: number, threshold: number): 0 | 1 {
  return score >= threshold ? 0 : 1;
}
