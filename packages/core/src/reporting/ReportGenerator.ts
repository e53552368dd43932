import type { AuditResult } from '../types/audit.js';
import { ISSUE_CATEGORIES, SEVERITIES } from '../types/issue.js';
import type { Issue, Severity } from '../types/issue.js';
import { METRIC_NAMES } from '../types/metrics.js';
import type { MetricName } from '../types/metrics.js';

/**
 * Reporter interface for custom report formats.
 */
export interface Reporter {
  /** Format identifier (e.g., `json`, `md`, `sarif`, `console`). */
  format: string;
  generate(result: AuditResult): string;
}

/**
 * Options for JSON report generation.
 */
export interface JsonReportOptions {
  /** Pretty-print output. Defaults to true. */
  pretty?: boolean;
}

/**
 * Options for Markdown report generation.
 */
export interface MarkdownReportOptions {
  /** Include the per-element heatmap table. Defaults to true. */
  includeHeatmap?: boolean;
}

/**
 * Options for console report generation.
 */
export interface ConsoleReportOptions {
  /** Disable ANSI colors. Defaults to false. */
  noColor?: boolean;

  /** Maximum number of issues listed. Defaults to 50. */
  maxIssues?: number;
}

export const METRIC_LABELS: Record<MetricName, string> = {
  visibility: 'Visibility',
  urgency: 'Urgency',
  actionClarity: 'Action clarity',
  accessibility: 'Accessibility',
  mobileResponsiveness: 'Mobile responsiveness',
  colorContrast: 'Color contrast',
  conversionOptimization: 'Conversion optimization',
  linkValidity: 'Link validity',
};

/**
 * Report generator for common output formats.
 */
export class ReportGenerator {
  generateJSON(result: AuditResult, options: JsonReportOptions = {}): string {
    const pretty = options.pretty !== false;
    return JSON.stringify(
      {
        schemaVersion: result.metadata.schemaVersion,
        ...result,
      },
      null,
      pretty ? 2 : 0,
    );
  }

  generateMarkdown(result: AuditResult, options: MarkdownReportOptions = {}): string {
    const includeHeatmap = options.includeHeatmap !== false;
    const { counts } = result;

    const lines: string[] = [];
    lines.push(`# CTA audit report`);
    lines.push('');
    lines.push(`- URL: \`${result.url}\``);
    lines.push(`- Analysis: ${result.analysisType}`);
    lines.push(`- Score: **${result.score}**`);
    lines.push(
      `- CTAs: **${result.totalCtas}** (primary ${counts.primary}, secondary ${counts.secondary}, form ${counts.form}, link ${counts.link}, other ${counts.other})`,
    );
    lines.push(`- Issues: **${result.totalIssues}**`);
    if (result.note) {
      lines.push('');
      lines.push(`> ${result.note}`);
    }
    lines.push('');

    lines.push(`## Scoring breakdown`);
    lines.push('');
    lines.push(`| Metric | Score |`);
    lines.push(`| --- | --- |`);
    for (const name of METRIC_NAMES) {
      lines.push(`| ${METRIC_LABELS[name]} | ${result.scoringBreakdown[name]} |`);
    }
    lines.push(`| **Overall** | **${result.scoringBreakdown.overallScore}** |`);
    lines.push('');

    lines.push(`## Issues by severity`);
    lines.push('');
    if (result.issues.length === 0) {
      lines.push('No issues found.');
      lines.push('');
    }

    const grouped = groupBySeverity(result.issues);
    for (const severity of SEVERITIES) {
      const issues = grouped[severity];
      if (issues.length === 0) continue;

      lines.push(`### ${severity} (${issues.length})`);
      lines.push('');
      issues.forEach((issue, idx) => {
        lines.push(`#### ${idx + 1}. ${issue.kind}: ${issue.element}`);
        lines.push('');
        lines.push(`- Category: ${ISSUE_CATEGORIES[issue.kind]}`);
        lines.push(`- Selector: \`${issue.cssSelector}\``);
        lines.push(`- ${issue.location}`);
        lines.push(`- ${issue.description}`);
        lines.push(`- Recommendation: ${issue.recommendation}`);
        lines.push('');
      });
    }

    if (result.recommendations.length > 0) {
      lines.push(`## Recommendations`);
      lines.push('');
      result.recommendations.forEach((r, idx) => lines.push(`${idx + 1}. ${r}`));
      lines.push('');
    }

    if (result.strengths.length > 0) {
      lines.push(`## Strengths`);
      lines.push('');
      for (const s of result.strengths) lines.push(`- ${s}`);
      lines.push('');
    }

    if (includeHeatmap && result.heatmapData.length > 0) {
      lines.push(`## Elements`);
      lines.push('');
      lines.push(`| Element | Type | Score | Severity | Issues |`);
      lines.push(`| --- | --- | --- | --- | --- |`);
      for (const point of result.heatmapData) {
        lines.push(
          `| ${escapeCell(point.text)} | ${point.elementType} | ${point.score} | ${point.severity} | ${escapeCell(point.issues)} |`,
        );
      }
      lines.push('');
    }

    if (result.errors.length > 0) {
      lines.push(`## Errors`);
      lines.push('');
      for (const e of result.errors) lines.push(`- ${e.stage}: ${e.message}`);
      lines.push('');
    }

    return lines.join('\n');
  }

  generateSARIF(result: AuditResult): string {
    const ruleIds = [...new Set(result.issues.map((i) => i.ruleId))];

    const sarif = {
      version: '2.1.0',
      $schema: 'https://json.schemastore.org/sarif-2.1.0.json',
      runs: [
        {
          tool: {
            driver: {
              name: 'cta-audit',
              rules: ruleIds.map((id) => ({ id })),
            },
          },
          results: result.issues.map((issue) => ({
            ruleId: issue.ruleId,
            level: sarifLevel(issue.severity),
            message: { text: `${issue.kind}: ${issue.description} ${issue.recommendation}` },
            locations: [
              {
                physicalLocation: {
                  artifactLocation: { uri: result.url || 'page.html' },
                },
                logicalLocations: [{ fullyQualifiedName: issue.cssSelector }],
              },
            ],
            properties: {
              kind: issue.kind,
              category: ISSUE_CATEGORIES[issue.kind],
              elementId: issue.elementId,
            },
          })),
        },
      ],
    };

    return JSON.stringify(sarif, null, 2);
  }

  generateConsole(result: AuditResult, options: ConsoleReportOptions = {}): string {
    const color = options.noColor ? noColorize : colorize;
    const maxIssues = options.maxIssues ?? 50;
    const scoreColor = result.score >= 80 ? 'green' : result.score >= 60 ? 'yellow' : 'red';
    const grouped = groupBySeverity(result.issues);

    const lines: string[] = [];
    lines.push(`${color(scoreColor, `Score: ${result.score}`)}  URL: ${result.url}`);
    lines.push(`CTAs: ${result.totalCtas}  Issues: ${result.totalIssues}`);
    if (result.note) lines.push(result.note);
    lines.push(
      `By severity: High=${grouped.High.length} Medium=${grouped.Medium.length} Low=${grouped.Low.length}`,
    );

    for (const issue of result.issues.slice(0, maxIssues)) {
      const sevColor = issue.severity === 'High' ? 'red' : issue.severity === 'Medium' ? 'yellow' : 'blue';
      lines.push(
        `- ${color(sevColor, issue.severity.toUpperCase())} [${issue.kind}] ${issue.element}: ${issue.description}`,
      );
    }

    if (result.issues.length > maxIssues) {
      lines.push(`…and ${result.issues.length - maxIssues} more`);
    }

    if (result.recommendations.length > 0) {
      lines.push('Recommendations:');
      for (const r of result.recommendations) lines.push(`  * ${r}`);
    }

    return lines.join('\n');
  }
}

function groupBySeverity(issues: readonly Issue[]): Record<Severity, Issue[]> {
  const grouped: Record<Severity, Issue[]> = { High: [], Medium: [], Low: [] };
  for (const issue of issues) grouped[issue.severity].push(issue);
  return grouped;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s+/g, ' ');
}

function sarifLevel(severity: Severity): string {
  if (severity === 'High') return 'error';
  if (severity === 'Medium') return 'warning';
  return 'note';
}

type ColorName = 'red' | 'yellow' | 'green' | 'blue';

function colorize(color: ColorName, text: string): string {
  const code = color === 'red' ? 31 : color === 'yellow' ? 33 : color === 'green' ? 32 : 34;
  return `\u001b[${code}m${text}\u001b[0m`;
}

function noColorize(_color: ColorName, text: string): string {
  return text;
}
