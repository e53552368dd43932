import { EventEmitter } from 'node:events';

import { createAIProvider } from '@cta-audit/ai-providers';
import { createBuiltinRegistry, runRules } from '@cta-audit/rules';
import type { RuleRegistry } from '@cta-audit/rules';

import type { AuditOutcome, ElementAnalysis, RecoveredError } from '../types/audit.js';
import type { CtaElement } from '../types/element.js';
import type { AIProvider, RecommendationRequest } from '../types/provider.js';
import type { SnapshotProvider } from '../types/snapshot.js';

import { LinkValidator } from '../links/LinkValidator.js';
import { buildAuditResult } from '../reporting/ReportBuilder.js';
import { recommendForElement } from '../reporting/recommendations.js';
import { MetricScorer } from '../scoring/MetricScorer.js';
import { analyzeText } from '../scoring/textAnalysis.js';
import { parseSnapshot } from '../snapshot/schema.js';

import { DEFAULT_ANALYSIS_TYPE } from './types.js';
import type { AuditConfig, AuditorEvents } from './types.js';

export const INVALID_URL_ERROR = 'Invalid URL format';

/**
 * Main orchestrator class.
 *
 * Pipeline:
 * 1) validate the page URL
 * 2) capture + validate the element snapshot
 * 3) check links (bounded pool)
 * 4) score, analyse text and detect issues per element
 * 5) optional external recommendations
 * 6) aggregate into a frozen `AuditResult`
 *
 * Progress is reported through events (see `AuditorEvents`):
 * - start(url)
 * - links:progress({ completed, total })
 * - links:complete({ checked, skipped })
 * - element:complete(analysis)
 * - ai:error(error)
 * - complete(result)
 */
export class CtaAuditor extends EventEmitter {
  private readonly config: AuditConfig;
  private readonly provider: AIProvider | null;
  private readonly registry: RuleRegistry;
  private readonly scorer = new MetricScorer();

  constructor(config: AuditConfig = {}) {
    super();
    this.config = config;
    this.registry = config.registry ?? createBuiltinRegistry();
    this.provider =
      config.recommender ?? (config.aiProvider ? createAIProvider(config.aiProvider) : null);
  }

  /**
   * Capture the page through `snapshots` and audit it.
   *
   * Input problems (bad URL, capture failure) come back as `{ error }`; the
   * pipeline does not start.
   */
  async audit(url: string, snapshots: SnapshotProvider): Promise<AuditOutcome> {
    if (!isAuditableUrl(url)) return { error: INVALID_URL_ERROR };

    let raw: unknown[];
    try {
      raw = await snapshots.capture(url);
    } catch (error) {
      return { error: `Analysis failed: ${errorMessage(error)}` };
    }

    return await this.runPipeline(url, raw);
  }

  /**
   * Audit an already captured snapshot.
   *
   * Throws `SnapshotInvariantError` when the snapshot is malformed.
   */
  async auditSnapshot(url: string, elements: readonly unknown[]): Promise<AuditOutcome> {
    if (!isAuditableUrl(url)) return { error: INVALID_URL_ERROR };
    return await this.runPipeline(url, elements);
  }

  private async runPipeline(url: string, raw: readonly unknown[]): Promise<AuditOutcome> {
    const now = this.config.now ?? Date.now;
    const startedAt = now();
    const errors: RecoveredError[] = [];

    this.emitEvent('start', url);

    const parsed = parseSnapshot(raw);

    const validator = new LinkValidator(this.config.links);
    const elements = await validator.validate(parsed, (progress) =>
      this.emitEvent('links:progress', progress),
    );
    const linkSummary = summarizeLinks(elements);
    this.emitEvent('links:complete', linkSummary);

    const rulesConfig = { rules: this.config.rules };
    const analyses: ElementAnalysis[] = [];

    for (const element of elements) {
      const metrics = this.scorer.score(element);
      const textAnalysis = analyzeText(element.text);
      const context = { element, metrics, textAnalysis };

      const detected = runRules({ context, registry: this.registry, config: rulesConfig });
      for (const failure of detected.errors) {
        errors.push({
          stage: 'rules',
          message: `Rule failed: ${failure.ruleId} (${element.elementId})`,
          cause: failure.error,
        });
      }

      const analysis: ElementAnalysis = {
        ...context,
        issues: detected.issues,
        recommendations: recommendForElement(context),
      };
      analyses.push(analysis);
      this.emitEvent('element:complete', analysis);
    }

    const aiRecommendations = await this.externalRecommendations(url, elements, errors);

    const completedAt = now();
    const result = buildAuditResult({
      url,
      analysisType: this.config.analysisType ?? DEFAULT_ANALYSIS_TYPE,
      analyses,
      aiRecommendations,
      metadata: {
        schemaVersion: '1.0',
        startedAt: new Date(startedAt).toISOString(),
        completedAt: new Date(completedAt).toISOString(),
        durationMs: completedAt - startedAt,
        aiProvider: this.providerName(),
        model: this.config.aiProvider?.model ?? '',
        rulesExecuted: this.registry.enabledRules(rulesConfig).map((rule) => rule.id),
        linksChecked: linkSummary.checked,
        linksSkipped: linkSummary.skipped,
      },
      errors,
    });

    this.emitEvent('complete', result);
    return result;
  }

  /**
   * Ask the configured service for page-level suggestions.
   *
   * Returns `undefined` when no service is configured and `[]` when the call
   * fails; a failure never fails the audit.
   */
  private async externalRecommendations(
    url: string,
    elements: readonly CtaElement[],
    errors: RecoveredError[],
  ): Promise<string[] | undefined> {
    if (!this.provider) return undefined;

    const request: RecommendationRequest = {
      url,
      elements: elements.map((element) => ({
        text: element.text,
        type: element.elementType,
        position: element.position,
        size: element.size,
        href: element.href,
      })),
    };

    try {
      const response = await this.provider.recommend(request);
      return response.recommendations;
    } catch (error) {
      errors.push({ stage: 'ai', message: 'Recommendation service failed', cause: error });
      this.emitEvent('ai:error', error);
      return [];
    }
  }

  private providerName(): string {
    if (this.config.aiProvider) return this.config.aiProvider.provider;
    return this.config.recommender ? 'custom' : 'none';
  }

  private emitEvent<E extends keyof AuditorEvents>(event: E, ...args: AuditorEvents[E]): void {
    this.emit(event, ...args);
  }
}

/**
 * `http:` or `https:` with a host.
 */
export function isAuditableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
  } catch {
    return false;
  }
}

function summarizeLinks(elements: readonly CtaElement[]): { checked: number; skipped: number } {
  let checked = 0;
  let skipped = 0;
  for (const element of elements) {
    if (!element.link) continue;
    if (element.link.validity === 'unknown') skipped += 1;
    else checked += 1;
  }
  return { checked, skipped };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
