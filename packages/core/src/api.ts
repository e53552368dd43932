import type { AiHandler } from './types/ai.js';
import type { AuditOutcome } from './types/audit.js';
import type { AiProviderConfig, AiProviderName, LinkValidationConfig } from './types/config.js';
import type { SnapshotProvider } from './types/snapshot.js';

import { CtaAuditor } from './auditor/CtaAuditor.js';
import type { AuditConfig } from './auditor/types.js';

/**
 * User-friendly provider input shape used by convenience APIs.
 */
export type ProviderInput =
  | {
      /** Provider id. */
      name: AiProviderName;

      /** Provider API key (when required). */
      apiKey?: string;

      /** Provider model id (e.g., `gpt-4o-mini`). */
      model?: string;

      /** Base URL override (useful for proxies/self-hosted endpoints). */
      baseUrl?: string;

      /**
       * Custom handler used when `name: "custom"`.
       *
       * The handler receives the prompt and returns the model's text; the reply
       * is parsed into a numbered list.
       */
      handler?: AiHandler;
    }
  | AiProviderConfig;

/**
 * Options accepted by the `audit*` convenience functions.
 */
export interface AuditOptions extends Omit<AuditConfig, 'aiProvider' | 'links'> {
  /** Recommendation service selection + credentials. Omit to skip the call. */
  provider?: ProviderInput;

  links?: LinkValidationConfig;

  /** Shorthand for `links.concurrency`. */
  concurrency?: number;

  /** Shorthand for `links.timeoutMs`. */
  timeoutMs?: number;
}

/**
 * Capture `url` through `snapshots` and audit it.
 */
export async function audit(
  url: string,
  snapshots: SnapshotProvider,
  options: AuditOptions = {},
): Promise<AuditOutcome> {
  const auditor = new CtaAuditor(toAuditConfig(options));
  return await auditor.audit(url, snapshots);
}

/**
 * Audit an element snapshot that was captured elsewhere.
 */
export async function auditSnapshot(
  url: string,
  elements: readonly unknown[],
  options: AuditOptions = {},
): Promise<AuditOutcome> {
  const auditor = new CtaAuditor(toAuditConfig(options));
  return await auditor.auditSnapshot(url, elements);
}

/**
 * Convert convenience options into the orchestrator's `AuditConfig`.
 */
export function toAuditConfig(options: AuditOptions): AuditConfig {
  const { provider, concurrency, timeoutMs, links, ...rest } = options;

  const cfg: AuditConfig = {
    ...rest,
    links: {
      ...links,
      ...(concurrency !== undefined ? { concurrency } : {}),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    },
  };

  const aiProvider = normalizeProvider(provider);
  if (aiProvider) cfg.aiProvider = aiProvider;

  return cfg;
}

export function normalizeProvider(input: ProviderInput | undefined): AiProviderConfig | undefined {
  if (!input) return undefined;

  if ('provider' in input) return input;

  if (input.name === 'custom') {
    return {
      provider: 'custom',
      customHandler: input.handler ?? (async () => ({ content: '' })),
    };
  }

  return {
    provider: input.name,
    apiKey: input.apiKey,
    model: input.model,
    baseUrl: input.baseUrl,
  };
}
