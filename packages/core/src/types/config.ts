import type { AiHandler } from './ai.js';

/**
 * Built-in recommendation provider ids.
 */
export type AiProviderName = 'openai' | 'anthropic' | 'gemini' | 'ollama' | 'custom' | 'mock';

/**
 * Configuration for the external recommendation service.
 *
 * Most providers use `apiKey` + `model` (+ optional `baseUrl`).
 * If `provider` is `custom`, pass `customHandler` and ignore other fields.
 */
export type AiProviderConfig = {
  /** Which provider implementation to use. */
  provider: AiProviderName;

  /** Provider API key (if required). */
  apiKey?: string;

  /** Provider model identifier (e.g., "gpt-4o-mini"). */
  model?: string;

  /** Base URL override for self-hosted / proxy setups. */
  baseUrl?: string;

  /**
   * Custom handler for advanced integrations.
   *
   * When `provider: "custom"`, this handler is called instead of a built-in
   * SDK / HTTP adapter.
   */
  customHandler?: AiHandler;

  /**
   * Per-request timeout for provider calls in milliseconds.
   *
   * Defaults to 60s.
   */
  timeoutMs?: number;

  /**
   * Requests-per-minute rate limit for the provider client.
   *
   * This is a client-side limiter to avoid accidental bursts; it does not
   * replace provider-side limits.
   */
  rpm?: number;

  /**
   * Maximum number of attempts for a single call (including the first).
   *
   * Defaults to 3.
   */
  maxRetries?: number;

  /** Optional system prompt sent with every provider call. */
  systemPrompt?: string;
};

/**
 * Minimal `fetch` signature the link validator depends on.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Link validation settings.
 */
export interface LinkValidationConfig {
  /** Worker pool size. Default: 5. */
  concurrency?: number;

  /** Per-request timeout in milliseconds. Default: 10s. */
  timeoutMs?: number;

  /**
   * Page URL used to resolve root-relative hrefs (`/pricing`).
   *
   * Without it such links are reported as `skipped: relative URL`.
   */
  baseUrl?: string;

  /** `User-Agent` header sent with each check. */
  userAgent?: string;

  /** `fetch` implementation (tests inject a stub). Default: global `fetch`. */
  fetch?: FetchLike;

  /** Clock used for response timings. Default: `Date.now`. */
  now?: () => number;
}

/**
 * Per-rule configuration map keyed by rule id.
 *
 * A rule with `{ enabled: false }` is skipped.
 */
export type RuleConfigMap = Record<
  string,
  {
    /** Whether this rule should run. Defaults to `true` when omitted. */
    enabled?: boolean;
  }
>;
