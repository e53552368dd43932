import type {
  AIProvider,
  AiProviderConfig,
  AiResponse,
  RecommendationRequest,
  RecommendationResult,
} from 'cta-audit/types';

import { AIProviderError, AIProviderParseError, AIProviderTimeoutError } from './errors.js';
import { CallRateLimiter } from './rateLimit.js';

type TokenUsage = AiResponse['usage'];

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;

export const MAX_RECOMMENDATIONS = 5;

export const DEFAULT_SYSTEM_PROMPT =
  'You are a conversion rate optimization specialist reviewing call-to-action elements on a web page.';

/**
 * Prompt asking for five numbered recommendations about the page's CTAs.
 */
export function buildRecommendationPrompt(request: RecommendationRequest): string {
  return [
    `Analyze these Call-to-Action (CTA) elements from the website ${request.url} and provide ${MAX_RECOMMENDATIONS} specific, actionable recommendations to improve conversion rates:`,
    '',
    'CTA Elements Found:',
    JSON.stringify(request.elements, null, 2),
    '',
    'Please provide recommendations that are:',
    '1. Specific and actionable',
    '2. Based on conversion optimization best practices',
    '3. Tailored to the specific CTAs found',
    '4. Include specific suggestions for text, positioning, or styling improvements',
    '',
    'Format as a numbered list of recommendations.',
  ].join('\n');
}

const LIST_ITEM = /^(?:\d|[•\-*])/;
const LIST_MARKER = /^(?:\d+[.)]\s*|[•\-*]\s*)/;

/**
 * Pull list items out of a model reply.
 *
 * Keeps lines that start with a digit or a bullet (`•`, `-`, `*`), strips the
 * marker, drops empties and returns at most five entries.
 */
export function parseRecommendationList(text: string): string[] {
  const items: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!LIST_ITEM.test(line)) continue;

    const item = line.replace(LIST_MARKER, '').trim();
    if (item) items.push(item);
  }

  return items.slice(0, MAX_RECOMMENDATIONS);
}

function backoffDelayMs(attempt: number): number {
  const base = 200;
  const factor = 2 ** Math.max(0, attempt - 1);
  const jitter = Math.floor(Math.random() * 50);
  return base * factor + jitter;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race `promise` against a timer; rejects with `AIProviderTimeoutError`.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new AIProviderTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}

/**
 * Base implementation shared by all providers.
 *
 * - Retry: up to `maxRetries` attempts with exponential backoff
 * - Timeout: per attempt via `timeoutMs` (default 60s)
 * - Rate limiting: every attempt counts against `rpm` calls per rolling minute
 * - Parsing: a numbered/bulleted list, see `parseRecommendationList`
 */
export abstract class BaseAIProvider implements AIProvider {
  protected readonly config: AiProviderConfig;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly limiter: CallRateLimiter | null;
  private lastUsage: TokenUsage | undefined;

  constructor(config: AiProviderConfig, limiter = CallRateLimiter.perMinute(config.rpm)) {
    this.config = config;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, config.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.limiter = limiter;
  }

  /**
   * Implemented by concrete providers to perform a single raw completion request.
   *
   * Returns the model's text. Providers can call `this.setLastUsage(...)` to
   * expose token usage.
   */
  protected abstract rawComplete(prompt: string, systemPrompt: string): Promise<string>;

  /**
   * Shared retry/timeout/rate-limit wrapper.
   */
  protected async runWithRetries(request: () => Promise<string>): Promise<RecommendationResult> {
    const startedAt = Date.now();

    let attempts = 0;
    let lastRaw = '';
    let lastError: unknown;

    for (; attempts < this.maxRetries; attempts++) {
      try {
        this.lastUsage = undefined;

        await this.limiter?.acquire();

        const raw = await withTimeout(request(), this.timeoutMs);
        lastRaw = raw;

        const recommendations = parseRecommendationList(raw);
        if (recommendations.length === 0 && raw.trim().length > 0) {
          throw new AIProviderParseError('AI provider reply contains no recommendation list');
        }

        return {
          recommendations,
          raw,
          latencyMs: Date.now() - startedAt,
          attempts: attempts + 1,
          usage: this.lastUsage,
        };
      } catch (error) {
        lastError = error;
        if (attempts + 1 >= this.maxRetries) break;
        await sleep(backoffDelayMs(attempts + 1));
      }
    }

    // The raw reply is the most useful debugging artifact for a parse failure.
    if (lastError instanceof AIProviderParseError) {
      throw new AIProviderParseError(`${lastError.message}. Raw output: ${lastRaw.slice(0, 500)}`, {
        cause: lastError,
      });
    }

    throw lastError instanceof Error
      ? lastError
      : new AIProviderError('AI provider request failed', { cause: lastError });
  }

  async recommend(request: RecommendationRequest): Promise<RecommendationResult> {
    const prompt = buildRecommendationPrompt(request);
    const systemPrompt = this.config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    return await this.runWithRetries(() => this.rawComplete(prompt, systemPrompt));
  }

  /**
   * Allows concrete adapters to attach token usage after an SDK/HTTP call.
   */
  protected setLastUsage(usage: TokenUsage | undefined): void {
    this.lastUsage = usage;
  }
}
