import { describe, expect, it, vi } from 'vitest';

import type { AiProviderConfig, RecommendationRequest } from 'cta-audit/types';

import { BaseAIProvider, buildRecommendationPrompt, parseRecommendationList } from './base.js';
import { AIProviderParseError, AIProviderTimeoutError } from './errors.js';
import { MockAIProvider } from './providers/mock.js';
import { CallRateLimiter } from './rateLimit.js';

function baseConfig(overrides: Partial<AiProviderConfig> = {}): AiProviderConfig {
  return {
    provider: 'mock',
    ...overrides,
  };
}

const request: RecommendationRequest = {
  url: 'https://example.com',
  elements: [
    {
      text: 'Start free trial',
      type: 'button',
      position: { x: 10, y: 20 },
      size: { width: 160, height: 48 },
      href: null,
    },
  ],
};

describe('parseRecommendationList', () => {
  it('keeps numbered and bulleted lines without their markers', () => {
    const reply = [
      'Here are my suggestions:',
      '1. Move the CTA higher',
      '  2) Use a contrasting colour',
      '• Shorten the label',
      '- ',
      '* Add urgency',
      'Good luck!',
    ].join('\n');

    expect(parseRecommendationList(reply)).toEqual([
      'Move the CTA higher',
      'Use a contrasting colour',
      'Shorten the label',
      'Add urgency',
    ]);
  });

  it('returns at most five entries', () => {
    const reply = Array.from({ length: 7 }, (_, i) => `${i + 1}. Tip ${i + 1}`).join('\n');
    expect(parseRecommendationList(reply)).toEqual(['Tip 1', 'Tip 2', 'Tip 3', 'Tip 4', 'Tip 5']);
  });

  it('returns an empty list for empty text', () => {
    expect(parseRecommendationList('')).toEqual([]);
  });
});

describe('buildRecommendationPrompt', () => {
  it('embeds the page url and the element payload', () => {
    const prompt = buildRecommendationPrompt(request);

    expect(prompt.split('\n')[0]).toBe(
      'Analyze these Call-to-Action (CTA) elements from the website https://example.com and provide 5 specific, actionable recommendations to improve conversion rates:',
    );
    expect(prompt).toContain('"text": "Start free trial"');
    expect(prompt.endsWith('Format as a numbered list of recommendations.')).toBe(true);
  });
});

describe('BaseAIProvider (via MockAIProvider)', () => {
  it('returns five deterministic recommendations', async () => {
    const provider = new MockAIProvider(baseConfig({ rpm: 10_000 }));

    const first = await provider.recommend(request);
    const second = await provider.recommend(request);

    expect(first.recommendations).toHaveLength(5);
    expect(second.recommendations).toEqual(first.recommendations);
    expect(first.attempts).toBe(1);
  });

  it('retries on parse errors and eventually succeeds', async () => {
    class FlakyMockProvider extends MockAIProvider {
      private calls = 0;
      protected override async rawComplete(prompt: string): Promise<string> {
        this.calls++;
        if (this.calls < 3) return 'no list here';
        return super.rawComplete(prompt);
      }
    }

    const provider = new FlakyMockProvider(baseConfig({ maxRetries: 3, rpm: 10_000 }));
    const result = await provider.recommend(request);
    expect(result.attempts).toBe(3);
  });

  it('keeps the raw reply in the final parse error', async () => {
    class ChattyMockProvider extends MockAIProvider {
      protected override async rawComplete(): Promise<string> {
        return 'Sorry, I cannot help.';
      }
    }

    const provider = new ChattyMockProvider(baseConfig({ maxRetries: 1 }));

    await expect(provider.recommend(request)).rejects.toThrow(AIProviderParseError);
    await expect(provider.recommend(request)).rejects.toThrow(
      'AI provider reply contains no recommendation list. Raw output: Sorry, I cannot help.',
    );
  });

  it('treats an empty reply as no recommendations', async () => {
    class SilentMockProvider extends MockAIProvider {
      protected override async rawComplete(): Promise<string> {
        return '';
      }
    }

    const result = await new SilentMockProvider(baseConfig()).recommend(request);
    expect(result.recommendations).toEqual([]);
  });

  it('enforces timeout for a stuck provider call', async () => {
    class StuckMockProvider extends MockAIProvider {
      protected override async rawComplete(): Promise<string> {
        return await new Promise<string>(() => {
          // never resolves
        });
      }
    }

    vi.useFakeTimers();
    try {
      const provider = new StuckMockProvider(baseConfig({ timeoutMs: 50, maxRetries: 1, rpm: 10_000 }));

      // Attach a handler immediately to avoid an "unhandled rejection" window while timers advance.
      const settled = provider.recommend(request).then(
        () => ({ ok: true as const }),
        (err: unknown) => ({ ok: false as const, err }),
      );
      await vi.advanceTimersByTimeAsync(60);

      const result = await settled;
      expect(result.ok).toBe(false);
      if (result.ok === false) {
        expect(result.err).toBeInstanceOf(AIProviderTimeoutError);
      }
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('BaseAIProvider rate limiting', () => {
  class ScriptedProvider extends BaseAIProvider {
    constructor(
      config: AiProviderConfig,
      limiter: CallRateLimiter,
      private readonly replies: string[],
    ) {
      super(config, limiter);
    }

    protected override async rawComplete(): Promise<string> {
      return this.replies.shift() ?? '1. Tighten the headline';
    }
  }

  function fakeClock() {
    const waits: number[] = [];
    const clock = { now: 0, waits };
    const limiter = new CallRateLimiter({
      limit: 1,
      now: () => clock.now,
      sleep: async (ms) => {
        clock.waits.push(ms);
        clock.now += ms;
      },
    });
    return { clock, limiter };
  }

  it('holds back a call once the minute budget is spent', async () => {
    const { clock, limiter } = fakeClock();
    const provider = new ScriptedProvider(baseConfig({ rpm: 1 }), limiter, []);

    await provider.recommend(request);
    const second = await provider.recommend(request);

    expect(clock.waits).toEqual([60_000]);
    expect(second.recommendations).toEqual(['Tighten the headline']);
  });

  it('counts every retry attempt against the limit', async () => {
    const { clock, limiter } = fakeClock();
    const provider = new ScriptedProvider(baseConfig({ rpm: 1, maxRetries: 2 }), limiter, [
      'no list here',
    ]);

    const result = await provider.recommend(request);

    expect(result.attempts).toBe(2);
    expect(clock.waits).toEqual([60_000]);
  });
});
