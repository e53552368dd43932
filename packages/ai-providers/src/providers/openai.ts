import type { AiProviderConfig } from 'cta-audit/types';

import { BaseAIProvider } from '../base.js';
import { AIProviderError } from '../errors.js';

/**
 * OpenAI provider adapter.
 *
 * Notes:
 * - `openai` is imported dynamically, so it only loads when this provider is used.
 * - Defaults to `gpt-4o-mini` unless `config.model` is provided.
 */
export class OpenAIProvider extends BaseAIProvider {
  constructor(config: AiProviderConfig) {
    super(config);
  }

  /**
   * Perform a single chat completion request.
   *
   * The base class wraps this in retry/timeout/rate-limiting logic.
   */
  protected async rawComplete(prompt: string, systemPrompt: string): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new AIProviderError('OpenAI apiKey is required');

    const model = this.config.model ?? 'gpt-4o-mini';

    const { default: OpenAI } = await import('openai');
    const client = new OpenAI({ apiKey, baseURL: this.config.baseUrl });

    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: prompt },
      ],
      temperature: 0.7,
      max_tokens: 1024,
    });

    this.setLastUsage({
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    });

    const content = response.choices[0]?.message.content;
    if (typeof content !== 'string' || content.trim().length === 0) {
      throw new AIProviderError('OpenAI returned an empty response');
    }

    return content;
  }
}
