import type { AiProviderConfig } from 'cta-audit/types';

import { BaseAIProvider } from '../base.js';
import { AIProviderError } from '../errors.js';

/**
 * Anthropic provider adapter.
 *
 * Notes:
 * - `@anthropic-ai/sdk` is imported dynamically, so it only loads when this provider is used.
 * - Defaults to `claude-3-5-haiku-latest` unless `config.model` is provided.
 */
export class AnthropicProvider extends BaseAIProvider {
  constructor(config: AiProviderConfig) {
    super(config);
  }

  protected async rawComplete(prompt: string, systemPrompt: string): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new AIProviderError('Anthropic apiKey is required');

    const model = this.config.model ?? 'claude-3-5-haiku-latest';

    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey, baseURL: this.config.baseUrl });

    const response = await client.messages.create({
      model,
      max_tokens: 1024,
      system: systemPrompt,
      messages: [{ role: 'user', content: prompt }],
    });

    this.setLastUsage({
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
    });

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (content.trim().length === 0) {
      throw new AIProviderError('Anthropic returned an empty response');
    }

    return content;
  }
}
