import type { AiHandler, AiProviderConfig } from 'cta-audit/types';

import { BaseAIProvider } from '../base.js';

/**
 * Wraps a user-supplied `customHandler` so it gets the same retry, timeout
 * and list parsing as the built-in adapters.
 */
export class CustomProvider extends BaseAIProvider {
  private readonly handler: AiHandler;

  constructor(config: AiProviderConfig & { customHandler: AiHandler }) {
    super(config);
    this.handler = config.customHandler;
  }

  protected async rawComplete(prompt: string): Promise<string> {
    const response = await this.handler(prompt, { maxTokens: 1024, temperature: 0.7 });
    this.setLastUsage(response.usage);
    return response.content;
  }
}
