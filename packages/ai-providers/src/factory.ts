import type { AIProvider, AiProviderConfig } from 'cta-audit/types';

import { AnthropicProvider } from './providers/anthropic.js';
import { CustomProvider } from './providers/custom.js';
import { GeminiProvider } from './providers/gemini.js';
import { MockAIProvider } from './providers/mock.js';
import { OllamaProvider } from './providers/ollama.js';
import { OpenAIProvider } from './providers/openai.js';

/**
 * Create a recommendation provider adapter from config.
 *
 * - `openai` / `anthropic`: load their SDK on first call.
 * - `gemini` / `ollama`: direct HTTP calls (no SDK dependency).
 * - `custom`: wraps the provided `customHandler`.
 * - `mock`: deterministic output for tests.
 */
export function createAIProvider(config: AiProviderConfig): AIProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
    case 'ollama':
      return new OllamaProvider(config);
    case 'custom': {
      const customHandler = config.customHandler;
      if (!customHandler) {
        throw new Error('customHandler is required when provider is "custom"');
      }
      return new CustomProvider({ ...config, customHandler });
    }
    case 'mock':
      return new MockAIProvider(config);
  }
}
