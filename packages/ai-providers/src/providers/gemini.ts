import { z } from 'zod';

import type { AiProviderConfig } from 'cta-audit/types';

import { BaseAIProvider } from '../base.js';
import { AIProviderError } from '../errors.js';

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      }),
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

/**
 * Google Gemini adapter using the `generateContent` REST endpoint.
 *
 * Defaults to `gemini-1.5-flash` unless `config.model` is provided.
 */
export class GeminiProvider extends BaseAIProvider {
  constructor(config: AiProviderConfig) {
    super(config);
  }

  protected async rawComplete(prompt: string, systemPrompt: string): Promise<string> {
    const apiKey = this.config.apiKey;
    if (!apiKey) throw new AIProviderError('Gemini apiKey is required');

    const baseUrl = (this.config.baseUrl ?? 'https://generativelanguage.googleapis.com').replace(
      /\/$/,
      '',
    );
    const model = this.config.model ?? 'gemini-1.5-flash';
    const endpoint = `${baseUrl}/v1beta/models/${encodeURIComponent(model)}:generateContent?key=${encodeURIComponent(apiKey)}`;

    const response = await fetch(endpoint, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: systemPrompt }] },
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: 0.7,
          topK: 40,
          topP: 0.95,
          maxOutputTokens: 1024,
        },
      }),
    });

    if (!response.ok) {
      throw new AIProviderError(`Gemini request failed with status ${response.status}`);
    }

    const data = GeminiResponseSchema.parse(await response.json());

    this.setLastUsage({
      promptTokens: data.usageMetadata?.promptTokenCount ?? 0,
      completionTokens: data.usageMetadata?.candidatesTokenCount ?? 0,
    });

    const parts = data.candidates?.[0]?.content?.parts ?? [];
    const content = parts.map((part) => part.text ?? '').join('');
    if (content.trim().length === 0) {
      throw new AIProviderError('Gemini returned an empty response');
    }

    return content;
  }
}
