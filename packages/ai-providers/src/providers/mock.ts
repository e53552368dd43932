import type { AiProviderConfig } from 'cta-audit/types';

import { BaseAIProvider, MAX_RECOMMENDATIONS } from '../base.js';

const SUGGESTIONS = [
  'Place the primary CTA above the fold so it is visible without scrolling',
  'Replace generic labels such as "Click here" with the action and its benefit',
  'Add a time-bound incentive to the main CTA to create urgency',
  'Increase the touch target of small CTAs to at least 44x44 pixels',
  'Use a high-contrast button colour for the primary action',
  'Reduce the number of competing CTAs in the hero section',
  'Repair or remove CTAs that point to broken pages',
  'Add an aria-label to icon-only CTAs',
] as const;

function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Deterministic mock provider.
 *
 * Intended for tests and dry runs without network calls. The reply is derived
 * from a hash of the prompt, so the same input yields the same list.
 */
export class MockAIProvider extends BaseAIProvider {
  constructor(config: AiProviderConfig) {
    super(config);
  }

  protected async rawComplete(prompt: string): Promise<string> {
    const offset = fnv1a32(prompt) % SUGGESTIONS.length;

    return Array.from({ length: MAX_RECOMMENDATIONS }, (_, i) => {
      const suggestion = SUGGESTIONS[(offset + i) % SUGGESTIONS.length];
      return `${i + 1}. ${suggestion}`;
    }).join('\n');
  }
}
