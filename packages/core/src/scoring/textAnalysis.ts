import type { TextAnalysis } from '../types/metrics.js';

import { VOCABULARY, containsAnyTerm } from './vocabulary.js';

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Lexical features of a CTA's visible text.
 */
export function analyzeText(text: string): TextAnalysis {
  const lower = text.toLowerCase();
  const normalized = lower.trim().replace(/\s+/g, ' ');

  return {
    length: text.length,
    wordCount: countWords(text),
    hasActionWord: containsAnyTerm(lower, VOCABULARY.actionWords),
    hasUrgencyWord: containsAnyTerm(lower, VOCABULARY.urgencyWords),
    isGeneric: VOCABULARY.genericPhrases.includes(normalized),
    hasBenefit: containsAnyTerm(lower, VOCABULARY.benefitWords),
    isNegative: containsAnyTerm(lower, VOCABULARY.negativeWords),
  };
}
