import { readFileSync } from 'node:fs';

import { z } from 'zod';

const termList = z.array(z.string().min(1)).nonempty();

const VocabularySchema = z.object({
  actionWords: termList,
  urgencyWords: termList,
  benefitWords: termList,
  negativeWords: termList,
  genericPhrases: termList,
  urgency: z.object({
    high: termList,
    medium: termList,
    hedging: termList,
  }),
  clarity: z.object({
    primaryActions: termList,
    secondaryActions: termList,
    genericPenalties: z.record(z.number().int().positive()),
    benefitWords: termList,
    specificIndicators: termList,
  }),
  conversion: z.object({
    highConvert: termList,
    urgency: termList,
    benefit: termList,
    generic: termList,
  }),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

/**
 * Term lists used by the scorer and text analysis, read once from
 * `vocabulary.json` next to this module.
 */
export const VOCABULARY: Vocabulary = VocabularySchema.parse(
  JSON.parse(readFileSync(new URL('./vocabulary.json', import.meta.url), 'utf8')),
);

const patternCache = new Map<string, RegExp>();

function termPattern(term: string): RegExp {
  let pattern = patternCache.get(term);
  if (!pattern) {
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${inflected(term.toLowerCase())}(?![\\p{L}\\p{N}])`, 'u');
    patternCache.set(term, pattern);
  }
  return pattern;
}

// Silent-e stems drop the e before -ing: save, saves, saved, saving.
function inflected(term: string): string {
  const escape = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  if (term.length > 2 && term.endsWith('e')) {
    return `${escape(term.slice(0, -1))}(?:e(?:s|d)?|e?ing)`;
  }
  return `${escape(term)}(?:s|es|ed|ing)?`;
}

/**
 * Whole-word match of `term` in already lower-cased `text`.
 *
 * A term also matches its simple inflections, so `start` matches "started" and
 * "starts", but `no` does not match "now".
 */
export function containsTerm(text: string, term: string): boolean {
  return termPattern(term).test(text);
}

/**
 * Number of distinct terms from `terms` present in `text`.
 */
export function countTerms(text: string, terms: readonly string[]): number {
  let count = 0;
  for (const term of terms) {
    if (containsTerm(text, term)) count += 1;
  }
  return count;
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => containsTerm(text, term));
}
