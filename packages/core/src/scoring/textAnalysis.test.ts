import { describe, expect, it } from 'vitest';

import { analyzeText, countWords } from './textAnalysis.js';
import { containsTerm } from './vocabulary.js';

describe('analyzeText', () => {
  it('flags generic phrases by exact match', () => {
    expect(analyzeText('  Click   here ')).toEqual({
      length: 15,
      wordCount: 2,
      hasActionWord: true,
      hasUrgencyWord: false,
      isGeneric: true,
      hasBenefit: false,
      isNegative: false,
    });
    expect(analyzeText('Click here to download').isGeneric).toBe(false);
  });

  it('detects action, urgency and benefit words', () => {
    const analysis = analyzeText('Get Started Free Today');
    expect(analysis.hasActionWord).toBe(true);
    expect(analysis.hasUrgencyWord).toBe(true);
    expect(analysis.hasBenefit).toBe(true);
    expect(analysis.isNegative).toBe(false);
  });

  it('detects negative wording', () => {
    expect(analyzeText("Don't miss out").isNegative).toBe(true);
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('')).toBe(0);
    expect(countWords('   ')).toBe(0);
    expect(countWords(' Sign  up\tnow ')).toBe(3);
  });
});

describe('containsTerm', () => {
  it('matches whole words and simple inflections', () => {
    expect(containsTerm('get started', 'start')).toBe(true);
    expect(containsTerm('free downloads', 'download')).toBe(true);
    expect(containsTerm('restart', 'start')).toBe(false);
    expect(containsTerm('know more', 'now')).toBe(false);
    expect(containsTerm('sign up today', 'sign up')).toBe(true);
  });

  it('handles stems ending in a silent e', () => {
    expect(containsTerm('you saved 20%', 'save')).toBe(true);
    expect(containsTerm('start saving now', 'save')).toBe(true);
    expect(containsTerm('saves time', 'save')).toBe(true);
    expect(containsTerm('save', 'save')).toBe(true);
    expect(containsTerm('savings', 'save')).toBe(false);
    expect(containsTerm('freed up', 'free')).toBe(true);
  });
});
