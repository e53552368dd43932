import { describe, expect, it } from 'vitest';

import { contextFor } from '../../test-helpers.js';

import { TextQualityRule } from './TextQualityRule.js';

const rule = new TextQualityRule();

describe('TextQualityRule', () => {
  it('flags text without an action word', () => {
    const [issue] = rule.evaluate(contextFor({ text: 'Our pricing' }));

    expect(issue?.kind).toBe('Unclear Action');
    expect(issue?.description).toBe(
      `CTA text "Our pricing" doesn't clearly indicate the action users should take`,
    );
  });

  it('leaves short action-less text to the length check', () => {
    expect(rule.evaluate(contextFor({ text: 'Go' })).map((i) => i.kind)).toEqual([
      'Insufficient Text',
    ]);
  });

  it('flags overly long text with its length', () => {
    const text = 'Download our complete guide to building a better onboarding flow today';
    const [issue] = rule.evaluate(contextFor({ text }));

    expect(issue?.kind).toBe('Text Too Long');
    expect(issue?.description).toBe(
      `CTA text is too long (${text.length} chars) and may reduce effectiveness`,
    );
  });

  it('treats whitespace-only text as empty', () => {
    expect(rule.evaluate(contextFor({ text: '   ' })).map((i) => i.kind)).toEqual(['Empty Text']);
  });
});
