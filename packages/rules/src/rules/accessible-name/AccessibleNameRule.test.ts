import { describe, expect, it } from 'vitest';

import { contextFor } from '../../test-helpers.js';

import { AccessibleNameRule } from './AccessibleNameRule.js';

const rule = new AccessibleNameRule();
const kinds = (overrides: Parameters<typeof contextFor>[0]) =>
  rule.evaluate(contextFor(overrides)).map((i) => i.kind);

describe('AccessibleNameRule', () => {
  it('accepts an aria-label in place of text', () => {
    expect(kinds({ text: '', ariaLabel: 'Open cart' })).toEqual([]);
  });

  it('flags scripted elements without role or label', () => {
    expect(kinds({ elementType: 'custom', text: 'Buy', isJsGenerated: true })).toEqual([
      'JS-Generated Element Missing Accessibility',
    ]);
    expect(kinds({ elementType: 'custom', text: 'Buy', isJsGenerated: true, role: 'button' })).toEqual([]);
  });

  it('flags dropdowns without a role', () => {
    const [issue] = rule.evaluate(contextFor({ elementType: 'dropdown', isDropdown: true }));
    expect(issue?.description).toBe('Dropdown dropdown lacks proper ARIA role');
  });

  it('flags click handlers on non-native elements without tabindex', () => {
    expect(kinds({ elementType: 'custom', hasOnclickHandler: true })).toEqual([
      'Missing Keyboard Accessibility',
    ]);
    expect(kinds({ elementType: 'custom', hasOnclickHandler: true, tabindex: '0' })).toEqual([]);
    expect(kinds({ hasOnclickHandler: true })).toEqual([]);
  });
});
