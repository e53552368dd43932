import { describe, expect, it } from 'vitest';

import { SnapshotInvariantError, parseSnapshot } from './schema.js';

function raw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    elementId: 'cta-1',
    cssSelector: '#buy',
    elementType: 'button',
    text: 'Buy now',
    position: { x: 10, y: 20 },
    size: { width: 120, height: 44 },
    isVisible: true,
    isHidden: false,
    ...overrides,
  };
}

describe('parseSnapshot', () => {
  it('fills optional fields with defaults', () => {
    const [element] = parseSnapshot([raw()]);

    expect(element).toEqual({
      elementId: 'cta-1',
      cssSelector: '#buy',
      elementType: 'button',
      text: 'Buy now',
      ariaLabel: null,
      role: null,
      tabindex: null,
      position: { x: 10, y: 20 },
      size: { width: 120, height: 44 },
      zIndex: null,
      htmlId: null,
      htmlName: null,
      htmlClass: null,
      href: null,
      isVisible: true,
      isHidden: false,
      isDropdown: false,
      isJsGenerated: false,
      hasOnclickHandler: false,
    });
  });

  it('drops link state supplied by the snapshot', () => {
    const [element] = parseSnapshot([raw({ link: { validity: 'valid' } })]);
    expect(element?.link).toBeUndefined();
  });

  it('throws on duplicate element ids', () => {
    const run = () => parseSnapshot([raw(), raw({ cssSelector: '#other' })]);

    expect(run).toThrow(SnapshotInvariantError);
    expect(run).toThrow(
      'Invalid element snapshot: element[1].elementId: duplicate id "cta-1" (first seen at element[0])',
    );
  });

  it('reports missing required fields with their path', () => {
    try {
      parseSnapshot([raw({ position: undefined })]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotInvariantError);
      if (error instanceof SnapshotInvariantError) {
        expect(error.problems).toEqual(['element[0].position: Required']);
      }
    }
  });

  it('rejects unknown element types', () => {
    expect(() => parseSnapshot([raw({ elementType: 'marquee' })])).toThrow(SnapshotInvariantError);
  });
});
