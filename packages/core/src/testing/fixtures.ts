import type { CtaElement, LinkCheck } from '../types/element.js';
import type { Issue } from '../types/issue.js';
import type { MetricSet } from '../types/metrics.js';

/**
 * Build a fully populated `CtaElement` for tests and custom-rule development.
 *
 * Defaults describe a visible, above-the-fold 160×48 button with no href.
 */
export function makeElement(overrides: Partial<CtaElement> = {}): CtaElement {
  return {
    elementId: 'cta-1',
    cssSelector: '#cta-1',
    elementType: 'button',
    text: 'Get Started',
    ariaLabel: null,
    role: null,
    tabindex: null,
    position: { x: 40, y: 100 },
    size: { width: 160, height: 48 },
    zIndex: null,
    htmlId: 'cta-1',
    htmlName: null,
    htmlClass: null,
    href: null,
    isVisible: true,
    isHidden: false,
    isDropdown: false,
    isJsGenerated: false,
    hasOnclickHandler: false,
    ...overrides,
  };
}

/**
 * A `LinkCheck` for a link that answered 200 in 250 ms.
 */
export function makeLinkCheck(overrides: Partial<LinkCheck> = {}): LinkCheck {
  return {
    status: 200,
    validity: 'valid',
    errorCategory: null,
    errorMessage: null,
    redirectUrl: null,
    responseTimeMs: 250,
    checkedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * A `MetricSet` with every score at 50.
 */
export function makeMetrics(overrides: Partial<MetricSet> = {}): MetricSet {
  return {
    visibility: 50,
    urgency: 50,
    actionClarity: 50,
    accessibility: 50,
    mobileResponsiveness: 50,
    colorContrast: 50,
    conversionOptimization: 50,
    linkValidity: 50,
    overallScore: 50,
    ...overrides,
  };
}

/**
 * An issue raised against `makeElement()` defaults.
 */
export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    kind: 'Generic Text',
    severity: 'High',
    ruleId: 'cta/text-quality',
    elementId: 'cta-1',
    cssSelector: '#cta-1',
    element: '"Get Started" (button)',
    location: 'Position: x:40, y:100',
    description: 'CTA text "Get Started" is too generic and doesn\'t indicate specific action',
    recommendation: 'Use specific, action-oriented text',
    details: {
      text: 'Get Started',
      elementType: 'button',
      position: 'x:40, y:100',
      size: '160x48',
      href: null,
      htmlId: 'cta-1',
      ariaLabel: null,
      role: null,
      tabindex: null,
      isHidden: false,
      isDropdown: false,
      isJsGenerated: false,
      hasOnclickHandler: false,
    },
    ...overrides,
  };
}
