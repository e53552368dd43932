import type { CtaElement, ErrorCategory, Size } from '../types/element.js';
import { METRIC_NAMES } from '../types/metrics.js';
import type { MetricName, MetricSet } from '../types/metrics.js';

import { countWords } from './textAnalysis.js';
import { VOCABULARY, containsAnyTerm, countTerms } from './vocabulary.js';

/**
 * Weights used for `overallScore`. They sum to 1; `colorContrast` is reported
 * but not weighted.
 */
export const METRIC_WEIGHTS: Readonly<Record<MetricName, number>> = {
  conversionOptimization: 0.22,
  actionClarity: 0.18,
  urgency: 0.13,
  visibility: 0.13,
  accessibility: 0.13,
  linkValidity: 0.13,
  mobileResponsiveness: 0.08,
  colorContrast: 0,
};

const ABOVE_FOLD_Y = 600;
const NEAR_FOLD_Y = 1200;
const TOUCH_TARGET_PX = 44;
const SMALL_TARGET_PX = 32;

const FAST_RESPONSE_MS = 1_000;
const SLOW_RESPONSE_MS = 5_000;

const INVALID_LINK_SCORES: Partial<Record<ErrorCategory, number>> = {
  'not-found': 0,
  connection: 5,
  forbidden: 10,
  timeout: 15,
  'server-error': 20,
  ssl: 25,
};
const OTHER_INVALID_LINK_SCORE = 30;

const NATIVE_INTERACTIVE_TYPES = new Set<string>(['button', 'link']);
const LABELLED_ROLES = new Set(['button', 'link', 'menuitem']);

/**
 * Scores one CTA element on eight heuristics, each clamped to 0..100.
 *
 * Pure: the result depends only on the element (after link validation).
 */
export class MetricScorer {
  score(element: CtaElement): MetricSet {
    const scores: Record<MetricName, number> = {
      visibility: clamp0to100(this.visibility(element)),
      urgency: clamp0to100(this.urgency(element.text)),
      actionClarity: clamp0to100(this.actionClarity(element.text)),
      accessibility: clamp0to100(this.accessibility(element)),
      mobileResponsiveness: clamp0to100(this.mobileResponsiveness(element)),
      colorContrast: clamp0to100(this.colorContrast(element)),
      conversionOptimization: clamp0to100(this.conversionOptimization(element)),
      linkValidity: clamp0to100(this.linkValidity(element)),
    };

    return { ...scores, overallScore: weightedOverall(scores) };
  }

  private visibility(element: CtaElement): number {
    let score = foldBonus(element.position.y, 25, 15, 5);

    const target = touchTarget(element.size);
    score += target === 'full' ? 20 : target === 'small' ? 10 : -10;

    const words = countWords(element.text);
    if (words >= 2 && words <= 5) score += 20;
    else if (words === 1) score += 15;
    else if (words >= 6 && words <= 8) score += 10;
    else score -= 5;

    if (element.elementType === 'button') score += 20;
    else if (element.elementType === 'form') score += 15;
    else if (element.elementType === 'link') score += 10;
    else score += 5;

    if (element.zIndex !== null && element.zIndex > 0) score += 10;

    score += isShown(element) ? 15 : -20;
    return score;
  }

  private urgency(text: string): number {
    const lower = text.toLowerCase();

    const high = countTerms(lower, VOCABULARY.urgency.high);
    const medium = countTerms(lower, VOCABULARY.urgency.medium);
    const actions = countTerms(lower, VOCABULARY.actionWords);

    let score = high * 20 + medium * 12 + actions * 8;

    const indicators = high + medium + actions;
    if (indicators >= 3) score += 15;
    else if (indicators >= 2) score += 8;

    if (containsAnyTerm(lower, VOCABULARY.urgency.hedging)) score -= 15;
    return score;
  }

  private actionClarity(text: string): number {
    const lower = text.trim().toLowerCase();
    if (!lower) return 0;

    const { clarity } = VOCABULARY;
    let score = 0;
    score += countTerms(lower, clarity.primaryActions) * 25;
    score += countTerms(lower, clarity.secondaryActions) * 15;

    // Only the heaviest generic-phrase penalty applies.
    let penalty = 0;
    for (const [phrase, weight] of Object.entries(clarity.genericPenalties)) {
      if (weight > penalty && containsAnyTerm(lower, [phrase])) penalty = weight;
    }
    score -= penalty;

    score += countTerms(lower, clarity.benefitWords) * 12;
    if (containsAnyTerm(lower, clarity.specificIndicators)) score += 15;

    const words = countWords(text);
    if (words >= 2 && words <= 5) score += 10;
    else if (words === 1) score += 5;
    else if (words > 8) score -= 10;

    if (lower.endsWith('?')) score -= 20;
    return score;
  }

  private accessibility(element: CtaElement): number {
    const hasText = element.text.trim().length > 0;
    const hasLabel = Boolean(element.ariaLabel);
    const focusable = isFocusableTabindex(element.tabindex);
    const native = NATIVE_INTERACTIVE_TYPES.has(element.elementType);

    let score = 0;
    if (hasText) score += 25;
    else score += hasLabel ? 20 : -40;

    const length = element.text.length;
    if (length >= 3 && length <= 50) score += 20;
    else if (length < 3) score -= 15;
    else score -= 10;

    if (hasLabel) score += 15;
    if (element.role !== null && LABELLED_ROLES.has(element.role)) score += 15;
    if (focusable) score += 10;

    if (native || focusable) score += 20;
    else if (element.hasOnclickHandler && !element.tabindex) score -= 20;

    const target = touchTarget(element.size);
    score += target === 'full' ? 20 : target === 'small' ? 10 : -15;

    score += isShown(element) ? 15 : -25;

    if (native) score += 10;
    if (element.elementType === 'link' && !hasText && !hasLabel) score -= 30;
    return score;
  }

  private mobileResponsiveness(element: CtaElement): number {
    const target = touchTarget(element.size);
    let score = target === 'full' ? 30 : target === 'small' ? 20 : -20;

    if (element.text.trim()) {
      const words = countWords(element.text);
      if (words <= 3) score += 25;
      else if (words <= 5) score += 20;
      else if (words <= 8) score += 10;
      else score -= 10;
    }

    if (element.elementType === 'button') score += 25;
    else if (element.elementType === 'link') score += 15;
    else if (element.elementType === 'form') score += 10;

    if (isFocusableTabindex(element.tabindex)) score += 15;
    if (element.isDropdown) score -= 10;
    return score;
  }

  /**
   * String heuristic on computed colours; no contrast-ratio math.
   */
  private colorContrast(element: CtaElement): number {
    let score = 50;

    const styles = element.computedStyles;
    if (styles) {
      const text = styles.color ?? '';
      const background = styles.backgroundColor ?? '';
      const whiteText = text.includes(WHITE);
      const blackText = text.includes(BLACK);

      if ((whiteText && background.includes(BLACK)) || (blackText && background.includes(WHITE))) {
        score += 30;
      } else if (whiteText || blackText) {
        score += 15;
      } else {
        score -= 10;
      }
    }

    const classes = (element.htmlClass ?? '').toLowerCase();
    if (['white', 'black', 'primary', 'secondary'].some((c) => classes.includes(c))) score += 10;
    return score;
  }

  private conversionOptimization(element: CtaElement): number {
    const { conversion } = VOCABULARY;
    let score = 0;

    const lower = element.text.toLowerCase();
    if (lower.trim()) {
      if (containsAnyTerm(lower, conversion.highConvert)) score += 25;
      if (containsAnyTerm(lower, conversion.urgency)) score += 20;
      if (containsAnyTerm(lower, conversion.benefit)) score += 15;
      if (containsAnyTerm(lower, conversion.generic)) score -= 30;
    }

    if (element.elementType === 'button') score += 20;
    else if (element.elementType === 'form') score += 15;

    score += foldBonus(element.position.y, 25, 15, 0);

    const { width, height } = element.size;
    if (width >= 100 && width <= 300 && height >= 40 && height <= 60) score += 20;
    else if (width >= 80 && height >= 35) score += 15;
    else score -= 10;
    return score;
  }

  private linkValidity(element: CtaElement): number {
    if (!element.href) return element.elementType === 'link' ? 0 : 50;

    const link = element.link;
    if (!link || link.validity === 'unknown') return 50;

    if (link.validity === 'valid') {
      let score = 100;
      const ms = link.responseTimeMs;
      if (ms !== null && ms < FAST_RESPONSE_MS) score += 10;
      else if (ms !== null && ms > SLOW_RESPONSE_MS) score -= 10;
      return score;
    }

    if (link.errorCategory === null) return 0;
    return INVALID_LINK_SCORES[link.errorCategory] ?? OTHER_INVALID_LINK_SCORE;
  }
}

const WHITE = 'rgb(255, 255, 255)';
const BLACK = 'rgb(0, 0, 0)';

/**
 * `round(Σ weight · score)` over the weighted metrics.
 */
export function weightedOverall(scores: Record<MetricName, number>): number {
  let total = 0;
  for (const metric of METRIC_NAMES) {
    total += scores[metric] * METRIC_WEIGHTS[metric];
  }
  return clamp0to100(Math.round(total));
}

function foldBonus(y: number, above: number, near: number, below: number): number {
  if (y < ABOVE_FOLD_Y) return above;
  if (y < NEAR_FOLD_Y) return near;
  return below;
}

function touchTarget(size: Size): 'full' | 'small' | 'tiny' {
  if (size.width >= TOUCH_TARGET_PX && size.height >= TOUCH_TARGET_PX) return 'full';
  if (size.width >= SMALL_TARGET_PX && size.height >= SMALL_TARGET_PX) return 'small';
  return 'tiny';
}

function isShown(element: CtaElement): boolean {
  return element.isVisible && !element.isHidden;
}

function isFocusableTabindex(tabindex: string | null): boolean {
  return Boolean(tabindex) && tabindex !== '-1';
}

function clamp0to100(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}
