import type { LinkValidationConfig } from '../types/config.js';
import type { CtaElement } from '../types/element.js';

import { runLinkChecks } from './checkPool.js';
import type { PendingCheck } from './checkPool.js';
import { DEFAULT_LINK_TIMEOUT_MS, checkLink } from './checkLink.js';
import { classifyHref } from './classify.js';

export const DEFAULT_LINK_CONCURRENCY = 5;

const CHECKED_TYPES = new Set<CtaElement['elementType']>(['link', 'button']);

export interface LinkProgress {
  completed: number;
  total: number;
}

/**
 * Validates CTA hrefs over HTTP with a bounded worker pool.
 *
 * Only `link` and `button` elements with a non-empty href get a `LinkCheck`;
 * everything else is returned as-is. Input elements are never mutated.
 */
export class LinkValidator {
  constructor(private readonly config: LinkValidationConfig = {}) {}

  async validate(
    elements: readonly CtaElement[],
    onProgress?: (progress: LinkProgress) => void,
  ): Promise<CtaElement[]> {
    const now = this.config.now ?? Date.now;
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_LINK_TIMEOUT_MS;

    const pending: PendingCheck[] = [];

    const classified = elements.map((element): CtaElement => {
      if (!isCheckable(element)) return element;

      const classification = classifyHref(element.href, this.config.baseUrl);
      if (classification.kind === 'check') {
        pending.push({ elementId: element.elementId, url: classification.url });
        return element;
      }

      return {
        ...element,
        link: {
          status: null,
          validity: 'unknown',
          errorCategory: classification.category,
          errorMessage: classification.message,
          redirectUrl: null,
          responseTimeMs: null,
          checkedAt: new Date(now()).toISOString(),
        },
      };
    });

    const checks = await runLinkChecks({
      checks: pending,
      concurrency: this.config.concurrency ?? DEFAULT_LINK_CONCURRENCY,
      check: (url) =>
        checkLink(url, {
          timeoutMs,
          userAgent: this.config.userAgent,
          fetch: this.config.fetch,
          now,
        }),
      now,
      onProgress,
    });

    return classified.map((element) => {
      const link = checks.get(element.elementId);
      return link ? { ...element, link } : element;
    });
  }
}

function isCheckable(element: CtaElement): element is CtaElement & { href: string } {
  return CHECKED_TYPES.has(element.elementType) && Boolean(element.href?.trim());
}
