import type { ErrorCategory, Issue, IssueKind } from 'cta-audit/types';

import { BaseRule } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

const SLOW_LINK_MS = 3_000;
const CHECKED_TYPES = new Set<string>(['link', 'button']);

type LinkIssueText = { kind: IssueKind; description: string; recommendation: string };

const INVALID_LINK_ISSUES: Partial<Record<ErrorCategory, (href: string) => LinkIssueText>> = {
  'not-found': (href) => ({
    kind: 'Broken Link (404)',
    description: `Link "${href}" returns a 404 error - page not found`,
    recommendation:
      'Fix the broken link by updating the URL or removing the CTA if the page no longer exists',
  }),
  'server-error': (href) => ({
    kind: 'Server Error (500)',
    description: `Link "${href}" returns a 500 error - server error`,
    recommendation: 'Contact the server administrator to fix the server-side issue',
  }),
  timeout: (href) => ({
    kind: 'Link Timeout',
    description: `Link "${href}" times out when accessed`,
    recommendation: 'Check server performance or consider using a CDN to improve response times',
  }),
  connection: (href) => ({
    kind: 'Connection Error',
    description: `Link "${href}" cannot be reached due to connection issues`,
    recommendation: 'Verify the URL is correct and the server is online',
  }),
  ssl: (href) => ({
    kind: 'SSL Certificate Error',
    description: `Link "${href}" has SSL certificate issues`,
    recommendation: 'Fix SSL certificate configuration or use HTTP if appropriate',
  }),
};

/**
 * Reports the outcome of link validation: broken destinations, slow responses
 * and redirects. Unchecked (skipped) links raise nothing.
 */
export class LinkHealthRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/link-health',
      category: 'links',
      description: 'Reports broken, slow and redirected CTA links.',
      severity: 'High',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element } = context;
    const { href, link } = element;
    if (!href || !link || !CHECKED_TYPES.has(element.elementType)) return [];

    if (link.validity === 'invalid') {
      const { kind, ...text } = this.describeFailure(href, link.errorCategory, link.errorMessage);
      return [this.issue(context, kind, 'High', text)];
    }

    if (link.validity !== 'valid') return [];

    if (link.responseTimeMs !== null && link.responseTimeMs > SLOW_LINK_MS) {
      return [
        this.issue(context, 'Slow Link Response', 'Medium', {
          description: `Link "${href}" is slow to respond (${(link.responseTimeMs / 1000).toFixed(2)}s)`,
          recommendation:
            'Optimize server performance or consider using a CDN to improve response times',
        }),
      ];
    }

    if (link.redirectUrl && link.redirectUrl !== href) {
      return [
        this.issue(context, 'Redirect Link', 'Low', {
          description: `Link "${href}" redirects to "${link.redirectUrl}"`,
          recommendation:
            'Consider updating the link to point directly to the final destination to improve performance',
        }),
      ];
    }

    return [];
  }

  private describeFailure(
    href: string,
    category: ErrorCategory | null,
    message: string | null,
  ): LinkIssueText {
    if (category === null) {
      return {
        kind: 'Invalid Link',
        description: `Link "${href}" is not valid`,
        recommendation: 'Check the link URL and ensure it points to a valid destination',
      };
    }

    const known = INVALID_LINK_ISSUES[category];
    if (known) return known(href);

    return {
      kind: 'Link Error',
      description: `Link "${href}" has an error: ${message ?? category}`,
      recommendation: 'Investigate and fix the link issue',
    };
  }
}
