import type { Issue } from 'cta-audit/types';

import { BaseRule } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

/**
 * A `link` CTA must point somewhere.
 */
export class MissingLinkRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/missing-link',
      category: 'links',
      description: 'Flags link CTAs without a destination URL.',
      severity: 'High',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element } = context;
    if (element.elementType !== 'link' || element.href) return [];

    return [
      this.issue(context, 'Missing Link', 'High', {
        description: `Link "${element.text}" has no destination URL`,
        recommendation: 'Add a proper href attribute to make the link functional',
      }),
    ];
  }
}
