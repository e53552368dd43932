import type { Issue } from 'cta-audit/types';

import { BaseRule } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

export class HiddenElementRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/hidden-element',
      category: 'visibility',
      description: 'Flags CTAs hidden from users.',
      severity: 'Medium',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element } = context;
    if (!element.isHidden) return [];

    return [
      this.issue(context, 'Hidden CTA', 'Medium', {
        description: `CTA "${element.text}" is hidden and may not be accessible to users`,
        recommendation:
          'Make the CTA visible or ensure it becomes visible through user interaction',
      }),
    ];
  }
}
