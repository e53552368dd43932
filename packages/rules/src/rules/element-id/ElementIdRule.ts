import type { Issue } from 'cta-audit/types';

import { BaseRule, titleCase } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

const TRACKED_TYPES = new Set<string>(['button', 'link']);

/**
 * Buttons and links need an `id` so analytics and tests can target them.
 */
export class ElementIdRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/element-id',
      category: 'tracking',
      description: 'Flags buttons and links without an id attribute.',
      severity: 'Low',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element } = context;
    if (!TRACKED_TYPES.has(element.elementType) || element.htmlId) return [];

    return [
      this.issue(context, 'Missing Element ID', 'Low', {
        description: `${titleCase(element.elementType)} lacks an ID attribute for tracking and testing`,
        recommendation: 'Add a unique ID attribute for better tracking and testing',
      }),
    ];
  }
}
