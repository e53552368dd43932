import type { Issue } from 'cta-audit/types';

import { BaseRule, titleCase } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

const NATIVE_INTERACTIVE_TYPES = new Set<string>(['button', 'link']);

/**
 * Assistive-technology checks: accessible name, ARIA role on scripted and
 * dropdown CTAs, keyboard reachability of click handlers.
 */
export class AccessibleNameRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/accessible-name',
      category: 'accessibility',
      description: 'Checks accessible names, ARIA roles and keyboard access of CTAs.',
      severity: 'High',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element } = context;
    const type = element.elementType;
    const native = NATIVE_INTERACTIVE_TYPES.has(type);
    const out: Issue[] = [];

    if (native && !element.ariaLabel && !element.text.trim()) {
      out.push(
        this.issue(context, 'Missing Accessibility Label', 'High', {
          description: `${titleCase(type)} has no accessible text or aria-label`,
          recommendation: 'Add descriptive text or aria-label for screen readers',
        }),
      );
    }

    if (element.isJsGenerated && !element.role && !element.ariaLabel) {
      out.push(
        this.issue(context, 'JS-Generated Element Missing Accessibility', 'Medium', {
          description: `JavaScript-generated ${type} lacks proper accessibility attributes`,
          recommendation: 'Add role, aria-label, or other accessibility attributes',
        }),
      );
    }

    if (element.isDropdown && !element.role) {
      out.push(
        this.issue(context, 'Dropdown CTA Missing Role', 'Medium', {
          description: `Dropdown ${type} lacks proper ARIA role`,
          recommendation: 'Add appropriate role attribute (e.g., menuitem, button)',
        }),
      );
    }

    if (element.hasOnclickHandler && !element.tabindex && !native) {
      out.push(
        this.issue(context, 'Missing Keyboard Accessibility', 'Medium', {
          description: 'Element with onclick handler is not keyboard accessible',
          recommendation: 'Add tabindex or use proper interactive element (button, a)',
        }),
      );
    }

    return out;
  }
}
