import type { Issue } from 'cta-audit/types';

import { BaseRule, titleCase } from '../../BaseRule.js';
import type { RuleContext } from '../../types.js';

const MIN_TEXT_LENGTH = 3;
const MAX_TEXT_LENGTH = 50;
const UNCLEAR_ACTION_MIN_LENGTH = 5;

/**
 * Wording checks on the visible CTA text.
 *
 * The checks overlap: an empty CTA is both too short and empty.
 */
export class TextQualityRule extends BaseRule {
  constructor() {
    super({
      id: 'cta/text-quality',
      category: 'content',
      description: 'Checks that CTA text is specific, action-oriented and of a sensible length.',
      severity: 'High',
    });
  }

  evaluate(context: RuleContext): Issue[] {
    const { element, textAnalysis } = context;
    const { text } = element;
    const out: Issue[] = [];

    if (textAnalysis.isGeneric) {
      out.push(
        this.issue(context, 'Generic Text', 'High', {
          description: `CTA text "${text}" is too generic and doesn't indicate specific action`,
          recommendation:
            'Use specific, action-oriented text that clearly indicates what will happen (e.g., "Get Started", "Download Now", "Sign Up Free")',
        }),
      );
    }

    if (!textAnalysis.hasActionWord && textAnalysis.length > UNCLEAR_ACTION_MIN_LENGTH) {
      out.push(
        this.issue(context, 'Unclear Action', 'Medium', {
          description: `CTA text "${text}" doesn't clearly indicate the action users should take`,
          recommendation:
            'Include action words like "Get", "Download", "Sign Up", "Learn More", "Try Now"',
        }),
      );
    }

    if (textAnalysis.length < MIN_TEXT_LENGTH) {
      out.push(
        this.issue(context, 'Insufficient Text', 'High', {
          description: `CTA text "${text}" is too short to be descriptive or accessible`,
          recommendation: 'Add descriptive text that explains the action (minimum 3-5 characters)',
        }),
      );
    }

    if (textAnalysis.length > MAX_TEXT_LENGTH) {
      out.push(
        this.issue(context, 'Text Too Long', 'Medium', {
          description: `CTA text is too long (${textAnalysis.length} chars) and may reduce effectiveness`,
          recommendation: 'Keep CTA text concise and focused (ideally under 30 characters)',
        }),
      );
    }

    if (!text.trim()) {
      out.push(
        this.issue(context, 'Empty Text', 'Medium', {
          description: `${titleCase(element.elementType)} has no text content`,
          recommendation: 'Add descriptive text to make the CTA accessible and clear',
        }),
      );
    }

    return out;
  }
}
