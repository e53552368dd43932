import type { Issue, IssueCategory, IssueKind, Severity } from 'cta-audit/types';

import type { Rule, RuleContext } from './types.js';

const HREF_EXCERPT_LENGTH = 50;

/**
 * Base class for built-in rules.
 *
 * Subclasses implement `evaluate` and use `issue(...)` so every issue carries
 * the same element label, location and details.
 */
export abstract class BaseRule implements Rule {
  /** Stable rule identifier. */
  readonly id: string;

  /** Category for grouping results. */
  readonly category: IssueCategory;

  /** Short human-readable description. */
  readonly description: string;

  /** Highest severity this rule raises. */
  readonly severity: Severity;

  protected constructor(options: {
    id: string;
    category: IssueCategory;
    description: string;
    severity: Severity;
  }) {
    this.id = options.id;
    this.category = options.category;
    this.description = options.description;
    this.severity = options.severity;
  }

  abstract evaluate(context: RuleContext): Issue[];

  /**
   * Build an issue for the element in `context`.
   */
  protected issue(
    context: RuleContext,
    kind: IssueKind,
    severity: Severity,
    text: { description: string; recommendation: string },
  ): Issue {
    const { element } = context;
    const position = `x:${element.position.x}, y:${element.position.y}`;

    return {
      kind,
      severity,
      ruleId: this.id,
      elementId: element.elementId,
      cssSelector: element.cssSelector,
      element: `"${element.text}" (${element.elementType})`,
      location: `Position: ${position}`,
      description: text.description,
      recommendation: text.recommendation,
      details: {
        text: element.text,
        elementType: element.elementType,
        position,
        size: `${element.size.width}x${element.size.height}`,
        href: excerpt(element.href),
        htmlId: element.htmlId,
        ariaLabel: element.ariaLabel,
        role: element.role,
        tabindex: element.tabindex,
        isHidden: element.isHidden,
        isDropdown: element.isDropdown,
        isJsGenerated: element.isJsGenerated,
        hasOnclickHandler: element.hasOnclickHandler,
      },
    };
  }
}

/**
 * `"menuitem"` → `"Menuitem"`, for sentence-initial element types.
 */
export function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function excerpt(href: string | null): string | null {
  if (href === null || href.length <= HREF_EXCERPT_LENGTH) return href;
  return `${href.slice(0, HREF_EXCERPT_LENGTH)}...`;
}
