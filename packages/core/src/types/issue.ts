/**
 * Issue severity, ordered High > Medium > Low.
 */
export type Severity = 'High' | 'Medium' | 'Low';

export const SEVERITIES: readonly Severity[] = ['High', 'Medium', 'Low'];

/**
 * Every issue the detector can raise.
 */
export const ISSUE_KINDS = [
  'Generic Text',
  'Unclear Action',
  'Insufficient Text',
  'Text Too Long',
  'Empty Text',
  'Missing Link',
  'Hidden CTA',
  'Missing Accessibility Label',
  'JS-Generated Element Missing Accessibility',
  'Dropdown CTA Missing Role',
  'Missing Keyboard Accessibility',
  'Missing Element ID',
  'Broken Link (404)',
  'Server Error (500)',
  'Link Timeout',
  'Connection Error',
  'SSL Certificate Error',
  'Link Error',
  'Invalid Link',
  'Slow Link Response',
  'Redirect Link',
] as const;

export type IssueKind = (typeof ISSUE_KINDS)[number];

/**
 * Report grouping for issues.
 */
export type IssueCategory = 'content' | 'links' | 'visibility' | 'accessibility' | 'tracking';

/**
 * Exhaustive kind → category map. Adding an `IssueKind` without a category is a
 * compile error.
 */
export const ISSUE_CATEGORIES: Record<IssueKind, IssueCategory> = {
  'Generic Text': 'content',
  'Unclear Action': 'content',
  'Insufficient Text': 'content',
  'Text Too Long': 'content',
  'Empty Text': 'content',
  'Missing Link': 'links',
  'Hidden CTA': 'visibility',
  'Missing Accessibility Label': 'accessibility',
  'JS-Generated Element Missing Accessibility': 'accessibility',
  'Dropdown CTA Missing Role': 'accessibility',
  'Missing Keyboard Accessibility': 'accessibility',
  'Missing Element ID': 'tracking',
  'Broken Link (404)': 'links',
  'Server Error (500)': 'links',
  'Link Timeout': 'links',
  'Connection Error': 'links',
  'SSL Certificate Error': 'links',
  'Link Error': 'links',
  'Invalid Link': 'links',
  'Slow Link Response': 'links',
  'Redirect Link': 'links',
};

/**
 * Snapshot of the element attributes an issue was raised against, so a report
 * can render it without going back to the element.
 */
export interface IssueDetails {
  text: string;
  elementType: string;
  /** `x:<x>, y:<y>` */
  position: string;
  /** `<width>x<height>` */
  size: string;
  /** First 50 characters of the href, with `...` when truncated. */
  href: string | null;
  htmlId: string | null;
  ariaLabel: string | null;
  role: string | null;
  tabindex: string | null;
  isHidden: boolean;
  isDropdown: boolean;
  isJsGenerated: boolean;
  hasOnclickHandler: boolean;
}

/**
 * A single detected problem with one CTA element.
 */
export interface Issue {
  kind: IssueKind;
  severity: Severity;
  /** Id of the rule that raised the issue. */
  ruleId: string;
  elementId: string;
  cssSelector: string;
  /** Short label, e.g. `"Buy now" (button)`. */
  element: string;
  /** `Position: x:<x>, y:<y>` */
  location: string;
  description: string;
  recommendation: string;
  details: IssueDetails;
}
