/**
 * ARIA widget roles a snapshot provider may report as an element type when the
 * element is not a native button/link/form control.
 */
export const ARIA_CTA_ROLES = [
  'menuitem',
  'menuitemcheckbox',
  'menuitemradio',
  'option',
  'tab',
  'switch',
  'checkbox',
  'radio',
  'combobox',
  'searchbox',
  'textbox',
  'slider',
  'spinbutton',
  'treeitem',
  'gridcell',
] as const;

export type AriaCtaRole = (typeof ARIA_CTA_ROLES)[number];

/**
 * Element types recognised by the engine.
 *
 * `custom` covers clickable non-semantic elements (e.g. a `div` with an
 * onclick handler) that the snapshot provider could not map to a role.
 */
export const ELEMENT_TYPES = [
  'button',
  'link',
  'form',
  'dropdown',
  'area',
  'custom',
  ...ARIA_CTA_ROLES,
] as const;

export type ElementType = (typeof ELEMENT_TYPES)[number];

export interface Position {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Subset of computed CSS the colour-contrast heuristic looks at.
 * Values are browser-serialised strings such as `rgb(255, 255, 255)`.
 */
export interface ComputedStyles {
  color?: string;
  backgroundColor?: string;
}

/**
 * Tri-state link validity.
 *
 * `unknown` means the href was not checkable (non-http scheme, fragment,
 * script-like value, or an unresolved root-relative path).
 */
export type LinkValidity = 'valid' | 'invalid' | 'unknown';

/**
 * Classified reason for a link check outcome.
 *
 * Produced once by the link validator and consumed directly by the scorer and
 * the issue detector.
 */
export type ErrorCategory =
  | 'skipped-scheme'
  | 'skipped-pattern'
  | 'skipped-relative'
  | 'not-found'
  | 'forbidden'
  | 'server-error'
  | 'client-error'
  | 'unexpected-status'
  | 'timeout'
  | 'connection'
  | 'ssl'
  | 'too-many-redirects'
  | 'invalid-url'
  | 'validation-failed';

/**
 * Outcome of validating one element's href.
 */
export interface LinkCheck {
  /** HTTP status of the final response, when a request completed. */
  status: number | null;

  validity: LinkValidity;

  /** `null` for a valid link. */
  errorCategory: ErrorCategory | null;

  /** Human-readable classification, e.g. `Page not found (404)`. */
  errorMessage: string | null;

  /** Final URL after redirects, when it differs from the requested one. */
  redirectUrl: string | null;

  /** Raw wall-clock duration of the request in milliseconds. */
  responseTimeMs: number | null;

  /** ISO timestamp of the check. */
  checkedAt: string;
}

/**
 * One call-to-action candidate captured from a page.
 *
 * Instances come from a `SnapshotProvider`; only `link` is filled in later by
 * the link validator (as a new object, never by mutating the input).
 */
export interface CtaElement {
  /** Unique within one audit run. */
  elementId: string;
  cssSelector: string;
  elementType: ElementType;

  text: string;
  ariaLabel: string | null;
  role: string | null;
  tabindex: string | null;

  position: Position;
  size: Size;
  zIndex: number | null;

  htmlId: string | null;
  htmlName: string | null;
  htmlClass: string | null;
  computedStyles?: ComputedStyles;
  dataAttributes?: Record<string, string>;

  href: string | null;

  isVisible: boolean;
  isHidden: boolean;
  isDropdown: boolean;
  isJsGenerated: boolean;
  hasOnclickHandler: boolean;

  link?: LinkCheck;
}
