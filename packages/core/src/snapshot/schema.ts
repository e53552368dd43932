import { z } from 'zod';

import { ELEMENT_TYPES } from '../types/element.js';
import type { CtaElement } from '../types/element.js';

/**
 * Thrown when a snapshot breaks an invariant the rest of the pipeline relies
 * on (missing required fields, duplicate `elementId`).
 */
export class SnapshotInvariantError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid element snapshot: ${problems.join('; ')}`);
    this.name = 'SnapshotInvariantError';
    this.problems = problems;
  }
}

const nullableString = z.string().nullable().default(null);

export const PositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const SizeSchema = z.object({
  width: z.number().finite().nonnegative(),
  height: z.number().finite().nonnegative(),
});

export const CtaElementSchema = z.object({
  elementId: z.string().min(1),
  cssSelector: z.string(),
  elementType: z.enum(ELEMENT_TYPES),

  text: z.string().default(''),
  ariaLabel: nullableString,
  role: nullableString,
  tabindex: nullableString,

  position: PositionSchema,
  size: SizeSchema,
  zIndex: z.number().finite().nullable().default(null),

  htmlId: nullableString,
  htmlName: nullableString,
  htmlClass: nullableString,
  computedStyles: z
    .object({
      color: z.string().optional(),
      backgroundColor: z.string().optional(),
    })
    .optional(),
  dataAttributes: z.record(z.string()).optional(),

  href: nullableString,

  isVisible: z.boolean(),
  isHidden: z.boolean(),
  isDropdown: z.boolean().default(false),
  isJsGenerated: z.boolean().default(false),
  hasOnclickHandler: z.boolean().default(false),
});

/**
 * Validate raw snapshot descriptors into `CtaElement`s.
 *
 * Fails fast: every schema problem and every duplicate id is collected and
 * thrown together as a `SnapshotInvariantError`. Any `link` field on the input
 * is dropped, link state is only ever produced by the validator.
 */
export function parseSnapshot(raw: readonly unknown[]): CtaElement[] {
  const problems: string[] = [];
  const elements: CtaElement[] = [];
  const seen = new Map<string, number>();

  raw.forEach((item, index) => {
    const parsed = CtaElementSchema.safeParse(item);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        problems.push(`element[${index}].${field}: ${issue.message}`);
      }
      return;
    }

    const element: CtaElement = parsed.data;
    const firstIndex = seen.get(element.elementId);
    if (firstIndex !== undefined) {
      problems.push(
        `element[${index}].elementId: duplicate id "${element.elementId}" (first seen at element[${firstIndex}])`,
      );
      return;
    }

    seen.set(element.elementId, index);
    elements.push(element);
  });

  if (problems.length > 0) throw new SnapshotInvariantError(problems);
  return elements;
}
