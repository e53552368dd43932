/**
 * Types-only entrypoint.
 *
 * This avoids runtime circular dependencies between:
 * - `cta-audit` (core orchestrator)
 * - `@cta-audit/ai-providers` (recommendation service adapters)
 * - `@cta-audit/rules` (issue detection rules)
 *
 * Packages that only need shared types should import from `cta-audit/types`.
 */
export * from './types/index.js';
