/**
 * Public type exports for the `cta-audit` package.
 *
 * Keep this file as the single place to export types so consumers can import
 * from `cta-audit` without reaching into internal paths.
 */
export * from './ai.js';
export * from './audit.js';
export * from './config.js';
export * from './element.js';
export * from './issue.js';
export * from './metrics.js';
export * from './provider.js';
export * from './snapshot.js';
