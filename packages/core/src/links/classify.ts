import type { ErrorCategory } from '../types/element.js';

/**
 * Result of classifying an href before any network I/O.
 */
export type HrefClassification =
  | { kind: 'check'; url: string }
  | { kind: 'skip'; category: ErrorCategory; message: string };

export interface LinkFailure {
  category: ErrorCategory;
  message: string;
}

const SKIPPED_SCHEMES = ['javascript', 'mailto', 'tel'] as const;

const SCRIPT_PATTERNS: RegExp[] = [
  /function\s+\w+\s*\(/i,
  /function\s*\(/i,
  /=>\s*\{/,
  /\(\)\s*=>/,
  /\w+\s*\(\)\s*\{\s*\}/,
  /void\s*\(/i,
  /return\s+/i,
  /\b(?:var|let|const)\s+\w+/,
];

// Substring checks for values that are neither absolute http(s) URLs nor paths.
const SCRIPT_KEYWORDS = [
  'function',
  'return',
  'var ',
  'let ',
  'const ',
  '=>',
  'void',
  'undefined',
  'null',
] as const;

const SCHEME = /^([a-z][a-z\d+.-]*):/i;

/**
 * Decide whether an href can be checked over HTTP.
 *
 * Pure and idempotent: the same href always yields the same classification.
 * Root-relative and bare relative paths are resolved against `baseUrl` when
 * one is given.
 */
export function classifyHref(href: string, baseUrl?: string): HrefClassification {
  const value = href.trim();
  const lower = value.toLowerCase();

  for (const scheme of SKIPPED_SCHEMES) {
    if (lower.startsWith(`${scheme}:`)) {
      return skip('skipped-scheme', `skipped: ${scheme}`);
    }
  }
  if (value.startsWith('#')) return skip('skipped-scheme', 'skipped: fragment');

  const scheme = SCHEME.exec(value)?.[1]?.toLowerCase();
  const looksLikeUrl = scheme === 'http' || scheme === 'https' || /^\.{0,2}\//.test(value);
  if (!looksLikeUrl && looksLikeScript(value, lower)) {
    return skip('skipped-pattern', 'skipped: invalid pattern');
  }

  if (scheme === 'http' || scheme === 'https') return { kind: 'check', url: value };
  if (scheme !== undefined) return skip('skipped-scheme', `skipped: ${scheme}`);

  if (!baseUrl) return skip('skipped-relative', 'skipped: relative URL');

  try {
    return { kind: 'check', url: new URL(value, baseUrl).toString() };
  } catch {
    return skip('skipped-relative', 'skipped: relative URL');
  }
}

function looksLikeScript(value: string, lower: string): boolean {
  return (
    SCRIPT_PATTERNS.some((pattern) => pattern.test(value)) ||
    SCRIPT_KEYWORDS.some((keyword) => lower.includes(keyword))
  );
}

function skip(category: ErrorCategory, message: string): HrefClassification {
  return { kind: 'skip', category, message };
}

/**
 * Map a final HTTP status to a failure, or `null` when the link is valid
 * (200–399).
 */
export function classifyStatus(status: number): LinkFailure | null {
  if (status >= 200 && status < 400) return null;
  if (status === 404) return { category: 'not-found', message: 'Page not found (404)' };
  if (status === 403) return { category: 'forbidden', message: 'Access forbidden (403)' };
  if (status === 500) return { category: 'server-error', message: 'Server error (500)' };
  if (status >= 400) return { category: 'client-error', message: `Client error (${status})` };
  return { category: 'unexpected-status', message: `Unexpected status code (${status})` };
}

const CONNECTION_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

/**
 * Classify an error thrown by `fetch`.
 *
 * Node's fetch wraps the underlying socket error in `cause`, so the whole
 * cause chain is inspected.
 */
export function classifyFetchError(error: unknown, timeoutMs = 10_000): LinkFailure {
  const chain = causeChain(error);

  for (const link of chain) {
    if (link.name === 'AbortError' || link.name === 'TimeoutError' || TIMEOUT_CODES.has(link.code)) {
      return { category: 'timeout', message: `Request timeout (>${formatSeconds(timeoutMs)}s)` };
    }
  }

  for (const link of chain) {
    if (CONNECTION_CODES.has(link.code)) {
      return { category: 'connection', message: 'Connection error - unable to reach server' };
    }
    if (
      link.code.startsWith('CERT_') ||
      link.code.startsWith('ERR_TLS_') ||
      link.code.includes('SELF_SIGNED') ||
      link.code.startsWith('UNABLE_TO_') ||
      /certificate/i.test(link.message)
    ) {
      return { category: 'ssl', message: 'SSL certificate error' };
    }
    if (/redirect count exceeded|too many redirects/i.test(link.message)) {
      return { category: 'too-many-redirects', message: 'Too many redirects' };
    }
    if (link.code === 'ERR_INVALID_URL' || /invalid url|failed to parse url/i.test(link.message)) {
      return { category: 'invalid-url', message: 'Invalid URL format' };
    }
  }

  const root = chain[chain.length - 1];
  const cause = root?.message || String(error);
  return { category: 'validation-failed', message: `validation failed: ${cause}` };
}

interface ErrorFacts {
  name: string;
  code: string;
  message: string;
}

function causeChain(error: unknown): ErrorFacts[] {
  const chain: ErrorFacts[] = [];
  let current: unknown = error;

  while (typeof current === 'object' && current !== null && chain.length < 5) {
    chain.push({
      name: readString(current, 'name'),
      code: readString(current, 'code'),
      message: readString(current, 'message'),
    });
    current = 'cause' in current ? current.cause : undefined;
  }
  return chain;
}

function readString(value: object, key: 'name' | 'code' | 'message'): string {
  if (!(key in value)) return '';
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : '';
}

function formatSeconds(ms: number): string {
  return Number.isInteger(ms / 1000) ? String(ms / 1000) : (ms / 1000).toFixed(1);
}
