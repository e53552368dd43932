import type { FetchLike } from '../types/config.js';
import type { LinkCheck } from '../types/element.js';

import { classifyFetchError, classifyStatus } from './classify.js';

export const DEFAULT_LINK_TIMEOUT_MS = 10_000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface CheckLinkOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
  now?: () => number;
}

/**
 * Request one URL and classify the outcome.
 *
 * Never throws: network and protocol failures come back as an `invalid`
 * `LinkCheck`. Only the status line is awaited; the body is cancelled.
 */
export async function checkLink(url: string, options: CheckLinkOptions = {}): Promise<LinkCheck> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LINK_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;
  const now = options.now ?? Date.now;

  const startedAt = now();
  const checkedAt = new Date(startedAt).toISOString();

  try {
    new URL(url);
  } catch {
    return invalid(checkedAt, null, 'invalid-url', 'Invalid URL format');
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await doFetch(url, {
      method: 'GET',
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
      },
    });
    const responseTimeMs = Math.max(0, now() - startedAt);
    await res.body?.cancel();

    const failure = classifyStatus(res.status);
    if (failure) {
      return {
        ...invalid(checkedAt, res.status, failure.category, failure.message),
        responseTimeMs,
      };
    }

    return {
      status: res.status,
      validity: 'valid',
      errorCategory: null,
      errorMessage: null,
      redirectUrl: res.redirected && res.url && res.url !== url ? res.url : null,
      responseTimeMs,
      checkedAt,
    };
  } catch (error) {
    const failure = classifyFetchError(error, timeoutMs);
    return invalid(checkedAt, null, failure.category, failure.message);
  } finally {
    clearTimeout(timeout);
  }
}

function invalid(
  checkedAt: string,
  status: number | null,
  errorCategory: LinkCheck['errorCategory'],
  errorMessage: string,
): LinkCheck {
  return {
    status,
    validity: 'invalid',
    errorCategory,
    errorMessage,
    redirectUrl: null,
    responseTimeMs: null,
    checkedAt,
  };
}
