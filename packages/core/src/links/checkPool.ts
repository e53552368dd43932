import type { LinkCheck } from '../types/element.js';

export interface PendingCheck {
  elementId: string;
  url: string;
}

export interface CheckPoolOptions {
  checks: readonly PendingCheck[];
  concurrency: number;
  check: (url: string) => Promise<LinkCheck>;
  now: () => number;
  onProgress?: (progress: { completed: number; total: number }) => void;
}

/**
 * Run link checks on a fixed number of workers and return one `LinkCheck`
 * per element id.
 *
 * Workers share a single iterator over `checks`, so whichever worker is free
 * takes the next URL. A check that throws is recorded as an invalid link with
 * category `validation-failed`; it never stops the other workers.
 */
export async function runLinkChecks(options: CheckPoolOptions): Promise<Map<string, LinkCheck>> {
  const total = options.checks.length;
  const results = new Map<string, LinkCheck>();
  const queue = options.checks.values();
  let completed = 0;

  const worker = async (): Promise<void> => {
    for (const pending of queue) {
      results.set(pending.elementId, await settleCheck(options, pending.url));
      completed += 1;
      options.onProgress?.({ completed, total });
    }
  };

  const size = Math.min(Math.max(1, Math.floor(options.concurrency)), total);
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}

async function settleCheck(options: CheckPoolOptions, url: string): Promise<LinkCheck> {
  try {
    return await options.check(url);
  } catch (error) {
    return failedCheck(error, options.now());
  }
}

export function failedCheck(error: unknown, at: number): LinkCheck {
  const cause = error instanceof Error ? error.message : String(error);
  return {
    status: null,
    validity: 'invalid',
    errorCategory: 'validation-failed',
    errorMessage: `validation failed: ${cause}`,
    redirectUrl: null,
    responseTimeMs: null,
    checkedAt: new Date(at).toISOString(),
  };
}
