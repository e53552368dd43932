import { describe, expect, it } from 'vitest';

import { classifyFetchError, classifyHref, classifyStatus } from './classify.js';

describe('classifyHref', () => {
  it('skips non-http schemes by name', () => {
    expect(classifyHref('javascript:void(0)')).toEqual({
      kind: 'skip',
      category: 'skipped-scheme',
      message: 'skipped: javascript',
    });
    expect(classifyHref('mailto:sales@example.com')).toMatchObject({ message: 'skipped: mailto' });
    expect(classifyHref('tel:+15550100')).toMatchObject({ message: 'skipped: tel' });
    expect(classifyHref('ftp://files.example.com')).toMatchObject({ message: 'skipped: ftp' });
    expect(classifyHref('#pricing')).toMatchObject({ message: 'skipped: fragment' });
  });

  it('is idempotent for javascript: hrefs', () => {
    const first = classifyHref('JavaScript:void(0)');
    expect(classifyHref('JavaScript:void(0)')).toEqual(first);
    expect(first.kind).toBe('skip');
  });

  it('skips script-like values that are not URLs', () => {
    for (const href of ['void(0)', '() => openModal()', 'return false', 'function go() {}']) {
      expect(classifyHref(href)).toEqual({
        kind: 'skip',
        category: 'skipped-pattern',
        message: 'skipped: invalid pattern',
      });
    }
  });

  it('skips bare script keywords even when a base URL is known', () => {
    const base = 'https://example.com/';
    for (const href of ['x => go()', 'open=>tab', 'function', 'returnHome', 'undefined', 'null']) {
      expect(classifyHref(href, base)).toEqual({
        kind: 'skip',
        category: 'skipped-pattern',
        message: 'skipped: invalid pattern',
      });
    }
  });

  it('does not treat script keywords inside URL paths as code', () => {
    expect(classifyHref('https://example.com/return-policy')).toEqual({
      kind: 'check',
      url: 'https://example.com/return-policy',
    });
    expect(classifyHref('/functions/overview', 'https://example.com/')).toEqual({
      kind: 'check',
      url: 'https://example.com/functions/overview',
    });
    expect(classifyHref('./null-results')).toEqual({
      kind: 'skip',
      category: 'skipped-relative',
      message: 'skipped: relative URL',
    });
  });

  it('resolves relative paths only when a base URL is known', () => {
    expect(classifyHref('/pricing')).toEqual({
      kind: 'skip',
      category: 'skipped-relative',
      message: 'skipped: relative URL',
    });
    expect(classifyHref('/pricing', 'https://example.com/home')).toEqual({
      kind: 'check',
      url: 'https://example.com/pricing',
    });
  });
});

describe('classifyStatus', () => {
  it('accepts 2xx and 3xx', () => {
    expect(classifyStatus(200)).toBeNull();
    expect(classifyStatus(301)).toBeNull();
  });

  it('names common failures', () => {
    expect(classifyStatus(404)).toEqual({ category: 'not-found', message: 'Page not found (404)' });
    expect(classifyStatus(403)).toEqual({ category: 'forbidden', message: 'Access forbidden (403)' });
    expect(classifyStatus(500)).toEqual({ category: 'server-error', message: 'Server error (500)' });
    expect(classifyStatus(503)).toEqual({ category: 'client-error', message: 'Client error (503)' });
    expect(classifyStatus(101)).toEqual({
      category: 'unexpected-status',
      message: 'Unexpected status code (101)',
    });
  });
});

describe('classifyFetchError', () => {
  const withCause = (cause: Error) => new TypeError('fetch failed', { cause });
  const coded = (message: string, code: string) => Object.assign(new Error(message), { code });

  it('recognises aborts as timeouts', () => {
    const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    expect(classifyFetchError(abort)).toEqual({
      category: 'timeout',
      message: 'Request timeout (>10s)',
    });
  });

  it('reads socket codes from the cause chain', () => {
    expect(classifyFetchError(withCause(coded('getaddrinfo ENOTFOUND', 'ENOTFOUND')))).toEqual({
      category: 'connection',
      message: 'Connection error - unable to reach server',
    });
    expect(
      classifyFetchError(withCause(coded('certificate has expired', 'CERT_HAS_EXPIRED'))),
    ).toEqual({ category: 'ssl', message: 'SSL certificate error' });
    expect(classifyFetchError(withCause(new Error('redirect count exceeded')))).toEqual({
      category: 'too-many-redirects',
      message: 'Too many redirects',
    });
  });

  it('falls back to the innermost message', () => {
    expect(classifyFetchError(withCause(new Error('socket hang up')))).toEqual({
      category: 'validation-failed',
      message: 'validation failed: socket hang up',
    });
    expect(classifyFetchError('boom')).toEqual({
      category: 'validation-failed',
      message: 'validation failed: boom',
    });
  });
});
