import { describe, expect, it } from 'vitest';

import { auditSnapshot } from '../api.js';
import { isAuditFailure } from '../types/audit.js';

import { expectAudit } from './expect.js';
import { makeElement } from './fixtures.js';

describe('expectAudit', () => {
  it('provides assertion helpers', async () => {
    const outcome = await auditSnapshot('https://example.com/', [
      makeElement({ elementType: 'link', text: '', htmlId: null }),
    ]);
    if (isAuditFailure(outcome)) throw new Error(outcome.error);

    expect(() => expectAudit(outcome).toReachScore(0)).not.toThrow();
    expect(() => expectAudit(outcome).toReachScore(100)).toThrow(/below threshold 100/);
    expect(() => expectAudit(outcome).toHaveNoIssues('High')).toThrow(/of severity High/);
    expect(() => expectAudit(outcome).toHaveNoCategoryIssues('tracking')).toThrow(
      'Expected no issues in category "tracking", but found 1.',
    );
    expect(() => expectAudit(outcome).toHaveNoCategoryIssues('visibility')).not.toThrow();
  });
});
