import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { FileSnapshotProvider, parseSnapshotFile, readSnapshotFile } from './snapshotFile.js';

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

function writeSnapshot(content: string): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'cta-audit-snapshot-'));
  dirs.push(dir);
  const file = path.join(dir, 'snapshot.json');
  writeFileSync(file, content, 'utf8');
  return file;
}

describe('parseSnapshotFile', () => {
  it('accepts a bare element array', () => {
    expect(parseSnapshotFile([{ elementId: 'a' }], 'x.json')).toEqual({
      elements: [{ elementId: 'a' }],
    });
  });

  it('accepts an object with url and elements', () => {
    expect(parseSnapshotFile({ url: 'https://example.com', elements: [] }, 'x.json')).toEqual({
      url: 'https://example.com',
      elements: [],
    });
  });

  it('rejects anything else', () => {
    expect(() => parseSnapshotFile({ ctas: [] }, 'x.json')).toThrow(
      'x.json must contain an element array or { "url", "elements" }',
    );
  });
});

describe('FileSnapshotProvider', () => {
  it('returns the elements stored in the file', async () => {
    const file = writeSnapshot(
      JSON.stringify({ url: 'https://example.com', elements: [{ elementId: 'hero' }] }),
    );

    await expect(new FileSnapshotProvider(file).capture()).resolves.toEqual([{ elementId: 'hero' }]);
    await expect(readSnapshotFile(file)).resolves.toMatchObject({ url: 'https://example.com' });
  });

  it('propagates unreadable files as errors', async () => {
    const file = writeSnapshot('{ not json');

    await expect(new FileSnapshotProvider(file).capture()).rejects.toThrow(SyntaxError);
  });
});
