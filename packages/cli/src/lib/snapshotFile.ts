import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { SnapshotProvider } from 'cta-audit';

const SnapshotFileSchema = z.union([
  z.array(z.unknown()),
  z.object({
    url: z.string().optional(),
    elements: z.array(z.unknown()),
  }),
]);

export interface SnapshotFile {
  /** Page URL recorded by the capture tool, when present. */
  url?: string;
  elements: unknown[];
}

/**
 * Parse a snapshot file: either `{ url, elements }` or a bare element array.
 *
 * Elements stay `unknown`; the auditor validates them.
 */
export function parseSnapshotFile(raw: unknown, source: string): SnapshotFile {
  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${source} must contain an element array or { "url", "elements" }`);
  }
  return Array.isArray(parsed.data) ? { elements: parsed.data } : parsed.data;
}

export async function readSnapshotFile(filePath: string): Promise<SnapshotFile> {
  const text = await readFile(filePath, 'utf8');
  return parseSnapshotFile(JSON.parse(text), filePath);
}

/**
 * `SnapshotProvider` backed by a snapshot captured earlier and saved as JSON.
 */
export class FileSnapshotProvider implements SnapshotProvider {
  constructor(private readonly filePath: string) {}

  async capture(): Promise<unknown[]> {
    const { elements } = await readSnapshotFile(this.filePath);
    return elements;
  }
}
