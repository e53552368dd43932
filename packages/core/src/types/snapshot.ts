/**
 * Contract with the browser-automation layer that loads a page and captures
 * its interactive elements.
 *
 * Implementations own `elementId` assignment: ids must be unique within one
 * capture. The returned descriptors are validated by `parseSnapshot` before
 * anything else touches them, hence `unknown[]`.
 */
export interface SnapshotProvider {
  capture(url: string): Promise<unknown[]>;
}
