import { md5 } from '../shared/utils.js';

const FINGERPRINT_LENGTH = 16;

/**
 * Dedup key for a source item: first 16 hex chars of md5(sourceItemId).
 */
export function fingerprint(sourceItemId: string): string {
  return md5(sourceItemId).slice(0, FINGERPRINT_LENGTH);
}

/**
 * Run-wide set of accepted fingerprints, shared by every topic harvester.
 *
 * tryAccept is synchronous, so a test-and-insert can never interleave with
 * another harvester's call. The set only grows.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();

  tryAccept(fp: string): boolean {
    if (this.seen.has(fp)) return false;
    this.seen.add(fp);
    return true;
  }

  has(fp: string): boolean {
    return this.seen.has(fp);
  }

  get size(): number {
    return this.seen.size;
  }
}
