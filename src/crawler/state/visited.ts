import { VisitedRecord } from '../../types.js';

/**
 * Deduplication ledger. A key is claimed once for the lifetime of the crawl,
 * including across resumes; there is no eviction.
 */
export class VisitedSet {
  private readonly records = new Map<string, VisitedRecord>();

  static from(records: Iterable<VisitedRecord>): VisitedSet {
    const set = new VisitedSet();
    for (const record of records) {
      set.records.set(record.key, { ...record });
    }
    return set;
  }

  tryClaim(key: string, depth: number, now: number = Date.now()): boolean {
    if (this.records.has(key)) {
      return false;
    }

    this.records.set(key, { key, depth, firstSeenAt: now });
    return true;
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  get(key: string): VisitedRecord | undefined {
    return this.records.get(key);
  }

  list(): VisitedRecord[] {
    return [...this.records.values()].map((record) => ({ ...record }));
  }

  get size(): number {
    return this.records.size;
  }
}
