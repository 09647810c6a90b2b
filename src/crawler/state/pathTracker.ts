import { createInternalError } from '../../errors.js';
import { LongestPath, PathRecord } from '../../types.js';

/**
 * Chain lengths for exfiltration mode. Each node keeps the predecessor that
 * claimed it first ("first-discovery-wins"), which is not necessarily the
 * shortest route to it. The longest chain only moves on a strictly longer one.
 */
export class PathTracker {
  private readonly nodes = new Map<string, PathRecord>();
  private tip: PathRecord | undefined;

  static restore(records: Iterable<PathRecord>): PathTracker {
    const tracker = new PathTracker();
    for (const record of records) {
      tracker.insert({ ...record });
    }
    return tracker;
  }

  recordSeed(key: string): void {
    if (this.nodes.has(key)) {
      return;
    }
    this.insert({ key, chainLength: 0, predecessor: null });
  }

  /**
   * Returns the chain length assigned to `key`.
   *
   * @throws InternalError when `parentKey` was never recorded.
   */
  recordDiscovery(key: string, parentKey: string): number {
    const existing = this.nodes.get(key);
    if (existing) {
      return existing.chainLength;
    }

    const parent = this.nodes.get(parentKey);
    if (!parent) {
      throw createInternalError(`No chain recorded for parent ${parentKey}`, { url: key, parent: parentKey });
    }

    const record: PathRecord = { key, chainLength: parent.chainLength + 1, predecessor: parentKey };
    this.insert(record);
    return record.chainLength;
  }

  chainLength(key: string): number | undefined {
    return this.nodes.get(key)?.chainLength;
  }

  get longestLength(): number {
    return this.tip?.chainLength ?? 0;
  }

  longestPath(): LongestPath {
    const urls: string[] = [];
    let cursor = this.tip;
    const guard = new Set<string>();

    while (cursor && !guard.has(cursor.key)) {
      guard.add(cursor.key);
      urls.push(cursor.key);
      cursor = cursor.predecessor === null ? undefined : this.nodes.get(cursor.predecessor);
    }

    return { length: this.longestLength, urls: urls.reverse() };
  }

  list(): PathRecord[] {
    return [...this.nodes.values()].map((record) => ({ ...record }));
  }

  private insert(record: PathRecord): void {
    this.nodes.set(record.key, record);
    if (!this.tip || record.chainLength > this.tip.chainLength) {
      this.tip = record;
    }
  }
}
