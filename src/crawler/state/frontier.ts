import { FrontierEntry } from '../../types.js';

const COMPACT_THRESHOLD = 32;

/**
 * FIFO work queue bounded by the crawl's maximum depth. Children are always
 * pushed at parent depth + 1, so FIFO order yields breadth-first traversal.
 */
export class Frontier {
  private queue: FrontierEntry[] = [];
  private head = 0;

  constructor(readonly maxDepth: number) {}

  /** Returns false, leaving the queue untouched, for entries beyond `maxDepth`. */
  push(entry: FrontierEntry): boolean {
    if (!Number.isInteger(entry.depth) || entry.depth < 0 || entry.depth > this.maxDepth) {
      return false;
    }

    this.queue.push({ url: entry.url, depth: entry.depth, parent: entry.parent });
    return true;
  }

  pop(): FrontierEntry | undefined {
    const next = this.queue[this.head];
    if (!next) {
      return undefined;
    }

    this.head += 1;

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  /** Copies the pending entries in dequeue order. */
  entries(): FrontierEntry[] {
    return this.queue.slice(this.head).map((entry) => ({ ...entry }));
  }

  get pending(): number {
    return this.queue.length - this.head;
  }
}
