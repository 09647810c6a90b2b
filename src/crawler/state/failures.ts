import { FailureEvent, FailureKind, FrontierEntry } from '../../types.js';

/** Per-URL failures surfaced in the final summary. URLs are never retried from here. */
export class FailureTracker {
  private readonly log: FailureEvent[] = [];
  private readonly byUrl = new Map<string, FailureEvent>();

  static restore(events: Iterable<FailureEvent>): FailureTracker {
    const tracker = new FailureTracker();
    for (const event of events) {
      const copy = { ...event };
      tracker.log.push(copy);
      tracker.byUrl.set(copy.url, copy);
    }
    return tracker;
  }

  record(entry: FrontierEntry, kind: FailureKind, reason: string): FailureEvent {
    const event: FailureEvent = { url: entry.url, depth: entry.depth, reason, kind };
    this.log.push(event);
    this.byUrl.set(entry.url, event);
    return event;
  }

  has(url: string): boolean {
    return this.byUrl.has(url);
  }

  get size(): number {
    return this.log.length;
  }

  list(): FailureEvent[] {
    return this.log.map((event) => ({ ...event }));
  }
}

export function describeFailure(kind: FailureKind, detail: string): string {
  switch (kind) {
    case 'timeout':
      return 'Timeout';
    case 'http':
      return detail;
    case 'parse':
      return `Parse error: ${detail}`;
    case 'transport':
      return `Transport error: ${detail}`;
  }
}
