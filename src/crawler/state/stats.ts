import { PageResult } from '../../types.js';

export interface CrawlStats {
  pagesVisited: number;
  pagesSucceeded: number;
  pagesFailed: number;
  maxDepth: number;
  totalLinksExtracted: number;
  linksSampledOut: number;
  invalidLinks: number;
  offHostFiltered: number;
  duplicatesFiltered: number;
  depthRejected: number;
  statusCounts: Map<number, number>;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  failureReasons: Map<string, number>;
  retryAttempts: number;
  keywordMatches: string[];
  checkpointsWritten: number;
  checkpointFailures: number;
}

export function initializeStats(initialQueueSize: number): CrawlStats {
  return {
    pagesVisited: 0,
    pagesSucceeded: 0,
    pagesFailed: 0,
    maxDepth: 0,
    totalLinksExtracted: 0,
    linksSampledOut: 0,
    invalidLinks: 0,
    offHostFiltered: 0,
    duplicatesFiltered: 0,
    depthRejected: 0,
    statusCounts: new Map<number, number>(),
    actualMaxConcurrency: 0,
    peakQueueSize: initialQueueSize,
    failureReasons: new Map<string, number>(),
    retryAttempts: 0,
    keywordMatches: [],
    checkpointsWritten: 0,
    checkpointFailures: 0,
  };
}

export function recordPageMetrics(
  stats: CrawlStats,
  page: PageResult,
  ok: boolean,
  failureReason: string | undefined,
): void {
  stats.pagesVisited += 1;
  stats.maxDepth = Math.max(stats.maxDepth, page.depth);
  stats.totalLinksExtracted += page.links.length;

  if (ok) {
    stats.pagesSucceeded += 1;
  } else {
    stats.pagesFailed += 1;
    if (failureReason) {
      const current = stats.failureReasons.get(failureReason) ?? 0;
      stats.failureReasons.set(failureReason, current + 1);
    }
  }

  if (typeof page.status === 'number') {
    const current = stats.statusCounts.get(page.status) ?? 0;
    stats.statusCounts.set(page.status, current + 1);
  }

  if (page.keywordMatch) {
    stats.keywordMatches.push(page.url);
  }
}
