import { CrawlPhase, CrawlSummary, LongestPath } from '../../types.js';
import { FailureTracker } from '../state/failures.js';
import { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  phase: CrawlPhase;
  seeds: string[];
  resumed: boolean;
  stats: CrawlStats;
  uniqueUrls: number;
  pendingAtExit: number;
  failures: FailureTracker;
  longestPath?: LongestPath;
  startTime: number;
  cancelled: boolean;
  now?: number;
}): CrawlSummary {
  const { phase, seeds, resumed, stats, uniqueUrls, pendingAtExit, failures, longestPath, startTime, cancelled } =
    options;
  const now = options.now ?? Date.now();

  return {
    phase,
    seeds: [...seeds],
    resumed,
    pagesVisited: stats.pagesVisited,
    pagesSucceeded: stats.pagesSucceeded,
    pagesFailed: stats.pagesFailed,
    uniqueUrlsDiscovered: uniqueUrls,
    maxDepth: stats.maxDepth,
    totalLinksExtracted: stats.totalLinksExtracted,
    linksSampledOut: stats.linksSampledOut,
    invalidLinks: stats.invalidLinks,
    offHostFiltered: stats.offHostFiltered,
    duplicatesFiltered: stats.duplicatesFiltered,
    depthRejected: stats.depthRejected,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([status, count]) => [String(status), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    durationMs: now - startTime,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    peakQueueSize: stats.peakQueueSize,
    meanLinksPerPage:
      stats.pagesVisited === 0
        ? 0
        : Number((stats.totalLinksExtracted / stats.pagesVisited).toFixed(2)),
    cancelled,
    pendingAtExit,
    retryAttempts: stats.retryAttempts,
    keywordMatches: [...stats.keywordMatches],
    ...(longestPath ? { longestPath } : {}),
    checkpointsWritten: stats.checkpointsWritten,
    checkpointFailures: stats.checkpointFailures,
    failureLog: failures.list(),
  };
}
