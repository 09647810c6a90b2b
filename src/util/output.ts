import { CrawlSummary, OutputFormat, PageResult } from '../types.js';

const QUIET_PROGRESS_INTERVAL_MS = 250;

export type QuietProgressSnapshot = {
  pagesVisited: number;
  pagesFailed: number;
  uniqueUrlsDiscovered: number;
  pending: number;
  inFlight: number;
  longestChain?: number;
};

let quietMode = false;
let outputFormat: OutputFormat = 'text';
let quietProgressTimer: ReturnType<typeof setTimeout> | undefined;
let quietProgressPending: QuietProgressSnapshot | undefined;
let quietProgressLastTimestamp = -Infinity;
let quietProgressLastLength = 0;

export function setOutputConfig(config: { quiet: boolean; format: OutputFormat }): void {
  flushQuietProgress();
  quietMode = config.quiet;
  outputFormat = config.format;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false, format: 'text' });
}

export function writePage(page: PageResult): void {
  if (quietMode) {
    return;
  }

  if (outputFormat === 'json') {
    process.stdout.write(`${JSON.stringify({ type: 'page', ...page })}\n`);
    return;
  }

  process.stdout.write(renderText(page));
}

export function writeSummary(summary: CrawlSummary): void {
  flushQuietProgress({ persist: true });

  if (outputFormat === 'json') {
    process.stdout.write(`${JSON.stringify({ type: 'summary', ...summary })}\n`);
    return;
  }

  process.stdout.write(renderTextSummary(summary));
}

export function updateQuietProgress(snapshot: QuietProgressSnapshot): void {
  if (!quietMode || outputFormat !== 'text') {
    return;
  }

  quietProgressPending = snapshot;
  if (quietProgressTimer) {
    return;
  }

  const elapsed = Date.now() - quietProgressLastTimestamp;
  const delay = Math.max(0, QUIET_PROGRESS_INTERVAL_MS - elapsed);
  quietProgressTimer = setTimeout(() => {
    quietProgressTimer = undefined;
    renderPendingProgress();
  }, delay);
}

export function flushQuietProgress(options: { persist?: boolean } = {}): void {
  if (quietProgressTimer) {
    clearTimeout(quietProgressTimer);
    quietProgressTimer = undefined;
  }

  renderPendingProgress();

  if (quietProgressLastLength === 0) {
    return;
  }

  process.stdout.write(options.persist ? '\n' : `\r${' '.repeat(quietProgressLastLength)}\r`);
  quietProgressLastLength = 0;
  quietProgressLastTimestamp = -Infinity;
}

export function renderText(page: PageResult): string {
  const lines: string[] = [`VISITED [${page.depth}]: ${page.url}`];

  if (page.error) {
    lines.push(`  ! ERROR: ${page.error}`);
  }

  if (page.keywordMatch) {
    lines.push('  * keyword match');
  }

  for (const link of page.links) {
    lines.push(`  - ${link}`);
  }

  return `${lines.join('\n')}\n`;
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Outcome: ${summary.phase}${summary.resumed ? ' (resumed)' : ''}`,
    `Seeds: ${summary.seeds.length}`,
    `Pages visited: ${summary.pagesVisited}`,
    `Successful pages: ${summary.pagesSucceeded}`,
    `Failed pages: ${summary.pagesFailed}`,
    `Unique URLs discovered: ${summary.uniqueUrlsDiscovered}`,
    `Total links extracted: ${summary.totalLinksExtracted}`,
    `Mean links per page: ${summary.meanLinksPerPage.toFixed(2)}`,
    `Links sampled out: ${summary.linksSampledOut}`,
    `Invalid links dropped: ${summary.invalidLinks}`,
    `Off-host links dropped: ${summary.offHostFiltered}`,
    `Duplicates filtered: ${summary.duplicatesFiltered}`,
    `Beyond depth limit: ${summary.depthRejected}`,
    `Max depth reached: ${summary.maxDepth}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Peak queue size: ${summary.peakQueueSize}`,
    `Checkpoints written: ${summary.checkpointsWritten}`,
  ];

  if (summary.checkpointFailures > 0) {
    lines.push(`Checkpoint failures: ${summary.checkpointFailures}`);
  }

  if (summary.retryAttempts > 0) {
    lines.push(`Retry attempts: ${summary.retryAttempts}`);
  }

  if (summary.cancelled) {
    lines.push(`Cancelled with ${summary.pendingAtExit} URLs left; rerun with --resume to continue.`);
  }

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  if (summary.longestPath) {
    lines.push(`Longest unique path: ${summary.longestPath.length}`);
    for (const url of summary.longestPath.urls) {
      lines.push(`  > ${url}`);
    }
  }

  if (summary.keywordMatches.length > 0) {
    lines.push('Keyword matches:');
    for (const url of summary.keywordMatches) {
      lines.push(`  ${url}`);
    }
  }

  if (summary.failureLog.length > 0) {
    lines.push('Failed URLs:');
    for (const event of summary.failureLog) {
      lines.push(`  [depth ${event.depth}] ${event.url} - ${event.reason}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

function renderPendingProgress(): void {
  const snapshot = quietProgressPending;
  quietProgressPending = undefined;

  if (!snapshot) {
    return;
  }

  const parts = [
    `visited:${snapshot.pagesVisited}`,
    `fail:${snapshot.pagesFailed}`,
    `unique:${snapshot.uniqueUrlsDiscovered}`,
    `queued:${snapshot.pending}`,
    `active:${snapshot.inFlight}`,
  ];
  if (snapshot.longestChain !== undefined) {
    parts.push(`chain:${snapshot.longestChain}`);
  }

  const line = `[quiet] ${parts.join(' ')}`;
  const padded = line.padEnd(quietProgressLastLength, ' ');
  process.stdout.write(`\r${padded}`);
  quietProgressLastLength = padded.length;
  quietProgressLastTimestamp = Date.now();
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
