import pLimit from 'p-limit';

import {
  CrawlerError,
  createIncompatibleSnapshotError,
  createTransportError,
  ensureCrawlerError,
} from '../errors.js';
import { getLogger } from '../logger.js';
import {
  CrawlHandlers,
  CrawlOptions,
  CrawlPhase,
  CrawlSummary,
  FailureKind,
  FetchResult,
  FrontierEntry,
  LinkExtractor,
  PageFetcher,
  PageResult,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { flushQuietProgress, resetOutputConfig, setOutputConfig } from '../util/output.js';
import { createDefaultHandlers } from './handlers/defaultHandlers.js';
import { fetchPage } from './network/fetchPage.js';
import { withRetries } from './network/fetchPageWithRetry.js';
import { UserAgentRotation } from './network/userAgents.js';
import { collectLinks } from './parsing/collectLinks.js';
import { containsKeyword, extractLinks } from './parsing/extractLinks.js';
import {
  computeFingerprint,
  CrawlSnapshot,
  CrawlStateStore,
  FingerprintSource,
  SNAPSHOT_VERSION,
} from './persistence/stateStore.js';
import { ProgressReporter } from './reporting/progress.js';
import { classifyPageType, CrawlReport, domainOf, ReportPage, writeCrawlReport } from './reporting/report.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { describeFailure, FailureTracker } from './state/failures.js';
import { Frontier } from './state/frontier.js';
import { PathTracker } from './state/pathTracker.js';
import { CrawlStats, initializeStats, recordPageMetrics } from './state/stats.js';
import { VisitedSet } from './state/visited.js';

export interface CrawlRuntimeOptions {
  seeds: string[];
  options: CrawlOptions;
  handlers?: Partial<CrawlHandlers>;
  fetcher?: PageFetcher;
  extractLinks?: LinkExtractor;
  random?: () => number;
  store?: CrawlStateStore;
  snapshot?: CrawlSnapshot;
  signal?: AbortSignal;
  /** Stop on SIGINT/SIGTERM. Defaults to true. */
  handleSignals?: boolean;
}

export type AdmitStatus = 'queued' | 'duplicate' | 'too-deep';

interface WorkOutcome {
  result: FetchResult;
  rawLinks: string[];
  parseError?: CrawlerError;
  keywordMatch: boolean;
  durationMs: number;
}

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Owns the frontier, visited set and path tracker. Workers only fetch and
 * extract; every mutation of crawl state happens in `admit` and `intake`, which
 * run on the coordinator's side of the pool.
 */
export class CrawlCoordinator {
  private readonly frontier: Frontier;
  private readonly visited: VisitedSet;
  private readonly paths?: PathTracker;
  private readonly failures: FailureTracker;
  private readonly stats: CrawlStats = initializeStats(0);
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly inFlight = new Map<string, FrontierEntry>();
  private readonly unfinished: FrontierEntry[] = [];
  private readonly activePromises = new Set<Promise<void>>();
  private readonly abortController = new AbortController();
  private readonly userAgents: UserAgentRotation;
  private readonly fetcher: PageFetcher;
  private readonly extract: LinkExtractor;
  private readonly progress: ProgressReporter;
  private readonly logger = getLogger().child({ component: 'coordinator' });
  private readonly fingerprintSource: FingerprintSource;
  private readonly reportPages: ReportPage[] = [];
  private readonly edges: Array<[string, string]> = [];
  private readonly resumed: boolean;
  private readonly startTime = Date.now();
  private readonly stopHandler = (): void => {
    this.stop('stop signal received');
  };
  private signalsAttached = false;
  private checkpointTimer: ReturnType<typeof setInterval> | undefined;
  private checkpointChain: Promise<void> = Promise.resolve();
  private phase: CrawlPhase = 'seeding';
  private runningCount = 0;
  private cancelled = false;
  private fatalError: CrawlerError | undefined;

  constructor(
    private readonly seeds: string[],
    private readonly options: CrawlOptions,
    private readonly handlers: CrawlHandlers,
    private readonly runtime: Omit<CrawlRuntimeOptions, 'seeds' | 'options' | 'handlers'> = {},
  ) {
    this.frontier = new Frontier(options.maxDepth);
    this.limiter = pLimit(options.concurrency);
    this.userAgents = new UserAgentRotation(options.userAgents);
    this.extract = runtime.extractLinks ?? extractLinks;
    this.fetcher = withRetries(runtime.fetcher ?? fetchPage, {
      retries: options.retries,
      onRetry: (url, attempt) => {
        this.stats.retryAttempts += 1;
        this.logger.debug({ url, attempt }, 'retrying fetch');
      },
    });
    this.fingerprintSource = {
      seeds: [...seeds],
      maxDepth: options.maxDepth,
      percentage: options.percentage,
    };

    const snapshot = runtime.snapshot;
    this.resumed = snapshot !== undefined;
    this.visited = snapshot ? VisitedSet.from(snapshot.visited) : new VisitedSet();

    // Chains are tracked in every crawl so any snapshot can later be resumed in exfiltration mode.
    if (snapshot && !snapshot.paths) {
      if (options.exfiltrate) {
        throw createIncompatibleSnapshotError(
          'Stored crawl snapshot has no chain records; exfiltration mode cannot resume from it.',
          { savedAt: snapshot.savedAt },
        );
      }
    } else {
      this.paths = PathTracker.restore(snapshot?.paths ?? []);
    }

    this.failures = FailureTracker.restore(snapshot?.failures ?? []);

    if (snapshot) {
      for (const entry of snapshot.frontier) {
        this.frontier.push(entry);
      }
    }

    this.progress = new ProgressReporter(() => ({
      pagesVisited: this.stats.pagesVisited,
      pagesFailed: this.stats.pagesFailed,
      uniqueUrls: this.visited.size,
      pending: this.frontier.pending,
      inFlight: this.inFlight.size,
      longestChain: options.exfiltrate ? this.paths?.longestLength : undefined,
    }));
  }

  get currentPhase(): CrawlPhase {
    return this.phase;
  }

  async run(): Promise<CrawlSummary> {
    this.attachStopHandlers();

    try {
      this.seed();
      this.transition('running');
      this.startCheckpointTimer();
      this.pump();

      while (this.activePromises.size > 0) {
        await Promise.allSettled([...this.activePromises]);
      }

      this.stopCheckpointTimer();
      await this.checkpointChain;

      if (this.fatalError) {
        this.transition('aborted');
        await this.checkpointNow();
        throw this.fatalError;
      }

      if (this.cancelled) {
        this.transition('paused');
        await this.checkpointNow();
      } else {
        this.transition('completed');
        await this.discardSnapshot();
      }

      return this.summarize();
    } finally {
      this.stopCheckpointTimer();
      this.detachStopHandlers();
    }
  }

  /** Stops dispatch, abandons in-flight fetches and ignores their results. */
  stop(reason: string): void {
    if (this.cancelled) {
      return;
    }

    this.cancelled = true;
    this.logger.warn({ reason, inFlight: this.inFlight.size }, 'stopping crawl');
    this.abortController.abort();

    if (this.phase === 'running') {
      this.transition('draining');
    }
  }

  /** Claims `url` and queues it, or reports why it was not queued. */
  admit(url: string, depth: number, parent: string | null): AdmitStatus {
    if (depth > this.frontier.maxDepth) {
      this.stats.depthRejected += 1;
      return 'too-deep';
    }

    if (!this.visited.tryClaim(url, depth)) {
      this.stats.duplicatesFiltered += 1;
      return 'duplicate';
    }

    this.frontier.push({ url, depth, parent });

    if (this.paths) {
      if (parent === null) {
        this.paths.recordSeed(url);
      } else {
        this.paths.recordDiscovery(url, parent);
      }
    }

    this.stats.peakQueueSize = Math.max(this.stats.peakQueueSize, this.frontier.pending);
    return 'queued';
  }

  report(summary: CrawlSummary): CrawlReport {
    return {
      summary,
      pages: this.reportPages.map((page) => ({ ...page })),
      edges: this.edges.map(([from, to]): [string, string] => [from, to]),
    };
  }

  private seed(): void {
    if (this.resumed) {
      this.logger.info(
        { visited: this.visited.size, pending: this.frontier.pending },
        'resuming crawl from snapshot',
      );
      return;
    }

    for (const seed of this.seeds) {
      this.admit(seed, 0, null);
    }

    this.logger.info({ seeds: this.frontier.pending, maxDepth: this.options.maxDepth }, 'seeded frontier');
  }

  private pump(): void {
    while (!this.cancelled && this.inFlight.size < this.options.concurrency) {
      const next = this.frontier.pop();
      if (!next) {
        break;
      }

      this.dispatch(next);
    }

    if (this.phase === 'running' || this.phase === 'draining') {
      const draining = this.cancelled || this.frontier.pending === 0;
      this.transition(draining ? 'draining' : 'running');
    }
  }

  private dispatch(entry: FrontierEntry): void {
    this.inFlight.set(entry.url, entry);

    const task = this.limiter(async () => {
      this.runningCount += 1;
      this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.runningCount);
      try {
        return await this.work(entry);
      } finally {
        this.runningCount -= 1;
      }
    })
      .then((outcome) => {
        this.intake(entry, outcome);
      })
      .catch((error: unknown) => {
        this.handleInternalFailure(entry, error);
      })
      .finally(() => {
        this.inFlight.delete(entry.url);
        this.activePromises.delete(task);
        this.progress.emit();
        this.pump();
      });

    this.activePromises.add(task);
  }

  private async work(entry: FrontierEntry): Promise<WorkOutcome> {
    const started = Date.now();
    const userAgent = this.userAgents.next();
    this.logger.debug({ url: entry.url, depth: entry.depth, userAgent }, 'fetching');

    const result = await this.fetcher({
      url: entry.url,
      timeoutMs: this.options.timeoutMs,
      userAgent,
      followRedirects: this.options.followRedirects,
      signal: this.abortController.signal,
    }).catch(
      (error: unknown): FetchResult => ({
        kind: 'transport-error',
        url: entry.url,
        error: ensureCrawlerError(error, { kind: 'transport', severity: 'recoverable' }),
      }),
    );

    const outcome: WorkOutcome = { result, rawLinks: [], keywordMatch: false, durationMs: 0 };
    const expand = this.options.searchLinks && entry.depth < this.options.maxDepth;

    if (result.kind === 'success') {
      if (isRedirect(result.status)) {
        if (expand && result.location) {
          outcome.rawLinks = [result.location];
        }
      } else if (result.status < 400) {
        outcome.keywordMatch = containsKeyword(result.body, this.options.keyword);
        if (expand) {
          try {
            outcome.rawLinks = this.extract(result.body);
          } catch (error) {
            outcome.parseError = ensureCrawlerError(error, { kind: 'parse', severity: 'recoverable' });
          }
        }
      }
    }

    outcome.durationMs = Date.now() - started;
    return outcome;
  }

  private intake(entry: FrontierEntry, outcome: WorkOutcome): void {
    if (this.cancelled) {
      this.inFlight.delete(entry.url);
      this.unfinished.push(entry);
      this.logger.debug({ url: entry.url }, 'discarding result that arrived after stop');
      return;
    }

    const { result } = outcome;
    const page: PageResult = {
      url: entry.url,
      depth: entry.depth,
      parent: entry.parent,
      links: [],
      durationMs: outcome.durationMs,
      ...(this.options.exfiltrate ? { chainLength: this.paths?.chainLength(entry.url) } : {}),
    };

    if (result.kind === 'timeout') {
      this.fail(entry, page, 'timeout', result.error);
      return;
    }

    if (result.kind === 'transport-error') {
      this.fail(entry, page, 'transport', result.error);
      return;
    }

    page.status = result.status;
    page.contentType = result.contentType;

    if (result.status >= 400) {
      const error = createTransportError(`HTTP ${result.status}`, { url: entry.url, status: result.status });
      this.fail(entry, page, 'http', error);
      return;
    }

    if (outcome.parseError) {
      this.fail(entry, page, 'parse', outcome.parseError);
      return;
    }

    page.keywordMatch = outcome.keywordMatch;

    const collected = collectLinks({
      rawLinks: outcome.rawLinks,
      baseUrl: result.url || entry.url,
      pageKey: entry.url,
      percentage: this.options.percentage,
      sampling: this.options.sampling,
      sameHostOnly: this.options.sameHost,
      random: this.runtime.random,
    });

    this.stats.linksSampledOut += collected.sampledOut;
    this.stats.invalidLinks += collected.invalid;
    this.stats.offHostFiltered += collected.offHost;

    for (const link of collected.links) {
      this.edges.push([entry.url, link]);
      this.admit(link, entry.depth + 1, entry.url);
    }

    page.links = collected.links;
    recordPageMetrics(this.stats, page, true, undefined);
    this.dispatchPage(page);
  }

  private fail(entry: FrontierEntry, page: PageResult, kind: FailureKind, error: CrawlerError): void {
    const reason = describeFailure(kind, error.message);
    page.error = reason;
    this.failures.record(entry, kind, reason);

    reportCrawlerError(error, { stage: 'fetch', url: entry.url, depth: entry.depth }, { throwOnFatal: false });
    this.handlers.onError?.(error, { url: entry.url, depth: entry.depth });

    recordPageMetrics(this.stats, page, false, reason);
    this.dispatchPage(page);
  }

  private handleInternalFailure(entry: FrontierEntry, error: unknown): void {
    const crawlerError = ensureCrawlerError(error, {
      kind: 'internal',
      severity: 'fatal',
      details: { url: entry.url, depth: entry.depth },
    });

    reportCrawlerError(crawlerError, { stage: 'crawl', url: entry.url, depth: entry.depth }, { throwOnFatal: false });
    this.handlers.onError?.(crawlerError, { url: entry.url, depth: entry.depth });
    this.inFlight.delete(entry.url);
    this.unfinished.push(entry);

    if (crawlerError.severity === 'fatal') {
      if (!this.fatalError) {
        this.fatalError = crawlerError;
      }
      this.stop(crawlerError.message);
    }
  }

  private dispatchPage(page: PageResult): void {
    this.reportPages.push({
      url: page.url,
      type: classifyPageType(page.url),
      domain: domainOf(page.url),
      depth: page.depth,
      parent: page.parent,
      status: page.status ?? null,
      durationMs: page.durationMs,
      keywordMatch: page.keywordMatch ?? false,
    });
    this.handlers.onPage(page);
  }

  private transition(next: CrawlPhase): void {
    if (this.phase === next) {
      return;
    }

    this.logger.info({ from: this.phase, to: next }, 'crawl phase changed');
    this.phase = next;
    this.handlers.onPhaseChange?.(next);
  }

  private startCheckpointTimer(): void {
    if (!this.runtime.store || this.options.checkpointIntervalMs <= 0) {
      return;
    }

    this.checkpointTimer = setInterval(() => {
      this.scheduleCheckpoint();
    }, this.options.checkpointIntervalMs);
    this.checkpointTimer.unref();
  }

  private stopCheckpointTimer(): void {
    if (this.checkpointTimer) {
      clearInterval(this.checkpointTimer);
      this.checkpointTimer = undefined;
    }
  }

  private scheduleCheckpoint(): void {
    // Serialized so two writes never race on the same temp/rename pair.
    this.checkpointChain = this.checkpointChain.then(() => this.writeCheckpoint());
  }

  private async checkpointNow(): Promise<void> {
    this.scheduleCheckpoint();
    await this.checkpointChain;
  }

  /** Resolves even when the write fails; a failed checkpoint never stops the crawl. */
  private async writeCheckpoint(): Promise<void> {
    const store = this.runtime.store;
    if (!store) {
      return;
    }

    const snapshot = this.captureSnapshot();
    try {
      await store.checkpoint(snapshot);
      this.stats.checkpointsWritten += 1;
    } catch (error) {
      this.stats.checkpointFailures += 1;
      reportCrawlerError(
        error,
        { stage: 'checkpoint' },
        { defaultKind: 'storage', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
    }
  }

  private async discardSnapshot(): Promise<void> {
    if (!this.runtime.store) {
      return;
    }

    try {
      await this.runtime.store.discard();
    } catch (error) {
      reportCrawlerError(
        error,
        { stage: 'checkpoint' },
        { defaultKind: 'storage', defaultSeverity: 'recoverable', throwOnFatal: false },
      );
    }
  }

  /** Copies live state synchronously; the write itself happens afterwards. */
  captureSnapshot(): CrawlSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      fingerprint: computeFingerprint(this.fingerprintSource),
      settings: { ...this.fingerprintSource, seeds: [...this.fingerprintSource.seeds] },
      savedAt: new Date().toISOString(),
      visited: this.visited.list(),
      frontier: [
        ...this.unfinished.map((entry) => ({ ...entry })),
        ...[...this.inFlight.values()].map((entry) => ({ ...entry })),
        ...this.frontier.entries(),
      ],
      ...(this.paths ? { paths: this.paths.list() } : {}),
      failures: this.failures.list(),
    };
  }

  private summarize(): CrawlSummary {
    return buildCrawlSummary({
      phase: this.phase,
      seeds: this.seeds,
      resumed: this.resumed,
      stats: this.stats,
      uniqueUrls: this.visited.size,
      pendingAtExit: this.unfinished.length + this.inFlight.size + this.frontier.pending,
      failures: this.failures,
      longestPath: this.options.exfiltrate ? this.paths?.longestPath() : undefined,
      startTime: this.startTime,
      cancelled: this.cancelled,
    });
  }

  private attachStopHandlers(): void {
    const signal = this.runtime.signal;
    if (signal) {
      if (signal.aborted) {
        this.stop('stop requested before start');
      } else {
        signal.addEventListener('abort', this.stopHandler, { once: true });
      }
    }

    if (this.runtime.handleSignals === false || typeof process.once !== 'function') {
      return;
    }

    for (const name of STOP_SIGNALS) {
      process.once(name, this.stopHandler);
    }
    this.signalsAttached = true;
  }

  private detachStopHandlers(): void {
    this.runtime.signal?.removeEventListener('abort', this.stopHandler);

    if (!this.signalsAttached) {
      return;
    }

    for (const name of STOP_SIGNALS) {
      process.removeListener(name, this.stopHandler);
    }
    this.signalsAttached = false;
  }
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

/**
 * Runs one crawl to completion (or until stopped), emitting pages and the
 * summary through the handlers and writing the JSON report when configured.
 */
export async function crawl(runtime: CrawlRuntimeOptions): Promise<CrawlSummary> {
  const { seeds, options, handlers, ...rest } = runtime;
  const effectiveHandlers: CrawlHandlers = {
    ...createDefaultHandlers(),
    ...(handlers ?? {}),
  };

  setOutputConfig({ quiet: options.quiet, format: options.format });
  const coordinator = new CrawlCoordinator(seeds, options, effectiveHandlers, rest);

  try {
    const summary = await coordinator.run();
    effectiveHandlers.onComplete?.(summary);

    if (options.outputFile) {
      try {
        await writeCrawlReport(options.outputFile, coordinator.report(summary));
      } catch (error) {
        reportCrawlerError(error, { stage: 'report' }, { defaultKind: 'output', throwOnFatal: false });
      }
    }

    return summary;
  } finally {
    flushQuietProgress();
    resetOutputConfig();
  }
}
