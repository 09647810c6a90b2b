import type { CrawlerError } from './errors.js';

export type OutputFormat = 'text' | 'json';

export type SamplingMode = 'probabilistic' | 'truncate';

export type CrawlPhase = 'seeding' | 'running' | 'draining' | 'completed' | 'paused' | 'aborted';

export type FailureKind = 'timeout' | 'transport' | 'http' | 'parse';

export interface FailureEvent {
  url: string;
  depth: number;
  reason: string;
  kind: FailureKind;
}

export interface CrawlOptions {
  maxDepth: number;
  concurrency: number;
  timeoutMs: number;
  percentage: number;
  sampling: SamplingMode;
  exfiltrate: boolean;
  searchLinks: boolean;
  followRedirects: boolean;
  sameHost: boolean;
  userAgents: string[];
  retries: number;
  keyword?: string;
  resume: boolean;
  outputDir: string;
  outputFile?: string;
  checkpointIntervalMs: number;
  format: OutputFormat;
  quiet: boolean;
  logLevel: string;
  logFile?: string;
}

export interface FrontierEntry {
  url: string;
  depth: number;
  parent: string | null;
}

export interface VisitedRecord {
  key: string;
  firstSeenAt: number;
  depth: number;
}

export interface PathRecord {
  key: string;
  chainLength: number;
  predecessor: string | null;
}

export interface FetchRequest {
  url: string;
  timeoutMs: number;
  userAgent: string;
  followRedirects: boolean;
  signal?: AbortSignal;
}

export type FetchResult =
  | {
      kind: 'success';
      url: string;
      status: number;
      body: string;
      contentType?: string;
      location?: string;
    }
  | { kind: 'timeout'; url: string; error: CrawlerError }
  | { kind: 'transport-error'; url: string; error: CrawlerError };

/** Transport collaborator. Must resolve, never reject, for per-URL failures. */
export type PageFetcher = (request: FetchRequest) => Promise<FetchResult>;

export type LinkExtractor = (body: string) => string[];

export interface PageResult {
  url: string;
  depth: number;
  parent: string | null;
  links: string[];
  status?: number;
  contentType?: string;
  error?: string;
  keywordMatch?: boolean;
  chainLength?: number;
  durationMs: number;
}

export interface LongestPath {
  length: number;
  urls: string[];
}

export interface CrawlSummary {
  phase: CrawlPhase;
  seeds: string[];
  resumed: boolean;
  pagesVisited: number;
  pagesSucceeded: number;
  pagesFailed: number;
  uniqueUrlsDiscovered: number;
  maxDepth: number;
  totalLinksExtracted: number;
  linksSampledOut: number;
  invalidLinks: number;
  offHostFiltered: number;
  duplicatesFiltered: number;
  depthRejected: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  durationMs: number;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  meanLinksPerPage: number;
  cancelled: boolean;
  pendingAtExit: number;
  retryAttempts: number;
  keywordMatches: string[];
  longestPath?: LongestPath;
  checkpointsWritten: number;
  checkpointFailures: number;
  failureLog: FailureEvent[];
}

export interface CrawlHandlers {
  onPage(result: PageResult): void;
  onError?(error: CrawlerError, context: { url: string; depth: number }): void;
  onComplete?(summary: CrawlSummary): void;
  onPhaseChange?(phase: CrawlPhase): void;
}

export type CrawlOrchestratorOptions = Partial<CrawlOptions>;

export interface SeedSourceConfig {
  url?: string;
  urlFile?: string;
  urls?: string[];
}

export interface CrawlOrchestratorConfig extends CrawlOrchestratorOptions, SeedSourceConfig {
  settingsFile?: string;
  handlers?: CrawlHandlers;
  fetcher?: PageFetcher;
  extractLinks?: LinkExtractor;
  random?: () => number;
  signal?: AbortSignal;
  /** Stop on SIGINT/SIGTERM. Defaults to true. */
  handleSignals?: boolean;
}
