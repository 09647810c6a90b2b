import { resolveOptions } from './config/options.js';
import { loadSeeds } from './config/seeds.js';
import { loadSettingsFile } from './config/settingsFile.js';
import { crawl } from './crawler/crawl.js';
import { CrawlStateStore } from './crawler/persistence/stateStore.js';
import { configureLogger, getLogger } from './logger.js';
import {
  CrawlOptions,
  CrawlOrchestratorConfig,
  CrawlSummary,
  SeedSourceConfig,
} from './types.js';

/**
 * Resolves settings (defaults < settings file < explicit config), loads the
 * seeds and, when resuming, the stored snapshot; then runs the crawl. Every
 * configuration problem surfaces as a ConfigError before any fetch starts.
 */
export async function crawlOrchestrator(config: CrawlOrchestratorConfig = {}): Promise<CrawlSummary> {
  const {
    settingsFile,
    handlers,
    fetcher,
    extractLinks,
    random,
    signal,
    handleSignals,
    url,
    urlFile,
    urls,
    ...explicitOptions
  } = config;

  const fromFile = settingsFile ? await loadSettingsFile(settingsFile) : undefined;
  const options = resolveOptions(explicitOptions, fromFile?.options);

  configureLogger({ level: options.logLevel, file: options.logFile });
  const logger = getLogger().child({ component: 'orchestrator' });

  if (fromFile && fromFile.ignoredKeys.length > 0) {
    logger.info({ keys: fromFile.ignoredKeys }, 'ignoring unknown settings keys');
  }

  const seedSource: SeedSourceConfig = {
    url,
    urlFile: urlFile ?? fromFile?.seeds.urlFile,
    urls: urls ?? fromFile?.seeds.urls,
  };
  const { seeds, rejected } = await loadSeeds(seedSource);

  for (const entry of rejected) {
    logger.warn({ seed: entry.value, reason: entry.reason }, 'skipping invalid seed URL');
  }

  const store = new CrawlStateStore(options.outputDir);
  const snapshot = options.resume
    ? await store.loadIfResuming({ seeds, maxDepth: options.maxDepth, percentage: options.percentage })
    : undefined;

  return crawl({
    seeds,
    options,
    handlers,
    fetcher,
    extractLinks,
    random,
    signal,
    handleSignals,
    store,
    snapshot,
  });
}

export { resolveOptions, DEFAULT_OPTIONS } from './config/options.js';
export { CrawlCoordinator, crawl } from './crawler/crawl.js';
export { normalizeUrl, tryNormalizeUrl } from './crawler/url/normalizeUrl.js';
export { CrawlStateStore, computeFingerprint } from './crawler/persistence/stateStore.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export type { CrawlOptions, CrawlOrchestratorConfig, CrawlSummary };
export type {
  CrawlHandlers,
  CrawlPhase,
  FetchRequest,
  FetchResult,
  LinkExtractor,
  PageFetcher,
  PageResult,
} from './types.js';
