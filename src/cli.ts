#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { asBoolean, asNumber, secondsToMs } from './config/coerce.js';
import { asOutputFormat, asSamplingMode } from './config/settingsFile.js';
import { crawlOrchestrator } from './index.js';
import { CrawlOrchestratorConfig } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const EXIT_INTERRUPTED = 130;

const program = new Command();

program
  .name('link-chain-crawler')
  .description('Depth-bounded web crawler with link sampling, longest-chain tracking and resume.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Crawl from the seed URLs in a file, --url, or a settings file.')
  .argument('[urlFile]', 'File with one seed URL per line ("-" reads stdin).')
  .option('--url <url>', 'Single seed URL.')
  .option('--url-file <path>', 'File with one seed URL per line.')
  .option('--settings <path>', 'JSON settings file; command-line flags take precedence.')
  .option('--depth <number>', 'Maximum link hops from a seed. (default: 3)')
  .option('-c, --connections <number>', 'Maximum concurrent fetches. (default: 10)')
  .option('--threads <number>', 'Alias for --connections; the smaller value wins when both are set.')
  .option('-t, --timeout <seconds>', 'Timeout per fetch in seconds. (default: 10)')
  .option('--percentage <number>', 'Share of each page\'s links to follow, 0-100. (default: 100)')
  .option('--sampling <mode>', 'Link sampling: probabilistic or truncate. (default: probabilistic)')
  .option('--exfiltrate [bool]', 'Track the longest chain of first-discovered links.')
  .option('-s, --search-links [bool]', 'Extract and follow links from fetched pages. (default: true)')
  .option('--follow-redirects [bool]', 'Follow HTTP redirects. (default: true)')
  .option('--same-host [bool]', 'Only follow links on the host of the page they were found on.')
  .option('--user-agent <agent>', 'Use this user agent for every request instead of the rotation.')
  .option('--keyword <text>', 'Report pages whose body contains this text (case-insensitive).')
  .option('--resume [bool]', 'Resume from the snapshot in the output directory.')
  .option('--retries <number>', 'Retries for transient network errors. (default: 0)')
  .option('--checkpoint-interval <seconds>', 'Seconds between snapshots; 0 disables. (default: 30)')
  .option('-o, --output-dir <path>', 'Directory for crawl state. (default: crawler_output)')
  .option('--output <path>', 'Write a JSON report (summary, pages, link edges) to this file.')
  .option('--format <format>', 'Console output format: text or json. (default: text)')
  .option('--quiet', 'Suppress per-page output and show a single progress line.')
  .option('--log-level <level>', 'Log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .option('--log-file <path>', 'Write logs to this file instead of stderr.')
  .action(async (urlFile: string | undefined, options: Record<string, unknown>) => {
    try {
      const config = buildConfig(urlFile, options);
      const summary = await crawlOrchestrator(config);
      if (summary.cancelled) {
        process.exitCode = EXIT_INTERRUPTED;
      }
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function buildConfig(urlFile: string | undefined, rawOptions: Record<string, unknown>): CrawlOrchestratorConfig {
  const config: CrawlOrchestratorConfig = {};

  if (urlFile !== undefined) {
    config.urlFile = urlFile;
  }

  if (rawOptions.urlFile !== undefined) {
    config.urlFile = String(rawOptions.urlFile);
  }

  if (rawOptions.url !== undefined) {
    config.url = String(rawOptions.url);
  }

  if (rawOptions.settings !== undefined) {
    config.settingsFile = String(rawOptions.settings);
  }

  if (rawOptions.depth !== undefined) {
    config.maxDepth = asNumber(rawOptions.depth, 'depth');
  }

  const connections = rawOptions.connections === undefined ? undefined : asNumber(rawOptions.connections, 'connections');
  const threads = rawOptions.threads === undefined ? undefined : asNumber(rawOptions.threads, 'threads');
  if (connections !== undefined || threads !== undefined) {
    config.concurrency = Math.min(connections ?? Infinity, threads ?? Infinity);
  }

  if (rawOptions.timeout !== undefined) {
    config.timeoutMs = secondsToMs(asNumber(rawOptions.timeout, 'timeout'));
  }

  if (rawOptions.percentage !== undefined) {
    config.percentage = asNumber(rawOptions.percentage, 'percentage');
  }

  if (rawOptions.sampling !== undefined) {
    config.sampling = asSamplingMode(String(rawOptions.sampling));
  }

  if (rawOptions.exfiltrate !== undefined) {
    config.exfiltrate = asBoolean(rawOptions.exfiltrate, 'exfiltrate');
  }

  if (rawOptions.searchLinks !== undefined) {
    config.searchLinks = asBoolean(rawOptions.searchLinks, 'search-links');
  }

  if (rawOptions.followRedirects !== undefined) {
    config.followRedirects = asBoolean(rawOptions.followRedirects, 'follow-redirects');
  }

  if (rawOptions.sameHost !== undefined) {
    config.sameHost = asBoolean(rawOptions.sameHost, 'same-host');
  }

  if (rawOptions.userAgent !== undefined) {
    config.userAgents = [String(rawOptions.userAgent)];
  }

  if (rawOptions.keyword !== undefined) {
    config.keyword = String(rawOptions.keyword);
  }

  if (rawOptions.resume !== undefined) {
    config.resume = asBoolean(rawOptions.resume, 'resume');
  }

  if (rawOptions.retries !== undefined) {
    config.retries = asNumber(rawOptions.retries, 'retries');
  }

  if (rawOptions.checkpointInterval !== undefined) {
    config.checkpointIntervalMs = secondsToMs(asNumber(rawOptions.checkpointInterval, 'checkpoint-interval'));
  }

  if (rawOptions.outputDir !== undefined) {
    config.outputDir = String(rawOptions.outputDir);
  }

  if (rawOptions.output !== undefined) {
    config.outputFile = String(rawOptions.output);
  }

  if (rawOptions.format !== undefined) {
    config.format = asOutputFormat(String(rawOptions.format));
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    config.logLevel = String(rawOptions.logLevel);
  }

  if (rawOptions.logFile !== undefined) {
    config.logFile = String(rawOptions.logFile);
  }

  return config;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'config',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`${crawlerError.name}: ${crawlerError.message}`);
  process.exitCode = 1;
}
