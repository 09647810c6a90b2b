import { createConfigurationError } from '../errors.js';
import { DEFAULT_USER_AGENTS } from '../crawler/network/userAgents.js';
import { CrawlOptions, CrawlOrchestratorOptions, OutputFormat, SamplingMode } from '../types.js';

export const DEFAULT_OPTIONS: CrawlOptions = {
  maxDepth: 3,
  concurrency: 10,
  timeoutMs: 10_000,
  percentage: 100,
  sampling: 'probabilistic',
  exfiltrate: false,
  searchLinks: true,
  followRedirects: true,
  sameHost: false,
  userAgents: [...DEFAULT_USER_AGENTS],
  retries: 0,
  keyword: undefined,
  resume: false,
  outputDir: 'crawler_output',
  outputFile: undefined,
  checkpointIntervalMs: 30_000,
  format: 'text',
  quiet: false,
  logLevel: 'warn',
  logFile: undefined,
};

const VALID_FORMATS: OutputFormat[] = ['text', 'json'];
const VALID_SAMPLING: SamplingMode[] = ['probabilistic', 'truncate'];
const VALID_LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const MAX_CONCURRENCY = 10_000;

/**
 * Layers explicit values over settings-file values over defaults, then
 * validates every field; throws ConfigError on the first bad value.
 */
export function resolveOptions(
  explicit: CrawlOrchestratorOptions = {},
  settings: CrawlOrchestratorOptions = {},
): CrawlOptions {
  const config = layer(explicit, settings);
  const options: CrawlOptions = {
    ...DEFAULT_OPTIONS,
    maxDepth: coerceNonNegativeInteger(config.maxDepth ?? DEFAULT_OPTIONS.maxDepth, 'depth'),
    concurrency: coercePositiveInteger(config.concurrency ?? DEFAULT_OPTIONS.concurrency, 'connections'),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout'),
    percentage: coercePercentage(config.percentage ?? DEFAULT_OPTIONS.percentage),
    retries: coerceNonNegativeInteger(config.retries ?? DEFAULT_OPTIONS.retries, 'retries'),
    checkpointIntervalMs: coerceNonNegativeInteger(
      config.checkpointIntervalMs ?? DEFAULT_OPTIONS.checkpointIntervalMs,
      'checkpoint-interval',
    ),
  };

  if (options.concurrency > MAX_CONCURRENCY) {
    throw createConfigurationError(`connections must be at most ${MAX_CONCURRENCY}.`, {
      value: options.concurrency,
    });
  }

  options.sampling = oneOf(config.sampling ?? DEFAULT_OPTIONS.sampling, VALID_SAMPLING, 'sampling');
  options.format = oneOf(config.format ?? DEFAULT_OPTIONS.format, VALID_FORMATS, 'format');

  const logLevel = config.logLevel ?? DEFAULT_OPTIONS.logLevel;
  if (!VALID_LOG_LEVELS.includes(logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${logLevel}`, { logLevel });
  }
  options.logLevel = logLevel;

  options.exfiltrate = coerceBoolean(config.exfiltrate ?? DEFAULT_OPTIONS.exfiltrate, 'exfiltrate');
  options.searchLinks = coerceBoolean(config.searchLinks ?? DEFAULT_OPTIONS.searchLinks, 'search-links');
  options.followRedirects = coerceBoolean(
    config.followRedirects ?? DEFAULT_OPTIONS.followRedirects,
    'follow-redirects',
  );
  options.sameHost = coerceBoolean(config.sameHost ?? DEFAULT_OPTIONS.sameHost, 'same-host');
  options.resume = coerceBoolean(config.resume ?? DEFAULT_OPTIONS.resume, 'resume');
  options.quiet = coerceBoolean(config.quiet ?? DEFAULT_OPTIONS.quiet, 'quiet');

  const userAgents = (config.userAgents ?? DEFAULT_OPTIONS.userAgents)
    .map((agent) => agent.trim())
    .filter((agent) => agent.length > 0);
  if (userAgents.length === 0) {
    throw createConfigurationError('At least one user agent is required.', {});
  }
  options.userAgents = userAgents;

  options.keyword = nonEmpty(config.keyword);
  options.outputFile = nonEmpty(config.outputFile);
  options.logFile = nonEmpty(config.logFile);

  const outputDir = nonEmpty(config.outputDir) ?? DEFAULT_OPTIONS.outputDir;
  options.outputDir = outputDir;

  return options;
}

export function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return value;
}

export function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return value;
}

function coercePercentage(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw createConfigurationError('percentage must be a number between 0 and 100.', { value });
  }

  return value;
}

function coerceBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw createConfigurationError(`${field} must be true or false.`, { value, field });
  }
  return value;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw createConfigurationError(`Unsupported ${field}: ${value}`, { value, allowed: [...allowed] });
  }
  return match;
}

function layer(
  explicit: CrawlOrchestratorOptions,
  settings: CrawlOrchestratorOptions,
): CrawlOrchestratorOptions {
  return {
    maxDepth: explicit.maxDepth ?? settings.maxDepth,
    concurrency: explicit.concurrency ?? settings.concurrency,
    timeoutMs: explicit.timeoutMs ?? settings.timeoutMs,
    percentage: explicit.percentage ?? settings.percentage,
    sampling: explicit.sampling ?? settings.sampling,
    exfiltrate: explicit.exfiltrate ?? settings.exfiltrate,
    searchLinks: explicit.searchLinks ?? settings.searchLinks,
    followRedirects: explicit.followRedirects ?? settings.followRedirects,
    sameHost: explicit.sameHost ?? settings.sameHost,
    userAgents: explicit.userAgents ?? settings.userAgents,
    retries: explicit.retries ?? settings.retries,
    keyword: explicit.keyword ?? settings.keyword,
    resume: explicit.resume ?? settings.resume,
    outputDir: explicit.outputDir ?? settings.outputDir,
    outputFile: explicit.outputFile ?? settings.outputFile,
    checkpointIntervalMs: explicit.checkpointIntervalMs ?? settings.checkpointIntervalMs,
    format: explicit.format ?? settings.format,
    quiet: explicit.quiet ?? settings.quiet,
    logLevel: explicit.logLevel ?? settings.logLevel,
    logFile: explicit.logFile ?? settings.logFile,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
