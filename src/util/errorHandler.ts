import {
  CrawlerError,
  ensureCrawlerError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  depth?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

/**
 * Logs a crawler error (warn when recoverable, error when fatal) and rethrows
 * fatal ones unless `throwOnFatal` is false.
 */
export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(crawlerError.details ?? {}),
    ...context,
  };

  const message = buildLogMessage(crawlerError, mergedDetails);
  const shouldThrow = options.throwOnFatal ?? true;
  const logger = getLogger();

  if (crawlerError.severity === 'fatal') {
    logger.error({ err: crawlerError }, message);
    if (shouldThrow) {
      throw crawlerError;
    }
  } else {
    logger.warn(message);
  }

  return crawlerError;
}

export function buildLogMessage(error: CrawlerError, details: Record<string, unknown>): string {
  const parts = [`[${error.name}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
