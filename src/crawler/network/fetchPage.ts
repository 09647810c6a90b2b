import {
  createTimeoutError,
  createTransportError,
  isCrawlerError,
  type CrawlerError,
} from '../../errors.js';
import { FetchRequest, FetchResult } from '../../types.js';

const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN']);

/**
 * Default transport: global fetch with a per-request timeout. Per-URL failures
 * resolve as `timeout` / `transport-error` results; this never rejects.
 */
export async function fetchPage(request: FetchRequest): Promise<FetchResult> {
  const { url, timeoutMs, userAgent, followRedirects, signal } = request;
  const controller = new AbortController();
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCancel = (): void => controller.abort();

  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onCancel, { once: true });
  }

  try {
    const response = await fetch(url, {
      redirect: followRedirects ? 'follow' : 'manual',
      signal: controller.signal,
      headers: {
        'user-agent': userAgent,
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
        'accept-encoding': 'gzip, deflate, br',
      },
    });

    const contentType = response.headers.get('content-type') ?? undefined;
    const location = response.headers.get('location') ?? undefined;
    const isHtml = contentType?.toLowerCase().includes('text/html') ?? false;
    let body = '';
    if (isHtml && response.ok) {
      body = await response.text();
    } else {
      await response.body?.cancel();
    }

    return {
      kind: 'success',
      url: response.url || url,
      status: response.status,
      body,
      contentType,
      location,
    };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));

    if (timedOut) {
      return {
        kind: 'timeout',
        url,
        error: createTimeoutError(`Request timed out after ${timeoutMs}ms`, { url, timeoutMs }, { cause: err }),
      };
    }

    const code = extractErrorCode(err);
    const message = signal?.aborted ? 'Request cancelled' : err.message || 'Request failed';

    return {
      kind: 'transport-error',
      url,
      error: createTransportError(
        message,
        { url, ...(typeof code === 'string' ? { code } : {}) },
        { cause: err },
      ),
    };
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCancel);
  }
}

export function isRetryableFetchError(error: unknown): boolean {
  const err = error instanceof Error ? error : undefined;
  if (!err || err.name === 'AbortError') {
    return false;
  }

  const code = extractErrorCode(err);
  return Boolean(code && RETRYABLE_ERROR_CODES.has(code));
}

function extractErrorCode(error: Error | CrawlerError): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
