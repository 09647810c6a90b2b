import { FetchResult, PageFetcher } from '../../types.js';
import { isRetryableFetchError } from './fetchPage.js';

const RETRY_BACKOFF_MS = 100;

export interface RetryPolicy {
  /** Additional attempts after the first; 0 disables retrying. */
  retries: number;
  backoffMs?: number;
  onRetry?: (url: string, attempt: number, result: FetchResult) => void;
}

/**
 * Wraps a fetcher so transport errors with a retryable network code are
 * re-attempted. Timeouts and HTTP statuses are returned as-is.
 */
export function withRetries(fetcher: PageFetcher, policy: RetryPolicy): PageFetcher {
  if (policy.retries <= 0) {
    return fetcher;
  }

  const backoffMs = policy.backoffMs ?? RETRY_BACKOFF_MS;

  return async (request) => {
    let result = await fetcher(request);

    for (let attempt = 1; attempt <= policy.retries; attempt += 1) {
      if (result.kind !== 'transport-error' || !isRetryableFetchError(result.error)) {
        return result;
      }
      if (request.signal?.aborted) {
        return result;
      }

      policy.onRetry?.(request.url, attempt, result);
      await delay(backoffMs * attempt);
      result = await fetcher(request);
    }

    return result;
  };
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
