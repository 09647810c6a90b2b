import { SamplingMode } from '../../types.js';
import { sampleLinks } from '../sampling/linkSampler.js';
import { sameHost } from '../url/sameHost.js';
import { tryNormalizeUrl } from '../url/normalizeUrl.js';

export interface CollectLinksOptions {
  rawLinks: readonly string[];
  /** URL the page was actually served from; relative links resolve against it. */
  baseUrl: string;
  pageKey: string;
  percentage: number;
  sampling: SamplingMode;
  sameHostOnly: boolean;
  random?: () => number;
}

export interface CollectedLinks {
  links: string[];
  sampledOut: number;
  invalid: number;
  offHost: number;
}

/**
 * Sampler, then normalizer, then the optional host filter. The result is
 * unique within the page; cross-page dedup is the visited set's job.
 */
export function collectLinks(options: CollectLinksOptions): CollectedLinks {
  const { rawLinks, baseUrl, pageKey, percentage, sampling, sameHostOnly, random } = options;

  const sampled = sampleLinks(rawLinks, percentage, { mode: sampling, random });
  const links = new Set<string>();
  let invalid = 0;
  let offHost = 0;

  for (const rawLink of sampled) {
    const normalized = tryNormalizeUrl(rawLink, baseUrl);
    if (!normalized) {
      invalid += 1;
      continue;
    }

    if (sameHostOnly && !sameHost(pageKey, normalized)) {
      offHost += 1;
      continue;
    }

    links.add(normalized);
  }

  return {
    links: [...links],
    sampledOut: rawLinks.length - sampled.length,
    invalid,
    offHost,
  };
}
