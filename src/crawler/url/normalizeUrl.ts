import { createInvalidUrlError } from '../../errors.js';

const DEFAULT_PORT_MAP: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/i;

/**
 * Canonical URL key: lowercase scheme and host, no default port, no fragment,
 * no trailing slash on non-root paths. Path case and query are kept as written.
 *
 * @throws InvalidURL when `raw` (resolved against `base`, if given) is not an absolute http(s) URL.
 */
export function normalizeUrl(raw: string, base?: string | URL): string {
  let url: URL;
  try {
    url = base === undefined ? new URL(raw) : new URL(raw, base);
  } catch (error) {
    throw createInvalidUrlError(`Invalid URL: ${raw}`, { url: raw }, { cause: error });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createInvalidUrlError(`Unsupported URL scheme: ${url.protocol}`, { url: raw });
  }

  if (!url.hostname) {
    throw createInvalidUrlError(`URL has no host: ${raw}`, { url: raw });
  }

  url.hostname = url.hostname.toLowerCase();
  url.hash = '';

  removeDefaultPort(url);
  normalizePath(url);

  return url.toString();
}

export function tryNormalizeUrl(raw: string, base?: string | URL): string | null {
  try {
    return normalizeUrl(raw, base);
  } catch {
    return null;
  }
}

/** Seeds may be typed without a scheme (`example.com/docs`); those are assumed https. */
export function ensureScheme(raw: string): string {
  const trimmed = raw.trim();
  if (SCHEME_PATTERN.test(trimmed) || trimmed.startsWith('//')) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

function removeDefaultPort(url: URL): void {
  const defaultPort = DEFAULT_PORT_MAP[url.protocol];
  if (defaultPort && url.port === defaultPort) {
    url.port = '';
  }
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}
