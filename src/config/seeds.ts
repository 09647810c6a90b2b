import { readFile } from 'node:fs/promises';

import { createConfigurationError, isCrawlerError } from '../errors.js';
import { ensureScheme, normalizeUrl } from '../crawler/url/normalizeUrl.js';
import { SeedSourceConfig } from '../types.js';

export interface LoadedSeeds {
  seeds: string[];
  rejected: Array<{ value: string; reason: string }>;
}

/** `-` as the URL file reads the list from stdin. */
export const STDIN_SOURCE = '-';

/**
 * Collects seed URLs from `--url`, the URL file and any inline list.
 * Blank lines and `#` comments are skipped. Individually invalid seeds are
 * returned in `rejected`; the call fails only when nothing usable remains.
 */
export async function loadSeeds(
  source: SeedSourceConfig,
  readStdin: () => Promise<string> = readProcessStdin,
): Promise<LoadedSeeds> {
  const candidates: string[] = [];

  if (source.url !== undefined) {
    candidates.push(source.url);
  }

  if (source.urls) {
    candidates.push(...source.urls);
  }

  if (source.urlFile !== undefined) {
    const contents = source.urlFile === STDIN_SOURCE ? await readStdin() : await readUrlFile(source.urlFile);
    const lines = parseUrlList(contents);
    if (lines.length === 0 && candidates.length === 0) {
      throw createConfigurationError(`URL file is empty: ${source.urlFile}`, { urlFile: source.urlFile });
    }
    candidates.push(...lines);
  }

  const trimmed = candidates.map((value) => value.trim()).filter((value) => value.length > 0);
  if (trimmed.length === 0) {
    throw createConfigurationError('No seed URLs provided; pass --url or a URL file.', {});
  }

  const seeds = new Set<string>();
  const rejected: LoadedSeeds['rejected'] = [];

  for (const value of trimmed) {
    try {
      seeds.add(normalizeUrl(ensureScheme(value)));
    } catch (error) {
      if (!isCrawlerError(error)) {
        throw error;
      }
      rejected.push({ value, reason: error.message });
    }
  }

  if (seeds.size === 0) {
    throw createConfigurationError('None of the seed URLs are valid.', {
      rejected: rejected.map((entry) => entry.value),
    });
  }

  return { seeds: [...seeds], rejected };
}

export function parseUrlList(contents: string): string[] {
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

async function readUrlFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read URL file: ${filePath}`, { urlFile: filePath }, {
      cause: error,
    });
  }
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}
