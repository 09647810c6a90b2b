import { readFile } from 'node:fs/promises';

import { createConfigurationError } from '../errors.js';
import { CrawlOrchestratorOptions, OutputFormat, SamplingMode, SeedSourceConfig } from '../types.js';
import { asBoolean, asNumber, asString, asStringList, secondsToMs } from './coerce.js';

export interface SettingsFileContents {
  options: CrawlOrchestratorOptions;
  seeds: SeedSourceConfig;
  ignoredKeys: string[];
}

type SettingsTarget = { options: CrawlOrchestratorOptions; seeds: SeedSourceConfig };
type KeyHandler = (value: unknown, target: SettingsTarget) => void;

// `threads` and `connections` both size the worker pool; when both are set the smaller wins.
const KEY_HANDLERS: Record<string, KeyHandler> = {
  url_file: (value, target) => {
    target.seeds.urlFile = asString(value, 'url_file');
  },
  urls_to_visit: (value, target) => {
    target.seeds.urls = asStringList(value, 'urls_to_visit');
  },
  connections: (value, target) => {
    target.options.concurrency = minDefined(target.options.concurrency, asNumber(value, 'connections'));
  },
  threads: (value, target) => {
    target.options.concurrency = minDefined(target.options.concurrency, asNumber(value, 'threads'));
  },
  timeout: (value, target) => {
    target.options.timeoutMs = secondsToMs(asNumber(value, 'timeout'));
  },
  search_links: (value, target) => {
    target.options.searchLinks = asBoolean(value, 'search_links');
  },
  output_dir: (value, target) => {
    target.options.outputDir = asString(value, 'output_dir');
  },
  depth: (value, target) => {
    target.options.maxDepth = asNumber(value, 'depth');
  },
  user_agents: (value, target) => {
    target.options.userAgents = asStringList(value, 'user_agents');
  },
  resume: (value, target) => {
    target.options.resume = asBoolean(value, 'resume');
  },
  keyword_search: (value, target) => {
    target.options.keyword = asString(value, 'keyword_search');
  },
  percentage: (value, target) => {
    target.options.percentage = asNumber(value, 'percentage');
  },
  sampling: (value, target) => {
    target.options.sampling = asSamplingMode(asString(value, 'sampling'));
  },
  exfiltrate: (value, target) => {
    target.options.exfiltrate = asBoolean(value, 'exfiltrate');
  },
  follow_redirects: (value, target) => {
    target.options.followRedirects = asBoolean(value, 'follow_redirects');
  },
  same_host: (value, target) => {
    target.options.sameHost = asBoolean(value, 'same_host');
  },
  retries: (value, target) => {
    target.options.retries = asNumber(value, 'retries');
  },
  checkpoint_interval: (value, target) => {
    target.options.checkpointIntervalMs = secondsToMs(asNumber(value, 'checkpoint_interval'));
  },
  output: (value, target) => {
    target.options.outputFile = asString(value, 'output');
  },
  format: (value, target) => {
    target.options.format = asOutputFormat(asString(value, 'format'));
  },
  log_level: (value, target) => {
    target.options.logLevel = asString(value, 'log_level');
  },
};

/**
 * Reads a JSON settings file (`settings.json` convention: snake_case keys,
 * timeout in seconds). Values are type-checked here and range-checked later
 * by resolveOptions.
 */
export async function loadSettingsFile(filePath: string): Promise<SettingsFileContents> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw createConfigurationError(`Unable to read settings file: ${filePath}`, { path: filePath }, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createConfigurationError(`Settings file is not valid JSON: ${filePath}`, { path: filePath }, {
      cause: error,
    });
  }

  return parseSettings(parsed, filePath);
}

export function parseSettings(parsed: unknown, source = 'settings'): SettingsFileContents {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw createConfigurationError(`Settings must be a JSON object: ${source}`, { source });
  }

  const target: SettingsTarget = { options: {}, seeds: {} };
  const ignoredKeys: string[] = [];

  for (const [key, value] of Object.entries(parsed)) {
    const handler = Object.hasOwn(KEY_HANDLERS, key) ? KEY_HANDLERS[key] : undefined;
    if (!handler) {
      ignoredKeys.push(key);
      continue;
    }
    if (value === null) {
      continue;
    }
    handler(value, target);
  }

  return { options: target.options, seeds: target.seeds, ignoredKeys };
}

function minDefined(current: number | undefined, next: number): number {
  return current === undefined ? next : Math.min(current, next);
}

export function asSamplingMode(value: string): SamplingMode {
  if (value === 'probabilistic' || value === 'truncate') {
    return value;
  }
  throw createConfigurationError(`Unsupported sampling: ${value}`, { value });
}

export function asOutputFormat(value: string): OutputFormat {
  const normalized = value.toLowerCase();
  if (normalized === 'text' || normalized === 'json') {
    return normalized;
  }
  throw createConfigurationError(`Unsupported format: ${value}`, { value });
}
