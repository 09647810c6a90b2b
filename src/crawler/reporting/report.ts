import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createOutputError } from '../../errors.js';
import { CrawlSummary } from '../../types.js';

export type PageType = 'YouTube' | 'Blog' | 'News' | 'Other';

export interface ReportPage {
  url: string;
  type: PageType;
  domain: string;
  depth: number;
  parent: string | null;
  status: number | null;
  durationMs: number;
  keywordMatch: boolean;
}

export interface CrawlReport {
  summary: CrawlSummary;
  pages: ReportPage[];
  edges: Array<[from: string, to: string]>;
}

// First match wins.
const PAGE_TYPE_RULES: ReadonlyArray<[fragment: string, type: PageType]> = [
  ['youtube.com', 'YouTube'],
  ['blog', 'Blog'],
  ['news', 'News'],
];

/** Coarse page category from substrings of the URL. */
export function classifyPageType(url: string): PageType {
  const rule = PAGE_TYPE_RULES.find(([fragment]) => url.includes(fragment));
  return rule ? rule[1] : 'Other';
}

/** Host (with any non-default port) of a normalized URL key. */
export function domainOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

export async function writeCrawlReport(filePath: string, report: CrawlReport): Promise<void> {
  try {
    await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw createOutputError(`Failed to write crawl report to ${filePath}`, { path: filePath }, { cause: error });
  }
}
