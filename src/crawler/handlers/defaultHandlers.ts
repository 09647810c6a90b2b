import { CrawlHandlers, PageResult } from '../../types.js';
import { writePage, writeSummary } from '../../util/output.js';

export function createDefaultHandlers(): CrawlHandlers {
  return {
    onPage: (result: PageResult) => writePage(result),
    onComplete: (summary) => writeSummary(summary),
  };
}
