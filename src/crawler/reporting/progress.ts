import { updateQuietProgress } from '../../util/output.js';

export interface ProgressSource {
  pagesVisited: number;
  pagesFailed: number;
  uniqueUrls: number;
  pending: number;
  inFlight: number;
  longestChain?: number;
}

export class ProgressReporter {
  constructor(private readonly read: () => ProgressSource) {}

  emit(): void {
    const source = this.read();
    updateQuietProgress({
      pagesVisited: source.pagesVisited,
      pagesFailed: source.pagesFailed,
      uniqueUrlsDiscovered: source.uniqueUrls,
      pending: source.pending,
      inFlight: source.inFlight,
      longestChain: source.longestChain,
    });
  }
}
