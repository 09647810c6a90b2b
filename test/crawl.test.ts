import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resolveOptions } from '../src/config/options.js';
import { CrawlCoordinator } from '../src/crawler/crawl.js';
import { computeFingerprint, CrawlSnapshot, CrawlStateStore, SNAPSHOT_VERSION } from '../src/crawler/persistence/stateStore.js';
import { createTimeoutError, createTransportError, isCrawlerError } from '../src/errors.js';
import type { CrawlOrchestratorOptions, CrawlPhase, PageFetcher } from '../src/types.js';
import { cancelledResponse, collectingHandlers, createFakeSite, htmlResponse, links } from './helpers/fakeSite.js';

const optionsFor = (overrides: CrawlOrchestratorOptions = {}) =>
  resolveOptions({ logLevel: 'silent', checkpointIntervalMs: 0, ...overrides });

type SnapshotState = Omit<CrawlSnapshot, 'version' | 'fingerprint' | 'settings' | 'savedAt'>;

const snapshotOf = (seeds: string[], maxDepth: number, state: SnapshotState): CrawlSnapshot => {
  const settings = { seeds, maxDepth, percentage: 100 };
  return {
    version: SNAPSHOT_VERSION,
    fingerprint: computeFingerprint(settings),
    settings,
    savedAt: '2024-01-01T00:00:00.000Z',
    ...state,
  };
};

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'crawl-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('CrawlCoordinator', () => {
  it('visits the seed and its children and stops at the depth limit', async () => {
    const site = createFakeSite({
      'http://a.test/': links('/b', '/c'),
      'http://a.test/b': links(),
      'http://a.test/c': links(),
    });
    const { handlers, pages } = collectingHandlers();
    const phases: CrawlPhase[] = [];

    const coordinator = new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ maxDepth: 2, concurrency: 1, percentage: 100 }),
      { ...handlers, onPhaseChange: (phase) => phases.push(phase) },
      { fetcher: site.fetcher, handleSignals: false },
    );

    const summary = await coordinator.run();

    expect(site.requests.map((request) => request.url)).toEqual([
      'http://a.test/',
      'http://a.test/b',
      'http://a.test/c',
    ]);
    expect(pages.map((page) => [page.url, page.depth])).toEqual([
      ['http://a.test/', 0],
      ['http://a.test/b', 1],
      ['http://a.test/c', 1],
    ]);
    expect(summary.phase).toBe('completed');
    expect(summary.uniqueUrlsDiscovered).toBe(3);
    expect(summary.pagesSucceeded).toBe(3);
    expect(summary.statusCounts).toEqual({ '200': 3 });
    expect(summary.cancelled).toBe(false);
    expect(summary.pendingAtExit).toBe(0);
    expect(phases).toEqual(['running', 'draining', 'running', 'draining', 'completed']);
  });

  it('goes straight from draining to completed when the last page finishes', async () => {
    const site = createFakeSite({ 'http://a.test/': links() });
    const { handlers } = collectingHandlers();
    const phases: CrawlPhase[] = [];

    await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor(),
      { ...handlers, onPhaseChange: (phase) => phases.push(phase) },
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(phases).toEqual(['running', 'draining', 'completed']);
  });

  it('fetches pages at the depth limit without following their links', async () => {
    const site = createFakeSite({
      'http://a.test/': links('/b'),
      'http://a.test/b': links('/c'),
      'http://a.test/c': links('/d'),
    });
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ maxDepth: 1 }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(pages.map((page) => page.url)).toEqual(['http://a.test/', 'http://a.test/b']);
    expect(pages[1]?.links).toEqual([]);
    expect(summary.maxDepth).toBe(1);
  });

  it('reports the longest first-discovery chain in exfiltration mode', async () => {
    const site = createFakeSite({
      'http://s.test/': links('/l1'),
      'http://s.test/l1': links('/', '/l2'),
      'http://s.test/l2': links('/l3'),
      'http://s.test/l3': links('/l4'),
    });
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://s.test/'],
      optionsFor({ maxDepth: 3, exfiltrate: true }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(summary.longestPath).toEqual({
      length: 3,
      urls: ['http://s.test/', 'http://s.test/l1', 'http://s.test/l2', 'http://s.test/l3'],
    });
    expect(pages.map((page) => page.chainLength)).toEqual([0, 1, 2, 3]);
    expect(summary.duplicatesFiltered).toBe(1);
  });

  it('continues stored chains when resuming in exfiltration mode', async () => {
    const snapshot = snapshotOf(['http://s.test/'], 3, {
      visited: [
        { key: 'http://s.test/', firstSeenAt: 1, depth: 0 },
        { key: 'http://s.test/l1', firstSeenAt: 2, depth: 1 },
        { key: 'http://s.test/l2', firstSeenAt: 3, depth: 2 },
      ],
      frontier: [{ url: 'http://s.test/l2', depth: 2, parent: 'http://s.test/l1' }],
      paths: [
        { key: 'http://s.test/', chainLength: 0, predecessor: null },
        { key: 'http://s.test/l1', chainLength: 1, predecessor: 'http://s.test/' },
        { key: 'http://s.test/l2', chainLength: 2, predecessor: 'http://s.test/l1' },
      ],
    });
    const site = createFakeSite({
      'http://s.test/l2': links('/l3'),
      'http://s.test/l3': links(),
    });
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://s.test/'],
      optionsFor({ maxDepth: 3, exfiltrate: true }),
      handlers,
      { fetcher: site.fetcher, snapshot, handleSignals: false },
    ).run();

    expect(pages.map((page) => [page.url, page.chainLength])).toEqual([
      ['http://s.test/l2', 2],
      ['http://s.test/l3', 3],
    ]);
    expect(summary.longestPath).toEqual({
      length: 3,
      urls: ['http://s.test/', 'http://s.test/l1', 'http://s.test/l2', 'http://s.test/l3'],
    });
  });

  it('refuses an exfiltration resume from a snapshot without chain records', () => {
    const snapshot = snapshotOf(['http://s.test/'], 3, {
      visited: [{ key: 'http://s.test/', firstSeenAt: 1, depth: 0 }],
      frontier: [{ url: 'http://s.test/', depth: 0, parent: null }],
    });

    let thrown: unknown;
    try {
      new CrawlCoordinator(
        ['http://s.test/'],
        optionsFor({ maxDepth: 3, exfiltrate: true }),
        { onPage: () => undefined },
        { snapshot, handleSignals: false },
      );
    } catch (error) {
      thrown = error;
    }

    expect(isCrawlerError(thrown) && thrown.name).toBe('IncompatibleSnapshot');
  });

  it('counts links dropped for leaving the seed host', async () => {
    const site = createFakeSite({ 'http://a.test/': links('/b', 'http://other.test/x') });
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ sameHost: true }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(pages.map((page) => page.url)).toEqual(['http://a.test/', 'http://a.test/b']);
    expect(summary.offHostFiltered).toBe(1);
  });

  it('keeps failures recorded before a pause in the resumed summary', async () => {
    const snapshot = snapshotOf(['http://a.test/'], 3, {
      visited: [
        { key: 'http://a.test/', firstSeenAt: 1, depth: 0 },
        { key: 'http://a.test/gone', firstSeenAt: 2, depth: 1 },
        { key: 'http://a.test/x', firstSeenAt: 3, depth: 1 },
      ],
      frontier: [{ url: 'http://a.test/x', depth: 1, parent: 'http://a.test/' }],
      failures: [{ url: 'http://a.test/gone', depth: 1, reason: 'HTTP 500', kind: 'http' }],
    });
    const site = createFakeSite({ 'http://a.test/x': links() });
    const { handlers } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor(),
      handlers,
      { fetcher: site.fetcher, snapshot, handleSignals: false },
    ).run();

    expect(site.requests.map((request) => request.url)).toEqual(['http://a.test/x']);
    expect(summary.failureLog).toEqual([{ url: 'http://a.test/gone', depth: 1, reason: 'HTTP 500', kind: 'http' }]);
  });

  it('admits nothing beyond the seeds at percentage 0', async () => {
    const site = createFakeSite({
      'http://a.test/': links('/b', '/c'),
    });
    const { handlers } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ percentage: 0 }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(site.requests).toHaveLength(1);
    expect(summary.uniqueUrlsDiscovered).toBe(1);
    expect(summary.linksSampledOut).toBe(2);
  });

  it('records timeouts, transport errors and HTTP failures once each', async () => {
    const calls: string[] = [];
    const fetcher: PageFetcher = async (request) => {
      calls.push(request.url);
      switch (request.url) {
        case 'http://a.test/slow':
          return { kind: 'timeout', url: request.url, error: createTimeoutError('Request timed out after 10ms') };
        case 'http://a.test/down':
          return {
            kind: 'transport-error',
            url: request.url,
            error: createTransportError('connection refused', { code: 'ECONNREFUSED' }),
          };
        case 'http://a.test/broken':
          return { kind: 'success', url: request.url, status: 500, body: '' };
        default:
          return htmlResponse(request.url, links('/slow', '/down', '/broken'));
      }
    };
    const { handlers, pages } = collectingHandlers();
    const errors: string[] = [];

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 1 }),
      { ...handlers, onError: (error) => errors.push(error.name) },
      { fetcher, handleSignals: false },
    ).run();

    expect(calls).toEqual(['http://a.test/', 'http://a.test/slow', 'http://a.test/down', 'http://a.test/broken']);
    expect(summary.phase).toBe('completed');
    expect(summary.pagesFailed).toBe(3);
    expect(summary.failureLog).toEqual([
      { url: 'http://a.test/slow', depth: 1, reason: 'Timeout', kind: 'timeout' },
      { url: 'http://a.test/down', depth: 1, reason: 'Transport error: connection refused', kind: 'transport' },
      { url: 'http://a.test/broken', depth: 1, reason: 'HTTP 500', kind: 'http' },
    ]);
    expect(summary.statusCounts).toEqual({ '200': 1, '500': 1 });
    expect(errors).toEqual(['Timeout', 'TransportError', 'TransportError']);
    expect(pages.find((page) => page.url === 'http://a.test/broken')?.error).toBe('HTTP 500');
  });

  it('never runs more fetches at once than the connection limit', async () => {
    let active = 0;
    let peak = 0;
    const children = ['/1', '/2', '/3', '/4', '/5', '/6'];
    const fetcher: PageFetcher = async (request) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return htmlResponse(request.url, request.url === 'http://a.test/' ? links(...children) : links());
    };
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 2 }),
      handlers,
      { fetcher, handleSignals: false },
    ).run();

    expect(pages).toHaveLength(7);
    expect(peak).toBe(2);
    expect(summary.actualMaxConcurrency).toBe(2);
    expect(summary.peakQueueSize).toBe(6);
  });

  it('uses a redirect location as the only link when redirects are not followed', async () => {
    const fetcher: PageFetcher = async (request) =>
      request.url === 'http://a.test/old'
        ? { kind: 'success', url: request.url, status: 301, body: '', location: '/new' }
        : htmlResponse(request.url, links());
    const { handlers, pages } = collectingHandlers();

    await new CrawlCoordinator(
      ['http://a.test/old'],
      optionsFor({ followRedirects: false }),
      handlers,
      { fetcher, handleSignals: false },
    ).run();

    expect(pages.map((page) => page.url)).toEqual(['http://a.test/old', 'http://a.test/new']);
    expect(pages[0]?.status).toBe(301);
  });

  it('flags pages that contain the keyword', async () => {
    const site = createFakeSite({
      'http://a.test/': '<html><body><a href="/b">b</a> nothing here</body></html>',
      'http://a.test/b': '<html><body>The Secret Sauce</body></html>',
    });
    const { handlers, pages } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ keyword: 'secret sauce' }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(summary.keywordMatches).toEqual(['http://a.test/b']);
    expect(pages.map((page) => page.keywordMatch)).toEqual([false, true]);
  });

  it('rotates user agents across fetches', async () => {
    const site = createFakeSite({ 'http://a.test/': links('/b', '/c') });
    const { handlers } = collectingHandlers();

    await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 1, userAgents: ['agent-one', 'agent-two'] }),
      handlers,
      { fetcher: site.fetcher, handleSignals: false },
    ).run();

    expect(site.requests.map((request) => request.userAgent)).toEqual(['agent-one', 'agent-two', 'agent-one']);
  });

  it('pauses on stop, checkpoints unfinished work and resumes from it', async () => {
    const store = new CrawlStateStore(tempDir);
    const stop = new AbortController();
    const fetcher: PageFetcher = (request) => {
      if (request.url === 'http://a.test/') {
        return Promise.resolve(htmlResponse(request.url, links('/x1', '/x2', '/x3')));
      }

      return new Promise((resolve) => {
        const signal = request.signal;
        if (signal?.aborted) {
          resolve(cancelledResponse(request.url));
          return;
        }
        signal?.addEventListener('abort', () => resolve(cancelledResponse(request.url)), { once: true });
        stop.abort();
      });
    };
    const first = collectingHandlers();

    const paused = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 1 }),
      first.handlers,
      { fetcher, store, signal: stop.signal, handleSignals: false },
    ).run();

    expect(paused.phase).toBe('paused');
    expect(paused.cancelled).toBe(true);
    expect(paused.pagesVisited).toBe(1);
    expect(paused.pendingAtExit).toBe(3);
    expect(paused.checkpointsWritten).toBe(1);
    expect(first.pages.map((page) => page.url)).toEqual(['http://a.test/']);

    const snapshot = await store.loadIfResuming({ seeds: ['http://a.test/'], maxDepth: 3, percentage: 100 });
    expect(snapshot?.frontier.map((entry) => entry.url)).toEqual([
      'http://a.test/x1',
      'http://a.test/x2',
      'http://a.test/x3',
    ]);
    expect(snapshot?.visited.map((record) => record.key).sort()).toEqual([
      'http://a.test/',
      'http://a.test/x1',
      'http://a.test/x2',
      'http://a.test/x3',
    ]);

    const site = createFakeSite({
      'http://a.test/x1': links('/'),
      'http://a.test/x2': links(),
      'http://a.test/x3': links(),
    });
    const second = collectingHandlers();

    const resumed = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 1 }),
      second.handlers,
      { fetcher: site.fetcher, store, snapshot, handleSignals: false },
    ).run();

    expect(resumed.phase).toBe('completed');
    expect(resumed.resumed).toBe(true);
    expect(site.requests.map((request) => request.url)).toEqual([
      'http://a.test/x1',
      'http://a.test/x2',
      'http://a.test/x3',
    ]);
    expect(resumed.duplicatesFiltered).toBe(1);
    await expect(store.load()).resolves.toBeUndefined();
  });

  it('lists a page that failed internally only once in a snapshot taken while stopping', async () => {
    const site = createFakeSite({ 'http://a.test/': links('/b', '/c') });
    const frontiers: string[][] = [];

    const coordinator: CrawlCoordinator = new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor({ concurrency: 1 }),
      {
        onPage: (page) => {
          if (page.url === 'http://a.test/b') {
            throw new Error('handler exploded');
          }
        },
        onPhaseChange: (phase) => {
          if (phase === 'draining') {
            frontiers.push(coordinator.captureSnapshot().frontier.map((entry) => entry.url));
          }
        },
      },
      { fetcher: site.fetcher, handleSignals: false },
    );

    await expect(coordinator.run()).rejects.toThrow('handler exploded');
    expect(frontiers[frontiers.length - 1]).toEqual(['http://a.test/b', 'http://a.test/c']);
    expect(coordinator.captureSnapshot().frontier.map((entry) => entry.url)).toEqual([
      'http://a.test/b',
      'http://a.test/c',
    ]);
  });

  it('does not fetch anything when stopped before it starts', async () => {
    const site = createFakeSite({ 'http://a.test/': links() });
    const stop = new AbortController();
    stop.abort();
    const { handlers } = collectingHandlers();

    const summary = await new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor(),
      handlers,
      { fetcher: site.fetcher, signal: stop.signal, handleSignals: false },
    ).run();

    expect(site.requests).toHaveLength(0);
    expect(summary.phase).toBe('paused');
    expect(summary.pendingAtExit).toBe(1);
  });

  it('aborts the crawl when a page handler throws', async () => {
    const site = createFakeSite({ 'http://a.test/': links('/b') });

    const coordinator = new CrawlCoordinator(
      ['http://a.test/'],
      optionsFor(),
      {
        onPage: () => {
          throw new Error('handler exploded');
        },
      },
      { fetcher: site.fetcher, handleSignals: false },
    );

    await expect(coordinator.run()).rejects.toThrow('handler exploded');
    expect(coordinator.currentPhase).toBe('aborted');
  });
});

describe('CrawlCoordinator.admit', () => {
  const create = () =>
    new CrawlCoordinator(['http://a.test/'], optionsFor({ maxDepth: 1 }), { onPage: () => undefined }, {
      handleSignals: false,
    });

  it('claims a URL once', () => {
    const coordinator = create();
    expect(coordinator.admit('http://a.test/page', 1, 'http://a.test/')).toBe('queued');
    expect(coordinator.admit('http://a.test/page', 1, 'http://a.test/')).toBe('duplicate');
  });

  it('rejects depths beyond the limit without consuming the key', () => {
    const coordinator = create();
    expect(coordinator.admit('http://a.test/deep', 2, 'http://a.test/')).toBe('too-deep');
    expect(coordinator.admit('http://a.test/deep', 1, 'http://a.test/')).toBe('queued');
  });
});
