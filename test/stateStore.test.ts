import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  computeFingerprint,
  CrawlSnapshot,
  CrawlStateStore,
  DEFAULT_STATE_FILE,
  SNAPSHOT_VERSION,
} from '../src/crawler/persistence/stateStore.js';
import { isCrawlerError } from '../src/errors.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), 'state-store-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

const settings = { seeds: ['https://a.test/'], maxDepth: 2, percentage: 100 };

const sampleSnapshot = (): CrawlSnapshot => ({
  version: SNAPSHOT_VERSION,
  fingerprint: computeFingerprint(settings),
  settings,
  savedAt: '2024-01-01T00:00:00.000Z',
  visited: [
    { key: 'https://a.test/', depth: 0, firstSeenAt: 1 },
    { key: 'https://a.test/b', depth: 1, firstSeenAt: 2 },
  ],
  frontier: [{ url: 'https://a.test/b', depth: 1, parent: 'https://a.test/' }],
  paths: [
    { key: 'https://a.test/', chainLength: 0, predecessor: null },
    { key: 'https://a.test/b', chainLength: 1, predecessor: 'https://a.test/' },
  ],
});

const errorOf = async (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    () => undefined,
    (error: unknown) => error,
  );

describe('computeFingerprint', () => {
  it('ignores seed order', () => {
    expect(computeFingerprint({ seeds: ['b', 'a'], maxDepth: 1, percentage: 50 })).toBe(
      computeFingerprint({ seeds: ['a', 'b'], maxDepth: 1, percentage: 50 }),
    );
  });

  it('changes with depth or percentage', () => {
    const base = computeFingerprint(settings);
    expect(computeFingerprint({ ...settings, maxDepth: 3 })).not.toBe(base);
    expect(computeFingerprint({ ...settings, percentage: 50 })).not.toBe(base);
  });
});

describe('CrawlStateStore', () => {
  it('round-trips a snapshot and leaves no temporary files', async () => {
    const store = new CrawlStateStore(tempDir);
    const snapshot = sampleSnapshot();

    await store.checkpoint(snapshot);

    await expect(store.load()).resolves.toEqual(snapshot);
    await expect(readdir(tempDir)).resolves.toEqual([DEFAULT_STATE_FILE]);
  });

  it('round-trips recorded failures', async () => {
    const store = new CrawlStateStore(tempDir);
    const snapshot: CrawlSnapshot = {
      ...sampleSnapshot(),
      failures: [{ url: 'https://a.test/c', depth: 1, reason: 'HTTP 500', kind: 'http' }],
    };

    await store.checkpoint(snapshot);

    const loaded = await store.load();
    expect(loaded?.failures).toEqual([{ url: 'https://a.test/c', depth: 1, reason: 'HTTP 500', kind: 'http' }]);
  });

  it('replaces the previous snapshot', async () => {
    const store = new CrawlStateStore(tempDir);
    await store.checkpoint(sampleSnapshot());
    await store.checkpoint({ ...sampleSnapshot(), frontier: [] });

    const loaded = await store.load();
    expect(loaded?.frontier).toEqual([]);
  });

  it('returns undefined when no snapshot exists', async () => {
    const store = new CrawlStateStore(path.join(tempDir, 'missing'));
    await expect(store.load()).resolves.toBeUndefined();
    await expect(store.loadIfResuming(settings)).resolves.toBeUndefined();
  });

  it('rejects a snapshot taken with different settings', async () => {
    const store = new CrawlStateStore(tempDir);
    await store.checkpoint(sampleSnapshot());

    const error = await errorOf(store.loadIfResuming({ ...settings, maxDepth: 3 }));

    expect(isCrawlerError(error)).toBe(true);
    expect(error).toMatchObject({
      name: 'IncompatibleSnapshot',
      severity: 'fatal',
      details: { stored: settings, current: { ...settings, maxDepth: 3 } },
    });
  });

  it('accepts a snapshot whose seeds differ only in order', async () => {
    const store = new CrawlStateStore(tempDir);
    const twoSeeds = { seeds: ['https://a.test/', 'https://b.test/'], maxDepth: 2, percentage: 100 };
    await store.checkpoint({ ...sampleSnapshot(), fingerprint: computeFingerprint(twoSeeds), settings: twoSeeds });

    const loaded = await store.loadIfResuming({ ...twoSeeds, seeds: ['https://b.test/', 'https://a.test/'] });
    expect(loaded?.visited).toHaveLength(2);
  });

  it('fails with StorageError on a corrupt snapshot', async () => {
    await writeFile(path.join(tempDir, DEFAULT_STATE_FILE), '{"version": 1, "visited": [', 'utf8');

    const error = await errorOf(new CrawlStateStore(tempDir).load());

    expect(error).toMatchObject({ name: 'StorageError', severity: 'fatal' });
  });

  it('fails with StorageError on a snapshot of the wrong shape', async () => {
    await writeFile(
      path.join(tempDir, DEFAULT_STATE_FILE),
      JSON.stringify({ ...sampleSnapshot(), visited: [{ key: 42 }] }),
      'utf8',
    );

    const error = await errorOf(new CrawlStateStore(tempDir).load());

    expect(error).toMatchObject({ name: 'StorageError' });
  });

  it('fails with StorageError on a failure record of an unknown kind', async () => {
    await writeFile(
      path.join(tempDir, DEFAULT_STATE_FILE),
      JSON.stringify({
        ...sampleSnapshot(),
        failures: [{ url: 'https://a.test/c', depth: 1, reason: 'gone', kind: 'vanished' }],
      }),
      'utf8',
    );

    const error = await errorOf(new CrawlStateStore(tempDir).load());

    expect(error).toMatchObject({ name: 'StorageError' });
  });

  it('fails with StorageError when the directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf8');
    const store = new CrawlStateStore(path.join(blocker, 'state'));

    const error = await errorOf(store.checkpoint(sampleSnapshot()));

    expect(error).toMatchObject({ name: 'StorageError', severity: 'recoverable' });
  });

  it('discards the snapshot and tolerates a missing one', async () => {
    const store = new CrawlStateStore(tempDir);
    await store.checkpoint(sampleSnapshot());

    await store.discard();
    await store.discard();

    await expect(store.load()).resolves.toBeUndefined();
  });
});
