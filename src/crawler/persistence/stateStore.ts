import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  createIncompatibleSnapshotError,
  createStorageError,
  isCrawlerError,
} from '../../errors.js';
import { getLogger } from '../../logger.js';
import { FailureEvent, FrontierEntry, PathRecord, VisitedRecord } from '../../types.js';

export const SNAPSHOT_VERSION = 1;
export const DEFAULT_STATE_FILE = 'crawl-state.json';

/** The settings a snapshot is only valid for. */
export interface FingerprintSource {
  seeds: string[];
  maxDepth: number;
  percentage: number;
}

export interface CrawlSnapshot {
  version: typeof SNAPSHOT_VERSION;
  fingerprint: string;
  settings: FingerprintSource;
  savedAt: string;
  visited: VisitedRecord[];
  frontier: FrontierEntry[];
  paths?: PathRecord[];
  failures?: FailureEvent[];
}

export function computeFingerprint(source: FingerprintSource): string {
  const canonical = JSON.stringify({
    seeds: [...source.seeds].sort(),
    maxDepth: source.maxDepth,
    percentage: source.percentage,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

/**
 * Single-file snapshot store. Writes go to a temp file renamed over the
 * previous snapshot, so a failed write leaves the last good one in place.
 */
export class CrawlStateStore {
  readonly filePath: string;
  private readonly logger = getLogger().child({ component: 'state-store' });

  constructor(readonly directory: string, fileName: string = DEFAULT_STATE_FILE) {
    this.filePath = path.join(directory, fileName);
  }

  async checkpoint(snapshot: CrawlSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.tmp-${randomUUID()}`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(snapshot), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug({ err: cleanupError, tempPath }, 'failed to remove partial snapshot');
      });
      throw createStorageError(
        `Failed to write crawl snapshot to ${this.filePath}`,
        { path: this.filePath },
        { cause: error },
      );
    }

    this.logger.debug(
      { path: this.filePath, visited: snapshot.visited.length, frontier: snapshot.frontier.length },
      'checkpoint written',
    );
  }

  async load(): Promise<CrawlSnapshot | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw createStorageError(`Failed to read crawl snapshot ${this.filePath}`, { path: this.filePath }, {
        cause: error,
        severity: 'fatal',
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw createStorageError(`Crawl snapshot ${this.filePath} is not valid JSON`, { path: this.filePath }, {
        cause: error,
        severity: 'fatal',
      });
    }

    if (!isCrawlSnapshot(parsed)) {
      throw createStorageError(`Crawl snapshot ${this.filePath} has an unexpected shape`, {
        path: this.filePath,
      }, { severity: 'fatal' });
    }

    return parsed;
  }

  /**
   * Loads the stored snapshot for a resumed crawl. Returns undefined when there
   * is nothing to resume.
   *
   * @throws IncompatibleSnapshot when the snapshot was taken with different seeds, depth or percentage.
   */
  async loadIfResuming(current: FingerprintSource): Promise<CrawlSnapshot | undefined> {
    const snapshot = await this.load();
    if (!snapshot) {
      this.logger.info({ path: this.filePath }, 'no snapshot found; starting a fresh crawl');
      return undefined;
    }

    const fingerprint = computeFingerprint(current);
    if (snapshot.fingerprint !== fingerprint) {
      throw createIncompatibleSnapshotError(
        'Stored crawl snapshot was created with different settings; remove it or rerun with the original seeds, depth and percentage.',
        { path: this.filePath, stored: snapshot.settings, current },
      );
    }

    return snapshot;
  }

  async discard(): Promise<void> {
    try {
      await rm(this.filePath, { force: true });
    } catch (error) {
      throw createStorageError(`Failed to remove crawl snapshot ${this.filePath}`, { path: this.filePath }, {
        cause: error,
      });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    !isCrawlerError(error) &&
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isVisitedRecord(value: unknown): value is VisitedRecord {
  return (
    isRecord(value) &&
    typeof value.key === 'string' &&
    typeof value.firstSeenAt === 'number' &&
    isNonNegativeInteger(value.depth)
  );
}

function isFrontierEntry(value: unknown): value is FrontierEntry {
  return (
    isRecord(value) &&
    typeof value.url === 'string' &&
    isNonNegativeInteger(value.depth) &&
    (value.parent === null || typeof value.parent === 'string')
  );
}

function isPathRecord(value: unknown): value is PathRecord {
  return (
    isRecord(value) &&
    typeof value.key === 'string' &&
    isNonNegativeInteger(value.chainLength) &&
    (value.predecessor === null || typeof value.predecessor === 'string')
  );
}

const FAILURE_KINDS = new Set(['timeout', 'transport', 'http', 'parse']);

function isFailureEvent(value: unknown): value is FailureEvent {
  return (
    isRecord(value) &&
    typeof value.url === 'string' &&
    isNonNegativeInteger(value.depth) &&
    typeof value.reason === 'string' &&
    typeof value.kind === 'string' &&
    FAILURE_KINDS.has(value.kind)
  );
}

function isFingerprintSource(value: unknown): value is FingerprintSource {
  return (
    isRecord(value) &&
    Array.isArray(value.seeds) &&
    value.seeds.every((seed) => typeof seed === 'string') &&
    isNonNegativeInteger(value.maxDepth) &&
    typeof value.percentage === 'number'
  );
}

function isCrawlSnapshot(value: unknown): value is CrawlSnapshot {
  return (
    isRecord(value) &&
    value.version === SNAPSHOT_VERSION &&
    typeof value.fingerprint === 'string' &&
    typeof value.savedAt === 'string' &&
    isFingerprintSource(value.settings) &&
    Array.isArray(value.visited) &&
    value.visited.every(isVisitedRecord) &&
    Array.isArray(value.frontier) &&
    value.frontier.every(isFrontierEntry) &&
    (value.paths === undefined || (Array.isArray(value.paths) && value.paths.every(isPathRecord))) &&
    (value.failures === undefined || (Array.isArray(value.failures) && value.failures.every(isFailureEvent)))
  );
}
