/**
 * Percent-indexed snapshot store for one document.
 *
 * Layout:
 *   <root>/<documentKey>/analysis.json        consolidated "main" snapshot
 *   <root>/<documentKey>/snapshots/<N>%.json  partial snapshot at N percent
 */

import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, rmdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { MAIN_CACHE_FILE, SNAPSHOT_DIR } from '../../config/constants';
import type { Snapshot } from '../../types/analysis';
import { getErrorMessage, isAnalysisError, isNotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { isSnapshotEmpty } from '../entityMerger';
import { parseSnapshot, serializeSnapshot } from './snapshot.codec';

const SNAPSHOT_FILE_PATTERN = /^(\d+)%\.json$/;
const SAFE_DOCUMENT_ID = /^[A-Za-z0-9._-]{1,128}$/;

export interface CacheCandidate {
  percent: number;
  /** Stored content, verbatim */
  content: string;
  snapshot: Snapshot;
  modifiedAt: Date;
}

export function assertPercent(percent: number): void {
  if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
    throw new RangeError(`Percent must be an integer between 0 and 100, got ${percent}`);
  }
}

/** Directory name for a document: the id itself when it is a safe file name, else its md5 */
export function documentKey(documentId: string): string {
  if (SAFE_DOCUMENT_ID.test(documentId) && documentId !== '.' && documentId !== '..') {
    return documentId;
  }
  return createHash('md5').update(documentId, 'utf8').digest('hex');
}

export function snapshotFileName(percent: number): string {
  return `${percent}%.json`;
}

/** Write through a temp file in the same directory, then rename over the target */
async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

export class PartialCacheStore {
  private constructor(
    readonly documentId: string,
    readonly documentDir: string,
  ) {}

  static forDocument(cacheRoot: string, documentId: string): PartialCacheStore {
    return new PartialCacheStore(documentId, join(cacheRoot, documentKey(documentId)));
  }

  get mainPath(): string {
    return join(this.documentDir, MAIN_CACHE_FILE);
  }

  get snapshotDir(): string {
    return join(this.documentDir, SNAPSHOT_DIR);
  }

  snapshotPath(percent: number): string {
    return join(this.snapshotDir, snapshotFileName(percent));
  }

  /** Store a snapshot (or already-serialized content) in the slot for `percent` */
  async save(percent: number, snapshot: Snapshot | string): Promise<void> {
    assertPercent(percent);
    const content = typeof snapshot === 'string' ? snapshot : serializeSnapshot(snapshot);
    await writeFileAtomic(this.snapshotPath(percent), content);
    logger.debug({ documentId: this.documentId, percent }, 'Saved partial snapshot');
  }

  async get(percent: number): Promise<string | null> {
    assertPercent(percent);
    return readIfExists(this.snapshotPath(percent));
  }

  /** Percents with a stored slot, ascending */
  async list(): Promise<number[]> {
    let names: string[];
    try {
      names = await readdir(this.snapshotDir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const percents: number[] = [];
    for (const name of names) {
      const match = SNAPSHOT_FILE_PATTERN.exec(name);
      if (!match?.[1]) continue;
      const percent = Number.parseInt(match[1], 10);
      if (percent <= 100) percents.push(percent);
    }
    return percents.sort((a, b) => a - b);
  }

  /**
   * Highest stored percent at or below `target` whose content decodes to a
   * non-empty snapshot. Malformed, outdated and empty slots are skipped.
   */
  async nearestAtOrBelow(target: number): Promise<CacheCandidate | null> {
    assertPercent(target);
    const percents = (await this.list()).filter((p) => p <= target).reverse();

    for (const percent of percents) {
      const content = await this.get(percent);
      if (content === null) continue;

      try {
        const snapshot = parseSnapshot(content);
        if (isSnapshotEmpty(snapshot)) {
          logger.info({ documentId: this.documentId, percent }, 'Skipping empty cached snapshot');
          continue;
        }

        const { mtime } = await stat(this.snapshotPath(percent));
        return { percent, content, snapshot, modifiedAt: mtime };
      } catch (error) {
        if (!isAnalysisError(error)) throw error;
        logger.warn(
          { documentId: this.documentId, percent, kind: error.kind, error: error.message },
          'Skipping unusable cached snapshot',
        );
      }
    }

    return null;
  }

  /** Replace the consolidated snapshot, stamping `cachedAt` */
  async saveMain(snapshot: Snapshot): Promise<Snapshot> {
    const stamped: Snapshot = { ...snapshot, cachedAt: new Date().toISOString() };
    await writeFileAtomic(this.mainPath, serializeSnapshot(stamped));
    logger.debug(
      { documentId: this.documentId, progress: stamped.analysisProgress },
      'Saved main snapshot',
    );
    return stamped;
  }

  /** The consolidated snapshot, or null when missing, malformed or outdated */
  async loadMain(): Promise<Snapshot | null> {
    const content = await readIfExists(this.mainPath);
    if (content === null) return null;

    try {
      return parseSnapshot(content);
    } catch (error) {
      if (!isAnalysisError(error)) throw error;
      logger.warn(
        { documentId: this.documentId, kind: error.kind, error: error.message },
        'Ignoring unusable main snapshot',
      );
      return null;
    }
  }

  /**
   * Remove every slot and the main snapshot.
   * Succeeds when nothing existed or at least one file was removed.
   */
  async clear(): Promise<boolean> {
    const targets = (await this.list()).map((p) => this.snapshotPath(p));
    if ((await readIfExists(this.mainPath)) !== null) {
      targets.push(this.mainPath);
    }

    let removed = 0;
    for (const path of targets) {
      try {
        await rm(path);
        removed++;
      } catch (error) {
        logger.warn({ path, error: getErrorMessage(error) }, 'Failed to remove cache file');
      }
    }

    for (const dir of [this.snapshotDir, this.documentDir]) {
      try {
        await rmdir(dir);
      } catch (error) {
        // Leftover foreign files keep the directory; that is fine
        logger.debug({ dir, error: getErrorMessage(error) }, 'Cache directory not removed');
      }
    }

    logger.info({ documentId: this.documentId, removed, found: targets.length }, 'Cleared cache');
    return targets.length === 0 || removed > 0;
  }

  /**
   * Rewind the main snapshot to the best partial at or below the reading
   * position, so nothing past it stays current.
   */
  async contextualize(readingPercent: number): Promise<Snapshot | null> {
    const candidate = await this.nearestAtOrBelow(readingPercent);
    if (!candidate) {
      logger.info({ documentId: this.documentId, readingPercent }, 'No partial snapshot to rewind to');
      return null;
    }

    const main = await this.loadMain();
    if (main && main.analysisProgress === candidate.percent) {
      return main;
    }

    logger.info(
      { documentId: this.documentId, from: main?.analysisProgress ?? null, to: candidate.percent },
      'Rewinding main snapshot',
    );
    return this.saveMain({ ...candidate.snapshot, analysisProgress: candidate.percent });
  }
}
