/**
 * Mirror a document's cache files to and from a remote folder.
 * Files are moved as-is; their contents are never read here.
 */

import { access, mkdir } from 'node:fs/promises';
import { join, posix } from 'node:path';
import { MAIN_CACHE_FILE, SNAPSHOT_DIR } from '../../config/constants';
import { getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { type PartialCacheStore, documentKey, snapshotFileName } from '../cache';
import type { RemoteFile, RemoteSyncClient } from './remote.interface';

const REMOTE_SNAPSHOT_PATTERN = /^\d+%\.json$/;

export interface SyncSummary {
  succeeded: number;
  failed: number;
  errors: string[];
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function remoteFolder(remoteRoot: string, store: PartialCacheStore): string {
  return posix.join(remoteRoot, documentKey(store.documentId));
}

/** Run one transfer and count it. A 404 counts as neither when `missingIsOk`. */
async function transfer(
  summary: SyncSummary,
  label: string,
  action: () => Promise<number>,
  missingIsOk = false,
): Promise<number | null> {
  try {
    const status = await action();
    if (isSuccess(status)) {
      summary.succeeded++;
    } else if (!(missingIsOk && status === 404)) {
      summary.failed++;
      summary.errors.push(`${label}: status ${status}`);
    }
    return status;
  } catch (error) {
    summary.failed++;
    summary.errors.push(`${label}: ${getErrorMessage(error)}`);
    return null;
  }
}

export async function uploadDocumentCache(
  store: PartialCacheStore,
  client: RemoteSyncClient,
  remoteRoot: string,
): Promise<SyncSummary> {
  const summary: SyncSummary = { succeeded: 0, failed: 0, errors: [] };
  const folder = remoteFolder(remoteRoot, store);

  const uploads: Array<{ local: string; remote: string }> = [];
  if (await fileExists(store.mainPath)) {
    uploads.push({ local: store.mainPath, remote: posix.join(folder, MAIN_CACHE_FILE) });
  }
  for (const percent of await store.list()) {
    uploads.push({
      local: store.snapshotPath(percent),
      remote: posix.join(folder, SNAPSHOT_DIR, snapshotFileName(percent)),
    });
  }

  for (const { local, remote } of uploads) {
    await transfer(summary, remote, () => client.uploadFile(local, remote));
  }

  logger.info({ documentId: store.documentId, ...summary }, 'Uploaded cache');
  return summary;
}

export async function downloadDocumentCache(
  store: PartialCacheStore,
  client: RemoteSyncClient,
  remoteRoot: string,
): Promise<SyncSummary> {
  const summary: SyncSummary = { succeeded: 0, failed: 0, errors: [] };
  const folder = remoteFolder(remoteRoot, store);

  await mkdir(store.snapshotDir, { recursive: true });

  const mainRemote = posix.join(folder, MAIN_CACHE_FILE);
  const mainStatus = await transfer(
    summary,
    mainRemote,
    () => client.downloadFile(mainRemote, store.mainPath),
    true,
  );
  if (mainStatus === 404) {
    logger.debug({ documentId: store.documentId }, 'No remote main snapshot');
  }

  let remoteFiles: RemoteFile[] = [];
  try {
    remoteFiles = await client.listRemoteFiles(posix.join(folder, SNAPSHOT_DIR));
  } catch (error) {
    summary.failed++;
    summary.errors.push(`list ${folder}: ${getErrorMessage(error)}`);
  }

  for (const file of remoteFiles) {
    if (!REMOTE_SNAPSHOT_PATTERN.test(file.name)) continue;
    const local = join(store.snapshotDir, file.name);
    await transfer(summary, file.path, () => client.downloadFile(file.path, local));
  }

  logger.info({ documentId: store.documentId, ...summary }, 'Downloaded cache');
  return summary;
}
