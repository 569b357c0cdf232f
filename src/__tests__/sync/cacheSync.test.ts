import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { PartialCacheStore } from '../../services/cache';
import { downloadDocumentCache, uploadDocumentCache } from '../../services/sync';
import { createTempDir, makeSnapshot, removeTempDir } from '../helpers/fixtures';
import { MemoryRemote } from '../helpers/memoryRemote';

describe('cache sync', () => {
  let root: string;
  let store: PartialCacheStore;
  let remote: MemoryRemote;

  beforeEach(async () => {
    root = await createTempDir();
    store = PartialCacheStore.forDocument(root, 'book-1');
    remote = new MemoryRemote();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('uploadDocumentCache', () => {
    test('uploads the main snapshot and every partial', async () => {
      await store.save(10, makeSnapshot(10));
      await store.save(20, makeSnapshot(20));
      await store.saveMain(makeSnapshot(20));

      const summary = await uploadDocumentCache(store, remote, 'remote');

      expect(summary).toEqual({ succeeded: 3, failed: 0, errors: [] });
      expect(Array.from(remote.files.keys()).sort()).toEqual([
        'remote/book-1/analysis.json',
        'remote/book-1/snapshots/10%.json',
        'remote/book-1/snapshots/20%.json',
      ]);
    });

    test('counts non-2xx statuses as failures', async () => {
      await store.save(10, makeSnapshot(10));
      await store.save(20, makeSnapshot(20));
      remote.statusFor = (path) => (path.endsWith('20%.json') ? 500 : undefined);

      const summary = await uploadDocumentCache(store, remote, 'remote');

      expect(summary).toEqual({
        succeeded: 1,
        failed: 1,
        errors: ['remote/book-1/snapshots/20%.json: status 500'],
      });
    });
  });

  describe('downloadDocumentCache', () => {
    test('downloads partials and treats a missing main snapshot as nothing to do', async () => {
      remote.files.set('remote/book-1/snapshots/10%.json', JSON.stringify(makeSnapshot(10)));
      remote.files.set('remote/book-1/snapshots/30%.json', JSON.stringify(makeSnapshot(30)));
      remote.files.set('remote/book-1/snapshots/notes.txt', 'ignored');

      const summary = await downloadDocumentCache(store, remote, 'remote');

      expect(summary).toEqual({ succeeded: 2, failed: 0, errors: [] });
      expect(await store.list()).toEqual([10, 30]);
      expect(await store.loadMain()).toBeNull();
    });

    test('round-trips a cache through the remote', async () => {
      await store.save(10, makeSnapshot(10));
      await store.saveMain(makeSnapshot(10));
      await uploadDocumentCache(store, remote, 'remote');

      const copyRoot = await createTempDir();
      const copy = PartialCacheStore.forDocument(copyRoot, 'book-1');
      try {
        const summary = await downloadDocumentCache(copy, remote, 'remote');

        expect(summary.succeeded).toBe(2);
        expect(await copy.get(10)).toBe(await store.get(10));
        expect(await copy.loadMain()).toEqual(await store.loadMain());
      } finally {
        await removeTempDir(copyRoot);
      }
    });

    test('counts transfer errors', async () => {
      remote.files.set('remote/book-1/snapshots/10%.json', '{}');
      remote.statusFor = (path) => (path.endsWith('10%.json') ? 503 : undefined);

      const summary = await downloadDocumentCache(store, remote, 'remote');

      expect(summary).toEqual({
        succeeded: 0,
        failed: 1,
        errors: ['remote/book-1/snapshots/10%.json: status 503'],
      });
    });
  });
});
