import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { PartialCacheStore } from '../../services/cache';
import { defaultDocumentId, requestAnalysis } from '../../services/analysisService';
import type { ExtractionClient } from '../../services/pipeline';
import { createTempDir, localConfig, makeCharacter, removeTempDir } from '../helpers/fixtures';

describe('requestAnalysis', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test('analyzes a string source and caches under the document id', async () => {
    const client = { analyze: vi.fn<ExtractionClient['analyze']>().mockResolvedValue({ characters: [makeCharacter('Ann')] }) };

    const outcome = await requestAnalysis('Book', 'Writer', 'Once upon a time.'.repeat(10), 50, null, {
      documentId: 'doc-7',
      config: localConfig,
      client,
      cacheRoot: root,
    });

    expect(outcome.status).toBe('completed');
    const store = PartialCacheStore.forDocument(root, 'doc-7');
    expect((await store.loadMain())?.analysisProgress).toBe(50);
    expect(await store.list()).toEqual([50]);
  });

  test('runs without a cache when cacheRoot is null', async () => {
    const client = { analyze: vi.fn<ExtractionClient['analyze']>().mockResolvedValue({}) };

    const outcome = await requestAnalysis('Book', 'Writer', 'Some text here.', 100, null, {
      config: localConfig,
      client,
      cacheRoot: null,
    });

    expect(outcome).toMatchObject({ status: 'completed', snapshot: { bookTitle: 'Book', analysisProgress: 100 } });
  });

  test('derives a document id from author and title', () => {
    expect(defaultDocumentId('Book', 'Writer')).toBe('Writer - Book');
    expect(defaultDocumentId('', '')).toBe('unknown - untitled');
  });
});
