/**
 * Caller-facing entry point: wires configuration, provider client and the
 * document's cache store into one orchestrated run.
 */

import { env } from '../config/env';
import { type ProviderConfig, type ProviderKind, loadProviderConfig } from '../config/providers';
import type { Snapshot } from '../types/analysis';
import { PartialCacheStore } from './cache';
import { SourceText, type TextSource } from './chunking';
import {
  type AnalysisOutcome,
  AnalysisOrchestrator,
  type AnalysisTask,
  type ExtractionClient,
  type ProgressDecision,
  type ProgressEvent,
} from './pipeline';
import { ProviderClient } from './providers';

export interface RequestAnalysisOptions {
  /** Cache identity; defaults to "<author> - <title>" */
  documentId?: string;
  provider?: ProviderKind;
  config?: ProviderConfig;
  client?: ExtractionClient;
  /** Root directory for cached snapshots; `null` disables caching */
  cacheRoot?: string | null;
  chunkSize?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => ProgressDecision | void;
}

export function defaultDocumentId(title: string, author: string): string {
  return `${author || 'unknown'} - ${title || 'untitled'}`;
}

/** Start an analysis and return its task handle */
export function startAnalysis(
  title: string,
  author: string,
  source: TextSource | string,
  targetPercent: number,
  existingSnapshot?: Snapshot | null,
  options: RequestAnalysisOptions = {},
): AnalysisTask {
  const cacheRoot = options.cacheRoot === undefined ? env.ANALYSIS_CACHE_DIR : options.cacheRoot;
  const cache =
    cacheRoot === null
      ? null
      : PartialCacheStore.forDocument(cacheRoot, options.documentId ?? defaultDocumentId(title, author));

  const orchestrator = new AnalysisOrchestrator({
    client: options.client ?? new ProviderClient(),
    config: options.config ?? loadProviderConfig(options.provider),
    cache,
    chunkSize: options.chunkSize ?? env.CHUNK_SIZE_BYTES,
  });

  return orchestrator.start({
    bookTitle: title,
    author,
    source: typeof source === 'string' ? SourceText.fromString(source) : source,
    targetPercent,
    existingSnapshot,
    signal: options.signal,
    onProgress: options.onProgress,
  });
}

/**
 * Analyze `source` up to `targetPercent`, resuming from whatever the cache
 * or `existingSnapshot` already covers.
 */
export function requestAnalysis(
  title: string,
  author: string,
  source: TextSource | string,
  targetPercent: number,
  existingSnapshot?: Snapshot | null,
  options: RequestAnalysisOptions = {},
): Promise<AnalysisOutcome> {
  return startAnalysis(title, author, source, targetPercent, existingSnapshot, options).result;
}
