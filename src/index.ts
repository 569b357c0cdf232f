export { type ProviderConfig, type ProviderKind, loadProviderConfig } from './config/providers';
export {
  type RequestAnalysisOptions,
  defaultDocumentId,
  requestAnalysis,
  startAnalysis,
} from './services/analysisService';
export { type CacheCandidate, PartialCacheStore } from './services/cache';
export { type ByteRange, type Chunk, SourceText, type TextSource, splitIntoChunks } from './services/chunking';
export { canonicalName, mergeSnapshots, normalizeExtraction } from './services/entityMerger';
export {
  type AnalysisOutcome,
  AnalysisOrchestrator,
  type AnalysisRequest,
  type AnalysisState,
  AnalysisTask,
  type ExtractionClient,
  type ProgressEvent,
} from './services/pipeline';
export { ProviderClient, parseResponse, type VerifyResult } from './services/providers';
export {
  downloadDocumentCache,
  type RemoteFile,
  type RemoteSyncClient,
  type SyncSummary,
  uploadDocumentCache,
} from './services/sync';
export type * from './types/analysis';
export * from './utils/errors';
