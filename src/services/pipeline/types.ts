import type { TextSource } from '../chunking';
import type { ProviderConfig } from '../../config/providers';
import type { Extraction, Snapshot } from '../../types/analysis';
import type { AnalysisError } from '../../utils/errors';

export interface ProgressEvent {
  /** 1-based */
  chunkIndex: number;
  totalChunks: number;
  /** Absolute byte range of the chunk about to be sent */
  start: number;
  end: number;
}

export type ProgressDecision = 'continue' | 'abort';

export interface AnalysisRequest {
  bookTitle: string;
  author: string;
  source: TextSource;
  /** Whole number, 0-100 */
  targetPercent: number;
  existingSnapshot?: Snapshot | null;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => ProgressDecision | void;
}

export type AnalysisOutcome =
  | { status: 'completed'; snapshot: Snapshot; degradedBy?: AnalysisError }
  | { status: 'aborted'; snapshot: Snapshot | null }
  | { status: 'failed'; error: AnalysisError };

/** Anything that turns a prompt into an extraction */
export interface ExtractionClient {
  analyze(prompt: string, config: ProviderConfig): Promise<Extraction>;
}
