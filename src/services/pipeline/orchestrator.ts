/**
 * Progressive analysis controller.
 *
 * Resolves where to start from cached or supplied progress, then feeds the
 * remaining text up to the reader's position through the provider one chunk
 * at a time, persisting a resumable snapshot after every chunk.
 */

import { setImmediate } from 'node:timers/promises';
import { DEFAULT_CHUNK_SIZE } from '../../config/constants';
import type { ProviderConfig } from '../../config/providers';
import { incrementalAnalysisPrompt, initialAnalysisPrompt } from '../../prompts/analysis';
import type { Snapshot } from '../../types/analysis';
import { isAnalysisError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { type PartialCacheStore, assertPercent } from '../cache';
import {
  type Chunk,
  type TextSource,
  alignForward,
  completePrefixLength,
  splitIntoChunks,
} from '../chunking';
import { createSnapshot, isSnapshotEmpty, mergeSnapshots } from '../entityMerger';
import { AnalysisTask, type TaskContext } from './task';
import type { AnalysisOutcome, AnalysisRequest, ExtractionClient } from './types';

export interface OrchestratorOptions {
  client: ExtractionClient;
  config: ProviderConfig;
  /** Omit to run without persistence */
  cache?: PartialCacheStore | null;
  chunkSize?: number;
}

interface StartPoint {
  percent: number;
  snapshot: Snapshot;
  /** Whether the snapshot carries earlier results to fall back on */
  carried: boolean;
}

/** Byte offset where `percent` of the document ends, on a codepoint boundary */
async function resolveTargetByte(source: TextSource, targetPercent: number): Promise<number> {
  const rawTarget = Math.floor((source.totalLength * targetPercent) / 100);
  if (rawTarget === 0) return 0;

  // A codepoint is at most 4 bytes, so the tail is enough to align
  const tailStart = Math.max(0, rawTarget - 4);
  const tail = await source.getText({ start: tailStart, end: rawTarget });
  return tailStart + completePrefixLength(tail);
}

/** Percent marker for a byte offset, prorated over the span the target covers */
export function percentMarker(cumulativeBytes: number, targetPercent: number, targetByte: number): number {
  if (targetByte === 0) return targetPercent;
  return Math.min(targetPercent, Math.floor((cumulativeBytes * targetPercent) / targetByte));
}

/** 0-based resume offset for a start percent, before codepoint alignment */
export function resumeOffset(startPercent: number, targetPercent: number, targetByte: number): number {
  if (targetPercent === 0) return targetByte;
  return Math.floor((targetByte * startPercent) / targetPercent);
}

export class AnalysisOrchestrator {
  private readonly chunkSize: number;

  constructor(private readonly options: OrchestratorOptions) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (this.chunkSize <= 0) {
      throw new RangeError(`chunkSize must be positive, got ${this.chunkSize}`);
    }
  }

  start(request: AnalysisRequest): AnalysisTask {
    assertPercent(request.targetPercent);

    const task = new AnalysisTask((context) => this.execute(request, context));

    const { signal } = request;
    if (signal) {
      if (signal.aborted) {
        task.abort();
      } else {
        const onAbort = () => task.abort();
        const detach = () => signal.removeEventListener('abort', onAbort);
        signal.addEventListener('abort', onAbort, { once: true });
        task.result.then(detach, detach);
      }
    }

    return task;
  }

  run(request: AnalysisRequest): Promise<AnalysisOutcome> {
    return this.start(request).result;
  }

  private async resolveStart(request: AnalysisRequest): Promise<StartPoint> {
    const { targetPercent, existingSnapshot } = request;
    let start: StartPoint = {
      percent: 0,
      snapshot: createSnapshot(request.bookTitle, request.author),
      carried: false,
    };

    if (existingSnapshot) {
      if (existingSnapshot.analysisProgress > targetPercent) {
        logger.warn(
          { progress: existingSnapshot.analysisProgress, targetPercent },
          'Ignoring supplied snapshot beyond the target',
        );
      } else {
        start = {
          percent: existingSnapshot.analysisProgress,
          snapshot: existingSnapshot,
          carried: true,
        };
      }
    }

    const { cache } = this.options;
    if (cache && targetPercent > 0) {
      const candidate = await cache.nearestAtOrBelow(targetPercent - 1);
      if (candidate && candidate.percent > start.percent) {
        logger.info(
          { documentId: cache.documentId, percent: candidate.percent, targetPercent },
          'Resuming from cached snapshot',
        );
        start = {
          percent: candidate.percent,
          snapshot: { ...candidate.snapshot, analysisProgress: candidate.percent },
          carried: true,
        };
      }
    }

    return start;
  }

  private buildPrompt(snapshot: Snapshot, chunk: Chunk, percent: number): string {
    if (isSnapshotEmpty(snapshot) && !snapshot.summary) {
      return initialAnalysisPrompt.build({
        bookTitle: snapshot.bookTitle,
        author: snapshot.author,
        text: chunk.text,
        percent,
      });
    }
    return incrementalAnalysisPrompt.build({ snapshot, text: chunk.text, percent });
  }

  private async complete(
    snapshot: Snapshot,
    targetPercent: number,
    context: TaskContext,
  ): Promise<AnalysisOutcome> {
    let final: Snapshot = { ...snapshot, analysisProgress: targetPercent };

    const { cache } = this.options;
    if (cache) {
      context.setState('persisting');
      await cache.save(targetPercent, final);
      final = await cache.saveMain(final);
    }

    context.setState('completed');
    logger.info(
      {
        targetPercent,
        characters: final.characters?.length ?? 0,
        events: final.timeline?.length ?? 0,
      },
      'Analysis completed',
    );
    return { status: 'completed', snapshot: final };
  }

  private async execute(request: AnalysisRequest, context: TaskContext): Promise<AnalysisOutcome> {
    const { source, targetPercent, onProgress } = request;
    const { client, config, cache } = this.options;

    context.setState('resolving');
    const start = await this.resolveStart(request);

    const targetByte = await resolveTargetByte(source, targetPercent);
    const startByte = resumeOffset(start.percent, targetPercent, targetByte);

    if (startByte >= targetByte) {
      logger.info({ startPercent: start.percent, targetPercent }, 'Target already covered');
      return this.complete(start.snapshot, targetPercent, context);
    }

    const span = await source.getText({ start: startByte, end: targetByte });
    const offset = alignForward(span, 0);
    const chunks = splitIntoChunks(span, offset, span.length, this.chunkSize).map((chunk) => ({
      ...chunk,
      start: chunk.start + startByte,
      end: chunk.end + startByte,
    }));

    logger.info(
      {
        totalLength: source.totalLength,
        startPercent: start.percent,
        targetPercent,
        startByte: startByte + offset,
        targetByte,
        chunks: chunks.length,
      },
      'Starting progressive analysis',
    );

    let snapshot = start.snapshot;
    let hasPrior = start.carried;

    for (const chunk of chunks) {
      const progressEvent = {
        chunkIndex: chunk.index,
        totalChunks: chunks.length,
        start: chunk.start,
        end: chunk.end,
      };

      if (!context.signal.aborted) {
        context.reportProgress(progressEvent);
        if (onProgress?.(progressEvent) === 'abort') {
          logger.info({ chunkIndex: chunk.index }, 'Progress callback requested abort');
          return this.abort(hasPrior ? snapshot : null, context);
        }
      }
      if (context.signal.aborted) {
        return this.abort(hasPrior ? snapshot : null, context);
      }

      context.setState('processing');
      const marker = percentMarker(chunk.end, targetPercent, targetByte);

      if (chunk.text.trim().length === 0) {
        logger.debug({ chunkIndex: chunk.index }, 'Skipping blank chunk');
        continue;
      }

      try {
        const extraction = await client.analyze(this.buildPrompt(snapshot, chunk, marker), config);
        snapshot = {
          ...mergeSnapshots(snapshot, extraction, { percent: marker }),
          analysisProgress: marker,
        };
        hasPrior = true;
      } catch (error) {
        if (!isAnalysisError(error)) throw error;

        if (hasPrior) {
          logger.warn(
            { chunkIndex: chunk.index, kind: error.kind, error: error.message, progress: snapshot.analysisProgress },
            'Chunk failed, keeping last good snapshot',
          );
          // The target partial is not written, so the failed range is retried next time
          if (cache) {
            context.setState('persisting');
            snapshot = await cache.saveMain(snapshot);
          }
          context.setState('completed');
          return { status: 'completed', snapshot, degradedBy: error };
        }

        logger.error({ chunkIndex: chunk.index, kind: error.kind, error: error.message }, 'Analysis failed');
        context.setState('failed');
        return { status: 'failed', error };
      }

      if (cache) {
        context.setState('persisting');
        await cache.save(marker, snapshot);
      }
      logger.debug({ chunkIndex: chunk.index, of: chunks.length, marker }, 'Chunk processed');

      await setImmediate();
    }

    return this.complete(snapshot, targetPercent, context);
  }

  private abort(snapshot: Snapshot | null, context: TaskContext): AnalysisOutcome {
    context.setState('aborted');
    logger.info({ progress: snapshot?.analysisProgress ?? null }, 'Analysis aborted');
    return { status: 'aborted', snapshot };
  }
}
