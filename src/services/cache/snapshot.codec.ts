/**
 * Serialized snapshot format.
 */

import { z } from 'zod';
import { SNAPSHOT_VERSION } from '../../config/constants';
import type { Snapshot } from '../../types/analysis';
import { CacheVersionMismatchError, InvalidCacheContentError } from '../../utils/errors';

const entitySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
});

const characterSchema = entitySchema.extend({
  role: z.string(),
  gender: z.string().optional(),
  occupation: z.array(z.string()),
});

const locationSchema = entitySchema.extend({
  importance: z.string(),
});

const historicalFigureSchema = entitySchema.extend({
  role: z.string(),
  importance: z.string().optional(),
  context: z.string().optional(),
});

const timelineEventSchema = z.object({
  sequence: z.number(),
  event: z.string(),
  chapter: z.string().optional(),
  importance: z.string().optional(),
  characters: z.array(z.string()).optional(),
  percent: z.number().optional(),
});

export const snapshotSchema: z.ZodType<Snapshot> = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  bookTitle: z.string(),
  author: z.string(),
  authorBio: z.string().optional(),
  summary: z.string().optional(),
  characters: z.array(characterSchema).optional(),
  locations: z.array(locationSchema).optional(),
  themes: z.array(z.string()).optional(),
  historicalFigures: z.array(historicalFigureSchema).optional(),
  timeline: z.array(timelineEventSchema).optional(),
  analysisProgress: z.number().min(0).max(100),
  cachedAt: z.string().optional(),
});

const versionProbeSchema = z.object({ version: z.unknown() });

export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

/**
 * Decode stored snapshot content.
 * Throws CacheVersionMismatchError or InvalidCacheContentError.
 */
export function parseSnapshot(content: string): Snapshot {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new InvalidCacheContentError('Cached snapshot is not valid JSON');
  }

  const probe = versionProbeSchema.safeParse(data);
  if (!probe.success) {
    throw new InvalidCacheContentError('Cached snapshot is not an object');
  }
  if (probe.data.version !== SNAPSHOT_VERSION) {
    throw new CacheVersionMismatchError(probe.data.version, SNAPSHOT_VERSION);
  }

  const parsed = snapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidCacheContentError(
      `Cached snapshot failed validation at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`,
    );
  }
  return parsed.data;
}
