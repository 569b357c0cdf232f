/**
 * Canonical narrative metadata shapes.
 * Raw provider JSON never leaves the entity merger; everything else sees these.
 */

import type { SNAPSHOT_VERSION } from '../config/constants';

export type EntityKind = 'character' | 'location' | 'historical';

export interface EntityRecord {
  id: string;
  name: string;
  description: string;
}

export interface Character extends EntityRecord {
  role: string;
  gender?: string;
  occupation: string[];
}

export interface Location extends EntityRecord {
  importance: string;
}

export interface HistoricalFigure extends EntityRecord {
  role: string;
  importance?: string;
  context?: string;
}

export interface TimelineEvent {
  sequence: number;
  event: string;
  chapter?: string;
  importance?: string;
  characters?: string[];
  /** Position within the source text, 0-100 */
  percent?: number;
}

/** A timeline event as extracted from one chunk, before sequencing */
export type ExtractedEvent = Omit<TimelineEvent, 'sequence'> & { sequence?: number };

interface NarrativeFields {
  bookTitle?: string;
  author?: string;
  authorBio?: string;
  summary?: string;
  characters?: Character[];
  locations?: Location[];
  themes?: string[];
  historicalFigures?: HistoricalFigure[];
}

/**
 * Result of one provider call, already normalized.
 * Empty collections are left undefined.
 */
export interface Extraction extends NarrativeFields {
  timeline?: ExtractedEvent[];
}

export interface Snapshot extends NarrativeFields {
  version: typeof SNAPSHOT_VERSION;
  bookTitle: string;
  author: string;
  timeline?: TimelineEvent[];
  /** How far into the source text this snapshot reaches, 0-100 */
  analysisProgress: number;
  cachedAt?: string;
}
