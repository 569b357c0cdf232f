/**
 * Deterministic, order-preserving merge of extracted entities into a snapshot.
 *
 * Records with equal canonical names are the same entity. The first
 * occurrence fixes the position and id; later occurrences refine it.
 */

import { SNAPSHOT_VERSION } from '../../config/constants';
import type {
  Character,
  EntityRecord,
  Extraction,
  HistoricalFigure,
  Location,
  Snapshot,
  TimelineEvent,
} from '../../types/analysis';
import { logger } from '../../utils/logger';
import { canonicalName, cleanText, displayLength, isPlaceholderRole } from './canonical';

/** Characters of a new description that must already appear for it to count as a repeat */
const DUPLICATE_PREFIX_LENGTH = 50;

type Refine<T extends EntityRecord> = (existing: T, incoming: T) => T;

export function mergeDescriptions(existing: string, incoming: string): string {
  const next = cleanText(incoming);
  if (next.length === 0) return existing;

  const prefix = Array.from(next).slice(0, DUPLICATE_PREFIX_LENGTH).join('');
  if (existing.includes(prefix)) return existing;

  return cleanText(`${existing} ${next}`);
}

export function mergeOccupations(existing: string[], incoming: string[]): string[] {
  const merged = [...existing];
  const seen = new Set(existing.map((o) => o.toLowerCase()));
  for (const occupation of incoming) {
    const key = occupation.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      merged.push(occupation);
    }
  }
  return merged;
}

function mergeRecord<T extends EntityRecord>(existing: T, incoming: T): T {
  const name =
    incoming.name.length > 0 && displayLength(incoming.name) < displayLength(existing.name)
      ? incoming.name
      : existing.name;

  return {
    ...existing,
    name,
    description: mergeDescriptions(existing.description, incoming.description),
  };
}

const refineCharacter: Refine<Character> = (existing, incoming) => ({
  ...mergeRecord(existing, incoming),
  role:
    isPlaceholderRole(existing.role) && !isPlaceholderRole(incoming.role)
      ? incoming.role
      : existing.role,
  gender: existing.gender || incoming.gender,
  occupation: mergeOccupations(existing.occupation, incoming.occupation),
});

const refineLocation: Refine<Location> = (existing, incoming) => ({
  ...mergeRecord(existing, incoming),
  importance: existing.importance || incoming.importance,
});

const refineHistoricalFigure: Refine<HistoricalFigure> = (existing, incoming) => ({
  ...mergeRecord(existing, incoming),
  role:
    isPlaceholderRole(existing.role) && !isPlaceholderRole(incoming.role)
      ? incoming.role
      : existing.role,
  importance: existing.importance || incoming.importance,
  context: existing.context || incoming.context,
});

function mergeEntityList<T extends EntityRecord>(
  existing: readonly T[],
  incoming: readonly T[],
  refine: Refine<T>,
  kind: string,
): T[] {
  const byCanonical = new Map<string, T>();

  for (const record of [...existing, ...incoming]) {
    const key = canonicalName(record.name);
    if (key.length === 0) continue;

    const current = byCanonical.get(key);
    if (current) {
      byCanonical.set(key, refine(current, record));
      logger.debug({ kind, name: record.name, into: current.name }, 'Merged duplicate entity');
    } else {
      byCanonical.set(key, record);
    }
  }

  // Map preserves first-insertion order
  return Array.from(byCanonical.values());
}

export function mergeCharacters(existing: readonly Character[], incoming: readonly Character[]) {
  return mergeEntityList(existing, incoming, refineCharacter, 'character');
}

export function mergeLocations(existing: readonly Location[], incoming: readonly Location[]) {
  return mergeEntityList(existing, incoming, refineLocation, 'location');
}

export function mergeHistoricalFigures(
  existing: readonly HistoricalFigure[],
  incoming: readonly HistoricalFigure[],
) {
  return mergeEntityList(existing, incoming, refineHistoricalFigure, 'historical');
}

export function mergeThemes(existing: readonly string[], incoming: readonly string[]): string[] {
  const themes = new Set<string>();
  for (const theme of [...existing, ...incoming]) {
    const trimmed = theme.trim();
    if (trimmed.length > 0) themes.add(trimmed);
  }
  return Array.from(themes);
}

/** Empty collections collapse to absent so serialized snapshots stay compact */
export function nonEmpty<T>(list: T[] | undefined): T[] | undefined {
  return list && list.length > 0 ? list : undefined;
}

export function createSnapshot(bookTitle: string, author: string): Snapshot {
  return {
    version: SNAPSHOT_VERSION,
    bookTitle,
    author,
    analysisProgress: 0,
  };
}

/** True when no characters, locations, themes or events are present */
export function isSnapshotEmpty(snapshot: Pick<Snapshot, 'characters' | 'locations' | 'themes' | 'timeline'>): boolean {
  return (
    !snapshot.characters?.length &&
    !snapshot.locations?.length &&
    !snapshot.themes?.length &&
    !snapshot.timeline?.length
  );
}

export interface MergeOptions {
  /** Percent marker stamped on events that carry none */
  percent?: number;
}

/**
 * Fold one chunk's extraction into the running snapshot.
 * Inputs are not mutated; merging an empty extraction returns an equal snapshot.
 */
export function mergeSnapshots(
  snapshot: Snapshot,
  extraction: Extraction,
  options: MergeOptions = {},
): Snapshot {
  const existingTimeline = snapshot.timeline ?? [];
  const appended: TimelineEvent[] = (extraction.timeline ?? []).map((event, i) => ({
    ...event,
    sequence: event.sequence ?? existingTimeline.length + i + 1,
    percent: event.percent ?? options.percent,
  }));

  return {
    ...snapshot,
    bookTitle: snapshot.bookTitle || extraction.bookTitle || '',
    author: snapshot.author || extraction.author || '',
    authorBio: extraction.authorBio || snapshot.authorBio,
    summary: extraction.summary || snapshot.summary,
    characters: nonEmpty(mergeCharacters(snapshot.characters ?? [], extraction.characters ?? [])),
    locations: nonEmpty(mergeLocations(snapshot.locations ?? [], extraction.locations ?? [])),
    historicalFigures: nonEmpty(
      mergeHistoricalFigures(snapshot.historicalFigures ?? [], extraction.historicalFigures ?? []),
    ),
    themes: nonEmpty(mergeThemes(snapshot.themes ?? [], extraction.themes ?? [])),
    timeline: nonEmpty([...existingTimeline, ...appended]),
  };
}
