import type {
  Character,
  ExtractedEvent,
  Extraction,
  HistoricalFigure,
  Location,
} from '../../types/analysis';
import { MalformedResponseError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { cleanText, generateEntityId } from './canonical';
import {
  mergeCharacters,
  mergeHistoricalFigures,
  mergeLocations,
  mergeThemes,
  nonEmpty,
} from './merger';
import {
  type RawLocations,
  rawCharacterSchema,
  rawExtractionSchema,
  rawHistoricalFigureSchema,
  rawLocationSchema,
  rawTimelineEventSchema,
} from './rawExtraction';

const DEFAULT_ROLE = 'Not specified';

/** Split "soldier / poet" or "soldier\poet" into separate occupations */
function parseOccupation(value: string[] | undefined): string[] {
  if (!value) return [];
  return value
    .flatMap((entry) => entry.split(/[/\\]/))
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function toCharacter(item: unknown): Character | null {
  const parsed = rawCharacterSchema.safeParse(item);
  if (!parsed.success) return null;

  const raw = parsed.data;
  const name = (raw.name ?? raw.Name ?? '').trim();
  if (!name) return null;

  return {
    id: generateEntityId('char', name),
    name,
    role: (raw.role ?? raw.Role ?? '').trim() || DEFAULT_ROLE,
    description: cleanText(raw.description ?? raw.desc),
    gender: raw.gender?.trim() || undefined,
    occupation: parseOccupation(raw.occupation),
  };
}

function toHistoricalFigure(item: unknown): HistoricalFigure | null {
  const parsed = rawHistoricalFigureSchema.safeParse(item);
  if (!parsed.success) return null;

  const raw = parsed.data;
  const name = (raw.name ?? raw.Name ?? '').trim();
  if (!name) return null;

  return {
    id: generateEntityId('hist', name),
    name,
    role: raw.role?.trim() ?? '',
    description: cleanText(raw.biography ?? raw.bio ?? raw.description),
    importance: cleanText(raw.importance_in_book ?? raw.importance) || undefined,
    context: cleanText(raw.context_in_book ?? raw.context) || undefined,
  };
}

function toLocation(item: unknown, fallbackName?: string): Location | null {
  const parsed = rawLocationSchema.safeParse(item);
  if (!parsed.success) return null;

  const raw = parsed.data;
  const name = (raw.name ?? fallbackName ?? '').trim();
  if (!name) return null;

  return {
    id: generateEntityId('loc', name),
    name,
    description: cleanText(raw.description ?? raw.desc),
    importance: cleanText(raw.importance),
  };
}

function toLocations(raw: RawLocations | undefined): Location[] {
  if (!raw) return [];

  switch (raw.kind) {
    case 'list':
      return raw.items.map((item) => toLocation(item)).filter((l): l is Location => l !== null);
    case 'map':
      logger.debug({ count: Object.keys(raw.entries).length }, 'Converting location map to list');
      return Object.entries(raw.entries)
        .map(([name, value]) =>
          typeof value === 'string'
            ? toLocation({ name, description: value })
            : toLocation(value, name),
        )
        .filter((l): l is Location => l !== null);
  }
}

function toThemes(items: unknown[] | undefined): string[] {
  if (!items) return [];
  const themes: string[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      themes.push(item);
    } else if (item && typeof item === 'object' && 'name' in item && typeof item.name === 'string') {
      themes.push(item.name);
    }
  }
  return themes;
}

function toTimelineEvent(item: unknown): ExtractedEvent | null {
  const parsed = rawTimelineEventSchema.safeParse(item);
  if (!parsed.success) return null;

  const raw = parsed.data;
  if (!raw.event && !raw.importance) return null;

  const percent = raw.book_position_pct ?? raw.percent;
  const characters = raw.characters?.map((c) => c.trim()).filter((c) => c.length > 0);

  return {
    sequence: raw.sequence !== undefined ? Math.trunc(raw.sequence) : undefined,
    event: cleanText(raw.event),
    chapter: raw.chapter?.trim() || undefined,
    importance: cleanText(raw.importance) || undefined,
    characters: nonEmpty(characters),
    percent: percent !== undefined ? Math.min(100, Math.max(0, Math.floor(percent))) : undefined,
  };
}

function compact<T>(items: Array<T | null>): T[] {
  return items.filter((item): item is T => item !== null);
}

/**
 * Resolve a provider's raw JSON into the canonical extraction shape.
 * Invalid items are dropped; duplicates inside one reply are merged.
 */
export function normalizeExtraction(raw: unknown): Extraction {
  const parsed = rawExtractionSchema.safeParse(raw);
  if (!parsed.success || Array.isArray(raw)) {
    throw new MalformedResponseError('Reply JSON is not an object');
  }

  const data = parsed.data;
  const characters = compact((data.characters ?? data.Characters ?? []).map(toCharacter));
  const historicalFigures = compact(
    (data.historical_figures ?? data.historicalFigures ?? []).map(toHistoricalFigure),
  );

  return {
    bookTitle: (data.book_title ?? data.title ?? data.bookTitle)?.trim() || undefined,
    author: (data.author ?? data.book_author)?.trim() || undefined,
    authorBio: cleanText(data.author_bio ?? data.AuthorBio ?? data.bio) || undefined,
    summary: cleanText(data.summary ?? data.book_summary) || undefined,
    characters: nonEmpty(mergeCharacters([], characters)),
    locations: nonEmpty(mergeLocations([], toLocations(data.locations))),
    historicalFigures: nonEmpty(mergeHistoricalFigures([], historicalFigures)),
    themes: nonEmpty(mergeThemes([], toThemes(data.themes))),
    timeline: nonEmpty(compact((data.timeline ?? []).map(toTimelineEvent))),
  };
}

export function emptyExtraction(): Extraction {
  return {};
}
