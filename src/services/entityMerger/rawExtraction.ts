/**
 * Schemas for the loosely-shaped JSON providers return.
 * Field names vary between prompts and models, and whole collections
 * sometimes arrive in a different form; each variant is resolved here once.
 */

import { z } from 'zod';

const looseString = z.preprocess(
  (value) => {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return undefined;
  },
  z.string().optional(),
);

const looseNumber = z.preprocess((value) => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}, z.number().optional());

const stringList = z
  .union([z.string(), z.array(z.unknown())])
  .optional()
  .catch(undefined)
  .transform((value): string[] | undefined => {
    if (value === undefined) return undefined;
    if (typeof value === 'string') return [value];
    return value.filter((item): item is string => typeof item === 'string');
  });

const looseList = z.array(z.unknown()).optional().catch(undefined);

export const rawCharacterSchema = z.object({
  name: looseString,
  Name: looseString,
  role: looseString,
  Role: looseString,
  description: looseString,
  desc: looseString,
  gender: looseString,
  occupation: stringList,
});

export const rawHistoricalFigureSchema = z.object({
  name: looseString,
  Name: looseString,
  biography: looseString,
  bio: looseString,
  description: looseString,
  role: looseString,
  importance_in_book: looseString,
  importance: looseString,
  context_in_book: looseString,
  context: looseString,
});

export const rawLocationSchema = z.object({
  name: looseString,
  description: looseString,
  desc: looseString,
  importance: looseString,
});

export const rawTimelineEventSchema = z.object({
  sequence: looseNumber,
  event: looseString,
  chapter: looseString,
  importance: looseString,
  characters: stringList,
  book_position_pct: looseNumber,
  percent: looseNumber,
});

/** Locations arrive either as `[{name, description}]` or `{name: description}` */
export const rawLocationsSchema = z
  .union([
    z.array(z.unknown()).transform((items) => ({ kind: 'list' as const, items })),
    z.record(z.unknown()).transform((entries) => ({ kind: 'map' as const, entries })),
  ])
  .optional()
  .catch(undefined);

export const rawExtractionSchema = z.object({
  book_title: looseString,
  title: looseString,
  bookTitle: looseString,
  author: looseString,
  book_author: looseString,
  author_bio: looseString,
  AuthorBio: looseString,
  bio: looseString,
  summary: looseString,
  book_summary: looseString,
  characters: looseList,
  Characters: looseList,
  historical_figures: looseList,
  historicalFigures: looseList,
  locations: rawLocationsSchema,
  themes: looseList,
  timeline: looseList,
});

export type RawExtraction = z.infer<typeof rawExtractionSchema>;
export type RawCharacter = z.infer<typeof rawCharacterSchema>;
export type RawHistoricalFigure = z.infer<typeof rawHistoricalFigureSchema>;
export type RawLocation = z.infer<typeof rawLocationSchema>;
export type RawTimelineEvent = z.infer<typeof rawTimelineEventSchema>;
export type RawLocations = NonNullable<z.infer<typeof rawLocationsSchema>>;
