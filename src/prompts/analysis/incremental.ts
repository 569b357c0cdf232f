import type { Snapshot } from '../../types/analysis';
import type { PromptDefinition } from '../types';
import { RESPONSE_SHAPE, SPOILER_RULES } from './shared';

export interface IncrementalAnalysisInput {
  snapshot: Snapshot;
  text: string;
  percent: number;
}

/** Compact view of what is already known, sent as context */
function describeKnown(snapshot: Snapshot): string {
  return JSON.stringify({
    summary: snapshot.summary ?? '',
    characters: (snapshot.characters ?? []).map((c) => ({ name: c.name, role: c.role })),
    locations: (snapshot.locations ?? []).map((l) => l.name),
    themes: snapshot.themes ?? [],
    historical_figures: (snapshot.historicalFigures ?? []).map((h) => h.name),
    last_event_sequence: snapshot.timeline?.at(-1)?.sequence ?? 0,
  });
}

export const incrementalAnalysisPrompt: PromptDefinition<IncrementalAnalysisInput> = {
  id: 'analysis-incremental',
  version: 1,
  description: 'Extract only what a new passage adds to an existing analysis',

  build: ({ snapshot, text, percent }) => `Continue the analysis of "${snapshot.bookTitle || 'Unknown title'}" by ${snapshot.author || 'an unknown author'}.
The reader has now read ${percent}% of the book. Below is what is already known, followed by the NEW passage they just read.

${SPOILER_RULES}
6. Return only characters, locations, themes and historical figures that are new in this passage, or whose description the passage adds to.
7. Return only timeline events that happen in this passage. Do not repeat known events.
8. "summary" must be an updated summary of the whole story so far, not only the new passage.

Return JSON in exactly this shape:
${RESPONSE_SHAPE}

ALREADY KNOWN:
${describeKnown(snapshot)}

NEW PASSAGE:
${text}`,
};
