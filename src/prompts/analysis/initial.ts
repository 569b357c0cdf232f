import type { PromptDefinition } from '../types';
import { RESPONSE_SHAPE, SPOILER_RULES } from './shared';

export interface InitialAnalysisInput {
  bookTitle: string;
  author: string;
  text: string;
  /** How far into the book the passage ends, 0-100 */
  percent: number;
}

export const initialAnalysisPrompt: PromptDefinition<InitialAnalysisInput> = {
  id: 'analysis-initial',
  version: 1,
  description: 'Extract characters, locations, themes, timeline and historical figures from the opening passage',

  build: ({ bookTitle, author, text, percent }) => `Analyze the opening of "${bookTitle || 'Unknown title'}" by ${author || 'an unknown author'}.
The reader has read ${percent}% of the book. The passage below is everything they have read so far.

${SPOILER_RULES}

Return JSON in exactly this shape:
${RESPONSE_SHAPE}

PASSAGE:
${text}`,
};
