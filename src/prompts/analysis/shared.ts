export const SYSTEM_INSTRUCTION =
  'You are an expert literary critic. Respond with a single valid JSON object and nothing else.';

export const RESPONSE_SHAPE = `{
  "book_title": "string",
  "author": "string",
  "author_bio": "short biography of the author",
  "summary": "summary of the story so far",
  "characters": [
    { "name": "string", "role": "string", "gender": "string", "occupation": ["string"], "description": "string" }
  ],
  "locations": [
    { "name": "string", "description": "string", "importance": "string" }
  ],
  "themes": ["string"],
  "timeline": [
    { "sequence": 1, "event": "string", "chapter": "string", "importance": "string", "characters": ["string"], "book_position_pct": 0 }
  ],
  "historical_figures": [
    { "name": "string", "biography": "string", "role": "string", "importance_in_book": "string", "context_in_book": "string" }
  ]
}`;

export const SPOILER_RULES = `RULES:
1. Use ONLY the passage provided. Do not use outside knowledge of this book's plot, even if you recognize it.
2. Never mention events, deaths, twists or reveals that are not in the passage.
3. Descriptions are plain text: no markdown, no headings, no line breaks.
4. Leave a role as "Not specified" when the passage does not establish it.
5. book_position_pct is the approximate position of the event in the whole book, 0-100.`;
