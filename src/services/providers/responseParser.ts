/**
 * Pulls the JSON object out of a provider's text reply.
 */

import { MalformedResponseError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const CODE_FENCE = /```(?:json|JSON)?/g;

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export function parseResponse(raw: string): unknown {
  const cleaned = raw.replace(CODE_FENCE, '').trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  const first = cleaned.indexOf('{');
  const last = cleaned.lastIndexOf('}');
  if (first !== -1 && last > first) {
    const embedded = tryParse(cleaned.slice(first, last + 1));
    if (embedded.ok) {
      logger.debug({ offset: first }, 'Recovered JSON object from surrounding prose');
      return embedded.value;
    }
  }

  logger.warn({ length: raw.length, preview: raw.slice(0, 200) }, 'Reply is not valid JSON');
  throw new MalformedResponseError();
}
