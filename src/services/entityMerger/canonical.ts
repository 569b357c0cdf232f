/**
 * Name and text normalization shared by every entity kind.
 */

import { createHash } from 'node:crypto';

const OPENERS = new Set(['(', '（']);
const CLOSERS = new Set([')', '）']);

const PLACEHOLDER_ROLES = new Set(['', 'not specified', 'unspecified', 'unknown', '未指定']);

/** Remove bracketed asides, nested ones included. An unmatched `(` drops the rest. */
function stripParentheticals(name: string): string {
  let depth = 0;
  let result = '';
  for (const char of name) {
    if (OPENERS.has(char)) {
      depth++;
    } else if (CLOSERS.has(char) && depth > 0) {
      depth--;
    } else if (depth === 0) {
      result += char;
    }
  }
  return result;
}

function foldName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Identity key for deduplication: parentheticals removed, lowercased,
 * trimmed, internal whitespace collapsed. A name that is nothing but a
 * parenthetical keeps it.
 */
export function canonicalName(name: string): string {
  return foldName(stripParentheticals(name)) || foldName(name);
}

/**
 * Strip markdown emphasis and headers, flatten newlines (real and escaped),
 * collapse whitespace.
 */
export function cleanText(text: string | undefined): string {
  if (!text) return '';
  return text
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/__(.+?)__/g, '$1')
    .replace(/^\s*#{1,6}\s+/gm, '')
    .replace(/#{2,}\s/g, '')
    .replace(/\\n/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Stable id: prefix plus the first 8 hex chars of the display name's md5.
 */
export function generateEntityId(prefix: string, name: string): string {
  if (!name) return `${prefix}_unknown`;
  const hash = createHash('md5').update(name, 'utf8').digest('hex');
  return `${prefix}_${hash.slice(0, 8)}`;
}

export function isPlaceholderRole(role: string | undefined): boolean {
  return PLACEHOLDER_ROLES.has((role ?? '').trim().toLowerCase());
}

/** Length in codepoints, so CJK and accented names compare fairly */
export function displayLength(text: string): number {
  return Array.from(text).length;
}
