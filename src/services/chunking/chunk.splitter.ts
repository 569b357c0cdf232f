/**
 * Pure functions for cutting UTF-8 byte ranges into provider-sized chunks.
 * No side effects, no I/O.
 */

import { DEFAULT_CHUNK_SIZE } from '../../config/constants';
import type { Chunk } from './chunk.types';

// 0x00-0x08, 0x0B-0x0C, 0x0E-0x1F; tab, LF and CR survive
const CONTROL_CHAR_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;
const REPLACEMENT_CHAR_PATTERN = /\uFFFD/g;

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lossyDecoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

export function isContinuationByte(byte: number): boolean {
  return byte >= 0x80 && byte <= 0xbf;
}

/**
 * Move `position` backward until it sits on a lead byte or ASCII byte.
 * Never moves below `floor`.
 */
export function alignBackward(bytes: Uint8Array, position: number, floor = 0): number {
  let aligned = Math.min(position, bytes.length);
  while (aligned > floor && aligned < bytes.length && isContinuationByte(bytes[aligned])) {
    aligned--;
  }
  return aligned;
}

/**
 * Move `position` forward past continuation bytes.
 * Never moves beyond `ceiling`.
 */
export function alignForward(bytes: Uint8Array, position: number, ceiling = bytes.length): number {
  let aligned = Math.max(position, 0);
  while (aligned < ceiling && isContinuationByte(bytes[aligned])) {
    aligned++;
  }
  return aligned;
}

function sequenceLength(leadByte: number): number {
  if (leadByte >= 0xf0) return 4;
  if (leadByte >= 0xe0) return 3;
  if (leadByte >= 0xc0) return 2;
  return 1;
}

/**
 * Length of the longest prefix of `bytes` that ends on a complete codepoint.
 * Looks only at the final bytes, so a range can be aligned without reading
 * past its end.
 */
export function completePrefixLength(bytes: Uint8Array): number {
  let lead = bytes.length - 1;
  while (lead > 0 && lead > bytes.length - 4 && isContinuationByte(bytes[lead])) {
    lead--;
  }
  if (lead < 0) return 0;
  return lead + sequenceLength(bytes[lead]) > bytes.length ? lead : bytes.length;
}

/**
 * Decode a chunk for transmission: malformed sequences and control
 * characters are dropped. A well-formed chunk keeps any U+FFFD it contains;
 * a malformed one loses them all, since decoding cannot tell them apart.
 */
export function sanitizeChunkText(bytes: Uint8Array): string {
  return decodeChunk(bytes).replace(CONTROL_CHAR_PATTERN, '');
}

function decodeChunk(bytes: Uint8Array): string {
  try {
    return strictDecoder.decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return lossyDecoder.decode(bytes).replace(REPLACEMENT_CHAR_PATTERN, '');
  }
}

/**
 * Split `[start, end)` of `bytes` into ordered, contiguous chunks of at most
 * `chunkSize` bytes, none of which ends inside a multi-byte codepoint.
 * Calling again with a later `start` resumes the sequence.
 */
export function splitIntoChunks(
  bytes: Uint8Array,
  start: number,
  end: number,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): Chunk[] {
  if (chunkSize <= 0) {
    throw new RangeError(`chunkSize must be positive, got ${chunkSize}`);
  }

  const limit = Math.min(end, bytes.length);
  const chunks: Chunk[] = [];
  let cursor = Math.max(start, 0);

  while (cursor < limit) {
    let boundary = Math.min(cursor + chunkSize, limit);

    if (boundary < limit) {
      boundary = alignBackward(bytes, boundary, cursor);
      // A chunk size smaller than one codepoint: take the whole codepoint
      if (boundary === cursor) {
        boundary = alignForward(bytes, cursor + 1, limit);
      }
    }

    const slice = bytes.subarray(cursor, boundary);
    chunks.push({
      index: chunks.length + 1,
      start: cursor,
      end: boundary,
      bytes: slice,
      text: sanitizeChunkText(slice),
    });
    cursor = boundary;
  }

  return chunks;
}
