/**
 * Deterministic content chunking, reassembly, and hashing.
 *
 * Chunk ids are derived from the logical document id and the chunk position,
 * so the same (content, size, overlap) always yields the same ids. The content
 * hash is the only signal used to decide whether a document changed.
 */

import { createHash } from 'node:crypto';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 50;

const CHUNK_ID_PATTERN = /^(.+)_chunk_(\d+)$/;

/** Throws ConfigurationError unless 0 <= overlap < size. */
export function validateChunkParameters(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= size) {
    throw new ConfigurationError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${size})`,
    );
  }
}

/**
 * Split content into overlapping windows of `size` characters.
 * Each window starts `size - overlap` characters after the previous one; the
 * last window may be shorter. Empty content yields a single empty chunk so that
 * chunk 0 is always addressable.
 */
export function chunkContent(
  content: string,
  size: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string[] {
  validateChunkParameters(size, overlap);

  if (content.length === 0) return [''];

  const chunks: string[] = [];
  const step = size - overlap;

  for (let start = 0; start < content.length; start += step) {
    const end = Math.min(start + size, content.length);
    chunks.push(content.slice(start, end));
    if (end === content.length) break;
  }

  return chunks;
}

/**
 * Join chunks (sorted by index) back into a document.
 *
 * For each chunk after the first, the longest suffix of the previous chunk that
 * is also a prefix of the current chunk is treated as the overlap and dropped.
 * Lengths are tried from `min(overlap, prev, cur)` down to 1. This is a
 * heuristic: content with repeated substrings at a boundary may not round-trip.
 */
export function reassembleContent(
  chunks: readonly string[],
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string {
  if (chunks.length === 0) return '';

  let result = chunks[0];

  for (let i = 1; i < chunks.length; i++) {
    const previous = chunks[i - 1];
    const current = chunks[i];
    const maxLength = Math.min(overlap, previous.length, current.length);

    let dropped = 0;
    for (let length = maxLength; length > 0; length--) {
      if (previous.endsWith(current.slice(0, length))) {
        dropped = length;
        break;
      }
    }

    result += current.slice(dropped);
  }

  return result;
}

/** Hex SHA-256 of the UTF-8 content; empty content hashes to "". */
export function calculateContentHash(content: string): string {
  if (content.length === 0) return '';
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

export function chunkId(documentId: string, index: number): string {
  return `${documentId}_chunk_${index}`;
}

/** The ids the forward chunking path produces for `count` chunks. */
export function getChunkIds(documentId: string, count: number): string[] {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    ids.push(chunkId(documentId, i));
  }
  return ids;
}

/** Split a chunk id into its document id and index; null for non-chunk ids. */
export function parseChunkId(id: string): { documentId: string; index: number } | null {
  const match = CHUNK_ID_PATTERN.exec(id);
  if (!match) return null;
  return { documentId: match[1], index: parseInt(match[2], 10) };
}

export function isChunkId(id: string): boolean {
  return CHUNK_ID_PATTERN.test(id);
}
