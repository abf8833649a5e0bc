import type { ChunkedEntryBatch, Metadata } from '../types.js';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  calculateContentHash,
  chunkContent,
  chunkId,
  parseChunkId,
  reassembleContent,
  validateChunkParameters,
} from './chunker.js';

/** Metadata keys written on every chunk by the converter. */
export const CHUNK_METADATA_KEYS = [
  'source_id',
  'content_hash',
  'chunk_index',
  'total_chunks',
  'is_local_change',
] as const;

const CHUNK_KEY_SET = new Set<string>(CHUNK_METADATA_KEYS);

/** A logical document before chunking. */
export interface SourceDocument {
  id: string;
  content: string;
  /** Precomputed hash; computed from content when omitted. */
  contentHash?: string;
  metadata?: Metadata;
}

export interface ChunkOptions {
  chunkSize?: number;
  overlap?: number;
  markAsLocalChange?: boolean;
}

/** A physical index record (one chunk). */
export interface ChunkRecord {
  id: string;
  document: string;
  metadata: Metadata;
}

export interface ReassembledDocument {
  id: string;
  content: string;
  contentHash: string;
  metadata: Metadata;
  chunkCount: number;
}

/**
 * Convert logical documents into one batch of chunks.
 * All documents are validated against the chunk parameters before any output
 * is produced.
 */
export function toChunkedBatch(
  documents: readonly SourceDocument[],
  options: ChunkOptions = {},
): ChunkedEntryBatch {
  const size = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  validateChunkParameters(size, overlap);

  const batch: ChunkedEntryBatch = { ids: [], documents: [], metadatas: [] };

  for (const doc of documents) {
    const chunks = chunkContent(doc.content, size, overlap);
    const hash = doc.contentHash ?? calculateContentHash(doc.content);

    chunks.forEach((text, index) => {
      batch.ids.push(chunkId(doc.id, index));
      batch.documents.push(text);
      batch.metadatas.push({
        ...doc.metadata,
        source_id: doc.id,
        content_hash: hash,
        chunk_index: index,
        total_chunks: chunks.length,
        is_local_change: options.markAsLocalChange ?? false,
      });
    });
  }

  return batch;
}

/** Strip the per-chunk bookkeeping keys, leaving the document's own metadata. */
export function documentMetadata(metadata: Metadata): Metadata {
  const result: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!CHUNK_KEY_SET.has(key)) result[key] = value;
  }
  return result;
}

function sourceIdOf(record: ChunkRecord): string {
  const fromMetadata = record.metadata.source_id;
  if (typeof fromMetadata === 'string' && fromMetadata) return fromMetadata;
  return parseChunkId(record.id)?.documentId ?? record.id;
}

function chunkIndexOf(record: ChunkRecord): number {
  const fromMetadata = record.metadata.chunk_index;
  if (typeof fromMetadata === 'number') return fromMetadata;
  return parseChunkId(record.id)?.index ?? 0;
}

/**
 * Group chunk records by logical document and reassemble each one.
 * Documents are returned in first-seen order.
 */
export function fromChunks(
  records: readonly ChunkRecord[],
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): ReassembledDocument[] {
  const groups = new Map<string, ChunkRecord[]>();

  for (const record of records) {
    const id = sourceIdOf(record);
    const group = groups.get(id);
    if (group) {
      group.push(record);
    } else {
      groups.set(id, [record]);
    }
  }

  const result: ReassembledDocument[] = [];

  for (const [id, group] of groups) {
    group.sort((a, b) => chunkIndexOf(a) - chunkIndexOf(b));
    const content = reassembleContent(
      group.map((r) => r.document),
      overlap,
    );
    const first = group[0].metadata;
    const storedHash = first.content_hash;

    result.push({
      id,
      content,
      contentHash:
        typeof storedHash === 'string' && storedHash ? storedHash : calculateContentHash(content),
      metadata: documentMetadata(first),
      chunkCount: group.length,
    });
  }

  return result;
}
