/**
 * Maps logical document ids to the physical chunk ids stored in the index,
 * and back.
 *
 * Lookups go through the `source_id` metadata written on every chunk. Records
 * written without it are found by scanning ids for the `{id}_chunk_{n}` form.
 */

import { parseChunkId } from '../chunking/chunker.js';
import type { GetOptions, GetResult } from './types.js';

/** Upper bound on records read by the id-pattern fallback scan. */
export const FALLBACK_SCAN_LIMIT = 10_000;

export interface ChunkLookup {
  getDocuments(collection: string, options?: GetOptions): Promise<GetResult>;
}

export class ChunkIdResolver {
  private readonly cache = new Map<string, Map<string, string[]>>();

  constructor(private readonly lookup: ChunkLookup) {}

  /** The logical document id a physical id belongs to. */
  static toDocumentId(id: string): string {
    return parseChunkId(id)?.documentId ?? id;
  }

  /**
   * Expand logical ids into chunk ids, preserving input order.
   * An id with no chunks found is returned as-is (it may already be physical).
   */
  async expandToChunkIds(collection: string, ids: readonly string[]): Promise<string[]> {
    const mapping = await this.resolve(collection, ids);
    const result: string[] = [];
    const seen = new Set<string>();

    for (const id of ids) {
      const chunkIds = mapping.get(id);
      const expanded = chunkIds && chunkIds.length > 0 ? chunkIds : [id];
      for (const chunk of expanded) {
        if (!seen.has(chunk)) {
          seen.add(chunk);
          result.push(chunk);
        }
      }
    }
    return result;
  }

  /** Chunk ids per logical id; ids without chunks map to an empty list. */
  async resolve(collection: string, ids: readonly string[]): Promise<Map<string, string[]>> {
    const cached = this.cacheFor(collection);
    const result = new Map<string, string[]>();
    const missing: string[] = [];

    for (const id of ids) {
      const hit = cached.get(id);
      if (hit) {
        result.set(id, hit);
      } else {
        missing.push(id);
      }
    }

    if (missing.length === 0) return result;

    const found = await this.lookupBySourceId(collection, missing);
    const unresolved = missing.filter((id) => !found.has(id));
    if (unresolved.length > 0) {
      for (const [id, chunks] of await this.lookupByPattern(collection, unresolved)) {
        found.set(id, chunks);
      }
    }

    for (const id of missing) {
      const chunks = found.get(id) ?? [];
      if (chunks.length > 0) cached.set(id, chunks);
      result.set(id, chunks);
    }
    return result;
  }

  invalidate(collection?: string): void {
    if (collection === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(collection);
    }
  }

  private cacheFor(collection: string): Map<string, string[]> {
    let entry = this.cache.get(collection);
    if (!entry) {
      entry = new Map();
      this.cache.set(collection, entry);
    }
    return entry;
  }

  private async lookupBySourceId(collection: string, ids: string[]): Promise<Map<string, string[]>> {
    const records = await this.lookup.getDocuments(collection, {
      where: { source_id: { $in: ids } },
    });
    const grouped = new Map<string, Array<{ id: string; index: number }>>();

    records.ids.forEach((chunkId, i) => {
      const sourceId = records.metadatas[i]?.source_id;
      if (typeof sourceId !== 'string') return;
      const indexValue = records.metadatas[i].chunk_index;
      const index = typeof indexValue === 'number' ? indexValue : (parseChunkId(chunkId)?.index ?? 0);
      const list = grouped.get(sourceId) ?? [];
      list.push({ id: chunkId, index });
      grouped.set(sourceId, list);
    });

    return sortedIds(grouped);
  }

  private async lookupByPattern(collection: string, ids: string[]): Promise<Map<string, string[]>> {
    const wanted = new Set(ids);
    const records = await this.lookup.getDocuments(collection, { limit: FALLBACK_SCAN_LIMIT });
    const grouped = new Map<string, Array<{ id: string; index: number }>>();

    for (const chunkId of records.ids) {
      const parsed = parseChunkId(chunkId);
      if (!parsed || !wanted.has(parsed.documentId)) continue;
      const list = grouped.get(parsed.documentId) ?? [];
      list.push({ id: chunkId, index: parsed.index });
      grouped.set(parsed.documentId, list);
    }

    return sortedIds(grouped);
  }
}

function sortedIds(grouped: Map<string, Array<{ id: string; index: number }>>): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const [id, list] of grouped) {
    list.sort((a, b) => a.index - b.index);
    result.set(
      id,
      list.map((c) => c.id),
    );
  }
  return result;
}
