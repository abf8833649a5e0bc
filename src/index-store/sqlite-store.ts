/**
 * Index store backed by a local SQLite database.
 *
 * Each logical document is stored as its chunks (one row per chunk). When an
 * embedding provider is configured every chunk is embedded on write and
 * queries rank by cosine distance; otherwise queries rank with FTS5 bm25.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  validateChunkParameters,
} from '../chunking/chunker.js';
import { documentMetadata, toChunkedBatch } from '../chunking/converter.js';
import { embedAll, type EmbeddingProvider } from '../embeddings/provider.js';
import { bufferToVector, rankByEmbedding, vectorToBuffer } from '../embeddings/similarity.js';
import { ConfigurationError, NotFoundError } from '../errors.js';
import { parseMetadataJson, type Metadata } from '../types.js';
import { ChunkIdResolver } from './chunk-ids.js';
import { matchesWhere, matchesWhereDocument } from './filters.js';
import type {
  AddOptions,
  AddResult,
  CollectionInfo,
  GetOptions,
  GetResult,
  IndexStore,
  QueryResult,
  UpdateOptions,
  WhereDocumentFilter,
  WhereFilter,
} from './types.js';

interface CollectionRow {
  name: string;
  metadata: string;
  created_at: string;
}

interface RecordRow {
  id: string;
  document: string;
  metadata: string;
  embedding: Buffer | null;
}

interface StoredRecord {
  id: string;
  document: string;
  metadata: Metadata;
  embedding: Buffer | null;
}

export interface SqliteIndexStoreOptions {
  /** Database file; ':memory:' (the default) keeps everything in process. */
  path?: string;
  chunkSize?: number;
  overlap?: number;
  embeddingProvider?: EmbeddingProvider | null;
  /** Open an existing database without writing to it. */
  readonly?: boolean;
}

/** Create the index tables and FTS triggers if they don't exist. */
export function initIndexSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS index_collections (
      name TEXT PRIMARY KEY,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS index_records (
      collection TEXT NOT NULL,
      id TEXT NOT NULL,
      document TEXT NOT NULL,
      metadata TEXT NOT NULL DEFAULT '{}',
      embedding BLOB,
      PRIMARY KEY (collection, id)
    );
  `);

  const ftsExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='index_records_fts'")
    .get();

  if (!ftsExists) {
    db.exec(`
      CREATE VIRTUAL TABLE index_records_fts USING fts5(
        document,
        content='index_records',
        content_rowid='rowid'
      );

      CREATE TRIGGER index_records_ai AFTER INSERT ON index_records BEGIN
        INSERT INTO index_records_fts(rowid, document) VALUES (NEW.rowid, NEW.document);
      END;

      CREATE TRIGGER index_records_ad AFTER DELETE ON index_records BEGIN
        INSERT INTO index_records_fts(index_records_fts, rowid, document)
        VALUES ('delete', OLD.rowid, OLD.document);
      END;

      CREATE TRIGGER index_records_au AFTER UPDATE ON index_records BEGIN
        INSERT INTO index_records_fts(index_records_fts, rowid, document)
        VALUES ('delete', OLD.rowid, OLD.document);
        INSERT INTO index_records_fts(rowid, document) VALUES (NEW.rowid, NEW.document);
      END;
    `);
  }
}

/** FTS5 query: strip quotes, prefix-match each term, OR them together. */
function toFtsQuery(text: string): string {
  return text
    .replace(/['"]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .map((term) => `"${term}"*`)
    .join(' OR ');
}

function toStored(row: RecordRow): StoredRecord {
  return {
    id: row.id,
    document: row.document,
    metadata: parseMetadataJson(row.metadata),
    embedding: row.embedding,
  };
}

export class SqliteIndexStore implements IndexStore {
  private readonly db: Database.Database;
  private readonly resolver: ChunkIdResolver;
  private readonly chunkSize: number;
  private readonly overlap: number;
  private readonly provider: EmbeddingProvider | null;

  constructor(options: SqliteIndexStoreOptions = {}) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
    validateChunkParameters(this.chunkSize, this.overlap);
    this.provider = options.embeddingProvider ?? null;

    const path = options.path ?? ':memory:';
    const readonly = options.readonly ?? false;

    if (readonly) {
      if (!existsSync(path)) {
        throw new NotFoundError(`Index database not found: ${path}`);
      }
      this.db = new Database(path, { readonly: true, fileMustExist: true });
    } else {
      if (path !== ':memory:') {
        const dir = dirname(path);
        if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      }
      this.db = new Database(path);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      initIndexSchema(this.db);
    }

    this.resolver = new ChunkIdResolver(this);
  }

  // === Collections ===

  async listCollections(limit?: number, offset?: number): Promise<string[]> {
    const rows = this.db
      .prepare<[number, number], { name: string }>(
        'SELECT name FROM index_collections ORDER BY name LIMIT ? OFFSET ?',
      )
      .all(limit ?? -1, offset ?? 0);
    return rows.map((r) => r.name);
  }

  /** Returns the existing collection unchanged when the name is taken. */
  async createCollection(name: string, metadata: Metadata = {}): Promise<CollectionInfo> {
    if (!name.trim()) {
      throw new ConfigurationError('Collection name must not be empty');
    }
    const existing = await this.getCollection(name);
    if (existing) return existing;

    const createdAt = new Date().toISOString();
    this.db
      .prepare('INSERT INTO index_collections (name, metadata, created_at) VALUES (?, ?, ?)')
      .run(name, JSON.stringify(metadata), createdAt);
    return { name, metadata: { ...metadata }, createdAt };
  }

  async getCollection(name: string): Promise<CollectionInfo | null> {
    const row = this.db
      .prepare<[string], CollectionRow>('SELECT name, metadata, created_at FROM index_collections WHERE name = ?')
      .get(name);
    if (!row) return null;
    return { name: row.name, metadata: parseMetadataJson(row.metadata), createdAt: row.created_at };
  }

  async deleteCollection(name: string): Promise<boolean> {
    const removed = this.db.transaction(() => {
      this.db.prepare('DELETE FROM index_records WHERE collection = ?').run(name);
      return this.db.prepare('DELETE FROM index_collections WHERE name = ?').run(name).changes > 0;
    })();
    this.resolver.invalidate(name);
    return removed;
  }

  // === Documents ===

  async addDocuments(
    collection: string,
    documents: string[],
    ids: string[],
    metadatas?: Metadata[],
    options: AddOptions = {},
  ): Promise<AddResult> {
    if (documents.length !== ids.length) {
      throw new ConfigurationError(`Got ${documents.length} documents for ${ids.length} ids`);
    }
    if (metadatas && metadatas.length !== ids.length) {
      throw new ConfigurationError(`Got ${metadatas.length} metadata entries for ${ids.length} ids`);
    }
    this.requireCollection(collection);

    const allowDuplicates = options.allowDuplicateIds ?? false;
    if (!allowDuplicates) {
      const seen = new Set<string>();
      for (const id of ids) {
        if (seen.has(id)) throw new ConfigurationError(`Duplicate document id in batch: ${id}`);
        seen.add(id);
        if (this.hasDocument(collection, id)) {
          throw new ConfigurationError(`Document ${id} already exists in collection ${collection}`);
        }
      }
    }

    const batch = toChunkedBatch(
      ids.map((id, i) => ({ id, content: documents[i], metadata: metadatas?.[i] })),
      {
        chunkSize: this.chunkSize,
        overlap: this.overlap,
        markAsLocalChange: options.markAsLocalChange ?? true,
      },
    );

    const vectors = this.provider ? await embedAll(this.provider, batch.documents) : [];

    // Delete before insert so the FTS delete trigger fires for replaced chunks
    const remove = this.db.prepare('DELETE FROM index_records WHERE collection = ? AND id = ?');
    const insert = this.db.prepare(
      'INSERT INTO index_records (collection, id, document, metadata, embedding) VALUES (?, ?, ?, ?, ?)',
    );

    this.db.transaction(() => {
      if (allowDuplicates) {
        for (const id of ids) this.deleteBySourceId(collection, id);
      }
      batch.ids.forEach((chunkId, i) => {
        const vector = vectors[i];
        remove.run(collection, chunkId);
        insert.run(
          collection,
          chunkId,
          batch.documents[i],
          JSON.stringify(batch.metadatas[i]),
          vector ? vectorToBuffer(vector) : null,
        );
      });
    })();

    this.resolver.invalidate(collection);
    return { documents: ids.length, chunks: batch.ids.length };
  }

  async queryDocuments(
    collection: string,
    queryTexts: string[],
    nResults = 5,
    where?: WhereFilter,
    whereDocument?: WhereDocumentFilter,
  ): Promise<QueryResult> {
    this.requireCollection(collection);

    const candidates = this.readRecords(collection).filter(
      (r) => matchesWhere(r.metadata, where) && matchesWhereDocument(r.document, whereDocument),
    );

    const result: QueryResult = { ids: [], documents: [], metadatas: [], distances: [] };

    for (const text of queryTexts) {
      const ranked = this.provider
        ? rankByEmbedding(
            await this.provider.embed(text),
            candidates,
            (r) => (r.embedding ? bufferToVector(r.embedding) : null),
            nResults,
          )
        : this.rankByText(collection, text, candidates, nResults);

      result.ids.push(ranked.map((s) => s.item.id));
      result.documents.push(ranked.map((s) => s.item.document));
      result.metadatas.push(ranked.map((s) => s.item.metadata));
      result.distances.push(ranked.map((s) => s.distance));
    }

    return result;
  }

  /** Physical records; `ids` are matched exactly. */
  async getDocuments(collection: string, options: GetOptions = {}): Promise<GetResult> {
    this.requireCollection(collection);

    let records = this.readRecords(collection, options.ids).filter((r) => matchesWhere(r.metadata, options.where));
    const offset = options.offset ?? 0;
    records = records.slice(offset, options.limit === undefined ? undefined : offset + options.limit);

    const result: GetResult = {
      ids: records.map((r) => r.id),
      documents: records.map((r) => r.document),
      metadatas: records.map((r) => r.metadata),
    };
    if (options.includeEmbeddings) {
      result.embeddings = records.map((r) => (r.embedding ? Array.from(bufferToVector(r.embedding)) : null));
    }
    return result;
  }

  /**
   * With expandChunks (the default) each id is a logical document: new content
   * is rechunked, and metadata-only updates are merged into every chunk.
   * Returns the number of ids updated.
   */
  async updateDocuments(
    collection: string,
    ids: string[],
    documents?: string[],
    metadatas?: Metadata[],
    options: UpdateOptions = {},
  ): Promise<number> {
    if (documents && documents.length !== ids.length) {
      throw new ConfigurationError(`Got ${documents.length} documents for ${ids.length} ids`);
    }
    if (metadatas && metadatas.length !== ids.length) {
      throw new ConfigurationError(`Got ${metadatas.length} metadata entries for ${ids.length} ids`);
    }
    this.requireCollection(collection);

    const markAsLocalChange = options.markAsLocalChange ?? true;

    if (!(options.expandChunks ?? true)) {
      return this.updatePhysical(collection, ids, documents, metadatas, markAsLocalChange);
    }

    const chunkMap = await this.resolver.resolve(collection, ids);
    for (const id of ids) {
      if ((chunkMap.get(id) ?? []).length === 0) {
        throw new NotFoundError(`Document ${id} not found in collection ${collection}`);
      }
    }

    let updated = 0;
    for (const [i, id] of ids.entries()) {
      const chunkIds = chunkMap.get(id) ?? [];
      const existing = this.readRecords(collection, chunkIds);

      if (documents) {
        const base = existing.length > 0 ? documentMetadata(existing[0].metadata) : {};
        this.deleteBySourceId(collection, id);
        this.deletePhysical(collection, chunkIds);
        await this.addDocuments(collection, [documents[i]], [id], [{ ...base, ...metadatas?.[i] }], {
          allowDuplicateIds: true,
          markAsLocalChange,
        });
      } else if (metadatas) {
        const update = this.db.prepare('UPDATE index_records SET metadata = ? WHERE collection = ? AND id = ?');
        this.db.transaction(() => {
          for (const record of existing) {
            const merged: Metadata = { ...record.metadata, ...metadatas[i] };
            if (markAsLocalChange) merged.is_local_change = true;
            update.run(JSON.stringify(merged), collection, record.id);
          }
        })();
      }
      updated++;
    }

    this.resolver.invalidate(collection);
    return updated;
  }

  async deleteDocuments(collection: string, ids: string[], expandChunks = true): Promise<number> {
    this.requireCollection(collection);
    const targets = expandChunks ? await this.resolver.expandToChunkIds(collection, ids) : ids;
    const removed = this.deletePhysical(collection, targets);
    this.resolver.invalidate(collection);
    return removed;
  }

  async getCollectionCount(): Promise<number> {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM index_collections').get();
    return row?.count ?? 0;
  }

  /** Number of physical records (chunks) in the collection. */
  async getDocumentCount(collection: string): Promise<number> {
    this.requireCollection(collection);
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM index_records WHERE collection = ?')
      .get(collection);
    return row?.count ?? 0;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  // === Internals ===

  private requireCollection(collection: string): void {
    const row = this.db.prepare('SELECT 1 FROM index_collections WHERE name = ?').get(collection);
    if (!row) {
      throw new NotFoundError(`Collection not found: ${collection}`);
    }
  }

  private hasDocument(collection: string, id: string): boolean {
    const row = this.db
      .prepare(
        `SELECT 1 FROM index_records
         WHERE collection = ? AND (json_extract(metadata, '$.source_id') = ? OR id = ?)
         LIMIT 1`,
      )
      .get(collection, id, id);
    return row !== undefined;
  }

  private readRecords(collection: string, ids?: readonly string[]): StoredRecord[] {
    if (ids === undefined) {
      return this.db
        .prepare<[string], RecordRow>(
          'SELECT id, document, metadata, embedding FROM index_records WHERE collection = ? ORDER BY rowid',
        )
        .all(collection)
        .map(toStored);
    }
    if (ids.length === 0) return [];

    const stmt = this.db.prepare<[string, string], RecordRow>(
      'SELECT id, document, metadata, embedding FROM index_records WHERE collection = ? AND id = ?',
    );
    const records: StoredRecord[] = [];
    for (const id of ids) {
      const row = stmt.get(collection, id);
      if (row) records.push(toStored(row));
    }
    return records;
  }

  private deleteBySourceId(collection: string, sourceId: string): number {
    return this.db
      .prepare("DELETE FROM index_records WHERE collection = ? AND json_extract(metadata, '$.source_id') = ?")
      .run(collection, sourceId).changes;
  }

  private deletePhysical(collection: string, ids: readonly string[]): number {
    const stmt = this.db.prepare('DELETE FROM index_records WHERE collection = ? AND id = ?');
    return this.db.transaction(() => {
      let removed = 0;
      for (const id of ids) removed += stmt.run(collection, id).changes;
      return removed;
    })();
  }

  private async updatePhysical(
    collection: string,
    ids: string[],
    documents: string[] | undefined,
    metadatas: Metadata[] | undefined,
    markAsLocalChange: boolean,
  ): Promise<number> {
    const existing = new Map(this.readRecords(collection, ids).map((r) => [r.id, r]));
    const missing = ids.filter((id) => !existing.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(`Records not found in collection ${collection}: ${missing.join(', ')}`);
    }

    const vectors = this.provider && documents ? await embedAll(this.provider, documents) : [];
    const update = this.db.prepare(
      'UPDATE index_records SET document = ?, metadata = ?, embedding = ? WHERE collection = ? AND id = ?',
    );

    this.db.transaction(() => {
      ids.forEach((id, i) => {
        const record = existing.get(id);
        if (!record) return;
        const metadata: Metadata = { ...record.metadata, ...metadatas?.[i] };
        if (markAsLocalChange) metadata.is_local_change = true;
        const vector = vectors[i];
        update.run(
          documents ? documents[i] : record.document,
          JSON.stringify(metadata),
          vector ? vectorToBuffer(vector) : record.embedding,
          collection,
          id,
        );
      });
    })();

    this.resolver.invalidate(collection);
    return ids.length;
  }

  private rankByText(
    collection: string,
    text: string,
    candidates: StoredRecord[],
    limit: number,
  ): Array<{ item: StoredRecord; distance: number }> {
    const ftsQuery = toFtsQuery(text);
    if (!ftsQuery) return [];

    const scores = new Map<string, number>();
    const rows = this.db
      .prepare<[string, string], { id: string; score: number }>(
        `SELECT r.id AS id, bm25(index_records_fts) AS score
         FROM index_records_fts
         JOIN index_records r ON r.rowid = index_records_fts.rowid
         WHERE index_records_fts MATCH ? AND r.collection = ?`,
      )
      .all(ftsQuery, collection);
    for (const row of rows) scores.set(row.id, row.score);

    return candidates
      .flatMap((item) => {
        const score = scores.get(item.id);
        return score === undefined ? [] : [{ item, distance: score }];
      })
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
  }
}
