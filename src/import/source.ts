import { fromChunks, type ReassembledDocument } from '../chunking/converter.js';
import { NotFoundError } from '../errors.js';
import { SqliteIndexStore } from '../index-store/sqlite-store.js';
import type { IndexStore } from '../index-store/types.js';

/** Read side of another index that documents are imported from. */
export interface ImportSource {
  listCollections(): Promise<string[]>;
  getDocuments(collection: string, ids?: string[]): Promise<ReassembledDocument[]>;
  close(): Promise<void>;
}

/** Logical documents of a collection, reassembled from their chunks. */
export async function readLogicalDocuments(
  store: IndexStore,
  collection: string,
  ids?: string[],
): Promise<ReassembledDocument[]> {
  const result = await store.getDocuments(collection);
  const records = result.ids.map((id, i) => ({
    id,
    document: result.documents[i],
    metadata: result.metadatas[i],
  }));
  const documents = fromChunks(records);
  if (!ids) return documents;
  const wanted = new Set(ids);
  return documents.filter((d) => wanted.has(d.id));
}

/** ImportSource over any IndexStore. */
export class IndexImportSource implements ImportSource {
  constructor(
    private readonly store: IndexStore,
    private readonly ownsStore = true,
  ) {}

  listCollections(): Promise<string[]> {
    return this.store.listCollections();
  }

  async getDocuments(collection: string, ids?: string[]): Promise<ReassembledDocument[]> {
    if (!(await this.store.getCollection(collection))) {
      throw new NotFoundError(`Source collection not found: ${collection}`);
    }
    return readLogicalDocuments(this.store, collection, ids);
  }

  async close(): Promise<void> {
    if (this.ownsStore) await this.store.close();
  }
}

/** Open an index database file read-only as an import source. */
export function openExternalIndex(path: string): ImportSource {
  return new IndexImportSource(new SqliteIndexStore({ path, readonly: true }));
}
