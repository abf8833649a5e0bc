import type { Metadata, MetadataValue } from '../types.js';

export interface CollectionInfo {
  name: string;
  metadata: Metadata;
  createdAt: string;
}

export type WhereOperator =
  | { $eq: MetadataValue }
  | { $ne: MetadataValue }
  | { $in: MetadataValue[] };

/** Every key must match; a bare value means equality. */
export type WhereFilter = Record<string, MetadataValue | WhereOperator>;

export interface WhereDocumentFilter {
  $contains?: string;
  $not_contains?: string;
}

export interface GetResult {
  ids: string[];
  documents: string[];
  metadatas: Metadata[];
  /** Present only when embeddings were requested. */
  embeddings?: Array<number[] | null>;
}

/** One row of results per query text. Lower distance is closer. */
export interface QueryResult {
  ids: string[][];
  documents: string[][];
  metadatas: Metadata[][];
  distances: number[][];
}

export interface AddOptions {
  /** Reject ids that already have chunks in the collection (default false). */
  allowDuplicateIds?: boolean;
  /** Stamp is_local_change on every chunk (default true). */
  markAsLocalChange?: boolean;
}

export interface AddResult {
  documents: number;
  chunks: number;
}

export interface UpdateOptions {
  markAsLocalChange?: boolean;
  /** Treat ids as logical document ids and rewrite all their chunks (default true). */
  expandChunks?: boolean;
}

export interface GetOptions {
  ids?: string[];
  where?: WhereFilter;
  limit?: number;
  offset?: number;
  includeEmbeddings?: boolean;
}

/**
 * CRUD + query contract of the document index.
 *
 * `addDocuments` takes logical documents and chunks them. Other calls taking
 * `expandChunks` expand logical ids to every physical chunk id first.
 */
export interface IndexStore {
  listCollections(limit?: number, offset?: number): Promise<string[]>;
  createCollection(name: string, metadata?: Metadata): Promise<CollectionInfo>;
  getCollection(name: string): Promise<CollectionInfo | null>;
  deleteCollection(name: string): Promise<boolean>;

  addDocuments(
    collection: string,
    documents: string[],
    ids: string[],
    metadatas?: Metadata[],
    options?: AddOptions,
  ): Promise<AddResult>;

  queryDocuments(
    collection: string,
    queryTexts: string[],
    nResults?: number,
    where?: WhereFilter,
    whereDocument?: WhereDocumentFilter,
  ): Promise<QueryResult>;

  getDocuments(collection: string, options?: GetOptions): Promise<GetResult>;

  updateDocuments(
    collection: string,
    ids: string[],
    documents?: string[],
    metadatas?: Metadata[],
    options?: UpdateOptions,
  ): Promise<number>;

  /** Returns the number of physical records removed. */
  deleteDocuments(collection: string, ids: string[], expandChunks?: boolean): Promise<number>;

  getCollectionCount(): Promise<number>;
  getDocumentCount(collection: string): Promise<number>;

  close(): Promise<void>;
}
