// === Ledger tables ===

/** Tables whose rows are mirrored into the index. */
export const SOURCE_TABLES = ['issue_logs', 'knowledge_docs'] as const;

export type SourceTable = (typeof SOURCE_TABLES)[number];

/** Every table a diff query may name. */
export const DIFFABLE_TABLES = [
  'issue_logs',
  'knowledge_docs',
  'projects',
  'index_sync_state',
  'document_sync_log',
  'sync_operations',
] as const;

export type DiffableTable = (typeof DIFFABLE_TABLES)[number];

// === Change detection ===

export const CHANGE_TYPES = ['new', 'modified'] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

export const DIFF_TYPES = ['added', 'modified', 'removed'] as const;

export type DiffType = (typeof DIFF_TYPES)[number];

// === Sync ===

export const SYNC_STATUSES = ['completed', 'no_changes', 'failed', 'conflicts'] as const;

export type SyncStatus = (typeof SYNC_STATUSES)[number];

export const SYNC_OPERATION_TYPES = [
  'commit',
  'pull',
  'push',
  'checkout',
  'merge',
  'reset',
  'full_sync',
  'incremental_sync',
] as const;

export type SyncOperationType = (typeof SYNC_OPERATION_TYPES)[number];

// === Deletion tracking ===

export const DELETION_STATES = ['pending', 'staged', 'committed', 'removed'] as const;

export type DeletionState = (typeof DELETION_STATES)[number];

export const COLLECTION_OPERATION_TYPES = ['deletion', 'rename', 'metadata_update'] as const;

export type CollectionOperationType = (typeof COLLECTION_OPERATION_TYPES)[number];

// === Metadata ===

export type MetadataValue = string | number | boolean | null;

export type Metadata = Record<string, MetadataValue>;

export function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/** Keep only the scalar entries of an arbitrary object. */
export function toMetadata(value: unknown): Metadata {
  const result: Metadata = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (isMetadataValue(entry)) result[key] = entry;
  }
  return result;
}

/** Parse a JSON object string into metadata; anything else yields {}. */
export function parseMetadataJson(json: string | null | undefined): Metadata {
  if (!json) return {};
  try {
    return toMetadata(JSON.parse(json));
  } catch {
    return {};
  }
}

// === Interfaces ===

/** A source row that needs to be (re)written to the index. */
export interface DocumentDelta {
  sourceTable: SourceTable;
  sourceId: string;
  content: string;
  contentHash: string;
  identifier: string | null;
  metadata: Metadata;
  changeType: ChangeType;
}

/** A sync-log entry whose source row no longer exists. */
export interface DeletedDocument {
  sourceTable: SourceTable;
  sourceId: string;
  collectionName: string;
  chunkIds: string[];
}

export interface CommitDiffRow {
  diffType: DiffType;
  sourceId: string;
  fromContentHash: string | null;
  toContentHash: string | null;
  toContent: string | null;
}

export interface ChangeSummary {
  newDocuments: DocumentDelta[];
  modifiedDocuments: DocumentDelta[];
  deletedDocuments: DeletedDocument[];
  newCount: number;
  modifiedCount: number;
  deletedCount: number;
  totalChanges: number;
  hasChanges: boolean;
}

/** Parallel arrays ready for a single index add call. Lengths are always equal. */
export interface ChunkedEntryBatch {
  ids: string[];
  documents: string[];
  metadatas: Metadata[];
}

export interface SyncResult {
  status: SyncStatus;
  success: boolean;
  added: number;
  modified: number;
  deleted: number;
  chunksProcessed: number;
  commitHash: string | null;
  errorMessage: string | null;
}
