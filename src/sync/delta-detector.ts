/**
 * Change detection between the ledger's source tables and what has been
 * written to the index.
 *
 * The sync log (`document_sync_log`) records the content hash last written to
 * each collection; a row is pending when its current hash differs or is
 * missing. Detection never writes to the ledger.
 */

import { z } from 'zod';
import { LedgerOperationError, SyncError } from '../errors.js';
import { assertValidCommitRef, assertValidTableName, getIdColumn } from '../ledger/sql.js';
import type { LedgerClient, LedgerRow } from '../ledger/types.js';
import {
  CHANGE_TYPES,
  DIFF_TYPES,
  SOURCE_TABLES,
  parseMetadataJson,
  toMetadata,
  type ChangeSummary,
  type CommitDiffRow,
  type DeletedDocument,
  type DocumentDelta,
  type Metadata,
  type SourceTable,
} from '../types.js';

// Ledger JSON output may render keys and hashes as numbers or strings
const Text = z.union([z.string(), z.number()]).transform(String);
const OptionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((v) => (v === null || v === undefined ? null : String(v)));

const MetadataField = z
  .union([z.string(), z.record(z.unknown()), z.null()])
  .optional()
  .transform((v): Metadata => (typeof v === 'string' ? parseMetadataJson(v) : toMetadata(v)));

const DocumentRowSchema = z.object({
  source_table: z.enum(SOURCE_TABLES),
  source_id: Text,
  content: OptionalText.transform((v) => v ?? ''),
  content_hash: OptionalText.transform((v) => v ?? ''),
  identifier: OptionalText,
  metadata: MetadataField,
  change_type: z.enum(CHANGE_TYPES),
});

const DeletedRowSchema = z.object({
  source_table: z.enum(SOURCE_TABLES),
  source_id: Text,
  collection_name: z.string(),
  chunk_ids: OptionalText,
});

const DiffRowSchema = z.object({
  diff_type: z.enum(DIFF_TYPES),
  from_id: OptionalText,
  to_id: OptionalText,
  from_content_hash: OptionalText,
  to_content_hash: OptionalText,
  to_content: OptionalText,
});

const ChunkIdsSchema = z.array(z.string());

const SOURCE_TABLE_SET = new Set<string>(SOURCE_TABLES);

/** Parse the JSON array stored in `document_sync_log.chunk_ids`. */
export function parseChunkIds(json: string | null): string[] {
  if (!json) return [];
  try {
    const parsed = ChunkIdsSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

const ISSUE_LOG_METADATA = `CAST(JSON_OBJECT(
      'issue_number', il.issue_number,
      'log_type', COALESCE(il.log_type, 'implementation'),
      'title', COALESCE(il.title, ''),
      'project_id', COALESCE(il.project_id, ''),
      'created_at', COALESCE(il.created_at, ''),
      'updated_at', COALESCE(il.updated_at, '')
    ) AS CHAR)`;

const KNOWLEDGE_DOC_METADATA = `CAST(JSON_OBJECT(
      'category', COALESCE(kd.category, ''),
      'tool_name', COALESCE(kd.tool_name, ''),
      'tool_version', COALESCE(kd.tool_version, ''),
      'title', COALESCE(kd.title, ''),
      'created_at', COALESCE(kd.created_at, ''),
      'updated_at', COALESCE(kd.updated_at, '')
    ) AS CHAR)`;

const PENDING_DOCUMENTS_SQL = `
  SELECT 'issue_logs' AS source_table, il.log_id AS source_id, il.content, il.content_hash,
    il.project_id AS identifier,
    ${ISSUE_LOG_METADATA} AS metadata,
    CASE WHEN dsl.content_hash IS NULL THEN 'new'
         WHEN dsl.content_hash != il.content_hash THEN 'modified' END AS change_type
  FROM issue_logs il
  LEFT JOIN document_sync_log dsl
    ON dsl.source_table = 'issue_logs' AND dsl.source_id = il.log_id AND dsl.collection_name = ?
  WHERE dsl.content_hash IS NULL OR dsl.content_hash != il.content_hash
  UNION ALL
  SELECT 'knowledge_docs' AS source_table, kd.doc_id AS source_id, kd.content, kd.content_hash,
    kd.tool_name AS identifier,
    ${KNOWLEDGE_DOC_METADATA} AS metadata,
    CASE WHEN dsl.content_hash IS NULL THEN 'new'
         WHEN dsl.content_hash != kd.content_hash THEN 'modified' END AS change_type
  FROM knowledge_docs kd
  LEFT JOIN document_sync_log dsl
    ON dsl.source_table = 'knowledge_docs' AND dsl.source_id = kd.doc_id AND dsl.collection_name = ?
  WHERE dsl.content_hash IS NULL OR dsl.content_hash != kd.content_hash`;

const ALL_DOCUMENTS_SQL = `
  SELECT 'issue_logs' AS source_table, il.log_id AS source_id, il.content, il.content_hash,
    il.project_id AS identifier,
    ${ISSUE_LOG_METADATA} AS metadata,
    'new' AS change_type
  FROM issue_logs il
  UNION ALL
  SELECT 'knowledge_docs' AS source_table, kd.doc_id AS source_id, kd.content, kd.content_hash,
    kd.tool_name AS identifier,
    ${KNOWLEDGE_DOC_METADATA} AS metadata,
    'new' AS change_type
  FROM knowledge_docs kd`;

const DELETED_DOCUMENTS_SQL = `
  SELECT dsl.source_table, dsl.source_id, dsl.collection_name, dsl.chunk_ids
  FROM document_sync_log dsl
  WHERE dsl.collection_name = ?
    AND (
      (dsl.source_table = 'issue_logs' AND dsl.source_id NOT IN (SELECT log_id FROM issue_logs))
      OR (dsl.source_table = 'knowledge_docs' AND dsl.source_id NOT IN (SELECT doc_id FROM knowledge_docs))
    )`;

function toDelta(row: LedgerRow): DocumentDelta {
  const parsed = DocumentRowSchema.parse(row);
  return {
    sourceTable: parsed.source_table,
    sourceId: parsed.source_id,
    content: parsed.content,
    contentHash: parsed.content_hash,
    identifier: parsed.identifier,
    metadata: parsed.metadata,
    changeType: parsed.change_type,
  };
}

/** Build a ChangeSummary from pending and deleted sets. */
export function summarizeChanges(pending: DocumentDelta[], deleted: DeletedDocument[]): ChangeSummary {
  const newDocuments = pending.filter((d) => d.changeType === 'new');
  const modifiedDocuments = pending.filter((d) => d.changeType === 'modified');
  const totalChanges = newDocuments.length + modifiedDocuments.length + deleted.length;
  return {
    newDocuments,
    modifiedDocuments,
    deletedDocuments: deleted,
    newCount: newDocuments.length,
    modifiedCount: modifiedDocuments.length,
    deletedCount: deleted.length,
    totalChanges,
    hasChanges: totalChanges > 0,
  };
}

export class DeltaDetector {
  constructor(private readonly ledger: LedgerClient) {}

  /** Source rows whose content is not yet in the collection at its current hash. */
  async getPendingSyncDocuments(collection: string): Promise<DocumentDelta[]> {
    const rows = await this.read('pending documents', PENDING_DOCUMENTS_SQL, [collection, collection]);
    return rows.map(toDelta);
  }

  /** Every source row, tagged new. Used by full sync. */
  async getAllDocuments(): Promise<DocumentDelta[]> {
    const rows = await this.read('source documents', ALL_DOCUMENTS_SQL, []);
    return rows.map(toDelta);
  }

  /** Sync-log entries of the collection whose source row is gone. */
  async getDeletedDocuments(collection: string): Promise<DeletedDocument[]> {
    const rows = await this.read('deleted documents', DELETED_DOCUMENTS_SQL, [collection]);
    return rows.map((row) => {
      const parsed = DeletedRowSchema.parse(row);
      return {
        sourceTable: parsed.source_table,
        sourceId: parsed.source_id,
        collectionName: parsed.collection_name,
        chunkIds: parseChunkIds(parsed.chunk_ids),
      };
    });
  }

  /**
   * Row-level differences of one table between two commits.
   * The table must be allow-listed and both refs well formed; otherwise
   * ConfigurationError is thrown before anything is queried.
   */
  async getCommitDiff(fromCommit: string, toCommit: string, table: string): Promise<CommitDiffRow[]> {
    const validTable = assertValidTableName(table);
    assertValidCommitRef(fromCommit);
    assertValidCommitRef(toCommit);

    const idColumn = getIdColumn(validTable);
    const hasContent = SOURCE_TABLE_SET.has(validTable);
    const contentColumns = hasContent
      ? 'from_content_hash, to_content_hash, to_content'
      : 'NULL AS from_content_hash, NULL AS to_content_hash, NULL AS to_content';

    const rows = await this.read(
      `diff of ${validTable}`,
      `SELECT diff_type, from_${idColumn} AS from_id, to_${idColumn} AS to_id, ${contentColumns}
       FROM dolt_diff(?, ?, '${validTable}')`,
      [fromCommit, toCommit],
    );

    return rows.map((row) => {
      const parsed = DiffRowSchema.parse(row);
      return {
        diffType: parsed.diff_type,
        sourceId: parsed.to_id ?? parsed.from_id ?? '',
        fromContentHash: parsed.from_content_hash,
        toContentHash: parsed.to_content_hash,
        toContent: parsed.to_content,
      };
    });
  }

  /**
   * Changes the collection needs since `sinceCommit`.
   * With no prior commit every source row is new; at the head commit nothing
   * has changed.
   */
  async getChangesSinceCommit(sinceCommit: string | null, collection: string): Promise<ChangeSummary> {
    if (!sinceCommit) {
      return summarizeChanges(await this.getAllDocuments(), []);
    }

    const head = await this.ledger.getHeadCommitHash();
    if (sinceCommit === head) {
      return summarizeChanges([], []);
    }

    for (const table of SOURCE_TABLES) {
      await this.logStructuralDiff(sinceCommit, head, table);
    }

    const [pending, deleted] = await Promise.all([
      this.getPendingSyncDocuments(collection),
      this.getDeletedDocuments(collection),
    ]);
    return summarizeChanges(pending, deleted);
  }

  /** Commit recorded by the last successful sync of the collection. */
  async getLastSyncCommit(collection: string): Promise<string | null> {
    try {
      const rows = await this.ledger.query(
        'SELECT last_sync_commit FROM index_sync_state WHERE collection_name = ?',
        [collection],
      );
      const value = rows[0]?.last_sync_commit;
      return typeof value === 'string' && value ? value : null;
    } catch (error) {
      console.error(`Sync: could not read last sync commit for ${collection}:`, error);
      return null;
    }
  }

  private async logStructuralDiff(fromCommit: string, toCommit: string, table: SourceTable): Promise<void> {
    try {
      const diff = await this.getCommitDiff(fromCommit, toCommit, table);
      if (diff.length > 0) {
        const counts = { added: 0, modified: 0, removed: 0 };
        for (const row of diff) counts[row.diffType]++;
        console.error(
          `Sync: ${table} ${fromCommit.slice(0, 7)}..${toCommit.slice(0, 7)}: ` +
            `+${counts.added} ~${counts.modified} -${counts.removed}`,
        );
      }
    } catch (error) {
      // Pending and deleted sets are authoritative; the diff is informational
      console.error(`Sync: diff of ${table} unavailable:`, error);
    }
  }

  private async read(what: string, sql: string, params: string[]): Promise<LedgerRow[]> {
    try {
      return await this.ledger.query(sql, params);
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new LedgerOperationError(`Failed to read ${what}`, { cause: error });
    }
  }
}
