/**
 * Writes to the sync bookkeeping tables that live in the ledger beside the
 * content: the per-document sync log, per-collection sync state, and the
 * operation history.
 *
 * Statements stay in the SQL subset shared by the ledger and SQLite: no
 * upserts (delete then insert), timestamps bound as ISO strings.
 */

import { randomUUID } from 'node:crypto';
import type { LedgerClient } from '../ledger/types.js';
import type { SourceTable, SyncOperationType, SyncResult } from '../types.js';
import { parseChunkIds } from './delta-detector.js';

export type SyncAction = 'added' | 'modified';

export interface OperationCounts {
  added: number;
  modified: number;
  deleted: number;
  chunksProcessed: number;
}

export class SyncBookkeeping {
  constructor(private readonly ledger: LedgerClient) {}

  async recordSyncedDocument(
    sourceTable: SourceTable,
    sourceId: string,
    collection: string,
    contentHash: string,
    chunkIds: string[],
    action: SyncAction,
  ): Promise<void> {
    await this.removeSyncLogEntry(sourceTable, sourceId, collection);
    await this.ledger.execute(
      `INSERT INTO document_sync_log
         (id, source_table, source_id, collection_name, content_hash, chunk_ids, synced_at, sync_action)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        randomUUID(),
        sourceTable,
        sourceId,
        collection,
        contentHash,
        JSON.stringify(chunkIds),
        new Date().toISOString(),
        action,
      ],
    );
  }

  /** Chunk ids last written for the document, or [] when never synced. */
  async getSyncedChunkIds(sourceTable: SourceTable, sourceId: string, collection: string): Promise<string[]> {
    const rows = await this.ledger.query(
      `SELECT chunk_ids FROM document_sync_log
       WHERE source_table = ? AND source_id = ? AND collection_name = ?`,
      [sourceTable, sourceId, collection],
    );
    const value = rows[0]?.chunk_ids;
    return parseChunkIds(typeof value === 'string' ? value : null);
  }

  async removeSyncLogEntry(sourceTable: SourceTable, sourceId: string, collection: string): Promise<void> {
    await this.ledger.execute(
      'DELETE FROM document_sync_log WHERE source_table = ? AND source_id = ? AND collection_name = ?',
      [sourceTable, sourceId, collection],
    );
  }

  async clearCollection(collection: string): Promise<void> {
    await this.ledger.execute('DELETE FROM document_sync_log WHERE collection_name = ?', [collection]);
  }

  async updateSyncState(
    collection: string,
    commit: string,
    documentCount: number,
    chunkCount: number,
    status: string,
    errorMessage: string | null = null,
  ): Promise<void> {
    await this.ledger.execute('DELETE FROM index_sync_state WHERE collection_name = ?', [collection]);
    await this.ledger.execute(
      `INSERT INTO index_sync_state
         (collection_name, last_sync_commit, last_sync_at, document_count, chunk_count, sync_status, error_message)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [collection, commit, new Date().toISOString(), documentCount, chunkCount, status, errorMessage],
    );
  }

  /** Number of documents the sync log holds for the collection. */
  async countSyncedDocuments(collection: string): Promise<number> {
    const rows = await this.ledger.query(
      'SELECT COUNT(*) AS count FROM document_sync_log WHERE collection_name = ?',
      [collection],
    );
    return Number(rows[0]?.count ?? 0);
  }

  async startOperation(type: SyncOperationType, branch: string, commitBefore: string | null): Promise<string> {
    const id = randomUUID();
    await this.ledger.execute(
      `INSERT INTO sync_operations
         (id, operation_type, ledger_branch, commit_before, operation_status, started_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [id, type, branch, commitBefore, 'started', new Date().toISOString()],
    );
    return id;
  }

  async completeOperation(id: string, result: SyncResult): Promise<void> {
    await this.ledger.execute(
      `UPDATE sync_operations
       SET commit_after = ?, documents_added = ?, documents_modified = ?, documents_deleted = ?,
           chunks_processed = ?, operation_status = ?, error_message = ?, completed_at = ?
       WHERE id = ?`,
      [
        result.commitHash,
        result.added,
        result.modified,
        result.deleted,
        result.chunksProcessed,
        result.status,
        result.errorMessage,
        new Date().toISOString(),
        id,
      ],
    );
  }
}
