/**
 * Local record of documents and collections deleted through the tools.
 *
 * A deleted document must not be re-added by the next sync, even if the
 * ledger still has its row (the deletion is not committed yet) or a branch
 * switch brings it back. Records live in the local state database, outside
 * the ledger, so they survive checkouts and resets.
 *
 * Document lifecycle: pending -> staged -> committed, then garbage-collected.
 * Re-adding a document cancels a pending or staged record.
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { getDb } from '../db/connection.js';
import { isCommitReachable } from '../ledger/history.js';
import type { LedgerClient } from '../ledger/types.js';
import {
  COLLECTION_OPERATION_TYPES,
  DELETION_STATES,
  parseMetadataJson,
  type CollectionOperationType,
  type DeletionState,
  type Metadata,
} from '../types.js';

export const DEFAULT_STALE_DAYS = 30;

export interface DeletionRecord {
  id: string;
  repoPath: string;
  docId: string;
  collectionName: string;
  deletedAt: string;
  deletionSource: string;
  originalContentHash: string | null;
  originalMetadata: Metadata;
  branchContext: string | null;
  baseCommitHash: string | null;
  syncStatus: DeletionState;
  ledgerCommitHash: string | null;
}

export interface CollectionDeletionRecord {
  id: string;
  repoPath: string;
  collectionName: string;
  operationType: CollectionOperationType;
  deletedAt: string;
  deletionSource: string;
  originalName: string | null;
  newName: string | null;
  originalMetadata: Metadata;
  newMetadata: Metadata;
  syncStatus: DeletionState;
  ledgerCommitHash: string | null;
}

interface DeletionRow {
  id: string;
  repo_path: string;
  doc_id: string;
  collection_name: string;
  deleted_at: string;
  deletion_source: string;
  original_content_hash: string | null;
  original_metadata: string | null;
  branch_context: string | null;
  base_commit_hash: string | null;
  sync_status: string;
  ledger_commit_hash: string | null;
}

interface CollectionDeletionRow {
  id: string;
  repo_path: string;
  collection_name: string;
  operation_type: string;
  deleted_at: string;
  deletion_source: string;
  original_name: string | null;
  new_name: string | null;
  original_metadata: string | null;
  new_metadata: string | null;
  sync_status: string;
  ledger_commit_hash: string | null;
}

function toState(value: string): DeletionState {
  return DELETION_STATES.find((s) => s === value) ?? 'pending';
}

function toOperationType(value: string): CollectionOperationType {
  return COLLECTION_OPERATION_TYPES.find((t) => t === value) ?? 'deletion';
}

function rowToRecord(row: DeletionRow): DeletionRecord {
  return {
    id: row.id,
    repoPath: row.repo_path,
    docId: row.doc_id,
    collectionName: row.collection_name,
    deletedAt: row.deleted_at,
    deletionSource: row.deletion_source,
    originalContentHash: row.original_content_hash,
    originalMetadata: parseMetadataJson(row.original_metadata),
    branchContext: row.branch_context,
    baseCommitHash: row.base_commit_hash,
    syncStatus: toState(row.sync_status),
    ledgerCommitHash: row.ledger_commit_hash,
  };
}

function rowToCollectionRecord(row: CollectionDeletionRow): CollectionDeletionRecord {
  return {
    id: row.id,
    repoPath: row.repo_path,
    collectionName: row.collection_name,
    operationType: toOperationType(row.operation_type),
    deletedAt: row.deleted_at,
    deletionSource: row.deletion_source,
    originalName: row.original_name,
    newName: row.new_name,
    originalMetadata: parseMetadataJson(row.original_metadata),
    newMetadata: parseMetadataJson(row.new_metadata),
    syncStatus: toState(row.sync_status),
    ledgerCommitHash: row.ledger_commit_hash,
  };
}

export interface TrackDeletionInput {
  docId: string;
  collectionName: string;
  originalContentHash?: string | null;
  originalMetadata?: Metadata;
  branchContext?: string | null;
  baseCommitHash?: string | null;
  deletionSource?: string;
}

export class DeletionTracker {
  constructor(private readonly db: Database.Database = getDb()) {}

  // === Documents ===

  /** Record a pending deletion, replacing any earlier record for the same key. */
  trackDeletion(repoPath: string, input: TrackDeletionInput): DeletionRecord {
    const id = randomUUID();
    const now = new Date().toISOString();

    this.db.transaction(() => {
      this.db
        .prepare('DELETE FROM local_deletions WHERE repo_path = ? AND doc_id = ? AND collection_name = ?')
        .run(repoPath, input.docId, input.collectionName);
      this.db
        .prepare(
          `INSERT INTO local_deletions
             (id, repo_path, doc_id, collection_name, deleted_at, deletion_source,
              original_content_hash, original_metadata, branch_context, base_commit_hash, sync_status)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending')`,
        )
        .run(
          id,
          repoPath,
          input.docId,
          input.collectionName,
          now,
          input.deletionSource ?? 'mcp_tool',
          input.originalContentHash ?? null,
          JSON.stringify(input.originalMetadata ?? {}),
          input.branchContext ?? null,
          input.baseCommitHash ?? null,
        );
    })();

    return {
      id,
      repoPath,
      docId: input.docId,
      collectionName: input.collectionName,
      deletedAt: now,
      deletionSource: input.deletionSource ?? 'mcp_tool',
      originalContentHash: input.originalContentHash ?? null,
      originalMetadata: { ...input.originalMetadata },
      branchContext: input.branchContext ?? null,
      baseCommitHash: input.baseCommitHash ?? null,
      syncStatus: 'pending',
      ledgerCommitHash: null,
    };
  }

  getPendingDeletions(repoPath: string, collectionName?: string): DeletionRecord[] {
    return this.byStatus(repoPath, 'pending', collectionName);
  }

  getStagedDeletions(repoPath: string): DeletionRecord[] {
    return this.byStatus(repoPath, 'staged');
  }

  /** True while a pending or staged record exists for the document. */
  isDeletionPending(repoPath: string, docId: string, collectionName: string): boolean {
    const row = this.db
      .prepare(
        `SELECT 1 FROM local_deletions
         WHERE repo_path = ? AND doc_id = ? AND collection_name = ? AND sync_status IN ('pending', 'staged')`,
      )
      .get(repoPath, docId, collectionName);
    return row !== undefined;
  }

  markStaged(repoPath: string, docId: string, collectionName: string): boolean {
    return (
      this.db
        .prepare(
          `UPDATE local_deletions SET sync_status = 'staged'
           WHERE repo_path = ? AND doc_id = ? AND collection_name = ? AND sync_status = 'pending'`,
        )
        .run(repoPath, docId, collectionName).changes > 0
    );
  }

  markCommitted(repoPath: string, docId: string, collectionName: string, commitHash: string | null = null): boolean {
    return (
      this.db
        .prepare(
          `UPDATE local_deletions SET sync_status = 'committed', ledger_commit_hash = ?
           WHERE repo_path = ? AND doc_id = ? AND collection_name = ? AND sync_status IN ('pending', 'staged')`,
        )
        .run(commitHash, repoPath, docId, collectionName).changes > 0
    );
  }

  /** Move every pending record of the repo to staged. Returns the count. */
  markAllStaged(repoPath: string): number {
    return this.db
      .prepare(`UPDATE local_deletions SET sync_status = 'staged' WHERE repo_path = ? AND sync_status = 'pending'`)
      .run(repoPath).changes;
  }

  /** Move every staged record of the repo to committed. Returns the count. */
  markAllCommitted(repoPath: string, commitHash: string | null = null): number {
    return this.db
      .prepare(
        `UPDATE local_deletions SET sync_status = 'committed', ledger_commit_hash = ?
         WHERE repo_path = ? AND sync_status = 'staged'`,
      )
      .run(commitHash, repoPath).changes;
  }

  /** Cancel a pending or staged deletion (the document was re-added). */
  removeDeletionTracking(repoPath: string, docId: string, collectionName: string): boolean {
    return this.db.transaction(() => {
      const changed = this.db
        .prepare(
          `UPDATE local_deletions SET sync_status = 'removed'
           WHERE repo_path = ? AND doc_id = ? AND collection_name = ? AND sync_status IN ('pending', 'staged')`,
        )
        .run(repoPath, docId, collectionName).changes;
      this.db
        .prepare(
          `DELETE FROM local_deletions
           WHERE repo_path = ? AND doc_id = ? AND collection_name = ? AND sync_status = 'removed'`,
        )
        .run(repoPath, docId, collectionName);
      return changed > 0;
    })();
  }

  /**
   * Re-associate pending deletions after a branch switch.
   *
   * With keepChanges every pending record follows the working set to the new
   * branch. Without it, records whose base commit is not in the history of
   * `toCommit` are discarded: that deletion belonged to the other line of
   * work.
   */
  async handleBranchChange(
    repoPath: string,
    ledger: Pick<LedgerClient, 'getLog'>,
    change: { fromBranch: string; toBranch: string; fromCommit: string; toCommit: string; keepChanges: boolean },
  ): Promise<{ moved: number; discarded: number }> {
    const pending = this.getPendingDeletions(repoPath);
    const reassociate = this.db.prepare(
      'UPDATE local_deletions SET branch_context = ?, base_commit_hash = ? WHERE id = ?',
    );
    const discard = this.db.prepare('DELETE FROM local_deletions WHERE id = ?');

    let moved = 0;
    let discarded = 0;

    for (const record of pending) {
      const keep =
        change.keepChanges ||
        record.baseCommitHash === null ||
        (await isCommitReachable(ledger, record.baseCommitHash, change.toCommit));

      if (keep) {
        reassociate.run(change.toBranch, change.toCommit, record.id);
        moved++;
      } else {
        discard.run(record.id);
        discarded++;
      }
    }

    if (pending.length > 0) {
      console.error(
        `Sync: ${change.fromBranch} -> ${change.toBranch}: ${moved} pending deletion(s) kept, ${discarded} discarded`,
      );
    }
    return { moved, discarded };
  }

  cleanupCommittedDeletions(repoPath: string): number {
    return this.db
      .prepare(`DELETE FROM local_deletions WHERE repo_path = ? AND sync_status = 'committed'`)
      .run(repoPath).changes;
  }

  /** Drop pending records older than `maxAgeDays`. */
  cleanupStaleTracking(repoPath: string, maxAgeDays: number = DEFAULT_STALE_DAYS): number {
    const cutoff = new Date(Date.now() - maxAgeDays * 24 * 60 * 60 * 1000).toISOString();
    return this.db
      .prepare(`DELETE FROM local_deletions WHERE repo_path = ? AND sync_status = 'pending' AND deleted_at < ?`)
      .run(repoPath, cutoff).changes;
  }

  // === Collections ===

  trackCollectionDeletion(repoPath: string, collectionName: string, originalMetadata: Metadata = {}): void {
    this.insertCollectionOperation(repoPath, collectionName, 'deletion', {
      originalName: collectionName,
      originalMetadata,
    });
  }

  trackCollectionRename(repoPath: string, originalName: string, newName: string): void {
    this.insertCollectionOperation(repoPath, originalName, 'rename', { originalName, newName });
  }

  trackCollectionMetadataUpdate(
    repoPath: string,
    collectionName: string,
    originalMetadata: Metadata,
    newMetadata: Metadata,
  ): void {
    this.insertCollectionOperation(repoPath, collectionName, 'metadata_update', {
      originalName: collectionName,
      originalMetadata,
      newMetadata,
    });
  }

  /** Pending collection operations: deletions first, then renames, then metadata updates. */
  getPendingCollectionDeletions(repoPath: string): CollectionDeletionRecord[] {
    return this.db
      .prepare<[string], CollectionDeletionRow>(
        `SELECT * FROM local_collection_deletions
         WHERE repo_path = ? AND sync_status = 'pending'
         ORDER BY CASE operation_type WHEN 'deletion' THEN 0 WHEN 'rename' THEN 1 ELSE 2 END, deleted_at`,
      )
      .all(repoPath)
      .map(rowToCollectionRecord);
  }

  markCollectionDeletionCommitted(
    repoPath: string,
    collectionName: string,
    operationType: CollectionOperationType,
    commitHash: string | null = null,
  ): boolean {
    return (
      this.db
        .prepare(
          `UPDATE local_collection_deletions SET sync_status = 'committed', ledger_commit_hash = ?
           WHERE repo_path = ? AND collection_name = ? AND operation_type = ? AND sync_status = 'pending'`,
        )
        .run(commitHash, repoPath, collectionName, operationType).changes > 0
    );
  }

  removeCollectionDeletionTracking(repoPath: string, collectionName: string): number {
    return this.db
      .prepare(
        `DELETE FROM local_collection_deletions
         WHERE repo_path = ? AND collection_name = ? AND sync_status = 'pending'`,
      )
      .run(repoPath, collectionName).changes;
  }

  cleanupCommittedCollectionDeletions(repoPath: string): number {
    return this.db
      .prepare(`DELETE FROM local_collection_deletions WHERE repo_path = ? AND sync_status = 'committed'`)
      .run(repoPath).changes;
  }

  // === Internals ===

  private byStatus(repoPath: string, status: DeletionState, collectionName?: string): DeletionRecord[] {
    if (collectionName !== undefined) {
      return this.db
        .prepare<[string, string, string], DeletionRow>(
          `SELECT * FROM local_deletions
           WHERE repo_path = ? AND sync_status = ? AND collection_name = ? ORDER BY deleted_at`,
        )
        .all(repoPath, status, collectionName)
        .map(rowToRecord);
    }
    return this.db
      .prepare<[string, string], DeletionRow>(
        'SELECT * FROM local_deletions WHERE repo_path = ? AND sync_status = ? ORDER BY deleted_at',
      )
      .all(repoPath, status)
      .map(rowToRecord);
  }

  private insertCollectionOperation(
    repoPath: string,
    collectionName: string,
    operationType: CollectionOperationType,
    details: { originalName?: string; newName?: string; originalMetadata?: Metadata; newMetadata?: Metadata },
  ): void {
    this.db.transaction(() => {
      this.db
        .prepare(
          `DELETE FROM local_collection_deletions
           WHERE repo_path = ? AND collection_name = ? AND operation_type = ?`,
        )
        .run(repoPath, collectionName, operationType);
      this.db
        .prepare(
          `INSERT INTO local_collection_deletions
             (id, repo_path, collection_name, operation_type, deleted_at, original_name, new_name,
              original_metadata, new_metadata, sync_status)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending')`,
        )
        .run(
          randomUUID(),
          repoPath,
          collectionName,
          operationType,
          new Date().toISOString(),
          details.originalName ?? null,
          details.newName ?? null,
          details.originalMetadata ? JSON.stringify(details.originalMetadata) : null,
          details.newMetadata ? JSON.stringify(details.newMetadata) : null,
        );
    })();
  }
}
