/**
 * Drives ledger operations and keeps the branch's index collection in step.
 *
 * Every operation runs under the repository mutex and follows the same
 * shape: log the start in `sync_operations`, run the ledger command, push the
 * resulting changes into the index, update the sync log and state, then
 * rewrite the manifest and invalidate the cached sync state.
 */

import { calculateContentHash, getChunkIds } from '../chunking/chunker.js';
import { ConflictUnresolvedError, LedgerOperationError, NotFoundError, errorMessage } from '../errors.js';
import type { IndexStore } from '../index-store/types.js';
import { getIdColumn } from '../ledger/sql.js';
import type { ConflictInfo, LedgerClient } from '../ledger/types.js';
import type { PushOutcome } from '../ledger/push-output.js';
import {
  SOURCE_TABLES,
  type ChangeSummary,
  type DeletedDocument,
  type DocumentDelta,
  type Metadata,
  type SourceTable,
  type SyncOperationType,
  type SyncResult,
} from '../types.js';
import { SyncBookkeeping } from './bookkeeping.js';
import { DeltaDetector, summarizeChanges } from './delta-detector.js';
import type { DeletionTracker } from './deletion-tracker.js';
import { RepositoryMutex } from './lock.js';
import {
  createManifest,
  withLedgerState,
  type ManifestState,
  type ManifestStore,
  type OnBranchChangePolicy,
} from './manifest.js';
import { SyncStateChecker } from './sync-state.js';

export const DEFAULT_COLLECTION_PREFIX = 'kb_';
const BRANCH_SLUG_LENGTH = 20;

/** Index collection for a ledger branch: `/`, `_` and spaces become `-`, cut to 20 chars. */
export function collectionNameForBranch(branch: string, prefix: string = DEFAULT_COLLECTION_PREFIX): string {
  return prefix + branch.replace(/[/_ ]/g, '-').slice(0, BRANCH_SLUG_LENGTH);
}

export interface PullSyncResult extends SyncResult {
  wasFastForward: boolean;
  hasConflicts: boolean;
}

export interface CheckoutSyncResult extends SyncResult {
  branch: string;
  collectionName: string;
  fullSync: boolean;
}

export type MergeStatus = 'merged' | 'conflicts_detected' | 'failed';

export interface MergeSyncResult extends SyncResult {
  hasConflicts: boolean;
  mergeStatus: MergeStatus;
  conflicts: ConflictInfo[];
}

export interface PushSyncResult extends SyncResult {
  /** Null when the push never ran. */
  outcome: PushOutcome | null;
  message: string;
}

export interface DeleteDocumentResult {
  sourceTable: SourceTable;
  sourceId: string;
  collectionName: string;
  chunksRemoved: number;
}

export interface UpsertDocumentInput {
  docId: string;
  content: string;
  title?: string;
  category?: string;
  toolName?: string;
  toolVersion?: string;
}

export interface UpsertDocumentResult {
  docId: string;
  contentHash: string;
  created: boolean;
  sync: SyncResult;
}

export interface SyncManagerOptions {
  ledger: LedgerClient;
  index: IndexStore;
  deletionTracker: DeletionTracker;
  manifests: ManifestStore;
  stateChecker?: SyncStateChecker;
  mutex?: RepositoryMutex;
  collectionPrefix?: string;
  /** Written to the manifest's updatedBy. */
  updatedBy?: string;
}

function emptyResult(status: SyncResult['status'], commitHash: string | null): SyncResult {
  return {
    status,
    success: status === 'completed' || status === 'no_changes',
    added: 0,
    modified: 0,
    deleted: 0,
    chunksProcessed: 0,
    commitHash,
    errorMessage: null,
  };
}

/**
 * What a running operation has done so far. Sync steps count into `result`
 * as they go, so a failure reports the work already applied.
 */
interface OperationProgress {
  result: SyncResult;
  /** Set once the ledger command itself has succeeded; the manifest then follows the new head. */
  ledgerChanged: boolean;
}

function newProgress(): OperationProgress {
  return { result: emptyResult('completed', null), ledgerChanged: false };
}

function indexMetadata(delta: DocumentDelta): Metadata {
  return {
    ...delta.metadata,
    source_table: delta.sourceTable,
    ...(delta.identifier !== null ? { identifier: delta.identifier } : {}),
  };
}

export class SyncManager {
  readonly ledger: LedgerClient;
  readonly index: IndexStore;
  readonly detector: DeltaDetector;
  readonly stateChecker: SyncStateChecker;
  private readonly tracker: DeletionTracker;
  private readonly manifests: ManifestStore;
  private readonly bookkeeping: SyncBookkeeping;
  private readonly mutex: RepositoryMutex;
  private readonly prefix: string;
  private readonly updatedBy: string | undefined;

  constructor(options: SyncManagerOptions) {
    this.ledger = options.ledger;
    this.index = options.index;
    this.tracker = options.deletionTracker;
    this.manifests = options.manifests;
    this.detector = new DeltaDetector(options.ledger);
    this.bookkeeping = new SyncBookkeeping(options.ledger);
    this.stateChecker = options.stateChecker ?? new SyncStateChecker(options.ledger, options.manifests);
    this.mutex = options.mutex ?? new RepositoryMutex();
    this.prefix = options.collectionPrefix ?? DEFAULT_COLLECTION_PREFIX;
    this.updatedBy = options.updatedBy;
  }

  get repoPath(): string {
    return this.ledger.repoPath;
  }

  async getCurrentCollectionName(): Promise<string> {
    return collectionNameForBranch(await this.ledger.getCurrentBranch(), this.prefix);
  }

  // === Ledger workflows ===

  /** Stage and commit the working set, then bring the index up to date. */
  async processCommit(message: string, syncAfter = true): Promise<SyncResult> {
    return this.runOperation('commit', async (progress): Promise<SyncResult> => {
      const staged = this.tracker.markAllStaged(this.repoPath);

      const add = await this.ledger.addAll();
      if (!add.success) {
        throw new LedgerOperationError(`Ledger add failed: ${add.error.trim()}`, {
          exitCode: add.exitCode,
          stderr: add.error,
        });
      }

      const commit = await this.ledger.commit(message);
      if (!commit.success) {
        if (commit.message === 'Nothing to commit') {
          return emptyResult('no_changes', await this.ledger.getHeadCommitHash());
        }
        throw new LedgerOperationError(`Ledger commit failed: ${commit.message}`);
      }
      progress.ledgerChanged = true;
      progress.result.commitHash = commit.commitHash;

      if (staged > 0) {
        this.tracker.markAllCommitted(this.repoPath, commit.commitHash);
        this.tracker.cleanupCommittedDeletions(this.repoPath);
      }

      if (!syncAfter) return emptyResult('completed', commit.commitHash);
      const sync = await this.syncIncremental(await this.getCurrentCollectionName(), progress);
      return { ...sync, status: 'completed', success: true, commitHash: commit.commitHash };
    });
  }

  async processPull(remote = 'origin', branch?: string): Promise<PullSyncResult> {
    const flags = { wasFastForward: false, hasConflicts: false };

    const work = async (progress: OperationProgress): Promise<PullSyncResult> => {
      const before = await this.ledger.getHeadCommitHash();
      const pull = await this.ledger.pull(remote, branch);
      flags.wasFastForward = pull.wasFastForward;
      flags.hasConflicts = pull.hasConflicts;

      if (pull.hasConflicts) {
        return { ...emptyResult('conflicts', before), ...flags, errorMessage: pull.message };
      }
      if (!pull.success) {
        throw new LedgerOperationError(`Ledger pull failed: ${pull.message}`);
      }

      const after = await this.ledger.getHeadCommitHash();
      if (after === before) return { ...emptyResult('no_changes', after), ...flags };
      progress.ledgerChanged = true;
      progress.result.commitHash = after;
      return { ...(await this.syncIncremental(await this.getCurrentCollectionName(), progress)), ...flags };
    };

    return this.runOperation('pull', work, (failed): PullSyncResult => ({ ...failed, ...flags }));
  }

  /**
   * Switch branches and sync that branch's collection. The manifest's
   * onBranchChange policy decides whether pending deletions follow the switch
   * and whether the collection is rebuilt.
   */
  async processCheckout(branch: string, createNew = false): Promise<CheckoutSyncResult> {
    const collectionName = collectionNameForBranch(branch, this.prefix);
    let fullSync = false;

    const work = async (progress: OperationProgress): Promise<CheckoutSyncResult> => {
      const fromBranch = await this.ledger.getCurrentBranch();
      const fromCommit = await this.ledger.getHeadCommitHash();

      const checkout = await this.ledger.checkout(branch, createNew);
      if (!checkout.success) {
        throw new LedgerOperationError(`Ledger checkout of ${branch} failed: ${checkout.error.trim()}`, {
          exitCode: checkout.exitCode,
          stderr: checkout.error,
        });
      }
      const toCommit = await this.ledger.getHeadCommitHash();
      progress.ledgerChanged = true;
      progress.result.commitHash = toCommit;

      const policy = await this.branchChangePolicy();
      await this.tracker.handleBranchChange(this.repoPath, this.ledger, {
        fromBranch,
        toBranch: branch,
        fromCommit,
        toCommit,
        keepChanges: policy !== 'sync_to_manifest',
      });

      const existing = await this.index.getCollection(collectionName);
      fullSync = existing === null || policy === 'sync_to_manifest';
      const sync = fullSync
        ? await this.syncFull(collectionName, progress)
        : await this.syncIncremental(collectionName, progress);
      return { ...sync, branch, collectionName, fullSync };
    };

    return this.runOperation('checkout', work, (failed): CheckoutSyncResult => ({
      ...failed,
      branch,
      collectionName,
      fullSync,
    }));
  }

  /** Merge a branch in; on conflicts the index is left untouched. */
  async processMerge(sourceBranch: string): Promise<MergeSyncResult> {
    const work = async (progress: OperationProgress): Promise<MergeSyncResult> => {
      const merge = await this.ledger.merge(sourceBranch);

      if (merge.hasConflicts) {
        const conflicts: ConflictInfo[] = [];
        for (const table of SOURCE_TABLES) {
          const found = await this.ledger.getConflicts(table);
          conflicts.push(...found.filter((c) => c.numConflicts > 0));
        }
        const error = new ConflictUnresolvedError(
          conflicts.length > 0 ? conflicts.map((c) => c.tableName) : [...SOURCE_TABLES],
        );
        return {
          ...emptyResult('conflicts', await this.ledger.getHeadCommitHash()),
          errorMessage: error.message,
          hasConflicts: true,
          mergeStatus: 'conflicts_detected',
          conflicts,
        };
      }
      if (!merge.success) {
        throw new LedgerOperationError(`Ledger merge of ${sourceBranch} failed: ${merge.message}`);
      }
      progress.ledgerChanged = true;
      progress.result.commitHash = merge.mergeCommitHash ?? (await this.ledger.getHeadCommitHash());

      const sync = await this.syncIncremental(await this.getCurrentCollectionName(), progress);
      return {
        ...sync,
        commitHash: merge.mergeCommitHash ?? sync.commitHash,
        hasConflicts: false,
        mergeStatus: 'merged',
        conflicts: [],
      };
    };

    return this.runOperation('merge', work, (failed): MergeSyncResult => ({
      ...failed,
      hasConflicts: false,
      mergeStatus: 'failed',
      conflicts: [],
    }));
  }

  /** Hard-reset the ledger and rebuild the branch's collection from scratch. */
  async processReset(target: string): Promise<SyncResult> {
    return this.runOperation('reset', async (progress): Promise<SyncResult> => {
      const reset = await this.ledger.resetHard(target);
      if (!reset.success) {
        throw new LedgerOperationError(`Ledger reset to ${target} failed: ${reset.error.trim()}`, {
          exitCode: reset.exitCode,
          stderr: reset.error,
        });
      }
      progress.ledgerChanged = true;
      const collection = await this.getCurrentCollectionName();
      await this.index.deleteCollection(collection);
      return this.syncFull(collection, progress);
    });
  }

  /** Push to the remote; the manifest records the pushed head on success. */
  async processPush(remote = 'origin', branch?: string): Promise<PushSyncResult> {
    const work = async (): Promise<PushSyncResult> => {
      const push = await this.ledger.push(remote, branch);
      if (!push.success) {
        return {
          ...emptyResult('failed', null),
          errorMessage: push.message,
          outcome: push.outcome,
          message: push.message,
        };
      }
      return {
        ...emptyResult('completed', await this.ledger.getHeadCommitHash()),
        outcome: push.outcome,
        message: push.message,
      };
    };

    return this.runOperation(
      'push',
      work,
      (failed): PushSyncResult => ({ ...failed, outcome: null, message: failed.errorMessage ?? 'Push failed' }),
      { remote },
    );
  }

  // === Index sync ===

  /** Rebuild the collection from every source row. Checks `signal` between documents. */
  async fullSync(collection?: string, signal?: AbortSignal): Promise<SyncResult> {
    return this.runOperation('full_sync', async (progress): Promise<SyncResult> =>
      this.syncFull(collection ?? (await this.getCurrentCollectionName()), progress, signal),
    );
  }

  async incrementalSync(collection?: string): Promise<SyncResult> {
    return this.runOperation('incremental_sync', async (progress): Promise<SyncResult> =>
      this.syncIncremental(collection ?? (await this.getCurrentCollectionName()), progress),
    );
  }

  /** What the next incremental sync of the current collection would apply. */
  async getPendingChanges(collection?: string): Promise<ChangeSummary> {
    const name = collection ?? (await this.getCurrentCollectionName());
    const [pending, deleted] = await Promise.all([
      this.detector.getPendingSyncDocuments(name),
      this.detector.getDeletedDocuments(name),
    ]);
    return summarizeChanges(pending, deleted);
  }

  async hasPendingChanges(collection?: string): Promise<boolean> {
    return (await this.getPendingChanges(collection)).hasChanges;
  }

  // === Document edits ===

  /** Delete a source row from the working set and the index, and remember the deletion. */
  async deleteDocument(sourceTable: SourceTable, sourceId: string): Promise<DeleteDocumentResult> {
    return this.mutex.runExclusive(this.repoPath, async () => {
      const idColumn = getIdColumn(sourceTable);
      const rows = await this.ledger.query(
        `SELECT content_hash, title FROM ${sourceTable} WHERE ${idColumn} = ?`,
        [sourceId],
      );
      if (rows.length === 0) {
        throw new NotFoundError(`No ${sourceTable} row with id ${sourceId}`);
      }
      const hash = rows[0].content_hash;
      const title = rows[0].title;

      const [branch, head, collectionName] = await Promise.all([
        this.ledger.getCurrentBranch(),
        this.ledger.getHeadCommitHash(),
        this.getCurrentCollectionName(),
      ]);

      await this.ledger.execute(`DELETE FROM ${sourceTable} WHERE ${idColumn} = ?`, [sourceId]);
      const chunksRemoved = await this.removeFromIndex(sourceTable, sourceId, collectionName);

      this.tracker.trackDeletion(this.repoPath, {
        docId: sourceId,
        collectionName,
        originalContentHash: typeof hash === 'string' ? hash : null,
        originalMetadata: {
          source_table: sourceTable,
          ...(typeof title === 'string' ? { title } : {}),
        },
        branchContext: branch,
        baseCommitHash: head,
      });
      this.stateChecker.invalidateCache();

      console.error(`Sync: deleted ${sourceTable}/${sourceId} (${chunksRemoved} chunk(s))`);
      return { sourceTable, sourceId, collectionName, chunksRemoved };
    });
  }

  /** Write a knowledge_docs row, cancel any pending deletion of it, and index it. */
  async upsertDocument(input: UpsertDocumentInput): Promise<UpsertDocumentResult> {
    return this.mutex.runExclusive(this.repoPath, async () => {
      const contentHash = calculateContentHash(input.content);
      const now = new Date().toISOString();
      const collectionName = await this.getCurrentCollectionName();

      const existing = await this.ledger.query('SELECT created_at FROM knowledge_docs WHERE doc_id = ?', [
        input.docId,
      ]);
      const createdAt = existing[0]?.created_at;

      await this.ledger.execute('DELETE FROM knowledge_docs WHERE doc_id = ?', [input.docId]);
      await this.ledger.execute(
        `INSERT INTO knowledge_docs
           (doc_id, category, tool_name, tool_version, title, content, content_hash, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          input.docId,
          input.category ?? null,
          input.toolName ?? null,
          input.toolVersion ?? null,
          input.title ?? null,
          input.content,
          contentHash,
          typeof createdAt === 'string' ? createdAt : now,
          now,
        ],
      );

      this.tracker.removeDeletionTracking(this.repoPath, input.docId, collectionName);
      const sync = await this.syncIncremental(collectionName, newProgress());
      this.stateChecker.invalidateCache();

      return { docId: input.docId, contentHash, created: existing.length === 0, sync };
    });
  }

  // === Internals ===

  /**
   * Run one workflow under the repository mutex with operation logging.
   * A thrown error becomes a failed result carrying the progress made so far,
   * extended by `onFailure` for workflows with a wider result.
   */
  private runOperation(
    type: SyncOperationType,
    work: (progress: OperationProgress) => Promise<SyncResult>,
  ): Promise<SyncResult>;
  private runOperation<T extends SyncResult>(
    type: SyncOperationType,
    work: (progress: OperationProgress) => Promise<T>,
    onFailure: (failed: SyncResult) => T,
    manifestOptions?: { remote?: string },
  ): Promise<T>;
  private async runOperation(
    type: SyncOperationType,
    work: (progress: OperationProgress) => Promise<SyncResult>,
    onFailure?: (failed: SyncResult) => SyncResult,
    manifestOptions: { remote?: string } = {},
  ): Promise<SyncResult> {
    return this.mutex.runExclusive(this.repoPath, async () => {
      let operationId: string | null = null;
      let result: SyncResult;
      const progress = newProgress();

      try {
        const [branch, head] = await Promise.all([
          this.ledger.getCurrentBranch(),
          this.ledger.getHeadCommitHash(),
        ]);
        operationId = await this.bookkeeping.startOperation(type, branch, head);
      } catch (error) {
        console.error(`Sync: could not record start of ${type}:`, error);
      }

      try {
        result = await work(progress);
      } catch (error) {
        console.error(`Sync: ${type} failed for ${this.repoPath}:`, error);
        const failed: SyncResult = {
          ...progress.result,
          status: 'failed',
          success: false,
          errorMessage: errorMessage(error),
        };
        result = onFailure ? onFailure(failed) : failed;
      }

      if (operationId) {
        try {
          await this.bookkeeping.completeOperation(operationId, result);
        } catch (error) {
          console.error(`Sync: could not record completion of ${type}:`, error);
        }
      }

      this.stateChecker.invalidateCache();
      if (result.success || progress.ledgerChanged) await this.updateManifest(manifestOptions.remote);
      return result;
    });
  }

  private async syncIncremental(collection: string, progress: OperationProgress): Promise<SyncResult> {
    await this.index.createCollection(collection);

    const [since, head] = await Promise.all([
      this.detector.getLastSyncCommit(collection),
      this.ledger.getHeadCommitHash(),
    ]);
    const result = progress.result;
    result.commitHash = head;

    const changes =
      since && since !== head
        ? await this.detector.getChangesSinceCommit(since, collection)
        : summarizeChanges(
            await this.detector.getPendingSyncDocuments(collection),
            await this.detector.getDeletedDocuments(collection),
          );

    if (!changes.hasChanges) {
      await this.recordState(collection, head);
      return { ...result, status: 'no_changes' };
    }

    for (const deleted of changes.deletedDocuments) {
      await this.removeDeleted(deleted);
      result.deleted++;
    }

    for (const delta of [...changes.newDocuments, ...changes.modifiedDocuments]) {
      if (this.tracker.isDeletionPending(this.repoPath, delta.sourceId, collection)) continue;
      result.chunksProcessed += await this.writeDocument(delta, collection);
      if (delta.changeType === 'new') {
        result.added++;
      } else {
        result.modified++;
      }
    }

    await this.recordState(collection, head);
    console.error(
      `Sync: ${collection} +${result.added} ~${result.modified} -${result.deleted} (${result.chunksProcessed} chunks)`,
    );
    return { ...result };
  }

  private async syncFull(collection: string, progress: OperationProgress, signal?: AbortSignal): Promise<SyncResult> {
    await this.bookkeeping.clearCollection(collection);
    await this.index.deleteCollection(collection);
    await this.index.createCollection(collection);

    const head = await this.ledger.getHeadCommitHash();
    const documents = await this.detector.getAllDocuments();
    const result = progress.result;
    result.commitHash = head;

    for (const delta of documents) {
      signal?.throwIfAborted();
      if (this.tracker.isDeletionPending(this.repoPath, delta.sourceId, collection)) continue;
      result.chunksProcessed += await this.writeDocument(delta, collection);
      result.added++;
    }

    await this.recordState(collection, head);
    console.error(`Sync: full sync of ${collection}: ${result.added} document(s), ${result.chunksProcessed} chunks`);
    return { ...result, status: result.added === 0 ? 'no_changes' : 'completed' };
  }

  /** Replace the document's chunks in the index and log them. Returns the chunk count. */
  private async writeDocument(delta: DocumentDelta, collection: string): Promise<number> {
    if (delta.changeType === 'modified') {
      await this.removeFromIndex(delta.sourceTable, delta.sourceId, collection);
    }

    const added = await this.index.addDocuments(collection, [delta.content], [delta.sourceId], [indexMetadata(delta)], {
      allowDuplicateIds: true,
      markAsLocalChange: false,
    });

    await this.bookkeeping.recordSyncedDocument(
      delta.sourceTable,
      delta.sourceId,
      collection,
      delta.contentHash,
      getChunkIds(delta.sourceId, added.chunks),
      delta.changeType === 'new' ? 'added' : 'modified',
    );
    return added.chunks;
  }

  private async removeDeleted(deleted: DeletedDocument): Promise<void> {
    if (deleted.chunkIds.length > 0) {
      await this.index.deleteDocuments(deleted.collectionName, deleted.chunkIds, false);
    } else {
      await this.index.deleteDocuments(deleted.collectionName, [deleted.sourceId], true);
    }
    await this.bookkeeping.removeSyncLogEntry(deleted.sourceTable, deleted.sourceId, deleted.collectionName);
  }

  /** Remove a document's chunks using the ids its sync-log entry recorded. */
  private async removeFromIndex(sourceTable: SourceTable, sourceId: string, collection: string): Promise<number> {
    if (!(await this.index.getCollection(collection))) return 0;

    const chunkIds = await this.bookkeeping.getSyncedChunkIds(sourceTable, sourceId, collection);
    const removed =
      chunkIds.length > 0
        ? await this.index.deleteDocuments(collection, chunkIds, false)
        : await this.index.deleteDocuments(collection, [sourceId], true);
    await this.bookkeeping.removeSyncLogEntry(sourceTable, sourceId, collection);
    return removed;
  }

  private async recordState(collection: string, head: string): Promise<void> {
    const [documentCount, chunkCount] = await Promise.all([
      this.bookkeeping.countSyncedDocuments(collection),
      this.index.getDocumentCount(collection),
    ]);
    await this.bookkeeping.updateSyncState(collection, head, documentCount, chunkCount, 'synced');
  }

  private async branchChangePolicy(): Promise<OnBranchChangePolicy> {
    try {
      const manifest = await this.manifests.read();
      return manifest?.initialization.onBranchChange ?? 'preserve_local';
    } catch (error) {
      console.error('Sync: manifest unreadable, keeping local changes on branch switch:', error);
      return 'preserve_local';
    }
  }

  private async updateManifest(remote?: string): Promise<void> {
    try {
      const [currentBranch, currentCommit] = await Promise.all([
        this.ledger.getCurrentBranch(),
        this.ledger.getHeadCommitHash(),
      ]);
      const remoteUrl = remote ? await this.ledger.getRemoteUrl(remote) : undefined;

      let current: ManifestState | null = null;
      try {
        current = await this.manifests.read();
      } catch (error) {
        console.error('Sync: replacing unreadable manifest:', error);
      }

      const base = current ?? createManifest({ updatedBy: this.updatedBy });
      await this.manifests.write(
        withLedgerState(base, { currentBranch, currentCommit, remoteUrl: remoteUrl ?? undefined }, this.updatedBy),
      );
    } catch (error) {
      console.error('Sync: manifest update failed:', error);
    }
  }
}
