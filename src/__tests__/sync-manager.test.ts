/**
 * Workflow tests for SyncManager over the in-process ledger and index.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { calculateContentHash } from '../chunking/chunker.js';
import { NotFoundError } from '../errors.js';
import { createManifest } from '../sync/manifest.js';
import { collectionNameForBranch } from '../sync/sync-manager.js';
import {
  createHarness,
  indexedSourceIds,
  insertIssueLog,
  insertKnowledgeDoc,
  setupTestDb,
  teardownTestDb,
  type Harness,
} from './helpers.js';

describe('collectionNameForBranch', () => {
  it('should slug and truncate branch names', () => {
    expect(collectionNameForBranch('main')).toBe('kb_main');
    expect(collectionNameForBranch('feature/new_ui')).toBe('kb_feature-new-ui');
    expect(collectionNameForBranch('release 2026/very_long_branch_name')).toBe('kb_release-2026-very-lo');
    expect(collectionNameForBranch('main', 'docs_')).toBe('docs_main');
  });
});

describe('SyncManager', () => {
  let h: Harness;

  beforeEach(async () => {
    setupTestDb();
    h = await createHarness();
  });

  afterEach(async () => {
    await h.index.close();
    h.ledger.close();
    teardownTestDb();
  });

  async function documentText(collection: string, sourceId: string): Promise<string[]> {
    return (await h.index.getDocuments(collection, { where: { source_id: sourceId } })).documents;
  }

  describe('full and incremental sync', () => {
    it('should index every source row on full sync', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await insertIssueLog(h.ledger, { id: 'il-1', content: 'Upload timeout log' });
      const head = await h.ledger.getHeadCommitHash();

      const result = await h.manager.fullSync();

      expect(result).toEqual({
        status: 'completed',
        success: true,
        added: 2,
        modified: 0,
        deleted: 0,
        chunksProcessed: 2,
        commitHash: head,
        errorMessage: null,
      });
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['il-1', 'kd-1']);

      const [chunk] = (await h.index.getDocuments('kb_main', { ids: ['kd-1_chunk_0'] })).metadatas;
      expect(chunk).toMatchObject({
        source_table: 'knowledge_docs',
        identifier: 'widget-cli',
        category: 'guide',
        is_local_change: false,
      });

      const [state] = await h.ledger.query(
        'SELECT last_sync_commit, document_count, chunk_count, sync_status FROM index_sync_state WHERE collection_name = ?',
        ['kb_main'],
      );
      expect(state).toEqual({ last_sync_commit: head, document_count: 2, chunk_count: 2, sync_status: 'synced' });
    });

    it('should log the operation in the ledger', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.manager.fullSync();

      const rows = await h.ledger.query(
        'SELECT operation_type, operation_status, documents_added, ledger_branch FROM sync_operations',
      );
      expect(rows).toEqual([
        { operation_type: 'full_sync', operation_status: 'completed', documents_added: 1, ledger_branch: 'main' },
      ]);
    });

    it('should write the manifest after a successful operation', async () => {
      await h.manager.fullSync();

      const manifest = await h.manifests.read();
      expect(manifest?.ledger.currentBranch).toBe('main');
      expect(manifest?.ledger.currentCommit).toBe(await h.ledger.getHeadCommitHash());
      expect(manifest?.updatedBy).toBe('test-host');
    });

    it('should apply new, modified and deleted rows incrementally', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await insertIssueLog(h.ledger, { id: 'il-1', content: 'Upload timeout log' });
      await h.manager.fullSync();

      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide v2' });
      await insertKnowledgeDoc(h.ledger, { id: 'kd-2', content: 'Second guide' });
      await h.ledger.execute('DELETE FROM issue_logs WHERE log_id = ?', ['il-1']);

      expect(await h.manager.getPendingChanges()).toMatchObject({ newCount: 1, modifiedCount: 1, deletedCount: 1 });

      const result = await h.manager.incrementalSync();

      expect(result).toMatchObject({ status: 'completed', added: 1, modified: 1, deleted: 1 });
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-1', 'kd-2']);
      expect(await documentText('kb_main', 'kd-1')).toEqual(['Widget setup guide v2']);
      expect(await h.manager.hasPendingChanges()).toBe(false);

      expect((await h.manager.incrementalSync()).status).toBe('no_changes');
    });

    it('should rechunk long documents and replace every old chunk', async () => {
      const long = 'The widget reads its settings from a file next to the binary. ' + 'x'.repeat(40);
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: long });
      const first = await h.manager.fullSync();
      expect(first.chunksProcessed).toBeGreaterThan(1);

      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'short now' });
      await h.manager.incrementalSync();

      expect((await h.index.getDocuments('kb_main')).ids).toEqual(['kd-1_chunk_0']);
      expect(await documentText('kb_main', 'kd-1')).toEqual(['short now']);
    });

    it('should stop a full sync when aborted', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      const controller = new AbortController();
      controller.abort();

      const result = await h.manager.fullSync(undefined, controller.signal);

      expect(result.status).toBe('failed');
      expect(result.success).toBe(false);
      expect(await h.manifests.read()).toBeNull();
    });

    it('should report documents already indexed when a later one fails', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await insertKnowledgeDoc(h.ledger, { id: 'kd-2', content: 'Second guide' });
      const head = await h.ledger.getHeadCommitHash();
      const addDocuments = h.index.addDocuments.bind(h.index);
      let calls = 0;
      vi.spyOn(h.index, 'addDocuments').mockImplementation(async (...args) => {
        calls++;
        if (calls === 2) throw new Error('index write failed');
        return addDocuments(...args);
      });

      const result = await h.manager.incrementalSync();

      expect(result).toEqual({
        status: 'failed',
        success: false,
        added: 1,
        modified: 0,
        deleted: 0,
        chunksProcessed: 1,
        commitHash: head,
        errorMessage: 'index write failed',
      });
      expect(await indexedSourceIds(h.index, 'kb_main')).toHaveLength(1);

      const rows = await h.ledger.query('SELECT operation_status, documents_added FROM sync_operations');
      expect(rows).toEqual([{ operation_status: 'failed', documents_added: 1 }]);
    });
  });

  describe('processCommit', () => {
    it('should keep the new commit in the result and manifest when indexing fails', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      const before = await h.ledger.getHeadCommitHash();
      vi.spyOn(h.index, 'addDocuments').mockRejectedValue(new Error('index write failed'));

      const result = await h.manager.processCommit('Add widget guide');

      const head = await h.ledger.getHeadCommitHash();
      expect(head).not.toBe(before);
      expect(result).toMatchObject({
        status: 'failed',
        success: false,
        added: 0,
        commitHash: head,
        errorMessage: 'index write failed',
      });
      expect((await h.manifests.read())?.ledger.currentCommit).toBe(head);
    });

    it('should commit the working set and index new rows', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });

      const result = await h.manager.processCommit('Add widget guide');

      const head = await h.ledger.getHeadCommitHash();
      expect(result).toMatchObject({ status: 'completed', success: true, added: 1, commitHash: head });
      expect(h.ledger.calls).toEqual(['add .', 'commit Add widget guide']);
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-1']);
    });

    it('should skip the index when sync_after is off', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });

      const result = await h.manager.processCommit('Add widget guide', false);

      expect(result).toMatchObject({ status: 'completed', added: 0 });
      expect(await h.index.getCollection('kb_main')).toBeNull();
    });

    it('should report no changes when there is nothing to commit', async () => {
      vi.spyOn(h.ledger, 'commit').mockResolvedValue({
        success: false,
        commitHash: null,
        message: 'Nothing to commit',
      });

      const result = await h.manager.processCommit('Empty');
      expect(result).toMatchObject({ status: 'no_changes', success: true });
    });

    it('should commit tracked deletions and stop tracking them', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.manager.fullSync();
      await h.manager.deleteDocument('knowledge_docs', 'kd-1');
      expect(h.tracker.isDeletionPending(h.ledger.repoPath, 'kd-1', 'kb_main')).toBe(true);

      await h.manager.processCommit('Remove widget guide');

      expect(h.tracker.isDeletionPending(h.ledger.repoPath, 'kd-1', 'kb_main')).toBe(false);
      expect(h.tracker.getStagedDeletions(h.ledger.repoPath)).toEqual([]);
    });
  });

  describe('document edits', () => {
    it('should delete a row from the ledger and the index', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide', title: 'Widget' });
      await h.manager.fullSync();

      const result = await h.manager.deleteDocument('knowledge_docs', 'kd-1');

      expect(result).toEqual({
        sourceTable: 'knowledge_docs',
        sourceId: 'kd-1',
        collectionName: 'kb_main',
        chunksRemoved: 1,
      });
      expect(await h.ledger.query('SELECT doc_id FROM knowledge_docs')).toEqual([]);
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual([]);

      const [record] = h.tracker.getPendingDeletions(h.ledger.repoPath);
      expect(record).toMatchObject({
        docId: 'kd-1',
        collectionName: 'kb_main',
        originalContentHash: calculateContentHash('Widget setup guide'),
        originalMetadata: { source_table: 'knowledge_docs', title: 'Widget' },
        branchContext: 'main',
      });
    });

    it('should fail for a missing row', async () => {
      await expect(h.manager.deleteDocument('issue_logs', 'nope')).rejects.toThrow(
        new NotFoundError('No issue_logs row with id nope'),
      );
    });

    it('should not re-add a deleted document that reappears in the ledger', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await insertKnowledgeDoc(h.ledger, { id: 'kd-2', content: 'Second guide' });
      await h.manager.fullSync();
      await h.manager.deleteDocument('knowledge_docs', 'kd-1');

      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      const result = await h.manager.incrementalSync();

      expect(result.added).toBe(0);
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-2']);

      await h.manager.fullSync();
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-2']);
    });

    it('should create a document and index it', async () => {
      const result = await h.manager.upsertDocument({
        docId: 'kd-new',
        content: 'Fresh guide',
        title: 'Fresh',
        category: 'howto',
        toolName: 'widget-cli',
      });

      expect(result).toMatchObject({
        docId: 'kd-new',
        contentHash: calculateContentHash('Fresh guide'),
        created: true,
        sync: { status: 'completed', added: 1 },
      });
      const [row] = await h.ledger.query('SELECT title, category, tool_version FROM knowledge_docs WHERE doc_id = ?', [
        'kd-new',
      ]);
      expect(row).toEqual({ title: 'Fresh', category: 'howto', tool_version: null });
      expect(await documentText('kb_main', 'kd-new')).toEqual(['Fresh guide']);
    });

    it('should update an existing document and keep its creation time', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.manager.fullSync();

      const result = await h.manager.upsertDocument({ docId: 'kd-1', content: 'Rewritten guide' });

      expect(result.created).toBe(false);
      expect(result.sync).toMatchObject({ added: 0, modified: 1 });
      const [row] = await h.ledger.query('SELECT created_at FROM knowledge_docs WHERE doc_id = ?', ['kd-1']);
      expect(row).toEqual({ created_at: '2026-01-15T10:00:00.000Z' });
      expect(await documentText('kb_main', 'kd-1')).toEqual(['Rewritten guide']);
    });

    it('should cancel a pending deletion when the document is written again', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.manager.fullSync();
      await h.manager.deleteDocument('knowledge_docs', 'kd-1');

      const result = await h.manager.upsertDocument({ docId: 'kd-1', content: 'Restored guide' });

      expect(result.created).toBe(true);
      expect(h.tracker.isDeletionPending(h.ledger.repoPath, 'kd-1', 'kb_main')).toBe(false);
      expect(await documentText('kb_main', 'kd-1')).toEqual(['Restored guide']);
    });
  });

  describe('processCheckout', () => {
    it('should build the collection of a new branch with a full sync', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.ledger.commitAll('base');

      const result = await h.manager.processCheckout('feature/new_ui', true);

      expect(result).toMatchObject({
        status: 'completed',
        branch: 'feature/new_ui',
        collectionName: 'kb_feature-new-ui',
        fullSync: true,
        added: 1,
      });
      expect(await h.ledger.getCurrentBranch()).toBe('feature/new_ui');
      expect(await indexedSourceIds(h.index, 'kb_feature-new-ui')).toEqual(['kd-1']);
      expect((await h.manifests.read())?.ledger.currentBranch).toBe('feature/new_ui');
    });

    it('should sync an existing collection incrementally', async () => {
      await h.manager.fullSync();
      await h.manager.processCheckout('feature', true);

      const result = await h.manager.processCheckout('main');

      expect(result).toMatchObject({ branch: 'main', collectionName: 'kb_main', fullSync: false });
    });

    it('should rebuild the collection when the manifest asks to follow it', async () => {
      const base = createManifest();
      await h.manifests.write({
        ...base,
        initialization: { ...base.initialization, onBranchChange: 'sync_to_manifest' },
      });
      await h.manager.fullSync();
      await h.manager.processCheckout('feature', true);

      const result = await h.manager.processCheckout('main');
      expect(result.fullSync).toBe(true);
    });

    it('should report a failed checkout', async () => {
      const result = await h.manager.processCheckout('missing');

      expect(result).toMatchObject({
        status: 'failed',
        success: false,
        branch: 'missing',
        collectionName: 'kb_missing',
        fullSync: false,
        errorMessage: 'Ledger checkout of missing failed: branch not found: missing',
      });
      expect(await h.ledger.getCurrentBranch()).toBe('main');
    });
  });

  describe('processMerge', () => {
    it('should withhold index changes when the merge conflicts', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'base text' });
      await h.ledger.commitAll('base');
      await h.ledger.checkout('feature', true);
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'feature text' });
      await h.ledger.commitAll('feature edit');
      await h.ledger.checkout('main');
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'main text' });
      await h.ledger.commitAll('main edit');
      await h.manager.fullSync();

      const spies = [
        vi.spyOn(h.index, 'addDocuments'),
        vi.spyOn(h.index, 'updateDocuments'),
        vi.spyOn(h.index, 'deleteDocuments'),
        vi.spyOn(h.index, 'createCollection'),
        vi.spyOn(h.index, 'deleteCollection'),
      ];

      const result = await h.manager.processMerge('feature');

      expect(result).toMatchObject({
        status: 'conflicts',
        success: false,
        hasConflicts: true,
        mergeStatus: 'conflicts_detected',
        conflicts: [{ tableName: 'knowledge_docs', numConflicts: 1 }],
        errorMessage: 'Unresolved merge conflicts in: knowledge_docs',
      });
      for (const spy of spies) expect(spy).not.toHaveBeenCalled();
      expect(await documentText('kb_main', 'kd-1')).toEqual(['main text']);
    });

    it('should sync the merged rows', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      await h.manager.fullSync();
      await h.ledger.commitAll('base');
      await h.ledger.checkout('feature', true);
      await insertKnowledgeDoc(h.ledger, { id: 'kd-2', content: 'Second guide' });
      const featureHead = await h.ledger.commitAll('add second guide');
      await h.ledger.checkout('main');

      const result = await h.manager.processMerge('feature');

      expect(result).toMatchObject({
        status: 'completed',
        hasConflicts: false,
        mergeStatus: 'merged',
        conflicts: [],
        added: 1,
        commitHash: featureHead,
      });
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-1', 'kd-2']);
    });

    it('should report an unknown branch as failed', async () => {
      const result = await h.manager.processMerge('nowhere');
      expect(result).toMatchObject({ status: 'failed', mergeStatus: 'failed', hasConflicts: false });
      expect(result.errorMessage).toBe('Ledger merge of nowhere failed: branch not found: nowhere');
    });
  });

  describe('processPull', () => {
    it('should sync rows brought in by the pull', async () => {
      h.ledger.pullHandler = async (ledger) => {
        await insertKnowledgeDoc(ledger, { id: 'kd-remote', content: 'From a teammate' });
        await ledger.commitAll('remote change');
        return { success: true, wasFastForward: true, hasConflicts: false, message: 'Fast-forward' };
      };

      const result = await h.manager.processPull();

      expect(result).toMatchObject({ status: 'completed', added: 1, wasFastForward: true, hasConflicts: false });
      expect(h.ledger.calls).toContain('pull origin');
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-remote']);
    });

    it('should record a landed pull whose sync fails', async () => {
      h.ledger.pullHandler = async (ledger) => {
        await insertKnowledgeDoc(ledger, { id: 'kd-remote', content: 'From a teammate' });
        await ledger.commitAll('remote change');
        return { success: true, wasFastForward: true, hasConflicts: false, message: 'Fast-forward' };
      };
      vi.spyOn(h.index, 'addDocuments').mockRejectedValue(new Error('index write failed'));

      const result = await h.manager.processPull();

      const head = await h.ledger.getHeadCommitHash();
      expect(result).toMatchObject({
        status: 'failed',
        wasFastForward: true,
        hasConflicts: false,
        commitHash: head,
        errorMessage: 'index write failed',
      });
      expect((await h.manifests.read())?.ledger.currentCommit).toBe(head);
    });

    it('should do nothing when the head did not move', async () => {
      const result = await h.manager.processPull('origin', 'main');

      expect(result).toMatchObject({ status: 'no_changes', success: true });
      expect(h.ledger.calls).toContain('pull origin main');
    });

    it('should report pull conflicts without syncing', async () => {
      h.ledger.pullHandler = async () => ({
        success: false,
        wasFastForward: false,
        hasConflicts: true,
        message: 'CONFLICT (content): Merge conflict in knowledge_docs',
      });

      const result = await h.manager.processPull();

      expect(result).toMatchObject({
        status: 'conflicts',
        hasConflicts: true,
        errorMessage: 'CONFLICT (content): Merge conflict in knowledge_docs',
      });
      expect(await h.index.getCollection('kb_main')).toBeNull();
    });
  });

  describe('processPush', () => {
    it('should record the pushed head and remote in the manifest', async () => {
      const result = await h.manager.processPush();

      expect(result).toMatchObject({
        status: 'completed',
        message: 'Pushed 1a2b3c4..5d6e7f8 to main',
        outcome: { kind: 'normal', targetBranch: 'main' },
      });
      const manifest = await h.manifests.read();
      expect(manifest?.ledger.remoteUrl).toBe('https://ledger.example.test/team/kb');
      expect(manifest?.ledger.currentCommit).toBe(await h.ledger.getHeadCommitHash());
    });

    it('should classify a rejected push and leave the manifest alone', async () => {
      h.ledger.pushOutput = {
        success: false,
        output: '',
        error: ' ! [rejected]        main -> main (fetch first)',
        exitCode: 1,
      };

      const result = await h.manager.processPush();

      expect(result).toMatchObject({
        status: 'failed',
        success: false,
        outcome: { kind: 'rejected', reason: 'non_fast_forward' },
        message: 'Push rejected. Pull remote changes first or use force push.',
      });
      expect(await h.manifests.read()).toBeNull();
    });
  });

  describe('processReset', () => {
    it('should rebuild the collection at the target commit', async () => {
      await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
      const target = await h.ledger.commitAll('one guide');
      await insertKnowledgeDoc(h.ledger, { id: 'kd-2', content: 'Second guide' });
      await h.manager.fullSync();
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-1', 'kd-2']);

      const result = await h.manager.processReset(target);

      expect(result).toMatchObject({ status: 'completed', added: 1, commitHash: target });
      expect(h.ledger.calls).toContain(`reset --hard ${target}`);
      expect(await indexedSourceIds(h.index, 'kb_main')).toEqual(['kd-1']);
    });

    it('should report an invalid target', async () => {
      const result = await h.manager.processReset('nope');
      expect(result).toMatchObject({ status: 'failed', errorMessage: 'Ledger reset to nope failed: invalid ref: nope' });
    });
  });

  it('should run operations on one repository one at a time', async () => {
    await insertKnowledgeDoc(h.ledger, { id: 'kd-1', content: 'Widget setup guide' });
    const order: string[] = [];
    const addAll = h.ledger.addAll.bind(h.ledger);
    vi.spyOn(h.ledger, 'addAll').mockImplementation(async () => {
      order.push('commit:add');
      await new Promise((resolve) => setTimeout(resolve, 10));
      return addAll();
    });
    const createCollection = h.index.createCollection.bind(h.index);
    vi.spyOn(h.index, 'createCollection').mockImplementation(async (name, metadata) => {
      order.push(`index:${name}`);
      return createCollection(name, metadata);
    });

    await Promise.all([h.manager.processCommit('first', false), h.manager.fullSync()]);

    expect(order).toEqual(['commit:add', 'index:kb_main']);
  });
});
