import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncResult } from '../types.js';
import { errorResponse, jsonResponse, withSyncLock, type ToolContext } from './context.js';

function syncResponse(result: SyncResult) {
  return jsonResponse(result, result.status === 'failed');
}

/** Ledger workflows that keep the index collection of the current branch in step. */
export function registerSyncTools(server: McpServer, ctx: ToolContext): void {
  const { manager } = ctx;

  server.registerTool(
    'ledger_commit',
    {
      description:
        'Stage and commit every change in the ledger working set, then sync the ' +
        'committed changes into the index. Pending document deletions are ' +
        'marked committed with the new commit hash.',
      inputSchema: {
        message: z.string().min(1).describe('Commit message'),
        sync_after: z.boolean().optional().describe('Sync the index after committing (default true)'),
      },
    },
    async ({ message, sync_after }) =>
      withSyncLock(manager.repoPath, 'committing', async () =>
        syncResponse(await manager.processCommit(message, sync_after ?? true)),
      ),
  );

  server.registerTool(
    'ledger_pull',
    {
      description:
        'Pull from a ledger remote and sync the pulled changes into the index. ' +
        'When the pull leaves merge conflicts the index is not touched and the ' +
        'status is "conflicts".',
      inputSchema: {
        remote: z.string().optional().describe('Remote name (default origin)'),
        branch: z.string().optional().describe('Remote branch (default: the current branch)'),
      },
    },
    async ({ remote, branch }) =>
      withSyncLock(manager.repoPath, 'pulling', async () =>
        syncResponse(await manager.processPull(remote ?? 'origin', branch)),
      ),
  );

  server.registerTool(
    'ledger_push',
    {
      description:
        'Push the current branch to a ledger remote. The outcome is classified ' +
        '(up_to_date, new_branch, normal, forced or rejected with a reason) and ' +
        'the manifest is updated on success.',
      inputSchema: {
        remote: z.string().optional().describe('Remote name (default origin)'),
        branch: z.string().optional().describe('Branch to push (default: the current branch)'),
      },
    },
    async ({ remote, branch }) =>
      withSyncLock(manager.repoPath, 'pushing', async () =>
        syncResponse(await manager.processPush(remote ?? 'origin', branch)),
      ),
  );

  server.registerTool(
    'ledger_checkout',
    {
      description:
        'Switch ledger branches and sync the index collection of the target ' +
        'branch. Pending deletions follow the switch unless the manifest policy ' +
        'is sync_to_manifest.',
      inputSchema: {
        branch: z.string().min(1).describe('Branch to switch to'),
        create_new: z.boolean().optional().describe('Create the branch first (default false)'),
      },
    },
    async ({ branch, create_new }) =>
      withSyncLock(manager.repoPath, 'checking out', async () =>
        syncResponse(await manager.processCheckout(branch, create_new ?? false)),
      ),
  );

  server.registerTool(
    'ledger_merge',
    {
      description:
        'Merge another ledger branch into the current one. On conflicts nothing ' +
        'is written to the index; the conflicting tables are reported and must ' +
        'be resolved in the ledger before syncing.',
      inputSchema: {
        source_branch: z.string().min(1).describe('Branch to merge from'),
      },
    },
    async ({ source_branch }) =>
      withSyncLock(manager.repoPath, 'merging', async () =>
        syncResponse(await manager.processMerge(source_branch)),
      ),
  );

  server.registerTool(
    'ledger_reset',
    {
      description:
        'Hard-reset the ledger to a commit and rebuild the index collection of ' +
        'the current branch from scratch. Uncommitted ledger changes are lost.',
      inputSchema: {
        target: z.string().min(1).describe('Commit hash or ref to reset to'),
      },
    },
    async ({ target }) =>
      withSyncLock(manager.repoPath, 'resetting', async () =>
        syncResponse(await manager.processReset(target)),
      ),
  );

  server.registerTool(
    'sync_index',
    {
      description:
        'Sync the ledger into the index without any ledger operation. ' +
        '"incremental" (default) applies pending changes; "full" rebuilds the collection.',
      inputSchema: {
        mode: z.enum(['incremental', 'full']).optional().describe('Sync mode (default incremental)'),
        collection: z.string().optional().describe('Target collection (default: the current branch collection)'),
      },
    },
    async ({ mode, collection }) =>
      withSyncLock(manager.repoPath, 'syncing the index', async () =>
        syncResponse(
          mode === 'full' ? await manager.fullSync(collection) : await manager.incrementalSync(collection),
        ),
      ),
  );

  server.registerTool(
    'sync_status',
    {
      description:
        'Report whether the local ledger matches the manifest, any out-of-sync ' +
        'warning, the changes waiting to be synced, and index worker health.',
      inputSchema: {},
    },
    async () => {
      try {
        const [state, warning, pending, collection] = await Promise.all([
          manager.stateChecker.checkSyncState(),
          manager.stateChecker.getOutOfSyncWarning(),
          manager.getPendingChanges(),
          manager.getCurrentCollectionName(),
        ]);

        return jsonResponse({
          collection,
          state,
          warning,
          pending: {
            new: pending.newCount,
            modified: pending.modifiedCount,
            deleted: pending.deletedCount,
            total: pending.totalChanges,
          },
          worker: ctx.worker.getHealth(),
        });
      } catch (error) {
        return errorResponse('checking sync status', error);
      }
    },
  );
}
