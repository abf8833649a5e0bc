import type { ImportAnalyzer } from '../import/analyzer.js';
import type { ImportExecutor } from '../import/executor.js';
import type { IndexWorker } from '../index-store/worker.js';
import { errorMessage } from '../errors.js';
import { releaseSyncLock, tryAcquireSyncLock } from '../sync/lock.js';
import type { SyncManager } from '../sync/sync-manager.js';

/** Everything a tool handler works against. Built once by the entry point. */
export interface ToolContext {
  manager: SyncManager;
  analyzer: ImportAnalyzer;
  executor: ImportExecutor;
  worker: IndexWorker;
}

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function jsonResponse(value: unknown, isError = false): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function errorResponse(doing: string, error: unknown): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: `Error ${doing}: ${errorMessage(error)}` }],
    isError: true,
  };
}

/**
 * Run `work` holding the cross-process sync lock of the repository.
 * Returns an error response without running it when another process holds the lock.
 */
export async function withSyncLock(
  repoPath: string,
  doing: string,
  work: () => Promise<ToolResponse>,
): Promise<ToolResponse> {
  if (!tryAcquireSyncLock(repoPath)) {
    return {
      content: [
        { type: 'text' as const, text: 'Another process is currently syncing this repository. Try again shortly.' },
      ],
      isError: true,
    };
  }
  try {
    return await work();
  } catch (error) {
    console.error(`Sync: ${doing} failed:`, error);
    return errorResponse(doing, error);
  } finally {
    releaseSyncLock(repoPath);
  }
}
