/**
 * Compares the ledger's current branch and head against the manifest.
 */

import { isAncestorCommit, ANCESTOR_SCAN_LIMIT } from '../ledger/history.js';
import type { LedgerClient } from '../ledger/types.js';
import type { ManifestStore } from './manifest.js';

export const SYNC_STATE_CACHE_MS = 5000;

export interface SyncStateCheckResult {
  isInSync: boolean;
  manifestExists: boolean;
  localBranch: string | null;
  localCommit: string | null;
  manifestBranch: string | null;
  manifestCommit: string | null;
  hasLocalChanges: boolean;
  localAheadOfManifest: boolean;
  reason: string;
  checkedAt: Date;
}

export interface OutOfSyncWarning {
  type: 'out_of_sync';
  message: string;
  localState: { branch: string | null; commit: string | null };
  manifestState: { branch: string | null; commit: string | null };
  actionRequired: string;
}

function abbreviate(commit: string | null): string {
  return commit ? commit.slice(0, 7) : 'none';
}

export class SyncStateChecker {
  private cached: SyncStateCheckResult | null = null;
  // Bumped on invalidation; a check that straddles one is not cached
  private generation = 0;

  constructor(
    private readonly ledger: LedgerClient,
    private readonly manifests: ManifestStore,
    private readonly cacheMs: number = SYNC_STATE_CACHE_MS,
  ) {}

  async checkSyncState(): Promise<SyncStateCheckResult> {
    if (this.cached && Date.now() - this.cached.checkedAt.getTime() < this.cacheMs) {
      return this.cached;
    }

    const generation = this.generation;
    try {
      const result = await this.compute();
      if (generation === this.generation) this.cached = result;
      return result;
    } catch (error) {
      console.error('Sync: state check failed:', error);
      return {
        isInSync: true,
        manifestExists: false,
        localBranch: null,
        localCommit: null,
        manifestBranch: null,
        manifestCommit: null,
        hasLocalChanges: false,
        localAheadOfManifest: false,
        reason: `State check failed: ${error instanceof Error ? error.message : String(error)}`,
        checkedAt: new Date(),
      };
    }
  }

  /** In sync, or diverged with nothing local that a sync would overwrite. */
  async isSafeToSync(): Promise<boolean> {
    const state = await this.checkSyncState();
    return state.isInSync || (!state.hasLocalChanges && !state.localAheadOfManifest);
  }

  async getOutOfSyncWarning(): Promise<OutOfSyncWarning | null> {
    const state = await this.checkSyncState();
    if (state.isInSync || !state.manifestExists) return null;

    const localState = { branch: state.localBranch, commit: state.localCommit };
    const manifestState = { branch: state.manifestBranch, commit: state.manifestCommit };

    if (state.hasLocalChanges) {
      return {
        type: 'out_of_sync',
        message: 'Local state differs from manifest and there are uncommitted changes that would be lost if synced.',
        localState,
        manifestState,
        actionRequired: 'Commit your local changes, then sync to the manifest or update it with a push.',
      };
    }
    if (state.localAheadOfManifest) {
      return {
        type: 'out_of_sync',
        message: 'Local commits are ahead of manifest. Push them to update the manifest.',
        localState,
        manifestState,
        actionRequired: 'Push your local commits to update the manifest.',
      };
    }
    return {
      type: 'out_of_sync',
      message: 'Local state differs from manifest.',
      localState,
      manifestState,
      actionRequired: 'Sync to the manifest commit, or pull to bring the local ledger up to date.',
    };
  }

  invalidateCache(): void {
    this.cached = null;
    this.generation++;
  }

  private async compute(): Promise<SyncStateCheckResult> {
    const manifest = await this.manifests.read();
    if (!manifest) {
      return {
        isInSync: true,
        manifestExists: false,
        localBranch: null,
        localCommit: null,
        manifestBranch: null,
        manifestCommit: null,
        hasLocalChanges: false,
        localAheadOfManifest: false,
        reason: 'No manifest found',
        checkedAt: new Date(),
      };
    }

    const [localCommit, localBranch, status] = await Promise.all([
      this.ledger.getHeadCommitHash(),
      this.ledger.getCurrentBranch(),
      this.ledger.getStatus(),
    ]);

    const manifestCommit = manifest.ledger.currentCommit;
    const manifestBranch = manifest.ledger.currentBranch;
    const commitMatches = !manifestCommit || manifestCommit === localCommit;
    const branchMatches = !manifestBranch || manifestBranch === localBranch;
    const isInSync = commitMatches && branchMatches;

    let localAheadOfManifest = false;
    if (!commitMatches && manifestCommit) {
      localAheadOfManifest = await isAncestorCommit(this.ledger, manifestCommit, localCommit, ANCESTOR_SCAN_LIMIT);
    }

    const local = `${localBranch}/${abbreviate(localCommit)}`;
    const expected = `${manifestBranch ?? 'none'}/${abbreviate(manifestCommit)}`;
    let reason = 'In sync with manifest';
    if (!branchMatches && !commitMatches) {
      reason = `Both branch and commit differ: local ${local} vs manifest ${expected}`;
    } else if (!commitMatches) {
      reason = `Commit differs: local ${abbreviate(localCommit)} vs manifest ${abbreviate(manifestCommit)}`;
    } else if (!branchMatches) {
      reason = `Branch differs: local ${localBranch} vs manifest ${manifestBranch}`;
    }

    return {
      isInSync,
      manifestExists: true,
      localBranch,
      localCommit,
      manifestBranch,
      manifestCommit,
      hasLocalChanges: !isInSync && (status.hasStagedChanges || status.hasUnstagedChanges),
      localAheadOfManifest,
      reason,
      checkedAt: new Date(),
    };
  }
}
