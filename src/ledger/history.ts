import type { LedgerClient } from './types.js';

/** How far back the ancestry scan looks. */
export const ANCESTOR_SCAN_LIMIT = 100;

/**
 * Check whether `ancestor` appears in the history of `descendant`.
 *
 * Scans the most recent commits from HEAD; the ancestor must be found after the
 * descendant in that log. Only meaningful when `descendant` is at or near HEAD.
 * Returns false when the log cannot be read.
 */
export async function isAncestorCommit(
  ledger: Pick<LedgerClient, 'getLog'>,
  ancestor: string,
  descendant: string,
  limit: number = ANCESTOR_SCAN_LIMIT,
): Promise<boolean> {
  try {
    const log = await ledger.getLog(limit);
    let foundDescendant = false;

    for (const entry of log) {
      if (entry.hash === descendant) {
        foundDescendant = true;
      } else if (foundDescendant && entry.hash === ancestor) {
        return true;
      }
    }
    return false;
  } catch (error) {
    console.error(`Ancestry check failed for ${ancestor} -> ${descendant}:`, error);
    return false;
  }
}

/** True when `commit` equals `head` or is one of its ancestors. */
export async function isCommitReachable(
  ledger: Pick<LedgerClient, 'getLog'>,
  commit: string,
  head: string,
): Promise<boolean> {
  if (commit === head) return true;
  return isAncestorCommit(ledger, commit, head);
}
