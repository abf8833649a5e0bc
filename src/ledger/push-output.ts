/**
 * Classify the free-text output of a ledger push into a closed set of outcomes.
 *
 * Only this module looks at push output text; callers branch on `kind`.
 */

import type { CommandResult } from './types.js';

export const PUSH_REJECT_REASONS = [
  'authentication',
  'non_fast_forward',
  'network',
  'permission',
  'not_found',
  'unknown',
] as const;

export type PushRejectReason = (typeof PUSH_REJECT_REASONS)[number];

export type PushOutcome =
  | { kind: 'up_to_date'; remoteUrl: string | null }
  | { kind: 'new_branch'; branch: string; remoteUrl: string | null }
  | {
      kind: 'normal';
      fromCommit: string | null;
      toCommit: string | null;
      targetBranch: string | null;
      remoteUrl: string | null;
    }
  | { kind: 'forced'; remoteUrl: string | null }
  | { kind: 'rejected'; reason: PushRejectReason; message: string; remoteUrl: string | null };

const NEW_BRANCH = /\*\s*\[new branch\]\s+(\S+)\s+->\s+(\S+)/m;
const COMMIT_RANGE = /([a-zA-Z0-9]+)\.\.([a-zA-Z0-9]+)\s+(\S+)\s+->\s+(\S+)/m;
const REMOTE_URL = /^To\s+(.+)$/m;

const REJECT_RULES: Array<{ reason: PushRejectReason; terms: string[]; message: string }> = [
  {
    reason: 'authentication',
    terms: ['authentication', 'credentials', '401', 'unauthorized'],
    message: 'Authentication failed. Check your credentials.',
  },
  {
    reason: 'non_fast_forward',
    terms: ['rejected', 'non-fast-forward', 'fetch first'],
    message: 'Push rejected. Pull remote changes first or use force push.',
  },
  {
    reason: 'network',
    terms: ['could not resolve', 'connection', 'timeout', 'network'],
    message: 'Network error. Check your connection and the remote URL.',
  },
  {
    reason: 'permission',
    terms: ['permission denied', 'access denied', 'forbidden', '403'],
    message: 'Permission denied. Check your access rights to the repository.',
  },
  {
    reason: 'not_found',
    terms: ['repository not found', 'does not exist', '404'],
    message: 'Repository not found. Check the remote URL.',
  },
];

function extractRemoteUrl(output: string): string | null {
  const match = REMOTE_URL.exec(output);
  return match ? match[1].trim() : null;
}

function containsAny(text: string, terms: string[]): boolean {
  const lower = text.toLowerCase();
  return terms.some((term) => lower.includes(term));
}

export function classifyPushOutput(result: Pick<CommandResult, 'success' | 'output' | 'error'>): PushOutcome {
  const output = `${result.output}\n${result.error}`.trim();
  const remoteUrl = extractRemoteUrl(output);

  if (!result.success) {
    const rule = REJECT_RULES.find((r) => containsAny(output, r.terms));
    return {
      kind: 'rejected',
      reason: rule?.reason ?? 'unknown',
      message: rule?.message ?? `Push failed: ${output}`,
      remoteUrl,
    };
  }

  if (containsAny(output, ['everything up-to-date', 'everything up to date'])) {
    return { kind: 'up_to_date', remoteUrl };
  }

  const newBranch = NEW_BRANCH.exec(output);
  if (newBranch) {
    return { kind: 'new_branch', branch: newBranch[2], remoteUrl };
  }

  if (containsAny(output, ['+ [force]', 'forced update'])) {
    return { kind: 'forced', remoteUrl };
  }

  const range = COMMIT_RANGE.exec(output);
  if (range) {
    return {
      kind: 'normal',
      fromCommit: range[1],
      toCommit: range[2],
      targetBranch: range[4],
      remoteUrl,
    };
  }

  return { kind: 'normal', fromCommit: null, toCommit: null, targetBranch: null, remoteUrl };
}

/** One-line summary of an outcome. */
export function describePushOutcome(outcome: PushOutcome): string {
  switch (outcome.kind) {
    case 'up_to_date':
      return 'Already up to date';
    case 'new_branch':
      return `Created new branch ${outcome.branch}`;
    case 'normal':
      return outcome.targetBranch
        ? `Pushed ${outcome.fromCommit}..${outcome.toCommit} to ${outcome.targetBranch}`
        : 'Push completed';
    case 'forced':
      return 'Force pushed';
    case 'rejected':
      return outcome.message;
  }
}
