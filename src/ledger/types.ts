import type { PushOutcome } from './push-output.js';

/** A value that may be bound into a ledger query. */
export type SqlValue = string | number | null;

/** A result row as returned by the ledger, before validation. */
export type LedgerRow = Record<string, unknown>;

export interface CommandResult {
  success: boolean;
  output: string;
  error: string;
  exitCode: number;
}

export interface CommitResult {
  success: boolean;
  commitHash: string | null;
  message: string;
}

export interface PullResult {
  success: boolean;
  wasFastForward: boolean;
  hasConflicts: boolean;
  message: string;
}

export interface MergeResult {
  success: boolean;
  hasConflicts: boolean;
  mergeCommitHash: string | null;
  message: string;
}

export interface PushResult {
  success: boolean;
  outcome: PushOutcome;
  message: string;
}

export interface BranchInfo {
  name: string;
  lastCommitHash: string;
  isCurrent: boolean;
}

export interface CommitInfo {
  hash: string;
  message: string;
  author: string;
  date: string;
}

export interface RepositoryStatus {
  branch: string;
  hasStagedChanges: boolean;
  hasUnstagedChanges: boolean;
  stagedTables: string[];
  modifiedTables: string[];
}

export interface ConflictInfo {
  tableName: string;
  numConflicts: number;
}

/**
 * Access to a version-controlled SQL ledger.
 *
 * `query` and `execute` take positional `?` placeholders; values are never
 * concatenated into SQL by callers.
 */
export interface LedgerClient {
  /** Working directory of the ledger repository. */
  readonly repoPath: string;

  query(sql: string, params?: readonly SqlValue[]): Promise<LedgerRow[]>;
  execute(sql: string, params?: readonly SqlValue[]): Promise<void>;

  getHeadCommitHash(): Promise<string>;
  getCurrentBranch(): Promise<string>;
  getStatus(): Promise<RepositoryStatus>;
  /** Most recent commits first. */
  getLog(limit: number): Promise<CommitInfo[]>;
  listBranches(): Promise<BranchInfo[]>;
  getRemoteUrl(remote?: string): Promise<string | null>;

  runCommand(args: readonly string[]): Promise<CommandResult>;

  addAll(): Promise<CommandResult>;
  commit(message: string): Promise<CommitResult>;
  checkout(branch: string, createNew?: boolean): Promise<CommandResult>;
  merge(sourceBranch: string): Promise<MergeResult>;
  getConflicts(table: string): Promise<ConflictInfo[]>;
  pull(remote?: string, branch?: string): Promise<PullResult>;
  push(remote?: string, branch?: string): Promise<PushResult>;
  resetHard(target: string): Promise<CommandResult>;
}
