/**
 * Ledger client backed by the ledger's command-line tool.
 *
 * SECURITY: commands run through execFile (no shell), so arguments are never
 * interpreted by a shell. SQL values are bound as escaped literals by
 * bindParameters; identifiers are validated before use.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import { LedgerOperationError } from '../errors.js';
import { classifyPushOutput, describePushOutcome } from './push-output.js';
import { assertValidCommitRef, assertValidTableName, bindParameters } from './sql.js';
import type {
  BranchInfo,
  CommandResult,
  CommitInfo,
  CommitResult,
  ConflictInfo,
  LedgerClient,
  LedgerRow,
  MergeResult,
  PullResult,
  PushResult,
  RepositoryStatus,
  SqlValue,
} from './types.js';

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_BUFFER = 64 * 1024 * 1024;

const JsonRowsSchema = z.object({
  rows: z.array(z.record(z.unknown())).default([]),
});

const StatusRowSchema = z.object({
  table_name: z.string(),
  staged: z.union([z.boolean(), z.number(), z.string()]),
});

const LogRowSchema = z.object({
  commit_hash: z.string(),
  committer: z.string().nullable().default(''),
  date: z.union([z.string(), z.number()]).transform(String),
  message: z.string().nullable().default(''),
});

const BranchRowSchema = z.object({
  name: z.string(),
  hash: z.string(),
});

const ConflictRowSchema = z.object({
  table_name: z.string(),
  num_conflicts: z.coerce.number(),
});

export interface LedgerCliOptions {
  repoPath: string;
  /** Executable name or path. */
  binary?: string;
  timeoutMs?: number;
}

function isTruthyFlag(value: boolean | number | string): boolean {
  return value === true || value === 1 || value === '1' || value === 'true';
}

function failureFrom(error: unknown): CommandResult {
  let output = '';
  let stderr = '';
  let exitCode = 1;

  if (typeof error === 'object' && error !== null) {
    if ('stdout' in error && typeof error.stdout === 'string') output = error.stdout;
    if ('stderr' in error && typeof error.stderr === 'string') stderr = error.stderr;
    if ('code' in error && typeof error.code === 'number') exitCode = error.code;
  }
  if (!stderr && error instanceof Error) stderr = error.message;

  return { success: false, output, error: stderr, exitCode };
}

export class LedgerCli implements LedgerClient {
  readonly repoPath: string;
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: LedgerCliOptions) {
    this.repoPath = options.repoPath;
    this.binary = options.binary ?? 'dolt';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async runCommand(args: readonly string[]): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(this.binary, [...args], {
        cwd: this.repoPath,
        encoding: 'utf-8',
        timeout: this.timeoutMs,
        maxBuffer: MAX_BUFFER,
      });
      return { success: true, output: stdout, error: stderr, exitCode: 0 };
    } catch (error) {
      return failureFrom(error);
    }
  }

  private async runOrThrow(args: readonly string[], action: string): Promise<CommandResult> {
    const result = await this.runCommand(args);
    if (!result.success) {
      throw new LedgerOperationError(`Ledger ${action} failed: ${result.error.trim() || result.output.trim()}`, {
        exitCode: result.exitCode,
        stderr: result.error,
      });
    }
    return result;
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<LedgerRow[]> {
    const result = await this.runOrThrow(['sql', '-q', bindParameters(sql, params), '-r', 'json'], 'query');
    const text = result.output.trim();
    if (!text) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new LedgerOperationError('Ledger query returned malformed JSON', { cause: error });
    }
    return JsonRowsSchema.parse(parsed).rows;
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    await this.runOrThrow(['sql', '-q', bindParameters(sql, params)], 'statement');
  }

  async getHeadCommitHash(): Promise<string> {
    const rows = await this.query("SELECT HASHOF('HEAD') AS hash");
    const hash = rows[0]?.hash;
    if (typeof hash !== 'string' || !hash) {
      throw new LedgerOperationError('Could not resolve HEAD commit');
    }
    return hash;
  }

  async getCurrentBranch(): Promise<string> {
    const rows = await this.query('SELECT active_branch() AS branch');
    const branch = rows[0]?.branch;
    if (typeof branch !== 'string' || !branch) {
      throw new LedgerOperationError('Could not resolve current branch');
    }
    return branch;
  }

  async getStatus(): Promise<RepositoryStatus> {
    const branch = await this.getCurrentBranch();
    const rows = z.array(StatusRowSchema).parse(await this.query('SELECT table_name, staged FROM dolt_status'));

    const stagedTables = rows.filter((r) => isTruthyFlag(r.staged)).map((r) => r.table_name);
    const modifiedTables = rows.filter((r) => !isTruthyFlag(r.staged)).map((r) => r.table_name);

    return {
      branch,
      hasStagedChanges: stagedTables.length > 0,
      hasUnstagedChanges: modifiedTables.length > 0,
      stagedTables,
      modifiedTables,
    };
  }

  async getLog(limit: number): Promise<CommitInfo[]> {
    const rows = z
      .array(LogRowSchema)
      .parse(await this.query('SELECT commit_hash, committer, date, message FROM dolt_log LIMIT ?', [limit]));
    return rows.map((r) => ({
      hash: r.commit_hash,
      author: r.committer ?? '',
      date: r.date,
      message: r.message ?? '',
    }));
  }

  async listBranches(): Promise<BranchInfo[]> {
    const current = await this.getCurrentBranch();
    const rows = z.array(BranchRowSchema).parse(await this.query('SELECT name, hash FROM dolt_branches'));
    return rows.map((r) => ({ name: r.name, lastCommitHash: r.hash, isCurrent: r.name === current }));
  }

  async getRemoteUrl(remote = 'origin'): Promise<string | null> {
    const rows = await this.query('SELECT url FROM dolt_remotes WHERE name = ?', [remote]);
    const url = rows[0]?.url;
    return typeof url === 'string' ? url : null;
  }

  async addAll(): Promise<CommandResult> {
    return this.runCommand(['add', '.']);
  }

  async commit(message: string): Promise<CommitResult> {
    const result = await this.runCommand(['commit', '-m', message]);
    if (!result.success) {
      const text = `${result.output}\n${result.error}`.trim();
      if (/nothing to commit|no changes added/i.test(text)) {
        return { success: false, commitHash: null, message: 'Nothing to commit' };
      }
      console.error(`Ledger commit failed for ${this.repoPath}:`, text);
      return { success: false, commitHash: null, message: text };
    }
    return { success: true, commitHash: await this.getHeadCommitHash(), message: result.output.trim() };
  }

  async checkout(branch: string, createNew = false): Promise<CommandResult> {
    assertValidCommitRef(branch);
    const args = createNew ? ['checkout', '-b', branch] : ['checkout', branch];
    return this.runCommand(args);
  }

  async merge(sourceBranch: string): Promise<MergeResult> {
    assertValidCommitRef(sourceBranch);
    const result = await this.runCommand(['merge', sourceBranch]);
    const text = `${result.output}\n${result.error}`.trim();

    if (/CONFLICT/.test(text)) {
      return { success: false, hasConflicts: true, mergeCommitHash: null, message: text };
    }
    if (!result.success) {
      return { success: false, hasConflicts: false, mergeCommitHash: null, message: text };
    }
    return {
      success: true,
      hasConflicts: false,
      mergeCommitHash: await this.getHeadCommitHash(),
      message: text,
    };
  }

  async getConflicts(table: string): Promise<ConflictInfo[]> {
    const valid = assertValidTableName(table);
    const rows = await this.query(
      'SELECT `table` AS table_name, num_conflicts FROM dolt_conflicts WHERE `table` = ?',
      [valid],
    );
    return z
      .array(ConflictRowSchema)
      .parse(rows)
      .map((r) => ({ tableName: r.table_name, numConflicts: r.num_conflicts }));
  }

  async pull(remote = 'origin', branch?: string): Promise<PullResult> {
    assertValidCommitRef(remote);
    if (branch) assertValidCommitRef(branch);
    const result = await this.runCommand(branch ? ['pull', remote, branch] : ['pull', remote]);
    const text = `${result.output}\n${result.error}`.trim();

    return {
      success: result.success && !/CONFLICT/.test(text),
      wasFastForward: /fast-forward/i.test(text),
      hasConflicts: /CONFLICT/.test(text),
      message: text,
    };
  }

  async push(remote = 'origin', branch?: string): Promise<PushResult> {
    assertValidCommitRef(remote);
    if (branch) assertValidCommitRef(branch);
    const result = await this.runCommand(branch ? ['push', remote, branch] : ['push', remote]);
    const outcome = classifyPushOutput(result);

    return {
      success: outcome.kind !== 'rejected',
      outcome,
      message: describePushOutcome(outcome),
    };
  }

  async resetHard(target: string): Promise<CommandResult> {
    assertValidCommitRef(target);
    return this.runCommand(['reset', '--hard', target]);
  }
}
