import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { initLedgerSchema } from '../ledger/schema.js';
import { classifyPushOutput, describePushOutcome } from '../ledger/push-output.js';
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
} from '../ledger/types.js';

type Snapshot = Map<string, Map<string, string>>;

interface CommitRecord {
  hash: string;
  parents: string[];
  message: string;
  date: string;
  snapshot: Snapshot;
}

interface TableDiff {
  added: Map<string, string>;
  modified: Map<string, { from: string; to: string }>;
  removed: Map<string, string>;
}

const DIFF_SQL = /dolt_diff\(\?, \?, '(\w+)'\)/;

function parseRow(json: string): LedgerRow {
  const parsed: unknown = JSON.parse(json);
  const row: LedgerRow = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [key, value] of Object.entries(parsed)) row[key] = value;
  }
  return row;
}

function diffTable(from: Map<string, string> | undefined, to: Map<string, string> | undefined): TableDiff {
  const before = from ?? new Map<string, string>();
  const after = to ?? new Map<string, string>();
  const diff: TableDiff = { added: new Map(), modified: new Map(), removed: new Map() };

  for (const [key, row] of after) {
    const previous = before.get(key);
    if (previous === undefined) diff.added.set(key, row);
    else if (previous !== row) diff.modified.set(key, { from: previous, to: row });
  }
  for (const [key, row] of before) {
    if (!after.has(key)) diff.removed.set(key, row);
  }
  return diff;
}

function isEmptyDiff(diff: TableDiff): boolean {
  return diff.added.size === 0 && diff.modified.size === 0 && diff.removed.size === 0;
}

/**
 * In-process ledger for tests. The working set is an in-memory SQLite
 * database running the real queries; commits are full snapshots of it, with
 * branches, three-way merges and `dolt_diff` emulated over those snapshots.
 */
export class FakeLedger implements LedgerClient {
  readonly db: Database.Database;
  readonly commits = new Map<string, CommitRecord>();
  readonly branches = new Map<string, string>();
  /** Every runCommand / mutating call, in order. */
  readonly calls: string[] = [];

  currentBranch = 'main';
  remoteUrl: string | null = 'https://ledger.example.test/team/kb';
  /** Decides what a pull does; the default reports nothing to pull. */
  pullHandler: ((ledger: FakeLedger) => Promise<PullResult>) | null = null;
  /** Raw output the push classifier sees. */
  pushOutput: CommandResult = {
    success: true,
    output: 'To https://ledger.example.test/team/kb\n   1a2b3c4..5d6e7f8  main -> main',
    error: '',
    exitCode: 0,
  };

  private staged: Snapshot | null = null;
  private conflicts = new Map<string, number>();
  private counter = 0;

  private constructor(readonly repoPath: string) {
    this.db = new Database(':memory:');
  }

  static async create(repoPath = '/repos/fake-ledger'): Promise<FakeLedger> {
    const ledger = new FakeLedger(repoPath);
    await initLedgerSchema(ledger);
    ledger.branches.set('main', ledger.record('Initialize data repository', []));
    return ledger;
  }

  // === SQL ===

  async query(sql: string, params: readonly SqlValue[] = []): Promise<LedgerRow[]> {
    const diff = DIFF_SQL.exec(sql);
    if (diff) return this.diffRows(String(params[0]), String(params[1]), diff[1]);

    const statement = this.db.prepare<SqlValue[], LedgerRow>(sql);
    return statement.all(...params);
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<void> {
    this.db.prepare<SqlValue[]>(sql).run(...params);
  }

  // === Repository state ===

  async getHeadCommitHash(): Promise<string> {
    return this.head().hash;
  }

  async getCurrentBranch(): Promise<string> {
    return this.currentBranch;
  }

  async getStatus(): Promise<RepositoryStatus> {
    const head = this.head().snapshot;
    const working = this.capture();
    const staged = this.staged ?? head;
    const changedBetween = (a: Snapshot, b: Snapshot): string[] =>
      this.tableNames().filter((t) => !isEmptyDiff(diffTable(a.get(t), b.get(t))));

    const stagedTables = changedBetween(head, staged);
    const modifiedTables = changedBetween(staged, working);
    return {
      branch: this.currentBranch,
      hasStagedChanges: stagedTables.length > 0,
      hasUnstagedChanges: modifiedTables.length > 0,
      stagedTables,
      modifiedTables,
    };
  }

  async getLog(limit: number): Promise<CommitInfo[]> {
    const log: CommitInfo[] = [];
    let current: CommitRecord | undefined = this.head();
    while (current && log.length < limit) {
      log.push({ hash: current.hash, message: current.message, author: 'Test Author', date: current.date });
      current = current.parents.length > 0 ? this.commits.get(current.parents[0]) : undefined;
    }
    return log;
  }

  async listBranches(): Promise<BranchInfo[]> {
    return [...this.branches].map(([name, hash]) => ({
      name,
      lastCommitHash: hash,
      isCurrent: name === this.currentBranch,
    }));
  }

  async getRemoteUrl(remote = 'origin'): Promise<string | null> {
    return remote === 'origin' ? this.remoteUrl : null;
  }

  async runCommand(args: readonly string[]): Promise<CommandResult> {
    this.calls.push(args.join(' '));
    return { success: true, output: '', error: '', exitCode: 0 };
  }

  // === Version control ===

  async addAll(): Promise<CommandResult> {
    this.calls.push('add .');
    this.staged = this.capture();
    return { success: true, output: '', error: '', exitCode: 0 };
  }

  async commit(message: string): Promise<CommitResult> {
    this.calls.push(`commit ${message}`);
    const snapshot = this.staged ?? this.head().snapshot;
    if (this.sameAs(snapshot, this.head().snapshot)) {
      return { success: false, commitHash: null, message: 'Nothing to commit' };
    }
    const hash = this.record(message, [this.head().hash], snapshot);
    this.branches.set(this.currentBranch, hash);
    this.staged = null;
    return { success: true, commitHash: hash, message: `commit ${hash}` };
  }

  /** Stage and commit everything in the working set. */
  async commitAll(message: string): Promise<string> {
    await this.addAll();
    const result = await this.commit(message);
    if (!result.commitHash) throw new Error(`commit failed: ${result.message}`);
    return result.commitHash;
  }

  async checkout(branch: string, createNew = false): Promise<CommandResult> {
    this.calls.push(createNew ? `checkout -b ${branch}` : `checkout ${branch}`);

    if (createNew) {
      if (this.branches.has(branch)) return this.failure(`branch ${branch} already exists`);
      this.branches.set(branch, this.head().hash);
      this.currentBranch = branch;
      return { success: true, output: `Switched to a new branch '${branch}'`, error: '', exitCode: 0 };
    }

    const target = this.branches.get(branch);
    if (target === undefined) return this.failure(`branch not found: ${branch}`);

    // Uncommitted changes follow the switch
    const from = this.head().snapshot;
    const working = this.capture();
    const next = this.cloneSnapshot(this.snapshotOf(target));
    for (const table of this.tableNames()) {
      const diff = diffTable(from.get(table), working.get(table));
      const rows = next.get(table) ?? new Map<string, string>();
      for (const [key, row] of diff.added) rows.set(key, row);
      for (const [key, change] of diff.modified) rows.set(key, change.to);
      for (const key of diff.removed.keys()) rows.delete(key);
      next.set(table, rows);
    }

    this.restore(next);
    this.currentBranch = branch;
    this.staged = null;
    return { success: true, output: `Switched to branch '${branch}'`, error: '', exitCode: 0 };
  }

  async merge(sourceBranch: string): Promise<MergeResult> {
    this.calls.push(`merge ${sourceBranch}`);
    const theirs = this.branches.get(sourceBranch);
    if (theirs === undefined) {
      return { success: false, hasConflicts: false, mergeCommitHash: null, message: `branch not found: ${sourceBranch}` };
    }

    const ours = this.head().hash;
    if (this.ancestorsOf(ours).has(theirs)) {
      return { success: true, hasConflicts: false, mergeCommitHash: ours, message: 'Everything up-to-date' };
    }
    if (this.ancestorsOf(theirs).has(ours)) {
      this.restore(this.snapshotOf(theirs));
      this.branches.set(this.currentBranch, theirs);
      return { success: true, hasConflicts: false, mergeCommitHash: theirs, message: 'Fast-forward' };
    }

    const base = this.snapshotOf(this.mergeBase(ours, theirs));
    const left = this.snapshotOf(ours);
    const right = this.snapshotOf(theirs);
    const merged: Snapshot = new Map();
    const conflicts = new Map<string, number>();

    for (const table of this.tableNames()) {
      const rows = new Map<string, string>();
      const keys = new Set([
        ...(base.get(table)?.keys() ?? []),
        ...(left.get(table)?.keys() ?? []),
        ...(right.get(table)?.keys() ?? []),
      ]);
      for (const key of keys) {
        const b = base.get(table)?.get(key);
        const o = left.get(table)?.get(key);
        const t = right.get(table)?.get(key);
        let value: string | undefined;
        if (o === t || t === b) value = o;
        else if (o === b) value = t;
        else {
          conflicts.set(table, (conflicts.get(table) ?? 0) + 1);
          value = o;
        }
        if (value !== undefined) rows.set(key, value);
      }
      merged.set(table, rows);
    }

    if (conflicts.size > 0) {
      this.conflicts = conflicts;
      const tables = [...conflicts.keys()];
      return {
        success: false,
        hasConflicts: true,
        mergeCommitHash: null,
        message: tables.map((t) => `CONFLICT (content): Merge conflict in ${t}`).join('\n'),
      };
    }

    this.restore(merged);
    const hash = this.record(`Merge branch '${sourceBranch}' into ${this.currentBranch}`, [ours, theirs], merged);
    this.branches.set(this.currentBranch, hash);
    return { success: true, hasConflicts: false, mergeCommitHash: hash, message: 'Merge successful' };
  }

  async getConflicts(table: string): Promise<ConflictInfo[]> {
    const count = this.conflicts.get(table);
    return count ? [{ tableName: table, numConflicts: count }] : [];
  }

  async pull(remote = 'origin', branch?: string): Promise<PullResult> {
    this.calls.push(branch ? `pull ${remote} ${branch}` : `pull ${remote}`);
    if (this.pullHandler) return this.pullHandler(this);
    return { success: true, wasFastForward: false, hasConflicts: false, message: 'Everything up-to-date' };
  }

  async push(remote = 'origin', branch?: string): Promise<PushResult> {
    this.calls.push(branch ? `push ${remote} ${branch}` : `push ${remote}`);
    const outcome = classifyPushOutput(this.pushOutput);
    return { success: outcome.kind !== 'rejected', outcome, message: describePushOutcome(outcome) };
  }

  async resetHard(target: string): Promise<CommandResult> {
    this.calls.push(`reset --hard ${target}`);
    const hash = this.findRef(target);
    if (hash === undefined) return this.failure(`invalid ref: ${target}`);

    this.restore(this.snapshotOf(hash));
    this.branches.set(this.currentBranch, hash);
    this.staged = null;
    this.conflicts.clear();
    return { success: true, output: '', error: '', exitCode: 0 };
  }

  close(): void {
    this.db.close();
  }

  // === Snapshots ===

  private head(): CommitRecord {
    const hash = this.branches.get(this.currentBranch);
    const commit = hash === undefined ? undefined : this.commits.get(hash);
    if (!commit) throw new Error(`no head for branch ${this.currentBranch}`);
    return commit;
  }

  private record(message: string, parents: string[], snapshot: Snapshot = this.capture()): string {
    this.counter++;
    const hash = createHash('sha256').update(`${this.counter}:${message}`).digest('hex').slice(0, 32);
    this.commits.set(hash, { hash, parents, message, date: new Date().toISOString(), snapshot });
    return hash;
  }

  private snapshotOf(hash: string): Snapshot {
    const commit = this.commits.get(hash);
    if (!commit) throw new Error(`unknown commit ${hash}`);
    return commit.snapshot;
  }

  private cloneSnapshot(snapshot: Snapshot): Snapshot {
    return new Map([...snapshot].map(([table, rows]) => [table, new Map(rows)]));
  }

  private tableNames(): string[] {
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((r) => r.name);
  }

  private primaryKey(table: string): string {
    const columns = this.db.prepare<[], { name: string; pk: number }>(`PRAGMA table_info(${table})`).all();
    const pk = columns.find((c) => c.pk === 1);
    if (!pk) throw new Error(`table ${table} has no primary key`);
    return pk.name;
  }

  private capture(): Snapshot {
    const snapshot: Snapshot = new Map();
    for (const table of this.tableNames()) {
      const key = this.primaryKey(table);
      const rows = new Map<string, string>();
      for (const row of this.db.prepare<[], LedgerRow>(`SELECT * FROM ${table}`).all()) {
        rows.set(String(row[key]), JSON.stringify(row));
      }
      snapshot.set(table, rows);
    }
    return snapshot;
  }

  private restore(snapshot: Snapshot): void {
    this.db.transaction(() => {
      for (const table of this.tableNames()) {
        this.db.prepare(`DELETE FROM ${table}`).run();
        for (const json of snapshot.get(table)?.values() ?? []) {
          const row = parseRow(json);
          const columns = Object.keys(row);
          this.db
            .prepare(`INSERT INTO ${table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`)
            .run(...columns.map((c) => row[c]));
        }
      }
    })();
  }

  private sameAs(a: Snapshot, b: Snapshot): boolean {
    return this.tableNames().every((t) => isEmptyDiff(diffTable(a.get(t), b.get(t))));
  }

  private ancestorsOf(hash: string): Set<string> {
    const seen = new Set<string>();
    const stack = [hash];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...(this.commits.get(next)?.parents ?? []));
    }
    return seen;
  }

  private mergeBase(a: string, b: string): string {
    const ofB = this.ancestorsOf(b);
    const queue = [a];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      if (ofB.has(next)) return next;
      queue.push(...(this.commits.get(next)?.parents ?? []));
    }
    throw new Error(`no common ancestor of ${a} and ${b}`);
  }

  private findRef(ref: string): string | undefined {
    return this.branches.get(ref) ?? (this.commits.has(ref) ? ref : undefined);
  }

  private resolveRef(ref: string): string {
    const hash = this.findRef(ref);
    if (hash === undefined) throw new Error(`invalid ref: ${ref}`);
    return hash;
  }

  private diffRows(fromRef: string, toRef: string, table: string): LedgerRow[] {
    const from = this.snapshotOf(this.resolveRef(fromRef)).get(table);
    const to = this.snapshotOf(this.resolveRef(toRef)).get(table);
    const diff = diffTable(from, to);

    const toDiffRow = (type: string, key: string, before: string | undefined, after: string | undefined): LedgerRow => {
      const fromRow = before === undefined ? null : parseRow(before);
      const toRow = after === undefined ? null : parseRow(after);
      return {
        diff_type: type,
        from_id: fromRow ? key : null,
        to_id: toRow ? key : null,
        from_content_hash: fromRow?.content_hash ?? null,
        to_content_hash: toRow?.content_hash ?? null,
        to_content: toRow?.content ?? null,
      };
    };

    return [
      ...[...diff.added].map(([key, row]) => toDiffRow('added', key, undefined, row)),
      ...[...diff.modified].map(([key, change]) => toDiffRow('modified', key, change.from, change.to)),
      ...[...diff.removed].map(([key, row]) => toDiffRow('removed', key, row, undefined)),
    ];
  }

  private failure(message: string): CommandResult {
    return { success: false, output: '', error: message, exitCode: 1 };
  }
}
