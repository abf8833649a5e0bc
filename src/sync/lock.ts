/**
 * Serialization of sync work: an in-process mutex per repository, and a
 * cross-process lock row in the shared state database.
 */

import { getDb } from '../db/connection.js';

/**
 * Per-repository promise chain. Work for the same repo runs one at a time
 * in call order; different repos run independently.
 */
export class RepositoryMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(repoPath: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(repoPath) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(repoPath, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(repoPath) === tail) this.tails.delete(repoPath);
    }
  }

  isLocked(repoPath: string): boolean {
    return this.tails.has(repoPath);
  }
}

/** Default lock TTL in seconds. */
export const LOCK_TTL_SECONDS = 90;

/** Check if a process with the given PID is alive. */
function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

function lockName(repoPath: string): string {
  return `sync:${repoPath}`;
}

/**
 * Try to acquire the cross-process sync lock for a repository.
 * Returns false if another live process holds an unexpired lock. Expired
 * locks and locks held by dead processes are taken over.
 */
export function tryAcquireSyncLock(repoPath: string, ttlSeconds: number = LOCK_TTL_SECONDS): boolean {
  const db = getDb();
  const name = lockName(repoPath);
  const now = new Date().toISOString();
  const expiresAt = new Date(Date.now() + ttlSeconds * 1000).toISOString();
  const pid = process.pid;

  const acquire = db.transaction(() => {
    const existing = db
      .prepare<[string], { holder_pid: number; expires_at: string }>(
        'SELECT holder_pid, expires_at FROM sync_lock WHERE lock_name = ?',
      )
      .get(name);

    if (!existing) {
      db.prepare('INSERT INTO sync_lock (lock_name, holder_pid, acquired_at, expires_at) VALUES (?, ?, ?, ?)')
        .run(name, pid, now, expiresAt);
      return true;
    }

    if (existing.holder_pid === pid) {
      db.prepare('UPDATE sync_lock SET acquired_at = ?, expires_at = ? WHERE lock_name = ?')
        .run(now, expiresAt, name);
      return true;
    }

    const expired = existing.expires_at < now;
    if (expired || !isPidAlive(existing.holder_pid)) {
      db.prepare('UPDATE sync_lock SET holder_pid = ?, acquired_at = ?, expires_at = ? WHERE lock_name = ?')
        .run(pid, now, expiresAt, name);
      return true;
    }

    return false;
  });

  return acquire();
}

/** Release the lock if this process holds it. */
export function releaseSyncLock(repoPath: string): void {
  getDb()
    .prepare('DELETE FROM sync_lock WHERE lock_name = ? AND holder_pid = ?')
    .run(lockName(repoPath), process.pid);
}
