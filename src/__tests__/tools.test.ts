import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getDb } from '../db/connection.js';
import { errorResponse, jsonResponse, withSyncLock } from '../tools/context.js';
import { setupTestDb, teardownTestDb } from './helpers.js';

describe('tool responses', () => {
  it('should render values as indented JSON', () => {
    expect(jsonResponse({ status: 'success' })).toEqual({
      content: [{ type: 'text', text: '{\n  "status": "success"\n}' }],
    });
    expect(jsonResponse({ status: 'failed' }, true).isError).toBe(true);
  });

  it('should describe errors', () => {
    expect(errorResponse('pulling', new Error('remote unreachable'))).toEqual({
      content: [{ type: 'text', text: 'Error pulling: remote unreachable' }],
      isError: true,
    });
  });
});

describe('withSyncLock', () => {
  beforeEach(() => {
    setupTestDb();
  });

  afterEach(() => {
    teardownTestDb();
  });

  function lockCount(): number {
    const row = getDb().prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM sync_lock').get();
    return row?.count ?? 0;
  }

  it('should run the work and release the lock', async () => {
    let heldDuringWork = 0;
    const response = await withSyncLock('/repo', 'committing', async () => {
      heldDuringWork = lockCount();
      return jsonResponse({ ok: true });
    });

    expect(heldDuringWork).toBe(1);
    expect(response.isError).toBeUndefined();
    expect(lockCount()).toBe(0);
  });

  it('should turn a thrown error into an error response', async () => {
    const response = await withSyncLock('/repo', 'merging', async () => {
      throw new Error('conflict table unreadable');
    });

    expect(response).toEqual({
      content: [{ type: 'text', text: 'Error merging: conflict table unreadable' }],
      isError: true,
    });
    expect(lockCount()).toBe(0);
  });

  it('should refuse while another live process holds the lock', async () => {
    getDb()
      .prepare('INSERT INTO sync_lock (lock_name, holder_pid, acquired_at, expires_at) VALUES (?, ?, ?, ?)')
      .run('sync:/repo', process.ppid, '2026-01-15T10:00:00.000Z', '2999-01-01T00:00:00.000Z');
    let ran = false;

    const response = await withSyncLock('/repo', 'pushing', async () => {
      ran = true;
      return jsonResponse({});
    });

    expect(ran).toBe(false);
    expect(response).toEqual({
      content: [{ type: 'text', text: 'Another process is currently syncing this repository. Try again shortly.' }],
      isError: true,
    });
  });
});
