import type Database from 'better-sqlite3';

/**
 * Initialize the local state schema: deletion tracking and the
 * cross-process sync lock.
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS local_deletions (
      id TEXT PRIMARY KEY,
      repo_path TEXT NOT NULL,
      doc_id TEXT NOT NULL,
      collection_name TEXT NOT NULL,
      deleted_at TEXT NOT NULL,
      deletion_source TEXT NOT NULL DEFAULT 'mcp_tool',
      original_content_hash TEXT,
      original_metadata TEXT,
      branch_context TEXT,
      base_commit_hash TEXT,
      sync_status TEXT NOT NULL DEFAULT 'pending',
      ledger_commit_hash TEXT,
      UNIQUE(repo_path, doc_id, collection_name)
    );

    CREATE INDEX IF NOT EXISTS idx_deletions_repo_status ON local_deletions(repo_path, sync_status);
    CREATE INDEX IF NOT EXISTS idx_deletions_collection ON local_deletions(repo_path, collection_name);

    CREATE TABLE IF NOT EXISTS local_collection_deletions (
      id TEXT PRIMARY KEY,
      repo_path TEXT NOT NULL,
      collection_name TEXT NOT NULL,
      operation_type TEXT NOT NULL,
      deleted_at TEXT NOT NULL,
      deletion_source TEXT NOT NULL DEFAULT 'mcp_tool',
      original_name TEXT,
      new_name TEXT,
      original_metadata TEXT,
      new_metadata TEXT,
      sync_status TEXT NOT NULL DEFAULT 'pending',
      ledger_commit_hash TEXT,
      UNIQUE(repo_path, collection_name, operation_type)
    );

    CREATE INDEX IF NOT EXISTS idx_collection_deletions_repo
      ON local_collection_deletions(repo_path, sync_status);

    CREATE TABLE IF NOT EXISTS sync_lock (
      lock_name TEXT PRIMARY KEY,
      holder_pid INTEGER NOT NULL,
      acquired_at TEXT NOT NULL,
      expires_at TEXT NOT NULL
    );
  `);
}
