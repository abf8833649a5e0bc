import type { LedgerClient } from './types.js';

/**
 * Tables the sync engine expects in the ledger.
 * Written in the subset of SQL shared by the ledger and SQLite.
 */
export const LEDGER_SCHEMA: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS projects (
    project_id VARCHAR(64) PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    description TEXT,
    created_at VARCHAR(40)
  )`,
  `CREATE TABLE IF NOT EXISTS issue_logs (
    log_id VARCHAR(64) PRIMARY KEY,
    project_id VARCHAR(64),
    issue_number INT,
    title VARCHAR(500),
    content LONGTEXT NOT NULL,
    content_hash CHAR(64) NOT NULL,
    log_type VARCHAR(50),
    created_at VARCHAR(40),
    updated_at VARCHAR(40)
  )`,
  `CREATE TABLE IF NOT EXISTS knowledge_docs (
    doc_id VARCHAR(64) PRIMARY KEY,
    category VARCHAR(100),
    tool_name VARCHAR(255),
    tool_version VARCHAR(50),
    title VARCHAR(500),
    content LONGTEXT NOT NULL,
    content_hash CHAR(64) NOT NULL,
    created_at VARCHAR(40),
    updated_at VARCHAR(40)
  )`,
  `CREATE TABLE IF NOT EXISTS document_sync_log (
    id VARCHAR(36) PRIMARY KEY,
    source_table VARCHAR(64) NOT NULL,
    source_id VARCHAR(64) NOT NULL,
    collection_name VARCHAR(255) NOT NULL,
    content_hash CHAR(64) NOT NULL,
    chunk_ids TEXT,
    synced_at VARCHAR(40),
    sync_action VARCHAR(20)
  )`,
  `CREATE TABLE IF NOT EXISTS index_sync_state (
    collection_name VARCHAR(255) PRIMARY KEY,
    last_sync_commit VARCHAR(64),
    last_sync_at VARCHAR(40),
    document_count INT DEFAULT 0,
    chunk_count INT DEFAULT 0,
    sync_status VARCHAR(20),
    error_message TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS sync_operations (
    id VARCHAR(36) PRIMARY KEY,
    operation_type VARCHAR(20) NOT NULL,
    ledger_branch VARCHAR(255),
    commit_before VARCHAR(64),
    commit_after VARCHAR(64),
    documents_added INT DEFAULT 0,
    documents_modified INT DEFAULT 0,
    documents_deleted INT DEFAULT 0,
    chunks_processed INT DEFAULT 0,
    operation_status VARCHAR(20) NOT NULL,
    error_message TEXT,
    started_at VARCHAR(40),
    completed_at VARCHAR(40)
  )`,
];

/** Create any missing sync tables in the ledger working set. */
export async function initLedgerSchema(ledger: Pick<LedgerClient, 'execute'>): Promise<void> {
  for (const statement of LEDGER_SCHEMA) {
    await ledger.execute(statement);
  }
}
