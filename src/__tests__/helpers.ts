import { resetDb, closeDb, getDb } from '../db/connection.js';
import { calculateContentHash } from '../chunking/chunker.js';
import { SqliteIndexStore } from '../index-store/sqlite-store.js';
import { DeletionTracker } from '../sync/deletion-tracker.js';
import { MemoryManifestStore, type ManifestState } from '../sync/manifest.js';
import { SyncManager } from '../sync/sync-manager.js';
import { FakeLedger } from './fake-ledger.js';

/**
 * Initialize a fresh in-memory database for testing.
 * Call in beforeEach() to get full test isolation.
 */
export function setupTestDb(): void {
  resetDb(':memory:');
}

/**
 * Clean up the database connection after tests.
 * Call in afterAll() or afterEach().
 */
export function teardownTestDb(): void {
  closeDb();
}

const TIMESTAMP = '2026-01-15T10:00:00.000Z';

export async function insertKnowledgeDoc(
  ledger: FakeLedger,
  doc: { id: string; content: string; title?: string; category?: string; toolName?: string },
): Promise<void> {
  await ledger.execute('DELETE FROM knowledge_docs WHERE doc_id = ?', [doc.id]);
  await ledger.execute(
    `INSERT INTO knowledge_docs
       (doc_id, category, tool_name, tool_version, title, content, content_hash, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      doc.id,
      doc.category ?? 'guide',
      doc.toolName ?? 'widget-cli',
      '1.0',
      doc.title ?? doc.id,
      doc.content,
      calculateContentHash(doc.content),
      TIMESTAMP,
      TIMESTAMP,
    ],
  );
}

export async function insertIssueLog(
  ledger: FakeLedger,
  log: { id: string; content: string; projectId?: string; issueNumber?: number; title?: string },
): Promise<void> {
  await ledger.execute('DELETE FROM issue_logs WHERE log_id = ?', [log.id]);
  await ledger.execute(
    `INSERT INTO issue_logs
       (log_id, project_id, issue_number, title, content, content_hash, log_type, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      log.id,
      log.projectId ?? 'proj-1',
      log.issueNumber ?? 1,
      log.title ?? log.id,
      log.content,
      calculateContentHash(log.content),
      'investigation',
      TIMESTAMP,
      TIMESTAMP,
    ],
  );
}

export interface Harness {
  ledger: FakeLedger;
  index: SqliteIndexStore;
  tracker: DeletionTracker;
  manifests: MemoryManifestStore;
  manager: SyncManager;
}

/** A SyncManager over a fake ledger, an in-memory index and the test state DB. */
export async function createHarness(
  options: { manifest?: ManifestState | null; chunkSize?: number; overlap?: number } = {},
): Promise<Harness> {
  const ledger = await FakeLedger.create();
  const index = new SqliteIndexStore({ chunkSize: options.chunkSize ?? 40, overlap: options.overlap ?? 10 });
  const tracker = new DeletionTracker(getDb());
  const manifests = new MemoryManifestStore(options.manifest ?? null);
  const manager = new SyncManager({ ledger, index, deletionTracker: tracker, manifests, updatedBy: 'test-host' });
  return { ledger, index, tracker, manifests, manager };
}

/** Logical document ids present in a collection. */
export async function indexedSourceIds(index: SqliteIndexStore, collection: string): Promise<string[]> {
  const result = await index.getDocuments(collection);
  const ids = new Set(result.metadatas.map((m) => String(m.source_id)));
  return [...ids].sort();
}
