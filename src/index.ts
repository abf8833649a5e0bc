#!/usr/bin/env node

import { hostname } from 'node:os';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { USAGE, loadConfigFile, parseArgs, resolveConfig, type ServerConfig } from './config.js';
import { getDb, closeDb } from './db/connection.js';
import { createEmbeddingProvider, type EmbeddingProvider } from './embeddings/provider.js';
import { errorMessage } from './errors.js';
import { ImportAnalyzer } from './import/analyzer.js';
import { ImportExecutor } from './import/executor.js';
import { IndexClientRegistry } from './index-store/registry.js';
import { SqliteIndexStore } from './index-store/sqlite-store.js';
import { IndexWorker, QueuedIndexStore } from './index-store/worker.js';
import { INSTRUCTIONS } from './instructions.js';
import { LedgerCli } from './ledger/cli.js';
import { DeletionTracker } from './sync/deletion-tracker.js';
import { FileManifestStore } from './sync/manifest.js';
import { SyncManager } from './sync/sync-manager.js';
import { registerDocumentTools } from './tools/documents.js';
import { registerImportTools } from './tools/import.js';
import { registerSyncTools } from './tools/sync.js';

const INDEX_CLIENT_ID = 'default';

function loadConfig(): ServerConfig {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.help) {
    console.error(USAGE);
    process.exit(0);
  }
  try {
    const file = parsed.configPath ? loadConfigFile(parsed.configPath) : {};
    return resolveConfig(parsed.options, file);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.error('Run with --help for usage.');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();

  // Initialize local state database
  const db = getDb(config.dbPath);
  console.error('State database initialized');

  // Initialize embedding provider (if configured)
  let embeddingProvider: EmbeddingProvider | null = null;
  if (config.embeddingProvider !== 'none') {
    try {
      embeddingProvider = await createEmbeddingProvider(config.embeddingProvider, {
        apiKey: config.openaiApiKey,
        model: config.embeddingModel,
      });
      if (embeddingProvider) {
        console.error(
          `Embedding provider: ${embeddingProvider.name} (model: ${embeddingProvider.model}, ${embeddingProvider.dimensions}d)`,
        );
      }
    } catch (error) {
      console.error(`Warning: Failed to initialize embedding provider: ${errorMessage(error)}`);
      console.error('Continuing with full-text ranking.');
    }
  }

  const worker = new IndexWorker();
  const registry = new IndexClientRegistry(
    () =>
      new QueuedIndexStore(
        new SqliteIndexStore({
          path: config.indexPath,
          chunkSize: config.chunkSize,
          overlap: config.chunkOverlap,
          embeddingProvider,
        }),
        worker,
      ),
  );
  const index = registry.acquire(INDEX_CLIENT_ID);
  console.error(`Index: ${config.indexPath}`);

  const ledger = new LedgerCli({ repoPath: config.repo, binary: config.ledgerBin });
  const deletionTracker = new DeletionTracker(db);
  const manager = new SyncManager({
    ledger,
    index,
    deletionTracker,
    manifests: new FileManifestStore(config.repo),
    collectionPrefix: config.collectionPrefix,
    updatedBy: `kb-ledger-sync@${hostname()}`,
  });

  const stale = deletionTracker.cleanupStaleTracking(config.repo);
  if (stale > 0) {
    console.error(`Removed ${stale} stale deletion record(s)`);
  }

  const warning = await manager.stateChecker.getOutOfSyncWarning();
  if (warning) {
    console.error(`Warning: ${warning.message} ${warning.actionRequired}`);
  }

  // Create MCP server
  const server = new McpServer(
    { name: 'kb-ledger-sync', version: '0.1.0' },
    { instructions: INSTRUCTIONS },
  );

  const ctx = {
    manager,
    analyzer: new ImportAnalyzer(index),
    executor: new ImportExecutor(index),
    worker,
  };
  registerSyncTools(server, ctx);
  registerDocumentTools(server, ctx);
  registerImportTools(server, ctx);

  // Clean shutdown
  const shutdown = async () => {
    try {
      await registry.disposeAll();
    } catch (error) {
      console.error('Index shutdown error:', error);
    }
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // Connect stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`kb-ledger-sync server running on stdio (repo: ${config.repo})`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
