import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SOURCE_TABLES } from '../types.js';
import { errorResponse, jsonResponse, withSyncLock, type ToolContext } from './context.js';

const metadataValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export function registerDocumentTools(server: McpServer, ctx: ToolContext): void {
  const { manager } = ctx;

  server.registerTool(
    'query_documents',
    {
      description:
        'Search the index collection of the current ledger branch. Uses semantic ' +
        'ranking when an embedding provider is configured, full-text ranking otherwise. ' +
        'Results are chunks; metadata.source_id is the ledger row they came from.',
      inputSchema: {
        query: z.string().min(1).describe('Search text'),
        n_results: z.number().int().min(1).max(100).optional().describe('Maximum results (default 5)'),
        collection: z.string().optional().describe('Collection to search (default: the current branch collection)'),
        where: z
          .record(metadataValue)
          .optional()
          .describe('Metadata equality filter, e.g. {"source_table": "issue_logs"}'),
        contains: z.string().optional().describe('Only chunks whose text contains this string'),
      },
    },
    async ({ query, n_results, collection, where, contains }) => {
      try {
        const name = collection ?? (await manager.getCurrentCollectionName());
        if (!(await manager.index.getCollection(name))) {
          return jsonResponse({ collection: name, results: [] });
        }

        const result = await manager.index.queryDocuments(
          name,
          [query],
          n_results ?? 5,
          where,
          contains ? { $contains: contains } : undefined,
        );

        const results = result.ids[0].map((id, i) => ({
          id,
          distance: result.distances[0][i],
          metadata: result.metadatas[0][i],
          content: result.documents[0][i],
        }));
        return jsonResponse({ collection: name, results });
      } catch (error) {
        return errorResponse('querying documents', error);
      }
    },
  );

  server.registerTool(
    'upsert_document',
    {
      description:
        'Create or replace a knowledge_docs row in the ledger working set and ' +
        'index it. The change is uncommitted until ledger_commit runs.',
      inputSchema: {
        doc_id: z.string().min(1).describe('Document id'),
        content: z.string().describe('Document text'),
        title: z.string().optional(),
        category: z.string().optional(),
        tool_name: z.string().optional(),
        tool_version: z.string().optional(),
      },
    },
    async ({ doc_id, content, title, category, tool_name, tool_version }) =>
      withSyncLock(manager.repoPath, 'upserting document', async () =>
        jsonResponse(
          await manager.upsertDocument({
            docId: doc_id,
            content,
            title,
            category,
            toolName: tool_name,
            toolVersion: tool_version,
          }),
        ),
      ),
  );

  server.registerTool(
    'delete_document',
    {
      description:
        'Delete a source row from the ledger working set and its chunks from ' +
        'the index. The deletion is tracked so that it survives branch switches ' +
        'and is not re-added by sync before it is committed.',
      inputSchema: {
        source_table: z.enum(SOURCE_TABLES).describe('Table the row lives in'),
        id: z.string().min(1).describe('Row id'),
      },
    },
    async ({ source_table, id }) =>
      withSyncLock(manager.repoPath, 'deleting document', async () =>
        jsonResponse(await manager.deleteDocument(source_table, id)),
      ),
  );
}
