import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ImportValidationError } from '../errors.js';
import { RESOLUTION_TYPES, type ImportFilter, type ImportResolution } from '../import/types.js';
import { errorResponse, jsonResponse, withSyncLock, type ToolContext } from './context.js';

const filterSchema = z
  .object({
    collections: z
      .array(
        z.object({
          name: z.string().min(1).describe('Source collection name or wildcard pattern (* and ?)'),
          import_into: z.string().min(1).optional().describe('Target collection (default: same name)'),
          documents: z.array(z.string()).optional().describe('Document id patterns to include'),
        }),
      )
      .optional(),
  })
  .optional()
  .describe('Which source collections to import and where. Omit to import everything under the same names.');

type FilterInput = z.infer<typeof filterSchema>;

function toImportFilter(input: FilterInput): ImportFilter | undefined {
  if (!input) return undefined;
  return {
    collections: input.collections?.map((c) => ({
      name: c.name,
      importInto: c.import_into,
      documents: c.documents,
    })),
  };
}

export function registerImportTools(server: McpServer, ctx: ToolContext): void {
  const repoPath = ctx.manager.repoPath;

  server.registerTool(
    'preview_import',
    {
      description:
        'Dry run of importing documents from another index database. Lists the ' +
        'documents that would be added, skipped or updated and every conflict ' +
        'with its id, suggested resolution and allowed resolutions. Nothing is written.',
      inputSchema: {
        source_path: z.string().min(1).describe('Path of the index database to import from'),
        filter: filterSchema,
        include_content_preview: z
          .boolean()
          .optional()
          .describe('Include the first 500 characters of both sides of each conflict'),
      },
    },
    async ({ source_path, filter, include_content_preview }) => {
      try {
        const preview = await ctx.analyzer.analyzeImport(
          source_path,
          toImportFilter(filter),
          include_content_preview ?? false,
        );
        return jsonResponse(preview);
      } catch (error) {
        return errorResponse('previewing import', error);
      }
    },
  );

  server.registerTool(
    'execute_import',
    {
      description:
        'Import documents from another index database. Conflicts listed by ' +
        'preview_import are settled by the given resolutions; the rest use ' +
        'resolution_strategy when auto_resolve_remaining is true and are skipped otherwise. ' +
        'Imported chunks are marked as local changes.',
      inputSchema: {
        source_path: z.string().min(1).describe('Path of the index database to import from'),
        filter: filterSchema,
        resolutions: z
          .array(
            z.object({
              conflict_id: z.string().min(1),
              resolution_type: z.enum(RESOLUTION_TYPES),
              custom_content: z.string().optional().describe('Required for custom resolutions'),
              custom_metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
            }),
          )
          .optional(),
        auto_resolve_remaining: z.boolean().optional().describe('Resolve unlisted conflicts automatically (default true)'),
        resolution_strategy: z
          .string()
          .optional()
          .describe('Resolution for unlisted conflicts: keep_source (default), keep_target, merge or skip'),
      },
    },
    async ({ source_path, filter, resolutions, auto_resolve_remaining, resolution_strategy }) =>
      withSyncLock(repoPath, 'executing import', async () => {
        const parsed: ImportResolution[] = (resolutions ?? []).map((r) => ({
          conflictId: r.conflict_id,
          resolutionType: r.resolution_type,
          customContent: r.custom_content,
          customMetadata: r.custom_metadata,
        }));

        try {
          const result = await ctx.executor.executeImport(
            source_path,
            toImportFilter(filter),
            parsed,
            auto_resolve_remaining ?? true,
            resolution_strategy ?? 'keep_source',
          );
          return jsonResponse(result, !result.success);
        } catch (error) {
          if (error instanceof ImportValidationError) {
            return jsonResponse({ success: false, errors: error.errors }, true);
          }
          throw error;
        }
      }),
  );
}
