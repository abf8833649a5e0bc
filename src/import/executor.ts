/**
 * Applies an import: resolves each conflict, then writes one batch per
 * target collection.
 */

import { ImportValidationError, errorMessage } from '../errors.js';
import type { IndexStore } from '../index-store/types.js';
import type { Metadata } from '../types.js';
import { ImportAnalyzer, type ImportSourceFactory, type PlannedDocument } from './analyzer.js';
import { MERGE_SEPARATOR, parseResolutionType } from './conflicts.js';
import { openExternalIndex } from './source.js';
import type {
  ImportConflictInfo,
  ImportExecutionResult,
  ImportFilter,
  ImportPreviewResult,
  ImportResolution,
  ResolutionType,
} from './types.js';

interface BatchEntry {
  id: string;
  content: string;
  metadata: Metadata;
  isUpdate: boolean;
}

interface ChosenResolution {
  type: ResolutionType;
  customContent?: string;
  customMetadata?: Metadata;
}

/** Every problem with the given resolutions; empty when they can be applied. */
export function validateResolutions(preview: ImportPreviewResult, resolutions: readonly ImportResolution[]): string[] {
  if (!preview.success) return ['Preview result is invalid'];

  const byId = new Map(preview.conflicts.map((c) => [c.conflictId, c]));
  const errors: string[] = [];

  for (const resolution of resolutions) {
    const conflict = byId.get(resolution.conflictId);
    if (!conflict) {
      errors.push(`Unknown conflict ID: ${resolution.conflictId}`);
      continue;
    }
    if (!conflict.resolutionOptions.includes(resolution.resolutionType)) {
      errors.push(
        `Resolution ${resolution.resolutionType} is not allowed for ${conflict.type} conflict ${resolution.conflictId}`,
      );
    }
    if (resolution.resolutionType === 'custom' && !resolution.customContent) {
      errors.push(`Custom resolution for ${resolution.conflictId} requires custom_content`);
    }
  }
  return errors;
}

export class ImportExecutor {
  private readonly analyzer: ImportAnalyzer;

  constructor(
    private readonly index: IndexStore,
    openSource: ImportSourceFactory = openExternalIndex,
  ) {
    this.analyzer = new ImportAnalyzer(index, openSource);
  }

  async executeImport(
    sourcePath: string,
    filter?: ImportFilter,
    resolutions: readonly ImportResolution[] = [],
    autoResolveRemaining = true,
    defaultStrategy = 'keep_source',
  ): Promise<ImportExecutionResult> {
    const plan = await this.analyzer.plan(sourcePath, filter);

    const errors = validateResolutions(plan.preview, resolutions);
    if (errors.length > 0) throw new ImportValidationError(errors);

    const explicit = new Map(resolutions.map((r) => [r.conflictId, r]));
    const fallback = parseResolutionType(defaultStrategy);
    const choose = (conflict: ImportConflictInfo): ChosenResolution => {
      const given = explicit.get(conflict.conflictId);
      if (given) {
        return {
          type: given.resolutionType,
          customContent: given.customContent,
          customMetadata: given.customMetadata,
        };
      }
      return { type: autoResolveRemaining ? fallback : 'skip' };
    };

    const result: ImportExecutionResult = {
      success: true,
      documentsImported: 0,
      documentsUpdated: 0,
      documentsSkipped: 0,
      collectionsCreated: 0,
      conflictsResolved: 0,
      resolutionBreakdown: {},
      message: '',
      errorMessage: null,
    };

    const timestamp = new Date().toISOString();
    const batches = new Map<string, Map<string, BatchEntry>>();
    const enqueue = (planned: PlannedDocument, entry: Omit<BatchEntry, 'metadata'>, base: Metadata): void => {
      let batch = batches.get(planned.mapping.target);
      if (!batch) {
        batch = new Map();
        batches.set(planned.mapping.target, batch);
      }
      const previous = batch.get(entry.id);
      batch.set(entry.id, {
        ...entry,
        // A later source replacing an earlier one in the same batch keeps its kind
        isUpdate: previous ? previous.isUpdate : entry.isUpdate,
        metadata: {
          ...base,
          import_source: sourcePath,
          import_source_collection: planned.mapping.source,
          import_timestamp: timestamp,
        },
      });
    };

    for (const planned of plan.documents) {
      const { source, existing, conflict } = planned;

      if (!conflict) {
        if (existing) {
          result.documentsSkipped++;
        } else {
          enqueue(planned, { id: source.id, content: source.content, isUpdate: false }, source.metadata);
        }
        continue;
      }

      const resolution = choose(conflict);
      result.conflictsResolved++;
      result.resolutionBreakdown[resolution.type] = (result.resolutionBreakdown[resolution.type] ?? 0) + 1;

      switch (resolution.type) {
        case 'keep_source':
          enqueue(planned, { id: source.id, content: source.content, isUpdate: true }, source.metadata);
          break;
        case 'merge':
          enqueue(
            planned,
            {
              id: source.id,
              content: existing ? `${existing.content}${MERGE_SEPARATOR}${source.content}` : source.content,
              isUpdate: true,
            },
            { ...existing?.metadata, ...source.metadata },
          );
          break;
        case 'custom':
          if (resolution.customContent) {
            enqueue(
              planned,
              { id: source.id, content: resolution.customContent, isUpdate: true },
              resolution.customMetadata ?? source.metadata,
            );
          } else {
            result.documentsSkipped++;
          }
          break;
        case 'keep_target':
        case 'skip':
          result.documentsSkipped++;
          break;
      }
    }

    for (const [target, batch] of batches) {
      const entries = [...batch.values()];
      if (entries.length === 0) continue;

      try {
        if (!(await this.index.getCollection(target))) {
          await this.index.createCollection(target);
          result.collectionsCreated++;
        }

        const updateIds = entries.filter((e) => e.isUpdate).map((e) => e.id);
        if (updateIds.length > 0) {
          await this.index.deleteDocuments(target, updateIds, true);
        }

        await this.index.addDocuments(
          target,
          entries.map((e) => e.content),
          entries.map((e) => e.id),
          entries.map((e) => e.metadata),
          { markAsLocalChange: true },
        );
      } catch (error) {
        console.error(`Import: batch into ${target} failed:`, error);
        return {
          ...result,
          success: false,
          message: `Import failed after ${result.documentsImported} document(s) imported`,
          errorMessage: `Failed to import documents to collection ${target}: ${errorMessage(error)}`,
        };
      }

      for (const entry of entries) {
        if (entry.isUpdate) {
          result.documentsUpdated++;
        } else {
          result.documentsImported++;
        }
      }
    }

    const changed = result.documentsImported + result.documentsUpdated;
    result.message =
      changed === 0 && result.collectionsCreated === 0
        ? 'Import completed with no changes'
        : `Import completed: ${result.documentsImported} document(s) imported, ` +
          `${result.documentsUpdated} updated, ${result.documentsSkipped} skipped`;

    console.error(`Import: ${result.message} from ${sourcePath}`);
    return result;
  }
}
