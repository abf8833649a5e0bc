/**
 * Dry run of an import: works out which collection each source collection
 * lands in, and classifies every source document as an add, a skip or a
 * conflict against what the target already holds.
 */

import type { ReassembledDocument } from '../chunking/converter.js';
import { NotFoundError } from '../errors.js';
import type { IndexStore } from '../index-store/types.js';
import {
  conflictId,
  isAutoResolvable,
  metadataEquals,
  resolutionOptionsFor,
  suggestedResolutionFor,
  truncatePreview,
} from './conflicts.js';
import { openExternalIndex, readLogicalDocuments, type ImportSource } from './source.js';
import type {
  CollectionMapping,
  ConflictType,
  ImportConflictInfo,
  ImportFilter,
  ImportPreviewResult,
} from './types.js';
import { hasWildcard, matchesAnyWildcard, matchesWildcard } from './wildcard.js';

/** One source document and what importing it would touch. */
export interface PlannedDocument {
  mapping: CollectionMapping;
  source: ReassembledDocument;
  /** The document it would replace: the target's copy, or an earlier source in the same batch. */
  existing: ReassembledDocument | null;
  conflict: ImportConflictInfo | null;
}

export interface ImportPlan {
  preview: ImportPreviewResult;
  documents: PlannedDocument[];
  targetsToCreate: Set<string>;
}

export type ImportSourceFactory = (sourcePath: string) => ImportSource;

/**
 * Resolve the filter into source -> target pairs.
 * No filter means every source collection into a collection of the same name.
 */
export function resolveMappings(sourceCollections: readonly string[], filter?: ImportFilter): CollectionMapping[] {
  const entries = filter?.collections ?? [];
  if (entries.length === 0) {
    return sourceCollections.map((name) => ({ source: name, target: name }));
  }

  const mappings: CollectionMapping[] = [];
  const seen = new Set<string>();
  const push = (mapping: CollectionMapping): void => {
    const key = `${mapping.source}\u0000${mapping.target}`;
    if (seen.has(key)) return;
    seen.add(key);
    mappings.push(mapping);
  };

  for (const entry of entries) {
    if (hasWildcard(entry.name)) {
      for (const name of sourceCollections.filter((c) => matchesWildcard(entry.name, c))) {
        push({ source: name, target: entry.importInto ?? name, documentPatterns: entry.documents });
      }
    } else {
      if (!sourceCollections.includes(entry.name)) {
        throw new NotFoundError(`Source collection not found: ${entry.name}`);
      }
      push({ source: entry.name, target: entry.importInto ?? entry.name, documentPatterns: entry.documents });
    }
  }
  return mappings;
}

export class ImportAnalyzer {
  constructor(
    private readonly index: IndexStore,
    private readonly openSource: ImportSourceFactory = openExternalIndex,
  ) {}

  async analyzeImport(
    sourcePath: string,
    filter?: ImportFilter,
    includeContentPreview = false,
  ): Promise<ImportPreviewResult> {
    return (await this.plan(sourcePath, filter, includeContentPreview)).preview;
  }

  /** Full plan, including the documents themselves. */
  async plan(sourcePath: string, filter?: ImportFilter, includeContentPreview = false): Promise<ImportPlan> {
    const source = this.openSource(sourcePath);
    try {
      return await this.buildPlan(source, sourcePath, filter, includeContentPreview);
    } finally {
      await source.close();
    }
  }

  private async buildPlan(
    source: ImportSource,
    sourcePath: string,
    filter: ImportFilter | undefined,
    includeContentPreview: boolean,
  ): Promise<ImportPlan> {
    const mappings = resolveMappings(await source.listCollections(), filter);

    const documents: PlannedDocument[] = [];
    const conflicts: ImportConflictInfo[] = [];
    const targetsToCreate = new Set<string>();
    const targetsToUpdate = new Set<string>();
    const targetCache = new Map<string, Map<string, ReassembledDocument>>();
    // Documents already claimed per target by an earlier source collection
    const claimed = new Map<string, Map<string, { doc: ReassembledDocument; from: string }>>();

    let toAdd = 0;
    let toSkip = 0;

    for (const mapping of mappings) {
      let targetDocs = targetCache.get(mapping.target);
      if (!targetDocs) {
        const exists = (await this.index.getCollection(mapping.target)) !== null;
        const list = exists ? await readLogicalDocuments(this.index, mapping.target) : [];
        targetDocs = new Map(list.map((d) => [d.id, d]));
        targetCache.set(mapping.target, targetDocs);
        (exists ? targetsToUpdate : targetsToCreate).add(mapping.target);
      }

      let claims = claimed.get(mapping.target);
      if (!claims) {
        claims = new Map();
        claimed.set(mapping.target, claims);
      }

      const sourceDocs = (await source.getDocuments(mapping.source)).filter((d) =>
        matchesAnyWildcard(mapping.documentPatterns, d.id),
      );

      for (const doc of sourceDocs) {
        const earlier = claims.get(doc.id);
        const collides = earlier !== undefined && earlier.from !== mapping.source;
        const existing = collides ? earlier.doc : (targetDocs.get(doc.id) ?? null);
        claims.set(doc.id, { doc, from: mapping.source });

        const type = existing ? this.classify(doc, existing, mapping, collides) : null;

        if (!existing) {
          toAdd++;
          documents.push({ mapping, source: doc, existing: null, conflict: null });
        } else if (!type) {
          toSkip++;
          documents.push({ mapping, source: doc, existing, conflict: null });
        } else {
          const conflict = this.describeConflict(type, doc, existing, mapping, includeContentPreview);
          conflicts.push(conflict);
          documents.push({ mapping, source: doc, existing, conflict });
        }
      }
    }

    const autoResolvable = conflicts.filter((c) => c.autoResolvable).length;
    const affected = [...new Set(mappings.map((m) => m.target))];
    const canAutoResolve = conflicts.length === autoResolvable;

    const preview: ImportPreviewResult = {
      success: true,
      sourcePath,
      mappings,
      conflicts,
      documentsToAdd: toAdd,
      documentsToUpdate: conflicts.length,
      documentsToSkip: toSkip,
      collectionsToCreate: [...targetsToCreate],
      collectionsToUpdate: [...targetsToUpdate],
      affectedCollections: affected,
      totalConflicts: conflicts.length,
      autoResolvableConflicts: autoResolvable,
      canAutoResolve,
      message:
        conflicts.length === 0
          ? `No conflicts found; ${toAdd} document(s) to add, ${toSkip} unchanged across ${affected.length} collection(s)`
          : `Found ${conflicts.length} conflict(s) (${autoResolvable} auto-resolvable); ` +
            `${toAdd} document(s) to add, ${toSkip} unchanged across ${affected.length} collection(s)`,
      recommendedAction:
        conflicts.length === 0
          ? 'Execute the import.'
          : canAutoResolve
            ? 'Execute the import with auto-resolution enabled.'
            : 'Review the conflicts and provide resolutions before executing the import.',
    };

    return { preview, documents, targetsToCreate };
  }

  /** Null when the two documents are the same in every way that matters. */
  private classify(
    doc: ReassembledDocument,
    existing: ReassembledDocument,
    mapping: CollectionMapping,
    fromEarlierSource: boolean,
  ): ConflictType | null {
    if (doc.contentHash === existing.contentHash) {
      return metadataEquals(doc.metadata, existing.metadata) ? null : 'metadata_conflict';
    }
    if (fromEarlierSource) return 'id_collision';

    const origin = existing.metadata.import_source_collection;
    if (typeof origin === 'string' && origin !== mapping.source) return 'collection_mismatch';
    return 'content_modification';
  }

  private describeConflict(
    type: ConflictType,
    doc: ReassembledDocument,
    existing: ReassembledDocument,
    mapping: CollectionMapping,
    includeContentPreview: boolean,
  ): ImportConflictInfo {
    const info: ImportConflictInfo = {
      conflictId: conflictId(mapping.source, mapping.target, doc.id, type),
      type,
      sourceCollection: mapping.source,
      targetCollection: mapping.target,
      documentId: doc.id,
      sourceContentHash: doc.contentHash,
      targetContentHash: existing.contentHash,
      sourceMetadata: doc.metadata,
      targetMetadata: existing.metadata,
      autoResolvable:
        type === 'metadata_conflict' ||
        isAutoResolvable(doc.contentHash, existing.contentHash, doc.metadata, existing.metadata),
      suggestedResolution: suggestedResolutionFor(type),
      resolutionOptions: resolutionOptionsFor(type),
    };
    if (includeContentPreview) {
      info.sourceContentPreview = truncatePreview(doc.content);
      info.targetContentPreview = truncatePreview(existing.content);
    }
    return info;
  }
}
