import { createHash } from 'node:crypto';
import type { Metadata } from '../types.js';
import type { ConflictType, ResolutionType } from './types.js';

/** Keys written by sync and import bookkeeping; never part of a conflict. */
export const IGNORED_METADATA_KEYS: ReadonlySet<string> = new Set([
  'is_local_change',
  'import_source',
  'import_source_collection',
  'import_timestamp',
]);

export const PREVIEW_LENGTH = 500;

export const MERGE_SEPARATOR = '\n\n--- Merged from import ---\n\n';

/** Stable id of a conflict: `imp_` plus 12 hex chars. */
export function conflictId(
  sourceCollection: string,
  targetCollection: string,
  documentId: string,
  type: ConflictType,
): string {
  const digest = createHash('sha256')
    .update(`${sourceCollection}_${targetCollection}_${documentId}_${type}`, 'utf-8')
    .digest('hex');
  return `imp_${digest.slice(0, 12)}`;
}

export function resolutionOptionsFor(type: ConflictType): ResolutionType[] {
  switch (type) {
    case 'content_modification':
      return ['keep_source', 'keep_target', 'merge', 'skip', 'custom'];
    case 'metadata_conflict':
      return ['keep_source', 'keep_target', 'merge', 'skip'];
    default:
      return ['keep_source', 'keep_target', 'skip'];
  }
}

export function suggestedResolutionFor(type: ConflictType): ResolutionType {
  if (type === 'collection_mismatch') return 'keep_target';
  if (type === 'id_collision') return 'skip';
  return 'keep_source';
}

/** Lenient parse of a resolution name; unknown names mean keep_source. */
export function parseResolutionType(text: string): ResolutionType {
  switch (text.trim().toLowerCase()) {
    case 'keep_target':
    case 'keeptarget':
    case 'target':
      return 'keep_target';
    case 'merge':
      return 'merge';
    case 'skip':
      return 'skip';
    case 'custom':
      return 'custom';
    default:
      return 'keep_source';
  }
}

function comparable(metadata: Metadata): Map<string, string> {
  const result = new Map<string, string>();
  for (const [key, value] of Object.entries(metadata)) {
    if (!IGNORED_METADATA_KEYS.has(key)) result.set(key, String(value));
  }
  return result;
}

function contains(outer: Map<string, string>, inner: Map<string, string>): boolean {
  for (const [key, value] of inner) {
    if (outer.get(key) !== value) return false;
  }
  return true;
}

/** Equal after dropping bookkeeping keys, comparing values as strings. */
export function metadataEquals(a: Metadata, b: Metadata): boolean {
  const left = comparable(a);
  const right = comparable(b);
  return left.size === right.size && contains(left, right);
}

/** One side holds every entry of the other plus at least one more. */
export function isStrictMetadataSuperset(a: Metadata, b: Metadata): boolean {
  const left = comparable(a);
  const right = comparable(b);
  if (left.size > right.size) return contains(left, right);
  if (right.size > left.size) return contains(right, left);
  return false;
}

export function isAutoResolvable(
  sourceHash: string,
  targetHash: string,
  sourceMetadata: Metadata,
  targetMetadata: Metadata,
): boolean {
  return sourceHash === targetHash || isStrictMetadataSuperset(sourceMetadata, targetMetadata);
}

export function truncatePreview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}
