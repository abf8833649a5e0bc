import type { Metadata } from '../types.js';

export const CONFLICT_TYPES = [
  'content_modification',
  'metadata_conflict',
  'collection_mismatch',
  'id_collision',
] as const;

export type ConflictType = (typeof CONFLICT_TYPES)[number];

export const RESOLUTION_TYPES = ['keep_source', 'keep_target', 'merge', 'skip', 'custom'] as const;

export type ResolutionType = (typeof RESOLUTION_TYPES)[number];

export interface CollectionFilter {
  /** Exact name or wildcard pattern of source collections. */
  name: string;
  /** Target collection; defaults to the source name. */
  importInto?: string;
  /** Document id patterns; all documents when absent. */
  documents?: string[];
}

export interface ImportFilter {
  collections?: CollectionFilter[];
}

export interface CollectionMapping {
  source: string;
  target: string;
  documentPatterns?: string[];
}

export interface ImportConflictInfo {
  conflictId: string;
  type: ConflictType;
  sourceCollection: string;
  targetCollection: string;
  documentId: string;
  sourceContentHash: string;
  targetContentHash: string;
  sourceMetadata: Metadata;
  targetMetadata: Metadata;
  sourceContentPreview?: string;
  targetContentPreview?: string;
  autoResolvable: boolean;
  suggestedResolution: ResolutionType;
  resolutionOptions: ResolutionType[];
}

export interface ImportResolution {
  conflictId: string;
  resolutionType: ResolutionType;
  customContent?: string;
  customMetadata?: Metadata;
}

export interface ImportPreviewResult {
  success: boolean;
  sourcePath: string;
  mappings: CollectionMapping[];
  conflicts: ImportConflictInfo[];
  documentsToAdd: number;
  documentsToUpdate: number;
  documentsToSkip: number;
  collectionsToCreate: string[];
  collectionsToUpdate: string[];
  affectedCollections: string[];
  totalConflicts: number;
  autoResolvableConflicts: number;
  canAutoResolve: boolean;
  message: string;
  recommendedAction: string;
}

export interface ImportExecutionResult {
  success: boolean;
  documentsImported: number;
  documentsUpdated: number;
  documentsSkipped: number;
  collectionsCreated: number;
  conflictsResolved: number;
  resolutionBreakdown: Partial<Record<ResolutionType, number>>;
  message: string;
  errorMessage: string | null;
}
