/**
 * Sync manifest: the ledger commit and branch an external checkout expects,
 * plus initialization policy. Stored as JSON at `<repo>/.kb-sync/manifest.json`.
 *
 * Manifest values are read-only; every change produces a new value.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors.js';

export const MANIFEST_SCHEMA_VERSION = '1.0';
export const MANIFEST_DIR = '.kb-sync';
export const MANIFEST_FILE = 'manifest.json';

export const INIT_MODES = ['auto', 'prompt', 'manual', 'disabled'] as const;
export const ON_CLONE_POLICIES = ['sync_to_manifest', 'sync_to_latest', 'empty', 'prompt'] as const;
export const ON_BRANCH_CHANGE_POLICIES = ['preserve_local', 'sync_to_manifest', 'prompt'] as const;

export type OnBranchChangePolicy = (typeof ON_BRANCH_CHANGE_POLICIES)[number];

const LedgerSection = z.object({
  remoteUrl: z.string().nullable().default(null),
  defaultBranch: z.string().default('main'),
  currentBranch: z.string().nullable().default(null),
  currentCommit: z.string().nullable().default(null),
});

const GitMappingSection = z.object({
  enabled: z.boolean().default(true),
  lastExternalCommit: z.string().nullable().default(null),
  ledgerCommitAtExternalCommit: z.string().nullable().default(null),
});

const InitializationSection = z.object({
  mode: z.enum(INIT_MODES).default('auto'),
  onClone: z.enum(ON_CLONE_POLICIES).default('sync_to_manifest'),
  onBranchChange: z.enum(ON_BRANCH_CHANGE_POLICIES).default('preserve_local'),
});

const CollectionsSection = z.object({
  tracked: z.array(z.string()).default(['*']),
  excluded: z.array(z.string()).default([]),
});

export const ManifestSchema = z.object({
  schemaVersion: z.string(),
  ledger: LedgerSection.default({}),
  gitMapping: GitMappingSection.default({}),
  initialization: InitializationSection.default({}),
  collections: CollectionsSection.default({}),
  updatedAt: z.string(),
  updatedBy: z.string().optional(),
});

type ManifestShape = z.infer<typeof ManifestSchema>;

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ManifestState = DeepReadonly<ManifestShape>;

/** A fresh manifest with default policy. */
export function createManifest(options: {
  remoteUrl?: string | null;
  defaultBranch?: string;
  currentBranch?: string | null;
  currentCommit?: string | null;
  updatedBy?: string;
} = {}): ManifestState {
  return ManifestSchema.parse({
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    ledger: {
      remoteUrl: options.remoteUrl ?? null,
      defaultBranch: options.defaultBranch ?? 'main',
      currentBranch: options.currentBranch ?? null,
      currentCommit: options.currentCommit ?? null,
    },
    updatedAt: new Date().toISOString(),
    updatedBy: options.updatedBy,
  });
}

/** A copy of the manifest pointing at a new head. */
export function withLedgerState(
  manifest: ManifestState,
  state: { currentBranch: string; currentCommit: string; remoteUrl?: string | null },
  updatedBy?: string,
): ManifestState {
  return {
    ...manifest,
    ledger: {
      ...manifest.ledger,
      currentBranch: state.currentBranch,
      currentCommit: state.currentCommit,
      remoteUrl: state.remoteUrl === undefined ? manifest.ledger.remoteUrl : state.remoteUrl,
    },
    updatedAt: new Date().toISOString(),
    updatedBy: updatedBy ?? manifest.updatedBy,
  };
}

/** Record which ledger commit an external (git) commit corresponds to. */
export function withGitMapping(manifest: ManifestState, externalCommit: string, ledgerCommit: string): ManifestState {
  return {
    ...manifest,
    gitMapping: {
      ...manifest.gitMapping,
      lastExternalCommit: externalCommit,
      ledgerCommitAtExternalCommit: ledgerCommit,
    },
    updatedAt: new Date().toISOString(),
  };
}

/**
 * Parse manifest JSON text.
 * Returns null for an unsupported schemaVersion; throws ConfigurationError for
 * malformed JSON or a schema violation.
 */
export function parseManifest(text: string, source = 'manifest'): ManifestState | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}: ${errorMessage(error)}`);
  }

  const version = z.object({ schemaVersion: z.unknown() }).safeParse(raw);
  if (version.success && version.data.schemaVersion !== MANIFEST_SCHEMA_VERSION) {
    console.error(`Sync: unsupported manifest schema version in ${source}; ignoring it`);
    return null;
  }

  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export interface ManifestStore {
  read(): Promise<ManifestState | null>;
  write(manifest: ManifestState): Promise<void>;
  exists(): Promise<boolean>;
}

/** Manifest kept in a file under the repository. */
export class FileManifestStore implements ManifestStore {
  readonly path: string;

  constructor(repoPath: string) {
    this.path = join(repoPath, MANIFEST_DIR, MANIFEST_FILE);
  }

  async exists(): Promise<boolean> {
    return existsSync(this.path);
  }

  async read(): Promise<ManifestState | null> {
    if (!existsSync(this.path)) return null;
    return parseManifest(readFileSync(this.path, 'utf-8'), this.path);
  }

  /** Write through a temp file so a reader never sees a partial manifest. */
  async write(manifest: ManifestState): Promise<void> {
    const dir = dirname(this.path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    renameSync(tmp, this.path);
  }
}

/** In-memory manifest store. */
export class MemoryManifestStore implements ManifestStore {
  constructor(private manifest: ManifestState | null = null) {}

  async exists(): Promise<boolean> {
    return this.manifest !== null;
  }

  async read(): Promise<ManifestState | null> {
    return this.manifest;
  }

  async write(manifest: ManifestState): Promise<void> {
    this.manifest = manifest;
  }
}
