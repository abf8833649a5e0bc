/**
 * Error taxonomy for the sync engine.
 *
 * Expected outcomes (conflicts, no changes, unsafe to sync) are reported through
 * result objects. These classes cover invalid arguments and adapter failures.
 */

export type SyncErrorCode =
  | 'LEDGER_OPERATION'
  | 'IMPORT_VALIDATION'
  | 'CONFLICT_UNRESOLVED'
  | 'CONFIGURATION'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'QUEUE_FULL';

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A ledger command or query failed. */
export class LedgerOperationError extends SyncError {
  readonly exitCode: number | null;
  readonly stderr: string | null;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string | null; cause?: unknown } = {},
  ) {
    super('LEDGER_OPERATION', message, { cause: details.cause });
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? null;
  }
}

export class ImportValidationError extends SyncError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('IMPORT_VALIDATION', `Invalid import resolutions: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

/** Merge conflicts are pending in the ledger, so index sync is withheld. */
export class ConflictUnresolvedError extends SyncError {
  readonly tables: string[];

  constructor(tables: string[]) {
    super('CONFLICT_UNRESOLVED', `Unresolved merge conflicts in: ${tables.join(', ')}`);
    this.tables = tables;
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class NotFoundError extends SyncError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class TimeoutError extends SyncError {
  constructor(message: string) {
    super('TIMEOUT', message);
  }
}

export class QueueFullError extends SyncError {
  constructor(message: string) {
    super('QUEUE_FULL', message);
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
