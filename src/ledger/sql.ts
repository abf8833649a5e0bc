/**
 * Identifier validation and literal binding for ledger SQL.
 *
 * Table names and commit refs cannot be bound as parameters inside the
 * ledger's diff table function, so they are checked against an allow-list or
 * a strict pattern before they reach a query string.
 */

import { ConfigurationError } from '../errors.js';
import { DIFFABLE_TABLES, type DiffableTable } from '../types.js';
import type { SqlValue } from './types.js';

const DIFFABLE_SET = new Set<string>(DIFFABLE_TABLES);

// Hex hash, HEAD with ~N / ^ suffixes, or a branch name.
const COMMIT_REF_PATTERN = /^(?:[0-9a-v]{7,64}|HEAD(?:[~^]\d*)*|[A-Za-z0-9][A-Za-z0-9._/-]{0,199}(?:[~^]\d*)*)$/;

export function isValidTableName(table: string): table is DiffableTable {
  return DIFFABLE_SET.has(table);
}

export function assertValidTableName(table: string): DiffableTable {
  if (!isValidTableName(table)) {
    throw new ConfigurationError(`Invalid table name: ${table}`);
  }
  return table;
}

export function isValidCommitRef(ref: string): boolean {
  return COMMIT_REF_PATTERN.test(ref) && !ref.includes('..');
}

export function assertValidCommitRef(ref: string): string {
  if (!isValidCommitRef(ref)) {
    throw new ConfigurationError(`Invalid commit reference: ${ref}`);
  }
  return ref;
}

/** Primary key column of an allow-listed table. */
export function getIdColumn(table: DiffableTable): string {
  switch (table) {
    case 'issue_logs':
      return 'log_id';
    case 'knowledge_docs':
      return 'doc_id';
    case 'projects':
      return 'project_id';
    case 'index_sync_state':
      return 'collection_name';
    default:
      return 'id';
  }
}

/** Render a value as a SQL literal. */
export function toSqlLiteral(value: SqlValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`Cannot bind non-finite number: ${value}`);
    }
    return String(value);
  }
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

/**
 * Replace each `?` placeholder outside quoted strings with the literal form of
 * the matching parameter. Used by adapters whose transport has no native
 * parameter binding.
 */
export function bindParameters(sql: string, params: readonly SqlValue[] = []): string {
  let result = '';
  let paramIndex = 0;
  let quote: string | null = null;

  for (let i = 0; i < sql.length; i++) {
    const ch = sql[i];

    if (quote) {
      result += ch;
      if (ch === quote) {
        // Doubled quote stays inside the literal
        if (sql[i + 1] === quote) {
          result += sql[++i];
        } else {
          quote = null;
        }
      }
      continue;
    }

    if (ch === "'" || ch === '"' || ch === '`') {
      quote = ch;
      result += ch;
      continue;
    }

    if (ch === '?') {
      if (paramIndex >= params.length) {
        throw new ConfigurationError(`Missing value for query parameter ${paramIndex + 1}`);
      }
      result += toSqlLiteral(params[paramIndex++]);
      continue;
    }

    result += ch;
  }

  if (paramIndex !== params.length) {
    throw new ConfigurationError(
      `Query has ${paramIndex} placeholders but ${params.length} parameters were given`,
    );
  }

  return result;
}
