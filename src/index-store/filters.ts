import type { Metadata, MetadataValue } from '../types.js';
import type { WhereDocumentFilter, WhereFilter, WhereOperator } from './types.js';

function isOperator(value: MetadataValue | WhereOperator): value is WhereOperator {
  return typeof value === 'object' && value !== null;
}

function matchesCondition(actual: MetadataValue | undefined, condition: MetadataValue | WhereOperator): boolean {
  if (!isOperator(condition)) return actual === condition;
  if ('$eq' in condition) return actual === condition.$eq;
  if ('$ne' in condition) return actual !== condition.$ne;
  return actual !== undefined && condition.$in.includes(actual);
}

export function matchesWhere(metadata: Metadata, where: WhereFilter | undefined): boolean {
  if (!where) return true;
  return Object.entries(where).every(([key, condition]) => matchesCondition(metadata[key], condition));
}

export function matchesWhereDocument(document: string, filter: WhereDocumentFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.$contains !== undefined && !document.includes(filter.$contains)) return false;
  if (filter.$not_contains !== undefined && document.includes(filter.$not_contains)) return false;
  return true;
}
