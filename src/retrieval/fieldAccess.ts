/**
 * @fileOverview: Typed accessors for optional search-hit fields
 * @module: FieldAccess
 * @keyFunctions:
 *   - readText(): String field or the placeholder
 *   - readList(): String-list field joined, or the placeholder
 *   - readScore(): Relevance score of a hit
 * @context: Every schema field rendered into a snippet goes through these so a missing value always shows as N/A
 */

import type { SearchHit } from './types';

export const MISSING_FIELD_PLACEHOLDER = 'N/A';

export const SCORE_FIELD = '@search.score';

export function readText(hit: SearchHit, field: string): string {
  const value = hit[field];
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    return MISSING_FIELD_PLACEHOLDER;
  }
  return value.trim();
}

export function readList(hit: SearchHit, field: string, separator: string = ', '): string {
  const value = hit[field];
  if (!Array.isArray(value)) {
    return readText(hit, field);
  }
  const items = value
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return items.length > 0 ? items.join(separator) : MISSING_FIELD_PLACEHOLDER;
}

export function readScore(hit: SearchHit): number {
  const value = hit[SCORE_FIELD];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}
