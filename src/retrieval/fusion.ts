/**
 * @fileOverview: Context fusion of the three per-collection result lists
 * @module: ContextFusion
 * @keyFunctions:
 *   - fuse(): Concatenate rules, dictionary and Q&A snippets in that order
 *   - renderBundle(): One snippet per line for prompt interpolation
 * @context: Scores from different collections come from different queries and are never compared, so there is no re-ranking or dedup here
 */

import type { ContextBundle, ContextSnippet } from './types';

export function fuse(
  rules: readonly ContextSnippet[],
  dictionary: readonly ContextSnippet[],
  qa: readonly ContextSnippet[]
): ContextBundle {
  return Object.freeze([...rules, ...dictionary, ...qa]);
}

export function renderBundle(bundle: ContextBundle): string {
  return bundle.map(snippet => snippet.text).join('\n');
}
