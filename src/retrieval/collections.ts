/**
 * @fileOverview: Definitions of the rules, dictionary and Q&A collections
 * @module: Collections
 * @keyFunctions:
 *   - createCollectionDefinitions(): Build the three definitions from configuration
 *   - formatRuleHit() / formatDictionaryHit() / formatQaHit(): Render a hit as a context snippet
 * @context: Each collection owns its index, field projection, result limits and snippet format; the searcher itself is schema-agnostic
 */

import type { AppConfig } from '../core/config';
import { formatScore, readList, readScore, readText } from './fieldAccess';
import type { CollectionName, ContextSnippet, SearchHit } from './types';

export interface CollectionDefinition {
  readonly name: CollectionName;
  readonly label: string;
  readonly indexName: string;
  readonly select: readonly string[];
  readonly topK: number;
  readonly knn: number;
  readonly vectorField: string;
  readonly exhaustiveKnn: boolean;
  format(hit: SearchHit): ContextSnippet;
}

export const RULE_FIELDS = ['category', 'type', 'rule_en', 'rule_kr', 'example'] as const;
export const DICTIONARY_FIELDS = ['korean', 'english', 'abbreviation', 'description'] as const;
export const QA_FIELDS = ['category', 'question', 'answer'] as const;

export function formatRuleHit(hit: SearchHit): ContextSnippet {
  const score = readScore(hit);
  const fields = {
    category: readText(hit, 'category'),
    type: readText(hit, 'type'),
    rule_en: readText(hit, 'rule_en'),
    rule_kr: readText(hit, 'rule_kr'),
    example: readList(hit, 'example'),
  };

  return {
    source: 'rules',
    score,
    fields,
    text:
      `[Context: ${fields.category} ${fields.type} Rule] (score ${formatScore(score)}) ` +
      `**Rule**: ${fields.rule_kr} **Rule (EN)**: ${fields.rule_en} **Examples**: ${fields.example}`,
  };
}

export function formatDictionaryHit(hit: SearchHit): ContextSnippet {
  const score = readScore(hit);
  const fields = {
    korean: readText(hit, 'korean'),
    english: readText(hit, 'english'),
    abbreviation: readText(hit, 'abbreviation'),
    description: readText(hit, 'description'),
  };

  return {
    source: 'dictionary',
    score,
    fields,
    text:
      `[Context: Dictionary] (score ${formatScore(score)}) ` +
      `**Korean**: ${fields.korean} **English**: ${fields.english} ` +
      `**Abbreviation**: ${fields.abbreviation} **Description**: ${fields.description}`,
  };
}

export function formatQaHit(hit: SearchHit): ContextSnippet {
  const score = readScore(hit);
  const fields = {
    category: readText(hit, 'category'),
    question: readText(hit, 'question'),
    answer: readText(hit, 'answer'),
  };

  return {
    source: 'qa',
    score,
    fields,
    text:
      `[Context: QA-${fields.category}] (score ${formatScore(score)}) ` +
      `**Question**: ${fields.question} **Answer**: ${fields.answer}`,
  };
}

export function createCollectionDefinitions(
  retrieval: AppConfig['retrieval']
): Record<CollectionName, CollectionDefinition> {
  const { collections, vectorField, exhaustiveKnn } = retrieval;

  return {
    rules: {
      name: 'rules',
      label: 'Rules',
      ...collections.rules,
      select: RULE_FIELDS,
      vectorField,
      exhaustiveKnn,
      format: formatRuleHit,
    },
    dictionary: {
      name: 'dictionary',
      label: 'Dictionary',
      ...collections.dictionary,
      select: DICTIONARY_FIELDS,
      vectorField,
      exhaustiveKnn,
      format: formatDictionaryHit,
    },
    qa: {
      name: 'qa',
      label: 'Q&A',
      ...collections.qa,
      select: QA_FIELDS,
      vectorField,
      exhaustiveKnn,
      format: formatQaHit,
    },
  };
}
