/**
 * @fileOverview: Abbreviation lookup and generation grounded on the term dictionary
 * @module: AbbreviationAdvisor
 * @keyFunctions:
 *   - classifyIntent(): Decide whether a request looks up existing terms or asks for a new abbreviation
 *   - abbreviate(): Return the registered abbreviation of a term, or generate one consistent with the dictionary
 * @dependencies:
 *   - CompletionProvider: Intent classification and abbreviation generation
 *   - ContextSearcher: The dictionary collection searcher shared with the pipeline
 * @context: Same failure contract as the pipeline components: a failed classification is 'unknown' and a failed generation becomes an error answer. Results are not written to History
 */

import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';
import { MISSING_FIELD_PLACEHOLDER } from '../retrieval/fieldAccess';
import { renderBundle } from '../retrieval/fusion';
import type { CompletionProvider, ContextSearcher, ContextSnippet } from '../retrieval/types';
import { formatGenerationError } from './answerGenerator';
import {
  createAbbreviationSystemPrompt,
  createAbbreviationUserPrompt,
  createIntentUserPrompt,
  INTENT_SYSTEM_PROMPT,
} from './prompts/abbreviationPrompts';

export type NamingIntent = 'lookup' | 'abbreviation' | 'unknown';

export interface AbbreviationResult {
  term: string;
  source: 'dictionary' | 'generated';
  answer: string;
  /** Set when the term is already registered in the dictionary. */
  abbreviation?: string;
  english?: string;
  relatedEntries: string[];
}

export interface AbbreviationAdvisorOptions {
  intentTemperature: number;
  abbreviationTemperature: number;
}

export function parseIntent(raw: string): NamingIntent {
  switch (raw.trim().charAt(0)) {
    case '1':
      return 'lookup';
    case '2':
      return 'abbreviation';
    default:
      return 'unknown';
  }
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== MISSING_FIELD_PLACEHOLDER;
}

/**
 * Dictionary entry whose Korean term, one of its English names or its abbreviation equals the term.
 */
export function findRegisteredEntry(
  snippets: readonly ContextSnippet[],
  term: string
): ContextSnippet | undefined {
  const wanted = term.trim().toLowerCase();
  return snippets.find(({ fields }) => {
    if (!isPresent(fields.abbreviation)) return false;
    const names = [
      fields.korean,
      fields.abbreviation,
      ...(fields.english ?? '').split('/'),
    ];
    return names.some(name => isPresent(name) && name.trim().toLowerCase() === wanted);
  });
}

export class AbbreviationAdvisor {
  constructor(
    private readonly completion: CompletionProvider,
    private readonly dictionary: ContextSearcher,
    private readonly options: AbbreviationAdvisorOptions
  ) {}

  async classifyIntent(requestText: string): Promise<NamingIntent> {
    try {
      const raw = await this.completion.complete(
        INTENT_SYSTEM_PROMPT,
        createIntentUserPrompt(requestText),
        this.options.intentTemperature
      );
      const intent = parseIntent(raw);
      logger.info('Request intent classified', { intent });
      return intent;
    } catch (error) {
      logger.warn('Intent classification failed, treating the request as unclassified', {
        error: toErrorMessage(error),
      });
      return 'unknown';
    }
  }

  async abbreviate(term: string): Promise<AbbreviationResult> {
    const normalized = term.trim();
    const related = await this.dictionary.search(normalized, normalized);
    const relatedEntries = related.map(snippet => snippet.text);

    const registered = findRegisteredEntry(related, normalized);
    if (registered) {
      const { english, abbreviation, description } = registered.fields;
      logger.info('Abbreviation found in the term dictionary', { abbreviation });
      return {
        term: normalized,
        source: 'dictionary',
        answer:
          `'${normalized}' is registered in the term dictionary: ${english} (${abbreviation}).` +
          (isPresent(description) ? ` ${description}` : ''),
        abbreviation,
        english,
        relatedEntries,
      };
    }

    try {
      const answer = await this.completion.complete(
        createAbbreviationSystemPrompt(renderBundle(related)),
        createAbbreviationUserPrompt(normalized),
        this.options.abbreviationTemperature
      );
      return { term: normalized, source: 'generated', answer, relatedEntries };
    } catch (error) {
      logger.error('Abbreviation generation failed', {
        error: toErrorMessage(error),
        relatedCount: related.length,
      });
      return { term: normalized, source: 'generated', answer: formatGenerationError(error), relatedEntries };
    }
  }
}
