/**
 * @fileOverview: Keyword and lexical query extraction
 * @module: KeywordExtractor
 * @keyFunctions:
 *   - extract(): Reduce a request to at most five terms and their OR query
 *   - parseKeywords(): Split a comma-separated model answer into terms
 * @dependencies:
 *   - CompletionProvider: One low-temperature chat completion
 * @context: Never rejects. On any failure the whole request becomes the single keyword and the query
 */

import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';
import type { CompletionProvider } from '../retrieval/types';
import { createKeywordUserPrompt, KEYWORD_SYSTEM_PROMPT, MAX_KEYWORDS } from './prompts/keywordPrompts';

export interface KeywordExtraction {
  keywords: string[];
  lexicalQuery: string;
}

export interface KeywordExtractorOptions {
  temperature: number;
  /** Request text beyond this length is cut from the extraction prompt only. */
  maxInputChars: number;
}

export const LEXICAL_OR = ' OR ';

export function parseKeywords(raw: string): string[] {
  return raw
    .split(/[,，\n]/)
    .map(term => term.trim())
    .filter(term => term.length > 0)
    .slice(0, MAX_KEYWORDS);
}

export function buildLexicalQuery(keywords: readonly string[]): string {
  return keywords.join(LEXICAL_OR);
}

export class KeywordExtractor {
  constructor(
    private readonly completion: CompletionProvider,
    private readonly options: KeywordExtractorOptions
  ) {}

  async extract(request: string): Promise<KeywordExtraction> {
    // Counted in code points so a surrogate pair is never split
    const characters = Array.from(request);
    const promptInput =
      characters.length > this.options.maxInputChars
        ? characters.slice(0, this.options.maxInputChars).join('')
        : request;

    try {
      const raw = await this.completion.complete(
        KEYWORD_SYSTEM_PROMPT,
        createKeywordUserPrompt(promptInput),
        this.options.temperature
      );

      const keywords = parseKeywords(raw);
      if (keywords.length === 0) {
        throw new Error('Keyword response contained no terms');
      }

      const lexicalQuery = buildLexicalQuery(keywords);
      logger.info('Keywords extracted', { keywords, lexicalQuery });
      return { keywords, lexicalQuery };
    } catch (error) {
      logger.warn('Keyword extraction failed, searching with the full request', {
        error: toErrorMessage(error),
        truncated: promptInput.length < request.length,
      });
      return { keywords: [request], lexicalQuery: request };
    }
  }
}
