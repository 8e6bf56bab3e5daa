/**
 * @fileOverview: Keyword extraction prompt
 * @module: KeywordPrompts
 * @context: Asks for at most five comma-separated terms usable as a full-text query
 */

export const MAX_KEYWORDS = 5;

export const KEYWORD_SYSTEM_PROMPT = 'You are a helpful assistant for keyword extraction.';

export function createKeywordUserPrompt(request: string): string {
  return `Extract up to ${MAX_KEYWORDS} key terms and categories (such as Java, Database, WebUI) needed to search naming rules and the term dictionary for the request below.
Answer with the terms only, separated by commas, in the language they appear in the request.

Request: ${request}`;
}
