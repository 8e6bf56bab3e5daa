/**
 * @fileOverview: Grounded answer generation for free-text requests
 * @module: AnswerGenerator
 * @keyFunctions:
 *   - generate(): Answer a request from the fused context bundle
 * @dependencies:
 *   - CompletionProvider: Chat completion
 *   - answerPrompts: System prompt template
 * @context: Always resolves to text. An empty bundle short-circuits to a fixed answer without a model call; a failed call becomes an error message in place of the answer
 */

import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';
import { renderBundle } from '../retrieval/fusion';
import type { CompletionProvider, ContextBundle } from '../retrieval/types';
import { createAnswerSystemPrompt } from './prompts/answerPrompts';

export const NO_CONTEXT_ANSWER =
  'No relevant naming rules, dictionary terms or Q&A entries were found for this request. ' +
  'Try rephrasing it with the business term or the target language (for example Java or Database).';

export function formatGenerationError(error: unknown): string {
  return `An error occurred while processing the request. (error: ${toErrorMessage(error)})`;
}

export class AnswerGenerator {
  constructor(
    private readonly completion: CompletionProvider,
    private readonly temperature: number
  ) {}

  async generate(requestText: string, bundle: ContextBundle): Promise<string> {
    if (bundle.length === 0) {
      logger.info('No context retrieved, returning the fixed no-context answer');
      return NO_CONTEXT_ANSWER;
    }

    const systemPrompt = createAnswerSystemPrompt(renderBundle(bundle));

    try {
      return await this.completion.complete(systemPrompt, requestText, this.temperature);
    } catch (error) {
      logger.error('Answer generation failed', {
        error: toErrorMessage(error),
        contextCount: bundle.length,
      });
      return formatGenerationError(error);
    }
  }
}
