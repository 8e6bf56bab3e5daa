/**
 * @fileOverview: Naming violation report for an uploaded source file
 * @module: CodeAnalyzer
 * @keyFunctions:
 *   - analyze(): Produce a summary and violation table for a file from the fused context
 * @dependencies:
 *   - CompletionProvider: Chat completion
 *   - analysisPrompts: Report-shaped system prompt and line-numbered listing
 * @context: Same failure contract as AnswerGenerator: never rejects
 */

import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';
import { getLanguageFromPath } from '../utils/languageUtils';
import { renderBundle } from '../retrieval/fusion';
import type { CompletionProvider, ContextBundle } from '../retrieval/types';
import { formatGenerationError, NO_CONTEXT_ANSWER } from './answerGenerator';
import { createAnalysisSystemPrompt, createAnalysisUserPrompt } from './prompts/analysisPrompts';

export class CodeAnalyzer {
  constructor(
    private readonly completion: CompletionProvider,
    private readonly temperature: number
  ) {}

  async analyze(fileName: string, codeText: string, bundle: ContextBundle): Promise<string> {
    if (bundle.length === 0) {
      logger.info('No context retrieved for file analysis, returning the fixed no-context answer', {
        fileName,
      });
      return NO_CONTEXT_ANSWER;
    }

    const language = getLanguageFromPath(fileName);
    const systemPrompt = createAnalysisSystemPrompt(renderBundle(bundle), language);
    const userPrompt = createAnalysisUserPrompt(fileName, codeText, language);

    try {
      return await this.completion.complete(systemPrompt, userPrompt, this.temperature);
    } catch (error) {
      logger.error('Code analysis failed', {
        fileName,
        error: toErrorMessage(error),
        contextCount: bundle.length,
      });
      return formatGenerationError(error);
    }
  }
}
