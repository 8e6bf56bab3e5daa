/**
 * @fileOverview: Request orchestration for the naming assistant
 * @module: NamingOrchestrator
 * @keyFunctions:
 *   - run(): Drive one request through extraction, search, fusion and generation
 *   - buildFileIntent(): Synthetic retrieval query for file-analysis mode
 *   - toResponsePayload(): Compact answer/query/count payload of a result
 *   - formatContextReport(): Per-collection raw context for inspection
 * @dependencies:
 *   - KeywordExtractor, ContextSearcher (x3), AnswerGenerator, CodeAnalyzer, HistoryStore
 * @context: State machine idle -> extracting -> searching -> fusing -> generating -> completed. Components degrade in place; anything that escapes them moves the request to errored, surfaces as a PipelineError and leaves History untouched
 */

import { randomUUID } from 'crypto';
import { TextDecoder } from 'util';
import { logger } from '../utils/logger';
import { ErrorCode, NamingAssistantError, PipelineError, ValidationError } from '../utils/errorHandler';
import { getLanguageFromPath, isSupportedFile, LanguageInfo } from '../utils/languageUtils';
import type { FileQuerySource } from '../core/config';
import { fuse } from '../retrieval/fusion';
import { COLLECTION_ORDER } from '../retrieval/types';
import type { CollectionName, ContextSearcher, ContextSnippet } from '../retrieval/types';
import type { AnswerGenerator } from './answerGenerator';
import type { CodeAnalyzer } from './codeAnalyzer';
import type { HistoryStore } from './history';
import type { KeywordExtractor } from './keywordExtractor';
import type { PipelineRequest, PipelineState, ResultRecord, RunOptions } from './types';

export interface OrchestratorDependencies {
  extractor: KeywordExtractor;
  searchers: Record<CollectionName, ContextSearcher>;
  generator: AnswerGenerator;
  analyzer: CodeAnalyzer;
  history: HistoryStore;
  fileQuerySource: FileQuerySource;
}

interface PreparedTextRequest {
  mode: 'text-question';
  requestText: string;
}

interface PreparedFileRequest {
  mode: 'file-analysis';
  requestText: string;
  fileName: string;
  code: string;
  language: LanguageInfo;
  userText?: string;
}

type PreparedRequest = PreparedTextRequest | PreparedFileRequest;

export const NO_RESULTS_PLACEHOLDER = 'No results';

const COLLECTION_TITLES: Record<CollectionName, string> = {
  rules: 'Naming rules',
  dictionary: 'Term dictionary',
  qa: 'Q&A',
};

export function buildFileIntent(
  fileName: string,
  language: LanguageInfo,
  userText: string | undefined,
  source: FileQuerySource
): string {
  const intent = `${language.label} naming convention rules for ${language.nameKinds} names in ${fileName}`;
  return source === 'file-and-text' && userText ? `${intent} ${userText}` : intent;
}

function decodeUtf8(fileName: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new NamingAssistantError(
      ErrorCode.INVALID_INPUT,
      `${fileName} is not a UTF-8 text file`,
      { fileName }
    );
  }
}

export class NamingOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  async run(request: PipelineRequest, options: RunOptions = {}): Promise<ResultRecord> {
    const id = randomUUID();
    const log = logger.child({ requestId: id });
    let state: PipelineState = 'idle';
    const startTime = Date.now();
    const transition = (next: PipelineState) => {
      log.debug('Pipeline state change', { from: state, to: next });
      state = next;
      options.onStateChange?.(next);
    };

    try {
      const prepared = this.prepare(request);

      transition('extracting');
      const { keywords, lexicalQuery } = await this.deps.extractor.extract(prepared.requestText);

      transition('searching');
      const [rules, dictionary, qa] = await Promise.all([
        this.deps.searchers.rules.search(prepared.requestText, lexicalQuery),
        this.deps.searchers.dictionary.search(prepared.requestText, lexicalQuery),
        this.deps.searchers.qa.search(prepared.requestText, lexicalQuery),
      ]);

      transition('fusing');
      const bundle = fuse(rules, dictionary, qa);

      transition('generating');
      const answer =
        prepared.mode === 'file-analysis'
          ? await this.deps.analyzer.analyze(prepared.fileName, prepared.code, bundle)
          : await this.deps.generator.generate(prepared.requestText, bundle);

      const record: ResultRecord = {
        id,
        createdAt: new Date().toISOString(),
        label:
          prepared.mode === 'file-analysis'
            ? `File analysis: ${prepared.fileName}`
            : prepared.requestText,
        answer,
        mode: prepared.mode,
        metadata: {
          query: lexicalQuery,
          keywords,
          contexts: {
            rules: toTexts(rules),
            dictionary: toTexts(dictionary),
            qa: toTexts(qa),
          },
          contextCount: bundle.length,
          ...(prepared.mode === 'file-analysis'
            ? {
                fileName: prepared.fileName,
                language: prepared.language.id,
                ...(prepared.userText ? { userText: prepared.userText } : {}),
              }
            : {}),
        },
      };

      await this.deps.history.append(record);
      transition('completed');

      log.info('Request completed', {
        mode: record.mode,
        contextCount: record.metadata.contextCount,
        elapsedMs: Date.now() - startTime,
      });

      return record;
    } catch (error) {
      const failedIn: PipelineState = state;
      transition('errored');
      const pipelineError = error instanceof PipelineError ? error : new PipelineError(failedIn, error);
      log.error('Request failed', {
        state: failedIn,
        code: pipelineError.code,
        error: pipelineError.message,
      });
      throw pipelineError;
    }
  }

  private prepare(request: PipelineRequest): PreparedRequest {
    const text = request.text?.trim() || undefined;

    if (request.file) {
      const { name, bytes } = request.file;
      if (!name.trim()) {
        throw new ValidationError('file.name', 'File name is required');
      }
      if (!isSupportedFile(name)) {
        throw new ValidationError('file.name', `Unsupported file type: ${name}`);
      }
      const code = decodeUtf8(name, bytes);
      if (code.trim().length === 0) {
        throw new ValidationError('file.bytes', `${name} is empty`);
      }
      const language = getLanguageFromPath(name);
      return {
        mode: 'file-analysis',
        requestText: buildFileIntent(name, language, text, this.deps.fileQuerySource),
        fileName: name,
        code,
        language,
        userText: text,
      };
    }

    if (!text) {
      throw new ValidationError('request', 'Either request text or an uploaded file is required');
    }

    return { mode: 'text-question', requestText: text };
  }
}

function toTexts(snippets: readonly ContextSnippet[]): string[] {
  return snippets.map(snippet => snippet.text);
}

export function toResponsePayload(record: ResultRecord): {
  final_answer: string;
  search_query_used: string;
  retrieved_context_count: number;
} {
  return {
    final_answer: record.answer,
    search_query_used: record.metadata.query,
    retrieved_context_count: record.metadata.contextCount,
  };
}

export function formatContextReport(record: ResultRecord): string {
  const sections = COLLECTION_ORDER.map(collection => {
    const entries = record.metadata.contexts[collection];
    const body = entries.length > 0 ? entries.map(entry => `- ${entry}`).join('\n') : NO_RESULTS_PLACEHOLDER;
    return `### ${COLLECTION_TITLES[collection]}\n${body}`;
  });

  return [
    `**Mode**: ${record.mode}`,
    `**Search query**: ${record.metadata.query}`,
    `**Keywords**: ${record.metadata.keywords.join(', ')}`,
    `**Context count**: ${record.metadata.contextCount}`,
    '',
    sections.join('\n\n'),
  ].join('\n');
}
