/**
 * @fileOverview: MCP tool definitions and handlers for the naming assistant
 * @module: NamingTools
 * @keyFunctions:
 *   - namingTools: Tool schemas advertised through tools/list
 *   - createNamingHandlers(): Bind tool handlers to one pipeline (orchestrator, history, abbreviation advisor)
 * @dependencies:
 *   - NamingOrchestrator: Request pipeline
 *   - AbbreviationAdvisor: Intent routing and dictionary-grounded abbreviations
 *   - ValidationHelper: Zod parsing of tool arguments
 *   - ErrorHandler: Classification of failures into user-facing messages
 * @context: Handlers never throw. A failed request is reported as { success: false, error, code } so the MCP client sees a structured result rather than a protocol error
 */

import { logger } from '../utils/logger';
import { ErrorCode, getUserFriendlyMessage, handleError } from '../utils/errorHandler';
import { SUPPORTED_EXTENSIONS } from '../utils/languageUtils';
import {
  AbbreviateInputSchema,
  AnalyzeFileInputSchema,
  AskInputSchema,
  HistoryInputSchema,
  MAX_HISTORY_LIMIT,
  MAX_TERM_LENGTH,
  ValidationHelper,
} from '../core/validation';
import type { CollectionName } from '../retrieval/types';
import type { AbbreviationResult, NamingIntent } from '../pipeline/abbreviationAdvisor';
import type { NamingPipeline } from '../pipeline/factory';
import { formatContextReport, toResponsePayload } from '../pipeline/orchestrator';
import type { AnalysisMode, ResultRecord } from '../pipeline/types';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface NamingAnswerData {
  final_answer: string;
  search_query_used: string;
  retrieved_context_count: number;
  id: string;
  mode: AnalysisMode;
  keywords: string[];
  contexts: Record<CollectionName, string[]>;
  context_report?: string;
}

/** naming_ask result: a pipeline answer, or an abbreviation when intent routing picked that path. */
export type AskData =
  | (NamingAnswerData & { intent?: Exclude<NamingIntent, 'abbreviation'> })
  | (AbbreviationResult & { intent: 'abbreviation' });

export interface HistoryEntryData {
  id: string;
  createdAt: string;
  label: string;
  mode: AnalysisMode;
  final_answer: string;
  search_query_used: string;
  retrieved_context_count: number;
}

export type NamingToolResponse<T> =
  | ({ success: true } & T)
  | { success: false; error: string; code: ErrorCode };

export type NamingToolHandler = (args: unknown) => Promise<NamingToolResponse<object>>;

export const namingAskTool: ToolDefinition = {
  name: 'naming_ask',
  description:
    'Answer a naming-convention question (how to name a class, column, constant or variable, which abbreviation to use) grounded in the indexed naming rules, term dictionary and Q&A collections.',
  inputSchema: {
    type: 'object',
    properties: {
      request: {
        type: 'string',
        description: 'Naming question or request in natural language, e.g. "Java class name for member login history"',
      },
      showContext: {
        type: 'boolean',
        default: false,
        description: 'Include the raw per-collection context report in the result',
      },
      routeByIntent: {
        type: 'boolean',
        default: false,
        description:
          'Classify the request first; a request for a new abbreviation is answered by naming_abbreviate instead of the retrieval pipeline',
      },
    },
    required: ['request'],
  },
};

export const namingAnalyzeFileTool: ToolDefinition = {
  name: 'naming_analyze_file',
  description:
    'Review the identifiers of a source file against the naming rules and return a summary plus a violation table with suggested fixes.',
  inputSchema: {
    type: 'object',
    properties: {
      fileName: {
        type: 'string',
        description: `Name of the file, used to detect the language. Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
      },
      content: {
        type: 'string',
        description: 'UTF-8 text content of the file',
      },
      request: {
        type: 'string',
        description: 'Optional note from the user about what to focus on',
      },
      showContext: {
        type: 'boolean',
        default: false,
        description: 'Include the raw per-collection context report in the result',
      },
    },
    required: ['fileName', 'content'],
  },
};

export const namingAbbreviateTool: ToolDefinition = {
  name: 'naming_abbreviate',
  description:
    'Return the registered abbreviation of a business term from the term dictionary, or propose a new standard abbreviation consistent with the registered ones.',
  inputSchema: {
    type: 'object',
    properties: {
      term: {
        type: 'string',
        maxLength: MAX_TERM_LENGTH,
        description: 'Business term in Korean or English, e.g. "주문이력" or "Order History"',
      },
    },
    required: ['term'],
  },
};

export const namingHistoryTool: ToolDefinition = {
  name: 'naming_history',
  description: 'List the answers produced during this session, oldest first.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: {
        type: 'number',
        minimum: 1,
        maximum: MAX_HISTORY_LIMIT,
        description: 'Only return the most recent N entries',
      },
    },
  },
};

export const namingTools: ToolDefinition[] = [
  namingAskTool,
  namingAnalyzeFileTool,
  namingAbbreviateTool,
  namingHistoryTool,
];

function wantsContextReport(args: unknown): boolean {
  return typeof args === 'object' && args !== null && 'showContext' in args && args.showContext === true;
}

function toAnswerData(record: ResultRecord, showContext: boolean): NamingAnswerData {
  return {
    ...toResponsePayload(record),
    id: record.id,
    mode: record.mode,
    keywords: [...record.metadata.keywords],
    contexts: {
      rules: [...record.metadata.contexts.rules],
      dictionary: [...record.metadata.contexts.dictionary],
      qa: [...record.metadata.contexts.qa],
    },
    ...(showContext ? { context_report: formatContextReport(record) } : {}),
  };
}

function toFailure(error: unknown, tool: string): { success: false; error: string; code: ErrorCode } {
  const structured = handleError(error, { tool });
  return {
    success: false,
    error: getUserFriendlyMessage(structured),
    code: structured.code,
  };
}

export function createNamingHandlers({
  orchestrator,
  history,
  advisor,
}: NamingPipeline): Record<string, NamingToolHandler> {
  const handleAsk = async (args: unknown): Promise<NamingToolResponse<AskData>> => {
    try {
      const input = ValidationHelper.validateInput(AskInputSchema, args, namingAskTool.name);
      logger.info('Naming question received', { length: input.request.length });

      const intent = input.routeByIntent ? await advisor.classifyIntent(input.request) : undefined;
      if (intent === 'abbreviation') {
        return { success: true, intent, ...(await advisor.abbreviate(input.request)) };
      }

      const record = await orchestrator.run({ text: input.request });
      return {
        success: true,
        ...(intent ? { intent } : {}),
        ...toAnswerData(record, wantsContextReport(args)),
      };
    } catch (error) {
      return toFailure(error, namingAskTool.name);
    }
  };

  const handleAnalyzeFile = async (args: unknown): Promise<NamingToolResponse<NamingAnswerData>> => {
    try {
      const input = ValidationHelper.validateInput(AnalyzeFileInputSchema, args, namingAnalyzeFileTool.name);
      logger.info('File analysis received', { fileName: input.fileName, size: input.content.length });

      const record = await orchestrator.run({
        text: input.request,
        file: { name: input.fileName, bytes: Buffer.from(input.content, 'utf8') },
      });
      return { success: true, ...toAnswerData(record, wantsContextReport(args)) };
    } catch (error) {
      return toFailure(error, namingAnalyzeFileTool.name);
    }
  };

  const handleAbbreviate = async (args: unknown): Promise<NamingToolResponse<AbbreviationResult>> => {
    try {
      const input = ValidationHelper.validateInput(AbbreviateInputSchema, args, namingAbbreviateTool.name);
      logger.info('Abbreviation requested', { length: input.term.length });

      return { success: true, ...(await advisor.abbreviate(input.term)) };
    } catch (error) {
      return toFailure(error, namingAbbreviateTool.name);
    }
  };

  const handleHistory = async (
    args: unknown
  ): Promise<NamingToolResponse<{ total: number; entries: HistoryEntryData[] }>> => {
    try {
      const input = ValidationHelper.validateInput(HistoryInputSchema, args ?? {}, namingHistoryTool.name);
      const entries = history.list(input.limit).map(record => ({
        id: record.id,
        createdAt: record.createdAt,
        label: record.label,
        mode: record.mode,
        ...toResponsePayload(record),
      }));
      return { success: true, total: history.size, entries };
    } catch (error) {
      return toFailure(error, namingHistoryTool.name);
    }
  };

  return {
    [namingAskTool.name]: handleAsk,
    [namingAnalyzeFileTool.name]: handleAnalyzeFile,
    [namingAbbreviateTool.name]: handleAbbreviate,
    [namingHistoryTool.name]: handleHistory,
  };
}
