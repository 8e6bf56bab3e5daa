/**
 * @fileOverview: Environment-driven configuration for the naming assistant
 * @module: Config
 * @keyFunctions:
 *   - loadConfig(): Parse and validate environment variables into an immutable AppConfig
 * @dependencies:
 *   - zod: Schema validation and coercion of environment values
 * @context: Missing endpoints or keys are fatal at startup; retrieval and generation constants are tunable here rather than fixed in code
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, ErrorCode } from '../utils/errorHandler';
import type { LogLevel } from '../utils/logger';
import type { CollectionName } from '../retrieval/types';

export type ProviderType = 'openai' | 'azure';

export type FileQuerySource = 'file' | 'file-and-text';

export interface CollectionConfig {
  indexName: string;
  topK: number;
  knn: number;
}

export interface AppConfig {
  openai: {
    provider: ProviderType;
    apiKey: string;
    baseUrl?: string;
    azureEndpoint?: string;
    azureApiVersion: string;
    chatModel: string;
    embeddingsModel: string;
  };
  search: {
    endpoint: string;
    apiKey: string;
    apiVersion: string;
  };
  retrieval: {
    collections: Record<CollectionName, CollectionConfig>;
    vectorField: string;
    embeddingDimensions: number;
    exhaustiveKnn: boolean;
  };
  generation: {
    keywordTemperature: number;
    answerTemperature: number;
    analysisTemperature: number;
    abbreviationTemperature: number;
    maxKeywordInputChars: number;
  };
  logging: {
    level: LogLevel;
    /** `null` when file logging is turned off with NAMING_LOG_FILE=false. */
    filePath: string | null;
  };
  fileQuerySource: FileQuerySource;
  requestTimeoutMs: number;
}

export const DEFAULT_LOG_FILE = path.join(os.homedir(), '.naming-assistant', 'logs', 'naming-assistant.log');

const count = (fallback: number) => z.coerce.number().int().min(1).max(50).default(fallback);
const temperature = (fallback: number) => z.coerce.number().min(0).max(2).default(fallback);

const EnvSchema = z
  .object({
    OPENAI_PROVIDER: z.enum(['openai', 'azure']).default('openai'),
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().optional(),
    AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
    AZURE_OPENAI_API_VERSION: z.string().default('2024-02-15-preview'),
    OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDINGS_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),

    SEARCH_ENDPOINT: z.string().url(),
    SEARCH_API_KEY: z.string().min(1),
    SEARCH_API_VERSION: z.string().default('2023-11-01'),
    SEARCH_INDEX_RULES: z.string().default('coding-convention-index'),
    SEARCH_INDEX_DICTIONARY: z.string().default('dictionary-index'),
    SEARCH_INDEX_QA: z.string().default('qna-convention-index'),
    SEARCH_VECTOR_FIELD: z.string().default('vector_embedding'),
    SEARCH_EXHAUSTIVE_KNN: z.enum(['true', 'false']).default('false'),

    RULES_TOP_K: count(5),
    RULES_KNN: count(5),
    DICTIONARY_TOP_K: count(5),
    DICTIONARY_KNN: count(5),
    QA_TOP_K: count(3),
    QA_KNN: count(3),

    KEYWORD_TEMPERATURE: temperature(0.0),
    ANSWER_TEMPERATURE: temperature(0.3),
    ANALYSIS_TEMPERATURE: temperature(0.1),
    ABBREVIATION_TEMPERATURE: temperature(0.3),
    MAX_KEYWORD_INPUT_CHARS: z.coerce.number().int().min(100).default(2000),

    FILE_QUERY_SOURCE: z.enum(['file', 'file-and-text']).default('file'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(20000),

    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    NAMING_LOG_FILE: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.OPENAI_PROVIDER === 'azure' && !env.AZURE_OPENAI_ENDPOINT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AZURE_OPENAI_ENDPOINT'],
        message: 'Required when OPENAI_PROVIDER=azure',
      });
    }
  });

/**
 * Blank values count as unset so `FOO=` in a .env file falls back to the default.
 */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function isMissingValue(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined';
  }
  return issue.code === z.ZodIssueCode.custom;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));

  if (!parsed.success) {
    const issues = parsed.error.issues;
    const missing = issues.filter(isMissingValue).map(issue => issue.path.join('.'));
    if (missing.length > 0) {
      throw new ConfigurationError(
        ErrorCode.MISSING_CONFIG,
        `Missing required configuration: ${missing.join(', ')}`,
        missing
      );
    }
    const invalid = issues.map(issue => `${issue.path.join('.')} (${issue.message})`);
    throw new ConfigurationError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${invalid.join(', ')}`,
      issues.map(issue => issue.path.join('.'))
    );
  }

  const e = parsed.data;

  return Object.freeze({
    openai: {
      provider: e.OPENAI_PROVIDER,
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      azureEndpoint: e.AZURE_OPENAI_ENDPOINT,
      azureApiVersion: e.AZURE_OPENAI_API_VERSION,
      chatModel: e.OPENAI_CHAT_MODEL,
      embeddingsModel: e.OPENAI_EMBEDDINGS_MODEL,
    },
    search: {
      endpoint: e.SEARCH_ENDPOINT.replace(/\/+$/, ''),
      apiKey: e.SEARCH_API_KEY,
      apiVersion: e.SEARCH_API_VERSION,
    },
    retrieval: {
      collections: {
        rules: { indexName: e.SEARCH_INDEX_RULES, topK: e.RULES_TOP_K, knn: e.RULES_KNN },
        dictionary: {
          indexName: e.SEARCH_INDEX_DICTIONARY,
          topK: e.DICTIONARY_TOP_K,
          knn: e.DICTIONARY_KNN,
        },
        qa: { indexName: e.SEARCH_INDEX_QA, topK: e.QA_TOP_K, knn: e.QA_KNN },
      },
      vectorField: e.SEARCH_VECTOR_FIELD,
      embeddingDimensions: e.EMBEDDING_DIMENSIONS,
      exhaustiveKnn: e.SEARCH_EXHAUSTIVE_KNN === 'true',
    },
    generation: {
      keywordTemperature: e.KEYWORD_TEMPERATURE,
      answerTemperature: e.ANSWER_TEMPERATURE,
      analysisTemperature: e.ANALYSIS_TEMPERATURE,
      abbreviationTemperature: e.ABBREVIATION_TEMPERATURE,
      maxKeywordInputChars: e.MAX_KEYWORD_INPUT_CHARS,
    },
    logging: {
      level: e.LOG_LEVEL,
      filePath: e.NAMING_LOG_FILE === 'false' ? null : (e.NAMING_LOG_FILE ?? DEFAULT_LOG_FILE),
    },
    fileQuerySource: e.FILE_QUERY_SOURCE,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
  });
}
