/**
 * @fileOverview: Chat completion and embedding endpoints over the OpenAI SDK
 * @module: OpenAIService
 * @keyFunctions:
 *   - complete(): One system + user chat completion at a given temperature
 *   - embed(): Text to dense vector, or null when none can be produced
 *   - getProviderInfo(): Provider and model names for startup logging
 * @dependencies:
 *   - openai: Official OpenAI SDK (OpenAI and AzureOpenAI clients)
 *   - logger: Logging utilities
 * @context: The two model capabilities the pipeline consumes. complete() rejects so each caller can apply its own fallback; embed() never rejects
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { logger } from '../utils/logger';
import { ErrorCode, NamingAssistantError, toErrorMessage } from '../utils/errorHandler';
import type { AppConfig, ProviderType } from './config';
import type { CompletionProvider, EmbeddingProvider } from '../retrieval/types';

export interface OpenAIServiceConfig {
  provider: ProviderType;
  apiKey: string;
  baseUrl?: string;
  azureEndpoint?: string;
  azureApiVersion: string;
  chatModel: string;
  embeddingsModel: string;
  timeoutMs: number;
}

const PROVIDER_NAMES: Record<ProviderType, string> = {
  openai: 'OpenAI',
  azure: 'Azure OpenAI',
};

export class OpenAIService implements CompletionProvider, EmbeddingProvider {
  private client: OpenAI;
  private config: OpenAIServiceConfig;

  constructor(config: OpenAIServiceConfig) {
    this.config = config;

    // Azure takes deployment names in `model`; the SDK routes them per deployment.
    // No SDK retries: timeoutMs is the whole budget of one call.
    this.client =
      config.provider === 'azure'
        ? new AzureOpenAI({
            apiKey: config.apiKey,
            endpoint: config.azureEndpoint,
            apiVersion: config.azureApiVersion,
            timeout: config.timeoutMs,
            maxRetries: 0,
          })
        : new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            maxRetries: 0,
          });

    logger.info('OpenAI Service initialized', {
      provider: PROVIDER_NAMES[config.provider],
      chatModel: config.chatModel,
      embeddingsModel: config.embeddingsModel,
    });
  }

  async complete(systemPrompt: string, userMessage: string, temperature: number): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.chatModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        temperature,
      });

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        throw new NamingAssistantError(
          ErrorCode.AI_SERVICE_ERROR,
          'Chat completion returned no content',
          { finishReason: response.choices[0]?.finish_reason }
        );
      }

      logger.info('Chat completion successful', {
        provider: PROVIDER_NAMES[this.config.provider],
        model: this.config.chatModel,
        usage: response.usage,
        elapsedMs: Date.now() - startTime,
      });

      return content;
    } catch (error) {
      logger.error('Chat completion failed', {
        provider: PROVIDER_NAMES[this.config.provider],
        model: this.config.chatModel,
        error: toErrorMessage(error),
      });
      throw error;
    }
  }

  async embed(text: string): Promise<number[] | null> {
    if (text.trim().length === 0) {
      return null;
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.config.embeddingsModel,
        input: text,
      });

      const embedding = response.data[0]?.embedding;
      if (!Array.isArray(embedding) || embedding.length === 0) {
        logger.warn('Embedding response contained no vector', {
          model: this.config.embeddingsModel,
        });
        return null;
      }

      return embedding;
    } catch (error) {
      logger.warn('Embedding generation failed', {
        model: this.config.embeddingsModel,
        textPreview: text.slice(0, 50),
        error: toErrorMessage(error),
      });
      return null;
    }
  }

  getProviderInfo(): { provider: string; chatModel: string; embeddingsModel: string } {
    return {
      provider: PROVIDER_NAMES[this.config.provider],
      chatModel: this.config.chatModel,
      embeddingsModel: this.config.embeddingsModel,
    };
  }
}

export function createOpenAIService(config: AppConfig): OpenAIService {
  return new OpenAIService({
    ...config.openai,
    timeoutMs: config.requestTimeoutMs,
  });
}
