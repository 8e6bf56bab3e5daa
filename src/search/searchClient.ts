/**
 * @fileOverview: HTTP client for the hybrid search service (Azure AI Search REST API)
 * @module: HybridSearchClient
 * @keyFunctions:
 *   - search(): One full-text + vector query against an index
 *   - buildSearchBody(): Translate a HybridSearchRequest into the REST request body
 * @dependencies:
 *   - axios: HTTP transport with timeout and response interceptor
 *   - zod: Response shape validation
 *   - logger: Request logging
 * @context: Transport, auth and service errors are normalized into SearchServiceError; the collection searcher decides how to degrade
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { SearchServiceError, toErrorMessage } from '../utils/errorHandler';
import type { HybridSearchRequest, HybridSearchService, SearchHit } from '../retrieval/types';

export interface SearchClientConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  timeoutMs: number;
  /** Replaces the HTTP transport; used for in-process testing. */
  adapter?: AxiosAdapter;
}

const SearchResponseSchema = z.object({
  value: z.array(z.record(z.unknown())),
});

const ServiceErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string(),
  }),
});

interface SearchRequestBody {
  search: string;
  queryType: 'full';
  searchMode: 'any';
  select: string;
  top: number;
  vectorQueries?: Array<{
    kind: 'vector';
    vector: number[];
    k: number;
    fields: string;
    exhaustive: boolean;
  }>;
}

export function buildSearchBody(request: HybridSearchRequest): SearchRequestBody {
  return {
    search: request.search,
    queryType: 'full',
    searchMode: 'any',
    select: request.select.join(','),
    top: request.top,
    ...(request.vectorQuery && {
      vectorQueries: [
        {
          kind: 'vector' as const,
          vector: request.vectorQuery.vector,
          k: request.vectorQuery.k,
          fields: request.vectorQuery.fields,
          exhaustive: request.vectorQuery.exhaustive,
        },
      ],
    }),
  };
}

function toSearchServiceError(error: unknown): SearchServiceError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, data } = error.response;
      const parsed = ServiceErrorSchema.safeParse(data);
      const detail = parsed.success ? parsed.data.error.message : error.message;
      return new SearchServiceError(`Search API Error ${status}: ${detail}`, status);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new SearchServiceError('Search request timed out', undefined, { code: error.code });
    }
    return new SearchServiceError('Network error: Unable to reach the search service', undefined, {
      code: error.code,
    });
  }
  return new SearchServiceError(`Request error: ${toErrorMessage(error)}`);
}

export class HybridSearchClient implements HybridSearchService {
  private client: AxiosInstance;

  constructor(config: SearchClientConfig) {
    this.client = axios.create({
      baseURL: config.endpoint,
      headers: {
        'Content-Type': 'application/json',
        'api-key': config.apiKey,
      },
      params: { 'api-version': config.apiVersion },
      timeout: config.timeoutMs,
      ...(config.adapter && { adapter: config.adapter }),
    });

    this.client.interceptors.response.use(
      response => response,
      (error: unknown) => {
        throw toSearchServiceError(error);
      }
    );
  }

  async search(indexName: string, request: HybridSearchRequest): Promise<SearchHit[]> {
    const body = buildSearchBody(request);

    logger.debug('Hybrid search request', {
      index: indexName,
      search: body.search,
      top: body.top,
      vector: body.vectorQueries !== undefined,
    });

    const response = await this.client.post<unknown>(
      `/indexes/${encodeURIComponent(indexName)}/docs/search`,
      body
    );

    const parsed = SearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SearchServiceError('Search API returned an unexpected response shape', response.status, {
        index: indexName,
      });
    }

    return parsed.data.value;
  }
}
