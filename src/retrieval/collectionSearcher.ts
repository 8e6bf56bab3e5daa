/**
 * @fileOverview: Hybrid (lexical + vector) searcher for one knowledge collection
 * @module: CollectionSearcher
 * @keyFunctions:
 *   - search(): Embed the request, run one hybrid query and format the hits as snippets
 * @dependencies:
 *   - EmbeddingProvider: Query vector for the vector channel
 *   - HybridSearchService: The external search endpoint
 *   - logger: Degrade logging
 * @context: Instantiated once per collection. A failed embedding only disables the vector channel; a failed search yields no snippets for this collection and never reaches the caller
 */

import { logger, Logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errorHandler';
import type { CollectionDefinition } from './collections';
import type {
  CollectionName,
  ContextSearcher,
  ContextSnippet,
  EmbeddingProvider,
  HybridSearchRequest,
  HybridSearchService,
  VectorQuery,
} from './types';

export class CollectionSearcher implements ContextSearcher {
  readonly collection: CollectionName;
  private readonly log: Logger;

  constructor(
    private readonly definition: CollectionDefinition,
    private readonly searchService: HybridSearchService,
    private readonly embeddings: EmbeddingProvider,
    private readonly embeddingDimensions: number
  ) {
    this.collection = definition.name;
    this.log = logger.child({ collection: definition.name, index: definition.indexName });
  }

  async search(requestText: string, lexicalQuery: string): Promise<ContextSnippet[]> {
    const startTime = Date.now();

    try {
      const vectorQuery = await this.buildVectorQuery(requestText);
      const request: HybridSearchRequest = {
        search: lexicalQuery,
        select: this.definition.select,
        top: this.definition.topK,
        ...(vectorQuery && { vectorQuery }),
      };

      const hits = await this.searchService.search(this.definition.indexName, request);
      const snippets = hits.slice(0, this.definition.topK).map(hit => this.definition.format(hit));

      this.log.info(`${this.definition.label} search complete`, {
        hits: snippets.length,
        vectorChannel: vectorQuery !== undefined,
        elapsedMs: Date.now() - startTime,
      });

      return snippets;
    } catch (error) {
      this.log.error(`${this.definition.label} search failed, continuing without this collection`, {
        error: toErrorMessage(error),
      });
      return [];
    }
  }

  private async buildVectorQuery(requestText: string): Promise<VectorQuery | undefined> {
    let vector: number[] | null;
    try {
      vector = await this.embeddings.embed(requestText);
    } catch (error) {
      this.log.warn('Embedding provider threw, using lexical search only', {
        error: toErrorMessage(error),
      });
      return undefined;
    }

    if (!vector || vector.length === 0) {
      this.log.warn('No query embedding, using lexical search only');
      return undefined;
    }

    if (vector.length !== this.embeddingDimensions) {
      this.log.warn('Query embedding dimension mismatch, using lexical search only', {
        expected: this.embeddingDimensions,
        actual: vector.length,
      });
      return undefined;
    }

    return {
      vector,
      k: this.definition.knn,
      fields: this.definition.vectorField,
      exhaustive: this.definition.exhaustiveKnn,
    };
  }
}
