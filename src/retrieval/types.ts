/**
 * @fileOverview: Retrieval types shared by the collection searchers, fusion and generation
 * @module: RetrievalTypes
 * @context: Describes the three knowledge collections, the hybrid search contract and the snippets that flow into prompts
 */

export type CollectionName = 'rules' | 'dictionary' | 'qa';

export const COLLECTION_ORDER: readonly CollectionName[] = ['rules', 'dictionary', 'qa'];

// Document shapes written by the ingestion scripts. Documents whose source text was shorter
// than five characters were uploaded without `vector_embedding` and are lexical-only.
export interface RuleDocument {
  id: string;
  category?: string;
  type?: string;
  rule_en?: string;
  rule_kr?: string;
  example?: string[];
  vector_embedding?: number[];
}

export interface DictionaryDocument {
  id: string;
  korean?: string;
  english?: string;
  abbreviation?: string;
  description?: string;
  vector_embedding?: number[];
}

export interface QaDocument {
  id: string;
  category?: string;
  question?: string;
  answer?: string;
  vector_embedding?: number[];
}

/**
 * One hit as returned by the search service: projected fields plus `@search.score`.
 */
export type SearchHit = Readonly<Record<string, unknown>>;

export interface VectorQuery {
  vector: number[];
  k: number;
  fields: string;
  exhaustive: boolean;
}

export interface HybridSearchRequest {
  search: string;
  select: readonly string[];
  top: number;
  vectorQuery?: VectorQuery;
}

export interface HybridSearchService {
  search(indexName: string, request: HybridSearchRequest): Promise<SearchHit[]>;
}

export interface EmbeddingProvider {
  /** Resolves to `null` instead of rejecting when no vector can be produced. */
  embed(text: string): Promise<number[] | null>;
}

export interface CompletionProvider {
  complete(systemPrompt: string, userMessage: string, temperature: number): Promise<string>;
}

export interface ContextSnippet {
  readonly source: CollectionName;
  readonly score: number;
  readonly text: string;
  readonly fields: Readonly<Record<string, string>>;
}

export type ContextBundle = readonly ContextSnippet[];

export interface ContextSearcher {
  readonly collection: CollectionName;
  search(requestText: string, lexicalQuery: string): Promise<ContextSnippet[]>;
}
