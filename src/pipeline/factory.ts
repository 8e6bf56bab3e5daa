/**
 * @fileOverview: Wiring of the naming pipeline from validated configuration
 * @module: PipelineFactory
 * @keyFunctions:
 *   - createNamingPipeline(): Build the orchestrator, its shared history and the abbreviation advisor
 * @dependencies:
 *   - OpenAIService, HybridSearchClient, CollectionSearcher, KeywordExtractor, AnswerGenerator, CodeAnalyzer
 * @context: One OpenAIService serves every completion and embedding call; one HybridSearchClient serves all three collections. The advisor reuses the pipeline's dictionary searcher
 */

import type { AppConfig } from '../core/config';
import { createOpenAIService } from '../core/openaiService';
import { HybridSearchClient } from '../search/searchClient';
import { createCollectionDefinitions } from '../retrieval/collections';
import { CollectionSearcher } from '../retrieval/collectionSearcher';
import type { CollectionName, HybridSearchService } from '../retrieval/types';
import { AbbreviationAdvisor } from './abbreviationAdvisor';
import { AnswerGenerator } from './answerGenerator';
import { CodeAnalyzer } from './codeAnalyzer';
import { HistoryStore } from './history';
import { KeywordExtractor } from './keywordExtractor';
import { NamingOrchestrator } from './orchestrator';

export interface NamingPipeline {
  orchestrator: NamingOrchestrator;
  history: HistoryStore;
  advisor: AbbreviationAdvisor;
}

export function createNamingPipeline(
  config: AppConfig,
  searchService: HybridSearchService = new HybridSearchClient({
    ...config.search,
    timeoutMs: config.requestTimeoutMs,
  })
): NamingPipeline {
  const openai = createOpenAIService(config);
  const definitions = createCollectionDefinitions(config.retrieval);
  const dimensions = config.retrieval.embeddingDimensions;

  const searcherFor = (name: CollectionName) =>
    new CollectionSearcher(definitions[name], searchService, openai, dimensions);

  const history = new HistoryStore();
  const dictionary = searcherFor('dictionary');
  const orchestrator = new NamingOrchestrator({
    extractor: new KeywordExtractor(openai, {
      temperature: config.generation.keywordTemperature,
      maxInputChars: config.generation.maxKeywordInputChars,
    }),
    searchers: {
      rules: searcherFor('rules'),
      dictionary,
      qa: searcherFor('qa'),
    },
    generator: new AnswerGenerator(openai, config.generation.answerTemperature),
    analyzer: new CodeAnalyzer(openai, config.generation.analysisTemperature),
    history,
    fileQuerySource: config.fileQuerySource,
  });

  const advisor = new AbbreviationAdvisor(openai, dictionary, {
    intentTemperature: config.generation.keywordTemperature,
    abbreviationTemperature: config.generation.abbreviationTemperature,
  });

  return { orchestrator, history, advisor };
}
