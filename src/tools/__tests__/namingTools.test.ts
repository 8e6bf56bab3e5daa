import { createNamingHandlers, namingTools } from '../namingTools';
import { ErrorCode } from '../../utils/errorHandler';
import {
  ALL_INDEXES,
  createTestPipeline,
  dictionaryHit,
  GENERATED_ANSWER,
  KEYWORDS_ANSWER,
} from '../../__tests__/utils/testHelpers';
import { INTENT_SYSTEM_PROMPT } from '../../pipeline/prompts/abbreviationPrompts';
import { KEYWORD_SYSTEM_PROMPT } from '../../pipeline/prompts/keywordPrompts';

const MEMBER_ENTRY =
  '[Context: Dictionary] (score 1.20) **Korean**: 회원 **English**: Member **Abbreviation**: MBR **Description**: A registered user';

describe('naming tools', () => {
  it('advertises the ask, analyze, abbreviate and history tools', () => {
    expect(namingTools.map(tool => tool.name)).toEqual([
      'naming_ask',
      'naming_analyze_file',
      'naming_abbreviate',
      'naming_history',
    ]);
    expect(namingTools.every(tool => tool.inputSchema.type === 'object')).toBe(true);
  });

  describe('naming_ask', () => {
    it('returns the answer payload with keywords and contexts', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: 'Java class name for member login history' });

      expect(result).toMatchObject({
        success: true,
        final_answer: GENERATED_ANSWER,
        search_query_used: 'Java OR member OR login history',
        retrieved_context_count: 3,
        mode: 'text-question',
        keywords: ['Java', 'member', 'login history'],
      });
      expect(result).not.toHaveProperty('context_report');
    });

    it('includes the context report on request', async () => {
      const pipeline = createTestPipeline({});
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: 'member', showContext: true });

      expect(result).toHaveProperty('context_report');
      expect(result).toMatchObject({ retrieved_context_count: 0 });
    });

    it('reports invalid input as a structured failure', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const { history } = pipeline;
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: '' });

      expect(result).toEqual({
        success: false,
        error: 'Validation error for request: Request text is required',
        code: ErrorCode.VALIDATION_ERROR,
      });
      expect(history.size).toBe(0);
    });
  });

  describe('naming_analyze_file', () => {
    it('analyzes file content passed as text', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const { history, completion } = pipeline;
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_analyze_file({
        fileName: 'Member.java',
        content: 'int user_list = 5;',
      });

      expect(result).toMatchObject({ success: true, mode: 'file-analysis', final_answer: GENERATED_ANSWER });
      expect(completion.complete.mock.calls[1][1]).toContain('0001: int user_list = 5;');
      expect(history.list()[0].label).toBe('File analysis: Member.java');
    });

    it('rejects unsupported extensions before running the pipeline', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const { completion } = pipeline;
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_analyze_file({ fileName: 'logo.svg', content: '<svg/>' });

      expect(result).toMatchObject({ success: false, code: ErrorCode.VALIDATION_ERROR });
      expect(completion.complete).not.toHaveBeenCalled();
    });

    it('reports a file with only whitespace as a failed request', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_analyze_file({ fileName: 'Member.java', content: '   ' });

      expect(result).toEqual({
        success: false,
        error: 'Request failed while idle: Validation error for file.bytes: Member.java is empty',
        code: ErrorCode.VALIDATION_ERROR,
      });
    });
  });

  describe('naming_abbreviate', () => {
    it('returns a registered abbreviation from the dictionary without calling the model', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_abbreviate({ term: '  회원 ' });

      expect(result).toEqual({
        success: true,
        term: '회원',
        source: 'dictionary',
        answer: "'회원' is registered in the term dictionary: Member (MBR). A registered user",
        abbreviation: 'MBR',
        english: 'Member',
        relatedEntries: [MEMBER_ENTRY],
      });
      expect(pipeline.completion.complete).not.toHaveBeenCalled();
      expect(pipeline.service.calls.map(call => call.indexName)).toEqual(['dictionary-index']);
    });

    it('generates an abbreviation from the related entries for an unregistered term', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_abbreviate({ term: '회원등급' });

      expect(result).toEqual({
        success: true,
        term: '회원등급',
        source: 'generated',
        answer: GENERATED_ANSWER,
        relatedEntries: [MEMBER_ENTRY],
      });
      const [systemPrompt, userPrompt, temperature] = pipeline.completion.complete.mock.calls[0];
      expect(systemPrompt).toContain(MEMBER_ENTRY);
      expect(userPrompt).toBe('Term: 회원등급');
      expect(temperature).toBe(0.3);
    });

    it('keeps abbreviations out of the history', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      await handlers.naming_abbreviate({ term: '회원' });

      expect(pipeline.history.size).toBe(0);
    });

    it('reports a blank term as a validation failure', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_abbreviate({ term: '   ' });

      expect(result).toEqual({
        success: false,
        error: 'Validation error for term: Term is required',
        code: ErrorCode.VALIDATION_ERROR,
      });
      expect(pipeline.service.calls).toHaveLength(0);
    });
  });

  describe('naming_ask with intent routing', () => {
    it('answers a request for a new abbreviation through the abbreviation path', async () => {
      const pipeline = createTestPipeline({ 'dictionary-index': [dictionaryHit()] });
      pipeline.completion.complete.mockImplementation(async systemPrompt =>
        systemPrompt === INTENT_SYSTEM_PROMPT ? '2' : GENERATED_ANSWER
      );
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: 'Make an abbreviation for 회원등급', routeByIntent: true });

      expect(result).toMatchObject({
        success: true,
        intent: 'abbreviation',
        term: 'Make an abbreviation for 회원등급',
        source: 'generated',
        answer: GENERATED_ANSWER,
      });
      expect(pipeline.history.size).toBe(0);
    });

    it('runs the retrieval pipeline for a lookup and reports the intent', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      pipeline.completion.complete.mockImplementation(async systemPrompt => {
        if (systemPrompt === INTENT_SYSTEM_PROMPT) return '1';
        return systemPrompt === KEYWORD_SYSTEM_PROMPT ? KEYWORDS_ANSWER : GENERATED_ANSWER;
      });
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: 'What is the abbreviation of 회원?', routeByIntent: true });

      expect(result).toMatchObject({ success: true, intent: 'lookup', final_answer: GENERATED_ANSWER });
      expect(pipeline.history.size).toBe(1);
    });

    it('skips classification unless routing is requested', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      const result = await handlers.naming_ask({ request: 'member' });

      expect(result).not.toHaveProperty('intent');
      expect(pipeline.completion.complete.mock.calls.map(call => call[0])).not.toContain(INTENT_SYSTEM_PROMPT);
    });
  });

  describe('naming_history', () => {
    it('lists completed requests oldest first', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      await handlers.naming_ask({ request: 'first question' });
      await handlers.naming_ask({ request: '' });
      await handlers.naming_ask({ request: 'second question' });

      const result = await handlers.naming_history({});

      expect(result).toMatchObject({
        success: true,
        total: 2,
        entries: [
          { label: 'first question', final_answer: GENERATED_ANSWER },
          { label: 'second question', final_answer: GENERATED_ANSWER },
        ],
      });
    });

    it('honours the limit', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);
      await handlers.naming_ask({ request: 'first question' });
      await handlers.naming_ask({ request: 'second question' });

      const result = await handlers.naming_history({ limit: 1 });

      expect(result).toMatchObject({ total: 2, entries: [{ label: 'second question' }] });
    });

    it('accepts a missing argument object', async () => {
      const pipeline = createTestPipeline(ALL_INDEXES);
      const handlers = createNamingHandlers(pipeline);

      await expect(handlers.naming_history(undefined)).resolves.toEqual({ success: true, total: 0, entries: [] });
    });
  });
});
