import {
  AbbreviateInputSchema,
  AnalyzeFileInputSchema,
  AskInputSchema,
  HistoryInputSchema,
  ValidationHelper,
} from '../validation';
import { ErrorCode, ValidationError } from '../../utils/errorHandler';

describe('Tool input validation', () => {
  it('accepts and trims a naming question', () => {
    const input = ValidationHelper.validateInput(
      AskInputSchema,
      { request: '  Java class name for member  ' },
      'naming_ask'
    );
    expect(input).toEqual({ request: 'Java class name for member' });
  });

  it('rejects a blank question with the field in the message', () => {
    expect(() => ValidationHelper.validateInput(AskInputSchema, { request: '   ' }, 'naming_ask')).toThrow(
      'Validation error for request: Request text is required'
    );
  });

  it('rejects a missing argument object', () => {
    expect(() => ValidationHelper.validateInput(AskInputSchema, undefined, 'naming_ask')).toThrow(ValidationError);
  });

  it('accepts a supported file and keeps the optional note', () => {
    const input = ValidationHelper.validateInput(
      AnalyzeFileInputSchema,
      { fileName: 'UserService.java', content: 'class UserService {}', request: 'check constants' },
      'naming_analyze_file'
    );
    expect(input).toEqual({
      fileName: 'UserService.java',
      content: 'class UserService {}',
      request: 'check constants',
    });
  });

  it('rejects an unsupported extension', () => {
    try {
      ValidationHelper.validateInput(
        AnalyzeFileInputSchema,
        { fileName: 'diagram.png', content: 'x' },
        'naming_analyze_file'
      );
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        details: { field: 'fileName' },
        context: { tool: 'naming_analyze_file' },
      });
    }
  });

  it('rejects empty file content', () => {
    expect(() =>
      ValidationHelper.validateInput(
        AnalyzeFileInputSchema,
        { fileName: 'schema.sql', content: '' },
        'naming_analyze_file'
      )
    ).toThrow('Validation error for content: File content is required');
  });

  it('bounds the history limit', () => {
    expect(ValidationHelper.validateInput(HistoryInputSchema, {}, 'naming_history')).toEqual({});
    expect(ValidationHelper.validateInput(HistoryInputSchema, { limit: 10 }, 'naming_history')).toEqual({
      limit: 10,
    });
    expect(() => ValidationHelper.validateInput(HistoryInputSchema, { limit: 0 }, 'naming_history')).toThrow(
      ValidationError
    );
    expect(() => ValidationHelper.validateInput(HistoryInputSchema, { limit: 2.5 }, 'naming_history')).toThrow(
      ValidationError
    );
  });

  it('keeps the intent routing flag of a question', () => {
    expect(
      ValidationHelper.validateInput(AskInputSchema, { request: 'member', routeByIntent: true }, 'naming_ask')
    ).toEqual({ request: 'member', routeByIntent: true });
  });

  it('trims the term to abbreviate and bounds its length', () => {
    expect(ValidationHelper.validateInput(AbbreviateInputSchema, { term: ' 주문이력 ' }, 'naming_abbreviate')).toEqual({
      term: '주문이력',
    });
    expect(() => ValidationHelper.validateInput(AbbreviateInputSchema, { term: ' ' }, 'naming_abbreviate')).toThrow(
      'Validation error for term: Term is required'
    );
    expect(() =>
      ValidationHelper.validateInput(AbbreviateInputSchema, { term: 'x'.repeat(101) }, 'naming_abbreviate')
    ).toThrow('Validation error for term: Term must be at most 100 characters');
  });
});
