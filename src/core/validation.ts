/**
 * @fileOverview: Schema validation for MCP tool inputs using Zod
 * @module: ValidationSchemas
 * @keyFunctions:
 *   - validateInput(): Validate tool input parameters against schemas
 * @dependencies:
 *   - zod: Type-safe schema validation library
 *   - logger: Logging utilities for validation errors
 *   - languageUtils: Supported upload extensions
 * @context: Tool arguments arrive as untyped JSON from the MCP client; every handler parses them here before anything reaches the pipeline
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { ValidationError } from '../utils/errorHandler';
import { isSupportedFile, SUPPORTED_EXTENSIONS } from '../utils/languageUtils';

export const MAX_HISTORY_LIMIT = 100;
export const MAX_TERM_LENGTH = 100;

export const RequestTextSchema = z
  .string()
  .trim()
  .min(1, 'Request text is required')
  .describe('Naming question or request in natural language');

export const FileNameSchema = z
  .string()
  .trim()
  .min(1, 'File name is required')
  .refine(isSupportedFile, {
    message: `Unsupported file type. Supported extensions: ${SUPPORTED_EXTENSIONS.join(', ')}`,
  })
  .describe('Name of the uploaded source file');

// Tool input schemas
export const AskInputSchema = z
  .object({
    request: RequestTextSchema,
    routeByIntent: z.boolean().optional(),
  })
  .describe('Naming question parameters');

export const AnalyzeFileInputSchema = z
  .object({
    fileName: FileNameSchema,
    content: z.string().min(1, 'File content is required'),
    request: z.string().optional(),
  })
  .describe('File analysis parameters');

export const AbbreviateInputSchema = z
  .object({
    term: z.string().trim().min(1, 'Term is required').max(MAX_TERM_LENGTH, `Term must be at most ${MAX_TERM_LENGTH} characters`),
  })
  .describe('Abbreviation parameters');

export const HistoryInputSchema = z
  .object({
    limit: z.number().int().min(1).max(MAX_HISTORY_LIMIT).optional(),
  })
  .describe('History listing parameters');

export type AskInput = z.infer<typeof AskInputSchema>;
export type AnalyzeFileInput = z.infer<typeof AnalyzeFileInputSchema>;
export type AbbreviateInput = z.infer<typeof AbbreviateInputSchema>;
export type HistoryInput = z.infer<typeof HistoryInputSchema>;

/**
 * Validation helper that turns Zod failures into ValidationError.
 */
export class ValidationHelper {
  static validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, toolName: string): T {
    const result = schema.safeParse(data);
    if (result.success) {
      return result.data;
    }

    const firstError = result.error.errors[0];
    const field = firstError && firstError.path.length > 0 ? firstError.path.join('.') : 'input';
    const message = firstError?.message || `Invalid input for tool ${toolName}`;

    logger.error(`Schema validation failed for ${toolName}`, {
      tool: toolName,
      errors: result.error.errors.map(e => ({
        field: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
    });

    throw new ValidationError(field, message, { tool: toolName });
  }
}
