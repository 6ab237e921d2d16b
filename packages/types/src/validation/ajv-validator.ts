/**
 * AJV-based JSON Schema validation for parse results.
 */

import Ajv from 'ajv';
import ajvFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { ParseResult } from '../types/output.js';

const FIELD_MAP = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const;

export const PARSE_RESULT_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'https://example.local/schemas/formtext-parse-result.schema.json',
  title: 'Form Document Parse Result',
  type: 'object',
  additionalProperties: false,
  required: ['documentText', 'fieldValues', 'metadata', 'errors'],
  properties: {
    documentText: { type: 'string' },
    fieldValues: {
      type: 'object',
      additionalProperties: false,
      required: ['Text', 'Table'],
      properties: {
        Text: FIELD_MAP,
        Table: FIELD_MAP,
      },
    },
    metadata: {
      type: 'object',
      additionalProperties: false,
      required: ['parserVersion', 'parsedAt', 'pageCount', 'pagesParsed', 'warnings'],
      properties: {
        parserVersion: { type: 'string', minLength: 1 },
        parsedAt: { type: 'string', format: 'date-time' },
        pageCount: { type: 'integer', minimum: 0 },
        pagesParsed: { type: 'integer', minimum: 0 },
        warnings: { type: 'array', items: { type: 'string' } },
      },
    },
    errors: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['page', 'error', 'timestamp'],
        properties: {
          page: { type: 'integer', minimum: 1 },
          error: { type: 'string' },
          stack: { type: 'string' },
          timestamp: { type: 'string', format: 'date-time' },
        },
      },
    },
  },
} as const;

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: ValidateFunction<ParseResult> | null = null;

function getValidator(): ValidateFunction<ParseResult> {
  if (compiledValidator === null) {
    // Both packages are CommonJS; under ESM their default export hangs off `.default`
    const ajv = new Ajv.default({
      allErrors: true,
      verbose: true,
    });
    ajvFormats.default(ajv);
    compiledValidator = ajv.compile<ParseResult>(PARSE_RESULT_SCHEMA);
  }
  return compiledValidator;
}

function toValidationError(err: ErrorObject): ValidationError {
  return {
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  };
}

/**
 * Validate a parse result (typically after a JSON round trip).
 * `undefined` page-error stacks are dropped by JSON serialization and are accepted as absent.
 */
export function validateParseResult(output: unknown): ValidationResult {
  const validate = getValidator();
  if (validate(output)) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  return { valid: false, errors: rawErrors.map(toValidationError) };
}

export function validateParseResultOrThrow(output: unknown): asserts output is ParseResult {
  const result = validateParseResult(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
