export {
  PARSE_RESULT_SCHEMA,
  validateParseResult,
  validateParseResultOrThrow,
  formatValidationErrors,
} from './ajv-validator.js';

export type { ValidationResult, ValidationError } from './ajv-validator.js';
