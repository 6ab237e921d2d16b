export {
  PARSER_VERSION,
  EMPTY_FIELD_PLACEHOLDER,
  CHECKBOX_DISPLAY,
  CHECKBOX_OFF_VALUES,
  PAGE_HEADER_PREFIX,
} from './constants.js';
export { createConsoleLogger, silentLogger, type Logger, type ConsoleLoggerOptions } from './logger.js';
