export {
  RectObjectSchema,
  RectTupleSchema,
  RectSchema,
  FieldTypeSchema,
  SpanInputSchema,
  WidgetInputSchema,
  TableStructureSchema,
  ScrapedPageSchema,
  ScrapedDocumentSchema,
  parseScrapedPages,
} from './scraped-page.js';

export {
  ParserOptionsSchema,
  resolveParserOptions,
  loadParserOptionsFromEnv,
} from './options.js';

export type { ParserOptions, ParserOptionsInput, ParserHooks } from './options.js';
