export type { Rect } from './geometry.js';

export { FIELD_TYPES } from './document.js';
export type {
  FieldType,
  Span,
  Widget,
  TextElement,
  FieldElement,
  Element,
  Line,
  TableHeader,
  TableStructure,
  TableColumn,
  TableCell,
  TableRow,
  ParsedTable,
  Page,
  ParsedDocument,
  ScrapedPage,
} from './document.js';

export { FIELD_BUCKETS } from './output.js';
export type {
  FieldBucket,
  FieldValueMap,
  FieldValues,
  WidgetValueMap,
  PageError,
  ParseMetadata,
  ParseResult,
} from './output.js';
