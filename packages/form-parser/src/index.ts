// Field display rules
export { widgetDisplayValue, isCheckboxOn, hasDisplayValue } from './field-display.js';

// Widget overlay
export {
  overlayLine,
  renderLine,
  spliceWidgetIntoSpan,
  stripFiller,
  type OverlayOptions,
} from './widget-overlay.js';

// Table rendering
export {
  cellText,
  tableToTextRows,
  tableToRecords,
  formatTableGrid,
  formatTableLabeled,
  formatTable,
  type TableRenderOptions,
} from './table-renderer.js';

// Page formatting
export { formatPage, pageBlocks, type PageFormatOptions, type PageBlock } from './page-formatter.js';

// Field values
export {
  emptyFieldValues,
  widgetsInLines,
  collectFieldValues,
  mergeFieldValues,
  type FieldValueOptions,
} from './field-values.js';

// Document assembly
export {
  buildPage,
  buildDocument,
  parseDocument,
  type AssembleOptions,
  type PageBuildResult,
  type DocumentBuildResult,
} from './document-assembler.js';

// Fields-only mode
export { extractFieldValues, fieldValuesToJson } from './widget-extractor.js';
