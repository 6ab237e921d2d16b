/**
 * Layout utilities for form documents.
 * Geometry predicates, line clustering and table detection.
 */

export {
  DEFAULT_TOLERANCE,
  rectWidth,
  isSameLine,
  isRectInside,
  isPartiallyInside,
  isWordInColumn,
  intersectRects,
} from './geometry.js';

export {
  textElement,
  fieldElement,
  assertNever,
  elementRect,
  getFilledValue,
  elementsFromPage,
  sortByX,
} from './elements.js';

export { buildLines, removeWidgetEchoes, sortByVerticalPosition } from './lines.js';

export {
  getTableColumns,
  isLineInTable,
  findTableLines,
  removeHeaderDuplicates,
  splitIntoColumns,
  parseTable,
  detectTables,
} from './tables.js';

export type { TableDetectionResult } from './tables.js';
