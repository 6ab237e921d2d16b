/**
 * Logical document model rebuilt from positioned page primitives.
 * Every value here is created once by a builder and never mutated afterwards.
 */
import type { Rect } from './geometry.js';

export const FIELD_TYPES = ['Text', 'ComboBox', 'CheckBox', 'Other'] as const;
export type FieldType = typeof FIELD_TYPES[number];

/**
 * A run of extracted text with its bounding box.
 */
export interface Span {
  readonly text: string;
  readonly rect: Rect;
}

/**
 * The slice of an interactive form field the parser needs.
 * The extraction layer owns the real widget object; the model only keeps a reference.
 */
export interface Widget {
  readonly fieldName: string;
  readonly fieldType: FieldType;
  /** Current value; `null`, `undefined` and `''` all mean "not filled" */
  readonly fieldValue?: string | null | undefined;
  readonly rect: Rect;
}

export interface TextElement {
  readonly kind: 'text';
  readonly span: Span;
}

export interface FieldElement {
  readonly kind: 'field';
  readonly widget: Widget;
}

/**
 * Anything that can sit on a line: a text span or a form field.
 */
export type Element = TextElement | FieldElement;

/**
 * Elements sharing one vertical band, ordered left to right.
 */
export interface Line {
  readonly elements: readonly Element[];
  /** Rectangle of the seed element that opened the line; used for vertical placement only */
  readonly rect: Rect;
}

/**
 * Header structure of a table as reported by the extraction layer.
 */
export interface TableHeader {
  readonly cells: readonly Rect[];
  readonly names: readonly string[];
}

/**
 * Table bounding structure as reported by the extraction layer.
 */
export interface TableStructure {
  readonly bbox: Rect;
  readonly header: TableHeader;
}

/**
 * A header cell acting as the horizontal slot of one column.
 */
export interface TableColumn {
  readonly name: string;
  readonly cell: Rect;
}

/** One cell holds every element assigned to its column for one row. */
export type TableCell = readonly Element[];
export type TableRow = readonly TableCell[];

export interface ParsedTable {
  readonly headerNames: readonly string[];
  readonly headerCells: readonly Rect[];
  /** One row per body line, one cell per header cell */
  readonly rows: readonly TableRow[];
  readonly rect: Rect;
}

export interface Page {
  /** 1-based page number in the source document */
  readonly number: number;
  /** Non-table lines in reading order */
  readonly lines: readonly Line[];
  readonly widgets: readonly Widget[];
  readonly tables: readonly ParsedTable[];
}

export interface ParsedDocument {
  readonly pages: readonly Page[];
}

/**
 * One page of raw primitives handed over by the extraction layer.
 */
export interface ScrapedPage {
  readonly rawSpans: readonly Span[];
  readonly widgets: readonly Widget[];
  readonly tables: readonly TableStructure[];
}
