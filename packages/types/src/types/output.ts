/**
 * Output contract of a parse run, consumed by the downstream review pipeline.
 */

export const FIELD_BUCKETS = ['Text', 'Table'] as const;

/**
 * Where a field was found: free-standing on the page, or inside a detected table.
 * Downstream rules (maximum length and the like) differ per bucket.
 */
export type FieldBucket = typeof FIELD_BUCKETS[number];

/** Field name -> field value */
export type FieldValueMap = Record<string, string>;

export type FieldValues = Record<FieldBucket, FieldValueMap>;

/** Field name -> value, `null` for a field that was never filled */
export type WidgetValueMap = Record<string, string | null>;

export interface PageError {
  /** 1-based page number */
  page: number;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface ParseMetadata {
  parserVersion: string;
  parsedAt: string;
  /** Number of scraped pages received */
  pageCount: number;
  /** Number of pages that produced a Page entry */
  pagesParsed: number;
  warnings: string[];
}

export interface ParseResult {
  documentText: string;
  fieldValues: FieldValues;
  metadata: ParseMetadata;
  errors: PageError[];
}
