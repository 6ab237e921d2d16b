import { z } from 'zod';
import { FIELD_TYPES } from '../types/document.js';
import type { ScrapedPage } from '../types/document.js';
import type { Rect } from '../types/geometry.js';

const coordinate = z.number().finite();

export const RectObjectSchema = z.object({
  x0: coordinate,
  y0: coordinate,
  x1: coordinate,
  y1: coordinate,
});

export const RectTupleSchema = z.tuple([coordinate, coordinate, coordinate, coordinate]);

/**
 * Accepts `{x0, y0, x1, y1}` or `[x0, y0, x1, y1]` and always yields the object form.
 */
export const RectSchema = z
  .union([RectObjectSchema, RectTupleSchema])
  .transform((value): Rect => {
    if (Array.isArray(value)) {
      const [x0, y0, x1, y1] = value;
      return { x0, y0, x1, y1 };
    }
    return value;
  });

// Anything the parser has no rendering rule for collapses to 'Other'
export const FieldTypeSchema = z.enum(FIELD_TYPES).catch('Other');

export const SpanInputSchema = z
  .object({
    text: z.string(),
    bbox: RectSchema,
  })
  .transform(({ text, bbox }) => ({ text, rect: bbox }));

export const WidgetInputSchema = z.object({
  fieldName: z.string(),
  fieldType: FieldTypeSchema,
  fieldValue: z.string().nullable().optional(),
  rect: RectSchema,
});

export const TableStructureSchema = z.object({
  bbox: RectSchema,
  header: z.object({
    cells: z.array(RectSchema),
    names: z.array(z.string()),
  }),
});

export const ScrapedPageSchema = z.object({
  rawSpans: z.array(SpanInputSchema).default([]),
  widgets: z.array(WidgetInputSchema).default([]),
  tables: z.array(TableStructureSchema).default([]),
});

export const ScrapedDocumentSchema = z.array(ScrapedPageSchema);

/**
 * Validate raw JSON from the extraction layer and normalize it into scraped pages.
 *
 * @throws Error listing the first ten problems when the input does not match
 */
export function parseScrapedPages(input: unknown): ScrapedPage[] {
  const result = ScrapedDocumentSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const problems = result.error.issues
    .slice(0, 10)
    .map((issue) => `  /${issue.path.join('/')}: ${issue.message}`)
    .join('\n');
  throw new Error(`Invalid scraped page input:\n${problems}`);
}
