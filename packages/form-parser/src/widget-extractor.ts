/**
 * Fields-only extraction: form values without any text layout.
 * Used when only the filled-in values matter and page text is not needed.
 */
import type { ScrapedPage, WidgetValueMap } from '@formtext/types';

/**
 * Every Text field of every page, by name. Unfilled fields map to `null` so
 * consumers can tell an empty field from a missing one. Later pages win on
 * repeated names.
 */
export function extractFieldValues(scrapedPages: readonly ScrapedPage[]): WidgetValueMap {
  const values = new Map<string, string | null>();
  for (const page of scrapedPages) {
    for (const widget of page.widgets) {
      if (widget.fieldType !== 'Text') continue;
      values.set(widget.fieldName, widget.fieldValue ?? null);
    }
  }
  return Object.fromEntries(values);
}

/**
 * The document text of fields-only mode: the field map as JSON.
 */
export function fieldValuesToJson(values: WidgetValueMap, pretty: boolean = false): string {
  return pretty ? JSON.stringify(values, null, 2) : JSON.stringify(values);
}
