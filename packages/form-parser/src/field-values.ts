import type { FieldBucket, FieldValues, Line, Widget } from '@formtext/types';
import { FIELD_BUCKETS } from '@formtext/types';
import { getFilledValue } from '@formtext/layout';

export interface FieldValueOptions {
  /** Record unfilled Text fields with an empty value (default: false) */
  includeEmptyFields?: boolean;
}

export function emptyFieldValues(): FieldValues {
  return { Text: {}, Table: {} };
}

type BucketEntries = Record<FieldBucket, Map<string, string>>;

function bucketEntries(): BucketEntries {
  return { Text: new Map(), Table: new Map() };
}

// Own properties: a field named `__proto__` stays a plain key
function toFieldValues(buckets: BucketEntries): FieldValues {
  return {
    Text: Object.fromEntries(buckets.Text),
    Table: Object.fromEntries(buckets.Table),
  };
}

/**
 * Widgets referenced by the given lines.
 */
export function widgetsInLines(lines: readonly Line[]): Set<Widget> {
  const widgets = new Set<Widget>();
  for (const line of lines) {
    for (const element of line.elements) {
      if (element.kind === 'field') widgets.add(element.widget);
    }
  }
  return widgets;
}

/**
 * Map the values of a page's Text fields by name, split by where they sit.
 *
 * Fields referenced by a table line go to `Table`, everything else to `Text`.
 * Only `Text`-type widgets are collected. A repeated field name keeps the last value.
 */
export function collectFieldValues(
  widgets: readonly Widget[],
  tableLines: readonly Line[],
  options: FieldValueOptions = {}
): FieldValues {
  const includeEmpty = options.includeEmptyFields ?? false;
  const inTables = widgetsInLines(tableLines);
  const buckets = bucketEntries();

  for (const widget of widgets) {
    if (widget.fieldType !== 'Text') continue;

    const value = getFilledValue(widget);
    if (value === null && !includeEmpty) continue;

    const bucket: FieldBucket = inTables.has(widget) ? 'Table' : 'Text';
    buckets[bucket].set(widget.fieldName, value ?? '');
  }

  return toFieldValues(buckets);
}

/**
 * Merge per-page maps in order; later pages win on repeated names.
 */
export function mergeFieldValues(maps: readonly FieldValues[]): FieldValues {
  const buckets = bucketEntries();
  for (const map of maps) {
    for (const bucket of FIELD_BUCKETS) {
      for (const [name, value] of Object.entries(map[bucket])) {
        buckets[bucket].set(name, value);
      }
    }
  }
  return toFieldValues(buckets);
}
