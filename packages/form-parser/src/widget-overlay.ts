/**
 * Widget overlay: splices form-field values into the text spans they cover.
 *
 * Extraction returns the blank a field is drawn over ("Name: ________") as
 * ordinary text, while the field's value lives on the widget. Overlaying puts
 * the value where the blank was instead of printing both.
 */
import type { Element, Line, Span, Widget } from '@formtext/types';
import { fieldElement, intersectRects, rectWidth, sortByX, textElement } from '@formtext/layout';
import { hasDisplayValue, widgetDisplayValue } from './field-display.js';

export interface OverlayOptions {
  /** Prefix spliced values with the field name (default: false) */
  useWidgetLabel?: boolean;
  /** Characters kept before the covered range (default: 2) */
  toleranceBefore?: number;
  /** Characters kept after the covered range (default: 1) */
  toleranceAfter?: number;
}

const FILLER_PATTERN = /_+/g;

function clampIndex(index: number, length: number): number {
  return Math.min(Math.max(index, 0), length);
}

export function stripFiller(text: string): string {
  return text.replace(FILLER_PATTERN, '');
}

/**
 * Replace the part of `span` covered by `widget` with `[display value]`.
 *
 * The intersection's x-range is mapped onto character indices by linear
 * interpolation over the span's width. Filler underscores left around the
 * inserted value are removed. Returns `span` itself when the rectangles do
 * not intersect.
 */
export function spliceWidgetIntoSpan(span: Span, widget: Widget, options: OverlayOptions = {}): Span {
  const intersection = intersectRects(span.rect, widget.rect);
  if (intersection === null) return span;

  const toleranceBefore = options.toleranceBefore ?? 2;
  const toleranceAfter = options.toleranceAfter ?? 1;
  const length = span.text.length;
  const width = rectWidth(span.rect);

  let start = 0;
  let end = length;
  if (width > 0) {
    start = Math.floor(((intersection.x0 - span.rect.x0) / width) * length) + toleranceBefore;
    end = Math.floor(((intersection.x1 - span.rect.x0) / width) * length) - toleranceAfter;
  }

  const before = stripFiller(span.text.slice(0, clampIndex(start, length)));
  const after = stripFiller(span.text.slice(clampIndex(end, length)));
  const display = widgetDisplayValue(widget, options.useWidgetLabel ?? false);

  return {
    text: `${before}[${display}]${after}`,
    rect: span.rect,
  };
}

/**
 * Merge a line's fields into the spans they overlap.
 *
 * Each span takes the first not-yet-used field (in line order) that intersects
 * it. Fields that match no span stay in the line as standalone elements.
 * Fields without a display value (type `Other`) are ignored. The
 * returned line is sorted left to right and keeps the input line's rectangle.
 */
export function overlayLine(line: Line, options: OverlayOptions = {}): Line {
  const spans: Span[] = [];
  const widgets: Widget[] = [];
  for (const element of line.elements) {
    if (element.kind === 'text') {
      spans.push(element.span);
    } else if (hasDisplayValue(element.widget)) {
      widgets.push(element.widget);
    }
  }

  const consumed = new Set<Widget>();
  const elements: Element[] = [];

  for (const span of spans) {
    const match = widgets.find(
      (widget) => !consumed.has(widget) && intersectRects(span.rect, widget.rect) !== null
    );
    if (match === undefined) {
      elements.push(textElement(span));
      continue;
    }
    consumed.add(match);
    elements.push(textElement(spliceWidgetIntoSpan(span, match, options)));
  }

  for (const widget of widgets) {
    if (!consumed.has(widget)) {
      elements.push(fieldElement(widget));
    }
  }

  return {
    elements: sortByX(elements),
    rect: line.rect,
  };
}

/**
 * Overlay a line and render it as text. Standalone fields render as `[display value]`.
 */
export function renderLine(line: Line, options: OverlayOptions = {}): string {
  const useWidgetLabel = options.useWidgetLabel ?? false;
  return overlayLine(line, options)
    .elements.map((element) =>
      element.kind === 'text'
        ? element.span.text
        : `[${widgetDisplayValue(element.widget, useWidgetLabel)}]`
    )
    .join(' ');
}
