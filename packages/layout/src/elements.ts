import type { Element, FieldElement, Rect, Span, TextElement, Widget } from '@formtext/types';

export function textElement(span: Span): TextElement {
  return { kind: 'text', span };
}

export function fieldElement(widget: Widget): FieldElement {
  return { kind: 'field', widget };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export function elementRect(element: Element): Rect {
  switch (element.kind) {
    case 'text':
      return element.span.rect;
    case 'field':
      return element.widget.rect;
    default:
      return assertNever(element);
  }
}

/**
 * The widget's value when the field is filled, otherwise `null`.
 */
export function getFilledValue(widget: Widget): string | null {
  const value = widget.fieldValue;
  if (value === undefined || value === null || value === '') {
    return null;
  }
  return value;
}

/**
 * Spans first, then widgets, in extraction order.
 */
export function elementsFromPage(spans: readonly Span[], widgets: readonly Widget[]): Element[] {
  return [...spans.map(textElement), ...widgets.map(fieldElement)];
}

/**
 * Stable sort by the left edge.
 */
export function sortByX(elements: readonly Element[]): Element[] {
  return [...elements].sort((a, b) => elementRect(a).x0 - elementRect(b).x0);
}
