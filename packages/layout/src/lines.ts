/**
 * Line clustering for positioned page elements.
 * Groups spans and form fields into lines based on Y-coordinate proximity.
 */
import type { Element, Line, Rect } from '@formtext/types';
import { DEFAULT_TOLERANCE, isSameLine } from './geometry.js';
import { elementRect, getFilledValue, sortByX } from './elements.js';

/**
 * Group elements into lines, top to bottom.
 *
 * Elements are sorted by `y0` and scanned once. The first element of a line is
 * its seed: later elements join while they pass `isSameLine` against the seed's
 * rectangle, which is never widened as the line grows.
 *
 * @param elements - Elements of one page, in any order
 * @param tolerance - Y tolerance passed to `isSameLine` (default: 5)
 * @returns Lines ordered by their seed's `y0`, each sorted left to right
 */
export function buildLines(elements: readonly Element[], tolerance: number = DEFAULT_TOLERANCE): Line[] {
  if (elements.length === 0) return [];

  const sorted = [...elements].sort((a, b) => elementRect(a).y0 - elementRect(b).y0);

  const lines: Line[] = [];
  let current: Element[] = [];
  let seed: Rect | null = null;

  for (const element of sorted) {
    const rect = elementRect(element);
    if (seed !== null && isSameLine(seed, rect, tolerance)) {
      current.push(element);
      continue;
    }

    if (seed !== null) {
      lines.push(createLine(current, seed));
    }
    current = [element];
    seed = rect;
  }

  if (seed !== null) {
    lines.push(createLine(current, seed));
  }

  return lines;
}

/**
 * Close a line: drop widget echo text, then order left to right.
 */
function createLine(elements: Element[], seed: Rect): Line {
  return {
    elements: sortByX(removeWidgetEchoes(elements)),
    rect: seed,
  };
}

/**
 * Drop text spans that repeat the value of a filled field on the same line.
 *
 * Such spans are the field's appearance stream rendered as ordinary page text;
 * keeping both would print the value twice. Matching is intentionally
 * whitespace-insensitive: both sides are trimmed before comparing.
 */
export function removeWidgetEchoes(elements: readonly Element[]): Element[] {
  const fieldValues = new Set<string>();
  for (const element of elements) {
    if (element.kind !== 'field') continue;
    const value = getFilledValue(element.widget);
    if (value !== null) fieldValues.add(value.trim());
  }

  if (fieldValues.size === 0) return [...elements];

  return elements.filter(
    (element) => element.kind !== 'text' || !fieldValues.has(element.span.text.trim())
  );
}

/**
 * Stable sort of anything with a rectangle by its top edge.
 */
export function sortByVerticalPosition<T extends { readonly rect: Rect }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.rect.y0 - b.rect.y0);
}

