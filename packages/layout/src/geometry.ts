/**
 * Geometry predicates over axis-aligned rectangles.
 *
 * All functions are total and assume well-formed input (x1 >= x0, y1 >= y0).
 * Malformed rectangles are not detected: garbage in, garbage out.
 */
import type { Rect } from '@formtext/types';

/** Default tolerance, in page units, for line and containment tests */
export const DEFAULT_TOLERANCE = 5;

export function rectWidth(rect: Rect): number {
  return rect.x1 - rect.x0;
}

/**
 * Two rectangles sit on the same text line when their top edges or their
 * bottom edges differ by less than `tolerance`.
 */
export function isSameLine(a: Rect, b: Rect, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return Math.abs(a.y0 - b.y0) < tolerance || Math.abs(a.y1 - b.y1) < tolerance;
}

/**
 * Every coordinate of `inner` lies within `outer` grown by `tolerance` on each side.
 */
export function isRectInside(outer: Rect, inner: Rect, tolerance: number = DEFAULT_TOLERANCE): boolean {
  const left = outer.x0 - tolerance;
  const right = outer.x1 + tolerance;
  const top = outer.y0 - tolerance;
  const bottom = outer.y1 + tolerance;

  return (
    left <= inner.x0 && inner.x0 <= right &&
    top <= inner.y0 && inner.y0 <= bottom &&
    left <= inner.x1 && inner.x1 <= right &&
    top <= inner.y1 && inner.y1 <= bottom
  );
}

/**
 * Horizontal containment plus a bottom-edge check only.
 *
 * The top edge is not compared: this catches rows that start inside a header
 * cell and extend below it.
 */
export function isPartiallyInside(outer: Rect, inner: Rect): boolean {
  return outer.x0 <= inner.x0 && outer.x1 >= inner.x1 && outer.y1 >= inner.y1;
}

/**
 * A word belongs to a column when its left edge falls within the column's x-range.
 */
export function isWordInColumn(word: Rect, column: Rect): boolean {
  return column.x0 <= word.x0 && word.x0 <= column.x1;
}

/**
 * Overlap of two rectangles, or `null` when they do not overlap on both axes.
 * Rectangles that only touch along an edge do not overlap.
 */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x0, b.x0);
  const y0 = Math.max(a.y0, b.y0);
  const x1 = Math.min(a.x1, b.x1);
  const y1 = Math.min(a.y1, b.y1);

  if (x0 >= x1 || y0 >= y1) {
    return null;
  }
  return { x0, y0, x1, y1 };
}
