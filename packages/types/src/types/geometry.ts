/**
 * Axis-aligned rectangle in page coordinates (origin top-left, y grows downward).
 *
 * Callers guarantee `x1 >= x0` and `y1 >= y0`; nothing downstream re-checks it.
 */
export interface Rect {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}
