/**
 * Interpolation Utilities
 *
 * Piecewise-linear lookups over small sorted curves (normative tables,
 * hsCRP risk curve). Values outside a curve clamp to its edges; nothing
 * is extrapolated.
 * No I/O.
 */

import type { Direction } from "@healthspan/contracts";

export type CurvePoint = { x: number; y: number };

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Representative point of an age band, e.g. [40, 49] → 44.5. */
export function midpoint(range: readonly [number, number]): number {
  return (range[0] + range[1]) / 2;
}

function edges(points: readonly CurvePoint[]): [CurvePoint, CurvePoint] {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last || points.length < 2) {
    throw new RangeError("At least two points are required for interpolation");
  }
  return [first, last];
}

function segments(points: readonly CurvePoint[]): Array<[CurvePoint, CurvePoint]> {
  const out: Array<[CurvePoint, CurvePoint]> = [];
  let previous: CurvePoint | undefined;
  for (const point of points) {
    if (previous) out.push([previous, point]);
    previous = point;
  }
  return out;
}

/**
 * y at x on a curve sorted by strictly increasing x.
 * A tabulated x returns its tabulated y exactly.
 */
export function linearInterpolate(x: number, points: readonly CurvePoint[]): number {
  const [first, last] = edges(points);
  if (x <= first.x) return first.y;
  if (x >= last.x) return last.y;

  for (const [a, b] of segments(points)) {
    if (x === a.x) return a.y;
    if (x === b.x) return b.y;
    if (x > a.x && x < b.x) {
      return a.y + ((b.y - a.y) * (x - a.x)) / (b.x - a.x);
    }
  }
  return last.y;
}

function oriented(points: readonly CurvePoint[], direction: Direction): CurvePoint[] {
  const sign = direction === "higher_is_better" ? 1 : -1;
  return points.map((p) => ({ x: p.x, y: sign * p.y }));
}

/** x where the segment a→b takes `value`, or null when it never does. */
function crossing(a: CurvePoint, b: CurvePoint, value: number): number | null {
  if (value < Math.min(a.y, b.y) || value > Math.max(a.y, b.y)) return null;
  if (value === a.y) return a.x;
  if (value === b.y) return b.x;
  return a.x + ((value - a.y) * (b.x - a.x)) / (b.y - a.y);
}

/**
 * x at which the curve reaches `target`, searched outward from `anchorX`
 * (the client's age, clamped into the table).
 *
 * A target at least as good as the curve at the anchor is looked for at
 * younger x only, a worse one at older x only, and the first crossing
 * walking away from the anchor wins. A target the walk never reaches maps
 * to the table edge on that side. So the anchor's own value maps back to
 * the anchor, and for a fixed anchor the result never gets older as the
 * target improves, even on curves that peak mid-table.
 */
export function inverseInterpolate(
  target: number,
  points: readonly CurvePoint[],
  direction: Direction,
  anchorX: number,
): number {
  const curve = oriented(points, direction);
  const [first, last] = edges(curve);
  const value = direction === "higher_is_better" ? target : -target;
  const anchorAt = clamp(anchorX, first.x, last.x);
  const anchor: CurvePoint = { x: anchorAt, y: linearInterpolate(anchorAt, curve) };
  if (value === anchor.y) return anchor.x;

  const younger = value > anchor.y;
  const path = younger
    ? [anchor, ...curve.filter((p) => p.x < anchor.x).reverse()]
    : [anchor, ...curve.filter((p) => p.x > anchor.x)];

  for (const [a, b] of segments(path)) {
    const x = crossing(a, b, value);
    if (x !== null) return x;
  }
  return younger ? first.x : last.x;
}
