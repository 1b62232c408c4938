/** Copper layer identifier, named like KiCad board layers. */
export type LayerName = "F.Cu" | "B.Cu" | `In${number}.Cu`;

/** Immutable position in board units. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Shortest distance from `p` to the segment `a`-`b`.
 * Degenerate segments (a == b) fall back to the point distance.
 */
export function distanceToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lengthSq = dx * dx + dy * dy;
  if (lengthSq === 0) return distance(p, a);

  const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
  return distance(p, point(a.x + t * dx, a.y + t * dy));
}

export function formatPoint(p: Point): string {
  return `${p.x.toFixed(3)},${p.y.toFixed(3)}`;
}
