import type { Point } from '../types';

export const pixelDistance = (a: Point, b: Point) => {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
};

export const midpoint = (a: Point, b: Point): Point => ({ x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 });

export const offsetPoint = (p: Point, dx: number, dy: number): Point => ({ x: p.x + dx, y: p.y + dy });

export const pathLength = (points: readonly Point[]) => {
  let len = 0;
  for (let i = 0; i < points.length - 1; i++) {
    len += pixelDistance(points[i], points[i + 1]);
  }
  return len;
};

/**
 * Point at half the arc length of an open path. Paths with no length fall back
 * to the midpoint of their end points.
 */
export const halfwayPoint = (points: readonly Point[]): Point => {
  if (points.length === 0) throw new RangeError('halfwayPoint needs at least one point');
  if (points.length === 1) return { ...points[0] };

  const first = points[0];
  const last = points[points.length - 1];
  const segLens = points.slice(0, -1).map((p, i) => pixelDistance(p, points[i + 1]));
  const total = segLens.reduce((s, d) => s + d, 0);
  if (total <= 0) return midpoint(first, last);

  const half = total / 2;
  let acc = 0;
  for (let i = 0; i < segLens.length; i++) {
    if (acc + segLens[i] >= half) {
      const a = points[i];
      const b = points[i + 1];
      const t = segLens[i] > 0 ? (half - acc) / segLens[i] : 0.5;
      return { x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t };
    }
    acc += segLens[i];
  }
  return midpoint(first, last);
};
