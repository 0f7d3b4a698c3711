import type { ResolvedSmoothingConfig } from '../config/OptionResolver';
import type { PathCommand, Point, SparklinePath } from '../core/types';

/**
 * Straight segments through every point, in order.
 */
export function buildLinearPath(points: ReadonlyArray<Point>): SparklinePath {
  if (points.length === 0) return [];

  const commands: PathCommand[] = [{ type: 'moveTo', x: points[0].x, y: points[0].y }];
  for (let i = 1; i < points.length; i++) {
    commands.push({ type: 'lineTo', x: points[i].x, y: points[i].y });
  }
  return commands;
}

/**
 * Cubic Bezier segments whose control points follow the tangent through each
 * point's neighbours.
 *
 * A sliding window `(a, b, c)` starts at `(p0, p0, p1)`. For each segment:
 * - `cp1 = b + (c - a) * factor`
 * - the window advances, with `c` clamped to the last point
 * - `cp2 = b + (a - c) * factor`
 * - curve to the new `b`
 *
 * Reusing the first and last points as their own neighbours flattens the end
 * tangents; that clamp is intended.
 */
export function buildCubicPath(points: ReadonlyArray<Point>, factor: number): SparklinePath {
  if (points.length === 0) return [];

  const first = points[0];
  const commands: PathCommand[] = [{ type: 'moveTo', x: first.x, y: first.y }];
  if (points.length === 1) return commands;

  const last = points.length - 1;
  let a = first;
  let b = first;
  let c = points[1];

  for (let i = 1; i < points.length; i++) {
    const cp1x = (c.x - a.x) * factor + b.x;
    const cp1y = (c.y - a.y) * factor + b.y;

    a = b;
    b = c;
    c = points[Math.min(last, i + 1)];

    const cp2x = (a.x - c.x) * factor + b.x;
    const cp2y = (a.y - c.y) * factor + b.y;

    commands.push({ type: 'cubicTo', cp1x, cp1y, cp2x, cp2y, x: b.x, y: b.y });
  }

  return commands;
}

export function buildLinePath(points: ReadonlyArray<Point>, smoothing: ResolvedSmoothingConfig): SparklinePath {
  return smoothing.enabled ? buildCubicPath(points, smoothing.factor) : buildLinearPath(points);
}
