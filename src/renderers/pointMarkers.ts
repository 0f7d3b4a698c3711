import type { PointsMode } from '../config/types';
import type { Point } from '../core/types';

/**
 * Points that get a marker for the given mode.
 */
export function selectMarkerPoints(points: ReadonlyArray<Point>, mode: PointsMode): ReadonlyArray<Point> {
  switch (mode) {
    case 'all':
      return points;
    case 'last':
      return points.length > 0 ? [points[points.length - 1]] : [];
    case 'none':
      return [];
  }
}
