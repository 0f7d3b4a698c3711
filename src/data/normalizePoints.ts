/**
 * Maps data samples to canvas coordinates.
 *
 * @module normalizePoints
 */

import type { SparklineData, SurfaceSize } from '../config/types';
import type { Point } from '../core/types';
import { computeHeightNormalizer } from './resolveBounds';
import type { ValueBounds } from './resolveBounds';

/**
 * Part of the canvas the line may occupy.
 *
 * The stroke width is reserved so the line is not clipped at the edges; the
 * label reserve is the right-hand margin taken by grid line labels.
 */
export type DrawableArea = Readonly<{
  width: number;
  height: number;
  lineWidth: number;
}>;

export function computeDrawableArea(size: SurfaceSize, lineWidth: number, labelReserve = 0): DrawableArea {
  return {
    width: Math.max(0, size.width - lineWidth - labelReserve),
    height: Math.max(0, size.height - lineWidth),
    lineWidth,
  };
}

/**
 * Returns one point per sample, index-aligned with `data`.
 *
 * - `x = i * width / (n - 1) + lineWidth / 2`
 * - `y = height - (v - min) * height / (max - min) + lineWidth / 2`
 *
 * A zero-span range puts every point at mid-height. A single sample has no
 * horizontal spacing and is centred in the drawable area.
 */
export function normalizePoints(data: SparklineData, bounds: ValueBounds, area: DrawableArea): Point[] {
  const n = data.length;
  const halfLine = area.lineWidth / 2;
  const heightNormalizer = computeHeightNormalizer(bounds, area.height);
  const isFlat = heightNormalizer === 0;

  // Offsets are halved like the normalizer so `v - min` cannot overflow.
  const toY = (v: number): number =>
    isFlat ? area.height / 2 + halfLine : area.height - (v / 2 - bounds.min / 2) * heightNormalizer * 2 + halfLine;

  if (n === 1) {
    return [{ x: area.width / 2 + halfLine, y: toY(data[0]) }];
  }

  const widthNormalizer = area.width / (n - 1);
  const points: Point[] = new Array(n);
  for (let i = 0; i < n; i++) {
    points[i] = { x: i * widthNormalizer + halfLine, y: toY(data[i]) };
  }
  return points;
}
