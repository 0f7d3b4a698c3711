/**
 * Repaint-skip check: exact equality over every input that can change what
 * gets drawn. No heuristics; any difference means repaint.
 *
 * @module shouldRepaint
 */

import type {
  ResolvedGradient,
  ResolvedGridLinesConfig,
  ResolvedSparklineOptions,
} from '../config/OptionResolver';
import type { SparklineData, SurfaceSize } from '../config/types';

export type RenderInputs = Readonly<{
  data: SparklineData;
  size: SurfaceSize;
  options: ResolvedSparklineOptions;
}>;

export function sameData(a: SparklineData, b: SparklineData): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!Object.is(a[i], b[i])) return false;
  }
  return true;
}

export function sameGradient(a: ResolvedGradient | null, b: ResolvedGradient | null): boolean {
  if (a === b) return true;
  if (a === null || b === null || a.type !== b.type) return false;
  if (a.stops.length !== b.stops.length) return false;
  for (let i = 0; i < a.stops.length; i++) {
    if (a.stops[i].offset !== b.stops[i].offset || a.stops[i].color !== b.stops[i].color) return false;
  }

  if (a.type === 'linear' && b.type === 'linear') {
    return a.from.x === b.from.x && a.from.y === b.from.y && a.to.x === b.to.x && a.to.y === b.to.y;
  }
  if (a.type === 'radial' && b.type === 'radial') {
    return a.center.x === b.center.x && a.center.y === b.center.y && a.radius === b.radius;
  }
  return false;
}

export const sameGridLines = (a: ResolvedGridLinesConfig, b: ResolvedGridLinesConfig): boolean =>
  a === b ||
  (a.show === b.show &&
    a.color === b.color &&
    a.count === b.count &&
    a.width === b.width &&
    a.label.color === b.label.color &&
    a.label.prefix === b.label.prefix &&
    a.label.precision === b.label.precision &&
    a.label.fontSize === b.label.fontSize &&
    a.label.fontFamily === b.label.fontFamily &&
    // Formatters are opaque; only the same function is known to format the same way.
    a.label.formatter === b.label.formatter);

export function sameOptions(a: ResolvedSparklineOptions, b: ResolvedSparklineOptions): boolean {
  if (a === b) return true;
  return (
    a.min === b.min &&
    a.max === b.max &&
    a.lineStyle.width === b.lineStyle.width &&
    a.lineStyle.color === b.lineStyle.color &&
    a.lineStyle.sharpCorners === b.lineStyle.sharpCorners &&
    sameGradient(a.lineStyle.gradient, b.lineStyle.gradient) &&
    a.smoothing.enabled === b.smoothing.enabled &&
    a.smoothing.factor === b.smoothing.factor &&
    a.fill.mode === b.fill.mode &&
    a.fill.color === b.fill.color &&
    sameGradient(a.fill.gradient, b.fill.gradient) &&
    a.points.mode === b.points.mode &&
    a.points.size === b.points.size &&
    a.points.color === b.points.color &&
    sameGridLines(a.gridLines, b.gridLines) &&
    a.fallbackSize.width === b.fallbackSize.width &&
    a.fallbackSize.height === b.fallbackSize.height
  );
}

/**
 * `true` unless `next` is provably identical to what produced the last frame.
 * Returning `true` is always safe.
 */
export function shouldRepaint(previous: RenderInputs | null, next: RenderInputs): boolean {
  if (previous === null) return true;
  return !(
    previous.size.width === next.size.width &&
    previous.size.height === next.size.height &&
    sameData(previous.data, next.data) &&
    sameOptions(previous.options, next.options)
  );
}
