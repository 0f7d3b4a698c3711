/**
 * Paint resolution shared by the sparkline renderers.
 *
 * Gradients take precedence over flat colours and are evaluated over the
 * drawable rect `(0, 0, drawableWidth, drawableHeight)`.
 */

import type {
  ResolvedGradient,
  ResolvedGridLinesConfig,
  ResolvedLineStyleConfig,
  ResolvedPointsConfig,
  ResolvedFillConfig,
} from '../config/OptionResolver';
import type { DrawableArea } from '../data/normalizePoints';
import type { FillPaint, PaintSource, PointPaint, Rect, StrokePaint, TextStyle } from '../core/types';

export const computeDrawableRect = (area: DrawableArea): Rect => ({
  left: 0,
  top: 0,
  width: area.width,
  height: area.height,
});

export const resolvePaintSource = (color: string, gradient: ResolvedGradient | null, rect: Rect): PaintSource =>
  gradient ? { type: 'gradient', gradient, rect } : { type: 'color', color };

export function resolveStrokePaint(lineStyle: ResolvedLineStyleConfig, area: DrawableArea): StrokePaint {
  return {
    source: resolvePaintSource(lineStyle.color, lineStyle.gradient, computeDrawableRect(area)),
    width: lineStyle.width,
    cap: 'round',
    join: lineStyle.sharpCorners ? 'miter' : 'round',
  };
}

export function resolveFillPaint(fill: ResolvedFillConfig, area: DrawableArea): FillPaint {
  return { source: resolvePaintSource(fill.color, fill.gradient, computeDrawableRect(area)) };
}

export function resolvePointPaint(points: ResolvedPointsConfig): PointPaint {
  return { color: points.color, size: points.size };
}

/**
 * The lone marker drawn for a single-sample dataset. Uses the configured point
 * styling (which itself inherits from the line when unset).
 */
export function resolveDegeneratePointPaint(points: ResolvedPointsConfig, lineStyle: ResolvedLineStyleConfig): PointPaint {
  return points.mode === 'none' ? { color: lineStyle.color, size: lineStyle.width } : resolvePointPaint(points);
}

export function resolveGridLinePaint(gridLines: ResolvedGridLinesConfig): StrokePaint {
  return {
    source: { type: 'color', color: gridLines.color },
    width: gridLines.width,
    cap: 'butt',
    join: 'miter',
  };
}

export function resolveLabelStyle(gridLines: ResolvedGridLinesConfig): TextStyle {
  const { label } = gridLines;
  return {
    color: label.color,
    fontSize: label.fontSize,
    fontFamily: label.fontFamily,
    fontWeight: 'bold',
  };
}

export type GradientGeometry =
  | Readonly<{ type: 'linear'; x0: number; y0: number; x1: number; y1: number }>
  | Readonly<{ type: 'radial'; cx: number; cy: number; r: number }>;

/**
 * Maps a gradient's fractional anchors onto the rect it is evaluated over.
 * Radial radii are relative to the rect's shorter side.
 */
export function resolveGradientGeometry(gradient: ResolvedGradient, rect: Rect): GradientGeometry {
  const px = (fx: number): number => rect.left + fx * rect.width;
  const py = (fy: number): number => rect.top + fy * rect.height;

  if (gradient.type === 'linear') {
    return {
      type: 'linear',
      x0: px(gradient.from.x),
      y0: py(gradient.from.y),
      x1: px(gradient.to.x),
      y1: py(gradient.to.y),
    };
  }
  return {
    type: 'radial',
    cx: px(gradient.center.x),
    cy: py(gradient.center.y),
    r: gradient.radius * Math.min(rect.width, rect.height),
  };
}
