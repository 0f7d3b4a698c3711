/**
 * Geometry, paint and canvas capability types shared by the render pipeline.
 *
 * All coordinates are canvas-local pixels: origin top-left, y grows downward.
 */

import type { ResolvedGradient } from '../config/OptionResolver';
import type { SurfaceSize } from '../config/types';

export type Point = Readonly<{ x: number; y: number }>;

export type Rect = Readonly<{ left: number; top: number; width: number; height: number }>;

export type PathCommand =
  | Readonly<{ type: 'moveTo'; x: number; y: number }>
  | Readonly<{ type: 'lineTo'; x: number; y: number }>
  | Readonly<{ type: 'cubicTo'; cp1x: number; cp1y: number; cp2x: number; cp2y: number; x: number; y: number }>
  | Readonly<{ type: 'close' }>;

export type SparklinePath = ReadonlyArray<PathCommand>;

/**
 * Where a stroke or fill takes its colour from. Gradients carry the rect they
 * are evaluated over.
 */
export type PaintSource =
  | Readonly<{ type: 'color'; color: string }>
  | Readonly<{ type: 'gradient'; gradient: ResolvedGradient; rect: Rect }>;

export type StrokeCap = 'round' | 'butt';
export type StrokeJoin = 'round' | 'miter';

export type StrokePaint = Readonly<{
  source: PaintSource;
  width: number;
  cap: StrokeCap;
  join: StrokeJoin;
}>;

export type FillPaint = Readonly<{ source: PaintSource }>;

/**
 * Markers are round: `size` is the diameter.
 */
export type PointPaint = Readonly<{ color: string; size: number }>;

export type TextStyle = Readonly<{
  color: string;
  fontSize: number;
  fontFamily: string;
  fontWeight: 'normal' | 'bold';
}>;

export type TextMetricsLike = Readonly<{ width: number; height: number }>;

export type TextLayout = Readonly<{ text: string; width: number; height: number }>;

export interface TextMeasurer {
  measureText(text: string, style: TextStyle): TextMetricsLike;
}

/**
 * Drawing surface the renderer issues its program against.
 *
 * Text positions are the top-left corner of the laid-out label.
 */
export interface SparklineCanvas extends TextMeasurer {
  /** Called once before each frame's program; clear previous output here. */
  beginFrame?(size: SurfaceSize): void;
  strokePath(path: SparklinePath, paint: StrokePaint): void;
  fillPath(path: SparklinePath, paint: FillPaint): void;
  drawPoints(points: ReadonlyArray<Point>, paint: PointPaint): void;
  drawText(text: string, position: Point, style: TextStyle): void;
}

export type DrawOp =
  | Readonly<{ op: 'strokePath'; path: SparklinePath; paint: StrokePaint }>
  | Readonly<{ op: 'fillPath'; path: SparklinePath; paint: FillPaint }>
  | Readonly<{ op: 'drawPoints'; points: ReadonlyArray<Point>; paint: PointPaint }>
  | Readonly<{ op: 'drawText'; text: string; position: Point; style: TextStyle }>;

/**
 * Ordered draw operations for one frame; later ops paint over earlier ones.
 */
export type DrawProgram = ReadonlyArray<DrawOp>;
