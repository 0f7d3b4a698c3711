/**
 * vector-sparkline - sparkline geometry and rendering over an abstract canvas
 */

// Instance API
export { createSparkline, Sparkline } from './Sparkline';
export type { SparklineInstance } from './Sparkline';

export type {
  FillConfig,
  FillMode,
  GradientAnchor,
  GradientConfig,
  GradientStop,
  GridLineLabelConfig,
  GridLineLabelFormatter,
  GridLinesConfig,
  LinearGradientConfig,
  LineStyleConfig,
  PointsConfig,
  PointsMode,
  RadialGradientConfig,
  SmoothingConfig,
  SparklineData,
  SparklineOptions,
  SurfaceSize,
} from './config/types';

// Options defaults + resolution
export { defaultOptions } from './config/defaults';
export { resolveOptions, OptionResolver } from './config/OptionResolver';
export type {
  ResolvedFillConfig,
  ResolvedGradient,
  ResolvedGridLineLabelConfig,
  ResolvedGridLinesConfig,
  ResolvedLineStyleConfig,
  ResolvedPointsConfig,
  ResolvedSmoothingConfig,
  ResolvedSparklineOptions,
} from './config/OptionResolver';

// Render pipeline
export { buildDrawProgram, executeDrawProgram, renderSparkline } from './core/renderSparkline';
export { shouldRepaint } from './core/shouldRepaint';
export type { RenderInputs } from './core/shouldRepaint';
export { createLabelLayoutCache } from './core/createLabelLayoutCache';
export type { LabelLayoutCache, LabelLayoutCacheStats } from './core/createLabelLayoutCache';
export { SparklineError, isSparklineError } from './core/SparklineError';
export type { SparklineErrorCode } from './core/SparklineError';
export type {
  DrawOp,
  DrawProgram,
  FillPaint,
  PaintSource,
  PathCommand,
  Point,
  PointPaint,
  Rect,
  SparklineCanvas,
  SparklinePath,
  StrokePaint,
  TextLayout,
  TextMeasurer,
  TextMetricsLike,
  TextStyle,
} from './core/types';

// Geometry building blocks
export { resolveBounds, validateData } from './data/resolveBounds';
export type { ValueBounds } from './data/resolveBounds';
export { computeDrawableArea, normalizePoints } from './data/normalizePoints';
export type { DrawableArea } from './data/normalizePoints';
export { buildCubicPath, buildLinearPath, buildLinePath } from './renderers/buildLinePath';
export { buildFillPath } from './renderers/buildFillPath';
export { formatGridLabelValue } from './renderers/gridLines';
export { resolveSurfaceSize } from './utils/surfaceSize';

// Canvas adapters
export { createCanvas2DAdapter } from './adapters/createCanvas2DAdapter';
export type { Canvas2DContextLike, CanvasGradientLike } from './adapters/createCanvas2DAdapter';
export { createSvgSurface, toSvgPathData } from './adapters/createSvgSurface';
export type { SvgSurface, SvgSurfaceOptions } from './adapters/createSvgSurface';
