/**
 * Sparkline configuration types.
 */

/**
 * Values to plot, in order. Each entry becomes one point of the sparkline.
 *
 * Any array-like of numbers is accepted (`number[]`, `Float32Array`, `Float64Array`, ...).
 */
export type SparklineData = ArrayLike<number>;

/**
 * Area to shade between the sparkline and a canvas edge.
 *
 * - `'none'`: draw only the line
 * - `'above'`: closed region from the line to the top edge
 * - `'below'`: closed region from the line to the bottom edge
 */
export type FillMode = 'none' | 'above' | 'below';

/**
 * Which samples get an explicit marker.
 *
 * - `'none'`: no markers
 * - `'all'`: one marker per sample
 * - `'last'`: only the final sample
 */
export type PointsMode = 'none' | 'all' | 'last';

/**
 * Position inside the painted rect, as fractions of its width/height.
 * `{ x: 0, y: 0 }` is the top-left corner, `{ x: 1, y: 1 }` the bottom-right.
 */
export type GradientAnchor = Readonly<{ x: number; y: number }>;

export type GradientStop = Readonly<{
  /** Position along the gradient in [0, 1]. */
  offset: number;
  color: string;
}>;

export interface LinearGradientConfig {
  readonly type: 'linear';
  /** Default: centre-left `{ x: 0, y: 0.5 }`. */
  readonly from?: GradientAnchor;
  /** Default: centre-right `{ x: 1, y: 0.5 }`. */
  readonly to?: GradientAnchor;
  readonly stops: ReadonlyArray<GradientStop>;
}

export interface RadialGradientConfig {
  readonly type: 'radial';
  /** Default: `{ x: 0.5, y: 0.5 }`. */
  readonly center?: GradientAnchor;
  /** Fraction of the painted rect's shorter side. Default: 0.5. */
  readonly radius?: number;
  readonly stops: ReadonlyArray<GradientStop>;
}

export type GradientConfig = LinearGradientConfig | RadialGradientConfig;

export interface LineStyleConfig {
  /** Stroke width in pixels (default: 2). */
  readonly width?: number;
  /** Ignored when `gradient` is set. */
  readonly color?: string;
  readonly gradient?: GradientConfig;
  /**
   * Mitered joins between segments instead of round ones (default: false).
   */
  readonly sharpCorners?: boolean;
}

export interface SmoothingConfig {
  /**
   * How far cubic control points are pulled from the connecting line.
   * Values between 0.1 and 0.3 usually look best (default: 0.15).
   */
  readonly factor?: number;
}

export interface FillConfig {
  readonly mode?: FillMode;
  /** Ignored when `gradient` is set. */
  readonly color?: string;
  readonly gradient?: GradientConfig;
}

export interface PointsConfig {
  /**
   * Defaults to `'all'` when `size` or `color` is provided, `'none'` otherwise.
   */
  readonly mode?: PointsMode;
  /** Marker diameter. Inherits `lineStyle.width` when omitted. */
  readonly size?: number;
  /** Inherits `lineStyle.color` when omitted. */
  readonly color?: string;
}

/**
 * Custom formatter for grid line labels.
 * Replaces the built-in number formatting; the label prefix is still prepended.
 * Return `null` to suppress a specific label.
 */
export type GridLineLabelFormatter = (value: number) => string | null;

export interface GridLineLabelConfig {
  readonly color?: string;
  /** Prepended verbatim, e.g. a currency symbol (default: ''). */
  readonly prefix?: string;
  /** Significant digits used for values whose magnitude is below 1 (default: 4). */
  readonly precision?: number;
  readonly fontSize?: number;
  readonly fontFamily?: string;
  readonly formatter?: GridLineLabelFormatter;
}

export interface GridLinesConfig {
  readonly show?: boolean;
  readonly color?: string;
  /** Number of horizontal lines, at least 2 (default: 5). */
  readonly count?: number;
  readonly width?: number;
  readonly label?: GridLineLabelConfig;
}

export interface SurfaceSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Styling and scale options. The dataset itself is passed separately.
 */
export interface SparklineOptions {
  /** Bottom of the value range. Defaults to the smallest value in `data`. */
  readonly min?: number;
  /** Top of the value range. Defaults to the largest value in `data`. */
  readonly max?: number;
  readonly lineStyle?: LineStyleConfig;
  /** `true` enables cubic smoothing with the default factor. */
  readonly smoothing?: boolean | SmoothingConfig;
  readonly fill?: FillConfig;
  readonly points?: PointsConfig;
  readonly gridLines?: GridLinesConfig;
  /**
   * Size used when the host reports an unbounded (infinite) width or height.
   * Default: 300 x 100.
   */
  readonly fallbackSize?: Partial<SurfaceSize>;
}
