import type {
  FillMode,
  GradientAnchor,
  GradientConfig,
  GradientStop,
  GridLineLabelFormatter,
  PointsMode,
  SparklineOptions,
  SurfaceSize,
} from './types';
import { defaultFallbackSize, defaultFill, defaultGridLineLabel, defaultGridLines, defaultLineStyle, defaultSmoothing } from './defaults';
import { SparklineError } from '../core/SparklineError';

export type ResolvedLinearGradient = Readonly<{
  type: 'linear';
  from: GradientAnchor;
  to: GradientAnchor;
  stops: ReadonlyArray<GradientStop>;
}>;

export type ResolvedRadialGradient = Readonly<{
  type: 'radial';
  center: GradientAnchor;
  radius: number;
  stops: ReadonlyArray<GradientStop>;
}>;

export type ResolvedGradient = ResolvedLinearGradient | ResolvedRadialGradient;

export type ResolvedLineStyleConfig = Readonly<{
  width: number;
  color: string;
  gradient: ResolvedGradient | null;
  sharpCorners: boolean;
}>;

export type ResolvedSmoothingConfig = Readonly<{
  enabled: boolean;
  factor: number;
}>;

export type ResolvedFillConfig = Readonly<{
  mode: FillMode;
  color: string;
  gradient: ResolvedGradient | null;
}>;

export type ResolvedPointsConfig = Readonly<{
  mode: PointsMode;
  size: number;
  color: string;
}>;

export type ResolvedGridLineLabelConfig = Readonly<{
  color: string;
  prefix: string;
  precision: number;
  fontSize: number;
  fontFamily: string;
  formatter: GridLineLabelFormatter | null;
}>;

export type ResolvedGridLinesConfig = Readonly<{
  show: boolean;
  color: string;
  count: number;
  width: number;
  label: ResolvedGridLineLabelConfig;
}>;

export interface ResolvedSparklineOptions {
  /** `null` means "derive from the data". */
  readonly min: number | null;
  /** `null` means "derive from the data". */
  readonly max: number | null;
  readonly lineStyle: ResolvedLineStyleConfig;
  readonly smoothing: ResolvedSmoothingConfig;
  readonly fill: ResolvedFillConfig;
  readonly points: ResolvedPointsConfig;
  readonly gridLines: ResolvedGridLinesConfig;
  readonly fallbackSize: SurfaceSize;
}

const FILL_MODES: ReadonlyArray<FillMode> = ['none', 'above', 'below'];
const POINTS_MODES: ReadonlyArray<PointsMode> = ['none', 'all', 'last'];

const invalidOption = (message: string): SparklineError =>
  new SparklineError('INVALID_OPTION', `resolveOptions: ${message}`);

const normalizeOptionalString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const resolveOptionalFinite = (value: unknown, name: string): number | null => {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalidOption(`${name} must be a finite number, got ${String(value)}.`);
  }
  return value;
};

const resolveNonNegative = (value: unknown, fallback: number, name: string): number => {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw invalidOption(`${name} must be a finite, non-negative number, got ${String(value)}.`);
  }
  return value;
};

const resolvePositive = (value: unknown, fallback: number, name: string): number => {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw invalidOption(`${name} must be a finite, positive number, got ${String(value)}.`);
  }
  return value;
};

const resolveMode = <T extends string>(value: unknown, allowed: ReadonlyArray<T>, fallback: T, name: string): T => {
  if (value === undefined) return fallback;
  const match = allowed.find((mode) => mode === value);
  if (match === undefined) {
    throw invalidOption(`${name} must be one of ${allowed.map((m) => `'${m}'`).join(', ')}, got ${String(value)}.`);
  }
  return match;
};

const resolveAnchor = (anchor: GradientAnchor | undefined, fallback: GradientAnchor, name: string): GradientAnchor => {
  if (anchor === undefined) return fallback;
  if (!Number.isFinite(anchor.x) || !Number.isFinite(anchor.y)) {
    throw invalidOption(`${name} must have finite x and y.`);
  }
  return { x: anchor.x, y: anchor.y };
};

const resolveStops = (stops: ReadonlyArray<GradientStop>, name: string): ReadonlyArray<GradientStop> => {
  if (stops === undefined || stops.length < 2) {
    throw invalidOption(`${name}.stops needs at least two entries.`);
  }
  return stops.map((stop, i) => {
    if (!Number.isFinite(stop.offset) || stop.offset < 0 || stop.offset > 1) {
      throw invalidOption(`${name}.stops[${i}].offset must be within [0, 1], got ${String(stop.offset)}.`);
    }
    const color = normalizeOptionalString(stop.color);
    if (color === undefined) {
      throw invalidOption(`${name}.stops[${i}].color must be a non-empty string.`);
    }
    return { offset: stop.offset, color };
  });
};

export const resolveGradient = (gradient: GradientConfig | undefined, name: string): ResolvedGradient | null => {
  if (gradient === undefined) return null;

  // Untyped callers can pass any string here.
  const type: string = gradient.type;
  switch (gradient.type) {
    case 'linear':
      return {
        type: 'linear',
        from: resolveAnchor(gradient.from, { x: 0, y: 0.5 }, `${name}.from`),
        to: resolveAnchor(gradient.to, { x: 1, y: 0.5 }, `${name}.to`),
        stops: resolveStops(gradient.stops, name),
      };
    case 'radial':
      return {
        type: 'radial',
        center: resolveAnchor(gradient.center, { x: 0.5, y: 0.5 }, `${name}.center`),
        radius: resolveNonNegative(gradient.radius, 0.5, `${name}.radius`),
        stops: resolveStops(gradient.stops, name),
      };
    default:
      throw invalidOption(`${name}.type must be 'linear' or 'radial', got ${type}.`);
  }
};

const resolveGridLineCount = (value: unknown): number => {
  if (value === undefined) return defaultGridLines.count;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 2) {
    throw invalidOption(`gridLines.count must be an integer of at least 2, got ${String(value)}.`);
  }
  return value;
};

export function resolveOptions(userOptions: SparklineOptions = {}): ResolvedSparklineOptions {
  const min = resolveOptionalFinite(userOptions.min, 'min');
  const max = resolveOptionalFinite(userOptions.max, 'max');

  const lineStyle: ResolvedLineStyleConfig = {
    width: resolveNonNegative(userOptions.lineStyle?.width, defaultLineStyle.width, 'lineStyle.width'),
    color: normalizeOptionalString(userOptions.lineStyle?.color) ?? defaultLineStyle.color,
    gradient: resolveGradient(userOptions.lineStyle?.gradient, 'lineStyle.gradient'),
    sharpCorners: userOptions.lineStyle?.sharpCorners ?? defaultLineStyle.sharpCorners,
  };

  const smoothingInput = userOptions.smoothing;
  const smoothing: ResolvedSmoothingConfig =
    typeof smoothingInput === 'object' && smoothingInput !== null
      ? {
          enabled: true,
          factor: resolveOptionalFinite(smoothingInput.factor, 'smoothing.factor') ?? defaultSmoothing.factor,
        }
      : { enabled: smoothingInput === true, factor: defaultSmoothing.factor };

  const fill: ResolvedFillConfig = {
    mode: resolveMode(userOptions.fill?.mode, FILL_MODES, defaultFill.mode, 'fill.mode'),
    color: normalizeOptionalString(userOptions.fill?.color) ?? defaultFill.color,
    gradient: resolveGradient(userOptions.fill?.gradient, 'fill.gradient'),
  };

  // Point styling left unset inherits from the line; setting any of it without
  // a mode turns markers on for every sample.
  const pointsInput = userOptions.points;
  const pointColor = normalizeOptionalString(pointsInput?.color);
  const hasPointStyling = pointsInput?.size !== undefined || pointColor !== undefined;
  const points: ResolvedPointsConfig = {
    mode: resolveMode(pointsInput?.mode, POINTS_MODES, hasPointStyling ? 'all' : 'none', 'points.mode'),
    size: resolveNonNegative(pointsInput?.size, lineStyle.width, 'points.size'),
    color: pointColor ?? lineStyle.color,
  };

  const gridInput = userOptions.gridLines;
  const labelInput = gridInput?.label;
  const precision = labelInput?.precision ?? defaultGridLineLabel.precision;
  if (!Number.isInteger(precision) || precision < 1 || precision > 21) {
    throw invalidOption(`gridLines.label.precision must be an integer in [1, 21], got ${String(precision)}.`);
  }

  const gridLines: ResolvedGridLinesConfig = {
    show: gridInput?.show ?? defaultGridLines.show,
    color: normalizeOptionalString(gridInput?.color) ?? defaultGridLines.color,
    count: resolveGridLineCount(gridInput?.count),
    width: resolveNonNegative(gridInput?.width, defaultGridLines.width, 'gridLines.width'),
    label: {
      color: normalizeOptionalString(labelInput?.color) ?? defaultGridLineLabel.color,
      prefix: typeof labelInput?.prefix === 'string' ? labelInput.prefix : defaultGridLineLabel.prefix,
      precision,
      fontSize: resolvePositive(labelInput?.fontSize, defaultGridLineLabel.fontSize, 'gridLines.label.fontSize'),
      fontFamily: normalizeOptionalString(labelInput?.fontFamily) ?? defaultGridLineLabel.fontFamily,
      formatter: typeof labelInput?.formatter === 'function' ? labelInput.formatter : null,
    },
  };

  const fallbackSize: SurfaceSize = {
    width: resolvePositive(userOptions.fallbackSize?.width, defaultFallbackSize.width, 'fallbackSize.width'),
    height: resolvePositive(userOptions.fallbackSize?.height, defaultFallbackSize.height, 'fallbackSize.height'),
  };

  return {
    min,
    max,
    lineStyle,
    smoothing,
    fill,
    points,
    gridLines,
    fallbackSize,
  };
}

export const OptionResolver = { resolve: resolveOptions } as const;
