import type {
  FillConfig,
  GridLineLabelConfig,
  GridLinesConfig,
  LineStyleConfig,
  SmoothingConfig,
  SurfaceSize,
} from './types';

export const defaultLineStyle = {
  width: 2,
  color: '#03A9F4',
  sharpCorners: false,
} as const satisfies Required<Omit<LineStyleConfig, 'gradient'>>;

export const defaultSmoothing = {
  factor: 0.15,
} as const satisfies Required<SmoothingConfig>;

export const defaultFill = {
  mode: 'none',
  color: '#81D4FA',
} as const satisfies Required<Omit<FillConfig, 'gradient'>>;

export const defaultGridLineLabel = {
  color: '#9E9E9E',
  prefix: '',
  precision: 4,
  fontSize: 10,
  fontFamily: 'sans-serif',
} as const satisfies Required<Omit<GridLineLabelConfig, 'formatter'>>;

/**
 * 5 horizontal lines, hairline grey.
 */
export const defaultGridLines = {
  show: false,
  color: '#9E9E9E',
  count: 5,
  width: 0.5,
} as const satisfies Required<Omit<GridLinesConfig, 'label'>>;

export const defaultFallbackSize = {
  width: 300,
  height: 100,
} as const satisfies SurfaceSize;

export const defaultOptions = {
  lineStyle: defaultLineStyle,
  smoothing: false,
  fill: defaultFill,
  points: { mode: 'none' },
  gridLines: { ...defaultGridLines, label: defaultGridLineLabel },
  fallbackSize: defaultFallbackSize,
} as const;
