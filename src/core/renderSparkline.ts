/**
 * Sparkline render pipeline.
 *
 * Turns `(data, size, options)` into an ordered {@link DrawProgram} and replays
 * it against a {@link SparklineCanvas}. Building the program is pure: the same
 * inputs always produce an identical program.
 *
 * Paint order:
 * 1. grid lines and their labels
 * 2. fill region
 * 3. line stroke
 * 4. point markers
 *
 * @module renderSparkline
 */

import type { ResolvedSparklineOptions } from '../config/OptionResolver';
import type { SparklineData, SurfaceSize } from '../config/types';
import { validateData, resolveBounds } from '../data/resolveBounds';
import { computeDrawableArea, normalizePoints } from '../data/normalizePoints';
import { buildLinePath } from '../renderers/buildLinePath';
import { buildFillPath } from '../renderers/buildFillPath';
import { buildGridLineOps, layoutGridLabels } from '../renderers/gridLines';
import type { GridLabelLayout } from '../renderers/gridLines';
import { selectMarkerPoints } from '../renderers/pointMarkers';
import {
  resolveDegeneratePointPaint,
  resolveFillPaint,
  resolvePointPaint,
  resolveStrokePaint,
} from '../renderers/rendererUtils';
import type { LabelLayoutCache } from './createLabelLayoutCache';
import type { DrawOp, DrawProgram, SparklineCanvas, TextMeasurer } from './types';

const assertUnreachable = (value: never): never => {
  throw new Error(`executeDrawProgram: unhandled draw op ${JSON.stringify(value)}`);
};

/**
 * Builds the draw program for one frame.
 *
 * @throws SparklineError for an empty dataset or non-finite values, before any geometry is computed.
 * Returns an empty program when the surface has no area.
 */
export function buildDrawProgram(
  measurer: TextMeasurer,
  data: SparklineData,
  size: SurfaceSize,
  options: ResolvedSparklineOptions,
  labelCache?: LabelLayoutCache
): DrawProgram {
  validateData(data);

  // `!(x > 0)` also catches NaN.
  if (!(size.width > 0) || !(size.height > 0)) return [];

  const bounds = resolveBounds(data, options.min, options.max);
  const { lineStyle, gridLines } = options;

  let labelLayout: GridLabelLayout | null = null;
  if (gridLines.show) {
    labelLayout = labelCache
      ? labelCache.getOrCreate(measurer, bounds, gridLines)
      : layoutGridLabels(measurer, bounds, gridLines);
  }

  const area = computeDrawableArea(size, lineStyle.width, labelLayout?.reserve ?? 0);
  const points = normalizePoints(data, bounds, area);
  const ops: DrawOp[] = labelLayout ? buildGridLineOps(labelLayout, area, gridLines) : [];

  // One sample: no segment to stroke or region to fill, just a single mark.
  if (points.length === 1) {
    ops.push({ op: 'drawPoints', points, paint: resolveDegeneratePointPaint(options.points, lineStyle) });
    return ops;
  }

  const linePath = buildLinePath(points, options.smoothing);
  const fillPath = buildFillPath(linePath, points, options.fill.mode, size, lineStyle.width);
  if (fillPath) {
    ops.push({ op: 'fillPath', path: fillPath, paint: resolveFillPaint(options.fill, area) });
  }

  ops.push({ op: 'strokePath', path: linePath, paint: resolveStrokePaint(lineStyle, area) });

  const markers = selectMarkerPoints(points, options.points.mode);
  if (markers.length > 0) {
    ops.push({ op: 'drawPoints', points: markers, paint: resolvePointPaint(options.points) });
  }

  return ops;
}

export function executeDrawProgram(canvas: SparklineCanvas, program: DrawProgram): void {
  for (const op of program) {
    switch (op.op) {
      case 'strokePath':
        canvas.strokePath(op.path, op.paint);
        break;
      case 'fillPath':
        canvas.fillPath(op.path, op.paint);
        break;
      case 'drawPoints':
        canvas.drawPoints(op.points, op.paint);
        break;
      case 'drawText':
        canvas.drawText(op.text, op.position, op.style);
        break;
      default:
        assertUnreachable(op);
    }
  }
}

/**
 * Builds the program for `(data, size, options)` and draws it on `canvas`.
 * Returns the program that was drawn.
 */
export function renderSparkline(
  canvas: SparklineCanvas,
  data: SparklineData,
  size: SurfaceSize,
  options: ResolvedSparklineOptions,
  labelCache?: LabelLayoutCache
): DrawProgram {
  const program = buildDrawProgram(canvas, data, size, options, labelCache);
  canvas.beginFrame?.(size);
  executeDrawProgram(canvas, program);
  return program;
}
