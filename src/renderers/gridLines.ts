/**
 * Horizontal grid lines with value labels in the right-hand margin.
 *
 * Labels are measured before the line geometry is computed: the widest label
 * decides how much horizontal space the sparkline gives up.
 *
 * @module gridLines
 */

import type { ResolvedGridLinesConfig } from '../config/OptionResolver';
import type { DrawableArea } from '../data/normalizePoints';
import type { ValueBounds } from '../data/resolveBounds';
import type { DrawOp, TextLayout, TextMeasurer } from '../core/types';
import { resolveGridLinePaint, resolveLabelStyle } from './rendererUtils';

/** Gap between the end of a grid line and its label. */
export const LABEL_GAP_PX = 2;

export type GridLabelLayout = Readonly<{
  /** One entry per grid line, top to bottom; `null` where the formatter suppressed the label. */
  labels: ReadonlyArray<TextLayout | null>;
  /** Horizontal space to keep free on the right: widest label plus the gap, or 0 without labels. */
  reserve: number;
}>;

/**
 * Built-in label number formatting, by signed value:
 * - below 1 (negatives included): `precision` significant digits
 * - zero and [1, 999): two decimals
 * - 999 and above: nearest integer
 */
export function formatGridLabelValue(value: number, precision = 4): string {
  if (value === 0) return value.toFixed(2);
  if (value < 1) return value.toPrecision(precision);
  if (value < 999) return value.toFixed(2);
  return String(Math.round(value));
}

/**
 * Values shown on each line, from `max` at the top to `min` at the bottom.
 */
export function computeGridLineValues(bounds: ValueBounds, count: number): number[] {
  // Interpolate between halved bounds; the full span can overflow.
  const halfStep = (bounds.max / 2 - bounds.min / 2) / (count - 1);
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    // Pin the last line to `min` exactly; interpolation can drift by an ulp.
    values.push(i === count - 1 ? bounds.min : (bounds.max / 2 - halfStep * i) * 2);
  }
  return values;
}

export function formatGridLabel(value: number, gridLines: ResolvedGridLinesConfig): string | null {
  const { formatter, prefix, precision } = gridLines.label;
  const body = formatter ? formatter(value) : formatGridLabelValue(value, precision);
  return body === null ? null : prefix + body;
}

export function layoutGridLabels(
  measurer: TextMeasurer,
  bounds: ValueBounds,
  gridLines: ResolvedGridLinesConfig
): GridLabelLayout {
  const style = resolveLabelStyle(gridLines);
  let maxWidth = 0;
  let hasLabel = false;

  const labels = computeGridLineValues(bounds, gridLines.count).map((value): TextLayout | null => {
    const text = formatGridLabel(value, gridLines);
    if (text === null) return null;

    const metrics = measurer.measureText(text, style);
    hasLabel = true;
    maxWidth = Math.max(maxWidth, metrics.width);
    return { text, width: metrics.width, height: metrics.height };
  });

  return { labels, reserve: hasLabel ? maxWidth + LABEL_GAP_PX : 0 };
}

/**
 * Vertical position of grid line `index`, snapped to whole pixels.
 */
export const computeGridLineY = (index: number, count: number, drawableHeight: number): number =>
  Math.round(index * (drawableHeight / (count - 1)));

/**
 * Stroke and label ops for every grid line. Each line spans `[0, area.width]`;
 * its label is vertically centred on the line, just right of its end.
 */
export function buildGridLineOps(
  layout: GridLabelLayout,
  area: DrawableArea,
  gridLines: ResolvedGridLinesConfig
): DrawOp[] {
  const paint = resolveGridLinePaint(gridLines);
  const style = resolveLabelStyle(gridLines);
  const ops: DrawOp[] = [];

  for (let i = 0; i < gridLines.count; i++) {
    const y = computeGridLineY(i, gridLines.count, area.height);
    ops.push({
      op: 'strokePath',
      path: [
        { type: 'moveTo', x: 0, y },
        { type: 'lineTo', x: area.width, y },
      ],
      paint,
    });

    const label = layout.labels[i];
    if (label) {
      ops.push({
        op: 'drawText',
        text: label.text,
        position: { x: area.width + LABEL_GAP_PX, y: y - label.height / 2 },
        style,
      });
    }
  }

  return ops;
}
