/**
 * Dataset validation and value-range resolution.
 *
 * @module resolveBounds
 */

import type { SparklineData } from '../config/types';
import { SparklineError } from '../core/SparklineError';

export type ValueBounds = Readonly<{ min: number; max: number }>;

/**
 * Rejects datasets the geometry cannot represent: empty ones and any containing
 * NaN or +/-Infinity. Must run before any coordinate is computed.
 */
export function validateData(data: SparklineData): void {
  if (data.length === 0) {
    throw new SparklineError('EMPTY_DATASET', 'invalid input: empty dataset');
  }

  for (let i = 0; i < data.length; i++) {
    const v = data[i];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new SparklineError(
        'NON_FINITE_VALUE',
        `invalid input: data[${i}] is ${String(v)}; every value must be a finite number`
      );
    }
  }
}

/**
 * Computes the dataset's min/max in a single pass.
 * Expects data already checked by {@link validateData}.
 */
export function computeDataBounds(data: SparklineData): ValueBounds {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (let i = 0; i < data.length; i++) {
    const v = data[i];
    if (v < min) min = v;
    if (v > max) max = v;
  }

  return { min, max };
}

/**
 * Effective value range. Explicit bounds are used as given, even when
 * `max <= min`; each missing bound is derived from the data.
 */
export function resolveBounds(data: SparklineData, min: number | null, max: number | null): ValueBounds {
  if (min !== null && max !== null) return { min, max };

  const computed = computeDataBounds(data);
  return {
    min: min ?? computed.min,
    max: max ?? computed.max,
  };
}

/**
 * Pixels per value unit for the given drawable height.
 * A zero-span range yields 0 so flat data never divides by zero.
 *
 * The span is taken over halved bounds: `max - min` overflows to Infinity for
 * finite bounds of opposite sign near the double limit.
 */
export function computeHeightNormalizer(bounds: ValueBounds, drawableHeight: number): number {
  const halfSpan = bounds.max / 2 - bounds.min / 2;
  return halfSpan === 0 ? 0 : drawableHeight / 2 / halfSpan;
}
