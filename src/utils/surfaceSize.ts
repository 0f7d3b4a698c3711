import type { SurfaceSize } from '../config/types';

const resolveDimension = (value: number, fallback: number): number => {
  if (value === Number.POSITIVE_INFINITY) return fallback;
  return Number.isFinite(value) && value > 0 ? value : 0;
};

/**
 * Size to render at, given what the host layout reports.
 *
 * An unbounded (infinite) dimension takes the fallback; NaN, negative and
 * -Infinity collapse to 0, which renders nothing.
 */
export function resolveSurfaceSize(size: SurfaceSize, fallback: SurfaceSize): SurfaceSize {
  return {
    width: resolveDimension(size.width, fallback.width),
    height: resolveDimension(size.height, fallback.height),
  };
}
