import { describe, it, expect, vi } from 'vitest';
import { createLabelLayoutCache } from '../createLabelLayoutCache';
import { resolveOptions } from '../../config/OptionResolver';
import type { TextMeasurer } from '../types';

const createMeasurer = () => {
  const measureText = vi.fn((text: string) => ({ width: text.length * 6, height: 10 }));
  const measurer: TextMeasurer = { measureText };
  return { measurer, measureText };
};

describe('createLabelLayoutCache', () => {
  const { gridLines } = resolveOptions({ gridLines: { show: true, count: 3 } });
  const bounds = { min: 0, max: 100 };

  it('measures once for repeated keys', () => {
    const cache = createLabelLayoutCache();
    const { measurer, measureText } = createMeasurer();

    const first = cache.getOrCreate(measurer, bounds, gridLines);
    const second = cache.getOrCreate(measurer, { min: 0, max: 100 }, gridLines);

    expect(second).toBe(first);
    expect(measureText).toHaveBeenCalledTimes(3);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });

  it('treats equal grid settings from separate resolutions as the same key', () => {
    const cache = createLabelLayoutCache();
    const { measurer } = createMeasurer();

    cache.getOrCreate(measurer, bounds, gridLines);
    cache.getOrCreate(measurer, bounds, resolveOptions({ gridLines: { show: true, count: 3 } }).gridLines);

    expect(cache.getStats().hits).toBe(1);
  });

  it('recomputes when the bounds, settings or measurer change', () => {
    const cache = createLabelLayoutCache();
    const { measurer } = createMeasurer();
    const other = createMeasurer();

    cache.getOrCreate(measurer, bounds, gridLines);
    cache.getOrCreate(measurer, { min: 0, max: 50 }, gridLines);
    cache.getOrCreate(measurer, { min: 0, max: 50 }, resolveOptions({ gridLines: { count: 4 } }).gridLines);
    cache.getOrCreate(other.measurer, { min: 0, max: 50 }, resolveOptions({ gridLines: { count: 4 } }).gridLines);

    expect(cache.getStats()).toEqual({ hits: 0, misses: 4, entries: 1 });
  });

  it('clear drops the entry and resets counters', () => {
    const cache = createLabelLayoutCache();
    const { measurer } = createMeasurer();

    cache.getOrCreate(measurer, bounds, gridLines);
    cache.clear();

    expect(cache.getStats()).toEqual({ hits: 0, misses: 0, entries: 0 });
  });
});
