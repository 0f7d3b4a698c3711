/**
 * Single-entry cache for measured grid line labels.
 *
 * Label layouts depend on the value bounds, every grid/label option and the
 * surface that measures them. The cache keeps the layout of the most recent
 * key only; any difference in the key recomputes and replaces it.
 */

import type { ResolvedGridLinesConfig } from '../config/OptionResolver';
import type { ValueBounds } from '../data/resolveBounds';
import type { GridLabelLayout } from '../renderers/gridLines';
import { layoutGridLabels } from '../renderers/gridLines';
import type { TextMeasurer } from './types';
import { sameGridLines } from './shouldRepaint';

export type LabelLayoutCacheStats = Readonly<{
  readonly hits: number;
  readonly misses: number;
  readonly entries: number;
}>;

export interface LabelLayoutCache {
  /**
   * Returns the cached layout when `(measurer, bounds, gridLines)` matches the
   * last call, otherwise measures afresh.
   */
  getOrCreate(measurer: TextMeasurer, bounds: ValueBounds, gridLines: ResolvedGridLinesConfig): GridLabelLayout;
  getStats(): LabelLayoutCacheStats;
  clear(): void;
}

type CacheEntry = Readonly<{
  measurer: TextMeasurer;
  bounds: ValueBounds;
  gridLines: ResolvedGridLinesConfig;
  layout: GridLabelLayout;
}>;

export function createLabelLayoutCache(): LabelLayoutCache {
  let entry: CacheEntry | null = null;
  let hits = 0;
  let misses = 0;

  const getOrCreate: LabelLayoutCache['getOrCreate'] = (measurer, bounds, gridLines) => {
    if (
      entry !== null &&
      entry.measurer === measurer &&
      entry.bounds.min === bounds.min &&
      entry.bounds.max === bounds.max &&
      sameGridLines(entry.gridLines, gridLines)
    ) {
      hits++;
      return entry.layout;
    }

    misses++;
    const layout = layoutGridLabels(measurer, bounds, gridLines);
    entry = { measurer, bounds: { min: bounds.min, max: bounds.max }, gridLines, layout };
    return layout;
  };

  const getStats: LabelLayoutCache['getStats'] = () => ({
    hits,
    misses,
    entries: entry === null ? 0 : 1,
  });

  const clear: LabelLayoutCache['clear'] = () => {
    entry = null;
    hits = 0;
    misses = 0;
  };

  return { getOrCreate, getStats, clear };
}
