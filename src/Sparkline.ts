import { resolveOptions } from './config/OptionResolver';
import type { ResolvedSparklineOptions } from './config/OptionResolver';
import type { SparklineData, SparklineOptions, SurfaceSize } from './config/types';
import { createLabelLayoutCache } from './core/createLabelLayoutCache';
import type { LabelLayoutCacheStats } from './core/createLabelLayoutCache';
import { renderSparkline } from './core/renderSparkline';
import { shouldRepaint } from './core/shouldRepaint';
import type { RenderInputs } from './core/shouldRepaint';
import type { DrawProgram, SparklineCanvas } from './core/types';
import { validateData } from './data/resolveBounds';
import { resolveSurfaceSize } from './utils/surfaceSize';

export interface SparklineInstance {
  readonly options: Readonly<SparklineOptions>;
  readonly resolvedOptions: ResolvedSparklineOptions;
  readonly size: SurfaceSize;
  readonly disposed: boolean;
  /** Replaces all options. Throws `SparklineError` if they are invalid; the previous options stay in effect. */
  setOption(options: SparklineOptions): void;
  /** Throws `SparklineError` for empty or non-finite data; the previous data stays in effect. */
  setData(data: SparklineData): void;
  /** Size reported by the host. Infinite dimensions take `fallbackSize`. */
  resize(size: SurfaceSize): void;
  /**
   * Draws the current inputs. Returns `false` without drawing when nothing
   * observable changed since the last frame.
   */
  render(): boolean;
  /** Draws unconditionally. */
  renderFrame(): void;
  getLastProgram(): DrawProgram | null;
  getLabelCacheStats(): LabelLayoutCacheStats;
  dispose(): void;
}

/**
 * Creates a sparkline bound to `canvas`.
 *
 * Options and data are validated immediately. Until the host calls `resize`,
 * the sparkline renders at its fallback size.
 */
export function createSparkline(
  canvas: SparklineCanvas,
  data: SparklineData,
  options: SparklineOptions = {}
): SparklineInstance {
  let currentOptions: SparklineOptions = options;
  let resolvedOptions: ResolvedSparklineOptions = resolveOptions(options);
  validateData(data);
  let currentData: SparklineData = data;
  let reportedSize: SurfaceSize = { width: Number.POSITIVE_INFINITY, height: Number.POSITIVE_INFINITY };
  let size: SurfaceSize = resolveSurfaceSize(reportedSize, resolvedOptions.fallbackSize);

  let disposed = false;
  let warnedDisposed = false;
  let lastInputs: RenderInputs | null = null;
  let lastProgram: DrawProgram | null = null;
  const labelCache = createLabelLayoutCache();

  // Prevent spamming console.warn for repeated misuse.
  const isDisposed = (method: string): boolean => {
    if (!disposed) return false;
    if (!warnedDisposed) {
      warnedDisposed = true;
      console.warn(`Sparkline.${method}(): instance is disposed; the call was ignored.`);
    }
    return true;
  };

  const draw = (): void => {
    lastProgram = renderSparkline(canvas, currentData, size, resolvedOptions, labelCache);
    // Snapshot the data: hosts may mutate their array in place between frames.
    lastInputs = { data: Array.from(currentData), size, options: resolvedOptions };
  };

  const instance: SparklineInstance = {
    get options() {
      return currentOptions;
    },
    get resolvedOptions() {
      return resolvedOptions;
    },
    get size() {
      return size;
    },
    get disposed() {
      return disposed;
    },
    setOption(nextOptions) {
      if (isDisposed('setOption')) return;
      resolvedOptions = resolveOptions(nextOptions);
      currentOptions = nextOptions;
      size = resolveSurfaceSize(reportedSize, resolvedOptions.fallbackSize);
    },
    setData(nextData) {
      if (isDisposed('setData')) return;
      validateData(nextData);
      currentData = nextData;
    },
    resize(nextSize) {
      if (isDisposed('resize')) return;
      reportedSize = { width: nextSize.width, height: nextSize.height };
      size = resolveSurfaceSize(reportedSize, resolvedOptions.fallbackSize);
    },
    render() {
      if (isDisposed('render')) return false;
      if (!shouldRepaint(lastInputs, { data: currentData, size, options: resolvedOptions })) return false;
      draw();
      return true;
    },
    renderFrame() {
      if (isDisposed('renderFrame')) return;
      draw();
    },
    getLastProgram() {
      return lastProgram;
    },
    getLabelCacheStats() {
      return labelCache.getStats();
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      labelCache.clear();
      lastInputs = null;
      lastProgram = null;
    },
  };

  return instance;
}

export const Sparkline = { create: createSparkline } as const;
