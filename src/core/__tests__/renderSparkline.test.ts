import { describe, it, expect, vi } from 'vitest';
import { buildDrawProgram, executeDrawProgram, renderSparkline } from '../renderSparkline';
import { createLabelLayoutCache } from '../createLabelLayoutCache';
import { SparklineError } from '../SparklineError';
import { resolveOptions } from '../../config/OptionResolver';
import { formatGridLabelValue } from '../../renderers/gridLines';
import type { SparklineCanvas, TextMeasurer } from '../types';

const measurer: TextMeasurer = {
  measureText: (text, style) => ({ width: text.length * style.fontSize * 0.6, height: style.fontSize }),
};

function createRecordingCanvas() {
  const canvas = {
    measureText: vi.fn(measurer.measureText),
    beginFrame: vi.fn(),
    strokePath: vi.fn(),
    fillPath: vi.fn(),
    drawPoints: vi.fn(),
    drawText: vi.fn(),
  } satisfies SparklineCanvas;
  return canvas;
}

const data = [0, 10, 5];
const size = { width: 102, height: 52 };

describe('buildDrawProgram', () => {
  it('strokes a straight line with the default style', () => {
    expect(buildDrawProgram(measurer, data, size, resolveOptions())).toEqual([
      {
        op: 'strokePath',
        path: [
          { type: 'moveTo', x: 1, y: 51 },
          { type: 'lineTo', x: 51, y: 1 },
          { type: 'lineTo', x: 101, y: 26 },
        ],
        paint: { source: { type: 'color', color: '#03A9F4' }, width: 2, cap: 'round', join: 'round' },
      },
    ]);
  });

  it('orders grid, fill, line and markers back to front', () => {
    const options = resolveOptions({
      fill: { mode: 'below' },
      points: { mode: 'all' },
      gridLines: { show: true, count: 2 },
    });
    const ops = buildDrawProgram(measurer, data, size, options).map((op) => op.op);
    expect(ops).toEqual(['strokePath', 'drawText', 'strokePath', 'drawText', 'fillPath', 'strokePath', 'drawPoints']);
  });

  it('is deterministic', () => {
    const options = resolveOptions({ smoothing: true, fill: { mode: 'above' }, gridLines: { show: true } });
    expect(buildDrawProgram(measurer, data, size, options)).toEqual(buildDrawProgram(measurer, data, size, options));
  });

  it('narrows the line by the label reserve', () => {
    const options = resolveOptions({ gridLines: { show: true, count: 3 } });
    const program = buildDrawProgram(measurer, [0, 100], { width: 100, height: 52 }, options);
    const line = program[program.length - 1];

    expect(line).toEqual({
      op: 'strokePath',
      path: [
        { type: 'moveTo', x: 1, y: 51 },
        { type: 'lineTo', x: 61, y: 1 },
      ],
      paint: { source: { type: 'color', color: '#03A9F4' }, width: 2, cap: 'round', join: 'round' },
    });
  });

  it('draws a single sample as one centred point', () => {
    expect(buildDrawProgram(measurer, [7], size, resolveOptions({ fill: { mode: 'below' } }))).toEqual([
      { op: 'drawPoints', points: [{ x: 51, y: 26 }], paint: { color: '#03A9F4', size: 2 } },
    ]);
  });

  it('marks only the last point for mode last', () => {
    const program = buildDrawProgram(measurer, data, size, resolveOptions({ points: { mode: 'last', size: 6, color: 'red' } }));
    expect(program[program.length - 1]).toEqual({
      op: 'drawPoints',
      points: [{ x: 101, y: 26 }],
      paint: { color: 'red', size: 6 },
    });
  });

  it('keeps a flat series at mid-height', () => {
    const program = buildDrawProgram(measurer, [3, 3], size, resolveOptions());
    expect(program[0]).toMatchObject({
      path: [
        { type: 'moveTo', x: 1, y: 26 },
        { type: 'lineTo', x: 101, y: 26 },
      ],
    });
  });

  it('is empty for a surface without area', () => {
    expect(buildDrawProgram(measurer, data, { width: 0, height: 52 }, resolveOptions())).toEqual([]);
    expect(buildDrawProgram(measurer, data, { width: 102, height: Number.NaN }, resolveOptions())).toEqual([]);
  });

  it('validates the data before looking at the size', () => {
    expect(() => buildDrawProgram(measurer, [], { width: 0, height: 0 }, resolveOptions())).toThrow(SparklineError);
    expect(() => buildDrawProgram(measurer, [1, Number.NaN], size, resolveOptions())).toThrow(
      'invalid input: data[1] is NaN; every value must be a finite number'
    );
  });

  it('reuses cached label layouts', () => {
    const cache = createLabelLayoutCache();
    const options = resolveOptions({ gridLines: { show: true } });
    const measureText = vi.fn(measurer.measureText);
    const countingMeasurer: TextMeasurer = { measureText };

    buildDrawProgram(countingMeasurer, data, size, options, cache);
    buildDrawProgram(countingMeasurer, data, size, options, cache);

    expect(measureText).toHaveBeenCalledTimes(5);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, entries: 1 });
  });
});

describe('buildDrawProgram geometry bounds', () => {
  const datasets: ReadonlyArray<readonly [string, number[]]> = [
    ['mixed sign', Array.from({ length: 40 }, (_, i) => Math.sin(i / 3) * 10 - 2)],
    ['flat', new Array<number>(12).fill(4.5)],
    ['large magnitudes', [-1e308, 1e308, 0, 5e307, -3e307]],
    ['tiny magnitudes', Array.from({ length: 25 }, (_, i) => (i % 7) * 1e-9 - 2e-9)],
    ['all negative', Array.from({ length: 17 }, (_, i) => -1000 - i * i)],
    ['two samples', [1, 2]],
  ];
  const options = resolveOptions({ fill: { mode: 'below' }, points: { mode: 'all' }, gridLines: { show: true } });
  const surface = { width: 300, height: 100 };
  const eps = 1e-9;

  for (const [name, values] of datasets) {
    it(`keeps every coordinate finite and inside the drawable band: ${name}`, () => {
      const program = buildDrawProgram(measurer, values, surface, options);

      const points = program.flatMap((op) => (op.op === 'drawPoints' ? op.points : []));
      expect(points).toHaveLength(values.length);
      for (let i = 0; i < points.length; i++) {
        const { x, y } = points[i];
        expect(Number.isFinite(x) && Number.isFinite(y)).toBe(true);
        // drawable height 98 plus the 2px stroke
        expect(y).toBeGreaterThanOrEqual(1 - eps);
        expect(y).toBeLessThanOrEqual(99 + eps);
        if (i > 0) expect(x).toBeGreaterThanOrEqual(points[i - 1].x);
      }

      const pathCoords = program.flatMap((op) =>
        op.op === 'strokePath' || op.op === 'fillPath'
          ? op.path.flatMap((cmd) => (cmd.type === 'close' ? [] : [cmd.x, cmd.y]))
          : []
      );
      expect(pathCoords.every(Number.isFinite)).toBe(true);

      const labels = program.flatMap((op) => (op.op === 'drawText' ? [op] : []));
      expect(labels).toHaveLength(5);
      expect(labels.every((op) => Number.isFinite(op.position.x) && Number.isFinite(op.position.y))).toBe(true);
      expect(labels[0].text).toBe(formatGridLabelValue(Math.max(...values)));
      expect(labels[4].text).toBe(formatGridLabelValue(Math.min(...values)));
    });
  }
});

describe('executeDrawProgram', () => {
  it('dispatches each op to the matching canvas call', () => {
    const canvas = createRecordingCanvas();
    const style = { color: '#000', fontSize: 10, fontFamily: 'serif', fontWeight: 'normal' } as const;
    const points = [{ x: 1, y: 2 }];

    executeDrawProgram(canvas, [
      { op: 'fillPath', path: [], paint: { source: { type: 'color', color: 'red' } } },
      { op: 'drawPoints', points, paint: { color: 'blue', size: 4 } },
      { op: 'drawText', text: 'hi', position: { x: 3, y: 4 }, style },
    ]);

    expect(canvas.fillPath).toHaveBeenCalledWith([], { source: { type: 'color', color: 'red' } });
    expect(canvas.drawPoints).toHaveBeenCalledWith(points, { color: 'blue', size: 4 });
    expect(canvas.drawText).toHaveBeenCalledWith('hi', { x: 3, y: 4 }, style);
    expect(canvas.strokePath).not.toHaveBeenCalled();
  });
});

describe('renderSparkline', () => {
  it('begins the frame before drawing and returns the program', () => {
    const canvas = createRecordingCanvas();
    const program = renderSparkline(canvas, data, size, resolveOptions());

    expect(canvas.beginFrame).toHaveBeenCalledWith(size);
    expect(canvas.strokePath).toHaveBeenCalledTimes(1);
    expect(canvas.beginFrame.mock.invocationCallOrder[0]).toBeLessThan(
      canvas.strokePath.mock.invocationCallOrder[0]
    );
    expect(program).toHaveLength(1);
  });

  it('does not touch the canvas for invalid data', () => {
    const canvas = createRecordingCanvas();
    expect(() => renderSparkline(canvas, [], size, resolveOptions())).toThrow('invalid input: empty dataset');
    expect(canvas.beginFrame).not.toHaveBeenCalled();
  });

  it('clears but draws nothing on a zero-size surface', () => {
    const canvas = createRecordingCanvas();
    renderSparkline(canvas, data, { width: 0, height: 0 }, resolveOptions());

    expect(canvas.beginFrame).toHaveBeenCalledTimes(1);
    expect(canvas.strokePath).not.toHaveBeenCalled();
    expect(canvas.drawPoints).not.toHaveBeenCalled();
  });
});
