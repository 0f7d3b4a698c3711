import { describe, it, expect } from 'vitest';
import { buildFillPath } from '../buildFillPath';
import { buildLinearPath } from '../buildLinePath';
import type { Point } from '../../core/types';

const points: Point[] = [
  { x: 1, y: 51 },
  { x: 51, y: 1 },
  { x: 101, y: 26 },
];
const size = { width: 102, height: 52 };
const linePath = buildLinearPath(points);

describe('buildFillPath', () => {
  it('closes the line against the bottom edge', () => {
    expect(buildFillPath(linePath, points, 'below', size, 2)).toEqual([
      ...linePath,
      { type: 'lineTo', x: 102, y: 26 },
      { type: 'lineTo', x: 102, y: 52 },
      { type: 'lineTo', x: 0, y: 52 },
      { type: 'lineTo', x: 0, y: 51 },
      { type: 'close' },
    ]);
  });

  it('closes the line against the top edge', () => {
    expect(buildFillPath(linePath, points, 'above', size, 2)).toEqual([
      ...linePath,
      { type: 'lineTo', x: 102, y: 26 },
      { type: 'lineTo', x: 102, y: 0 },
      { type: 'lineTo', x: 0, y: 0 },
      { type: 'lineTo', x: 0, y: 51 },
      { type: 'close' },
    ]);
  });

  it('produces nothing for mode none', () => {
    expect(buildFillPath(linePath, points, 'none', size, 2)).toBeNull();
  });

  it('produces nothing without points', () => {
    expect(buildFillPath([], [], 'below', size, 2)).toBeNull();
  });
});
