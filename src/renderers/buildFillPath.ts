import type { FillMode, SurfaceSize } from '../config/types';
import type { PathCommand, Point, SparklinePath } from '../core/types';

/**
 * Closes the stroke path against the top (`'above'`) or bottom (`'below'`)
 * canvas edge. Returns `null` for `'none'` or an empty path.
 *
 * The outline leaves the last point half a stroke width to the right and
 * returns to half a stroke width left of the first point, so the fill edge
 * stays under the line caps.
 */
export function buildFillPath(
  linePath: SparklinePath,
  points: ReadonlyArray<Point>,
  mode: FillMode,
  size: SurfaceSize,
  lineWidth: number
): SparklinePath | null {
  if (mode === 'none' || points.length === 0 || linePath.length === 0) return null;

  const first = points[0];
  const last = points[points.length - 1];
  const halfLine = lineWidth / 2;
  const edgeY = mode === 'below' ? size.height : 0;

  const commands: PathCommand[] = [
    ...linePath,
    { type: 'lineTo', x: last.x + halfLine, y: last.y },
    { type: 'lineTo', x: size.width, y: edgeY },
    { type: 'lineTo', x: 0, y: edgeY },
    { type: 'lineTo', x: first.x - halfLine, y: first.y },
    { type: 'close' },
  ];
  return commands;
}
