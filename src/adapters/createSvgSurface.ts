/**
 * SparklineCanvas that accumulates SVG markup.
 *
 * There is no layout engine behind it, so text is measured with a fixed
 * per-character advance of 0.6em and a line height of 1em.
 *
 * @module createSvgSurface
 */

import type { SurfaceSize } from '../config/types';
import type { PaintSource, SparklineCanvas, SparklinePath } from '../core/types';
import { resolveGradientGeometry } from '../renderers/rendererUtils';

export const SVG_CHAR_ADVANCE_EM = 0.6;

export interface SvgSurface {
  readonly canvas: SparklineCanvas;
  /** Complete `<svg>` document for everything drawn since the last frame began. */
  toSvg(): string;
}

export interface SvgSurfaceOptions {
  /** Prefix for generated gradient ids (default: `'sparkline-gradient-'`). */
  readonly idPrefix?: string;
}

const XML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export const escapeXml = (s: string): string => s.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

/** Two decimals, no trailing zeros. */
export const formatSvgNumber = (n: number): string => String(Math.round(n * 100) / 100);

export function toSvgPathData(path: SparklinePath): string {
  const f = formatSvgNumber;
  return path
    .map((cmd) => {
      switch (cmd.type) {
        case 'moveTo':
          return `M${f(cmd.x)} ${f(cmd.y)}`;
        case 'lineTo':
          return `L${f(cmd.x)} ${f(cmd.y)}`;
        case 'cubicTo':
          return `C${f(cmd.cp1x)} ${f(cmd.cp1y)} ${f(cmd.cp2x)} ${f(cmd.cp2y)} ${f(cmd.x)} ${f(cmd.y)}`;
        case 'close':
          return 'Z';
      }
    })
    .join(' ');
}

export function createSvgSurface(size: SurfaceSize, options?: SvgSurfaceOptions): SvgSurface {
  const idPrefix = options?.idPrefix ?? 'sparkline-gradient-';
  const f = formatSvgNumber;

  let width = size.width;
  let height = size.height;
  let defs: string[] = [];
  let elements: string[] = [];

  const toSvgPaint = (source: PaintSource): string => {
    if (source.type === 'color') return escapeXml(source.color);

    const id = `${idPrefix}${defs.length}`;
    const stops = source.gradient.stops
      .map((stop) => `<stop offset="${f(stop.offset)}" stop-color="${escapeXml(stop.color)}"/>`)
      .join('');
    const geometry = resolveGradientGeometry(source.gradient, source.rect);
    defs.push(
      geometry.type === 'linear'
        ? `<linearGradient id="${id}" gradientUnits="userSpaceOnUse" x1="${f(geometry.x0)}" y1="${f(geometry.y0)}" x2="${f(geometry.x1)}" y2="${f(geometry.y1)}">${stops}</linearGradient>`
        : `<radialGradient id="${id}" gradientUnits="userSpaceOnUse" cx="${f(geometry.cx)}" cy="${f(geometry.cy)}" r="${f(geometry.r)}">${stops}</radialGradient>`
    );
    return `url(#${id})`;
  };

  const canvas: SparklineCanvas = {
    measureText(text, style) {
      return { width: text.length * style.fontSize * SVG_CHAR_ADVANCE_EM, height: style.fontSize };
    },
    beginFrame(frameSize) {
      width = frameSize.width;
      height = frameSize.height;
      defs = [];
      elements = [];
    },
    strokePath(path, paint) {
      elements.push(
        `<path d="${toSvgPathData(path)}" fill="none" stroke="${toSvgPaint(paint.source)}" stroke-width="${f(paint.width)}" stroke-linecap="${paint.cap}" stroke-linejoin="${paint.join}"/>`
      );
    },
    fillPath(path, paint) {
      elements.push(`<path d="${toSvgPathData(path)}" fill="${toSvgPaint(paint.source)}" stroke="none"/>`);
    },
    drawPoints(points, paint) {
      const r = f(paint.size / 2);
      const fill = escapeXml(paint.color);
      for (const p of points) {
        elements.push(`<circle cx="${f(p.x)}" cy="${f(p.y)}" r="${r}" fill="${fill}"/>`);
      }
    },
    drawText(text, position, style) {
      elements.push(
        `<text x="${f(position.x)}" y="${f(position.y)}" fill="${escapeXml(style.color)}" font-family="${escapeXml(style.fontFamily)}" font-size="${f(style.fontSize)}" font-weight="${style.fontWeight}" dominant-baseline="hanging">${escapeXml(text)}</text>`
      );
    },
  };

  const toSvg = (): string => {
    const defsMarkup = defs.length > 0 ? `<defs>${defs.join('')}</defs>` : '';
    return (
      `<svg xmlns="http://www.w3.org/2000/svg" width="${f(width)}" height="${f(height)}" viewBox="0 0 ${f(width)} ${f(height)}">` +
      defsMarkup +
      elements.join('') +
      '</svg>'
    );
  };

  return { canvas, toSvg };
}
