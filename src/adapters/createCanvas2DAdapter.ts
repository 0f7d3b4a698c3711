/**
 * SparklineCanvas over a 2D canvas context.
 *
 * Typed structurally so it accepts a browser `CanvasRenderingContext2D`, an
 * `OffscreenCanvasRenderingContext2D` or any compatible server-side context.
 *
 * @module createCanvas2DAdapter
 */

import type { PaintSource, SparklineCanvas, SparklinePath, TextStyle } from '../core/types';
import { resolveGradientGeometry } from '../renderers/rendererUtils';

export interface CanvasGradientLike {
  addColorStop(offset: number, color: string): void;
}

export interface TextMetrics2DLike {
  readonly width: number;
  readonly actualBoundingBoxAscent?: number;
  readonly actualBoundingBoxDescent?: number;
}

export interface Canvas2DContextLike {
  fillStyle: string | object;
  strokeStyle: string | object;
  lineWidth: number;
  lineCap: string;
  lineJoin: string;
  font: string;
  textAlign: string;
  textBaseline: string;
  save(): void;
  restore(): void;
  clearRect(x: number, y: number, width: number, height: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  bezierCurveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  stroke(): void;
  fill(): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): TextMetrics2DLike;
  createLinearGradient(x0: number, y0: number, x1: number, y1: number): CanvasGradientLike;
  createRadialGradient(x0: number, y0: number, r0: number, x1: number, y1: number, r1: number): CanvasGradientLike;
}

export const toCssFont = (style: TextStyle): string => `${style.fontWeight} ${style.fontSize}px ${style.fontFamily}`;

const isPositiveFinite = (v: number | undefined): v is number => typeof v === 'number' && Number.isFinite(v) && v > 0;

const tracePath = (ctx: Canvas2DContextLike, path: SparklinePath): void => {
  ctx.beginPath();
  for (const cmd of path) {
    switch (cmd.type) {
      case 'moveTo':
        ctx.moveTo(cmd.x, cmd.y);
        break;
      case 'lineTo':
        ctx.lineTo(cmd.x, cmd.y);
        break;
      case 'cubicTo':
        ctx.bezierCurveTo(cmd.cp1x, cmd.cp1y, cmd.cp2x, cmd.cp2y, cmd.x, cmd.y);
        break;
      case 'close':
        ctx.closePath();
        break;
    }
  }
};

const toCanvasPaint = (ctx: Canvas2DContextLike, source: PaintSource): string | CanvasGradientLike => {
  if (source.type === 'color') return source.color;

  const geometry = resolveGradientGeometry(source.gradient, source.rect);
  const gradient =
    geometry.type === 'linear'
      ? ctx.createLinearGradient(geometry.x0, geometry.y0, geometry.x1, geometry.y1)
      : ctx.createRadialGradient(geometry.cx, geometry.cy, 0, geometry.cx, geometry.cy, geometry.r);
  for (const stop of source.gradient.stops) {
    gradient.addColorStop(stop.offset, stop.color);
  }
  return gradient;
};

export function createCanvas2DAdapter(ctx: Canvas2DContextLike): SparklineCanvas {
  const measureText: SparklineCanvas['measureText'] = (text, style) => {
    ctx.save();
    try {
      ctx.font = toCssFont(style);
      const metrics = ctx.measureText(text);
      const ascent = metrics.actualBoundingBoxAscent;
      const descent = metrics.actualBoundingBoxDescent;
      // Contexts without bounding-box metrics fall back to the font size.
      const height = isPositiveFinite(ascent) && typeof descent === 'number' ? ascent + descent : style.fontSize;
      return { width: metrics.width, height };
    } finally {
      ctx.restore();
    }
  };

  const beginFrame: NonNullable<SparklineCanvas['beginFrame']> = (size) => {
    ctx.clearRect(0, 0, size.width, size.height);
  };

  const strokePath: SparklineCanvas['strokePath'] = (path, paint) => {
    ctx.save();
    try {
      tracePath(ctx, path);
      ctx.strokeStyle = toCanvasPaint(ctx, paint.source);
      ctx.lineWidth = paint.width;
      ctx.lineCap = paint.cap;
      ctx.lineJoin = paint.join;
      ctx.stroke();
    } finally {
      ctx.restore();
    }
  };

  const fillPath: SparklineCanvas['fillPath'] = (path, paint) => {
    ctx.save();
    try {
      tracePath(ctx, path);
      ctx.fillStyle = toCanvasPaint(ctx, paint.source);
      ctx.fill();
    } finally {
      ctx.restore();
    }
  };

  const drawPoints: SparklineCanvas['drawPoints'] = (points, paint) => {
    if (points.length === 0) return;
    const radius = paint.size / 2;

    ctx.save();
    try {
      ctx.beginPath();
      for (const p of points) {
        ctx.moveTo(p.x + radius, p.y);
        ctx.arc(p.x, p.y, radius, 0, Math.PI * 2);
      }
      ctx.fillStyle = paint.color;
      ctx.fill();
    } finally {
      ctx.restore();
    }
  };

  const drawText: SparklineCanvas['drawText'] = (text, position, style) => {
    ctx.save();
    try {
      ctx.font = toCssFont(style);
      ctx.fillStyle = style.color;
      ctx.textAlign = 'left';
      ctx.textBaseline = 'top';
      ctx.fillText(text, position.x, position.y);
    } finally {
      ctx.restore();
    }
  };

  return { measureText, beginFrame, strokePath, fillPath, drawPoints, drawText };
}
