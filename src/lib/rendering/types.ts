/**
 * Render surface capability interface.
 *
 * Everything the engine needs from a display goes through this interface, so
 * transform, layout and interaction logic run without a real canvas.
 */

import type { CursorStyle, Point, Rect, Size } from '../types';
import type { FontSpec } from '../text/types';

export type TextBaseline = 'top' | 'middle' | 'bottom';
export type TextAlign = 'left' | 'center' | 'right';

export interface TextPaint {
  font: FontSpec;
  color: string;
  /** Default: 'left' */
  align?: TextAlign;
  /** Default: 'top' */
  baseline?: TextBaseline;
}

export interface StrokePaint {
  color: string;
  width: number;
  /** Corner radius for rectangles */
  radius?: number;
}

/**
 * An RGBA pixel buffer, e.g. a rasterized page.
 */
export interface RasterImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export interface RenderSurface {
  /** Current drawable size in screen pixels */
  getSize(): Size;
  clear(fill: string): void;
  drawRect(rect: Rect, fill: string): void;
  strokeRect(rect: Rect, stroke: StrokePaint): void;
  drawLine(from: Point, to: Point, stroke: StrokePaint): void;
  drawText(text: string, position: Point, paint: TextPaint): void;
  drawImage(image: RasterImage, rect: Rect): void;
  /** Advance width of `text` in screen pixels */
  measureText(text: string, font: FontSpec): number;
  setCursor(cursor: CursorStyle): void;
  /** Resolves once the text is on the system clipboard; rejects on failure */
  copyToClipboard(text: string): Promise<void>;
}
