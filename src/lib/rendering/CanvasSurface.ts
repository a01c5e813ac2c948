import type { ClipboardManager } from '../clipboard';
import { toFontString } from '../text';
import type { FontSpec } from '../text';
import type { CursorStyle, Point, Rect, Size } from '../types';
import type { RasterImage, RenderSurface, StrokePaint, TextPaint } from './types';

/**
 * RenderSurface over a 2D canvas context.
 *
 * Drawing is in CSS pixels; the backing store is scaled by the device pixel
 * ratio in `resize`.
 */
export class CanvasSurface implements RenderSurface {
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D;
  private clipboard: ClipboardManager;
  private size: Size;
  private fontCache: Map<string, string> = new Map();
  private imageCache: WeakMap<RasterImage, HTMLCanvasElement> = new WeakMap();

  constructor(canvas: HTMLCanvasElement, clipboard: ClipboardManager) {
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('[CanvasSurface] Canvas 2D context is not available');
    }
    this.canvas = canvas;
    this.ctx = ctx;
    this.clipboard = clipboard;
    this.size = { width: canvas.width, height: canvas.height };
  }

  getCanvas(): HTMLCanvasElement {
    return this.canvas;
  }

  /**
   * Resize the drawable area to `width` x `height` CSS pixels.
   */
  resize(width: number, height: number, pixelRatio: number = 1): void {
    const ratio = Number.isFinite(pixelRatio) && pixelRatio > 0 ? pixelRatio : 1;
    this.size = { width: Math.max(0, width), height: Math.max(0, height) };
    this.canvas.width = Math.round(this.size.width * ratio);
    this.canvas.height = Math.round(this.size.height * ratio);
    this.canvas.style.width = `${this.size.width}px`;
    this.canvas.style.height = `${this.size.height}px`;
    this.ctx.setTransform(ratio, 0, 0, ratio, 0, 0);
  }

  getSize(): Size {
    return { ...this.size };
  }

  clear(fill: string): void {
    this.ctx.clearRect(0, 0, this.size.width, this.size.height);
    this.ctx.fillStyle = fill;
    this.ctx.fillRect(0, 0, this.size.width, this.size.height);
  }

  drawRect(rect: Rect, fill: string): void {
    this.ctx.fillStyle = fill;
    this.ctx.fillRect(rect.x, rect.y, rect.width, rect.height);
  }

  strokeRect(rect: Rect, stroke: StrokePaint): void {
    this.ctx.save();
    this.ctx.strokeStyle = stroke.color;
    this.ctx.lineWidth = stroke.width;

    if (stroke.radius && stroke.radius > 0) {
      this.ctx.beginPath();
      this.roundRect(rect, stroke.radius);
      this.ctx.stroke();
    } else {
      this.ctx.strokeRect(rect.x, rect.y, rect.width, rect.height);
    }

    this.ctx.restore();
  }

  drawLine(from: Point, to: Point, stroke: StrokePaint): void {
    this.ctx.save();
    this.ctx.strokeStyle = stroke.color;
    this.ctx.lineWidth = stroke.width;
    this.ctx.lineCap = 'round';
    this.ctx.beginPath();
    this.ctx.moveTo(from.x, from.y);
    this.ctx.lineTo(to.x, to.y);
    this.ctx.stroke();
    this.ctx.restore();
  }

  drawText(text: string, position: Point, paint: TextPaint): void {
    this.ctx.font = this.fontString(paint.font);
    this.ctx.fillStyle = paint.color;
    this.ctx.textAlign = paint.align ?? 'left';
    this.ctx.textBaseline = paint.baseline ?? 'top';
    this.ctx.fillText(text, position.x, position.y);
  }

  drawImage(image: RasterImage, rect: Rect): void {
    let source = this.imageCache.get(image);
    if (!source) {
      source = document.createElement('canvas');
      source.width = image.width;
      source.height = image.height;
      const sourceCtx = source.getContext('2d');
      if (!sourceCtx) return;

      const imageData = sourceCtx.createImageData(image.width, image.height);
      imageData.data.set(image.data.subarray(0, imageData.data.length));
      sourceCtx.putImageData(imageData, 0, 0);
      this.imageCache.set(image, source);
    }

    this.ctx.drawImage(source, rect.x, rect.y, rect.width, rect.height);
  }

  measureText(text: string, font: FontSpec): number {
    this.ctx.font = this.fontString(font);
    return this.ctx.measureText(text).width;
  }

  setCursor(cursor: CursorStyle): void {
    this.canvas.style.cursor = cursor;
  }

  copyToClipboard(text: string): Promise<void> {
    return this.clipboard.copyText(text);
  }

  private fontString(font: FontSpec): string {
    const key = `${font.italic}-${font.bold}-${font.size}-${font.family}`;
    let value = this.fontCache.get(key);
    if (!value) {
      value = toFontString(font);
      this.fontCache.set(key, value);
    }
    return value;
  }

  /**
   * Rounded rectangle path.
   */
  private roundRect(rect: Rect, radius: number): void {
    const { x, y, width, height } = rect;
    const r = Math.min(radius, width / 2, height / 2);
    this.ctx.moveTo(x + r, y);
    this.ctx.lineTo(x + width - r, y);
    this.ctx.quadraticCurveTo(x + width, y, x + width, y + r);
    this.ctx.lineTo(x + width, y + height - r);
    this.ctx.quadraticCurveTo(x + width, y + height, x + width - r, y + height);
    this.ctx.lineTo(x + r, y + height);
    this.ctx.quadraticCurveTo(x, y + height, x, y + height - r);
    this.ctx.lineTo(x, y + r);
    this.ctx.quadraticCurveTo(x, y, x + r, y);
    this.ctx.closePath();
  }
}
