/**
 * In-memory RenderSurface that records every draw call.
 */
import type { FontSpec } from '../../lib/text';
import type { RasterImage, RenderSurface, StrokePaint, TextPaint } from '../../lib/rendering';
import type { CursorStyle, Point, Rect, Size } from '../../lib/types';

export type SurfaceCall =
  | { op: 'clear'; fill: string }
  | { op: 'drawRect'; rect: Rect; fill: string }
  | { op: 'strokeRect'; rect: Rect; stroke: StrokePaint }
  | { op: 'drawLine'; from: Point; to: Point; stroke: StrokePaint }
  | { op: 'drawText'; text: string; position: Point; paint: TextPaint }
  | { op: 'drawImage'; image: RasterImage; rect: Rect };

export class RecordingSurface implements RenderSurface {
  calls: SurfaceCall[] = [];
  cursor: CursorStyle = 'default';
  copied: string[] = [];
  /** When set, copyToClipboard rejects with this error */
  clipboardError: Error | null = null;

  constructor(private size: Size = { width: 612, height: 792 }) {}

  getSize(): Size {
    return { ...this.size };
  }

  setSize(size: Size): void {
    this.size = size;
  }

  clear(fill: string): void {
    this.calls.push({ op: 'clear', fill });
  }

  drawRect(rect: Rect, fill: string): void {
    this.calls.push({ op: 'drawRect', rect, fill });
  }

  strokeRect(rect: Rect, stroke: StrokePaint): void {
    this.calls.push({ op: 'strokeRect', rect, stroke });
  }

  drawLine(from: Point, to: Point, stroke: StrokePaint): void {
    this.calls.push({ op: 'drawLine', from, to, stroke });
  }

  drawText(text: string, position: Point, paint: TextPaint): void {
    this.calls.push({ op: 'drawText', text, position, paint });
  }

  drawImage(image: RasterImage, rect: Rect): void {
    this.calls.push({ op: 'drawImage', image, rect });
  }

  /** 8px per character regardless of font */
  measureText(text: string, _font: FontSpec): number {
    return text.length * 8;
  }

  setCursor(cursor: CursorStyle): void {
    this.cursor = cursor;
  }

  copyToClipboard(text: string): Promise<void> {
    if (this.clipboardError) {
      return Promise.reject(this.clipboardError);
    }
    this.copied.push(text);
    return Promise.resolve();
  }

  reset(): void {
    this.calls = [];
  }

  texts(): string[] {
    const result: string[] = [];
    for (const call of this.calls) {
      if (call.op === 'drawText') result.push(call.text);
    }
    return result;
  }

  textCall(text: string): Extract<SurfaceCall, { op: 'drawText' }> | undefined {
    for (const call of this.calls) {
      if (call.op === 'drawText' && call.text === text) return call;
    }
    return undefined;
  }

  ofType<K extends SurfaceCall['op']>(op: K): Array<Extract<SurfaceCall, { op: K }>> {
    const result: Array<Extract<SurfaceCall, { op: K }>> = [];
    for (const call of this.calls) {
      if (isOp(call, op)) result.push(call);
    }
    return result;
  }
}

function isOp<K extends SurfaceCall['op']>(
  call: SurfaceCall,
  op: K
): call is Extract<SurfaceCall, { op: K }> {
  return call.op === op;
}
