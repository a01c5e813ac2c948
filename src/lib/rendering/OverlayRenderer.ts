import { EventEmitter } from '../events/EventEmitter';
import { HitTestManager } from '../hit-test';
import {
  TextLayout,
  TextMeasurer,
  resolveItemStyle,
  type CheckboxLayoutResult,
  type ItemLayoutResult,
  type ItemStyle,
  type TextLayoutResult
} from '../text';
import {
  expandRect,
  pageScreenRect,
  projectPoint,
  projectRect,
  resolveViewTransform,
  type ViewTransform
} from '../transform';
import type { DocumentItem, DocumentState, Rect, ResolvedOverlayOptions } from '../types';
import type { RasterImage, RenderSurface } from './types';

export const OVERLAY_COLORS = {
  canvas: '#e5e7eb',
  page: '#ffffff',
  pageBorder: '#d1d5db',
  hoverOutline: 'rgb(59, 130, 246)',
  columnGuide: 'rgba(59, 130, 246, 0.24)',
  status: '#374151',
  hint: '#6b7280',
  message: '#b91c1c',
  toastBackground: 'rgba(17, 24, 39, 0.85)',
  toastText: '#10b981',
  checkboxBorder: '#282828'
} as const;

const CHROME_FONT = { size: 12, family: 'sans-serif', bold: false, italic: false };
const TOAST_FONT = { size: 13, family: 'sans-serif', bold: true, italic: false };

const STATUS_POSITION = { x: 10, y: 10 };
const HINT_POSITION = { x: 10, y: 28 };
const TOAST_PADDING = 8;

export const HINT_TEXT = 'Click to copy • Cmd+scroll to zoom';
export const EDIT_HINT_TEXT = 'Drag to move • Double-click to edit';

export interface FrameInput {
  hoveredId?: string | null;
  /** Item being dragged; outlined like the hovered one */
  draggingId?: string | null;
  background?: RasterImage | null;
  /** Transient status (extraction progress or failure) */
  message?: string | null;
}

export interface FrameResult {
  transform: ViewTransform;
  /** Measured glyph rects, by item id, in paint order */
  rects: Map<string, Rect>;
  hoveredId: string | null;
  toastVisible: boolean;
}

export interface OverlayRendererEvents {
  'repaint-requested': { delay: number };
  copy: { itemId: string | null; text: string };
  'copy-failed': { text: string; error: unknown };
}

interface CopyRecord {
  text: string;
  at: number;
}

/**
 * Cut copied text to a toast-sized preview.
 */
export function copyPreview(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...`;
}

/**
 * Per-frame orchestration: transform, layout, paint, and hit-target
 * registration for the interaction controller.
 */
export class OverlayRenderer extends EventEmitter<OverlayRendererEvents> {
  private surface: RenderSurface;
  private options: ResolvedOverlayOptions;
  private hitTest: HitTestManager;
  private measurer: TextMeasurer;
  private textLayout: TextLayout;
  private lastCopy: CopyRecord | null = null;
  private pendingCopy: Promise<boolean> | null = null;

  constructor(surface: RenderSurface, hitTest: HitTestManager, options: ResolvedOverlayOptions) {
    super();
    this.surface = surface;
    this.hitTest = hitTest;
    this.options = options;
    this.measurer = new TextMeasurer(surface, options.lineHeightFactor);
    this.textLayout = new TextLayout(this.measurer, options);
  }

  getLastCopiedText(): string | null {
    return this.lastCopy ? this.lastCopy.text : null;
  }

  /**
   * Whether the copy toast is inside its display window.
   */
  isToastVisible(): boolean {
    if (!this.lastCopy) return false;
    return this.options.now() - this.lastCopy.at < this.options.copyToastDuration;
  }

  /**
   * Paint one frame and register its hit targets.
   */
  renderFrame(state: DocumentState, input: FrameInput = {}): FrameResult {
    const panelSize = this.surface.getSize();
    const transform = resolveViewTransform(
      { panelSize, pageSize: state.pageSize, zoom: state.zoom, pan: state.offset },
      this.options
    );

    this.surface.clear(OVERLAY_COLORS.canvas);
    this.paintPage(transform, state, input.background ?? null);

    this.hitTest.clear();
    const rects = new Map<string, Rect>();

    for (const item of state.items) {
      const rect = this.paintItem(item, state, transform, panelSize.width);
      rects.set(item.id, rect);
      this.hitTest.register({
        type: item.itemType === 'Checkbox' ? 'checkbox' : 'item',
        itemId: item.id,
        rect,
        bounds: expandRect(rect, this.options.hitPadding)
      });
    }

    if (state.columnCount > 1) {
      this.paintColumnGuides(state, transform);
    }

    const hoveredId = input.hoveredId && rects.has(input.hoveredId) ? input.hoveredId : null;
    for (const id of new Set([hoveredId, input.draggingId ?? null])) {
      const rect = id ? rects.get(id) : undefined;
      if (rect) {
        this.surface.strokeRect(expandRect(rect, this.options.hitPadding), {
          color: OVERLAY_COLORS.hoverOutline,
          width: 1,
          radius: 2
        });
      }
    }

    this.paintStatus(state, transform, input.message ?? null);
    if (hoveredId) {
      this.surface.drawText(state.editMode ? EDIT_HINT_TEXT : HINT_TEXT, HINT_POSITION, {
        font: CHROME_FONT,
        color: OVERLAY_COLORS.hint
      });
    }

    const toastVisible = this.isToastVisible();
    if (toastVisible && this.lastCopy) {
      this.paintToast(this.lastCopy.text, panelSize.width);
    }

    return { transform, rects, hoveredId, toastVisible };
  }

  /**
   * Put copied text on the clipboard. On success the toast is armed and a
   * repaint is requested for when it expires; on failure there is no toast.
   * `whenIdle` resolves once the write has settled.
   */
  copy(text: string, itemId: string | null = null): void {
    this.pendingCopy = this.surface.copyToClipboard(text).then(
      () => {
        this.lastCopy = { text, at: this.options.now() };
        this.emit('copy', { itemId, text });
        this.emit('repaint-requested', { delay: 0 });
        this.emit('repaint-requested', { delay: this.options.copyToastDuration });
        return true;
      },
      (error: unknown) => {
        console.warn('[OverlayRenderer] Clipboard write failed:', error);
        this.emit('copy-failed', { text, error });
        return false;
      }
    );
  }

  /**
   * Resolves once any clipboard write in flight has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.pendingCopy) {
      const pending = this.pendingCopy;
      await pending;
      if (this.pendingCopy === pending) {
        this.pendingCopy = null;
      }
    }
  }

  /**
   * Hide the toast immediately.
   */
  dismissToast(): void {
    this.lastCopy = null;
  }

  setSurface(surface: RenderSurface): void {
    this.surface = surface;
    this.measurer.setSurface(surface);
  }

  private paintPage(transform: ViewTransform, state: DocumentState, background: RasterImage | null): void {
    const pageRect = pageScreenRect(transform, state.pageSize);
    this.surface.drawRect(pageRect, OVERLAY_COLORS.page);
    if (background) {
      this.surface.drawImage(background, pageRect);
    }
    this.surface.strokeRect(pageRect, { color: OVERLAY_COLORS.pageBorder, width: 1 });
  }

  private paintItem(
    item: DocumentItem,
    state: DocumentState,
    transform: ViewTransform,
    panelWidth: number
  ): Rect {
    const isMatch = state.searchResults.has(item.id);
    const style = resolveItemStyle(item, transform.scale, isMatch, this.options);
    const text = state.itemTextOverrides.get(item.id) ?? item.content;
    const offset = state.itemOffsets.get(item.id);

    const screen = projectRect(transform, {
      x: item.bbox.left,
      y: item.bbox.top,
      width: item.bbox.width,
      height: item.bbox.height
    });
    const x = screen.x + (offset ? offset.dx : 0);
    const y = screen.y + (offset ? offset.dy : 0);

    let layout: ItemLayoutResult;
    if (item.itemType === 'Checkbox') {
      layout = this.textLayout.layoutCheckbox(text, style.font);
    } else {
      const available = panelWidth - x - this.options.rightMargin;
      const maxWidth = this.textLayout.resolveMaxWidth(text, screen.width, available);
      layout = this.textLayout.layout(text, style.font, maxWidth);
    }

    const rect = { x, y, width: layout.measuredWidth, height: layout.measuredHeight };

    if (style.highlight) {
      this.surface.drawRect(rect, style.highlight);
    }

    if (layout.kind === 'checkbox') {
      this.paintCheckbox(layout, rect, style.color);
    } else {
      this.paintText(layout, rect, style);
    }

    return rect;
  }

  private paintText(
    layout: TextLayoutResult,
    rect: Rect,
    style: ItemStyle
  ): void {
    for (const line of layout.lines) {
      if (line.text.length === 0) continue;
      this.surface.drawText(line.text, { x: rect.x, y: rect.y + line.y }, {
        font: style.font,
        color: style.color
      });
    }
  }

  private paintCheckbox(layout: CheckboxLayoutResult, rect: Rect, color: string): void {
    this.surface.strokeRect(
      { x: rect.x, y: rect.y, width: layout.size, height: layout.size },
      { color: OVERLAY_COLORS.checkboxBorder, width: 1 }
    );

    if (!layout.checked) return;

    const [a, b, c] = layout.checkPoints.map(p => ({ x: rect.x + p.x, y: rect.y + p.y }));
    const stroke = { color, width: 2 };
    this.surface.drawLine(a, b, stroke);
    this.surface.drawLine(b, c, stroke);
  }

  private paintColumnGuides(state: DocumentState, transform: ViewTransform): void {
    const pageRect = pageScreenRect(transform, state.pageSize);
    for (const boundary of state.columnBoundaries) {
      const x = projectPoint(transform, { x: boundary, y: 0 }).x;
      this.surface.drawLine(
        { x, y: pageRect.y },
        { x, y: pageRect.y + pageRect.height },
        { color: OVERLAY_COLORS.columnGuide, width: 1 }
      );
    }
  }

  private paintStatus(state: DocumentState, transform: ViewTransform, message: string | null): void {
    let status = `${state.items.length} items | Zoom: ${Math.round(transform.zoom * 100)}%`;
    if (state.columnCount > 1) {
      status += ` | ${state.columnCount} columns`;
    }
    if (message) {
      status += ` | ${message}`;
    }

    this.surface.drawText(status, STATUS_POSITION, {
      font: CHROME_FONT,
      color: message ? OVERLAY_COLORS.message : OVERLAY_COLORS.status
    });
  }

  private paintToast(text: string, panelWidth: number): void {
    const label = `📋 Copied: ${copyPreview(text, this.options.copyPreviewLength)}`;
    const width = this.measurer.measureText(label, TOAST_FONT) + TOAST_PADDING * 2;
    const height = this.measurer.getLineHeight(TOAST_FONT) + TOAST_PADDING * 2;
    const x = panelWidth - width - STATUS_POSITION.x;

    this.surface.drawRect({ x, y: STATUS_POSITION.y, width, height }, OVERLAY_COLORS.toastBackground);
    this.surface.drawText(label, { x: x + TOAST_PADDING, y: STATUS_POSITION.y + TOAST_PADDING }, {
      font: TOAST_FONT,
      color: OVERLAY_COLORS.toastText
    });
  }
}
