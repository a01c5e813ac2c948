import { EventEmitter } from '../events/EventEmitter';
import type { KeyInput, ModifierState, PointerInput, WheelInput } from '../interaction/types';
import type { ClipboardManager } from '../clipboard';
import type { Size } from '../types';
import { CanvasSurface } from './CanvasSurface';

/** Pixels per wheel "line" when the browser reports line deltas */
const WHEEL_LINE_HEIGHT = 16;

/**
 * Receives translated DOM input. Wheel and key handlers return true when the
 * input was used, so the browser default is suppressed.
 */
export interface CanvasInputHandler {
  pointerMove(input: PointerInput): void;
  pointerDown(input: PointerInput): void;
  pointerUp(input: PointerInput): void;
  pointerLeave(): void;
  wheel(input: WheelInput): boolean;
  key(input: KeyInput): boolean;
  /** Paint one frame */
  frame(): void;
}

export interface CanvasManagerEvents {
  resize: Size;
}

function modifiersOf(e: MouseEvent | KeyboardEvent): ModifierState {
  return {
    command: e.metaKey || e.ctrlKey,
    shift: e.shiftKey,
    alt: e.altKey
  };
}

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * DOM shell: owns the canvas, turns mouse, wheel and keyboard events into
 * engine input, schedules frames and follows the container's size.
 */
export class CanvasManager extends EventEmitter<CanvasManagerEvents> {
  private container: HTMLElement;
  private canvas: HTMLCanvasElement;
  private surface: CanvasSurface;
  private handler: CanvasInputHandler;
  private resizeObserver: ResizeObserver | null = null;
  private frameRequest: number | null = null;
  private timers: Set<ReturnType<typeof setTimeout>> = new Set();
  private disposers: Array<() => void> = [];
  private destroyed = false;

  constructor(container: HTMLElement, handler: CanvasInputHandler, clipboard: ClipboardManager) {
    super();
    this.container = container;
    this.handler = handler;

    this.canvas = document.createElement('canvas');
    this.canvas.className = 'page-overlay-canvas';
    this.canvas.tabIndex = 0;
    this.canvas.style.display = 'block';
    this.canvas.style.outline = 'none';
    this.container.appendChild(this.canvas);

    this.surface = new CanvasSurface(this.canvas, clipboard);
    this.syncSize();
    this.setupEventListeners();
    this.setupResizeObserver();
  }

  getCanvas(): HTMLCanvasElement {
    return this.canvas;
  }

  getSurface(): CanvasSurface {
    return this.surface;
  }

  /**
   * Paint on the next animation frame. Repeated calls before the frame runs
   * collapse into one.
   */
  requestRender(): void {
    if (this.destroyed || this.frameRequest !== null) return;
    this.frameRequest = requestAnimationFrame(() => {
      this.frameRequest = null;
      if (!this.destroyed) {
        this.handler.frame();
      }
    });
  }

  /**
   * Paint once after `delay` ms.
   */
  scheduleRender(delay: number): void {
    if (this.destroyed) return;
    if (delay <= 0) {
      this.requestRender();
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.requestRender();
    }, delay);
    this.timers.add(timer);
  }

  /**
   * Match the canvas to the container's current size.
   */
  syncSize(): void {
    const width = this.container.clientWidth;
    const height = this.container.clientHeight;
    const ratio = typeof window !== 'undefined' ? window.devicePixelRatio || 1 : 1;
    this.surface.resize(width, height, ratio);
    this.emit('resize', { width, height });
  }

  destroy(): void {
    this.destroyed = true;
    if (this.frameRequest !== null) {
      cancelAnimationFrame(this.frameRequest);
      this.frameRequest = null;
    }
    this.timers.forEach(timer => clearTimeout(timer));
    this.timers.clear();
    this.resizeObserver?.disconnect();
    this.resizeObserver = null;
    this.disposers.forEach(dispose => dispose());
    this.disposers = [];
    this.canvas.remove();
    this.removeAllListeners();
  }

  private listen<K extends keyof HTMLElementEventMap>(
    type: K,
    listener: (e: HTMLElementEventMap[K]) => void,
    options?: AddEventListenerOptions
  ): void {
    this.canvas.addEventListener(type, listener, options);
    this.disposers.push(() => this.canvas.removeEventListener(type, listener, options));
  }

  private setupEventListeners(): void {
    this.listen('mousemove', e => this.handler.pointerMove(this.pointerInput(e)));
    this.listen('mousedown', e => {
      this.canvas.focus();
      this.handler.pointerDown(this.pointerInput(e));
    });
    this.listen('mouseup', e => this.handler.pointerUp(this.pointerInput(e)));
    this.listen('mouseleave', () => this.handler.pointerLeave());
    this.listen(
      'wheel',
      e => {
        if (this.handler.wheel(this.wheelInput(e))) {
          e.preventDefault();
        }
      },
      { passive: false }
    );
    this.listen('keydown', e => {
      if (this.handler.key({ key: e.key, modifiers: modifiersOf(e) })) {
        e.preventDefault();
      }
    });
  }

  private setupResizeObserver(): void {
    if (typeof ResizeObserver === 'undefined') return;
    this.resizeObserver = new ResizeObserver(() => {
      this.syncSize();
      this.requestRender();
    });
    this.resizeObserver.observe(this.container);
  }

  private pointerInput(e: MouseEvent): PointerInput {
    const rect = this.canvas.getBoundingClientRect();
    return {
      x: e.clientX - rect.left,
      y: e.clientY - rect.top,
      button: e.button,
      modifiers: modifiersOf(e)
    };
  }

  /**
   * DOM wheel deltas point in the scroll direction; engine deltas point in
   * the pan direction.
   */
  private wheelInput(e: WheelEvent): WheelInput {
    const rect = this.canvas.getBoundingClientRect();
    const unit =
      e.deltaMode === 1 ? WHEEL_LINE_HEIGHT : e.deltaMode === 2 ? this.surface.getSize().height : 1;
    return {
      x: e.clientX - rect.left,
      y: e.clientY - rect.top,
      deltaX: negate(e.deltaX * unit),
      deltaY: negate(e.deltaY * unit),
      modifiers: modifiersOf(e)
    };
  }
}
