import type { HitTestManager } from '../hit-test';
import { stepZoom, wheelZoom } from '../transform';
import type { CursorStyle, Point, ResolvedOverlayOptions } from '../types';
import type {
  InteractionContext,
  InteractionOutcome,
  InteractionPhase,
  KeyInput,
  ModifierState,
  PointerInput,
  WheelInput
} from './types';

export type InteractionOptions = Pick<
  ResolvedOverlayOptions,
  | 'dragThreshold'
  | 'doubleClickThreshold'
  | 'doubleClickDistance'
  | 'zoomStep'
  | 'wheelZoomFactor'
  | 'minZoom'
  | 'maxZoom'
  | 'now'
>;

function distance(a: Point, b: Point): number {
  return Math.sqrt(Math.pow(a.x - b.x, 2) + Math.pow(a.y - b.y, 2));
}

function hasCommand(modifiers: Partial<ModifierState> | undefined): boolean {
  return modifiers?.command === true;
}

/**
 * Pointer/keyboard state machine.
 *
 * Resolves input against the hit rects of the last painted frame and reports
 * what happened as an InteractionOutcome. Holds only transient state: the
 * current phase, the press/drag anchor and the last click for double-click
 * detection.
 */
export class InteractionController {
  private hitTest: HitTestManager;
  private options: InteractionOptions;

  private phase: InteractionPhase = 'idle';
  private hoveredId: string | null = null;
  private pressPoint: Point | null = null;
  private lastDragPoint: Point | null = null;
  private pressedItemId: string | null = null;
  private pressIsItemDrag = false;
  private lastClickTime = 0;
  private lastClickPosition: Point | null = null;
  private lastClickItemId: string | null = null;

  constructor(hitTest: HitTestManager, options: InteractionOptions) {
    this.hitTest = hitTest;
    this.options = options;
  }

  getPhase(): InteractionPhase {
    return this.phase;
  }

  getHoveredId(): string | null {
    return this.hoveredId;
  }

  /**
   * Id of the item being dragged, if any.
   */
  getDraggingId(): string | null {
    return this.phase === 'dragging-item' ? this.pressedItemId : null;
  }

  pointerMove(input: PointerInput, context: InteractionContext): InteractionOutcome {
    const point = { x: input.x, y: input.y };

    if (this.phase === 'pressing' && this.pressPoint) {
      if (distance(point, this.pressPoint) < this.options.dragThreshold || !this.lastDragPoint) {
        return this.outcome(context, { consumed: true });
      }
      this.phase = this.pressIsItemDrag ? 'dragging-item' : 'dragging-view';
    }

    if ((this.phase === 'dragging-view' || this.phase === 'dragging-item') && this.lastDragPoint) {
      const dx = point.x - this.lastDragPoint.x;
      const dy = point.y - this.lastDragPoint.y;
      this.lastDragPoint = point;

      if (this.phase === 'dragging-item' && this.pressedItemId) {
        return this.outcome(context, {
          itemOffsetDelta: { itemId: this.pressedItemId, dx, dy },
          consumed: true
        });
      }
      return this.outcome(context, { panDelta: { x: dx, y: dy }, consumed: true });
    }

    this.updateHover(point);
    return this.outcome(context, { consumed: false });
  }

  pointerDown(input: PointerInput, context: InteractionContext): InteractionOutcome {
    if (input.button !== undefined && input.button !== 0) {
      return this.outcome(context, { consumed: false });
    }

    const point = { x: input.x, y: input.y };
    const hit = this.hitTest.queryAtPoint(point);

    this.phase = 'pressing';
    this.pressPoint = point;
    this.lastDragPoint = point;
    this.pressedItemId = hit ? hit.itemId : null;
    this.pressIsItemDrag = hit !== null && context.editMode;
    this.hoveredId = hit ? hit.itemId : null;

    // A command-modified press over empty canvas never drags
    if (!hit && hasCommand(input.modifiers)) {
      this.lastDragPoint = null;
    }

    return this.outcome(context, { consumed: true });
  }

  pointerUp(input: PointerInput, context: InteractionContext): InteractionOutcome {
    const point = { x: input.x, y: input.y };
    const wasPressing = this.phase === 'pressing';
    const hadPress = wasPressing || this.phase === 'dragging-view' || this.phase === 'dragging-item';
    const pressedItemId = this.pressedItemId;
    this.endPress();

    const hit = this.hitTest.queryAtPoint(point);
    this.hoveredId = hit ? hit.itemId : null;
    this.phase = hit ? 'hovering' : 'idle';

    if (!wasPressing || pressedItemId === null || !hit || hit.itemId !== pressedItemId) {
      return this.outcome(context, { consumed: hadPress });
    }

    if (context.editMode && this.isDoubleClick(point, pressedItemId)) {
      this.resetClick();
      return this.outcome(context, { editItemId: pressedItemId, consumed: true });
    }

    this.lastClickTime = this.options.now();
    this.lastClickPosition = point;
    this.lastClickItemId = pressedItemId;

    const text = context.effectiveText(pressedItemId);
    if (text === undefined) {
      return this.outcome(context, { consumed: true });
    }
    return this.outcome(context, {
      copiedText: text,
      copiedItemId: pressedItemId,
      consumed: true
    });
  }

  /**
   * Pointer left the surface: cancel any press or drag.
   */
  pointerLeave(context: InteractionContext): InteractionOutcome {
    this.endPress();
    this.phase = 'idle';
    this.hoveredId = null;
    return this.outcome(context, { consumed: false });
  }

  /**
   * Wheel input pans, or zooms when the command modifier is held.
   */
  wheel(input: WheelInput, context: InteractionContext): InteractionOutcome {
    if (hasCommand(input.modifiers)) {
      const zoom = wheelZoom(context.zoom, input.deltaY, this.options.wheelZoomFactor, this.options);
      return this.outcome(context, { zoom, consumed: true });
    }

    if (input.deltaX === 0 && input.deltaY === 0) {
      return this.outcome(context, { consumed: false });
    }
    return this.outcome(context, {
      panDelta: { x: input.deltaX, y: input.deltaY },
      consumed: true
    });
  }

  key(input: KeyInput, context: InteractionContext): InteractionOutcome {
    if (input.key === 'Escape') {
      const wasDragging = this.phase !== 'idle' && this.phase !== 'hovering';
      if (wasDragging) {
        this.endPress();
        this.phase = this.hoveredId ? 'hovering' : 'idle';
      }
      return this.outcome(context, { clearSearch: true, consumed: true });
    }

    if (!hasCommand(input.modifiers)) {
      return this.outcome(context, { consumed: false });
    }

    switch (input.key) {
      case '+':
      case '=':
        return this.outcome(context, {
          zoom: stepZoom(context.zoom, 'in', this.options.zoomStep, this.options),
          consumed: true
        });
      case '-':
        return this.outcome(context, {
          zoom: stepZoom(context.zoom, 'out', this.options.zoomStep, this.options),
          consumed: true
        });
      case '0':
        return this.outcome(context, { resetView: true, consumed: true });
      default:
        return this.outcome(context, { consumed: false });
    }
  }

  /**
   * Forget transient state, e.g. after the item model was rebuilt.
   */
  reset(): void {
    this.endPress();
    this.resetClick();
    this.phase = 'idle';
    this.hoveredId = null;
  }

  /**
   * Re-resolve hover against freshly registered rects without a pointer
   * event, e.g. after a frame moved items under a resting pointer.
   */
  refreshHover(point: Point | null): void {
    if (this.phase !== 'idle' && this.phase !== 'hovering') return;
    if (!point) {
      this.hoveredId = null;
      this.phase = 'idle';
      return;
    }
    this.updateHover(point);
  }

  private updateHover(point: Point): void {
    const hit = this.hitTest.queryAtPoint(point);
    this.hoveredId = hit ? hit.itemId : null;
    this.phase = hit ? 'hovering' : 'idle';
  }

  private isDoubleClick(point: Point, itemId: string): boolean {
    if (!this.lastClickPosition || this.lastClickItemId !== itemId) return false;
    const elapsed = this.options.now() - this.lastClickTime;
    return (
      elapsed < this.options.doubleClickThreshold &&
      distance(point, this.lastClickPosition) < this.options.doubleClickDistance
    );
  }

  private endPress(): void {
    this.pressPoint = null;
    this.lastDragPoint = null;
    this.pressedItemId = null;
    this.pressIsItemDrag = false;
  }

  private resetClick(): void {
    this.lastClickTime = 0;
    this.lastClickPosition = null;
    this.lastClickItemId = null;
  }

  private cursor(context: InteractionContext): CursorStyle {
    switch (this.phase) {
      case 'dragging-view':
        return 'grabbing';
      case 'dragging-item':
        return 'move';
      case 'pressing':
      case 'hovering':
        if (this.hoveredId) {
          return context.editMode ? 'move' : 'pointer';
        }
        return 'default';
      default:
        return 'default';
    }
  }

  private outcome(
    context: InteractionContext,
    fields: Omit<InteractionOutcome, 'cursor' | 'hoveredId'>
  ): InteractionOutcome {
    return { ...fields, cursor: this.cursor(context), hoveredId: this.hoveredId };
  }
}
