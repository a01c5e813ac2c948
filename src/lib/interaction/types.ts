import type { CursorStyle, Point } from '../types';

export type InteractionPhase =
  | 'idle'
  | 'hovering'
  | 'pressing'
  | 'dragging-view'
  | 'dragging-item';

export interface ModifierState {
  /** Command on macOS, Ctrl elsewhere */
  command: boolean;
  shift: boolean;
  alt: boolean;
}

export interface PointerInput extends Point {
  /** Primary button is 0; other buttons are ignored */
  button?: number;
  modifiers?: Partial<ModifierState>;
}

/**
 * Wheel input in screen pixels, signed in the pan direction (positive
 * `deltaY` moves the content down and, with the command modifier, zooms in).
 */
export interface WheelInput extends Point {
  deltaX: number;
  deltaY: number;
  modifiers?: Partial<ModifierState>;
}

export interface KeyInput {
  key: string;
  modifiers?: Partial<ModifierState>;
}

/**
 * Owner state the controller reads but never writes.
 */
export interface InteractionContext {
  zoom: number;
  editMode: boolean;
  /** Override text if present, else content; undefined for unknown ids */
  effectiveText(itemId: string): string | undefined;
}

export interface ItemOffsetDelta {
  itemId: string;
  dx: number;
  dy: number;
}

/**
 * Everything an input produced. The owner folds it back into view and item
 * state for the next frame.
 */
export interface InteractionOutcome {
  panDelta?: Point;
  /** New absolute zoom, already clamped */
  zoom?: number;
  itemOffsetDelta?: ItemOffsetDelta;
  copiedText?: string;
  copiedItemId?: string;
  editItemId?: string;
  clearSearch?: boolean;
  resetView?: boolean;
  cursor: CursorStyle;
  hoveredId: string | null;
  /** True when the input was used and the host should not act on it */
  consumed: boolean;
}
