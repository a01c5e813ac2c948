import type { ItemType, Point } from '../types';

/**
 * Resolved font for one item, in screen pixels.
 */
export interface FontSpec {
  size: number;
  family: string;
  bold: boolean;
  italic: boolean;
}

/**
 * Fill/text colors for one item.
 */
export interface ItemStyle {
  font: FontSpec;
  color: string;
  /** Background fill behind the glyph rect, or null when not highlighted */
  highlight: string | null;
}

/**
 * Per-type style rule.
 */
export interface ItemTypeStyle {
  sizeMultiplier: number;
  color: string;
}

export type ItemTypeStyleTable = Record<ItemType, ItemTypeStyle>;

/**
 * A laid-out visual line. `y` is relative to the top of the layout.
 */
export interface LayoutLine {
  text: string;
  width: number;
  y: number;
}

export interface TextLayoutResult {
  kind: 'text';
  lines: LayoutLine[];
  measuredWidth: number;
  measuredHeight: number;
  lineHeight: number;
  /** True when lines past the line limit were dropped */
  truncated: boolean;
}

export interface CheckboxLayoutResult {
  kind: 'checkbox';
  /** Side of the square glyph */
  size: number;
  checked: boolean;
  /** Check-mark polyline, relative to the glyph's top-left corner */
  checkPoints: [Point, Point, Point];
  measuredWidth: number;
  measuredHeight: number;
}

export type ItemLayoutResult = TextLayoutResult | CheckboxLayoutResult;

export const ELLIPSIS = '…';

/** Characters that mark a checkbox item as checked */
export const CHECKED_MARKERS: readonly string[] = ['x', 'X', '☑', '■'];
