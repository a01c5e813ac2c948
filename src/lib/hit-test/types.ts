/**
 * Hit test types for click/hover detection.
 *
 * All coordinates are in screen space for the frame that registered them.
 */

import type { Rect } from '../types';

/**
 * Types of hit targets.
 */
export type HitTargetType = 'item' | 'checkbox';

/**
 * A hit target registered in the HitTestManager.
 */
export interface HitTarget {
  type: HitTargetType;
  /** Id of the document item */
  itemId: string;
  /** Measured glyph rect */
  rect: Rect;
  /** Glyph rect expanded by the hit padding */
  bounds: Rect;
}
