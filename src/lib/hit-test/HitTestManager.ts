/**
 * HitTestManager - hit testing against the rects of the last painted frame.
 *
 * The renderer registers one target per item while it paints, in paint
 * order. Pointer input is resolved against those same rects, so what the user
 * sees and what the pointer hits never disagree within a frame.
 *
 * When targets overlap, the last registered (topmost painted) wins.
 */

import type { Point, Rect } from '../types';
import { rectContainsPoint } from '../transform';
import type { HitTarget } from './types';

export class HitTestManager {
  private targets: HitTarget[] = [];
  private byItem: Map<string, HitTarget> = new Map();

  /**
   * Clear all hit targets.
   * Called at the start of every frame.
   */
  clear(): void {
    this.targets = [];
    this.byItem.clear();
  }

  /**
   * Register a hit target. Call in paint order.
   */
  register(target: HitTarget): void {
    this.targets.push(target);
    this.byItem.set(target.itemId, target);
  }

  /**
   * Topmost target containing the point, or null if none.
   */
  queryAtPoint(point: Point): HitTarget | null {
    for (let i = this.targets.length - 1; i >= 0; i--) {
      if (rectContainsPoint(this.targets[i].bounds, point)) {
        return this.targets[i];
      }
    }
    return null;
  }

  /**
   * All targets containing the point, topmost first.
   */
  queryAllAtPoint(point: Point): HitTarget[] {
    const hits: HitTarget[] = [];
    for (let i = this.targets.length - 1; i >= 0; i--) {
      if (rectContainsPoint(this.targets[i].bounds, point)) {
        hits.push(this.targets[i]);
      }
    }
    return hits;
  }

  getTarget(itemId: string): HitTarget | null {
    return this.byItem.get(itemId) ?? null;
  }

  getRect(itemId: string): Rect | null {
    return this.byItem.get(itemId)?.rect ?? null;
  }

  /**
   * All registered targets, in paint order.
   * Useful for debugging and testing.
   */
  getTargets(): readonly HitTarget[] {
    return this.targets;
  }

  getTargetCount(): number {
    return this.targets.length;
  }
}
