/**
 * Hit test system for click/hover detection.
 *
 * @example
 * ```typescript
 * import { HitTestManager } from 'page-overlay';
 *
 * const hitTestManager = new HitTestManager();
 *
 * // Register targets while painting
 * hitTestManager.register({
 *   type: 'item',
 *   itemId: 'item_0_72000_72000',
 *   rect: { x: 92, y: 122, width: 88, height: 14.4 },
 *   bounds: { x: 90, y: 120, width: 92, height: 18.4 }
 * });
 *
 * // Query on click
 * const target = hitTestManager.queryAtPoint({ x: 100, y: 125 });
 * if (target) {
 *   console.log('Hit:', target.itemId);
 * }
 * ```
 */

export { HitTestManager } from './HitTestManager';

export type { HitTarget, HitTargetType } from './types';
