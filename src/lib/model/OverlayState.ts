import { EventEmitter } from '../events/EventEmitter';
import type { InteractionOutcome } from '../interaction/types';
import { clampZoom } from '../transform';
import type { ItemOffset, Point, ResolvedOverlayOptions } from '../types';

export interface OverlayStateEvents {
  'zoom-change': { zoom: number };
  'pan-change': { pan: Point };
  'item-offset-change': { itemId: string; offset: ItemOffset | null };
  'item-override-change': { itemId: string; text: string | null };
  'overrides-cleared': { offsets: number; overrides: number };
  'search-change': { query: string };
  'edit-mode-change': { editMode: boolean };
}

export type OverlayStateOptions = Pick<ResolvedOverlayOptions, 'minZoom' | 'maxZoom'>;

/**
 * Mutable view and editor state, owned by the render/interaction loop.
 *
 * Survives item model rebuilds: offsets and overrides are keyed by item id
 * and apply again to any item whose id recurs.
 */
export class OverlayState extends EventEmitter<OverlayStateEvents> {
  private options: OverlayStateOptions;
  private zoom = 1;
  private pan: Point = { x: 0, y: 0 };
  private itemOffsets: Map<string, ItemOffset> = new Map();
  private itemTextOverrides: Map<string, string> = new Map();
  private searchQuery = '';
  private editMode = false;

  constructor(options: OverlayStateOptions) {
    super();
    this.options = options;
    this.zoom = clampZoom(1, options);
  }

  getZoom(): number {
    return this.zoom;
  }

  getPan(): Point {
    return { ...this.pan };
  }

  getItemOffsets(): ReadonlyMap<string, ItemOffset> {
    return this.itemOffsets;
  }

  getItemOffset(itemId: string): ItemOffset | undefined {
    return this.itemOffsets.get(itemId);
  }

  getItemTextOverrides(): ReadonlyMap<string, string> {
    return this.itemTextOverrides;
  }

  getSearchQuery(): string {
    return this.searchQuery;
  }

  isEditMode(): boolean {
    return this.editMode;
  }

  /**
   * Override text if present, else the given content.
   */
  effectiveText(itemId: string, content: string): string {
    return this.itemTextOverrides.get(itemId) ?? content;
  }

  setZoom(zoom: number): void {
    const next = clampZoom(zoom, this.options);
    if (next === this.zoom) return;
    this.zoom = next;
    this.emit('zoom-change', { zoom: next });
  }

  setPan(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;
    if (x === this.pan.x && y === this.pan.y) return;
    this.pan = { x, y };
    this.emit('pan-change', { pan: { x, y } });
  }

  panBy(dx: number, dy: number): void {
    this.setPan(this.pan.x + dx, this.pan.y + dy);
  }

  resetView(): void {
    this.setZoom(1);
    this.setPan(0, 0);
  }

  /**
   * Set an item's screen-space nudge. (0, 0) removes the entry.
   */
  setItemOffset(itemId: string, dx: number, dy: number): void {
    if (!Number.isFinite(dx) || !Number.isFinite(dy)) return;

    if (dx === 0 && dy === 0) {
      if (this.itemOffsets.delete(itemId)) {
        this.emit('item-offset-change', { itemId, offset: null });
      }
      return;
    }

    const offset = { dx, dy };
    this.itemOffsets.set(itemId, offset);
    this.emit('item-offset-change', { itemId, offset: { ...offset } });
  }

  moveItemBy(itemId: string, dx: number, dy: number): void {
    const current = this.itemOffsets.get(itemId) ?? { dx: 0, dy: 0 };
    this.setItemOffset(itemId, current.dx + dx, current.dy + dy);
  }

  /**
   * Replace an item's display text. `null` restores the source text.
   */
  setItemOverrideText(itemId: string, text: string | null): void {
    if (text === null) {
      if (this.itemTextOverrides.delete(itemId)) {
        this.emit('item-override-change', { itemId, text: null });
      }
      return;
    }

    if (this.itemTextOverrides.get(itemId) === text) return;
    this.itemTextOverrides.set(itemId, text);
    this.emit('item-override-change', { itemId, text });
  }

  /**
   * Drop every offset and text override.
   */
  clearOverrides(): void {
    const offsets = this.itemOffsets.size;
    const overrides = this.itemTextOverrides.size;
    this.itemOffsets.clear();
    this.itemTextOverrides.clear();
    this.emit('overrides-cleared', { offsets, overrides });
  }

  setSearchQuery(query: string): void {
    if (query === this.searchQuery) return;
    this.searchQuery = query;
    this.emit('search-change', { query });
  }

  setEditMode(editMode: boolean): void {
    if (editMode === this.editMode) return;
    this.editMode = editMode;
    this.emit('edit-mode-change', { editMode });
  }

  /**
   * Fold a controller outcome into the state.
   */
  applyOutcome(outcome: InteractionOutcome): void {
    if (outcome.resetView) {
      this.resetView();
    }
    if (outcome.zoom !== undefined) {
      this.setZoom(outcome.zoom);
    }
    if (outcome.panDelta) {
      this.panBy(outcome.panDelta.x, outcome.panDelta.y);
    }
    if (outcome.itemOffsetDelta) {
      const { itemId, dx, dy } = outcome.itemOffsetDelta;
      this.moveItemBy(itemId, dx, dy);
    }
    if (outcome.clearSearch) {
      this.setSearchQuery('');
    }
  }

  /**
   * Forget offsets and overrides of ids that are gone. Used when the
   * underlying extraction changes. Returns the number of entries removed.
   */
  pruneTo(ids: ReadonlySet<string>): number {
    let removed = 0;
    for (const id of [...this.itemOffsets.keys()]) {
      if (!ids.has(id)) {
        this.itemOffsets.delete(id);
        removed++;
      }
    }
    for (const id of [...this.itemTextOverrides.keys()]) {
      if (!ids.has(id)) {
        this.itemTextOverrides.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
