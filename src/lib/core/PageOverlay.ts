import { ClipboardManager } from '../clipboard';
import { EventEmitter } from '../events/EventEmitter';
import { ExtractionCoordinator, type ExtractionSource } from '../extraction';
import { HitTestManager } from '../hit-test';
import {
  InteractionController,
  type InteractionContext,
  type InteractionOutcome
} from '../interaction';
import {
  ItemModel,
  OverlayState,
  buildDocumentState,
  type ExtractionSnapshot
} from '../model';
import type { RasterProvider } from '../raster';
import {
  CanvasManager,
  OverlayRenderer,
  type FrameResult,
  type RasterImage
} from '../rendering';
import { SearchMatcher } from '../search';
import { stepZoom } from '../transform';
import { resolveOverlayOptions, type ResolvedOverlayOptions } from '../types';
import type { OverlaySnapshot, PageOverlayEvents, PageOverlayOptions } from './types';

const DEFAULT_RASTER_SCALE = 2;

/**
 * Interactive overlay of one reconstructed document page.
 *
 * Owns the item model, the view/editor state and the render loop; the host
 * feeds it extraction snapshots (or an analysis service) and optionally a
 * raster provider for the page background.
 */
export class PageOverlay extends EventEmitter<PageOverlayEvents> {
  private options: ResolvedOverlayOptions;
  private state: OverlayState;
  private model: ItemModel;
  private snapshot: ExtractionSnapshot | null = null;
  private pageIndex = 0;
  private searchMatcher = new SearchMatcher();
  private hitTest = new HitTestManager();
  private controller: InteractionController;
  private clipboard = new ClipboardManager();
  private canvasManager: CanvasManager;
  private renderer: OverlayRenderer;
  private coordinator: ExtractionCoordinator | null;
  private rasterProvider: RasterProvider | null;
  private rasterScale: number;
  private background: RasterImage | null = null;
  private rasterToken = 0;
  private rasterTask: Promise<void> | null = null;
  private extractionWatch: Promise<void> | null = null;
  private statusMessage: string | null = null;
  private lastPointer: { x: number; y: number } | null = null;
  private paintedHoverId: string | null = null;
  private destroyed = false;

  constructor(container: HTMLElement, options: PageOverlayOptions = {}) {
    super();

    if (!container) {
      throw new Error('Container element is required');
    }

    this.options = resolveOverlayOptions(options);
    this.coordinator = options.analysisService
      ? new ExtractionCoordinator(options.analysisService)
      : null;
    this.rasterProvider = options.rasterProvider ?? null;
    this.rasterScale =
      options.rasterScale !== undefined && options.rasterScale > 0
        ? options.rasterScale
        : DEFAULT_RASTER_SCALE;

    this.state = new OverlayState(this.options);
    this.model = ItemModel.empty(this.options.defaultPageSize);
    this.controller = new InteractionController(this.hitTest, this.options);

    this.canvasManager = new CanvasManager(
      container,
      {
        pointerMove: input => {
          this.lastPointer = { x: input.x, y: input.y };
          this.handleOutcome(this.controller.pointerMove(input, this.context()));
        },
        pointerDown: input => {
          this.lastPointer = { x: input.x, y: input.y };
          this.handleOutcome(this.controller.pointerDown(input, this.context()));
        },
        pointerUp: input => {
          this.handleOutcome(this.controller.pointerUp(input, this.context()));
        },
        pointerLeave: () => {
          this.lastPointer = null;
          this.handleOutcome(this.controller.pointerLeave(this.context()));
        },
        wheel: input => this.handleOutcome(this.controller.wheel(input, this.context())),
        key: input => this.handleOutcome(this.controller.key(input, this.context())),
        frame: () => {
          this.render();
        }
      },
      this.clipboard
    );

    this.renderer = new OverlayRenderer(
      this.canvasManager.getSurface(),
      this.hitTest,
      this.options
    );

    this.setupStateListeners();
    this.setupRendererListeners();
    this.loadBackground();
    this.requestRender();
  }

  // ============================================
  // Snapshot and page
  // ============================================

  /**
   * Replace the extraction snapshot. Offsets and overrides of items that no
   * longer exist on any page are dropped.
   */
  loadSnapshot(snapshot: ExtractionSnapshot): void {
    const previous = this.pageIndex;
    this.snapshot = snapshot;
    this.pageIndex = Math.min(previous, this.pageRange(ItemModel.countPages(snapshot)) - 1);
    this.rebuildModel();
    this.state.pruneTo(this.collectIds(snapshot));
    this.controller.reset();

    if (this.pageIndex !== previous) {
      this.background = null;
      this.loadBackground();
      this.emit('page-change', { pageIndex: this.pageIndex, pageCount: this.getPageCount() });
    }
    this.requestRender();
  }

  setPage(pageIndex: number): void {
    const pageCount = this.getPageCount();
    const next = Math.min(Math.max(0, Math.floor(pageIndex) || 0), Math.max(0, pageCount - 1));
    if (next === this.pageIndex) return;

    this.pageIndex = next;
    this.rebuildModel();
    this.controller.reset();
    this.background = null;
    this.loadBackground();
    this.emit('page-change', { pageIndex: next, pageCount });
    this.requestRender();
  }

  getPageIndex(): number {
    return this.pageIndex;
  }

  getPageCount(): number {
    return this.pageRange(this.model.pageCount);
  }

  getModel(): ItemModel {
    return this.model;
  }

  // ============================================
  // Extraction
  // ============================================

  /**
   * Start an analysis of `source` off the render path. Returns false when
   * one is already running or its result has not been picked up yet.
   */
  requestExtraction(source: ExtractionSource): boolean {
    if (!this.coordinator) {
      throw new Error('No analysis service configured');
    }

    const requestId = this.coordinator.request(source);
    if (requestId === null) {
      return false;
    }

    this.statusMessage = 'Extracting...';
    this.emit('extraction-started', { requestId });
    this.extractionWatch = this.coordinator.whenSettled().then(() => this.requestRender());
    this.requestRender();
    return true;
  }

  /**
   * Pick up a finished extraction, if any. Called once per frame.
   * A failure keeps the current items and shows a status message.
   */
  pollExtraction(): boolean {
    const result = this.coordinator?.poll();
    if (!result) return false;

    if (result.ok) {
      this.statusMessage = null;
      this.loadSnapshot(result.snapshot);
      this.emit('extraction-complete', {
        requestId: result.requestId,
        itemCount: this.model.size,
        skipped: this.model.skipped
      });
    } else {
      console.error('[PageOverlay] Extraction failed:', result.error.message);
      this.statusMessage = result.error.message;
      this.emit('extraction-failed', { requestId: result.requestId, error: result.error });
      this.requestRender();
    }
    return true;
  }

  isExtracting(): boolean {
    return this.coordinator?.isBusy() ?? false;
  }

  // ============================================
  // View control
  // ============================================

  setZoom(zoom: number): void {
    this.state.setZoom(zoom);
  }

  zoomIn(): void {
    this.state.setZoom(stepZoom(this.state.getZoom(), 'in', this.options.zoomStep, this.options));
  }

  zoomOut(): void {
    this.state.setZoom(stepZoom(this.state.getZoom(), 'out', this.options.zoomStep, this.options));
  }

  resetView(): void {
    this.state.resetView();
  }

  setPan(x: number, y: number): void {
    this.state.setPan(x, y);
  }

  setSearchQuery(query: string): void {
    this.state.setSearchQuery(query);
  }

  getSearchResults(): ReadonlySet<string> {
    return this.searchMatcher.match(this.model.items, this.state.getSearchQuery());
  }

  setEditMode(editMode: boolean): void {
    this.state.setEditMode(editMode);
  }

  /**
   * Background page image, or null for none.
   */
  setBackground(image: RasterImage | null): void {
    this.rasterToken++;
    this.background = image;
    this.requestRender();
  }

  // ============================================
  // Item mutation
  // ============================================

  setItemOffset(itemId: string, dx: number, dy: number): void {
    this.state.setItemOffset(itemId, dx, dy);
  }

  setItemOverrideText(itemId: string, text: string | null): void {
    this.state.setItemOverrideText(itemId, text);
  }

  clearOverrides(): void {
    this.state.clearOverrides();
  }

  /**
   * Override text if present, else content.
   */
  getEffectiveText(itemId: string): string | undefined {
    const item = this.model.get(itemId);
    return item ? this.state.effectiveText(itemId, item.content) : undefined;
  }

  // ============================================
  // Status and rendering
  // ============================================

  getSnapshot(): OverlaySnapshot {
    const zoom = this.state.getZoom();
    return {
      itemCount: this.model.size,
      zoom,
      zoomPercent: Math.round(zoom * 100),
      pan: this.state.getPan(),
      columnCount: this.model.columns.columnCount,
      matchCount: this.getSearchResults().size,
      searchQuery: this.state.getSearchQuery(),
      pageIndex: this.pageIndex,
      pageCount: this.getPageCount(),
      editMode: this.state.isEditMode(),
      hoveredId: this.controller.getHoveredId(),
      statusMessage: this.statusMessage,
      extracting: this.isExtracting(),
      lastCopiedText: this.renderer.getLastCopiedText()
    };
  }

  /**
   * Paint one frame now.
   */
  render(): FrameResult {
    this.pollExtraction();

    const documentState = buildDocumentState(this.model, this.state, this.getSearchResults());
    const hoveredBefore = this.controller.getHoveredId();
    const frame = this.renderer.renderFrame(documentState, {
      hoveredId: hoveredBefore,
      draggingId: this.controller.getDraggingId(),
      background: this.background,
      message: this.statusMessage
    });

    this.paintedHoverId = frame.hoveredId;

    // Items may have moved under a resting pointer
    this.controller.refreshHover(this.lastPointer);
    if (this.controller.getHoveredId() !== hoveredBefore) {
      this.requestRender();
    }

    return frame;
  }

  requestRender(): void {
    this.canvasManager.requestRender();
  }

  getCanvas(): HTMLCanvasElement {
    return this.canvasManager.getCanvas();
  }

  /**
   * Resolves once pending clipboard writes, extraction and background
   * renders have settled.
   */
  async whenIdle(): Promise<void> {
    await this.renderer.whenIdle();
    if (this.coordinator) {
      await this.coordinator.whenSettled();
    }
    if (this.extractionWatch) {
      await this.extractionWatch;
    }
    if (this.rasterTask) {
      await this.rasterTask;
    }
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.rasterToken++;
    this.canvasManager.destroy();
    this.state.removeAllListeners();
    this.renderer.removeAllListeners();
    this.removeAllListeners();
  }

  // ============================================
  // Internals
  // ============================================

  private context(): InteractionContext {
    return {
      zoom: this.state.getZoom(),
      editMode: this.state.isEditMode(),
      effectiveText: itemId => this.getEffectiveText(itemId)
    };
  }

  private handleOutcome(outcome: InteractionOutcome): boolean {
    this.state.applyOutcome(outcome);

    if (outcome.copiedText !== undefined) {
      this.renderer.copy(outcome.copiedText, outcome.copiedItemId ?? null);
    }

    if (outcome.editItemId) {
      const text = this.getEffectiveText(outcome.editItemId);
      if (text !== undefined) {
        this.emit('edit-requested', { itemId: outcome.editItemId, text });
      }
    }

    this.canvasManager.getSurface().setCursor(outcome.cursor);
    if (outcome.consumed || outcome.hoveredId !== this.paintedHoverId) {
      this.requestRender();
    }
    return outcome.consumed;
  }

  private pageRange(snapshotPages: number): number {
    return Math.max(1, snapshotPages, this.rasterProvider?.pageCount ?? 0);
  }

  /**
   * Build the model for the active page. Pages past the end of the snapshot
   * (ones only the raster provider has) get a model with no items.
   */
  private rebuildModel(): void {
    if (!this.snapshot) {
      this.model = ItemModel.blankPage(this.pageIndex, 0, this.options.defaultPageSize);
      return;
    }

    const model = ItemModel.fromSnapshot(this.snapshot, this.pageIndex, this.options);
    this.model =
      model.pageIndex === this.pageIndex
        ? model
        : ItemModel.blankPage(this.pageIndex, model.pageCount, this.options.defaultPageSize);
  }

  /**
   * Ids of every item on every page of a snapshot.
   */
  private collectIds(snapshot: ExtractionSnapshot): Set<string> {
    const ids = new Set<string>();
    for (let page = 0; page < this.model.pageCount; page++) {
      for (const id of ItemModel.fromSnapshot(snapshot, page, this.options).ids()) {
        ids.add(id);
      }
    }
    return ids;
  }

  private loadBackground(): void {
    const provider = this.rasterProvider;
    if (!provider || this.pageIndex >= provider.pageCount) return;

    const token = ++this.rasterToken;
    const pageSize = this.model.pageSize;
    const target = {
      width: pageSize.width * this.rasterScale,
      height: pageSize.height * this.rasterScale
    };

    this.rasterTask = provider.renderPage(this.pageIndex, target).then(
      image => {
        if (token !== this.rasterToken) return;
        this.background = image;
        this.requestRender();
      },
      (error: unknown) => {
        console.warn('[PageOverlay] Background render failed:', error);
        this.emit('error', { error, context: 'raster' });
      }
    );
  }

  private setupStateListeners(): void {
    this.state.on('zoom-change', e => {
      this.emit('zoom-change', e);
      this.requestRender();
    });
    this.state.on('pan-change', e => {
      this.emit('pan-change', e);
      this.requestRender();
    });
    this.state.on('item-offset-change', e => {
      this.emit('item-offset-change', e);
      this.requestRender();
    });
    this.state.on('item-override-change', e => {
      this.emit('item-override-change', e);
      this.requestRender();
    });
    this.state.on('overrides-cleared', e => {
      this.emit('overrides-cleared', e);
      this.requestRender();
    });
    this.state.on('search-change', e => {
      this.emit('search-change', { query: e.query, matchCount: this.getSearchResults().size });
      this.requestRender();
    });
    this.state.on('edit-mode-change', e => {
      this.controller.reset();
      this.emit('edit-mode-change', e);
      this.requestRender();
    });
  }

  private setupRendererListeners(): void {
    this.renderer.on('copy', e => this.emit('copy', e));
    this.renderer.on('copy-failed', e => this.emit('error', { error: e.error, context: 'clipboard' }));
    this.renderer.on('repaint-requested', e => {
      this.canvasManager.scheduleRender(e.delay);
      this.emit('repaint-requested', e);
    });
  }
}
