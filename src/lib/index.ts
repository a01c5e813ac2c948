export { PageOverlay } from './core/PageOverlay';
export type {
  PageOverlayOptions,
  PageOverlayEvents,
  OverlaySnapshot,
  OverlayErrorContext
} from './core/types';

export * from './types';

export { EventEmitter } from './events/EventEmitter';
export type { EventHandler } from './events/EventEmitter';

// Coordinate transform
export {
  clampZoom,
  stepZoom,
  wheelZoom,
  computeFitScale,
  resolveViewTransform,
  projectPoint,
  unprojectPoint,
  projectRect,
  unprojectRect,
  pageScreenRect,
  toScreen,
  toDoc,
  toScreenRect,
  toDocRect,
  rectContainsPoint,
  expandRect
} from './transform';
export type { TransformOptions, ZoomLimits, ViewTransform } from './transform';

// Text layout
export {
  TextMeasurer,
  TextLayout,
  toFontString,
  resolveItemStyle,
  resolveFontSize,
  ITEM_TYPE_STYLES,
  SEARCH_MATCH_COLOR,
  SEARCH_HIGHLIGHT_FILL,
  ELLIPSIS,
  CHECKED_MARKERS
} from './text';
export type {
  FontSpec,
  ItemStyle,
  ItemTypeStyle,
  ItemTypeStyleTable,
  LayoutLine,
  TextLayoutResult,
  CheckboxLayoutResult,
  ItemLayoutResult,
  TextLayoutOptions
} from './text';

// Item model
export {
  ItemModel,
  OverlayState,
  buildDocumentState,
  detectColumns,
  normalizeItems,
  normalizeBoundingBox,
  mapItemType,
  makeItemId
} from './model';
export type {
  RawItem,
  RawBoundingBox,
  RawItemStyle,
  ExtractionPage,
  ExtractionSnapshot,
  ColumnLayout,
  OverlayStateEvents
} from './model';

// Search
export { SearchMatcher, matchItems } from './search';

// Hit testing and interaction
export { HitTestManager } from './hit-test';
export type { HitTarget, HitTargetType } from './hit-test';
export { InteractionController } from './interaction';
export type {
  InteractionPhase,
  InteractionContext,
  InteractionOutcome,
  ItemOffsetDelta,
  ModifierState,
  PointerInput,
  WheelInput,
  KeyInput
} from './interaction';

// Rendering
export { OverlayRenderer, CanvasSurface, CanvasManager, copyPreview } from './rendering';
export type {
  RenderSurface,
  RasterImage,
  TextPaint,
  StrokePaint,
  FrameInput,
  FrameResult,
  CanvasInputHandler
} from './rendering';

// Clipboard
export { ClipboardManager } from './clipboard';
export type { ClipboardWriter } from './clipboard';

// Extraction hand-off
export {
  ExtractionMailbox,
  ExtractionCoordinator,
  ExtractionError,
  ExtractionErrorCode,
  parseExtractionJson
} from './extraction';
export type { DocumentAnalysisService, ExtractionSource, SettledExtraction } from './extraction';

// Raster
export { RasterError, RasterErrorCode } from './raster';
export type { RasterProvider } from './raster';
