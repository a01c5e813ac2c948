export { ItemModel } from './ItemModel';
export type { ItemModelOptions } from './ItemModel';
export { OverlayState } from './OverlayState';
export type { OverlayStateEvents, OverlayStateOptions } from './OverlayState';
export { buildDocumentState } from './DocumentState';
export { detectColumns, MIN_ITEMS_FOR_COLUMNS, COLUMN_GAP_THRESHOLD } from './ColumnDetector';
export {
  normalizeItems,
  normalizeBoundingBox,
  mapItemType,
  makeItemId,
  rawItemPageIndex
} from './ItemNormalizer';
export type { NormalizeOptions, NormalizeResult } from './ItemNormalizer';
export type {
  RawItem,
  RawBoundingBox,
  RawItemStyle,
  ExtractionPage,
  ExtractionSnapshot,
  ColumnLayout
} from './types';
