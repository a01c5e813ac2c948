import type { DocumentAnalysisService, ExtractionError } from '../extraction';
import type { ItemOffset, OverlayOptions, Point } from '../types';
import type { RasterProvider } from '../raster';

export interface PageOverlayOptions extends OverlayOptions {
  /** Service used by `requestExtraction` */
  analysisService?: DocumentAnalysisService;
  /** Source of background page images */
  rasterProvider?: RasterProvider;
  /** Resolution multiplier for background renders */
  rasterScale?: number;
}

/**
 * Read-only status for an application status bar.
 */
export interface OverlaySnapshot {
  itemCount: number;
  zoom: number;
  zoomPercent: number;
  pan: Point;
  columnCount: number;
  matchCount: number;
  searchQuery: string;
  pageIndex: number;
  pageCount: number;
  editMode: boolean;
  hoveredId: string | null;
  statusMessage: string | null;
  extracting: boolean;
  lastCopiedText: string | null;
}

export type OverlayErrorContext = 'clipboard' | 'raster';

export interface PageOverlayEvents {
  'zoom-change': { zoom: number };
  'pan-change': { pan: Point };
  'item-offset-change': { itemId: string; offset: ItemOffset | null };
  'item-override-change': { itemId: string; text: string | null };
  'overrides-cleared': { offsets: number; overrides: number };
  'search-change': { query: string; matchCount: number };
  'edit-mode-change': { editMode: boolean };
  copy: { itemId: string | null; text: string };
  'edit-requested': { itemId: string; text: string };
  'extraction-started': { requestId: number };
  'extraction-complete': { requestId: number; itemCount: number; skipped: number };
  'extraction-failed': { requestId: number; error: ExtractionError };
  'page-change': { pageIndex: number; pageCount: number };
  'repaint-requested': { delay: number };
  error: { error: unknown; context: OverlayErrorContext };
}
