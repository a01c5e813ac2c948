import type { RasterImage } from '../rendering/types';
import type { Size } from '../types';

/**
 * External raster provider: pixels of one page for background display.
 */
export interface RasterProvider {
  readonly pageCount: number;
  renderPage(pageIndex: number, targetSize: Size): Promise<RasterImage>;
}

/**
 * Error codes for raster failures.
 */
export enum RasterErrorCode {
  LOAD_FAILED = 'LOAD_FAILED',
  PAGE_OUT_OF_RANGE = 'PAGE_OUT_OF_RANGE',
  RENDER_FAILED = 'RENDER_FAILED'
}

export class RasterError extends Error {
  constructor(
    message: string,
    public readonly code: RasterErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'RasterError';
  }
}
