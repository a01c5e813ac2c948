/**
 * PdfRasterProvider - renders PDF pages to pixel buffers with pdfjs-dist.
 */

import * as pdfjsLib from 'pdfjs-dist';
import type { PDFDocumentProxy } from 'pdfjs-dist/types/src/display/api';
import type { RasterImage } from '../rendering/types';
import type { Size } from '../types';
import { RasterError, RasterErrorCode, type RasterProvider } from './types';

export interface PdfRasterOptions {
  password?: string;
  workerSrc?: string;
}

export class PdfRasterProvider implements RasterProvider {
  private pdfDocument: PDFDocumentProxy;

  private constructor(pdfDocument: PDFDocumentProxy) {
    this.pdfDocument = pdfDocument;
  }

  /**
   * Open a document for rendering.
   */
  static async open(source: ArrayBuffer | Uint8Array, options: PdfRasterOptions = {}): Promise<PdfRasterProvider> {
    if (options.workerSrc) {
      pdfjsLib.GlobalWorkerOptions.workerSrc = options.workerSrc;
    }

    const data = source instanceof Uint8Array ? source.slice() : new Uint8Array(source.slice(0));
    try {
      const pdfDocument = await pdfjsLib.getDocument({
        data,
        password: options.password || undefined
      }).promise;
      return new PdfRasterProvider(pdfDocument);
    } catch (error) {
      throw new RasterError('Failed to load PDF document', RasterErrorCode.LOAD_FAILED, error);
    }
  }

  get pageCount(): number {
    return this.pdfDocument.numPages;
  }

  /**
   * Render a page at the largest scale that fits `targetSize`.
   */
  async renderPage(pageIndex: number, targetSize: Size): Promise<RasterImage> {
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new RasterError(
        `Page ${pageIndex} is out of range (0-${this.pageCount - 1})`,
        RasterErrorCode.PAGE_OUT_OF_RANGE
      );
    }

    try {
      const page = await this.pdfDocument.getPage(pageIndex + 1);
      const base = page.getViewport({ scale: 1 });
      const scale =
        targetSize.width > 0 && targetSize.height > 0
          ? Math.min(targetSize.width / base.width, targetSize.height / base.height)
          : 1;
      const viewport = page.getViewport({ scale });

      const canvas = document.createElement('canvas');
      canvas.width = Math.max(1, Math.ceil(viewport.width));
      canvas.height = Math.max(1, Math.ceil(viewport.height));
      const ctx = canvas.getContext('2d');
      if (!ctx) {
        throw new Error('Canvas 2D context is not available');
      }

      await page.render({ canvasContext: ctx, viewport }).promise;
      const imageData = ctx.getImageData(0, 0, canvas.width, canvas.height);
      return { width: imageData.width, height: imageData.height, data: imageData.data };
    } catch (error) {
      throw new RasterError(
        `Failed to render page ${pageIndex}`,
        RasterErrorCode.RENDER_FAILED,
        error
      );
    }
  }

  async destroy(): Promise<void> {
    await this.pdfDocument.destroy();
  }
}
