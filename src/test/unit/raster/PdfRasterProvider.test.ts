/**
 * Unit tests for PdfRasterProvider
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PdfRasterProvider } from '../../../lib/raster/PdfRasterProvider';
import { RasterError, RasterErrorCode } from '../../../lib/raster/types';
import { FakePdfDocument, pdfjsModule, pdfjsState, resetPdfjs } from '../../helpers/fakePdf';

vi.mock('pdfjs-dist', async () => (await import('../../helpers/fakePdf')).pdfjsModule);

const bytes = new Uint8Array([37, 80, 68, 70, 45]);

async function rejection(promise: Promise<unknown>): Promise<RasterError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RasterError) return error;
    throw error;
  }
  throw new Error('Expected a RasterError');
}

describe('PdfRasterProvider', () => {
  let pdfDocument: FakePdfDocument;

  beforeEach(() => {
    resetPdfjs();
    pdfDocument = new FakePdfDocument([
      { width: 100, height: 50 },
      { width: 50, height: 50 }
    ]);
    pdfjsState.document = pdfDocument;
  });

  describe('open', () => {
    it('should expose the page count', async () => {
      const provider = await PdfRasterProvider.open(bytes);
      expect(provider.pageCount).toBe(2);
    });

    it('should pass the password and worker source', async () => {
      await PdfRasterProvider.open(bytes, { password: 'test-secret', workerSrc: '/pdf.worker.js' });

      expect(pdfjsState.lastParams?.password).toBe('test-secret');
      expect(pdfjsModule.GlobalWorkerOptions.workerSrc).toBe('/pdf.worker.js');
    });

    it('should report load failures', async () => {
      const cause = new Error('Invalid PDF structure');
      pdfjsState.loadError = cause;
      const error = await rejection(PdfRasterProvider.open(bytes));

      expect(error.code).toBe(RasterErrorCode.LOAD_FAILED);
      expect(error.message).toBe('Failed to load PDF document');
      expect(error.details).toBe(cause);
    });
  });

  describe('renderPage', () => {
    it('should render at the largest scale that fits the target', async () => {
      const provider = await PdfRasterProvider.open(bytes);
      const image = await provider.renderPage(0, { width: 200, height: 200 });

      expect(pdfDocument.renders).toEqual([{ pageNumber: 1, scale: 2 }]);
      expect(image.width).toBe(200);
      expect(image.height).toBe(100);
      expect(image.data.length).toBe(200 * 100 * 4);
    });

    it('should address pages by zero-based index', async () => {
      const provider = await PdfRasterProvider.open(bytes);
      const image = await provider.renderPage(1, { width: 100, height: 300 });

      expect(pdfDocument.renders).toEqual([{ pageNumber: 2, scale: 2 }]);
      expect(image.width).toBe(100);
      expect(image.height).toBe(100);
    });

    it('should render at natural size for an empty target', async () => {
      const provider = await PdfRasterProvider.open(bytes);
      const image = await provider.renderPage(0, { width: 0, height: 0 });

      expect(pdfDocument.renders).toEqual([{ pageNumber: 1, scale: 1 }]);
      expect(image.width).toBe(100);
      expect(image.height).toBe(50);
    });

    it('should reject pages out of range', async () => {
      const provider = await PdfRasterProvider.open(bytes);

      const past = await rejection(provider.renderPage(2, { width: 100, height: 100 }));
      expect(past.code).toBe(RasterErrorCode.PAGE_OUT_OF_RANGE);
      expect(past.message).toBe('Page 2 is out of range (0-1)');

      const negative = await rejection(provider.renderPage(-1, { width: 100, height: 100 }));
      expect(negative.code).toBe(RasterErrorCode.PAGE_OUT_OF_RANGE);

      const fractional = await rejection(provider.renderPage(0.5, { width: 100, height: 100 }));
      expect(fractional.code).toBe(RasterErrorCode.PAGE_OUT_OF_RANGE);
      expect(pdfDocument.renders).toEqual([]);
    });

    it('should wrap render failures', async () => {
      const cause = new Error('bad stream');
      pdfDocument.renderError = cause;
      const provider = await PdfRasterProvider.open(bytes);
      const error = await rejection(provider.renderPage(0, { width: 100, height: 100 }));

      expect(error.code).toBe(RasterErrorCode.RENDER_FAILED);
      expect(error.message).toBe('Failed to render page 0');
      expect(error.details).toBe(cause);
    });
  });

  it('should release the document on destroy', async () => {
    const provider = await PdfRasterProvider.open(bytes);
    await provider.destroy();

    expect(pdfDocument.destroy).toHaveBeenCalledTimes(1);
  });
});
