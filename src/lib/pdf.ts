/**
 * PDF adapters backed by pdfjs-dist. Kept out of the main entry so that
 * hosts bringing their own analysis service do not load pdf.js.
 */

export {
  PdfTextAnalysisService,
  classifyLine,
  parseFontName,
  CHECKBOX_STRINGS
} from './extraction/PdfTextAnalysisService';
export type { PdfTextAnalysisOptions } from './extraction/PdfTextAnalysisService';
export { PdfRasterProvider } from './raster/PdfRasterProvider';
export type { PdfRasterOptions } from './raster/PdfRasterProvider';
