/**
 * PdfTextAnalysisService - a simple document-analysis service over
 * pdfjs-dist text content. One raw item per text line.
 */

import * as pdfjsLib from 'pdfjs-dist';
import type {
  PDFDocumentProxy,
  PDFPageProxy,
  TextItem,
  TextStyle
} from 'pdfjs-dist/types/src/display/api';
import type { ExtractionPage, ExtractionSnapshot, RawItem } from '../model/types';
import {
  ExtractionError,
  ExtractionErrorCode,
  type DocumentAnalysisService,
  type ExtractionSource
} from './types';

export interface PdfTextAnalysisOptions {
  password?: string;
  /** URL of the pdf.js worker script; left unset, pdf.js picks its own */
  workerSrc?: string;
}

/** Text that marks an item as a checkbox */
export const CHECKBOX_STRINGS: readonly string[] = ['[ ]', '[x]', '[X]', '☐', '☑', '□', '■'];

/** Baseline drift (pt) still treated as the same line */
const LINE_TOLERANCE = 2;

interface LineRun {
  text: string;
  left: number;
  right: number;
  top: number;
  bottom: number;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  baseline: number;
}

/**
 * Classify a line of text by its shape.
 */
export function classifyLine(text: string): RawItem['type'] {
  const trimmed = text.trim();
  if (CHECKBOX_STRINGS.includes(trimmed)) return 'Checkbox';
  if (trimmed.endsWith(':')) return 'FormLabel';
  return 'TextItem';
}

/**
 * Weight and style from a font name.
 */
export function parseFontName(fontName: string): { bold: boolean; italic: boolean } {
  return {
    bold: /bold|black|heavy|semibold|demibold/i.test(fontName),
    italic: /italic|oblique/i.test(fontName)
  };
}

export class PdfTextAnalysisService implements DocumentAnalysisService {
  private options: PdfTextAnalysisOptions;

  constructor(options: PdfTextAnalysisOptions = {}) {
    this.options = options;
    if (options.workerSrc) {
      pdfjsLib.GlobalWorkerOptions.workerSrc = options.workerSrc;
    }
  }

  async analyze(source: ExtractionSource): Promise<ExtractionSnapshot> {
    if (source.byteLength === 0) {
      throw new ExtractionError('Document is empty', ExtractionErrorCode.INVALID_SOURCE);
    }

    const pdfDocument = await this.load(source);

    try {
      const items: RawItem[] = [];
      const pages: ExtractionPage[] = [];

      for (let i = 1; i <= pdfDocument.numPages; i++) {
        const page = await pdfDocument.getPage(i);
        const viewport = page.getViewport({ scale: 1.0 });
        pages.push({ page: i, width: viewport.width, height: viewport.height });
        items.push(...(await this.extractPage(page, i, viewport.height)));
      }

      return { items, pages, pageCount: pdfDocument.numPages };
    } catch (error) {
      throw new ExtractionError(
        'Failed to extract text from PDF',
        ExtractionErrorCode.EXTRACTION_FAILED,
        error
      );
    } finally {
      await pdfDocument.destroy();
    }
  }

  private async load(source: ExtractionSource): Promise<PDFDocumentProxy> {
    // pdf.js transfers the buffer it is given; hand it a copy
    const data = source instanceof Uint8Array ? source.slice() : new Uint8Array(source.slice(0));

    try {
      const loadingTask = pdfjsLib.getDocument({
        data,
        password: this.options.password || undefined
      });
      return await loadingTask.promise;
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'PasswordException') {
        const code = 'code' in error ? error.code : undefined;
        if (code === pdfjsLib.PasswordResponses.NEED_PASSWORD) {
          throw new ExtractionError(
            'This PDF is encrypted and requires a password',
            ExtractionErrorCode.PASSWORD_REQUIRED
          );
        }
        throw new ExtractionError(
          'Incorrect password for encrypted PDF',
          ExtractionErrorCode.INCORRECT_PASSWORD
        );
      }
      throw new ExtractionError(
        'Failed to load PDF document',
        ExtractionErrorCode.INVALID_SOURCE,
        error
      );
    }
  }

  private async extractPage(page: PDFPageProxy, pageNumber: number, pageHeight: number): Promise<RawItem[]> {
    const textContent = await page.getTextContent();
    const styles: Record<string, TextStyle> = textContent.styles;

    const lines: LineRun[] = [];
    let current: LineRun | null = null;

    for (const entry of textContent.items) {
      // Skip marked-content markers
      if (!('str' in entry)) continue;

      const run = this.toRun(entry, styles[entry.fontName], pageHeight);
      if (run) {
        if (current && Math.abs(current.baseline - run.baseline) <= LINE_TOLERANCE) {
          current = mergeRuns(current, run);
        } else {
          if (current) lines.push(current);
          current = run;
        }
      }

      if (entry.hasEOL && current) {
        lines.push(current);
        current = null;
      }
    }
    if (current) lines.push(current);

    return lines
      .filter(line => line.text.trim().length > 0)
      .map(line => ({
        page: pageNumber,
        type: classifyLine(line.text),
        content: line.text.trim(),
        bbox: {
          left: line.left,
          top: line.top,
          width: line.right - line.left,
          height: line.bottom - line.top,
          coord_origin: 'TOPLEFT'
        },
        attributes: {
          style: { font_size: line.fontSize, bold: line.bold, italic: line.italic }
        }
      }));
  }

  /**
   * PDF coordinates are bottom-left origin; runs are converted to top-left.
   */
  private toRun(item: TextItem, style: TextStyle | undefined, pageHeight: number): LineRun | null {
    if (!item.str) return null;

    const [a, b, , , tx, ty] = item.transform;
    const fontSize = Math.round(Math.sqrt(a * a + b * b) * 10) / 10;
    const height = item.height > 0 ? item.height : fontSize;
    const font = parseFontName(`${item.fontName} ${style?.fontFamily ?? ''}`);
    const top = pageHeight - ty - height;

    return {
      text: item.str,
      left: tx,
      right: tx + item.width,
      top,
      bottom: top + height,
      fontSize,
      bold: font.bold,
      italic: font.italic,
      baseline: ty
    };
  }
}

function mergeRuns(line: LineRun, run: LineRun): LineRun {
  const gap = run.left - line.right;
  const spaced = line.text.endsWith(' ') || run.text.startsWith(' ');
  const separator = !spaced && gap > line.fontSize * 0.15 ? ' ' : '';
  return {
    text: line.text + separator + run.text,
    left: Math.min(line.left, run.left),
    right: Math.max(line.right, run.right),
    top: Math.min(line.top, run.top),
    bottom: Math.max(line.bottom, run.bottom),
    fontSize: Math.max(line.fontSize, run.fontSize),
    bold: line.bold && run.bold,
    italic: line.italic && run.italic,
    baseline: line.baseline
  };
}
