/**
 * Raw extraction fixtures for tests
 */
import type { ExtractionSnapshot, RawItem } from '../../lib/model';

export interface RawItemInit {
  page?: number;
  type?: string;
  fontSize?: number;
  bold?: boolean;
  italic?: boolean;
  origin?: string;
}

/**
 * A top-left raw item at (left, top) with the given size.
 */
export function rawItem(
  content: string,
  left: number,
  top: number,
  width = 100,
  height = 12,
  init: RawItemInit = {}
): RawItem {
  return {
    page: init.page ?? 1,
    type: init.type ?? 'TextItem',
    content,
    bbox: {
      left,
      top,
      width,
      height,
      coord_origin: init.origin ?? 'TOPLEFT'
    },
    attributes: {
      style: {
        font_size: init.fontSize ?? 12,
        bold: init.bold ?? false,
        italic: init.italic ?? false
      }
    }
  };
}

/**
 * A single Letter-sized page holding `items`.
 */
export function snapshotOf(items: RawItem[], pageCount = 1): ExtractionSnapshot {
  const pages = [];
  for (let page = 1; page <= pageCount; page++) {
    pages.push({ page, width: 612, height: 792 });
  }
  return { items, pages };
}

/**
 * Three items used across the overlay tests:
 * - "Invoice" title at (72, 72)
 * - "Total: 42" at (72, 200)
 * - "Signature" at (300, 400)
 */
export function invoiceSnapshot(): ExtractionSnapshot {
  return snapshotOf([
    rawItem('Invoice', 72, 72, 80, 14, { type: 'TitleItem', fontSize: 14 }),
    rawItem('Total: 42', 72, 200),
    rawItem('Signature', 300, 400)
  ]);
}
