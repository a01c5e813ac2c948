import type {
  BoundingBox,
  DocumentItem,
  ItemType,
  OriginConvention,
  ResolvedOverlayOptions
} from '../types';
import type { RawBoundingBox, RawItem } from './types';

const TYPE_TAGS: Record<string, ItemType> = {
  TitleItem: 'Title',
  Title: 'Title',
  SectionHeaderItem: 'Header',
  Header: 'Header',
  TableItem: 'Table',
  Table: 'Table',
  FormLabel: 'FormLabel',
  FormField: 'FormField',
  Checkbox: 'Checkbox'
};

export type NormalizeOptions = Pick<ResolvedOverlayOptions, 'originConvention' | 'defaultFontSize'>;

export interface NormalizeResult {
  items: DocumentItem[];
  /** Items dropped for a missing bbox, bad numbers or empty text */
  skipped: number;
}

/**
 * Map an analysis type tag to an item type. Unknown tags are plain text.
 */
export function mapItemType(tag: string | undefined): ItemType {
  if (tag && Object.prototype.hasOwnProperty.call(TYPE_TAGS, tag)) {
    return TYPE_TAGS[tag];
  }
  return 'Text';
}

function finite(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseOrigin(tag: string | undefined): OriginConvention | null {
  if (!tag) return null;
  const normalized = tag.toLowerCase().replace(/[^a-z]/g, '');
  if (normalized === 'bottomleft') return 'bottomLeft';
  if (normalized === 'topleft') return 'topLeft';
  return null;
}

/**
 * Build a document-space box, or null when the raw box is unusable.
 */
export function normalizeBoundingBox(
  raw: RawBoundingBox | undefined,
  pageHeight: number,
  convention: OriginConvention
): BoundingBox | null {
  if (!raw || !finite(raw.left) || !finite(raw.top)) {
    return null;
  }

  const width = finite(raw.width) ? raw.width : finite(raw.right) ? raw.right - raw.left : NaN;
  const height = finite(raw.height) ? raw.height : finite(raw.bottom) ? raw.bottom - raw.top : NaN;
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    return null;
  }

  let top = raw.top;
  const origin = parseOrigin(raw.coord_origin);
  if (origin && origin !== convention) {
    top = pageHeight - top;
  }

  return { left: raw.left, top, width: Math.abs(width), height: Math.abs(height) };
}

export function makeItemId(pageIndex: number, bbox: BoundingBox): string {
  return `item_${pageIndex}_${Math.round(bbox.left * 1000)}_${Math.round(bbox.top * 1000)}`;
}

/**
 * 0-based page index of a raw item. Items without a page number belong to
 * the first page.
 */
export function rawItemPageIndex(item: RawItem): number {
  return finite(item.page) ? Math.floor(item.page) - 1 : 0;
}

/**
 * Turn the raw items of one page into document items, in paint order.
 * Malformed items are dropped and counted.
 */
export function normalizeItems(
  raw: readonly RawItem[],
  pageIndex: number,
  pageHeight: number,
  options: NormalizeOptions
): NormalizeResult {
  const items: DocumentItem[] = [];
  const seen = new Map<string, number>();
  let skipped = 0;

  for (const entry of raw) {
    if (rawItemPageIndex(entry) !== pageIndex) continue;

    const content = entry.content ?? entry.text ?? '';
    const bbox = normalizeBoundingBox(entry.bbox, pageHeight, options.originConvention);
    if (!bbox || content.trim().length === 0) {
      skipped++;
      continue;
    }

    const style = entry.attributes?.style;
    const fontSize =
      style && finite(style.font_size) && style.font_size > 0
        ? style.font_size
        : options.defaultFontSize;

    // Repeats on the same spot get a numeric suffix in paint order
    const baseId = makeItemId(pageIndex, bbox);
    const repeat = seen.get(baseId) ?? 0;
    seen.set(baseId, repeat + 1);

    items.push(
      Object.freeze({
        id: repeat === 0 ? baseId : `${baseId}_${repeat}`,
        bbox: Object.freeze(bbox),
        content,
        fontSize,
        bold: style?.bold === true,
        italic: style?.italic === true,
        itemType: mapItemType(entry.type)
      })
    );
  }

  return { items, skipped };
}
