import type {
  ExtractionPage,
  ExtractionSnapshot,
  RawBoundingBox,
  RawItem,
  RawItemStyle
} from '../model/types';
import { ExtractionError, ExtractionErrorCode } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function parseBoundingBox(value: unknown): RawBoundingBox | undefined {
  if (!isRecord(value)) return undefined;
  return {
    left: num(value.left ?? value.l),
    top: num(value.top ?? value.t),
    width: num(value.width),
    height: num(value.height),
    right: num(value.right ?? value.r),
    bottom: num(value.bottom ?? value.b),
    coord_origin: str(value.coord_origin)
  };
}

function parseStyle(value: unknown): RawItemStyle | undefined {
  if (!isRecord(value)) return undefined;
  return {
    font_size: num(value.font_size),
    bold: bool(value.bold),
    italic: bool(value.italic)
  };
}

function parseItem(value: unknown): RawItem {
  if (!isRecord(value)) return {};
  const attributes = isRecord(value.attributes) ? value.attributes : undefined;
  return {
    page: num(value.page),
    type: str(value.type),
    content: str(value.content),
    text: str(value.text),
    bbox: parseBoundingBox(value.bbox),
    attributes: attributes ? { style: parseStyle(attributes.style) } : undefined
  };
}

function parsePage(value: unknown): ExtractionPage | null {
  if (!isRecord(value)) return null;
  const page = num(value.page ?? value.page_number);
  if (page === undefined) return null;

  const rawBoundaries = value.column_boundaries;
  const boundaries = Array.isArray(rawBoundaries)
    ? rawBoundaries.filter((b): b is number => typeof b === 'number')
    : undefined;

  return {
    page,
    width: num(value.width),
    height: num(value.height),
    columns: num(value.columns),
    column_boundaries: boundaries
  };
}

/**
 * Validate an untyped analysis result (e.g. parsed JSON) into a snapshot.
 * Fields of the wrong type are dropped and left for the item normalizer to
 * reject. Throws INVALID_RESULT when there is no `items` array.
 */
export function parseExtractionJson(value: unknown): ExtractionSnapshot {
  if (typeof value === 'string') {
    try {
      return parseExtractionJson(JSON.parse(value));
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(
        'Analysis result is not valid JSON',
        ExtractionErrorCode.INVALID_RESULT,
        error
      );
    }
  }

  const items = isRecord(value) ? value.items : undefined;
  if (!isRecord(value) || !Array.isArray(items)) {
    throw new ExtractionError(
      'Analysis result has no items array',
      ExtractionErrorCode.INVALID_RESULT
    );
  }

  const rawPages = value.pages;
  const pages = Array.isArray(rawPages)
    ? rawPages.map(parsePage).filter((p): p is ExtractionPage => p !== null)
    : undefined;

  return {
    items: items.map(parseItem),
    pages,
    pageCount: num(value.pageCount ?? value.page_count)
  };
}
