import type { DocumentItem, ResolvedOverlayOptions, Size } from '../types';
import { detectColumns } from './ColumnDetector';
import { normalizeItems, rawItemPageIndex } from './ItemNormalizer';
import type { ColumnLayout, ExtractionPage, ExtractionSnapshot } from './types';

export type ItemModelOptions = Pick<
  ResolvedOverlayOptions,
  'originConvention' | 'defaultFontSize' | 'defaultPageSize'
>;

/**
 * The items of one page of one extraction snapshot.
 *
 * Immutable: a new model is built whenever the snapshot or the active page
 * changes. Runtime overrides live in OverlayState, not here.
 */
export class ItemModel {
  readonly items: readonly DocumentItem[];
  readonly pageIndex: number;
  readonly pageCount: number;
  readonly pageSize: Readonly<Size>;
  readonly columns: Readonly<ColumnLayout>;
  /** Raw items on this page that were dropped as malformed */
  readonly skipped: number;

  private byId: Map<string, DocumentItem>;

  private constructor(
    items: DocumentItem[],
    pageIndex: number,
    pageCount: number,
    pageSize: Size,
    columns: ColumnLayout,
    skipped: number
  ) {
    this.items = Object.freeze(items);
    this.pageIndex = pageIndex;
    this.pageCount = pageCount;
    this.pageSize = Object.freeze({ ...pageSize });
    this.columns = Object.freeze({
      columnCount: columns.columnCount,
      columnBoundaries: [...columns.columnBoundaries]
    });
    this.skipped = skipped;
    this.byId = new Map(items.map(item => [item.id, item]));
  }

  /**
   * A model with no items, e.g. before the first extraction arrives.
   */
  static empty(pageSize: Size): ItemModel {
    return ItemModel.blankPage(0, 0, pageSize);
  }

  /**
   * A page with no items, for pages the snapshot does not cover.
   */
  static blankPage(pageIndex: number, pageCount: number, pageSize: Size): ItemModel {
    return new ItemModel([], pageIndex, pageCount, pageSize, { columnCount: 1, columnBoundaries: [] }, 0);
  }

  static countPages(snapshot: ExtractionSnapshot): number {
    return countPages(snapshot);
  }

  /**
   * Build the model for one page of a snapshot. The page index is clamped
   * into the snapshot's page range.
   */
  static fromSnapshot(
    snapshot: ExtractionSnapshot,
    pageIndex: number,
    options: ItemModelOptions
  ): ItemModel {
    const pageCount = countPages(snapshot);
    const index = Math.min(Math.max(0, Math.floor(pageIndex) || 0), Math.max(0, pageCount - 1));
    const page = snapshot.pages?.find(p => p.page === index + 1);
    const pageSize = resolvePageSize(page, options.defaultPageSize);

    const { items, skipped } = normalizeItems(snapshot.items, index, pageSize.height, options);
    const columns = resolveColumns(page, items);

    return new ItemModel(items, index, pageCount, pageSize, columns, skipped);
  }

  get(id: string): DocumentItem | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  ids(): Set<string> {
    return new Set(this.byId.keys());
  }

  get size(): number {
    return this.items.length;
  }
}

function countPages(snapshot: ExtractionSnapshot): number {
  if (snapshot.pageCount !== undefined && Number.isFinite(snapshot.pageCount) && snapshot.pageCount > 0) {
    return Math.floor(snapshot.pageCount);
  }

  let highest = 0;
  for (const page of snapshot.pages ?? []) {
    highest = Math.max(highest, page.page);
  }
  for (const item of snapshot.items) {
    highest = Math.max(highest, rawItemPageIndex(item) + 1);
  }
  return Math.max(1, highest);
}

function resolvePageSize(page: ExtractionPage | undefined, fallback: Size): Size {
  const width = page?.width;
  const height = page?.height;
  return {
    width: width !== undefined && Number.isFinite(width) && width > 0 ? width : fallback.width,
    height: height !== undefined && Number.isFinite(height) && height > 0 ? height : fallback.height
  };
}

/**
 * Column hints from the analysis when it has them, else detected.
 */
function resolveColumns(page: ExtractionPage | undefined, items: DocumentItem[]): ColumnLayout {
  const boundaries = page?.column_boundaries?.filter(value => Number.isFinite(value));
  if (page?.columns !== undefined && page.columns > 0 && boundaries) {
    return { columnCount: Math.floor(page.columns), columnBoundaries: boundaries };
  }
  return detectColumns(items);
}
