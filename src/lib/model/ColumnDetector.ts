import type { DocumentItem } from '../types';
import type { ColumnLayout } from './types';

/** Fewer items than this never count as multi-column */
export const MIN_ITEMS_FOR_COLUMNS = 5;
/** Horizontal gap between item left edges that separates two columns */
export const COLUMN_GAP_THRESHOLD = 50;

/**
 * Guess column separators from the spread of item left edges.
 */
export function detectColumns(items: readonly Pick<DocumentItem, 'bbox'>[]): ColumnLayout {
  if (items.length < MIN_ITEMS_FOR_COLUMNS) {
    return { columnCount: 1, columnBoundaries: [] };
  }

  const lefts = items.map(item => item.bbox.left).sort((a, b) => a - b);
  const columnBoundaries: number[] = [];

  for (let i = 1; i < lefts.length; i++) {
    const gap = lefts[i] - lefts[i - 1];
    if (gap > COLUMN_GAP_THRESHOLD) {
      columnBoundaries.push(lefts[i - 1] + gap / 2);
    }
  }

  return { columnCount: columnBoundaries.length + 1, columnBoundaries };
}
