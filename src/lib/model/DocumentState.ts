import type { DocumentState } from '../types';
import type { ItemModel } from './ItemModel';
import type { OverlayState } from './OverlayState';

/**
 * Combine the immutable item model and the mutable overlay state into one
 * frame's render input.
 */
export function buildDocumentState(
  model: ItemModel,
  state: OverlayState,
  searchResults: ReadonlySet<string>
): DocumentState {
  return {
    items: model.items,
    pageSize: model.pageSize,
    zoom: state.getZoom(),
    offset: state.getPan(),
    searchQuery: state.getSearchQuery(),
    searchResults,
    itemOffsets: state.getItemOffsets(),
    itemTextOverrides: state.getItemTextOverrides(),
    columnCount: model.columns.columnCount,
    columnBoundaries: model.columns.columnBoundaries,
    editMode: state.isEditMode()
  };
}
