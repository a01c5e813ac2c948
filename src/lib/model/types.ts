/**
 * Raw document-analysis output, as received from the analysis service.
 * Every field is optional; the normalizer decides what is usable.
 */

export interface RawBoundingBox {
  left?: number;
  top?: number;
  width?: number;
  height?: number;
  right?: number;
  bottom?: number;
  /** 'TOPLEFT' or 'BOTTOMLEFT' (case-insensitive) */
  coord_origin?: string;
}

export interface RawItemStyle {
  font_size?: number;
  bold?: boolean;
  italic?: boolean;
}

export interface RawItem {
  /** 1-based page number */
  page?: number;
  type?: string;
  content?: string;
  text?: string;
  bbox?: RawBoundingBox;
  attributes?: {
    style?: RawItemStyle;
  };
}

export interface ExtractionPage {
  /** 1-based page number */
  page: number;
  width?: number;
  height?: number;
  columns?: number;
  column_boundaries?: number[];
}

/**
 * One immutable analysis result for a whole document.
 */
export interface ExtractionSnapshot {
  items: RawItem[];
  pages?: ExtractionPage[];
  pageCount?: number;
}

export interface ColumnLayout {
  columnCount: number;
  /** Document-space x positions of the separators */
  columnBoundaries: number[];
}
