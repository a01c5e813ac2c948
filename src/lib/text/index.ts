export { TextMeasurer, toFontString } from './TextMeasurer';
export { TextLayout } from './TextLayout';
export type { TextLayoutOptions } from './TextLayout';
export {
  ITEM_TYPE_STYLES,
  SEARCH_MATCH_COLOR,
  SEARCH_HIGHLIGHT_FILL,
  resolveFontSize,
  resolveItemStyle
} from './StyleResolver';
export { ELLIPSIS, CHECKED_MARKERS } from './types';
export type {
  FontSpec,
  ItemStyle,
  ItemTypeStyle,
  ItemTypeStyleTable,
  LayoutLine,
  TextLayoutResult,
  CheckboxLayoutResult,
  ItemLayoutResult
} from './types';
