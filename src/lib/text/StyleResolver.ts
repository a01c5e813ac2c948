import type { DocumentItem, ItemType, ResolvedOverlayOptions } from '../types';
import type { FontSpec, ItemStyle, ItemTypeStyleTable } from './types';

/** Text color for search matches */
export const SEARCH_MATCH_COLOR = '#ffa500';
/** Fill drawn behind search matches */
export const SEARCH_HIGHLIGHT_FILL = 'rgba(255, 255, 0, 0.24)';

/**
 * One rule per item type. Every type must have an entry.
 */
export const ITEM_TYPE_STYLES: ItemTypeStyleTable = {
  Title: { sizeMultiplier: 1.2, color: '#141414' },
  Header: { sizeMultiplier: 1.1, color: '#141414' },
  Text: { sizeMultiplier: 1, color: '#141414' },
  Table: { sizeMultiplier: 1, color: '#141414' },
  FormLabel: { sizeMultiplier: 1, color: '#00008b' },
  FormField: { sizeMultiplier: 0.95, color: '#3c3c3c' },
  Checkbox: { sizeMultiplier: 1, color: '#282828' }
};

/**
 * Screen font size for an item: the source size scaled and clamped, then
 * adjusted by the type multiplier.
 */
export function resolveFontSize(
  fontSize: number,
  scale: number,
  itemType: ItemType,
  options: Pick<ResolvedOverlayOptions, 'minFontSize' | 'maxFontSize' | 'defaultFontSize'>
): number {
  const base = Number.isFinite(fontSize) && fontSize > 0 ? fontSize : options.defaultFontSize;
  const scaled = Math.min(Math.max(base * scale, options.minFontSize), options.maxFontSize);
  return scaled * ITEM_TYPE_STYLES[itemType].sizeMultiplier;
}

/**
 * Resolve font, color and highlight for an item at the given scale.
 */
export function resolveItemStyle(
  item: Pick<DocumentItem, 'fontSize' | 'bold' | 'italic' | 'itemType'>,
  scale: number,
  isMatch: boolean,
  options: Pick<
    ResolvedOverlayOptions,
    'minFontSize' | 'maxFontSize' | 'defaultFontSize' | 'fontFamily'
  >
): ItemStyle {
  const font: FontSpec = {
    size: resolveFontSize(item.fontSize, scale, item.itemType, options),
    family: options.fontFamily,
    bold: item.bold,
    italic: item.italic
  };

  if (isMatch) {
    return { font, color: SEARCH_MATCH_COLOR, highlight: SEARCH_HIGHLIGHT_FILL };
  }

  return { font, color: ITEM_TYPE_STYLES[item.itemType].color, highlight: null };
}
