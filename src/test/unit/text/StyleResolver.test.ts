/**
 * Unit tests for item style resolution
 */
import { describe, it, expect } from 'vitest';
import {
  ITEM_TYPE_STYLES,
  SEARCH_HIGHLIGHT_FILL,
  SEARCH_MATCH_COLOR,
  resolveFontSize,
  resolveItemStyle
} from '../../../lib/text';
import { DEFAULT_OVERLAY_OPTIONS, ITEM_TYPES } from '../../../lib/types';

const options = DEFAULT_OVERLAY_OPTIONS;

describe('StyleResolver', () => {
  describe('resolveFontSize', () => {
    it('should scale the source size', () => {
      expect(resolveFontSize(12, 1, 'Text', options)).toBe(12);
      expect(resolveFontSize(10, 1.5, 'Text', options)).toBe(15);
    });

    it('should clamp into the font size range', () => {
      expect(resolveFontSize(12, 3, 'Text', options)).toBe(24);
      expect(resolveFontSize(2, 1, 'Text', options)).toBe(8);
    });

    it('should substitute the default for missing sizes', () => {
      expect(resolveFontSize(0, 1, 'Text', options)).toBe(12);
      expect(resolveFontSize(-4, 1, 'Text', options)).toBe(12);
      expect(resolveFontSize(Number.NaN, 1, 'Text', options)).toBe(12);
    });

    it('should apply the type multiplier after clamping', () => {
      expect(resolveFontSize(12, 1, 'Title', options)).toBeCloseTo(14.4, 10);
      expect(resolveFontSize(30, 1, 'Title', options)).toBeCloseTo(28.8, 10);
      expect(resolveFontSize(20, 1, 'FormField', options)).toBeCloseTo(19, 10);
      expect(resolveFontSize(10, 1, 'Header', options)).toBeCloseTo(11, 10);
    });
  });

  describe('resolveItemStyle', () => {
    const item = { fontSize: 12, bold: true, italic: false, itemType: 'FormLabel' as const };

    it('should use the type color without a highlight', () => {
      const style = resolveItemStyle(item, 1, false, options);

      expect(style.color).toBe('#00008b');
      expect(style.highlight).toBeNull();
      expect(style.font).toEqual({ size: 12, family: 'sans-serif', bold: true, italic: false });
    });

    it('should mark search matches', () => {
      const style = resolveItemStyle(item, 1, true, options);

      expect(style.color).toBe(SEARCH_MATCH_COLOR);
      expect(style.highlight).toBe(SEARCH_HIGHLIGHT_FILL);
    });

    it('should use the configured family', () => {
      const style = resolveItemStyle(item, 1, false, { ...options, fontFamily: 'serif' });
      expect(style.font.family).toBe('serif');
    });
  });

  it('should define a style for every item type', () => {
    for (const type of ITEM_TYPES) {
      expect(ITEM_TYPE_STYLES[type].sizeMultiplier).toBeGreaterThan(0);
    }
  });
});
