import type { RenderSurface } from '../rendering/types';
import type { FontSpec } from './types';

/**
 * Convert a font spec to a CSS font string.
 */
export function toFontString(font: FontSpec): string {
  const style = font.italic ? 'italic' : '';
  const weight = font.bold ? 'bold' : '';
  return `${style} ${weight} ${font.size}px ${font.family}`.replace(/\s+/g, ' ').trim();
}

/**
 * Encapsulates all text measurement operations.
 * Single source of truth for font strings and line metrics; widths come
 * from the render surface.
 */
export class TextMeasurer {
  private surface: RenderSurface;
  private lineHeightFactor: number;
  private fontCache: Map<string, string> = new Map();

  constructor(surface: RenderSurface, lineHeightFactor: number = 1.2) {
    this.surface = surface;
    this.lineHeightFactor = lineHeightFactor;
  }

  /**
   * Cached CSS font string for a font spec.
   */
  toFontString(font: FontSpec): string {
    const cacheKey = `${font.italic}-${font.bold}-${font.size}-${font.family}`;

    let fontString = this.fontCache.get(cacheKey);
    if (!fontString) {
      fontString = toFontString(font);
      this.fontCache.set(cacheKey, fontString);
    }

    return fontString;
  }

  /**
   * Measure the width of text with the given font.
   */
  measureText(text: string, font: FontSpec): number {
    if (text.length === 0) return 0;
    return this.surface.measureText(text, font);
  }

  getLineHeight(font: FontSpec): number {
    return font.size * this.lineHeightFactor;
  }

  /**
   * Update the surface (e.g., after the host recreates its canvas).
   */
  setSurface(surface: RenderSurface): void {
    this.surface = surface;
  }
}
