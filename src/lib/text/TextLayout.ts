import type { Point, ResolvedOverlayOptions } from '../types';
import { TextMeasurer } from './TextMeasurer';
import {
  CHECKED_MARKERS,
  ELLIPSIS,
  type CheckboxLayoutResult,
  type FontSpec,
  type LayoutLine,
  type TextLayoutResult
} from './types';

export type TextLayoutOptions = Pick<
  ResolvedOverlayOptions,
  | 'wrapThreshold'
  | 'wrapTriggers'
  | 'wrapCapWidth'
  | 'singleLineSlack'
  | 'singleLineMinWidth'
  | 'maxLines'
>;

/** Sentence boundary that makes text wrap-eligible */
const SENTENCE_BREAK = '. ';

/** Checkbox glyph side relative to the font size */
const CHECKBOX_SIZE_FACTOR = 0.8;

/**
 * Lays out item text: wrap policy, greedy word wrap and line truncation.
 */
export class TextLayout {
  private measurer: TextMeasurer;
  private options: TextLayoutOptions;

  constructor(measurer: TextMeasurer, options: TextLayoutOptions) {
    this.measurer = measurer;
    this.options = options;
  }

  /**
   * Whether text may wrap onto several lines.
   */
  isWrapEligible(text: string): boolean {
    if (text.length > this.options.wrapThreshold) return true;
    if (text.includes(SENTENCE_BREAK)) return true;
    return this.options.wrapTriggers.some(trigger => trigger.length > 0 && text.includes(trigger));
  }

  /**
   * Width available to an item's layout.
   * Wrap-eligible text gets the available width, capped; anything else keeps
   * its source line width plus some slack.
   */
  resolveMaxWidth(text: string, bboxScreenWidth: number, availableWidth: number): number {
    const { wrapCapWidth, singleLineSlack, singleLineMinWidth } = this.options;

    if (this.isWrapEligible(text)) {
      const available = Number.isFinite(availableWidth) ? availableWidth : wrapCapWidth;
      return Math.min(wrapCapWidth, Math.max(available, singleLineMinWidth));
    }

    const bboxWidth = Number.isFinite(bboxScreenWidth) ? Math.abs(bboxScreenWidth) : 0;
    return Math.max(bboxWidth * singleLineSlack, singleLineMinWidth);
  }

  /**
   * Wrap text into lines no wider than `maxWidth`.
   */
  layout(text: string, font: FontSpec, maxWidth: number): TextLayoutResult {
    const width =
      Number.isFinite(maxWidth) && maxWidth > 0 ? maxWidth : this.options.singleLineMinWidth;
    const lineHeight = this.measurer.getLineHeight(font);

    let texts: string[] = [];
    for (const paragraph of text.replace(/\r\n?/g, '\n').split('\n')) {
      texts.push(...this.wrapParagraph(paragraph, font, width));
    }

    let truncated = false;
    if (texts.length > this.options.maxLines) {
      texts = texts.slice(0, this.options.maxLines);
      const last = texts.length - 1;
      texts[last] = this.withEllipsis(texts[last], font, width);
      truncated = true;
    }

    const lines: LayoutLine[] = texts.map((lineText, index) => ({
      text: lineText,
      width: this.measurer.measureText(lineText, font),
      y: index * lineHeight
    }));

    return {
      kind: 'text',
      lines,
      measuredWidth: lines.reduce((max, line) => Math.max(max, line.width), 0),
      measuredHeight: lines.length * lineHeight,
      lineHeight,
      truncated
    };
  }

  /**
   * Square checkbox glyph sized from the font, checked when the content
   * carries a check marker.
   */
  layoutCheckbox(content: string, font: FontSpec): CheckboxLayoutResult {
    const size = font.size * CHECKBOX_SIZE_FACTOR;
    const checkPoints: [Point, Point, Point] = [
      { x: size * 0.2, y: size * 0.5 },
      { x: size * 0.4, y: size * 0.7 },
      { x: size * 0.8, y: size * 0.3 }
    ];

    return {
      kind: 'checkbox',
      size,
      checked: CHECKED_MARKERS.some(marker => content.includes(marker)),
      checkPoints,
      measuredWidth: size,
      measuredHeight: size
    };
  }

  /**
   * Greedy word wrap of one logical line.
   */
  private wrapParagraph(paragraph: string, font: FontSpec, maxWidth: number): string[] {
    const words = paragraph.split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
      return [''];
    }

    const lines: string[] = [];
    let current = '';

    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      if (this.measurer.measureText(candidate, font) <= maxWidth) {
        current = candidate;
        continue;
      }

      if (current) {
        lines.push(current);
        current = '';
      }

      if (this.measurer.measureText(word, font) <= maxWidth) {
        current = word;
        continue;
      }

      // Word alone is too wide: break it by character
      const pieces = this.breakWord(word, font, maxWidth);
      lines.push(...pieces.slice(0, -1));
      current = pieces[pieces.length - 1];
    }

    lines.push(current);
    return lines;
  }

  /**
   * Split a word into chunks that each fit. A single glyph wider than
   * `maxWidth` still gets its own chunk.
   */
  private breakWord(word: string, font: FontSpec, maxWidth: number): string[] {
    const pieces: string[] = [];
    let chunk = '';

    for (const char of Array.from(word)) {
      if (chunk && this.measurer.measureText(chunk + char, font) > maxWidth) {
        pieces.push(chunk);
        chunk = char;
      } else {
        chunk += char;
      }
    }

    pieces.push(chunk);
    return pieces;
  }

  private withEllipsis(line: string, font: FontSpec, maxWidth: number): string {
    let chars = Array.from(line.trimEnd());
    let candidate = chars.join('') + ELLIPSIS;

    while (chars.length > 0 && this.measurer.measureText(candidate, font) > maxWidth) {
      chars = chars.slice(0, -1);
      candidate = chars.join('').trimEnd() + ELLIPSIS;
    }

    return candidate;
  }
}
