/**
 * Font metrics
 *
 * Widths, ascent and descent are in 1/1000 em, as in AFM files. A glyph
 * missing from the width table takes the font's default width.
 */

import type { SourceLocation } from '../lexer/token.js';

export type FontStyle = 'roman' | 'bold' | 'italic' | 'bold_italic';

export const FONT_STYLES: readonly FontStyle[] = ['roman', 'bold', 'italic', 'bold_italic'];

export function isFontStyle(value: string): value is FontStyle {
  return FONT_STYLES.some(style => style === value);
}

export function fontStyle(bold: boolean, italic: boolean): FontStyle {
  if (bold && italic) return 'bold_italic';
  if (bold) return 'bold';
  if (italic) return 'italic';
  return 'roman';
}

/**
 * Serialized form of one font's metrics
 */
export interface FontMetricsData {
  name: string;
  ascent: number;
  descent: number;
  defaultWidth: number;
  widths: Record<string, number>;
}

export class FontMetrics {
  readonly name: string;
  readonly ascent: number;
  readonly descent: number;
  readonly defaultWidth: number;
  private widths: ReadonlyMap<string, number>;

  constructor(data: FontMetricsData) {
    this.name = data.name;
    this.ascent = data.ascent;
    this.descent = data.descent;
    this.defaultWidth = data.defaultWidth;
    this.widths = new Map(Object.entries(data.widths));
  }

  /**
   * Advance width of one character in 1/1000 em
   */
  advance(char: string): number {
    return this.widths.get(char) ?? this.defaultWidth;
  }

  /**
   * Width of a string at the given point size, in points
   */
  measure(text: string, size: number): number {
    let units = 0;
    for (const char of text) {
      units += this.advance(char);
    }
    return (units * size) / 1000;
  }

  ascender(size: number): number {
    return (this.ascent * size) / 1000;
  }
}

/**
 * Font reference carried by a placement
 */
export interface FontRef {
  family: string;
  style: FontStyle;
  /** PostScript name of the resolved font */
  name: string;
}

/**
 * Looks up metrics by family and style. Failure is a FontResolutionError.
 */
export interface FontProvider {
  resolve(family: string, style: FontStyle, location?: SourceLocation | null): FontMetrics;
}
