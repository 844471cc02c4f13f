/**
 * Font catalogue
 *
 * Immutable once layout starts: fonts are registered by PostScript name,
 * families map each style to one of the registered fonts. The built-in
 * catalogue covers Courier and Helvetica in all four styles, from the
 * metrics files under fonts/. A family may be spread over several files.
 */

import * as fs from 'fs';
import { FontResolutionError, FontMapError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';
import {
  type FontMetricsData,
  type FontProvider,
  type FontStyle,
  FontMetrics,
  isFontStyle,
} from './metrics.js';

const BUILTIN_FILES = ['courier', 'helvetica', 'helvetica-bold'];

/**
 * A built-in family file: shared metrics plus a PostScript name per style
 */
interface FamilyFile {
  family: string;
  ascent: number;
  descent: number;
  defaultWidth: number;
  widths: Record<string, number>;
  styles: Partial<Record<FontStyle, string>>;
}

export class FontCatalog implements FontProvider {
  private fonts = new Map<string, FontMetrics>();
  private families = new Map<string, Map<FontStyle, FontMetrics>>();

  /**
   * Register a font under its PostScript name
   */
  register(font: FontMetrics): FontMetrics {
    this.fonts.set(font.name, font);
    return font;
  }

  font(name: string): FontMetrics | undefined {
    return this.fonts.get(name);
  }

  /**
   * Map a family style to a font. Family names are case-insensitive.
   */
  setStyle(family: string, style: FontStyle, font: FontMetrics): void {
    const key = family.toLowerCase();
    let styles = this.families.get(key);
    if (!styles) {
      styles = new Map();
      this.families.set(key, styles);
    }
    styles.set(style, font);
  }

  resolve(family: string, style: FontStyle, location: SourceLocation | null = null): FontMetrics {
    const font = this.families.get(family.toLowerCase())?.get(style);
    if (!font) {
      throw new FontResolutionError(family, style, location);
    }
    return font;
  }

  /**
   * Catalogue of the fonts shipped with Burro
   */
  static builtin(): FontCatalog {
    const catalog = new FontCatalog();
    for (const file of BUILTIN_FILES) {
      const url = new URL(`../../fonts/${file}.json`, import.meta.url);
      catalog.addFamilyFile(readJson(url, `${file}.json`));
    }
    return catalog;
  }

  private addFamilyFile(content: unknown): void {
    if (!isFamilyFile(content)) {
      throw new FontMapError('malformed built-in font family file');
    }
    for (const [style, name] of Object.entries(content.styles)) {
      if (!isFontStyle(style) || name === undefined) {
        throw new FontMapError(`unknown style '${style}' in family '${content.family}'`);
      }
      const font = this.register(
        new FontMetrics({
          name,
          ascent: content.ascent,
          descent: content.descent,
          defaultWidth: content.defaultWidth,
          widths: content.widths,
        })
      );
      this.setStyle(content.family, style, font);
    }
  }
}

/**
 * Read and parse a JSON file, reporting failures as FontMapError
 */
export function readJson(file: string | URL, label: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new FontMapError(`cannot read ${label}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new FontMapError(`invalid JSON in ${label}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWidthTable(value: unknown): value is Record<string, number> {
  return isRecord(value) && Object.values(value).every(width => typeof width === 'number');
}

export function isFontMetricsData(value: unknown): value is FontMetricsData {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.ascent === 'number' &&
    typeof value.descent === 'number' &&
    typeof value.defaultWidth === 'number' &&
    isWidthTable(value.widths)
  );
}

function isFamilyFile(value: unknown): value is FamilyFile {
  return (
    isRecord(value) &&
    typeof value.family === 'string' &&
    typeof value.ascent === 'number' &&
    typeof value.descent === 'number' &&
    typeof value.defaultWidth === 'number' &&
    isWidthTable(value.widths) &&
    isRecord(value.styles) &&
    Object.values(value.styles).every(name => typeof name === 'string')
  );
}
