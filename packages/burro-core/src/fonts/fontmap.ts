/**
 * Font map loader
 *
 * A font map is a YAML file that adds families to a catalogue:
 *
 *   families:
 *     body:
 *       roman: Helvetica            # a registered font, by PostScript name
 *       italic: ./metrics/x.json    # or a metrics file, relative to the map
 *
 * A value naming a .json file is read as FontMetricsData; anything else
 * must be the PostScript name of a font already in the catalogue.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { FontMapError } from '../errors.js';
import { type FontCatalog, isFontMetricsData, isRecord, readJson } from './catalog.js';
import { FontMetrics, FONT_STYLES, isFontStyle } from './metrics.js';

/**
 * Load a font map file into the catalogue
 */
export function loadFontMap(file: string, catalog: FontCatalog): void {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new FontMapError(`cannot read font map ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  applyFontMap(text, path.dirname(path.resolve(file)), catalog, file);
}

/**
 * Apply font map source text; metrics paths resolve against baseDir
 */
export function applyFontMap(source: string, baseDir: string, catalog: FontCatalog, label = 'font map'): void {
  let content: unknown;
  try {
    content = parseYaml(source);
  } catch (e) {
    throw new FontMapError(`invalid YAML in ${label}: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!isRecord(content) || !isRecord(content.families)) {
    throw new FontMapError(`${label} has no 'families' table`);
  }

  for (const [family, styles] of Object.entries(content.families)) {
    if (!isRecord(styles)) {
      throw new FontMapError(`family '${family}' in ${label} must map styles to fonts`);
    }

    for (const [style, value] of Object.entries(styles)) {
      if (!isFontStyle(style)) {
        throw new FontMapError(
          `unknown style '${style}' for family '${family}', expected one of ${FONT_STYLES.join(', ')}`
        );
      }
      if (typeof value !== 'string' || value.trim() === '') {
        throw new FontMapError(`family '${family}' style '${style}' must name a font`);
      }

      const font = value.endsWith('.json')
        ? loadMetricsFile(path.resolve(baseDir, value), catalog)
        : catalog.font(value.trim());
      if (!font) {
        throw new FontMapError(`unknown font '${value}' for family '${family}' style '${style}'`);
      }
      catalog.setStyle(family, style, font);

      if (process.env.DEBUG_LAYOUT) {
        console.error(`DEBUG_LAYOUT: font map ${family}/${style} -> ${font.name}`);
      }
    }
  }
}

function loadMetricsFile(file: string, catalog: FontCatalog): FontMetrics {
  const data = readJson(file, file);
  if (!isFontMetricsData(data)) {
    throw new FontMapError(`${file} is not a font metrics file`);
  }
  return catalog.register(new FontMetrics(data));
}
