/**
 * XML Backend for Burro - XML dump of the placement stream
 *
 * Writes every page with its geometry and every placed piece of text with
 * its position, font and size, in layout order. Used for debugging and for
 * comparing layouts in tests.
 *
 * Output:
 *   <?xml version="1.0"?>
 *   <layout pages="1">
 *   <page index="0" width="612" height="792" margin-top="72" ...>
 *   <text x="72" y="79.548" font="Courier" family="courier" style="roman" size="12">Hello</text>
 *   </page>
 *   </layout>
 */

import type { PageGeometry, PageSink, TextPlacement } from 'burro-core';

export class XmlBackend implements PageSink {
  readonly encoding = 'utf-8';

  private output: string = '';

  startDocument(pages: readonly PageGeometry[]): void {
    this.output = '<?xml version="1.0"?>\n';
    this.output += `<layout pages="${pages.length}">\n`;
  }

  startPage(page: PageGeometry): void {
    const { top, right, bottom, left } = page.margins;
    this.output +=
      `<page index="${page.index}" width="${formatNumber(page.width)}" height="${formatNumber(page.height)}"` +
      ` margin-top="${formatNumber(top)}" margin-right="${formatNumber(right)}"` +
      ` margin-bottom="${formatNumber(bottom)}" margin-left="${formatNumber(left)}">\n`;
  }

  text(placement: TextPlacement): void {
    const { font } = placement;
    this.output +=
      `<text x="${formatNumber(placement.x)}" y="${formatNumber(placement.y)}"` +
      ` font="${this.escapeXml(font.name)}" family="${this.escapeXml(font.family)}" style="${font.style}"` +
      ` size="${formatNumber(placement.size)}">${this.escapeXml(placement.text)}</text>\n`;
  }

  endPage(_page: PageGeometry): void {
    this.output += '</page>\n';
  }

  /**
   * Finish output
   */
  end(): void {
    this.output += '</layout>\n';
  }

  getOutput(): string {
    return this.output;
  }

  /**
   * Escape XML special characters
   */
  private escapeXml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&apos;');
  }
}

function formatNumber(value: number): string {
  return String(Number(value.toFixed(3)));
}

/**
 * Create an XML backend
 */
export function createXmlBackend(): XmlBackend {
  return new XmlBackend();
}
