/**
 * PDF Backend for Burro - renders the placement stream with PDFKit
 *
 * Text is set in the standard PDF fonts named by the font metrics
 * (Courier, Helvetica, ...), which every PDF reader provides, so no font
 * data is embedded. Placements carry their baseline measured down from the
 * page top, which is PDFKit's coordinate system with an alphabetic
 * baseline.
 *
 * PDFKit writes the document into its readable buffer synchronously, so
 * the whole file can be read back as soon as end() returns.
 */

import PDFDocument from 'pdfkit';
import type { PageGeometry, PageSink, TextPlacement } from 'burro-core';

/**
 * Fonts every PDF reader provides
 */
export const STANDARD_FONTS: ReadonlySet<string> = new Set([
  'Courier',
  'Courier-Bold',
  'Courier-Oblique',
  'Courier-BoldOblique',
  'Helvetica',
  'Helvetica-Bold',
  'Helvetica-Oblique',
  'Helvetica-BoldOblique',
  'Times-Roman',
  'Times-Bold',
  'Times-Italic',
  'Times-BoldItalic',
  'Symbol',
  'ZapfDingbats',
]);

export interface PdfBackendOptions {
  /** Deflate page content streams (default true) */
  compress?: boolean;
}

export class PdfBackend implements PageSink {
  readonly encoding = 'latin1';

  private doc: PDFKit.PDFDocument | null = null;
  private inPage: boolean = false;
  private output: string = '';

  constructor(private options: PdfBackendOptions = {}) {}

  startDocument(_pages: readonly PageGeometry[]): void {
    this.doc = new PDFDocument({
      autoFirstPage: false,
      pdfVersion: '1.4',
      compress: this.options.compress ?? true,
    });
    this.output = '';
  }

  startPage(page: PageGeometry): void {
    this.document().addPage({ size: [page.width, page.height], margin: 0 });
    this.inPage = true;
  }

  text(placement: TextPlacement): void {
    if (!this.inPage) {
      throw new Error('PdfBackend: text outside of a page');
    }
    const { name } = placement.font;
    if (!STANDARD_FONTS.has(name)) {
      throw new Error(`PdfBackend: '${name}' is not a standard PDF font`);
    }
    this.document()
      .font(name)
      .fontSize(placement.size)
      .text(placement.text, placement.x, placement.y, { lineBreak: false, baseline: 'alphabetic' });
  }

  endPage(_page: PageGeometry): void {
    this.inPage = false;
  }

  /**
   * Finish the document and collect its bytes
   */
  end(): void {
    const doc = this.document();
    doc.end();
    const data = doc.read();
    this.output = Buffer.isBuffer(data) ? data.toString('latin1') : String(data ?? '');
    this.doc = null;

    if (process.env.DEBUG) {
      console.error(`DEBUG: PDF of ${this.output.length} bytes`);
    }
  }

  getOutput(): string {
    return this.output;
  }

  private document(): PDFKit.PDFDocument {
    if (!this.doc) {
      throw new Error('PdfBackend: startDocument() was not called');
    }
    return this.doc;
  }
}

/**
 * Create a PDF backend
 */
export function createPdfBackend(options: PdfBackendOptions = {}): PdfBackend {
  return new PdfBackend(options);
}
