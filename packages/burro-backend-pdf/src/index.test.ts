/**
 * PDF backend tests
 */

import { describe, it, expect } from 'vitest';
import { render, type PageGeometry, type TextPlacement } from 'burro-core';
import { createPdfBackend } from './index.js';

const LETTER: PageGeometry = {
  index: 0,
  width: 612,
  height: 792,
  margins: { top: 72, right: 72, bottom: 72, left: 72 },
};

function placement(text: string, name = 'Courier', page = 0): TextPlacement {
  return { page, x: 72, y: 79.548, text, font: { family: 'courier', style: 'roman', name }, size: 12 };
}

function write(pages: PageGeometry[], placements: TextPlacement[]): string {
  const backend = createPdfBackend({ compress: false });
  backend.startDocument(pages);
  for (const page of pages) {
    backend.startPage(page);
    for (const p of placements.filter(p => p.page === page.index)) {
      backend.text(p);
    }
    backend.endPage(page);
  }
  backend.end();
  return backend.getOutput();
}

describe('PDF Backend - File Structure', () => {
  it('should start with the header and end with %%EOF', () => {
    const output = write([LETTER], [placement('Hello')]);
    expect(output.startsWith('%PDF-1.4\n')).toBe(true);
    expect(output.endsWith('%%EOF\n')).toBe(true);
  });

  it('should give each page its size', () => {
    const small: PageGeometry = { ...LETTER, index: 1, width: 288, height: 432 };
    const output = write([LETTER, small], [placement('Hello')]);
    expect(output).toContain('/Count 2');
    expect(output).toContain('/MediaBox [0 0 612 792]');
    expect(output).toContain('/MediaBox [0 0 288 432]');
  });

  it('should name each font it sets', () => {
    const output = write([LETTER], [placement('a', 'Courier-Bold'), placement('b', 'Helvetica-Oblique')]);
    expect(output).toContain('/BaseFont /Courier-Bold');
    expect(output).toContain('/BaseFont /Helvetica-Oblique');
  });
});

describe('PDF Backend - Errors', () => {
  it('should reject text outside of a page', () => {
    const backend = createPdfBackend();
    backend.startDocument([LETTER]);
    expect(() => backend.text(placement('x'))).toThrow('PdfBackend: text outside of a page');
  });

  it('should reject fonts that are not standard PDF fonts', () => {
    const backend = createPdfBackend();
    backend.startDocument([LETTER]);
    backend.startPage(LETTER);
    expect(() => backend.text(placement('x', 'Narrow-Roman'))).toThrow(
      "PdfBackend: 'Narrow-Roman' is not a standard PDF font"
    );
  });

  it('should require startDocument() first', () => {
    expect(() => createPdfBackend().startPage(LETTER)).toThrow('PdfBackend: startDocument() was not called');
  });
});

describe('PDF Backend - Rendering', () => {
  it('should render a document with the fonts it uses', () => {
    const output = render('.bold[Hi] there', createPdfBackend());
    expect(output.startsWith('%PDF-1.4\n')).toBe(true);
    expect(output).toContain('/BaseFont /Courier-Bold');
    expect(output).toContain('/BaseFont /Courier\n');
    expect(output).toContain('/Count 1');
  });

  it('should render curly quotes and bold Helvetica', () => {
    const output = render('.family[helvetica]\n\n.bold[.quote[Burro]]', createPdfBackend());
    expect(output).toContain('/BaseFont /Helvetica-Bold');
  });
});
