/**
 * Page sink interface - backend abstraction
 *
 * A sink receives the finished layout as a stream of events: the document
 * start with every page's geometry, then for each page its start, its
 * text placements in layout order and its end, and finally end().
 */

import type { LayoutResult, PageGeometry, TextPlacement } from './layout/layout.js';

export interface PageSink {
  /**
   * Encoding for writing getOutput() to a file
   */
  readonly encoding: BufferEncoding;

  startDocument(pages: readonly PageGeometry[]): void;

  startPage(page: PageGeometry): void;

  /**
   * One placed piece of text; y is measured down from the page top
   */
  text(placement: TextPlacement): void;

  endPage(page: PageGeometry): void;

  /**
   * Finish output
   */
  end(): void;

  getOutput(): string;
}

/**
 * Drive a sink with a layout result
 */
export function emitLayout(result: LayoutResult, sink: PageSink): void {
  const byPage = new Map<number, TextPlacement[]>();
  for (const placement of result.placements) {
    const list = byPage.get(placement.page);
    if (list) {
      list.push(placement);
    } else {
      byPage.set(placement.page, [placement]);
    }
  }

  sink.startDocument(result.pages);
  for (const page of result.pages) {
    sink.startPage(page);
    for (const placement of byPage.get(page.index) ?? []) {
      sink.text(placement);
    }
    sink.endPage(page);
  }
  sink.end();
}
