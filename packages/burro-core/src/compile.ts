/**
 * Compile pipeline: source -> tokens -> document -> layout -> sink
 */

import { lex } from './lexer/lexer.js';
import { Parser } from './parser/parser.js';
import type { Document } from './parser/document.js';
import { FontCatalog } from './fonts/catalog.js';
import type { FontProvider } from './fonts/metrics.js';
import { layout, type LayoutResult } from './layout/layout.js';
import type { LayoutOverflowWarning } from './errors.js';
import { emitLayout, type PageSink } from './sink.js';

export interface CompileOptions {
  /** File name reported in error locations */
  file?: string;
  /** Defaults to the built-in catalogue */
  fonts?: FontProvider;
  onWarning?: (warning: LayoutOverflowWarning) => void;
}

export interface CompileResult {
  document: Document;
  layout: LayoutResult;
}

/**
 * Parse and lay out a source document. Nothing is emitted, so a fatal
 * error leaves no partial output behind.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
  const tokens = lex(source, { file: options.file });
  const document = new Parser(tokens).parse();
  const result = layout(document, {
    fonts: options.fonts ?? FontCatalog.builtin(),
    onWarning: options.onWarning,
  });
  return { document, layout: result };
}

/**
 * Compile a source document and emit it into a sink
 */
export function render(source: string, sink: PageSink, options: CompileOptions = {}): string {
  const { layout: result } = compile(source, options);
  emitLayout(result, sink);
  return sink.getOutput();
}
