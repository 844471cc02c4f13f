/**
 * Burro Core - markup compiler for fixed, author-controlled page layout
 *
 * This is the core library containing:
 * - Lexer and parser (document tree, variables, tab definitions)
 * - Typesetting state (per-key setting stacks)
 * - Tab environment and layout engine
 * - Font metrics catalogue and font map loader
 * - Page sink interface (backend abstraction)
 */

export * from './errors.js';
export * from './sink.js';
export { compile, render, type CompileOptions, type CompileResult } from './compile.js';

// Lexer and parser
export { Lexer, lex, type LexOptions } from './lexer/lexer.js';
export { TokenType, type Token, type SourceLocation } from './lexer/token.js';
export { Parser, parse, type ParseOptions } from './parser/parser.js';
export type { Document, DocumentTree, Block, Fragment, NodeId, CommandNode, TextNode } from './parser/document.js';
export type { CommandName, CommandPayload } from './parser/commands.js';
export { parseLength, type Alignment, type Measure } from './parser/units.js';

// State and layout
export { TypesettingState, DEFAULT_SETTINGS, type Settings, type SettingKey } from './state/typesetting-state.js';
export { TabEnvironment } from './tabs/tab-environment.js';
export type { TabDefinition, TabList } from './tabs/tab.js';
export {
  layout,
  LayoutContext,
  type LayoutOptions,
  type LayoutResult,
  type PageGeometry,
  type TextPlacement,
} from './layout/layout.js';

// Fonts
export { FontCatalog } from './fonts/catalog.js';
export { loadFontMap, applyFontMap } from './fonts/fontmap.js';
export { FontMetrics, fontStyle, type FontStyle, type FontRef, type FontProvider } from './fonts/metrics.js';
