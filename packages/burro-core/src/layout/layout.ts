/**
 * Layout Engine
 *
 * Walks the document blocks with the typesetting state, the tab
 * environment and the font provider, and turns text into positioned
 * placements on pages. One LayoutContext exists per compile; it owns all
 * mutable state of the walk.
 *
 * Text is cut into words at whitespace and into pieces at style changes.
 * Words go through the greedy LineBreaker; each finished line is
 * positioned horizontally by its alignment and vertically by the largest
 * ascent and leading among its pieces. A line whose baseline would pass
 * the bottom margin moves to a new page unless it is the first on the
 * page.
 *
 * Commands that change line geometry end the pending line (ragged) before
 * they apply; style commands apply in the middle of a line.
 *
 * Inside an active tab environment every paragraph is a row: each column
 * starts at the row's top and the row ends below its deepest column.
 */

import { LayoutOverflowWarning, ParseError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';
import { type FontMetrics, type FontProvider, type FontRef, fontStyle } from '../fonts/metrics.js';
import type { CommandNode, Document, Fragment, NodeId } from '../parser/document.js';
import type { CommandPayload } from '../parser/commands.js';
import { type Alignment, type Measure, type Reset, resolveMeasure } from '../parser/units.js';
import { type LengthKey, MARGIN_KEYS, TypesettingState, isReset } from '../state/typesetting-state.js';
import type { TabDefinition } from '../tabs/tab.js';
import { TabEnvironment } from '../tabs/tab-environment.js';
import { type Line, type LineMeasure, type Piece, LineBreaker, positionLine } from './line-builder.js';

export const OPEN_QUOTE = '“';
export const CLOSE_QUOTE = '”';

export interface PageGeometry {
  index: number;
  width: number;
  height: number;
  margins: { top: number; right: number; bottom: number; left: number };
}

export interface TextPlacement {
  page: number;
  x: number;
  /** Baseline, measured down from the top edge of the page */
  y: number;
  text: string;
  font: FontRef;
  size: number;
}

export interface LayoutResult {
  pages: PageGeometry[];
  placements: TextPlacement[];
  warnings: LayoutOverflowWarning[];
}

export interface LayoutOptions {
  fonts: FontProvider;
  onWarning?: (warning: LayoutOverflowWarning) => void;
}

/**
 * Items of the explicit walk stack
 */
type WalkItem =
  | { kind: 'node'; id: NodeId }
  | { kind: 'text'; text: string; location: SourceLocation }
  | { kind: 'unstyle'; key: 'bold' | 'italic'; location: SourceLocation };

interface Position {
  page: number;
  y: number;
}

interface ActiveStyle {
  font: FontMetrics;
  ref: FontRef;
  size: number;
  leading: number;
}

/**
 * Keys whose change moves the edges of the line
 */
const GEOMETRY_KEYS: ReadonlySet<LengthKey> = new Set<LengthKey>(MARGIN_KEYS);

/**
 * Keys recorded in the page geometry
 */
const PAGE_KEYS: ReadonlySet<LengthKey> = new Set<LengthKey>([...MARGIN_KEYS, 'page_width', 'page_height']);

export class LayoutContext {
  private state: TypesettingState;
  private tabs: TabEnvironment;
  private breaker: LineBreaker;

  private pages: PageGeometry[] = [];
  private placements: TextPlacement[] = [];
  private warnings: LayoutOverflowWarning[] = [];

  private pageIndex = 0;
  private cursorY = 0;
  private pageTopY = 0;

  private inParagraph = false;
  private firstLine = false;
  private linesInParagraph = 0;
  private rowTop: Position = { page: 0, y: 0 };
  private rowBottom: Position = { page: 0, y: 0 };
  private column: TabDefinition | null = null;

  private style: ActiveStyle | null = null;
  private word: Piece[] = [];
  private gap: number | null = null;

  constructor(
    private doc: Document,
    private options: LayoutOptions
  ) {
    this.state = new TypesettingState();
    this.tabs = new TabEnvironment(this.state, doc.tabs, doc.tabLists);
    this.breaker = new LineBreaker(
      () => this.lineMeasure(),
      line => this.placeLine(line)
    );
  }

  run(): LayoutResult {
    for (const id of this.doc.preamble) {
      this.applyDefault(this.doc.tree.command(id));
    }

    this.allocatePage();

    for (const block of this.doc.blocks) {
      if (block.type === 'paragraph') {
        this.layoutParagraph(block.content);
      } else {
        this.walk([block.node]);
      }
    }

    if (this.tabs.isActive) {
      this.tabs.quit(null);
      this.column = null;
    }

    if (process.env.DEBUG_LAYOUT) {
      console.error(`DEBUG_LAYOUT: ${this.placements.length} placements on ${this.pages.length} pages`);
    }

    return { pages: this.pages, placements: this.placements, warnings: this.warnings };
  }

  // ============ Paragraphs ============

  private layoutParagraph(content: Fragment): void {
    this.inParagraph = true;
    this.firstLine = true;
    this.linesInParagraph = 0;
    this.gap = null;
    if (this.tabs.isActive) {
      this.rowTop = this.here();
      this.rowBottom = this.here();
    }

    this.walk(content);

    this.endLine();
    if (this.tabs.isActive) {
      this.moveTo(deeper(this.rowBottom, this.here()));
    }
    if (this.linesInParagraph > 0) {
      this.cursorY += this.state.get('par_space');
    }
    this.inParagraph = false;
  }

  /**
   * Depth-first walk of a fragment with an explicit stack
   */
  private walk(fragment: Fragment): void {
    const stack: WalkItem[] = [];
    pushFragment(stack, fragment);

    for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
      if (item.kind === 'text') {
        this.addText(item.text, item.location);
        continue;
      }
      if (item.kind === 'unstyle') {
        this.state.pop(item.key, item.location);
        this.style = null;
        continue;
      }

      const node = this.doc.tree.node(item.id);
      if (node.type === 'text') {
        this.addText(node.text, node.location);
        continue;
      }

      const { payload, location } = node;
      if (payload.kind === 'style') {
        this.state.push(payload.style, true);
        this.style = null;
        stack.push({ kind: 'unstyle', key: payload.style, location });
        pushFragment(stack, node.argument ?? []);
      } else if (payload.kind === 'quote') {
        stack.push({ kind: 'text', text: CLOSE_QUOTE, location });
        pushFragment(stack, node.argument ?? []);
        stack.push({ kind: 'text', text: OPEN_QUOTE, location });
      } else {
        this.applyCommand(node);
      }
    }
  }

  // ============ Words and pieces ============

  private addText(text: string, location: SourceLocation): void {
    for (const char of text) {
      if (char === ' ' || char === '\t' || char === '\n') {
        this.endWord();
        if (this.gap === null) {
          const style = this.activeStyle(location);
          this.gap = style.font.measure(' ', style.size);
        }
        continue;
      }
      this.addChar(char, location);
    }
  }

  private addChar(char: string, location: SourceLocation): void {
    const style = this.activeStyle(location);
    const last = this.word[this.word.length - 1];
    if (last && last.font === style.font && last.size === style.size && last.leading === style.leading) {
      last.text += char;
      return;
    }
    this.word.push({
      text: char,
      width: 0,
      font: style.font,
      ref: style.ref,
      size: style.size,
      ascent: style.font.ascender(style.size),
      leading: style.leading,
    });
  }

  private endWord(): void {
    if (this.word.length === 0) {
      return;
    }
    let width = 0;
    for (const piece of this.word) {
      piece.width = piece.font.measure(piece.text, piece.size);
      width += piece.width;
    }
    this.breaker.add({ pieces: this.word, width, gap: this.gap ?? 0 });
    this.word = [];
    this.gap = null;
  }

  /**
   * End the pending line without stretching it
   */
  private endLine(): void {
    this.endWord();
    this.breaker.flush(true);
    this.gap = null;
  }

  private activeStyle(location: SourceLocation): ActiveStyle {
    if (!this.style) {
      const family = this.state.get('family');
      const style = fontStyle(this.state.get('bold'), this.state.get('italic'));
      const font = this.options.fonts.resolve(family, style, location);
      this.style = {
        font,
        ref: { family, style, name: font.name },
        size: this.state.get('pt_size'),
        leading: this.state.leading(),
      };
    }
    return this.style;
  }

  // ============ Lines and pages ============

  private lineMeasure(): LineMeasure {
    const page = this.pages[this.pageIndex];
    let left = this.state.get('margin_left');
    let width = page.width - left - this.state.get('margin_right');

    if (this.firstLine && !this.tabs.isActive) {
      const indent = this.state.get('par_indent');
      left += indent;
      width -= indent;
    }

    return {
      left,
      width,
      align: this.state.get('align'),
      wrap: this.column?.quad ?? true,
    };
  }

  private placeLine(line: Line): void {
    const measure = this.lineMeasure();
    let ascent = 0;
    let leading = 0;
    for (const word of line.words) {
      for (const piece of word.pieces) {
        ascent = Math.max(ascent, piece.ascent);
        leading = Math.max(leading, piece.leading);
      }
    }

    const bottom = this.pages[this.pageIndex].height - this.state.get('margin_bottom');
    if (this.cursorY + ascent > bottom && this.cursorY > this.pageTopY) {
      this.nextPage();
    }

    const baseline = this.cursorY + ascent;
    const positions = positionLine(line, measure);
    let index = 0;
    for (const word of line.words) {
      for (const piece of word.pieces) {
        this.placements.push({
          page: this.pageIndex,
          x: positions[index++],
          y: baseline,
          text: piece.text,
          font: piece.ref,
          size: piece.size,
        });
      }
    }

    this.cursorY += leading;
    this.firstLine = false;
    this.linesInParagraph++;
  }

  private allocatePage(): PageGeometry {
    const page = this.pageGeometry(this.pages.length);
    this.pages.push(page);
    this.pageIndex = page.index;
    this.cursorY = page.margins.top;
    this.pageTopY = this.cursorY;

    if (process.env.DEBUG_LAYOUT) {
      console.error(`DEBUG_LAYOUT: page ${page.index + 1} (${page.width} x ${page.height})`);
    }
    return page;
  }

  private pageGeometry(index: number): PageGeometry {
    return {
      index,
      width: this.state.get('page_width'),
      height: this.state.get('page_height'),
      margins: {
        top: this.state.get('margin_top'),
        right: this.state.get('margin_right'),
        bottom: this.state.get('margin_bottom'),
        left: this.state.get('margin_left'),
      },
    };
  }

  /**
   * A page with nothing on it yet takes the current page size and margins,
   * and its first line starts at the new top margin
   */
  private refreshBlankPage(): void {
    if (this.tabs.isActive || this.placements.some(p => p.page === this.pageIndex)) {
      return;
    }
    const page = this.pageGeometry(this.pageIndex);
    this.pages[this.pageIndex] = page;
    this.cursorY = page.margins.top;
    this.pageTopY = this.cursorY;
  }

  /**
   * Continue on the following page, which a tab row may already have
   * allocated
   */
  private nextPage(): void {
    if (this.pageIndex + 1 < this.pages.length) {
      this.pageIndex++;
      this.cursorY = this.state.get('margin_top');
      this.pageTopY = this.cursorY;
    } else {
      this.allocatePage();
    }
  }

  private here(): Position {
    return { page: this.pageIndex, y: this.cursorY };
  }

  private moveTo(position: Position): void {
    this.pageIndex = position.page;
    this.cursorY = position.y;
    this.pageTopY = this.state.get('margin_top');
  }

  // ============ Commands ============

  private applyCommand(node: CommandNode): void {
    const { payload, location } = node;

    switch (payload.kind) {
      case 'align':
        this.endLine();
        this.state.set('align', payload.value, location);
        break;

      case 'length':
        this.applyLength(payload.keys, payload.value, location);
        break;

      case 'leading':
        if (isReset(payload.value) || payload.value === 'auto') {
          this.state.set('leading', payload.value, location);
        } else {
          this.state.set('leading', this.positive('leading', resolveMeasure(payload.value, this.state.leading()), location));
        }
        this.style = null;
        break;

      case 'family':
        this.state.set('family', payload.value, location);
        this.style = null;
        break;

      case 'load_tabs':
        this.endLine();
        this.tabs.load(payload.list, this.pages[this.pageIndex].width, location);
        this.column = null;
        if (this.inParagraph) {
          this.rowTop = this.here();
          this.rowBottom = this.here();
        }
        break;

      case 'tab':
        this.switchColumn(() => this.tabs.select(payload.tab, location), location);
        break;

      case 'next_tab':
        this.switchColumn(() => this.tabs.next(location), location);
        break;

      case 'previous_tab':
        this.switchColumn(() => this.tabs.previous(location), location);
        break;

      case 'quit_tabs':
        this.endLine();
        this.tabs.quit(location);
        this.column = null;
        if (this.inParagraph) {
          this.moveTo(deeper(this.rowBottom, this.here()));
        }
        break;

      case 'page_break':
        this.endLine();
        this.nextPage();
        break;

      // bold, italic and quote wrap their argument and are handled by walk()
      case 'style':
      case 'quote':
      case 'start':
      case 'define_tab':
      case 'tab_list':
        break;
    }
  }

  private applyLength(keys: readonly LengthKey[], value: Measure | Reset, location: SourceLocation): void {
    if (keys.some(key => GEOMETRY_KEYS.has(key))) {
      this.endLine();
    }
    for (const key of keys) {
      if (isReset(value)) {
        this.state.set(key, value, location);
      } else {
        this.state.set(key, this.positive(key, resolveMeasure(value, this.state.get(key)), location));
      }
    }
    if (keys.includes('pt_size')) {
      this.style = null;
    }
    if (keys.some(key => PAGE_KEYS.has(key))) {
      this.refreshBlankPage();
    }
  }

  /**
   * Sizes must stay positive after a relative change; other lengths must
   * not go negative
   */
  private positive(key: string, value: number, location: SourceLocation): number {
    const sized = key === 'pt_size' || key === 'leading';
    if (sized ? value <= 0 : value < 0) {
      throw new ParseError(`.${key} would become ${value}`, location);
    }
    return value;
  }

  /**
   * Leave the current column and enter the one chosen by `select`
   */
  private switchColumn(select: () => TabDefinition, location: SourceLocation): void {
    this.endLine();
    if (this.inParagraph) {
      this.rowBottom = deeper(this.rowBottom, this.here());
    }

    const tab = select();
    this.column = tab;
    if (this.inParagraph) {
      this.moveTo(this.rowTop);
    }

    const usable = this.tabs.usableWidth();
    if (tab.indent + tab.length > usable) {
      const warning = new LayoutOverflowWarning(
        `tab '${tab.name}' (indent ${tab.indent} + length ${tab.length}) is wider than the usable width ${usable}`,
        location
      );
      this.warnings.push(warning);
      this.options.onWarning?.(warning);
    }
  }

  private applyDefault(node: CommandNode): void {
    const { payload, location } = node;
    const value = defaultValue(payload);
    if (value === null) {
      return;
    }
    switch (value.kind) {
      case 'align':
        this.state.setDefault('align', value.value);
        break;
      case 'family':
        this.state.setDefault('family', value.value);
        break;
      case 'leading':
        this.state.setDefault(
          'leading',
          value.value === 'auto' ? 'auto' : this.positive('leading', resolveMeasure(value.value, this.state.leading()), location)
        );
        break;
      case 'length':
        for (const key of value.keys) {
          this.state.setDefault(key, this.positive(key, resolveMeasure(value.value, this.state.get(key)), location));
        }
        break;
    }
  }
}

/**
 * Preamble payloads with resets filtered out
 */
type DefaultValue =
  | { kind: 'align'; value: Alignment }
  | { kind: 'family'; value: string }
  | { kind: 'leading'; value: Measure | 'auto' }
  | { kind: 'length'; keys: readonly LengthKey[]; value: Measure };

function defaultValue(payload: CommandPayload): DefaultValue | null {
  switch (payload.kind) {
    case 'align':
      return isReset(payload.value) ? null : { kind: 'align', value: payload.value };
    case 'family':
      return isReset(payload.value) ? null : { kind: 'family', value: payload.value };
    case 'leading':
      return isReset(payload.value) ? null : { kind: 'leading', value: payload.value };
    case 'length':
      return isReset(payload.value) ? null : { kind: 'length', keys: payload.keys, value: payload.value };
    default:
      return null;
  }
}

function pushFragment(stack: WalkItem[], fragment: Fragment): void {
  for (let i = fragment.length - 1; i >= 0; i--) {
    stack.push({ kind: 'node', id: fragment[i] });
  }
}

function deeper(a: Position, b: Position): Position {
  if (a.page !== b.page) {
    return a.page > b.page ? a : b;
  }
  return a.y >= b.y ? a : b;
}

/**
 * Lay out a parsed document
 */
export function layout(doc: Document, options: LayoutOptions): LayoutResult {
  return new LayoutContext(doc, options).run();
}
