/**
 * Burro Parser
 *
 * Builds the document tree from the token stream in two passes:
 *
 * 1. Every `#define` in the stream (including definitions nested inside
 *    other definitions) is collected, and each definition is parsed into a
 *    canonical fragment. References between definitions are resolved on
 *    demand, so order does not matter; a cycle is an error.
 * 2. The blocks are parsed. A `~name` reference splices a fresh copy of the
 *    canonical fragment, so no two reference sites share nodes.
 *
 * Commands are validated against the closed command table as they are
 * read. Tab and tab list definitions are registered while parsing and are
 * global, like variables.
 */

import {
  ParseError,
  UndefinedTabError,
  UndefinedVariableError,
} from '../errors.js';
import { lex, type LexOptions } from '../lexer/lexer.js';
import {
  type SourceLocation,
  type Token,
  type VariableDefineToken,
  TokenType,
  describeToken,
} from '../lexer/token.js';
import type { TabDefinition, TabList } from '../tabs/tab.js';
import {
  type CommandName,
  type CommandPayload,
  type DirectiveName,
  contentPayload,
  defineTabPayload,
  isCommandName,
  isContentCommand,
  isDefinition,
  isDirective,
  isValueCommand,
  tabListPayload,
  valuePayload,
} from './commands.js';
import {
  type Block,
  type Document,
  type Fragment,
  type NodeId,
  type SubSetting,
  DocumentTree,
} from './document.js';
import { RESET } from './units.js';

/**
 * What ends the fragment being parsed
 *
 * - paragraph: a ParagraphBreak or the end of input (neither consumed)
 * - bracket: the matching `]` (left for the caller)
 * - inline: `|` (consumed), a ParagraphBreak, the end of input, or the `]`
 *   of an enclosing bracket argument (not consumed)
 * - variable: the end of the definition's tokens
 */
type FragmentEnd = 'paragraph' | 'bracket' | 'inline' | 'variable';

/**
 * Where a command appears: as a top-level block or inside a fragment
 */
type CommandContext = 'block' | 'fragment';

interface Cursor {
  tokens: readonly Token[];
  pos: number;
  /** Bracket arguments currently open in this token list */
  bracketDepth: number;
}

export class Parser {
  private cursor: Cursor;
  private tree = new DocumentTree();

  private definitions = new Map<string, VariableDefineToken>();
  private variables = new Map<string, Fragment>();
  private resolving: string[] = [];

  private tabs = new Map<string, TabDefinition>();
  private tabLists = new Map<string, TabList>();

  constructor(tokens: readonly Token[]) {
    this.cursor = { tokens, pos: 0, bracketDepth: 0 };
  }

  /**
   * Parse the whole token stream into a Document
   */
  parse(): Document {
    this.collectDefinitions(this.cursor.tokens);
    for (const [name, token] of this.definitions) {
      this.resolveVariable(name, token.location);
    }

    const blocks = this.parseBlocks();
    this.checkTabLists();
    const { preamble, body } = this.splitPreamble(blocks);

    if (process.env.DEBUG_PARSE) {
      console.error(
        `DEBUG_PARSE: ${body.length} blocks, ${preamble.length} preamble settings, ` +
          `${this.variables.size} variables, ${this.tabs.size} tabs, ${this.tabLists.size} tab lists`
      );
    }

    return {
      tree: this.tree,
      blocks: body,
      preamble,
      variables: this.variables,
      tabs: this.tabs,
      tabLists: this.tabLists,
    };
  }

  // ============ Variables ============

  private collectDefinitions(tokens: readonly Token[]): void {
    for (const token of tokens) {
      if (token.type !== TokenType.VariableDefine) {
        continue;
      }
      const previous = this.definitions.get(token.name);
      if (previous) {
        throw new ParseError(
          `variable '${token.name}' is already defined at ${previous.location.line}:${previous.location.column}`,
          token.location
        );
      }
      this.definitions.set(token.name, token);
      this.collectDefinitions(token.fragment);
    }
  }

  /**
   * Canonical fragment of a variable, parsing its definition on first use
   */
  private resolveVariable(name: string, location: SourceLocation): Fragment {
    const resolved = this.variables.get(name);
    if (resolved) {
      return resolved;
    }

    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UndefinedVariableError(name, location);
    }
    if (this.resolving.includes(name)) {
      const chain = [...this.resolving.slice(this.resolving.indexOf(name)), name].join(' -> ');
      throw new ParseError(`circular variable definition: ${chain}`, location);
    }

    this.resolving.push(name);
    const fragment = this.withTokens(definition.fragment, () => this.parseFragment('variable', definition.location));
    this.resolving.pop();

    if (process.env.DEBUG_PARSE) {
      console.error(`DEBUG_PARSE: variable '${name}' resolved to ${fragment.length} nodes`);
    }

    this.variables.set(name, fragment);
    return fragment;
  }

  private withTokens<T>(tokens: readonly Token[], fn: () => T): T {
    const saved = this.cursor;
    this.cursor = { tokens, pos: 0, bracketDepth: 0 };
    try {
      return fn();
    } finally {
      this.cursor = saved;
    }
  }

  // ============ Blocks ============

  private parseBlocks(): Block[] {
    const blocks: Block[] = [];

    for (;;) {
      const token = this.peek();
      if (!token) {
        break;
      }

      switch (token.type) {
        case TokenType.ParagraphBreak:
        case TokenType.Comment:
        case TokenType.VariableDefine:
          this.advance();
          continue;

        case TokenType.TextRun:
          if (token.text.trim() === '') {
            this.advance();
            continue;
          }
          break;

        case TokenType.Dot: {
          const name = this.commandNameAt(this.cursor.pos);
          if (!isContentCommand(name)) {
            const node = this.parseCommand('block');
            blocks.push({ type: 'command', node, location: token.location });
            continue;
          }
          break;
        }

        default:
          break;
      }

      const content = this.parseFragment('paragraph', token.location);
      if (!this.isBlank(content)) {
        blocks.push({ type: 'paragraph', content, location: token.location });
      }
    }

    return blocks;
  }

  /**
   * Separate the configuration preamble, the blocks before `.start`
   */
  private splitPreamble(blocks: Block[]): { preamble: NodeId[]; body: Block[] } {
    const starts = blocks.filter(block => block.type === 'command' && this.tree.command(block.node).name === 'start');
    if (starts.length === 0) {
      return { preamble: [], body: blocks };
    }
    if (starts.length > 1) {
      throw new ParseError('.start may appear only once', starts[1].location);
    }

    const startIndex = blocks.indexOf(starts[0]);
    const preamble: NodeId[] = [];

    for (const block of blocks.slice(0, startIndex)) {
      if (block.type === 'paragraph') {
        throw new ParseError('only settings and definitions may appear before .start', block.location);
      }
      const command = this.tree.command(block.node);
      if (isDefinition(command.name)) {
        continue;
      }
      if (!isValueCommand(command.name) || command.name === 'load_tabs' || command.name === 'tab') {
        throw new ParseError(`.${command.name} may not appear before .start`, command.location);
      }
      if ('value' in command.payload && command.payload.value === RESET) {
        throw new ParseError(`.${command.name}[-] has nothing to reset before .start`, command.location);
      }
      preamble.push(block.node);
    }

    return { preamble, body: blocks.slice(startIndex + 1) };
  }

  private checkTabLists(): void {
    for (const list of this.tabLists.values()) {
      for (const tab of list.tabs) {
        if (!this.tabs.has(tab)) {
          throw new UndefinedTabError(tab, `tab list '${list.name}' refers to undefined tab '${tab}'`, list.location);
        }
      }
    }
  }

  // ============ Fragments ============

  private parseFragment(end: FragmentEnd, openLocation: SourceLocation): NodeId[] {
    const items: NodeId[] = [];
    let text = '';
    let textLocation: SourceLocation | null = null;

    const flush = (): void => {
      if (text !== '' && textLocation) {
        items.push(this.tree.add({ type: 'text', text, location: textLocation }));
      }
      text = '';
      textLocation = null;
    };

    const appendText = (s: string, location: SourceLocation): void => {
      textLocation ??= location;
      text += s;
    };

    for (;;) {
      const token = this.peek();
      if (!token) {
        if (end === 'bracket') {
          throw new ParseError("unmatched '['", openLocation);
        }
        break;
      }

      if (token.type === TokenType.TextRun) {
        appendText(token.text, token.location);
        this.advance();
      } else if (token.type === TokenType.Escape) {
        appendText(token.char, token.location);
        this.advance();
      } else if (token.type === TokenType.Comment || token.type === TokenType.VariableDefine) {
        this.advance();
      } else if (token.type === TokenType.VariableRef) {
        flush();
        this.advance();
        items.push(...this.tree.cloneFragment(this.resolveVariable(token.name, token.location)));
      } else if (token.type === TokenType.Dot) {
        flush();
        items.push(this.parseCommand('fragment'));
      } else if (token.type === TokenType.ParagraphBreak) {
        if (end === 'bracket') {
          throw new ParseError("unmatched '['", openLocation);
        }
        if (end === 'variable') {
          throw new ParseError('a variable definition cannot contain a paragraph break', token.location);
        }
        break;
      } else if (token.type === TokenType.CloseBracket) {
        if (end === 'bracket' || (end === 'inline' && this.cursor.bracketDepth > 0)) {
          break;
        }
        throw new ParseError("unexpected ']'", token.location);
      } else if (token.type === TokenType.Pipe) {
        if (end === 'inline') {
          this.advance();
          break;
        }
        throw new ParseError("unexpected '|'", token.location);
      } else {
        throw new ParseError(`unexpected ${describeToken(token)}`, token.location);
      }
    }

    flush();
    return items;
  }

  // ============ Commands ============

  private parseCommand(context: CommandContext): NodeId {
    const dot = this.advance();
    const location = dot.location;
    const name = this.commandNameAt(this.cursor.pos - 1);
    this.advance();

    if (context === 'fragment' && (isDefinition(name) || name === 'start')) {
      throw new ParseError(`.${name} must stand on its own, outside any paragraph or argument`, location);
    }

    let subSettings: SubSetting[] | null = null;
    if (this.peek()?.type === TokenType.OpenBrace) {
      if (!isDefinition(name)) {
        throw new ParseError(`.${name} does not take a settings block`, location);
      }
      subSettings = this.parseBraceBlock();
    }

    if (isDirective(name)) {
      if (this.peek()?.type === TokenType.OpenBracket) {
        throw new ParseError(`.${name} does not take an argument`, location);
      }
      return this.tree.add({ type: 'command', name, payload: { kind: name }, subSettings: null, argument: null, location });
    }

    const argument = this.parseArgument(name, location);
    const payload = this.buildPayload(name, argument, subSettings, location);
    this.register(payload);

    if (process.env.DEBUG_PARSE) {
      console.error(`DEBUG_PARSE: .${name} at ${location.line}:${location.column} -> ${payload.kind}`);
    }

    return this.tree.add({ type: 'command', name, payload, subSettings, argument, location });
  }

  /**
   * Bracket argument, or inline argument up to `|` or a paragraph break
   */
  private parseArgument(name: CommandName, location: SourceLocation): NodeId[] {
    const next = this.peek();
    let argument: NodeId[];

    if (next?.type === TokenType.OpenBracket) {
      this.advance();
      this.cursor.bracketDepth++;
      argument = this.parseFragment('bracket', next.location);
      this.cursor.bracketDepth--;
      this.advance(); // ']'
    } else {
      argument = this.parseFragment('inline', location);
      this.trimLeadingSpace(argument);
    }

    if (this.isBlank(argument)) {
      throw new ParseError(`.${name} needs an argument`, location);
    }
    return argument;
  }

  private buildPayload(
    name: Exclude<CommandName, DirectiveName>,
    argument: Fragment,
    subSettings: readonly SubSetting[] | null,
    location: SourceLocation
  ): CommandPayload {
    if (isContentCommand(name)) {
      return contentPayload(name);
    }

    const text = this.tree.plainText(argument);
    if (text === null) {
      throw new ParseError(`.${name} takes a plain value, not commands`, location);
    }

    if (isValueCommand(name)) {
      return valuePayload(name, text, location);
    }

    if (subSettings === null) {
      throw new ParseError(`.${name} needs a settings block`, location);
    }
    const target = text.trim();
    return name === 'define_tab'
      ? defineTabPayload(target, subSettings, location)
      : tabListPayload(target, subSettings, location);
  }

  private register(payload: CommandPayload): void {
    if (payload.kind === 'define_tab') {
      const { tab } = payload;
      if (this.tabs.has(tab.name)) {
        throw new ParseError(`repeated tab definition for '${tab.name}'`, tab.location);
      }
      this.tabs.set(tab.name, tab);
    } else if (payload.kind === 'tab_list') {
      const { list } = payload;
      if (this.tabLists.has(list.name)) {
        throw new ParseError(`repeated tab list definition for '${list.name}'`, list.location);
      }
      this.tabLists.set(list.name, list);
    }
  }

  /**
   * `{ .key[value] ... }` of a definition command
   */
  private parseBraceBlock(): SubSetting[] {
    const open = this.advance();
    const settings: SubSetting[] = [];

    for (;;) {
      const token = this.peek();
      if (!token) {
        throw new ParseError("unmatched '{'", open.location);
      }

      if (token.type === TokenType.CloseBrace) {
        this.advance();
        return settings;
      }
      if (
        token.type === TokenType.ParagraphBreak ||
        token.type === TokenType.Comment ||
        (token.type === TokenType.TextRun && token.text.trim() === '')
      ) {
        this.advance();
        continue;
      }
      if (token.type !== TokenType.Dot) {
        throw new ParseError(`unexpected ${describeToken(token)} in settings block`, token.location);
      }

      this.advance();
      const key = this.identifierAt(this.cursor.pos);
      this.advance();

      const bracket = this.peek();
      if (bracket?.type !== TokenType.OpenBracket) {
        throw new ParseError(`expected '[' after .${key}`, token.location);
      }
      this.advance();
      this.cursor.bracketDepth++;
      const fragment = this.parseFragment('bracket', bracket.location);
      this.cursor.bracketDepth--;
      this.advance(); // ']'

      const value = this.tree.plainText(fragment);
      if (value === null) {
        throw new ParseError(`.${key} takes a plain value, not commands`, token.location);
      }
      settings.push({ key, value, location: token.location });
    }
  }

  // ============ Helpers ============

  /**
   * Command name of the identifier following the Dot at `index`
   */
  private commandNameAt(index: number): CommandName {
    const dot = this.cursor.tokens[index];
    const name = this.identifierAt(index + 1);
    if (!isCommandName(name)) {
      throw new ParseError(`unknown command '.${name}'`, dot.location);
    }
    return name;
  }

  private identifierAt(index: number): string {
    const token = this.cursor.tokens[index];
    if (token?.type !== TokenType.TextRun) {
      throw new ParseError('expected a command name', token?.location ?? null);
    }
    return token.text;
  }

  private trimLeadingSpace(fragment: NodeId[]): void {
    const first = fragment[0];
    if (first === undefined) {
      return;
    }
    const node = this.tree.node(first);
    if (node.type !== 'text') {
      return;
    }
    node.text = node.text.replace(/^\s+/, '');
    if (node.text === '') {
      fragment.shift();
    }
  }

  private isBlank(fragment: Fragment): boolean {
    return fragment.every(id => {
      const node = this.tree.node(id);
      return node.type === 'text' && node.text.trim() === '';
    });
  }

  private peek(): Token | undefined {
    return this.cursor.tokens[this.cursor.pos];
  }

  private advance(): Token {
    const token = this.cursor.tokens[this.cursor.pos];
    if (!token) {
      throw new ParseError('unexpected end of input', null);
    }
    this.cursor.pos++;
    return token;
  }
}

export type ParseOptions = LexOptions;

/**
 * Lex and parse Burro source
 */
export function parse(source: string, options: ParseOptions = {}): Document {
  return new Parser(lex(source, options)).parse();
}
