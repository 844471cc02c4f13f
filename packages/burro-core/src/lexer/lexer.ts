/**
 * Burro Lexer
 *
 * Converts markup source into a flat token stream. The lexer is a single
 * forward scan with no lookahead beyond a few characters; it never
 * consults the parser.
 *
 * - A backslash before one of `. [ ] { } | ~ \` yields that character as
 *   an Escape token; before anything else it is a literal backslash.
 * - A line whose first non-blank character is `;` is a comment and
 *   produces nothing, not even its line terminator.
 * - Two or more consecutive newlines produce one ParagraphBreak; a single
 *   newline folds into a space.
 * - `.name` is a Dot followed by a TextRun holding the identifier. A dot
 *   that is not followed by a letter or underscore is plain text.
 * - `~name` is a VariableRef and `#define(name)(fragment)` a
 *   VariableDefine whose fragment is lexed recursively. Inside the
 *   fragment `\(` and `\)` are escapes too.
 */

import { LexError } from '../errors.js';
import { type SourceLocation, type Token, TokenType, SPECIAL_CHARS } from './token.js';

export interface LexOptions {
  /** File name reported in locations */
  file?: string;
  /** Emit Comment tokens instead of dropping comment lines */
  keepComments?: boolean;
  /** Location of the first character, for lexing embedded fragments */
  origin?: SourceLocation;
}

const DEFINE_PREFIX = '#define(';

/**
 * Escapable characters inside a #define fragment
 */
const DEFINE_SPECIAL_CHARS = `${SPECIAL_CHARS}()`;

export class Lexer {
  private input: string;
  private pos: number = 0;
  private line: number;
  private column: number;
  private file: string | undefined;
  private keepComments: boolean;
  private atLineStart: boolean;
  private specialChars: string = SPECIAL_CHARS;

  private tokens: Token[] = [];
  private text: string = '';
  private textStart: SourceLocation | null = null;

  constructor(input: string, options: LexOptions = {}) {
    this.input = input;
    this.file = options.file;
    this.keepComments = options.keepComments ?? false;
    this.line = options.origin?.line ?? 1;
    this.column = options.origin?.column ?? 1;
    // An embedded fragment never starts at the beginning of a source line
    this.atLineStart = options.origin === undefined;
  }

  /**
   * Lex the whole input into a token array
   */
  tokenize(): Token[] {
    this.tokens = [];

    while (!this.isAtEnd()) {
      if (this.atLineStart && this.skipCommentLine()) {
        continue;
      }
      this.atLineStart = false;

      const c = this.peek();

      if (c === '\n' || (c === '\r' && this.peekAhead(1) === '\n')) {
        this.lexNewlines();
      } else if (c === '\\') {
        this.lexEscape();
      } else if (c === '.' && this.isIdentifierStart(this.peekAhead(1))) {
        this.lexCommand();
      } else if (c === '~' && this.isIdentifierStart(this.peekAhead(1))) {
        this.lexVariableRef();
      } else if (c === '#' && this.input.startsWith(DEFINE_PREFIX, this.pos)) {
        this.lexDefine();
      } else if (c === '[' || c === ']' || c === '{' || c === '}' || c === '|') {
        this.pushPunctuation(c);
      } else if (c === '\r') {
        this.advance();
      } else {
        this.appendText(this.advance());
      }
    }

    this.flushText();

    if (process.env.DEBUG_LEXER) {
      console.error(`DEBUG_LEXER: produced ${this.tokens.length} tokens`);
    }

    return this.tokens;
  }

  // ============ Token producers ============

  /**
   * Consume a run of newlines, blank lines and comment lines.
   * Leading and trailing runs of the input produce nothing.
   */
  private lexNewlines(): void {
    const start = this.currentLocation();
    let count = 0;

    while (!this.isAtEnd()) {
      const c = this.peek();
      if (c === '\n') {
        this.advance();
        count++;
        this.atLineStart = true;
        this.skipBlanks();
        while (this.skipCommentLine()) {
          this.skipBlanks();
        }
      } else if (c === '\r' && this.peekAhead(1) === '\n') {
        this.advance();
      } else {
        break;
      }
    }
    this.atLineStart = false;

    if (this.isAtEnd() || (this.tokens.length === 0 && this.text === '')) {
      return;
    }

    if (count >= 2) {
      this.flushText();
      this.tokens.push({ type: TokenType.ParagraphBreak, location: start });
    } else {
      this.appendText(' ', start);
    }
  }

  private lexEscape(): void {
    const location = this.currentLocation();
    const next = this.peekAhead(1);

    if (this.pos + 1 >= this.input.length) {
      throw new LexError('escape character at end of input', location);
    }

    if (this.specialChars.includes(next)) {
      this.flushText();
      this.advance();
      this.advance();
      this.tokens.push({ type: TokenType.Escape, char: next, location });
    } else {
      this.appendText(this.advance(), location);
    }
  }

  private lexCommand(): void {
    this.flushText();
    const location = this.currentLocation();
    this.advance();
    this.tokens.push({ type: TokenType.Dot, location });

    const nameLocation = this.currentLocation();
    const name = this.readIdentifier();
    this.tokens.push({ type: TokenType.TextRun, text: name, location: nameLocation });
  }

  private lexVariableRef(): void {
    this.flushText();
    const location = this.currentLocation();
    this.advance();
    const name = this.readIdentifier();
    this.tokens.push({ type: TokenType.VariableRef, name, location });
  }

  /**
   * Lex `#define(name)(fragment)`. Parentheses inside the fragment must
   * balance unless escaped.
   */
  private lexDefine(): void {
    this.flushText();
    const location = this.currentLocation();
    for (let i = 0; i < DEFINE_PREFIX.length; i++) {
      this.advance();
    }

    if (!this.isIdentifierStart(this.peek())) {
      throw new LexError('expected variable name after #define(', this.currentLocation());
    }
    const name = this.readIdentifier();

    if (this.peek() !== ')' || this.peekAhead(1) !== '(') {
      throw new LexError(`malformed #define for '${name}', expected ')('`, this.currentLocation());
    }
    this.advance();
    this.advance();

    const fragmentStart = this.currentLocation();
    const begin = this.pos;
    let depth = 1;

    while (depth > 0) {
      if (this.isAtEnd()) {
        throw new LexError(`unterminated #define for '${name}'`, location);
      }
      const c = this.peek();
      if (c === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          throw new LexError('escape character at end of input', this.currentLocation());
        }
      } else if (c === '(') {
        depth++;
      } else if (c === ')') {
        depth--;
        if (depth === 0) {
          break;
        }
      }
      this.advance();
    }

    const body = this.input.substring(begin, this.pos);
    this.advance(); // closing ')'

    const lexer = new Lexer(body, {
      file: this.file,
      keepComments: this.keepComments,
      origin: fragmentStart,
    });
    lexer.specialChars = DEFINE_SPECIAL_CHARS;
    const fragment = lexer.tokenize();

    this.tokens.push({ type: TokenType.VariableDefine, name, fragment, location });
  }

  private pushPunctuation(c: string): void {
    this.flushText();
    const location = this.currentLocation();
    this.advance();

    let type: TokenType.OpenBracket | TokenType.CloseBracket | TokenType.OpenBrace | TokenType.CloseBrace | TokenType.Pipe;
    switch (c) {
      case '[': type = TokenType.OpenBracket; break;
      case ']': type = TokenType.CloseBracket; break;
      case '{': type = TokenType.OpenBrace; break;
      case '}': type = TokenType.CloseBrace; break;
      default: type = TokenType.Pipe; break;
    }
    this.tokens.push({ type, location });
  }

  /**
   * Skip the comment line at the current position, if there is one.
   * The position must be at the start of a line.
   */
  private skipCommentLine(): boolean {
    let offset = 0;
    while (this.peekAhead(offset) === ' ' || this.peekAhead(offset) === '\t') {
      offset++;
    }
    if (this.peekAhead(offset) !== ';') {
      return false;
    }

    for (let i = 0; i < offset; i++) {
      this.advance();
    }
    const location = this.currentLocation();
    this.advance(); // ';'

    const begin = this.pos;
    while (!this.isAtEnd() && this.peek() !== '\n') {
      this.advance();
    }
    const text = this.input.substring(begin, this.pos).replace(/\r$/, '');
    if (!this.isAtEnd()) {
      this.advance();
    }

    if (this.keepComments) {
      this.flushText();
      this.tokens.push({ type: TokenType.Comment, text: text.trim(), location });
    }
    this.atLineStart = true;
    return true;
  }

  // ============ Text accumulation ============

  private appendText(s: string, location?: SourceLocation): void {
    if (this.textStart === null) {
      this.textStart = location ?? this.previousLocation();
    }
    this.text += s;
  }

  private flushText(): void {
    if (this.text !== '' && this.textStart) {
      this.tokens.push({ type: TokenType.TextRun, text: this.text, location: this.textStart });
    }
    this.text = '';
    this.textStart = null;
  }

  // ============ Scanner helpers ============

  private readIdentifier(): string {
    const begin = this.pos;
    while (!this.isAtEnd() && this.isIdentifierChar(this.peek())) {
      this.advance();
    }
    return this.input.substring(begin, this.pos);
  }

  private skipBlanks(): void {
    while (this.peek() === ' ' || this.peek() === '\t') {
      this.advance();
    }
  }

  private isIdentifierStart(c: string): boolean {
    return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
  }

  private isIdentifierChar(c: string): boolean {
    return this.isIdentifierStart(c) || (c >= '0' && c <= '9');
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private currentLocation(): SourceLocation {
    return this.file === undefined
      ? { line: this.line, column: this.column }
      : { line: this.line, column: this.column, file: this.file };
  }

  /**
   * Location of the character just consumed by advance()
   */
  private previousLocation(): SourceLocation {
    const location = this.currentLocation();
    location.column = Math.max(1, location.column - 1);
    return location;
  }
}

/**
 * Lex Burro source into tokens
 */
export function lex(source: string, options: LexOptions = {}): Token[] {
  return new Lexer(source, options).tokenize();
}
