/**
 * Token definitions for the Burro lexer
 */

/**
 * Location in source (1-based line and column)
 */
export interface SourceLocation {
  line: number;
  column: number;
  file?: string;
}

export enum TokenType {
  TextRun = 'text',
  Dot = '.',
  OpenBracket = '[',
  CloseBracket = ']',
  OpenBrace = '{',
  CloseBrace = '}',
  Pipe = '|',
  ParagraphBreak = 'paragraph-break',
  Comment = 'comment',
  Escape = 'escape',
  VariableDefine = 'define',
  VariableRef = 'ref',
}

interface TokenBase {
  location: SourceLocation;
}

export interface TextRunToken extends TokenBase {
  type: TokenType.TextRun;
  text: string;
}

export interface PunctuationToken extends TokenBase {
  type:
    | TokenType.Dot
    | TokenType.OpenBracket
    | TokenType.CloseBracket
    | TokenType.OpenBrace
    | TokenType.CloseBrace
    | TokenType.Pipe
    | TokenType.ParagraphBreak;
}

export interface CommentToken extends TokenBase {
  type: TokenType.Comment;
  text: string;
}

export interface EscapeToken extends TokenBase {
  type: TokenType.Escape;
  char: string;
}

export interface VariableDefineToken extends TokenBase {
  type: TokenType.VariableDefine;
  name: string;
  fragment: Token[];
}

export interface VariableRefToken extends TokenBase {
  type: TokenType.VariableRef;
  name: string;
}

export type Token =
  | TextRunToken
  | PunctuationToken
  | CommentToken
  | EscapeToken
  | VariableDefineToken
  | VariableRefToken;

/**
 * Characters that a backslash turns into literal text
 */
export const SPECIAL_CHARS = '.[]{}|~\\';

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.TextRun:
      return `text '${token.text}'`;
    case TokenType.Escape:
      return `escaped '${token.char}'`;
    case TokenType.Comment:
      return 'comment';
    case TokenType.VariableDefine:
      return `definition of '${token.name}'`;
    case TokenType.VariableRef:
      return `reference '~${token.name}'`;
    case TokenType.ParagraphBreak:
      return 'paragraph break';
    default:
      return `'${token.type}'`;
  }
}
