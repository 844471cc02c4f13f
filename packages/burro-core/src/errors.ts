/**
 * Burro error hierarchy
 *
 * Every fatal condition of a compile is a subclass of BurroError. Errors
 * raised while lexing, parsing or walking the document tree carry the
 * source location of the construct that caused them, and the message is
 * formatted as `<Kind> at <line>:<column>: <detail>`.
 */

import type { SourceLocation } from './lexer/token.js';

export class BurroError extends Error {
  readonly location: SourceLocation | null;
  readonly detail: string;

  constructor(kind: string, detail: string, location: SourceLocation | null = null) {
    super(formatMessage(kind, detail, location));
    this.name = kind;
    this.detail = detail;
    this.location = location;
  }
}

function formatMessage(kind: string, detail: string, location: SourceLocation | null): string {
  if (!location) {
    return `${kind}: ${detail}`;
  }
  const file = location.file ? ` in ${location.file}` : '';
  return `${kind}${file} at ${location.line}:${location.column}: ${detail}`;
}

export class LexError extends BurroError {
  constructor(detail: string, location: SourceLocation) {
    super('LexError', detail, location);
  }
}

export class ParseError extends BurroError {
  constructor(detail: string, location: SourceLocation | null) {
    super('ParseError', detail, location);
  }
}

export class UndefinedVariableError extends BurroError {
  constructor(readonly variable: string, location: SourceLocation) {
    super('UndefinedVariableError', `variable '${variable}' is not defined`, location);
  }
}

export class UndefinedTabError extends BurroError {
  constructor(readonly tab: string, detail: string, location: SourceLocation | null) {
    super('UndefinedTabError', detail, location);
  }
}

export class UndefinedTabListError extends BurroError {
  constructor(readonly tabList: string, location: SourceLocation | null) {
    super('UndefinedTabListError', `tab list '${tabList}' is not defined`, location);
  }
}

export class TabNavigationOutOfRangeError extends BurroError {
  constructor(detail: string, location: SourceLocation | null) {
    super('TabNavigationOutOfRangeError', detail, location);
  }
}

/**
 * A tab command issued in the wrong environment state: a tab command
 * without a loaded list, or `load_tabs` while a list is already loaded.
 */
export class TabEnvironmentError extends BurroError {
  constructor(detail: string, location: SourceLocation | null) {
    super('TabEnvironmentError', detail, location);
  }
}

export class StackUnderflowError extends BurroError {
  constructor(readonly key: string, location: SourceLocation | null) {
    super('StackUnderflowError', `reset of '${key}' without any previous value`, location);
  }
}

export class FontResolutionError extends BurroError {
  constructor(readonly family: string, readonly style: string, location: SourceLocation | null = null) {
    super('FontResolutionError', `no font for family '${family}' in style '${style}'`, location);
  }
}

export class FontMapError extends BurroError {
  constructor(detail: string) {
    super('FontMapError', detail);
  }
}

/**
 * Non-fatal layout condition. Warnings are collected on the layout result
 * instead of being thrown.
 */
export class LayoutOverflowWarning extends BurroError {
  constructor(detail: string, location: SourceLocation | null) {
    super('LayoutOverflowWarning', detail, location);
  }
}
