/**
 * Tab definitions
 *
 * A tab is a named column: it starts `indent` points right of the left
 * margin, is `length` points wide, and aligns its text by `direction`.
 * With `quad` set, text longer than the column wraps inside it; without,
 * it runs on past the column edge on the same baseline.
 */

import type { SourceLocation } from '../lexer/token.js';
import type { Alignment } from '../parser/units.js';

export interface TabDefinition {
  name: string;
  indent: number;
  direction: Alignment;
  length: number;
  quad: boolean;
  location: SourceLocation;
}

export interface TabList {
  name: string;
  /** Tab names in column order; positions are 1-based in messages */
  tabs: readonly string[];
  location: SourceLocation;
}
