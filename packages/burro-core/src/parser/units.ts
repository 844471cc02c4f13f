/**
 * Value grammar for command arguments
 *
 * Internally every length is kept in points, but arguments may be written
 * in points, picas, inches, millimeters or centimeters:
 *
 *   length := [sign] number [unit]
 *   number := digits ['.' digits] | '.' digits
 *   unit   := 'pt' | 'P' | 'in' | 'mm' | 'cm'     (none means points)
 *
 * A leading sign makes the length relative to the value currently in
 * effect, so `+2pt` grows and `-1P` shrinks it.
 */

import { ParseError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';

export type Alignment = 'left' | 'center' | 'right' | 'justify';

export const ALIGNMENTS: readonly Alignment[] = ['left', 'center', 'right', 'justify'];

export interface Measure {
  /** Points; negative only for relative decreases */
  points: number;
  relative: boolean;
}

/**
 * The argument that pops a setting stack
 */
export const RESET = '-';
export type Reset = typeof RESET;

const UNIT_POINTS: Record<string, number> = {
  '': 1,
  pt: 1,
  P: 12,
  in: 72,
  mm: 2.83464576,
  cm: 28.3464576,
};

const LENGTH_PATTERN = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)([A-Za-z]*)$/;

export function parseLength(input: string, location: SourceLocation | null = null): Measure {
  const value = input.trim();
  const match = LENGTH_PATTERN.exec(value);
  if (!match) {
    throw new ParseError(`invalid length '${value}'`, location);
  }
  const [, sign, digits, unit] = match;

  const factor = UNIT_POINTS[unit];
  if (factor === undefined) {
    throw new ParseError(`unknown unit '${unit}' in '${value}'`, location);
  }

  const magnitude = parseFloat(digits) * factor;
  return {
    points: sign === '-' ? -magnitude : magnitude,
    relative: sign !== '',
  };
}

export function parseAlignment(input: string, location: SourceLocation | null = null): Alignment {
  const value = input.trim();
  const found = ALIGNMENTS.find(a => a === value);
  if (!found) {
    throw new ParseError(`invalid alignment '${value}', expected one of ${ALIGNMENTS.join(', ')}`, location);
  }
  return found;
}

export function parseBoolean(input: string, location: SourceLocation | null = null): boolean {
  const value = input.trim();
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ParseError(`invalid boolean '${value}', expected true or false`, location);
}

/**
 * Apply a measure to the value currently in effect
 */
export function resolveMeasure(measure: Measure, current: number): number {
  return measure.relative ? current + measure.points : measure.points;
}
