/**
 * Greedy line breaking
 *
 * Words are appended one at a time. A word that does not fit beside the
 * words already on the line closes the line and starts the next one; a
 * word wider than the whole line sits alone on it. There is no lookahead
 * and no revisiting of earlier breaks.
 */

import type { FontMetrics, FontRef } from '../fonts/metrics.js';
import type { Alignment } from '../parser/units.js';

/**
 * Rounding slack when comparing widths
 */
const EPSILON = 1e-6;

/**
 * A run of non-space characters set in one font and size
 */
export interface Piece {
  text: string;
  width: number;
  font: FontMetrics;
  ref: FontRef;
  size: number;
  ascent: number;
  leading: number;
}

export interface Word {
  pieces: Piece[];
  width: number;
  /** Width of the space before this word, ignored at the start of a line */
  gap: number;
}

export interface Line {
  words: Word[];
  /** Width of the words and the gaps between them */
  natural: number;
  /** Last line of a paragraph, or ended by a command: never stretched */
  final: boolean;
}

export interface LineMeasure {
  left: number;
  width: number;
  align: Alignment;
  /** When false, words never wrap and the line runs past its width */
  wrap: boolean;
}

export class LineBreaker {
  private words: Word[] = [];
  private natural = 0;

  constructor(
    private measure: () => LineMeasure,
    private emit: (line: Line) => void
  ) {}

  add(word: Word): void {
    if (this.words.length > 0) {
      const { width, wrap } = this.measure();
      if (wrap && this.natural + word.gap + word.width > width + EPSILON) {
        this.flush(false);
      }
    }
    this.natural += this.words.length > 0 ? word.gap + word.width : word.width;
    this.words.push(word);
  }

  /**
   * Emit the pending line, if any
   */
  flush(final: boolean): void {
    if (this.words.length === 0) {
      return;
    }
    const line: Line = { words: this.words, natural: this.natural, final };
    this.words = [];
    this.natural = 0;
    this.emit(line);
  }
}

/**
 * Horizontal position of every piece of a line, in reading order
 */
export function positionLine(line: Line, measure: LineMeasure): number[] {
  const slack = measure.width - line.natural;
  const gaps = line.words.length - 1;

  let x = measure.left;
  let stretch = 0;

  switch (measure.align) {
    case 'center':
      x += Math.max(0, slack) / 2;
      break;
    case 'right':
      x += Math.max(0, slack);
      break;
    case 'justify':
      if (!line.final && gaps > 0 && slack > 0) {
        stretch = slack / gaps;
      }
      break;
    default:
      break;
  }

  const positions: number[] = [];
  line.words.forEach((word, index) => {
    if (index > 0) {
      x += word.gap + stretch;
    }
    for (const piece of word.pieces) {
      positions.push(x);
      x += piece.width;
    }
  });
  return positions;
}

/**
 * Rendered width of a positioned line, from its first glyph to its last
 */
export function renderedWidth(line: Line, positions: readonly number[]): number {
  const last = line.words[line.words.length - 1]?.pieces.at(-1);
  if (!last || positions.length === 0) {
    return 0;
  }
  return positions[positions.length - 1] + last.width - positions[0];
}
