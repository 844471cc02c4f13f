/**
 * Typesetting State Engine
 *
 * Each setting key owns a LIFO stack whose bottom element is the
 * documented default. Setting a value pushes it; the argument `-` pops the
 * most recent value and brings back the one before it. Resets are placed by
 * the author, so the stacks are deliberately not tied to the nesting of
 * brackets or braces: `.align[center] ... .align[-]` may straddle any
 * number of paragraphs.
 */

import { StackUnderflowError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';
import { type Alignment, type Reset, RESET } from '../parser/units.js';

export interface Settings {
  align: Alignment;
  pt_size: number;
  /** Baseline-to-baseline distance; `auto` is 1.2 times the point size */
  leading: number | 'auto';
  margin_top: number;
  margin_right: number;
  margin_bottom: number;
  margin_left: number;
  page_width: number;
  page_height: number;
  par_space: number;
  par_indent: number;
  family: string;
  bold: boolean;
  italic: boolean;
}

export type SettingKey = keyof Settings;

/**
 * Keys whose values are plain lengths in points
 */
export type LengthKey = {
  [K in SettingKey]: Settings[K] extends number ? K : never;
}[SettingKey];

export const MARGIN_KEYS = ['margin_top', 'margin_right', 'margin_bottom', 'margin_left'] as const;

export const AUTO_LEADING_FACTOR = 1.2;

/**
 * US Letter, one-inch margins, 12pt Courier
 */
export const DEFAULT_SETTINGS: Readonly<Settings> = {
  align: 'left',
  pt_size: 12,
  leading: 'auto',
  margin_top: 72,
  margin_right: 72,
  margin_bottom: 72,
  margin_left: 72,
  page_width: 612,
  page_height: 792,
  par_space: 0,
  par_indent: 0,
  family: 'courier',
  bold: false,
  italic: false,
};

type Stacks = { [K in SettingKey]: Array<Settings[K]> };

export type StateSnapshot = Partial<Stacks>;

const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS);

function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.includes(key);
}

export function isReset<T>(value: T | Reset): value is Reset {
  return value === RESET;
}

export class TypesettingState {
  private stacks: Stacks;

  constructor(defaults: Readonly<Settings> = DEFAULT_SETTINGS) {
    this.stacks = {
      align: [defaults.align],
      pt_size: [defaults.pt_size],
      leading: [defaults.leading],
      margin_top: [defaults.margin_top],
      margin_right: [defaults.margin_right],
      margin_bottom: [defaults.margin_bottom],
      margin_left: [defaults.margin_left],
      page_width: [defaults.page_width],
      page_height: [defaults.page_height],
      par_space: [defaults.par_space],
      par_indent: [defaults.par_indent],
      family: [defaults.family],
      bold: [defaults.bold],
      italic: [defaults.italic],
    };
  }

  /**
   * Current value of a setting (top of its stack)
   */
  get<K extends SettingKey>(key: K): Settings[K] {
    const stack = this.stacks[key];
    return stack[stack.length - 1];
  }

  /**
   * Push a value, or pop when the value is `-`
   */
  set<K extends SettingKey>(key: K, value: Settings[K] | Reset, location: SourceLocation | null = null): void {
    if (isReset(value)) {
      this.pop(key, location);
    } else {
      this.push(key, value);
    }
  }

  push<K extends SettingKey>(key: K, value: Settings[K]): void {
    this.stacks[key].push(value);
  }

  /**
   * Pop the top value. The default at the bottom can never be popped.
   */
  pop<K extends SettingKey>(key: K, location: SourceLocation | null = null): void {
    const stack = this.stacks[key];
    if (stack.length <= 1) {
      throw new StackUnderflowError(key, location);
    }
    stack.pop();
  }

  /**
   * Replace the default at the bottom of a stack
   */
  setDefault<K extends SettingKey>(key: K, value: Settings[K]): void {
    this.stacks[key][0] = value;
  }

  depth(key: SettingKey): number {
    return this.stacks[key].length;
  }

  /**
   * Effective leading for the current point size
   */
  leading(): number {
    const leading = this.get('leading');
    return leading === 'auto' ? this.get('pt_size') * AUTO_LEADING_FACTOR : leading;
  }

  /**
   * Copy the whole stacks of the given keys
   */
  snapshot(keys: readonly SettingKey[]): StateSnapshot {
    const snapshot: StateSnapshot = {};
    for (const key of keys) {
      copyStack(this.stacks, snapshot, key);
    }
    return snapshot;
  }

  /**
   * Put back the stacks captured by snapshot(), discarding anything pushed
   * since
   */
  restore(snapshot: StateSnapshot): void {
    for (const key of Object.keys(snapshot)) {
      if (isSettingKey(key)) {
        restoreStack(snapshot, this.stacks, key);
      }
    }
  }
}

function copyStack<K extends SettingKey>(from: Stacks, to: StateSnapshot, key: K): void {
  to[key] = [...from[key]];
}

function restoreStack<K extends SettingKey>(from: StateSnapshot, to: Stacks, key: K): void {
  const stack = from[key];
  if (stack) {
    to[key] = [...stack];
  }
}
