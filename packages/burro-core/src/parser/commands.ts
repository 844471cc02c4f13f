/**
 * Command table
 *
 * The command set is closed. Every name has one shape, which fixes how the
 * parser reads its argument, and every command node carries a typed
 * payload built here from the argument text and sub-settings. Layout never
 * re-parses argument strings.
 */

import { ParseError } from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';
import type { LengthKey } from '../state/typesetting-state.js';
import { MARGIN_KEYS } from '../state/typesetting-state.js';
import type { TabDefinition, TabList } from '../tabs/tab.js';
import {
  type Alignment,
  type Measure,
  type Reset,
  RESET,
  parseAlignment,
  parseBoolean,
  parseLength,
} from './units.js';
import type { SubSetting } from './document.js';

export type CommandShape = 'directive' | 'value' | 'content' | 'definition';

const COMMAND_SHAPES = {
  page_break: 'directive',
  next_tab: 'directive',
  previous_tab: 'directive',
  quit_tabs: 'directive',
  start: 'directive',
  align: 'value',
  pt_size: 'value',
  leading: 'value',
  margins: 'value',
  margin_top: 'value',
  margin_right: 'value',
  margin_bottom: 'value',
  margin_left: 'value',
  page_width: 'value',
  page_height: 'value',
  par_space: 'value',
  par_indent: 'value',
  family: 'value',
  load_tabs: 'value',
  tab: 'value',
  bold: 'content',
  italic: 'content',
  quote: 'content',
  define_tab: 'definition',
  tab_list: 'definition',
} as const satisfies Record<string, CommandShape>;

type ShapeTable = typeof COMMAND_SHAPES;

export type CommandName = keyof ShapeTable;

type NamesOfShape<S extends CommandShape> = {
  [K in CommandName]: ShapeTable[K] extends S ? K : never;
}[CommandName];

export type DirectiveName = NamesOfShape<'directive'>;
export type ValueName = NamesOfShape<'value'>;
export type ContentName = NamesOfShape<'content'>;
export type DefinitionName = NamesOfShape<'definition'>;

export type CommandPayload =
  | { kind: DirectiveName }
  | { kind: 'align'; value: Alignment | Reset }
  | { kind: 'length'; keys: readonly LengthKey[]; value: Measure | Reset }
  | { kind: 'leading'; value: Measure | 'auto' | Reset }
  | { kind: 'family'; value: string | Reset }
  | { kind: 'load_tabs'; list: string }
  | { kind: 'tab'; tab: string }
  | { kind: 'style'; style: 'bold' | 'italic' }
  | { kind: 'quote' }
  | { kind: 'define_tab'; tab: TabDefinition }
  | { kind: 'tab_list'; list: TabList };

export function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMAND_SHAPES, name);
}

export function isDirective(name: CommandName): name is DirectiveName {
  return COMMAND_SHAPES[name] === 'directive';
}

export function isValueCommand(name: CommandName): name is ValueName {
  return COMMAND_SHAPES[name] === 'value';
}

export function isContentCommand(name: CommandName): name is ContentName {
  return COMMAND_SHAPES[name] === 'content';
}

export function isDefinition(name: CommandName): name is DefinitionName {
  return COMMAND_SHAPES[name] === 'definition';
}

const LENGTH_KEYS: Partial<Record<ValueName, readonly LengthKey[]>> = {
  pt_size: ['pt_size'],
  margins: MARGIN_KEYS,
  margin_top: ['margin_top'],
  margin_right: ['margin_right'],
  margin_bottom: ['margin_bottom'],
  margin_left: ['margin_left'],
  page_width: ['page_width'],
  page_height: ['page_height'],
  par_space: ['par_space'],
  par_indent: ['par_indent'],
};

/**
 * Build the payload of a value command from its trimmed argument text
 */
export function valuePayload(name: ValueName, argument: string, location: SourceLocation): CommandPayload {
  const text = argument.trim();
  if (text === '') {
    throw new ParseError(`.${name} needs a value`, location);
  }

  switch (name) {
    case 'load_tabs':
    case 'tab':
      if (text === RESET) {
        throw new ParseError(`.${name} cannot be reset with '-'`, location);
      }
      return name === 'tab' ? { kind: 'tab', tab: text } : { kind: 'load_tabs', list: text };

    case 'align':
      return { kind: 'align', value: text === RESET ? RESET : parseAlignment(text, location) };

    case 'family':
      return { kind: 'family', value: text === RESET ? RESET : text.toLowerCase() };

    case 'leading':
      if (text === RESET || text === 'auto') {
        return { kind: 'leading', value: text };
      }
      return { kind: 'leading', value: parseLength(text, location) };

    default: {
      const keys = LENGTH_KEYS[name];
      if (!keys) {
        throw new ParseError(`unhandled value command .${name}`, location);
      }
      if (text === RESET) {
        return { kind: 'length', keys, value: RESET };
      }
      const value = parseLength(text, location);
      if (name === 'pt_size' && !value.relative && value.points <= 0) {
        throw new ParseError(`point size must be positive, got '${text}'`, location);
      }
      return { kind: 'length', keys, value };
    }
  }
}

export function contentPayload(name: ContentName): CommandPayload {
  return name === 'quote' ? { kind: 'quote' } : { kind: 'style', style: name };
}

/**
 * Read a tab field that must be an absolute length
 */
function absoluteLength(setting: SubSetting): number {
  const measure = parseLength(setting.value, setting.location);
  if (measure.relative) {
    throw new ParseError(`tab ${setting.key} cannot be relative: '${setting.value.trim()}'`, setting.location);
  }
  return measure.points;
}

/**
 * `.define_tab{.indent[..] .direction[..] .length[..] .quad[..]}[name]`
 */
export function defineTabPayload(
  name: string,
  settings: readonly SubSetting[],
  location: SourceLocation
): CommandPayload {
  let indent = 0;
  let direction: Alignment = 'left';
  let length: number | null = null;
  let quad = true;
  const seen = new Set<string>();

  for (const setting of settings) {
    if (seen.has(setting.key)) {
      throw new ParseError(`repeated '${setting.key}' in definition of tab '${name}'`, setting.location);
    }
    seen.add(setting.key);

    switch (setting.key) {
      case 'indent':
        indent = absoluteLength(setting);
        break;
      case 'length':
        length = absoluteLength(setting);
        break;
      case 'direction':
        direction = parseAlignment(setting.value, setting.location);
        break;
      case 'quad':
        quad = parseBoolean(setting.value, setting.location);
        break;
      default:
        throw new ParseError(`unknown tab setting '${setting.key}'`, setting.location);
    }
  }

  if (length === null) {
    throw new ParseError(`tab '${name}' needs a .length`, location);
  }
  if (length <= 0) {
    throw new ParseError(`tab '${name}' must have a positive length`, location);
  }

  return { kind: 'define_tab', tab: { name, indent, direction, length, quad, location } };
}

/**
 * `.tab_list{.tab[a] .tab[b]}[name]`
 */
export function tabListPayload(
  name: string,
  settings: readonly SubSetting[],
  location: SourceLocation
): CommandPayload {
  const tabs: string[] = [];
  for (const setting of settings) {
    if (setting.key !== 'tab') {
      throw new ParseError(`tab list '${name}' takes only .tab entries, got '.${setting.key}'`, setting.location);
    }
    const tab = setting.value.trim();
    if (tab === '') {
      throw new ParseError(`empty tab reference in tab list '${name}'`, setting.location);
    }
    tabs.push(tab);
  }
  if (tabs.length === 0) {
    throw new ParseError(`tab list '${name}' is empty`, location);
  }
  return { kind: 'tab_list', list: { name, tabs, location } };
}
