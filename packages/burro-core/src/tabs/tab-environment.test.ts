/**
 * Tab environment tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TabEnvironment } from './tab-environment.js';
import type { TabDefinition, TabList } from './tab.js';
import { TypesettingState } from '../state/typesetting-state.js';
import {
  TabEnvironmentError,
  TabNavigationOutOfRangeError,
  UndefinedTabError,
  UndefinedTabListError,
} from '../errors.js';

const here = { line: 1, column: 1 };

function tab(name: string, indent: number, length: number, direction: TabDefinition['direction'] = 'left'): TabDefinition {
  return { name, indent, length, direction, quad: true, location: here };
}

const tabs = new Map<string, TabDefinition>([
  ['item', tab('item', 0, 200)],
  ['qty', tab('qty', 216, 72, 'right')],
  ['price', tab('price', 300, 168, 'center')],
  ['spare', tab('spare', 0, 50)],
]);

const tabLists = new Map<string, TabList>([['row', { name: 'row', tabs: ['item', 'qty', 'price'], location: here }]]);

describe('TabEnvironment', () => {
  let state: TypesettingState;
  let env: TabEnvironment;

  beforeEach(() => {
    state = new TypesettingState();
    env = new TabEnvironment(state, tabs, tabLists);
  });

  it('should start inactive', () => {
    expect(env.isActive).toBe(false);
    expect(env.position).toBeNull();
  });

  it('should load a list without activating a tab', () => {
    env.load('row', 612, here);
    expect(env.isActive).toBe(true);
    expect(env.listName).toBe('row');
    expect(env.position).toBeNull();
    expect(state.get('margin_left')).toBe(72);
  });

  it('should fail on an undefined list', () => {
    expect(() => env.load('L', 612, here)).toThrow(UndefinedTabListError);
    expect(env.isActive).toBe(false);
  });

  it('should refuse to load a second list', () => {
    env.load('row', 612, here);
    expect(() => env.load('row', 612, here)).toThrow(TabEnvironmentError);
  });

  it('should refuse tab commands while inactive', () => {
    expect(() => env.next(here)).toThrow(TabEnvironmentError);
    expect(() => env.select('item', here)).toThrow(TabEnvironmentError);
    expect(() => env.quit(here)).toThrow('TabEnvironmentError at 1:1: .quit_tabs needs a tab list loaded with .load_tabs');
  });

  it('should set up the column of the active tab', () => {
    env.load('row', 612, here);
    env.select('qty', here);
    expect(env.position).toBe(2);
    expect(state.get('align')).toBe('right');
    expect(state.get('margin_left')).toBe(288);
    expect(state.get('margin_right')).toBe(612 - (288 + 72));
  });

  it('should move to the first tab from no cursor', () => {
    env.load('row', 612, here);
    expect(env.next(here).name).toBe('item');
    expect(env.next(here).name).toBe('qty');
    expect(env.previous(here).name).toBe('item');
  });

  it('should fail past the last tab and stay put', () => {
    env.load('row', 612, here);
    env.select('price', here);
    expect(() => env.next(here)).toThrow(TabNavigationOutOfRangeError);
    expect(env.position).toBe(3);
    expect(state.get('align')).toBe('center');
    expect(state.get('margin_left')).toBe(372);
  });

  it('should fail before the first tab and stay put', () => {
    env.load('row', 612, here);
    env.next(here);
    expect(() => env.previous(here)).toThrow(
      "TabNavigationOutOfRangeError at 1:1: .previous_tab before the first tab of 'row'"
    );
    expect(env.position).toBe(1);
  });

  it('should fail on previous before any tab', () => {
    env.load('row', 612, here);
    expect(() => env.previous(here)).toThrow(TabNavigationOutOfRangeError);
    expect(env.position).toBeNull();
  });

  it('should reject tabs outside the loaded list', () => {
    env.load('row', 612, here);
    expect(() => env.select('spare', here)).toThrow("tab 'spare' is not in tab list 'row'");
    expect(() => env.select('ghost', here)).toThrow(UndefinedTabError);
  });

  it('should restore alignment and margins on quit', () => {
    state.set('align', 'justify');
    state.set('margin_left', 90);
    env.load('row', 612, here);
    env.next(here);
    env.next(here);
    state.set('align', 'center');
    env.previous(here);
    env.select('price', here);
    env.quit(here);

    expect(env.isActive).toBe(false);
    expect(state.get('align')).toBe('justify');
    expect(state.get('margin_left')).toBe(90);
    expect(state.get('margin_right')).toBe(72);
    state.set('margin_left', '-');
    expect(state.get('margin_left')).toBe(72);
  });

  it('should report the usable width of the loaded list', () => {
    env.load('row', 612, here);
    expect(env.usableWidth()).toBe(468);
  });
});
