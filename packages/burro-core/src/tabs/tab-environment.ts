/**
 * Tab environment
 *
 * A small state machine over the typesetting state:
 *
 *   Inactive --load_tabs--> Active(cursor: none)
 *   Active --tab / next_tab / previous_tab--> Active(cursor: i)
 *   Active --quit_tabs--> Inactive
 *
 * Loading a list snapshots the alignment and margin stacks. Activating a
 * tab first puts that snapshot back, then pushes the tab's alignment and
 * the margins of its column, so moving between tabs never accumulates
 * pushes. Quitting restores the snapshot, which brings back exactly the
 * values in effect before `load_tabs`.
 *
 * A failed navigation leaves the environment unchanged.
 */

import {
  TabEnvironmentError,
  TabNavigationOutOfRangeError,
  UndefinedTabError,
  UndefinedTabListError,
} from '../errors.js';
import type { SourceLocation } from '../lexer/token.js';
import { MARGIN_KEYS, type StateSnapshot, type TypesettingState } from '../state/typesetting-state.js';
import type { TabDefinition, TabList } from './tab.js';

const SAVED_KEYS = ['align', ...MARGIN_KEYS] as const;

interface ActiveEnvironment {
  list: TabList;
  /** 0-based index into list.tabs, null before the first tab */
  cursor: number | null;
  saved: StateSnapshot;
  savedLeft: number;
  savedRight: number;
  pageWidth: number;
}

export class TabEnvironment {
  private active: ActiveEnvironment | null = null;

  constructor(
    private state: TypesettingState,
    private tabs: ReadonlyMap<string, TabDefinition>,
    private tabLists: ReadonlyMap<string, TabList>
  ) {}

  get isActive(): boolean {
    return this.active !== null;
  }

  /**
   * 1-based position of the current tab, or null
   */
  get position(): number | null {
    const cursor = this.active?.cursor ?? null;
    return cursor === null ? null : cursor + 1;
  }

  get listName(): string | null {
    return this.active?.list.name ?? null;
  }

  /**
   * Width available between the margins in effect at `load_tabs`
   */
  usableWidth(): number {
    const active = this.require('usableWidth', null);
    return active.pageWidth - active.savedLeft - active.savedRight;
  }

  load(name: string, pageWidth: number, location: SourceLocation | null): void {
    if (this.active) {
      throw new TabEnvironmentError(
        `cannot load tab list '${name}' while '${this.active.list.name}' is loaded; use .quit_tabs first`,
        location
      );
    }
    const list = this.tabLists.get(name);
    if (!list) {
      throw new UndefinedTabListError(name, location);
    }

    this.active = {
      list,
      cursor: null,
      saved: this.state.snapshot(SAVED_KEYS),
      savedLeft: this.state.get('margin_left'),
      savedRight: this.state.get('margin_right'),
      pageWidth,
    };
  }

  /**
   * Activate a tab of the loaded list by name
   */
  select(name: string, location: SourceLocation | null): TabDefinition {
    const active = this.require('tab', location);
    const index = active.list.tabs.indexOf(name);
    if (index < 0) {
      const detail = this.tabs.has(name)
        ? `tab '${name}' is not in tab list '${active.list.name}'`
        : `tab '${name}' is not defined`;
      throw new UndefinedTabError(name, detail, location);
    }
    return this.activate(active, index, location);
  }

  next(location: SourceLocation | null): TabDefinition {
    const active = this.require('next_tab', location);
    const index = active.cursor === null ? 0 : active.cursor + 1;
    if (index >= active.list.tabs.length) {
      throw new TabNavigationOutOfRangeError(
        `.next_tab past the last tab of '${active.list.name}' (position ${active.list.tabs.length})`,
        location
      );
    }
    return this.activate(active, index, location);
  }

  previous(location: SourceLocation | null): TabDefinition {
    const active = this.require('previous_tab', location);
    if (active.cursor === null) {
      throw new TabNavigationOutOfRangeError(
        `.previous_tab before any tab of '${active.list.name}' is active`,
        location
      );
    }
    if (active.cursor === 0) {
      throw new TabNavigationOutOfRangeError(
        `.previous_tab before the first tab of '${active.list.name}'`,
        location
      );
    }
    return this.activate(active, active.cursor - 1, location);
  }

  quit(location: SourceLocation | null): void {
    const active = this.require('quit_tabs', location);
    this.state.restore(active.saved);
    this.active = null;
  }

  private activate(active: ActiveEnvironment, index: number, location: SourceLocation | null): TabDefinition {
    const name = active.list.tabs[index];
    const tab = this.tabs.get(name);
    if (!tab) {
      throw new UndefinedTabError(name, `tab '${name}' is not defined`, location);
    }

    const left = active.savedLeft + tab.indent;
    this.state.restore(active.saved);
    this.state.push('align', tab.direction);
    this.state.push('margin_left', left);
    this.state.push('margin_right', active.pageWidth - (left + tab.length));
    active.cursor = index;

    if (process.env.DEBUG_LAYOUT) {
      console.error(`DEBUG_LAYOUT: tab '${name}' (position ${index + 1}) at x=${left}, width ${tab.length}`);
    }
    return tab;
  }

  private require(command: string, location: SourceLocation | null): ActiveEnvironment {
    if (!this.active) {
      throw new TabEnvironmentError(`.${command} needs a tab list loaded with .load_tabs`, location);
    }
    return this.active;
  }
}
