/**
 * Typesetting state tests
 */

import { describe, it, expect } from 'vitest';
import { TypesettingState, DEFAULT_SETTINGS, MARGIN_KEYS } from './typesetting-state.js';
import { StackUnderflowError } from '../errors.js';

describe('TypesettingState - Stacks', () => {
  it('should start with the documented defaults', () => {
    const state = new TypesettingState();
    expect(state.get('pt_size')).toBe(12);
    expect(state.get('align')).toBe('left');
    expect(state.get('margin_left')).toBe(72);
    expect(state.get('family')).toBe('courier');
  });

  it('should return the most recent value', () => {
    const state = new TypesettingState();
    state.set('pt_size', 18);
    state.set('pt_size', 24);
    expect(state.get('pt_size')).toBe(24);
    expect(state.depth('pt_size')).toBe(3);
  });

  it('should restore the previous value on reset', () => {
    const state = new TypesettingState();
    state.set('align', 'center');
    state.set('align', 'right');
    state.set('align', '-');
    expect(state.get('align')).toBe('center');
    state.set('align', '-');
    expect(state.get('align')).toBe('left');
  });

  it('should behave as if the last push never happened', () => {
    const pushed = new TypesettingState();
    const reference = new TypesettingState();
    for (const size of [10, 14, 20]) {
      pushed.set('pt_size', size);
    }
    pushed.set('pt_size', 9);
    pushed.set('pt_size', '-');

    for (const size of [10, 14, 20]) {
      reference.set('pt_size', size);
    }
    expect(pushed.get('pt_size')).toBe(reference.get('pt_size'));
    expect(pushed.depth('pt_size')).toBe(reference.depth('pt_size'));
  });

  it('should keep keys independent', () => {
    const state = new TypesettingState();
    state.set('pt_size', 18);
    state.set('align', 'justify');
    state.set('pt_size', '-');
    expect(state.get('align')).toBe('justify');
    expect(state.get('pt_size')).toBe(12);
  });

  it('should refuse to pop the default', () => {
    const state = new TypesettingState();
    expect(() => state.set('pt_size', '-')).toThrow(StackUnderflowError);
    expect(state.get('pt_size')).toBe(12);
  });

  it('should report the location of a failed reset', () => {
    const state = new TypesettingState();
    expect(() => state.set('align', '-', { line: 3, column: 1 })).toThrow(
      "StackUnderflowError at 3:1: reset of 'align' without any previous value"
    );
  });
});

describe('TypesettingState - Defaults', () => {
  it('should replace the bottom of a stack', () => {
    const state = new TypesettingState();
    state.setDefault('pt_size', 18);
    expect(state.get('pt_size')).toBe(18);
    expect(() => state.set('pt_size', '-')).toThrow(StackUnderflowError);
  });

  it('should accept custom defaults', () => {
    const state = new TypesettingState({ ...DEFAULT_SETTINGS, pt_size: 10 });
    expect(state.get('pt_size')).toBe(10);
  });

  it('should derive automatic leading from the point size', () => {
    const state = new TypesettingState();
    state.set('pt_size', 10);
    expect(state.leading()).toBeCloseTo(12);
    state.set('leading', 14);
    expect(state.leading()).toBe(14);
  });
});

describe('TypesettingState - Snapshots', () => {
  it('should restore whole stacks', () => {
    const state = new TypesettingState();
    state.set('margin_left', 100);
    const snapshot = state.snapshot(['align', ...MARGIN_KEYS]);

    state.set('margin_left', 150);
    state.set('margin_left', 200);
    state.set('align', 'right');
    state.restore(snapshot);

    expect(state.get('margin_left')).toBe(100);
    expect(state.depth('margin_left')).toBe(2);
    expect(state.get('align')).toBe('left');
    state.set('margin_left', '-');
    expect(state.get('margin_left')).toBe(72);
  });

  it('should leave keys outside the snapshot alone', () => {
    const state = new TypesettingState();
    const snapshot = state.snapshot(['align']);
    state.set('pt_size', 20);
    state.restore(snapshot);
    expect(state.get('pt_size')).toBe(20);
  });

  it('should not share stacks with the snapshot', () => {
    const state = new TypesettingState();
    const snapshot = state.snapshot(['align']);
    state.restore(snapshot);
    state.set('align', 'center');
    state.restore(snapshot);
    expect(state.get('align')).toBe('left');
  });
});
