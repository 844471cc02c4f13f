/**
 * Parser tests - Blocks, arguments, variables and definitions
 */

import { describe, it, expect } from 'vitest';
import { parse } from './parser.js';
import type { Document, Fragment } from './document.js';
import { MARGIN_KEYS } from '../state/typesetting-state.js';
import { ParseError, UndefinedTabError, UndefinedVariableError } from '../errors.js';

/**
 * Compact rendering of a fragment: text as is, commands as <name:argument>
 */
function render(doc: Document, fragment: Fragment): string {
  return fragment
    .map(id => {
      const node = doc.tree.node(id);
      if (node.type === 'text') {
        return node.text;
      }
      return node.argument ? `<${node.name}:${render(doc, node.argument)}>` : `<${node.name}>`;
    })
    .join('');
}

function paragraphs(doc: Document): string[] {
  return doc.blocks.flatMap(block => (block.type === 'paragraph' ? [render(doc, block.content)] : []));
}

function commandBlock(doc: Document, index: number) {
  const block = doc.blocks[index];
  if (block?.type !== 'command') {
    throw new Error(`block ${index} is not a command`);
  }
  return doc.tree.command(block.node);
}

describe('Parser - Paragraphs', () => {
  it('should parse plain text as one paragraph', () => {
    const doc = parse('Hello world');
    expect(doc.blocks).toHaveLength(1);
    expect(paragraphs(doc)).toEqual(['Hello world']);
  });

  it('should split paragraphs at blank lines', () => {
    const doc = parse('first\nline\n\nsecond');
    expect(paragraphs(doc)).toEqual(['first line', 'second']);
  });

  it('should merge escapes into the surrounding text', () => {
    const doc = parse('a\\.b \\[x\\]');
    expect(doc.blocks).toHaveLength(1);
    const block = doc.blocks[0];
    expect(block.type === 'paragraph' && block.content.length).toBe(1);
    expect(paragraphs(doc)).toEqual(['a.b [x]']);
  });

  it('should keep settings inside a paragraph as fragment items', () => {
    const doc = parse('Hello .pt_size[18]big');
    expect(paragraphs(doc)).toEqual(['Hello <pt_size:18>big']);
  });

  it('should make top-level settings command blocks', () => {
    const doc = parse('.align[center]\n.bold[Burro]');
    expect(doc.blocks).toHaveLength(2);
    expect(commandBlock(doc, 0).payload).toEqual({ kind: 'align', value: 'center' });
    expect(paragraphs(doc)).toEqual(['<bold:Burro>']);
  });

  it('should skip definitions between paragraphs', () => {
    const doc = parse('a\n\n#define(x)(y)\n\nb');
    expect(paragraphs(doc)).toEqual(['a', 'b']);
  });
});

describe('Parser - Arguments', () => {
  it('should end an inline argument at a pipe', () => {
    const doc = parse('.bold Burro| rides');
    expect(paragraphs(doc)).toEqual(['<bold:Burro> rides']);
  });

  it('should end an inline argument at a paragraph break', () => {
    const doc = parse('.italic a b\n\nnext');
    expect(paragraphs(doc)).toEqual(['<italic:a b>', 'next']);
  });

  it('should not end an inline argument at a single newline', () => {
    const doc = parse('.italic a\nb');
    expect(paragraphs(doc)).toEqual(['<italic:a b>']);
  });

  it('should end an inline argument at the enclosing bracket', () => {
    const doc = parse('.bold[x .italic y] z');
    expect(paragraphs(doc)).toEqual(['<bold:x <italic:y>> z']);
  });

  it('should report an unterminated bracket at its origin', () => {
    expect(() => parse('.bold[unterminated')).toThrow("ParseError at 1:6: unmatched '['");
  });

  it('should report the line of an unterminated bracket', () => {
    expect(() => parse('first\n\n.bold[open\nstill')).toThrow("ParseError at 3:6: unmatched '['");
  });

  it('should not let a bracket run past a paragraph break', () => {
    expect(() => parse('.bold[a\n\nb]')).toThrow("ParseError at 1:6: unmatched '['");
  });

  it('should reject a stray closing bracket', () => {
    expect(() => parse('a ] b')).toThrow("ParseError at 1:3: unexpected ']'");
  });

  it('should reject a stray pipe', () => {
    expect(() => parse('a | b')).toThrow("ParseError at 1:3: unexpected '|'");
  });

  it('should reject unknown commands', () => {
    expect(() => parse('.frobnicate[x]')).toThrow("ParseError at 1:1: unknown command '.frobnicate'");
  });

  it('should reject an argument on a directive', () => {
    expect(() => parse('.page_break[x]')).toThrow('ParseError at 1:1: .page_break does not take an argument');
  });

  it('should reject an empty argument', () => {
    expect(() => parse('.bold[]')).toThrow('ParseError at 1:1: .bold needs an argument');
  });

  it('should reject a settings block on an ordinary command', () => {
    expect(() => parse('.bold{.x[y]}[z]')).toThrow('ParseError at 1:1: .bold does not take a settings block');
  });
});

describe('Parser - Values', () => {
  it('should parse relative lengths', () => {
    const doc = parse('.pt_size[+2pt]');
    expect(commandBlock(doc, 0).payload).toEqual({
      kind: 'length',
      keys: ['pt_size'],
      value: { points: 2, relative: true },
    });
  });

  it('should set all four margins at once', () => {
    const doc = parse('.margins[1in]');
    expect(commandBlock(doc, 0).payload).toEqual({
      kind: 'length',
      keys: MARGIN_KEYS,
      value: { points: 72, relative: false },
    });
  });

  it('should accept automatic leading and resets', () => {
    const doc = parse('.leading[auto]\n.align[-]');
    expect(commandBlock(doc, 0).payload).toEqual({ kind: 'leading', value: 'auto' });
    expect(commandBlock(doc, 1).payload).toEqual({ kind: 'align', value: '-' });
  });

  it('should reject a zero point size', () => {
    expect(() => parse('.pt_size[0]')).toThrow("ParseError at 1:1: point size must be positive, got '0'");
  });

  it('should reject an invalid alignment', () => {
    expect(() => parse('.align[sideways]')).toThrow(ParseError);
  });

  it('should refuse to reset a tab list', () => {
    expect(() => parse('.load_tabs[-]')).toThrow("ParseError at 1:1: .load_tabs cannot be reset with '-'");
  });

  it('should expand variables inside values', () => {
    const doc = parse('#define(big)(24)\n.pt_size[~big]');
    expect(commandBlock(doc, 0).payload).toEqual({
      kind: 'length',
      keys: ['pt_size'],
      value: { points: 24, relative: false },
    });
  });
});

describe('Parser - Variables', () => {
  it('should splice a definition that follows the reference', () => {
    const doc = parse('~x and more\n\n#define(x)(Hi)');
    expect(paragraphs(doc)).toEqual(['Hi and more']);
  });

  it('should give every reference its own copy', () => {
    const doc = parse('~x ~x\n\n#define(x)(.bold[Hi])');
    const block = doc.blocks[0];
    if (block.type !== 'paragraph') {
      throw new Error('expected a paragraph');
    }
    expect(render(doc, block.content)).toBe('<bold:Hi> <bold:Hi>');
    const [first, , second] = block.content;
    expect(first).not.toBe(second);
    expect(doc.tree.command(first).argument).not.toEqual(doc.tree.command(second).argument);
  });

  it('should resolve references between definitions in any order', () => {
    const doc = parse('#define(a)(~b!)\n#define(b)(Hi)\n\n~a');
    expect(paragraphs(doc)).toEqual(['Hi!']);
    expect(doc.variables.has('a')).toBe(true);
    expect(doc.variables.has('b')).toBe(true);
  });

  it('should reject circular definitions', () => {
    expect(() => parse('#define(a)(~b)#define(b)(~a)')).toThrow(
      'ParseError at 1:26: circular variable definition: a -> b -> a'
    );
  });

  it('should reject a second definition of the same name', () => {
    expect(() => parse('#define(x)(a)#define(x)(b)')).toThrow(
      "ParseError at 1:14: variable 'x' is already defined at 1:1"
    );
  });

  it('should report undefined variables', () => {
    expect(() => parse('say ~nope')).toThrow(UndefinedVariableError);
    expect(() => parse('say ~nope')).toThrow("UndefinedVariableError at 1:5: variable 'nope' is not defined");
  });
});

describe('Parser - Tab definitions', () => {
  const source = [
    '.define_tab{.indent[1in] .direction[right] .length[2in]}[price]',
    '.define_tab{.length[3in] .quad[false]}[item]',
    '.tab_list{.tab[item] .tab[price]}[row]',
  ].join('\n');

  it('should register tabs with their defaults', () => {
    const doc = parse(source);
    expect(doc.tabs.get('price')).toMatchObject({ indent: 72, direction: 'right', length: 144, quad: true });
    expect(doc.tabs.get('item')).toMatchObject({ indent: 0, direction: 'left', length: 216, quad: false });
  });

  it('should register tab lists in column order', () => {
    const doc = parse(source);
    expect(doc.tabLists.get('row')?.tabs).toEqual(['item', 'price']);
  });

  it('should require a length', () => {
    expect(() => parse('.define_tab{.indent[1in]}[t]')).toThrow("ParseError at 1:1: tab 't' needs a .length");
  });

  it('should reject relative tab fields', () => {
    expect(() => parse('.define_tab{.length[+1in]}[t]')).toThrow(ParseError);
  });

  it('should reject unknown tab settings', () => {
    expect(() => parse('.define_tab{.width[1in]}[t]')).toThrow("unknown tab setting 'width'");
  });

  it('should reject repeated tab names', () => {
    expect(() => parse('.define_tab{.length[1in]}[a]\n.define_tab{.length[2in]}[a]')).toThrow(
      "repeated tab definition for 'a'"
    );
  });

  it('should reject lists naming undefined tabs', () => {
    expect(() => parse('.tab_list{.tab[ghost]}[row]')).toThrow(UndefinedTabError);
    expect(() => parse('.tab_list{.tab[ghost]}[row]')).toThrow(
      "UndefinedTabError at 1:1: tab list 'row' refers to undefined tab 'ghost'"
    );
  });

  it('should reject an empty tab list', () => {
    expect(() => parse('.tab_list{}[row]')).toThrow("ParseError at 1:1: tab list 'row' is empty");
  });

  it('should keep definitions out of paragraphs', () => {
    expect(() => parse('text .define_tab{.length[1in]}[t]')).toThrow(
      'ParseError at 1:6: .define_tab must stand on its own, outside any paragraph or argument'
    );
  });
});

describe('Parser - Preamble', () => {
  it('should collect settings before .start', () => {
    const doc = parse('.pt_size[10]\n.margins[.5in]\n.start\n\nBody');
    expect(doc.preamble).toHaveLength(2);
    expect(doc.tree.command(doc.preamble[1]).payload).toEqual({
      kind: 'length',
      keys: MARGIN_KEYS,
      value: { points: 36, relative: false },
    });
    expect(paragraphs(doc)).toEqual(['Body']);
    expect(doc.blocks).toHaveLength(1);
  });

  it('should reject text before .start', () => {
    expect(() => parse('Hello\n\n.start')).toThrow(
      'ParseError at 1:1: only settings and definitions may appear before .start'
    );
  });

  it('should reject a reset before .start', () => {
    expect(() => parse('.pt_size[-]\n.start')).toThrow('.pt_size[-] has nothing to reset before .start');
  });

  it('should allow only one .start', () => {
    expect(() => parse('.start\n.start')).toThrow('ParseError at 2:1: .start may appear only once');
  });

  it('should have no preamble without .start', () => {
    const doc = parse('.pt_size[10]\n\nBody');
    expect(doc.preamble).toEqual([]);
    expect(doc.blocks).toHaveLength(2);
  });
});
