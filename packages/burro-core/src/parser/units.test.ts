/**
 * Unit grammar tests
 */

import { describe, it, expect } from 'vitest';
import { parseLength, parseAlignment, parseBoolean, resolveMeasure } from './units.js';
import { ParseError } from '../errors.js';

describe('Units - Lengths', () => {
  it('should default to points', () => {
    expect(parseLength('12')).toEqual({ points: 12, relative: false });
  });

  it('should accept explicit points', () => {
    expect(parseLength('14pt').points).toBe(14);
  });

  it('should convert picas', () => {
    expect(parseLength('2.5P').points).toBe(30);
  });

  it('should convert inches', () => {
    expect(parseLength('0.5in').points).toBe(36);
  });

  it('should convert millimeters', () => {
    expect(parseLength('10mm').points).toBeCloseTo(28.3464576, 6);
  });

  it('should convert centimeters', () => {
    expect(parseLength('1cm').points).toBeCloseTo(28.3464576, 6);
  });

  it('should accept a fraction without leading digits', () => {
    expect(parseLength('.5in').points).toBe(36);
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseLength(' 1in ').points).toBe(72);
  });

  it('should mark signed values as relative', () => {
    expect(parseLength('+2pt')).toEqual({ points: 2, relative: true });
    expect(parseLength('-1P')).toEqual({ points: -12, relative: true });
  });

  it('should reject unknown units', () => {
    expect(() => parseLength('3furlongs')).toThrow("unknown unit 'furlongs' in '3furlongs'");
  });

  it('should reject malformed numbers', () => {
    expect(() => parseLength('1.2.3in')).toThrow(ParseError);
    expect(() => parseLength('')).toThrow("invalid length ''");
  });

  it('should attach the given location', () => {
    expect(() => parseLength('x', { line: 4, column: 9 })).toThrow("ParseError at 4:9: invalid length 'x'");
  });
});

describe('Units - Relative resolution', () => {
  it('should add relative measures to the current value', () => {
    expect(resolveMeasure(parseLength('+2pt'), 12)).toBe(14);
    expect(resolveMeasure(parseLength('-2pt'), 12)).toBe(10);
  });

  it('should replace with absolute measures', () => {
    expect(resolveMeasure(parseLength('18'), 12)).toBe(18);
  });
});

describe('Units - Keywords', () => {
  it('should parse alignments', () => {
    expect(parseAlignment('justify')).toBe('justify');
    expect(() => parseAlignment('middle')).toThrow("invalid alignment 'middle'");
  });

  it('should parse booleans', () => {
    expect(parseBoolean('false')).toBe(false);
    expect(parseBoolean(' true ')).toBe(true);
    expect(() => parseBoolean('yes')).toThrow(ParseError);
  });
});
