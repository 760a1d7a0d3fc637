import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/errors.js';
import { parseOffset, offsetToModifier } from '../../src/parsers/offset-parser.js';

describe('parseOffset', () => {
  it('parses days, weeks and years', () => {
    expect(parseOffset('3d')).toEqual({ amount: 3, unit: 'd' });
    expect(parseOffset('2w')).toEqual({ amount: 2, unit: 'w' });
    expect(parseOffset('10y')).toEqual({ amount: 10, unit: 'y' });
  });

  it('accepts a zero amount', () => {
    expect(parseOffset('0d')).toEqual({ amount: 0, unit: 'd' });
  });

  it.each(['d3', '3', '3x', '-3d', '3 d', ''])('rejects %j', (value) => {
    expect(() => parseOffset(value)).toThrow(ValidationError);
  });

  it('rejects non-strings', () => {
    expect(() => parseOffset(3)).toThrow(ValidationError);
  });

  it('names the parameter in the message', () => {
    expect(() => parseOffset('soon', 'last')).toThrow(
      "Invalid last argument: 'soon'\n"
        + "Please specify a string of the format 'X[d/w/y]' where X is a non-negative integer "
        + "followed by 'd', 'w', or 'y' that indicates days, weeks, or years.",
    );
  });
});

describe('offsetToModifier', () => {
  it('turns days into a negative day modifier', () => {
    expect(offsetToModifier({ amount: 3, unit: 'd' })).toBe('-3 days');
  });

  it('turns weeks into days', () => {
    expect(offsetToModifier({ amount: 2, unit: 'w' })).toBe('-14 days');
  });

  it('keeps years as calendar years', () => {
    expect(offsetToModifier({ amount: 1, unit: 'y' })).toBe('-1 years');
  });
});
