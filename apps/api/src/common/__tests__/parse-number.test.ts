import { parseNumber } from '../parse-number';

describe('parseNumber', () => {
  it('parses numeric strings', () => {
    expect(parseNumber('8000', 1)).toBe(8000);
    expect(parseNumber('0.5', 1)).toBe(0.5);
  });

  it('passes numbers through', () => {
    expect(parseNumber(42, 1)).toBe(42);
  });

  it('falls back for missing, empty and invalid values', () => {
    expect(parseNumber(undefined, 900)).toBe(900);
    expect(parseNumber('', 900)).toBe(900);
    expect(parseNumber('fifteen', 900)).toBe(900);
    expect(parseNumber('Infinity', 900)).toBe(900);
  });
});
