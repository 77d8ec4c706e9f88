import { describe, it, expect } from 'vitest';
import { safeFloat, safeInt } from './number.js';

describe('safeFloat', () => {
  it('parses decimal and exponent literals', () => {
    expect(safeFloat('3.14')).toBe(3.14);
    expect(safeFloat(' 2 ')).toBe(2);
    expect(safeFloat('1e3')).toBe(1000);
    expect(safeFloat('-.5')).toBe(-0.5);
    expect(safeFloat('1.')).toBe(1);
  });

  it('passes numbers through', () => {
    expect(safeFloat(42)).toBe(42);
  });

  it('parses infinity and nan words', () => {
    expect(safeFloat('inf')).toBe(Number.POSITIVE_INFINITY);
    expect(safeFloat('-Infinity')).toBe(Number.NEGATIVE_INFINITY);
    expect(safeFloat('NaN')).toBeNaN();
  });

  it('falls back to the default', () => {
    expect(safeFloat('abc')).toBeNull();
    expect(safeFloat('abc', 1.5)).toBe(1.5);
    expect(safeFloat('', 0)).toBe(0);
    expect(safeFloat('0x10')).toBeNull();
    expect(safeFloat(null)).toBeNull();
    expect(safeFloat(undefined, 7)).toBe(7);
  });
});

describe('safeInt', () => {
  it('truncates toward zero', () => {
    expect(safeInt('12')).toBe(12);
    expect(safeInt('3.9')).toBe(3);
    expect(safeInt('-3.9')).toBe(-3);
  });

  it('falls back to the default', () => {
    expect(safeInt('abc', 4)).toBe(4);
    expect(safeInt('inf', 0)).toBe(0);
    expect(safeInt(null)).toBeNull();
  });
});
