import { describe, it, expect } from 'vitest';
import { formatClock, formatSeconds, formatSrtClock } from './time.js';

describe('formatSeconds', () => {
  it('pads whole seconds to three decimals', () => {
    expect(formatSeconds(12)).toBe('12.000');
    expect(formatSeconds(0)).toBe('0.000');
  });

  it('rounds to the nearest millisecond', () => {
    expect(formatSeconds(12.345432)).toBe('12.345');
    expect(formatSeconds(12.345678)).toBe('12.346');
    expect(formatSeconds(12.3454)).toBe('12.345');
    expect(formatSeconds(12.3456)).toBe('12.346');
  });
});

describe('formatClock', () => {
  it('formats whole and fractional seconds', () => {
    expect(formatClock(12)).toBe('00:00:12.000');
    expect(formatClock(12.345)).toBe('00:00:12.345');
    expect(formatClock(83)).toBe('00:01:23.000');
    expect(formatClock(83.456)).toBe('00:01:23.456');
    expect(formatClock(3600)).toBe('01:00:00.000');
    expect(formatClock(3612.345)).toBe('01:00:12.345');
  });

  it('truncates milliseconds instead of rounding', () => {
    expect(formatClock(12.345678)).toBe('00:00:12.345');
    expect(formatClock(59.9999)).toBe('00:00:59.999');
  });

  it('never carries a fraction into the next field', () => {
    expect(formatClock(59.9999996)).toBe('00:00:59.999');
    expect(formatClock(0.0009996)).toBe('00:00:00.000');
  });

  it('truncates the binary value of the input', () => {
    expect(formatClock(1.005)).toBe('00:00:01.004');
  });

  it('does not cap hours', () => {
    expect(formatClock(360000)).toBe('100:00:00.000');
  });

  it('uses the given decimal separator', () => {
    expect(formatClock(1.5, ':')).toBe('00:00:01:500');
  });
});

describe('formatSrtClock', () => {
  it('uses a comma before milliseconds', () => {
    expect(formatSrtClock(12)).toBe('00:00:12,000');
    expect(formatSrtClock(83.456789)).toBe('00:01:23,456');
    expect(formatSrtClock(3612.345)).toBe('01:00:12,345');
  });
});
