/**
 * Time Utilities
 *
 * Fixed-width renderings of a time value given in seconds, as written into
 * sync maps and subtitle files.
 */

const pad = (n: number, len: number = 2) => n.toString().padStart(len, '0');

/**
 * Format seconds as `SS.mmm`, rounding to the nearest millisecond
 *
 * 12 => 12.000, 12.345432 => 12.345, 12.345678 => 12.346
 */
export function formatSeconds(value: number): string {
  return value.toFixed(3);
}

/**
 * Format seconds as `HH:MM:SS.mmm`
 *
 * Each field is floored from what the larger ones leave over, so milliseconds
 * are truncated, not rounded: 83.456789 => 00:01:23.456.
 * Hours are not capped, so 100 hours or more prints three or more digits.
 */
export function formatClock(value: number, decimalSeparator: string = '.'): string {
  let remainder = value;
  const hours = Math.floor(remainder / 3600);
  remainder -= hours * 3600;
  const minutes = Math.floor(remainder / 60);
  remainder -= minutes * 60;
  const seconds = Math.floor(remainder);
  remainder -= seconds;
  const milliseconds = Math.floor(remainder * 1000);

  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}${decimalSeparator}${pad(milliseconds, 3)}`;
}

/**
 * Format seconds as `HH:MM:SS,mmm`, the SRT timestamp form
 */
export function formatSrtClock(value: number): string {
  return formatClock(value, ',');
}
