/**
 * Shared formatting utilities for terminal and CSV renderers.
 */

export type Scale = 'B' | 'M' | 'K' | '';
export type ScaleChoice = 'auto' | 'B' | 'M' | 'K' | 'none';

const SCALE_DIVISORS: Record<Scale, number> = { B: 1e9, M: 1e6, K: 1e3, '': 1 };

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = stripAnsi(str);
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

export function padLeft(str: string, len: number): string {
  const stripped = stripAnsi(str);
  const padding = Math.max(0, len - stripped.length);
  return ' '.repeat(padding) + str;
}

export function stripAnsi(str: string): string {
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Escape a value for CSV output (quote if it contains commas or quotes) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Pick a display scale from the largest absolute value */
export function detectScale(values: number[]): Scale {
  const max = values.reduce((m, v) => Math.max(m, Math.abs(v)), 0);
  if (max >= 1e9) return 'B';
  if (max >= 1e6) return 'M';
  if (max >= 1e3) return 'K';
  return '';
}

export function resolveScale(choice: ScaleChoice, values: number[]): Scale {
  if (choice === 'auto') return detectScale(values);
  if (choice === 'none') return '';
  return choice;
}

/**
 * Format a value at a scale. Scaled values get up to two decimals, unscaled
 * ones (per-share amounts, ratios) keep their own precision.
 */
export function formatScaled(value: number, scale: Scale): string {
  if (scale === '') {
    return Number.isInteger(value) ? value.toString() : String(Math.round(value * 1e6) / 1e6);
  }
  const scaled = value / SCALE_DIVISORS[scale];
  return scaled.toFixed(2);
}
