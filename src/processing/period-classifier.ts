import type { ClassifiedFact, PeriodMode, RawFact } from '../core/types.js';

/**
 * Period classification: maps a reporting interval to its duration class.
 *
 * Real fiscal quarters are rarely exactly 91 days (52/53-week calendars,
 * leap years), so each class is a range. Ranges never overlap.
 */

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const MODE_RANGES: Array<{ mode: PeriodMode; min: number; max: number }> = [
  { mode: 'quarter', min: 88, max: 95 },
  { mode: 'semester', min: 170, max: 185 },
  { mode: 'three_quarter', min: 260, max: 275 },
  { mode: 'year', min: 350, max: 373 },
];

/**
 * Parse an ISO date (YYYY-MM-DD) as UTC midnight. Returns null if unparsable
 * or if the date does not exist (Date.UTC would roll 2024-02-30 into March).
 */
export function parseIsoDate(value: string): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const ms = Date.UTC(year, month, day);
  if (Number.isNaN(ms)) return null;

  const parsed = new Date(ms);
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month || parsed.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

/** Whole days from start to end; null if either date is unparsable */
export function durationDays(startDate: string, endDate: string): number | null {
  const start = parseIsoDate(startDate);
  const end = parseIsoDate(endDate);
  if (start === null || end === null) return null;
  return Math.round((end - start) / MS_PER_DAY);
}

export function modeFromDays(days: number): PeriodMode {
  for (const range of MODE_RANGES) {
    if (days >= range.min && days <= range.max) return range.mode;
  }
  return 'other';
}

/**
 * Classify an interval. A missing start date means an instant (balance sheet)
 * fact. Malformed intervals fall into 'other', which no selection rule matches.
 */
export function classifyPeriod(startDate: string | null | undefined, endDate: string): PeriodMode {
  if (!startDate) return 'instant';
  const days = durationDays(startDate, endDate);
  if (days === null || days < 0) return 'other';
  return modeFromDays(days);
}

export function classifyFact(fact: RawFact): ClassifiedFact {
  return { ...fact, mode: classifyPeriod(fact.start_date, fact.end_date) };
}
