import { ConfigError } from '../core/errors.js';
import type { DateConstraint, DateOperator, RawFact } from '../core/types.js';
import { parseIsoDate } from './period-classifier.js';

/**
 * End-date constraints: "<op><YYYY-MM-DD>" with op one of > >= < <= =.
 * A bare date means equality. Every constraint must hold for a fact to be kept.
 */

const CONSTRAINT_PATTERN = /^(>=|<=|>|<|=)?(\d{4}-\d{2}-\d{2})$/;

function toOperator(raw: string | undefined): DateOperator {
  switch (raw) {
    case '>':
    case '>=':
    case '<':
    case '<=':
      return raw;
    default:
      return '=';
  }
}

export function parseDateConstraint(text: string): DateConstraint {
  const match = CONSTRAINT_PATTERN.exec(text.trim());
  if (!match || parseIsoDate(match[2]) === null) {
    throw new ConfigError('date', `expected a constraint like ">=2024-01-01", got "${text}"`);
  }
  return { op: toOperator(match[1]), date: match[2] };
}

export function parseDateConstraints(texts: string[] | undefined): DateConstraint[] {
  return (texts ?? []).map(parseDateConstraint);
}

/** ISO dates compare correctly as strings */
export function meetsConstraint(endDate: string, constraint: DateConstraint): boolean {
  const { op, date } = constraint;
  switch (op) {
    case '>':
      return endDate > date;
    case '>=':
      return endDate >= date;
    case '<':
      return endDate < date;
    case '<=':
      return endDate <= date;
    case '=':
      return endDate === date;
  }
}

export function matchesDateConstraints(fact: RawFact, constraints: DateConstraint[]): boolean {
  return constraints.every(c => meetsConstraint(fact.end_date, c));
}
