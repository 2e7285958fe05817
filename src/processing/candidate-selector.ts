import { parseIsoDate } from './period-classifier.js';
import type {
  ClassifiedFact,
  ConceptMetadata,
  FilingPeriod,
  PeriodMode,
  Q3Policy,
} from '../core/types.js';

/**
 * Candidate Selector: picks the single best fact for each canonical period.
 *
 * Each filing carries the current period AND comparative prior-year periods
 * under the same duration class. Every selection goes through pickClosest(),
 * which keeps the fact ending nearest the filing's own period end.
 *
 * Inputs are expected to be restricted to one concept and one fiscal year.
 * A canonical period only draws on facts from the filing that declares it:
 * the Q2 filing supplies Q2 and the 6-month cumulative, the Q3 filing Q3 and
 * the 9-month cumulative, the annual filing FY.
 */

export interface SelectionTable {
  direct: Partial<Record<FilingPeriod, ClassifiedFact>>;
  /** Retained as derivation inputs even when a direct quarter was chosen */
  cumulative: {
    semester: ClassifiedFact | null;
    three_quarter: ClassifiedFact | null;
  };
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/** FY rank table: lowest rank present wins */
const FY_MODE_RANK: Partial<Record<PeriodMode, number>> = {
  year: 0,
  quarter: 1,
  other: 2,
};

/**
 * Absolute day difference between a fact's end date and its filing's
 * declared period end. Infinity when the filing date is missing or unparsable.
 */
export function dateDistance(endDate: string, docPeriodEnd: string | null): number {
  if (!docPeriodEnd) return Infinity;
  const end = parseIsoDate(endDate);
  const doc = parseIsoDate(docPeriodEnd);
  if (end === null || doc === null) return Infinity;
  return Math.abs(Math.round((end - doc) / MS_PER_DAY));
}

/**
 * Total order used by pickClosest: distance ascending, then the later end date,
 * then the later start date, then accession number, then value. The result
 * never depends on input iteration order.
 */
export function compareCandidates(a: ClassifiedFact, b: ClassifiedFact): number {
  const da = dateDistance(a.end_date, a.doc_period_end);
  const db = dateDistance(b.end_date, b.doc_period_end);
  if (da !== db) return da < db ? -1 : 1;

  if (a.end_date !== b.end_date) return a.end_date > b.end_date ? -1 : 1;

  const sa = a.start_date ?? '';
  const sb = b.start_date ?? '';
  if (sa !== sb) return sa > sb ? -1 : 1;

  const accA = a.accession_number ?? '';
  const accB = b.accession_number ?? '';
  if (accA !== accB) return accA < accB ? -1 : 1;

  return a.value - b.value;
}

/** Deterministic minimum under compareCandidates */
export function pickClosest(candidates: ClassifiedFact[]): ClassifiedFact | null {
  let best: ClassifiedFact | null = null;
  for (const candidate of candidates) {
    if (!best || compareCandidates(candidate, best) < 0) best = candidate;
  }
  return best;
}

function ofMode(facts: ClassifiedFact[], mode: PeriodMode): ClassifiedFact[] {
  return facts.filter(f => f.mode === mode);
}

export function selectQ1(facts: ClassifiedFact[]): ClassifiedFact | null {
  return pickClosest(ofMode(facts, 'quarter'));
}

/**
 * Direct quarter first. The semester fallback only applies once Q1 is
 * resolved, since Q2 will later be derived as semester minus Q1.
 */
export function selectQ2(facts: ClassifiedFact[], q1Resolved: boolean): ClassifiedFact | null {
  const direct = pickClosest(ofMode(facts, 'quarter'));
  if (direct) return direct;
  if (!q1Resolved) return null;
  return pickClosest(ofMode(facts, 'semester'));
}

/**
 * Q3 prefers the 9-month cumulative under the default policy, but only when
 * prior periods can support a later derivation. Otherwise the direct quarter.
 */
export function selectQ3(
  facts: ClassifiedFact[],
  priorPeriodsResolved: boolean,
  policy: Q3Policy = 'cumulative_first'
): ClassifiedFact | null {
  const cumulative = priorPeriodsResolved ? pickClosest(ofMode(facts, 'three_quarter')) : null;
  const direct = pickClosest(ofMode(facts, 'quarter'));

  if (policy === 'direct_first') return direct ?? cumulative;
  return cumulative ?? direct;
}

export function selectFY(facts: ClassifiedFact[]): ClassifiedFact | null {
  let bestRank = Infinity;
  for (const fact of facts) {
    const rank = FY_MODE_RANK[fact.mode];
    if (rank !== undefined && rank < bestRank) bestRank = rank;
  }
  if (bestRank === Infinity) return null;
  return pickClosest(facts.filter(f => FY_MODE_RANK[f.mode] === bestRank));
}

function groupByFilingPeriod(facts: ClassifiedFact[]): Record<FilingPeriod, ClassifiedFact[]> {
  const groups: Record<FilingPeriod, ClassifiedFact[]> = { Q1: [], Q2: [], Q3: [], FY: [] };
  for (const fact of facts) {
    groups[fact.fiscal_period].push(fact);
  }
  return groups;
}

/**
 * Balance-sheet concepts have no cumulative variant: every period is a
 * snapshot picked straight from the instant facts of its filing.
 */
function selectInstantTable(groups: Record<FilingPeriod, ClassifiedFact[]>): SelectionTable {
  const direct: SelectionTable['direct'] = {};
  for (const period of ['Q1', 'Q2', 'Q3', 'FY'] as const) {
    const fact = pickClosest(ofMode(groups[period], 'instant'));
    if (fact) direct[period] = fact;
  }
  return { direct, cumulative: { semester: null, three_quarter: null } };
}

/**
 * Build the partial table for one concept and fiscal year: whatever was
 * filed directly plus the cumulative facts needed for derivation.
 */
export function selectCandidates(
  concept: ConceptMetadata,
  facts: ClassifiedFact[],
  policy: Q3Policy = 'cumulative_first'
): SelectionTable {
  const groups = groupByFilingPeriod(facts);

  if (concept.duration_nature === 'instant') {
    return selectInstantTable(groups);
  }

  const direct: SelectionTable['direct'] = {};
  let semester: ClassifiedFact | null = null;
  let threeQuarter: ClassifiedFact | null = null;

  const q1 = selectQ1(groups.Q1);
  if (q1) direct.Q1 = q1;

  const q2 = selectQ2(groups.Q2, q1 !== null);
  if (q2?.mode === 'semester') semester = q2;
  else if (q2) direct.Q2 = q2;
  semester ??= pickClosest(ofMode(groups.Q2, 'semester'));

  const priorResolved = semester !== null || (direct.Q1 !== undefined && direct.Q2 !== undefined);
  const q3 = selectQ3(groups.Q3, priorResolved, policy);
  if (q3?.mode === 'three_quarter') threeQuarter = q3;
  else if (q3) direct.Q3 = q3;
  threeQuarter ??= pickClosest(ofMode(groups.Q3, 'three_quarter'));

  const fy = selectFY(groups.FY);
  if (fy) direct.FY = fy;

  return { direct, cumulative: { semester, three_quarter: threeQuarter } };
}
