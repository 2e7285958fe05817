import type {
  CanonicalPeriod,
  ClassifiedFact,
  ConceptMetadata,
  DerivabilityDecision,
  PeriodCells,
  PeriodResult,
  SourceLabel,
  YearToDateLabel,
} from '../core/types.js';
import type { SelectionTable } from './candidate-selector.js';
import { provenanceTag } from '../analysis/provenance.js';

/**
 * Quarter Deriver: fills Q2, Q3 and Q4 gaps from cumulative figures.
 *
 *   Q2 = 6M - Q1
 *   Q3 = 9M - 6M          (fallback: 9M - Q1 - Q2)
 *   Q4 = FY - 9M          (fallback: FY - Q1 - Q2 - Q3)
 *
 * Copy-only concepts take the minuend verbatim instead of subtracting.
 * Instant concepts get Q4 := FY and nothing else.
 *
 * When no strategy has all of its inputs the period stays null. A missing
 * value is informative; a fabricated zero is not.
 */

export interface DerivedCells {
  periods: PeriodCells;
  year_to_date: Record<YearToDateLabel, PeriodResult | null>;
}

interface Operand {
  label: SourceLabel;
  result: PeriodResult;
}

/**
 * Round a derived value to the concept's XBRL precision.
 * Positive decimals keep that many places; negative decimals mean the value
 * was filed rounded to thousands/millions, so whole units are enough.
 * Halves round away from zero for both signs.
 */
export function roundToDecimals(value: number, decimals: string | null | undefined): number {
  if (decimals == null || decimals === 'INF') return value;
  const places = parseInt(decimals, 10);
  if (Number.isNaN(places)) return value;
  const factor = places < 0 ? 1 : 10 ** places;
  const rounded = Math.round(Math.abs(value) * factor) / factor;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

export function directResult(period: CanonicalPeriod | YearToDateLabel, fact: ClassifiedFact): PeriodResult {
  return { period, value: fact.value, mode: fact.mode, provenance: { kind: 'direct', fact } };
}

export function factsOf(result: PeriodResult): ClassifiedFact[] {
  return result.provenance.kind === 'direct' ? [result.provenance.fact] : result.provenance.facts;
}

function collectFacts(operands: Operand[]): ClassifiedFact[] {
  const seen = new Set<ClassifiedFact>();
  for (const operand of operands) {
    for (const fact of factsOf(operand.result)) seen.add(fact);
  }
  return Array.from(seen);
}

function combine(
  period: CanonicalPeriod,
  minuend: Operand,
  subtrahends: Operand[],
  concept: ConceptMetadata,
  decision: DerivabilityDecision,
  roundDerived: boolean
): PeriodResult {
  if (decision.derivability === 'copy_only') {
    return {
      period,
      value: minuend.result.value,
      mode: minuend.result.mode,
      provenance: { kind: 'copied', source: minuend.label, facts: factsOf(minuend.result) },
    };
  }

  const subtracted = subtrahends.reduce((sum, s) => sum + s.result.value, 0);
  const raw = minuend.result.value - subtracted;
  const operands = [minuend, ...subtrahends];

  return {
    period,
    value: roundDerived ? roundToDecimals(raw, concept.decimals) : raw,
    mode: 'quarter',
    provenance: {
      kind: 'derived',
      formula: operands.map(o => o.label).join('-'),
      inputs: operands.map(o => ({
        label: o.label,
        value: o.result.value,
        tag: provenanceTag(o.result.provenance),
      })),
      facts: collectFacts(operands),
    },
  };
}

/** Cells holding only what was selected directly; Q4 is never filed */
export function directCells(table: SelectionTable): DerivedCells {
  const { direct, cumulative } = table;
  return {
    periods: {
      Q1: direct.Q1 ? directResult('Q1', direct.Q1) : null,
      Q2: direct.Q2 ? directResult('Q2', direct.Q2) : null,
      Q3: direct.Q3 ? directResult('Q3', direct.Q3) : null,
      Q4: null,
      FY: direct.FY ? directResult('FY', direct.FY) : null,
    },
    year_to_date: {
      '6M': cumulative.semester ? directResult('6M', cumulative.semester) : null,
      '9M': cumulative.three_quarter ? directResult('9M', cumulative.three_quarter) : null,
    },
  };
}

export function deriveQuarters(
  concept: ConceptMetadata,
  table: SelectionTable,
  decision: DerivabilityDecision,
  roundDerived: boolean = true
): DerivedCells {
  const cells = directCells(table);
  const { periods } = cells;
  const ytd6 = cells.year_to_date['6M'];
  const ytd9 = cells.year_to_date['9M'];

  if (concept.duration_nature === 'instant') {
    if (periods.FY) {
      periods.Q4 = {
        period: 'Q4',
        value: periods.FY.value,
        mode: periods.FY.mode,
        provenance: { kind: 'copied', source: 'FY', facts: factsOf(periods.FY) },
      };
    }
    return cells;
  }

  const derive = (period: CanonicalPeriod, minuend: Operand, subtrahends: Operand[]) =>
    combine(period, minuend, subtrahends, concept, decision, roundDerived);

  if (!periods.Q2 && periods.Q1 && ytd6) {
    periods.Q2 = derive('Q2', { label: '6M', result: ytd6 }, [{ label: 'Q1', result: periods.Q1 }]);
  }

  if (!periods.Q3 && ytd9) {
    if (ytd6) {
      periods.Q3 = derive('Q3', { label: '9M', result: ytd9 }, [{ label: '6M', result: ytd6 }]);
    } else if (periods.Q1 && periods.Q2) {
      periods.Q3 = derive('Q3', { label: '9M', result: ytd9 }, [
        { label: 'Q1', result: periods.Q1 },
        { label: 'Q2', result: periods.Q2 },
      ]);
    }
  }

  if (periods.FY) {
    const fy: Operand = { label: 'FY', result: periods.FY };
    if (ytd9) {
      periods.Q4 = derive('Q4', fy, [{ label: '9M', result: ytd9 }]);
    } else if (periods.Q1 && periods.Q2 && periods.Q3) {
      periods.Q4 = derive('Q4', fy, [
        { label: 'Q1', result: periods.Q1 },
        { label: 'Q2', result: periods.Q2 },
        { label: 'Q3', result: periods.Q3 },
      ]);
    }
  }

  return cells;
}
