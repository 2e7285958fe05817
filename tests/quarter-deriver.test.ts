import { describe, it, expect } from 'vitest';
import { deriveQuarters, directCells, roundToDecimals } from '../src/processing/quarter-deriver.js';
import { selectCandidates } from '../src/processing/candidate-selector.js';
import { classifyDerivability } from '../src/processing/derivability.js';
import { classifyFact } from '../src/processing/period-classifier.js';
import { provenanceTag } from '../src/analysis/provenance.js';
import type { ClassifiedFact, ConceptMetadata, FilingPeriod, PeriodResult } from '../src/core/types.js';

function fact(fiscal_period: FilingPeriod, start_date: string | null, end_date: string, value: number): ClassifiedFact {
  return classifyFact({
    concept: 'us-gaap:Revenues',
    value,
    start_date,
    end_date,
    doc_period_end: end_date,
    fiscal_year: 2024,
    fiscal_period,
    accession_number: `acc-${fiscal_period.toLowerCase()}`,
  });
}

const Q1 = (v: number) => fact('Q1', '2024-01-01', '2024-03-31', v);
const Q2 = (v: number) => fact('Q2', '2024-04-01', '2024-06-30', v);
const H1 = (v: number) => fact('Q2', '2024-01-01', '2024-06-30', v);
const Q3 = (v: number) => fact('Q3', '2024-07-01', '2024-09-30', v);
const M9 = (v: number) => fact('Q3', '2024-01-01', '2024-09-30', v);
const FY = (v: number) => fact('FY', '2024-01-01', '2024-12-31', v);

const revenue: ConceptMetadata = {
  concept: 'us-gaap:Revenues',
  duration_nature: 'duration',
  sign_convention: 'credit',
  tag_text: 'Revenues',
  decimals: '0',
};

function tagOf(result: PeriodResult | null): string | null {
  return result ? provenanceTag(result.provenance) : null;
}

function derive(concept: ConceptMetadata, facts: ClassifiedFact[], roundDerived = true) {
  return deriveQuarters(concept, selectCandidates(concept, facts), classifyDerivability(concept), roundDerived);
}

describe('roundToDecimals', () => {
  it('keeps positive decimal places', () => {
    expect(roundToDecimals(0.12345, '2')).toBe(0.12);
    expect(roundToDecimals(1.5399999999999998, '2')).toBe(1.54);
  });

  it('rounds to whole units for negative decimals', () => {
    expect(roundToDecimals(1234567.4, '-3')).toBe(1234567);
  });

  it('rounds halves away from zero for both signs', () => {
    expect(roundToDecimals(2.5, '0')).toBe(3);
    expect(roundToDecimals(-2.5, '0')).toBe(-3);
    expect(roundToDecimals(-1234567.5, '-3')).toBe(-1234568);
    expect(roundToDecimals(-0.125, '2')).toBe(-0.13);
    expect(roundToDecimals(-0.2, '0')).toBe(0);
  });

  it('leaves values alone for INF, missing or malformed decimals', () => {
    expect(roundToDecimals(1.23456, 'INF')).toBe(1.23456);
    expect(roundToDecimals(1.23456, null)).toBe(1.23456);
    expect(roundToDecimals(1.23456, undefined)).toBe(1.23456);
    expect(roundToDecimals(1.23456, 'abc')).toBe(1.23456);
  });
});

describe('directCells', () => {
  it('never fills Q4 and exposes the cumulative inputs', () => {
    const cells = directCells(selectCandidates(revenue, [Q1(100), H1(220), M9(350), FY(500)]));
    expect(cells.periods.Q4).toBeNull();
    expect(cells.periods.Q2).toBeNull();
    expect(cells.year_to_date['6M']?.value).toBe(220);
    expect(cells.year_to_date['9M']?.value).toBe(350);
  });
});

describe('deriveQuarters', () => {
  it('derives every quarter from cumulative figures', () => {
    const { periods } = derive(revenue, [Q1(100), H1(220), M9(350), FY(500)]);

    expect(periods.Q1?.value).toBe(100);
    expect(periods.Q2?.value).toBe(120);
    expect(periods.Q3?.value).toBe(130);
    expect(periods.Q4?.value).toBe(150);
    expect(periods.FY?.value).toBe(500);

    expect(tagOf(periods.Q1)).toBe('direct');
    expect(tagOf(periods.Q2)).toBe('derived:6M-Q1');
    expect(tagOf(periods.Q3)).toBe('derived:9M-6M');
    expect(tagOf(periods.Q4)).toBe('derived:FY-9M');
    expect(periods.Q4?.mode).toBe('quarter');
  });

  it('uses 9M - Q1 - Q2 when the 6-month figure is missing', () => {
    const { periods } = derive(revenue, [Q1(100), Q2(120), M9(350), FY(500)]);

    expect(periods.Q3?.value).toBe(130);
    expect(tagOf(periods.Q3)).toBe('derived:9M-Q1-Q2');
    expect(tagOf(periods.Q4)).toBe('derived:FY-9M');
  });

  it('uses FY - Q1 - Q2 - Q3 when the 9-month figure is missing', () => {
    const { periods } = derive(revenue, [Q1(10), H1(25), Q3(12), FY(60)]);
    const provenance = periods.Q4?.provenance;

    expect(periods.Q2?.value).toBe(15);
    expect(periods.Q4?.value).toBe(23);
    expect(provenance?.kind).toBe('derived');
    if (provenance?.kind !== 'derived') return;
    expect(provenance.formula).toBe('FY-Q1-Q2-Q3');
    expect(provenance.inputs).toEqual([
      { label: 'FY', value: 60, tag: 'direct' },
      { label: 'Q1', value: 10, tag: 'direct' },
      { label: 'Q2', value: 15, tag: 'derived:6M-Q1' },
      { label: 'Q3', value: 12, tag: 'direct' },
    ]);
    expect(provenance.facts.map(f => f.accession_number)).toEqual(['acc-fy', 'acc-q1', 'acc-q2', 'acc-q3']);
  });

  it('never overwrites a direct value', () => {
    const { periods } = derive(revenue, [Q1(100), Q2(125), H1(220), M9(350), FY(500)]);
    expect(periods.Q2?.value).toBe(125);
    expect(periods.Q2?.provenance.kind).toBe('direct');
    // Q3 still comes from the cumulative pair
    expect(periods.Q3?.value).toBe(130);
  });

  it('leaves periods null when no strategy has all its inputs', () => {
    expect(derive(revenue, [FY(500)]).periods).toMatchObject({ Q1: null, Q2: null, Q3: null, Q4: null });
    expect(derive(revenue, [Q1(100), FY(500)]).periods.Q4).toBeNull();
    expect(derive(revenue, [Q1(100), H1(220), M9(350)]).periods.Q4).toBeNull();
  });

  it('does not derive Q2 from the 6-month figure without Q1', () => {
    const { periods } = derive(revenue, [H1(220), FY(500)]);
    expect(periods.Q2).toBeNull();
  });

  it('rounds to the concept precision unless told not to', () => {
    const cash: ConceptMetadata = { ...revenue, sign_convention: 'none', decimals: '0' };
    expect(derive(cash, [M9(5.2), FY(10.6)]).periods.Q4?.value).toBe(5);
    expect(derive(cash, [M9(5.2), FY(10.6)], false).periods.Q4?.value).toBeCloseTo(5.4, 10);
  });

  it('copies the minuend for copy-only concepts', () => {
    const shares: ConceptMetadata = {
      concept: 'us-gaap:WeightedAverageNumberOfDilutedSharesOutstanding',
      duration_nature: 'duration',
      sign_convention: 'none',
      tag_text: 'WeightedAverageNumberOfDilutedSharesOutstanding',
    };
    const { periods } = derive(shares, [Q1(49854), H1(49860), M9(49870), FY(49922)]);

    expect(periods.Q2).toMatchObject({ value: 49860, mode: 'semester' });
    expect(tagOf(periods.Q2)).toBe('copied:6M');
    expect(tagOf(periods.Q3)).toBe('copied:9M');
    expect(periods.Q4).toMatchObject({ value: 49922, mode: 'year' });
    expect(tagOf(periods.Q4)).toBe('copied:FY');
  });

  it('gives a copy-only concept nothing when the inputs are missing', () => {
    const shares: ConceptMetadata = { ...revenue, derivability: 'copy_only' };
    expect(derive(shares, [FY(500)]).periods.Q4).toBeNull();
  });

  it('copies FY into Q4 for instant concepts and nothing else', () => {
    const inventory: ConceptMetadata = {
      concept: 'us-gaap:InventoryNet',
      duration_nature: 'instant',
      sign_convention: 'debit',
      tag_text: 'InventoryNet',
    };
    const facts = [
      fact('Q1', null, '2024-03-31', 410),
      fact('Q3', null, '2024-09-30', 455),
      fact('FY', null, '2024-12-31', 401),
    ];
    const { periods } = derive(inventory, facts);

    expect(periods.Q2).toBeNull();
    expect(periods.Q4).toMatchObject({ value: 401, mode: 'instant' });
    expect(tagOf(periods.Q4)).toBe('copied:FY');
  });
});
