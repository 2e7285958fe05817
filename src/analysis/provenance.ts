import { CANONICAL_PERIODS, type PeriodResult, type Provenance, type QuarterTable } from '../core/types.js';
import { DERIVABILITY_RULE_DESCRIPTIONS } from '../processing/derivability.js';

/**
 * Provenance helpers. Every output value must be traceable to the as-filed
 * facts it came from.
 */

/** Short tag: "direct", "derived:FY-9M", "copied:FY" */
export function provenanceTag(provenance: Provenance): string {
  switch (provenance.kind) {
    case 'direct':
      return 'direct';
    case 'derived':
      return `derived:${provenance.formula}`;
    case 'copied':
      return `copied:${provenance.source}`;
  }
}

export function isReconstructed(result: PeriodResult): boolean {
  return result.provenance.kind !== 'direct';
}

/** Accession numbers behind a value, in first-seen order */
export function accessionsOf(result: PeriodResult): string[] {
  const facts = result.provenance.kind === 'direct' ? [result.provenance.fact] : result.provenance.facts;
  const seen: string[] = [];
  for (const fact of facts) {
    if (fact.accession_number && !seen.includes(fact.accession_number)) {
      seen.push(fact.accession_number);
    }
  }
  return seen;
}

/** One line explaining how a cell got its value */
export function describeResult(result: PeriodResult): string {
  const p = result.provenance;
  switch (p.kind) {
    case 'direct':
      return `${result.period}: as filed (${p.fact.mode}, ${p.fact.start_date ?? 'instant'} → ${p.fact.end_date})`;
    case 'derived': {
      const terms = p.inputs.map(i => `${i.label} ${i.value}`).join(' - ');
      return `${result.period}: ${terms} = ${result.value}`;
    }
    case 'copied':
      return `${result.period}: copied from ${p.source} (${result.value})`;
  }
}

/** Notes for one concept/year table, used by --verbose and the JSON output */
export function buildNotes(table: QuarterTable): string[] {
  const notes: string[] = [];
  const { derivability } = table;

  notes.push(
    `${derivability.derivability === 'derivable' ? 'Derivable' : 'Copy-only'}: ${DERIVABILITY_RULE_DESCRIPTIONS[derivability.rule]}`
  );

  for (const period of CANONICAL_PERIODS) {
    const result = table.periods[period];
    if (result && isReconstructed(result)) notes.push(describeResult(result));
  }

  const missing = CANONICAL_PERIODS.filter(period => table.periods[period] === null);
  if (missing.length > 0) {
    notes.push(`Not filed and not derivable: ${missing.join(', ')}`);
  }

  return notes;
}
