import { CANONICAL_PERIODS, type CanonicalPeriod, type PeriodResult, type QuarterTable, type ReconstructionResult } from '../core/types.js';
import { accessionsOf, buildNotes, provenanceTag } from '../analysis/provenance.js';

/**
 * Renders reconstruction results as structured JSON for programmatic use.
 * The same shape backs the web API and the MCP tools.
 */

export interface SerializedCell {
  value: number;
  provenance: string;
  mode: string;
  period_start: string | null;
  period_end: string | null;
  accession_numbers: string[];
  inputs?: Array<{ label: string; value: number; provenance: string }>;
}

export function serializeCell(result: PeriodResult | null): SerializedCell | null {
  if (!result) return null;
  const p = result.provenance;
  const cell: SerializedCell = {
    value: result.value,
    provenance: provenanceTag(p),
    mode: result.mode,
    period_start: p.kind === 'direct' ? p.fact.start_date : null,
    period_end: p.kind === 'direct' ? p.fact.end_date : null,
    accession_numbers: accessionsOf(result),
  };
  if (p.kind === 'derived') {
    cell.inputs = p.inputs.map(i => ({ label: i.label, value: i.value, provenance: i.tag }));
  }
  return cell;
}

export function serializeTable(table: QuarterTable, periods?: CanonicalPeriod[]) {
  const shown = periods ?? CANONICAL_PERIODS;
  const cells: Partial<Record<CanonicalPeriod, SerializedCell | null>> = {};
  for (const period of shown) {
    cells[period] = serializeCell(table.periods[period]);
  }

  return {
    concept: table.concept.concept,
    label: table.concept.label ?? table.concept.tag_text,
    duration_nature: table.concept.duration_nature,
    fiscal_year: table.fiscal_year,
    derivability: table.derivability.derivability,
    derivability_rule: table.derivability.rule,
    periods: cells,
    year_to_date: {
      '6M': serializeCell(table.year_to_date['6M']),
      '9M': serializeCell(table.year_to_date['9M']),
    },
    notes: buildNotes(table),
  };
}

export function serializeReconstruction(result: ReconstructionResult, periods?: CanonicalPeriod[]) {
  return {
    entity: result.entity,
    run_mode: result.run_mode,
    q3_policy: result.q3_policy,
    tables: result.tables.map(t => serializeTable(t, periods)),
    skipped: result.skipped.map(s => ({
      concept: s.fact.concept,
      fiscal_year: s.fact.fiscal_year,
      fiscal_period: s.fact.fiscal_period,
      end_date: s.fact.end_date,
      reason: s.reason,
    })),
  };
}

export function renderJson(result: ReconstructionResult, periods?: CanonicalPeriod[]): string {
  return JSON.stringify(serializeReconstruction(result, periods), null, 2);
}
