/**
 * Renders reconstruction results as CSV for spreadsheet import.
 * Long format: one row per concept, fiscal year and period, so every value
 * keeps its provenance tag next to it.
 */

import type { CanonicalPeriod, ReconstructionResult } from '../core/types.js';
import { accessionsOf, provenanceTag } from '../analysis/provenance.js';
import { csvEscape } from './format-utils.js';

export function renderCsv(result: ReconstructionResult, periods: CanonicalPeriod[]): string {
  const lines: string[] = [];
  lines.push('Concept,Fiscal_Year,Period,Value,Provenance,Period_End,Accession_Numbers');

  for (const table of result.tables) {
    for (const period of periods) {
      const cell = table.periods[period];
      const periodEnd = cell?.provenance.kind === 'direct' ? cell.provenance.fact.end_date : '';
      lines.push([
        csvEscape(table.concept.concept),
        table.fiscal_year.toString(),
        period,
        cell ? cell.value.toString() : '',
        cell ? provenanceTag(cell.provenance) : 'absent',
        periodEnd,
        cell ? csvEscape(accessionsOf(cell).join(' ')) : '',
      ].join(','));
    }
  }

  return lines.join('\n');
}
