import chalk from 'chalk';
import type { CanonicalPeriod, PeriodResult, QuarterTable, ReconstructionResult } from '../core/types.js';
import { buildNotes } from '../analysis/provenance.js';
import { DERIVABILITY_RULE_DESCRIPTIONS } from '../processing/derivability.js';
import { padLeft, padRight, formatScaled, resolveScale, type ScaleChoice } from './format-utils.js';

/**
 * Renders reconstruction results as terminal tables, one block per concept,
 * one row per fiscal year. Reconstructed cells are marked so they can never
 * be mistaken for as-filed numbers.
 */

export interface TableOptions {
  periods: CanonicalPeriod[];
  scale: ScaleChoice;
  verbose: boolean;
}

const DERIVED_MARK = '*';
const COPIED_MARK = '^';

function cellText(result: PeriodResult | null, format: (v: number) => string): string {
  if (!result) return chalk.dim('--');
  const text = format(result.value);
  switch (result.provenance.kind) {
    case 'derived':
      return chalk.yellow(text + DERIVED_MARK);
    case 'copied':
      return chalk.cyan(text + COPIED_MARK);
    default:
      return text;
  }
}

function conceptValues(tables: QuarterTable[], periods: CanonicalPeriod[]): number[] {
  const values: number[] = [];
  for (const table of tables) {
    for (const period of periods) {
      const cell = table.periods[period];
      if (cell) values.push(cell.value);
    }
  }
  return values;
}

function renderConcept(tables: QuarterTable[], options: TableOptions): string[] {
  const { concept, derivability } = tables[0];
  const scale = resolveScale(options.scale, conceptValues(tables, options.periods));
  const format = (v: number) => formatScaled(v, scale);
  const lines: string[] = [];

  const title = `${concept.label ?? concept.tag_text} (${concept.concept})${scale ? ` [${scale}]` : ''}`;
  lines.push(chalk.bold(title));
  lines.push(chalk.dim('='.repeat(title.length)));
  lines.push(chalk.dim(
    `  ${concept.duration_nature === 'instant' ? 'Instant' : 'Duration'} · ${derivability.derivability === 'derivable' ? 'derivable' : 'copy-only'} (${DERIVABILITY_RULE_DESCRIPTIONS[derivability.rule]})`
  ));
  lines.push('');

  const width = Math.max(
    10,
    ...tables.flatMap(t => options.periods.map(p => {
      const cell = t.periods[p];
      return cell ? format(cell.value).length + 3 : 0;
    }))
  );

  const header = options.periods.map(p => chalk.underline(padLeft(p, width))).join('');
  lines.push(`  ${chalk.underline(padRight('Year', 8))}${header}`);

  for (const table of tables) {
    const cells = options.periods.map(p => padLeft(cellText(table.periods[p], format), width)).join('');
    lines.push(`  ${padRight(String(table.fiscal_year), 8)}${cells}`);
  }

  if (options.verbose) {
    lines.push('');
    for (const table of tables) {
      for (const note of buildNotes(table)) {
        lines.push(chalk.dim(`  FY${table.fiscal_year}  ${note}`));
      }
    }
  }

  return lines;
}

/** Group consecutive tables of the same concept (reconstructFactSet orders them that way) */
function byConcept(tables: QuarterTable[]): QuarterTable[][] {
  const groups: QuarterTable[][] = [];
  for (const table of tables) {
    const last = groups[groups.length - 1];
    if (last && last[0].concept.concept === table.concept.concept) last.push(table);
    else groups.push([table]);
  }
  return groups;
}

export function renderTable(result: ReconstructionResult, options: TableOptions): string {
  const lines: string[] = [];

  const entity = result.entity;
  if (entity && (entity.name || entity.ticker)) {
    const name = [entity.name, entity.ticker ? `(${entity.ticker})` : '']
      .filter(Boolean).join(' ');
    lines.push(chalk.bold(name));
    lines.push('');
  }

  if (result.tables.length === 0) {
    lines.push(chalk.yellow('No consolidated facts matched.'));
    return lines.join('\n');
  }

  for (const group of byConcept(result.tables)) {
    lines.push(...renderConcept(group, options));
    lines.push('');
  }

  lines.push(chalk.dim('  -- Provenance ' + '-'.repeat(45)));
  lines.push(chalk.dim(`  Mode:     ${result.run_mode === 'raw' ? 'raw (as filed only)' : 'derived'}`));
  // The Q3 policy decides selection in raw mode too
  lines.push(chalk.dim(`  Q3:       ${result.q3_policy === 'cumulative_first' ? '9-month cumulative preferred' : 'direct quarter preferred'}`));
  if (result.run_mode === 'derived') {
    lines.push(chalk.dim(`  Legend:   ${DERIVED_MARK} derived by subtraction, ${COPIED_MARK} copied from a cumulative or annual value`));
  }
  if (result.skipped.length > 0) {
    lines.push(chalk.dim(`  Skipped:  ${result.skipped.length} facts (${summarizeSkipped(result)})`));
  }

  return lines.join('\n');
}

function summarizeSkipped(result: ReconstructionResult): string {
  const counts = new Map<string, number>();
  for (const s of result.skipped) {
    counts.set(s.reason, (counts.get(s.reason) ?? 0) + 1);
  }
  return Array.from(counts.entries()).map(([reason, n]) => `${n} ${reason.replace('_', ' ')}`).join(', ');
}
