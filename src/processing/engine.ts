import { classifyFact } from './period-classifier.js';
import { selectCandidates } from './candidate-selector.js';
import { classifyDerivability } from './derivability.js';
import { deriveQuarters, directCells } from './quarter-deriver.js';
import { matchesDateConstraints } from './date-filter.js';
import type {
  CanonicalPeriod,
  ConceptMetadata,
  DateConstraint,
  EngineOptions,
  FactSet,
  NatureFilter,
  PeriodFilter,
  QuarterTable,
  RawFact,
  ReconstructionResult,
  SkippedFact,
} from '../core/types.js';

/**
 * Engine entry points.
 *
 * reconstructQuarters() is the pure core: one concept, one fiscal year, no I/O.
 * reconstructFactSet() groups a whole fact set by (concept, fiscal year) and
 * runs the core per group. Groups never see each other, so the order in
 * which they run does not matter.
 */

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  mode: 'derived',
  q3Policy: 'cumulative_first',
  roundDerived: true,
};

/** Fill unset options from the defaults; an explicit undefined never wins */
export function resolveEngineOptions(options: Partial<EngineOptions> = {}): EngineOptions {
  return {
    mode: options.mode ?? DEFAULT_ENGINE_OPTIONS.mode,
    q3Policy: options.q3Policy ?? DEFAULT_ENGINE_OPTIONS.q3Policy,
    roundDerived: options.roundDerived ?? DEFAULT_ENGINE_OPTIONS.roundDerived,
  };
}

export function reconstructQuarters(
  concept: ConceptMetadata,
  facts: RawFact[],
  options: Partial<EngineOptions> = {}
): QuarterTable {
  const opts = resolveEngineOptions(options);
  const classified = facts.map(classifyFact);
  const selection = selectCandidates(concept, classified, opts.q3Policy);
  const derivability = classifyDerivability(concept);

  const cells = opts.mode === 'raw'
    ? directCells(selection)
    : deriveQuarters(concept, selection, derivability, opts.roundDerived);

  return {
    concept,
    fiscal_year: fiscalYearOf(facts),
    run_mode: opts.mode,
    derivability,
    periods: cells.periods,
    year_to_date: cells.year_to_date,
  };
}

function fiscalYearOf(facts: RawFact[]): number {
  return facts.length > 0 ? facts[0].fiscal_year : 0;
}

export interface FactSetOptions extends Partial<EngineOptions> {
  concepts?: string[];
  nature?: NatureFilter;
  /** End-date bounds applied to facts before grouping */
  dates?: DateConstraint[];
}

/**
 * Segment (dimensional) facts are not consolidated figures: the engine only
 * reconstructs the company-wide series.
 */
function isConsolidated(fact: RawFact): boolean {
  return !fact.dimensions || Object.keys(fact.dimensions).length === 0;
}

export function reconstructFactSet(factSet: FactSet, options: FactSetOptions = {}): ReconstructionResult {
  const opts = resolveEngineOptions(options);
  const conceptsByName = new Map(factSet.concepts.map(c => [c.concept, c]));
  const wanted = options.concepts && options.concepts.length > 0 ? new Set(options.concepts) : null;
  const nature = options.nature ?? 'all';
  const dates = options.dates ?? [];

  const skipped: SkippedFact[] = [];
  // concept -> fiscal year -> facts
  const groups = new Map<string, Map<number, RawFact[]>>();

  for (const fact of factSet.facts) {
    if (!conceptsByName.has(fact.concept)) {
      skipped.push({ fact, reason: 'unknown_concept' });
      continue;
    }
    if (!isConsolidated(fact)) {
      skipped.push({ fact, reason: 'dimensional' });
      continue;
    }
    if (!Number.isFinite(fact.value)) {
      skipped.push({ fact, reason: 'non_finite' });
      continue;
    }
    if (wanted && !wanted.has(fact.concept)) continue;
    if (!matchesDateConstraints(fact, dates)) continue;

    let byYear = groups.get(fact.concept);
    if (!byYear) {
      byYear = new Map<number, RawFact[]>();
      groups.set(fact.concept, byYear);
    }
    const bucket = byYear.get(fact.fiscal_year);
    if (bucket) bucket.push(fact);
    else byYear.set(fact.fiscal_year, [fact]);
  }

  const tables: QuarterTable[] = [];
  for (const [conceptName, byYear] of [...groups.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const concept = conceptsByName.get(conceptName);
    if (!concept || !matchesNature(concept, nature)) continue;

    for (const [, facts] of [...byYear.entries()].sort(([a], [b]) => a - b)) {
      tables.push(reconstructQuarters(concept, facts, opts));
    }
  }

  return {
    entity: factSet.entity ?? null,
    run_mode: opts.mode,
    q3_policy: opts.q3Policy,
    tables,
    skipped,
  };
}

function matchesNature(concept: ConceptMetadata, nature: NatureFilter): boolean {
  if (nature === 'instant') return concept.duration_nature === 'instant';
  if (nature === 'flow') return concept.duration_nature === 'duration';
  return true;
}

/** Canonical periods shown for a --quarterly / --yearly filter */
export function periodsFor(filter: PeriodFilter): CanonicalPeriod[] {
  switch (filter) {
    case 'quarterly':
      return ['Q1', 'Q2', 'Q3', 'Q4'];
    case 'yearly':
      return ['FY'];
    default:
      return ['Q1', 'Q2', 'Q3', 'Q4', 'FY'];
  }
}
