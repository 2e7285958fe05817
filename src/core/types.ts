/**
 * Core data model for xbrl-quarters.
 *
 * Design principles:
 * - RawFacts are immutable inputs for one engine run
 * - Concept metadata is an explicit record, never looked up implicitly
 * - Every output cell carries provenance back to as-filed numbers
 * - Absence is a value (null), never a fabricated zero
 */

/** Duration class of a reporting interval */
export type PeriodMode =
  | 'instant'
  | 'quarter'
  | 'semester'       // 6-month year-to-date
  | 'three_quarter'  // 9-month year-to-date
  | 'year'
  | 'other';

export const CANONICAL_PERIODS = ['Q1', 'Q2', 'Q3', 'Q4', 'FY'] as const;

export type CanonicalPeriod = typeof CANONICAL_PERIODS[number];

/** The fiscal period a filing declares for itself (Q4 is never filed on its own) */
export const FILING_PERIODS = ['Q1', 'Q2', 'Q3', 'FY'] as const;

export type FilingPeriod = typeof FILING_PERIODS[number];

export type DurationNature = 'instant' | 'duration';

/** XBRL balance attribute; null when the concept carries none we recognise */
export type SignConvention = 'debit' | 'credit' | 'none';

export type Derivability = 'derivable' | 'copy_only';

export type Q3Policy = 'cumulative_first' | 'direct_first';

export type RunMode = 'raw' | 'derived';

export interface ConceptMetadata {
  concept: string;
  label?: string;
  duration_nature: DurationNature;
  sign_convention: SignConvention | null;
  tag_text: string;
  /** XBRL decimals attribute, e.g. "-6", "2" or "INF" */
  decimals?: string | null;
  /** Explicit override; wins over the lexical rules when set */
  derivability?: Derivability | null;
}

export interface RawFact {
  concept: string;
  value: number;
  start_date: string | null;
  end_date: string;
  doc_period_end: string | null;
  fiscal_year: number;
  fiscal_period: FilingPeriod;
  accession_number?: string;
  dimensions?: Record<string, string>;
}

export interface ClassifiedFact extends RawFact {
  mode: PeriodMode;
}

/** Cumulative inputs kept alongside the direct selections */
export type YearToDateLabel = '6M' | '9M';

/** Anything a derived or copied value can point back to */
export type SourceLabel = Exclude<CanonicalPeriod, 'Q4'> | YearToDateLabel;

export interface DerivationInput {
  label: SourceLabel;
  value: number;
  tag: string;
}

export type Provenance =
  | { kind: 'direct'; fact: ClassifiedFact }
  | {
      kind: 'derived';
      formula: string;
      inputs: DerivationInput[];
      facts: ClassifiedFact[];
    }
  | { kind: 'copied'; source: SourceLabel; facts: ClassifiedFact[] };

export interface PeriodResult {
  period: CanonicalPeriod | YearToDateLabel;
  value: number;
  mode: PeriodMode;
  provenance: Provenance;
}

export type PeriodCells = Record<CanonicalPeriod, PeriodResult | null>;

export type DerivabilityRule =
  | 'override'
  | 'instant'
  | 'average'
  | 'earnings_per_share'
  | 'signed_flow'
  | 'unsigned_flow'
  | 'unrecognized';

export interface DerivabilityDecision {
  derivability: Derivability;
  rule: DerivabilityRule;
}

/** Reconstruction result for one concept in one fiscal year */
export interface QuarterTable {
  concept: ConceptMetadata;
  fiscal_year: number;
  run_mode: RunMode;
  derivability: DerivabilityDecision;
  periods: PeriodCells;
  year_to_date: Record<YearToDateLabel, PeriodResult | null>;
}

export interface EngineOptions {
  mode: RunMode;
  q3Policy: Q3Policy;
  roundDerived: boolean;
}

/** JSON fact-set document accepted by every surface */
export interface FactSet {
  entity?: { cik?: string; ticker?: string; name?: string };
  concepts: ConceptMetadata[];
  facts: RawFact[];
}

export type PeriodFilter = 'all' | 'quarterly' | 'yearly';

export type DateOperator = '>' | '>=' | '<' | '<=' | '=';

/** A bound on a fact's end date, e.g. ">=2024-01-01" */
export interface DateConstraint {
  op: DateOperator;
  date: string;
}
export type NatureFilter = 'all' | 'instant' | 'flow';

export interface SkippedFact {
  fact: RawFact;
  reason: 'unknown_concept' | 'dimensional' | 'non_finite';
}

export interface ReconstructionResult {
  entity: FactSet['entity'] | null;
  run_mode: RunMode;
  q3_policy: Q3Policy;
  tables: QuarterTable[];
  skipped: SkippedFact[];
}
