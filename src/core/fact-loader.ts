import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { FactFileError, FactValidationError } from './errors.js';
import { FILING_PERIODS, type ConceptMetadata, type FactSet, type RawFact } from './types.js';
import { parseIsoDate } from '../processing/period-classifier.js';

/**
 * Fact-set loading and validation.
 *
 * A fact set is the JSON hand-off from the extraction layer:
 *   { "entity": {...}, "concepts": [ConceptMetadata], "facts": [RawFact] }
 * Numeric values may arrive as strings (as they appear in XBRL instances).
 */

const isoDate = z.string().refine(
  v => /^\d{4}-\d{2}-\d{2}$/.test(v) && parseIsoDate(v) !== null,
  'expected a YYYY-MM-DD date'
);

const numeric = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, 'expected a number').transform(Number),
]);

const ConceptSchema = z.object({
  concept: z.string().min(1),
  label: z.string().optional(),
  duration_nature: z.enum(['instant', 'duration']),
  sign_convention: z.enum(['debit', 'credit', 'none']).nullable().optional(),
  tag_text: z.string().optional(),
  decimals: z.union([z.string(), z.number().int()]).nullable().optional(),
  derivability: z.enum(['derivable', 'copy_only']).nullable().optional(),
});

const FactSchema = z.object({
  concept: z.string().min(1),
  value: numeric,
  start_date: isoDate.nullable().optional(),
  end_date: isoDate,
  doc_period_end: isoDate.nullable().optional(),
  fiscal_year: z.number().int(),
  fiscal_period: z.enum(FILING_PERIODS),
  accession_number: z.string().optional(),
  dimensions: z.record(z.string()).optional(),
});

export const FactSetSchema = z.object({
  entity: z.object({
    cik: z.string().optional(),
    ticker: z.string().optional(),
    name: z.string().optional(),
  }).optional(),
  concepts: z.array(ConceptSchema),
  facts: z.array(FactSchema),
}).superRefine((set, ctx) => {
  const seen = new Set<string>();
  set.concepts.forEach((c, i) => {
    if (seen.has(c.concept)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['concepts', i, 'concept'],
        message: `duplicate concept "${c.concept}"`,
      });
    }
    seen.add(c.concept);
  });
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Validate an already-parsed JSON value */
export function parseFactSet(input: unknown, source: string = 'input'): FactSet {
  const parsed = FactSetSchema.safeParse(input);
  if (!parsed.success) {
    throw new FactValidationError(formatIssues(parsed.error), source);
  }

  const concepts: ConceptMetadata[] = parsed.data.concepts.map(c => ({
    concept: c.concept,
    label: c.label,
    duration_nature: c.duration_nature,
    sign_convention: c.sign_convention ?? null,
    // Without a label of its own, the local name carries the lexical cues
    tag_text: c.tag_text ?? localName(c.concept),
    decimals: c.decimals == null ? null : String(c.decimals),
    derivability: c.derivability ?? null,
  }));

  const facts: RawFact[] = parsed.data.facts.map(f => ({
    concept: f.concept,
    value: f.value,
    start_date: f.start_date ?? null,
    end_date: f.end_date,
    doc_period_end: f.doc_period_end ?? null,
    fiscal_year: f.fiscal_year,
    fiscal_period: f.fiscal_period,
    accession_number: f.accession_number,
    dimensions: f.dimensions,
  }));

  return { entity: parsed.data.entity, concepts, facts };
}

/** "us-gaap:EarningsPerShareBasic" -> "EarningsPerShareBasic" */
export function localName(concept: string): string {
  const idx = concept.lastIndexOf(':');
  return idx >= 0 ? concept.slice(idx + 1) : concept;
}

export function parseFactSetJson(text: string, source: string = 'input'): FactSet {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new FactFileError(source, err instanceof Error ? err.message : String(err));
  }
  return parseFactSet(json, source);
}

export function loadFactSetFile(path: string): FactSet {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new FactFileError(path, err instanceof Error ? err.message : String(err));
  }
  return parseFactSetJson(text, path);
}
