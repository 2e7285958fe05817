import type { ConceptMetadata, DerivabilityDecision } from '../core/types.js';

/**
 * Derivability Classifier: may a concept's quarter be reconstructed by
 * subtracting cumulative periods, or must the cumulative value be copied?
 *
 * Resolution order:
 *   1. explicit override on the concept
 *   2. instant concepts: copy-only (snapshots are never subtracted)
 *   3. "average" in the tag: copy-only (weighted averages are not additive)
 *   4. earnings-per-share tag: derivable
 *   5. debit/credit balance: derivable
 *   6. balance "none" (net cash-flow subtotals): derivable
 *   7. anything else: copy-only
 *
 * Rule 3 must run before 5-6: average share counts usually carry no balance
 * and would otherwise be subtracted into large negative numbers.
 */

/** Lowercase and drop separators so "EarningsPerShareBasic" and "Earnings per share" match alike */
function normalizeTag(tagText: string): string {
  return tagText.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function isAverageTag(tagText: string): boolean {
  return normalizeTag(tagText).includes('average');
}

export function isEarningsPerShareTag(tagText: string): boolean {
  return normalizeTag(tagText).includes('earningspershare');
}

export function classifyDerivability(concept: ConceptMetadata): DerivabilityDecision {
  if (concept.derivability) {
    return { derivability: concept.derivability, rule: 'override' };
  }
  if (concept.duration_nature === 'instant') {
    return { derivability: 'copy_only', rule: 'instant' };
  }
  if (isAverageTag(concept.tag_text)) {
    return { derivability: 'copy_only', rule: 'average' };
  }
  if (isEarningsPerShareTag(concept.tag_text)) {
    return { derivability: 'derivable', rule: 'earnings_per_share' };
  }

  switch (concept.sign_convention) {
    case 'debit':
    case 'credit':
      return { derivability: 'derivable', rule: 'signed_flow' };
    case 'none':
      return { derivability: 'derivable', rule: 'unsigned_flow' };
    default:
      return { derivability: 'copy_only', rule: 'unrecognized' };
  }
}

export const DERIVABILITY_RULE_DESCRIPTIONS: Record<DerivabilityDecision['rule'], string> = {
  override: 'Explicit derivability set on the concept',
  instant: 'Point-in-time snapshot; copied, never subtracted',
  average: 'Weighted average; not additive across quarters',
  earnings_per_share: 'Earnings per share; treated as additive across quarters',
  signed_flow: 'Cumulative flow with a debit/credit balance',
  unsigned_flow: 'Cumulative flow without a balance (e.g. net cash-flow subtotal)',
  unrecognized: 'Unrecognised concept; copied rather than risk a wrong subtraction',
};
