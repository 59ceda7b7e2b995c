/**
 * Scoring eligibility: a record is scored only when P/E is known and positive.
 */

import type { Fundamentals } from '@/types/pipeline';

export type DropReason = 'fetch_failed' | 'missing_pe' | 'non_positive_pe';

export function eligibilityFailure(fundamentals: Fundamentals | null): DropReason | null {
  if (!fundamentals) return 'fetch_failed';
  const pe = fundamentals.metrics['P/E Ratio'];
  if (pe === null || !Number.isFinite(pe)) return 'missing_pe';
  if (pe <= 0) return 'non_positive_pe';
  return null;
}

export function isEligibleForScoring(fundamentals: Fundamentals | null): fundamentals is Fundamentals {
  return eligibilityFailure(fundamentals) === null;
}
