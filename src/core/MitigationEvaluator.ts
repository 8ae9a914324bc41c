import type { Gap, PriceObservation } from '../domain/types';

export type MitigationVerdict =
  | { kind: 'none'; reason: 'terminal' | 'not_eligible' | 'no_overlap' }
  | { kind: 'partial'; at: number }
  | { kind: 'full'; at: number };

/**
 * Geometric overlap between an observed price range and a gap interval.
 * Direction plays no part. Only observations strictly after formation count.
 */
export function evaluateMitigation(gap: Gap, observation: PriceObservation): MitigationVerdict {
  if (gap.state === 'fully_mitigated') return { kind: 'none', reason: 'terminal' };
  if (observation.time <= gap.formedAt) return { kind: 'none', reason: 'not_eligible' };

  const { low, high, time } = observation;

  if (low <= gap.lowerBound && high >= gap.upperBound) {
    return { kind: 'full', at: time };
  }
  if (low <= gap.upperBound && high >= gap.lowerBound) {
    return { kind: 'partial', at: time };
  }
  return { kind: 'none', reason: 'no_overlap' };
}

/**
 * Next record for a gap after a verdict. Returns the same object when the
 * verdict changes nothing.
 */
export function applyVerdict(gap: Gap, verdict: MitigationVerdict): Gap {
  if (gap.state === 'fully_mitigated' || verdict.kind === 'none') return gap;

  if (verdict.kind === 'partial') {
    if (gap.state === 'partially_mitigated') return gap;
    return Object.freeze({ ...gap, state: 'partially_mitigated' as const, mitigationStartedAt: verdict.at });
  }

  const startedAt = gap.mitigationStartedAt ?? verdict.at;
  return Object.freeze({
    ...gap,
    state: 'fully_mitigated' as const,
    mitigationStartedAt: startedAt,
    mitigationCompletedAt: Math.max(verdict.at, startedAt),
  });
}
