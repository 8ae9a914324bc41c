import type { Direction, Gap } from '../domain/types';

export interface TimeRange {
  from?: number; // inclusive, on formedAt
  to?: number;   // inclusive, on formedAt
}

export interface StatsFilter extends TimeRange {
  direction?: Direction;
}

export interface StatsResult {
  totalGaps: number;
  bullishGaps: number;
  bearishGaps: number;
  activeGaps: number;
  partiallyMitigatedGaps: number;
  fullyMitigatedGaps: number;
  mitigationRate: number;
  averageSize: number;
  averagePercentage: number;
  averageMidpoint: number;
  averageTimeToMitigationMs: number | null; // null = no fully mitigated gap in the set
}

const mean = (values: number[]) =>
  values.length ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;

export function computeStats(snapshot: readonly Gap[], filter: StatsFilter = {}): StatsResult {
  const gaps = snapshot.filter(g =>
    (filter.from === undefined || g.formedAt >= filter.from) &&
    (filter.to === undefined || g.formedAt <= filter.to) &&
    (filter.direction === undefined || g.direction === filter.direction)
  );

  const fully = gaps.filter(g => g.state === 'fully_mitigated');
  const durations: number[] = [];
  for (const g of fully) {
    if (g.mitigationCompletedAt !== null) durations.push(g.mitigationCompletedAt - g.formedAt);
  }

  return {
    totalGaps: gaps.length,
    bullishGaps: gaps.filter(g => g.direction === 'bullish').length,
    bearishGaps: gaps.filter(g => g.direction === 'bearish').length,
    activeGaps: gaps.filter(g => g.state === 'active').length,
    partiallyMitigatedGaps: gaps.filter(g => g.state === 'partially_mitigated').length,
    fullyMitigatedGaps: fully.length,
    mitigationRate: gaps.length ? fully.length / gaps.length : 0,
    averageSize: mean(gaps.map(g => g.size)),
    averagePercentage: mean(gaps.map(g => g.percentage)),
    averageMidpoint: mean(gaps.map(g => g.midpoint)),
    averageTimeToMitigationMs: durations.length ? mean(durations) : null,
  };
}

export interface DirectionalStats {
  all: StatsResult;
  bullish: StatsResult;
  bearish: StatsResult;
}

export function summarizeByDirection(snapshot: readonly Gap[], range: TimeRange = {}): DirectionalStats {
  return {
    all: computeStats(snapshot, range),
    bullish: computeStats(snapshot, { ...range, direction: 'bullish' }),
    bearish: computeStats(snapshot, { ...range, direction: 'bearish' }),
  };
}
