import type { GapCandidate } from '../domain/types';
import type { CandleTriple } from './CandleWindow';

/**
 * Three-candle imbalance check. c2 is the displacement candle; the gap is the
 * untraded interval between c1 and c3. Equal boundary prices are not a gap.
 */
export function detectGap([c1, c2, c3]: CandleTriple): GapCandidate | null {
  if (!c1.isClosed || !c2.isClosed || !c3.isClosed) return null;

  if (c3.low > c1.high) {
    return { direction: 'bullish', lowerBound: c1.high, upperBound: c3.low, formedAt: c3.closeTime };
  }

  if (c3.high < c1.low) {
    return { direction: 'bearish', lowerBound: c3.high, upperBound: c1.low, formedAt: c3.closeTime };
  }

  return null;
}
