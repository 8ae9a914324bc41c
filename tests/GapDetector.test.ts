import { describe, it, expect } from 'vitest';
import { detectGap } from '../src/core/GapDetector';
import { bar, closeOf } from './helpers';

describe('detectGap', () => {
  it('finds a bullish gap between c1.high and c3.low', () => {
    expect(detectGap([bar(1, 10, 8), bar(2, 12, 11), bar(3, 15, 13)])).toEqual({
      direction: 'bullish',
      lowerBound: 10,
      upperBound: 13,
      formedAt: closeOf(3),
    });
  });

  it('finds a bearish gap between c3.high and c1.low', () => {
    expect(detectGap([bar(1, 20, 18), bar(2, 17, 12), bar(3, 15, 13)])).toEqual({
      direction: 'bearish',
      lowerBound: 15,
      upperBound: 18,
      formedAt: closeOf(3),
    });
  });

  it('emits nothing when the outer ranges overlap', () => {
    for (const [high, low] of [[11, 9], [19, 9], [25, 17], [12, 10]]) {
      expect(detectGap([bar(1, 20, 10), bar(2, 22, 12), bar(3, high, low)])).toBeNull();
    }
  });

  it('does not count equal boundaries as an imbalance', () => {
    expect(detectGap([bar(1, 10, 8), bar(2, 12, 11), bar(3, 15, 10)])).toBeNull();
    expect(detectGap([bar(1, 20, 18), bar(2, 17, 12), bar(3, 18, 13)])).toBeNull();
  });

  it('ignores triples with an unclosed candle', () => {
    expect(detectGap([bar(1, 10, 8), bar(2, 12, 11), bar(3, 15, 13, false)])).toBeNull();
  });

  it('holds the bullish bounds over a sweep of triples', () => {
    for (let high1 = 1; high1 <= 20; high1++) {
      for (let low3 = 1; low3 <= 20; low3++) {
        const gap = detectGap([bar(1, high1, 0.5), bar(2, 30, 0.5), bar(3, low3 + 1, low3)]);
        if (low3 > high1) {
          expect(gap).toEqual({ direction: 'bullish', lowerBound: high1, upperBound: low3, formedAt: closeOf(3) });
        } else {
          expect(gap).toBeNull();
        }
      }
    }
  });
});
