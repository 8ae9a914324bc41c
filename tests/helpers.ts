import { createCandle } from '../src/domain/types';
import type { Candle } from '../src/domain/types';

export const MINUTE = 60_000;

/**
 * One-minute candle number `index`, spanning [index * MINUTE, (index + 1) * MINUTE - 1].
 */
export function bar(index: number, high: number, low: number, isClosed = true): Candle {
  return createCandle({
    openTime: index * MINUTE,
    closeTime: (index + 1) * MINUTE - 1,
    open: low,
    high,
    low,
    close: high,
    volume: 1,
    isClosed,
  });
}

export const closeOf = (index: number) => (index + 1) * MINUTE - 1;
