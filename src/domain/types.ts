import { DomainValidationError } from './errors';
import type { Timeframe } from './timeframes';

export type { Timeframe } from './timeframes';

export type Direction = 'bullish' | 'bearish';
export type GapState = 'active' | 'partially_mitigated' | 'fully_mitigated';
export type ObservationSource = 'candle' | 'tick';

export interface StreamKey {
  instrument: string;
  timeframe: Timeframe;
}

export function streamId(stream: StreamKey): string {
  return `${stream.instrument}:${stream.timeframe}`;
}

export interface Candle {
  readonly openTime: number;  // ms
  readonly closeTime: number; // ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly isClosed: boolean;
}

export interface PriceObservation {
  readonly source: ObservationSource;
  readonly time: number;
  readonly low: number;
  readonly high: number;
}

export interface Gap {
  readonly id: string;
  readonly instrument: string;
  readonly timeframe: Timeframe;
  readonly direction: Direction;
  readonly upperBound: number;
  readonly lowerBound: number;
  readonly size: number;
  readonly percentage: number; // size relative to lowerBound, in %
  readonly midpoint: number;
  readonly formedAt: number;   // closeTime of the confirming candle
  readonly state: GapState;
  readonly mitigationStartedAt: number | null;
  readonly mitigationCompletedAt: number | null;
}

export interface GapCandidate {
  direction: Direction;
  lowerBound: number;
  upperBound: number;
  formedAt: number;
}

const isFiniteNumber = (v: number) => Number.isFinite(v);

export function createCandle(input: Candle): Candle {
  const { openTime, closeTime, open, high, low, close, volume } = input;
  for (const [field, value] of Object.entries({ openTime, closeTime, open, high, low, close, volume })) {
    if (!isFiniteNumber(value)) {
      throw new DomainValidationError('candle', `${field} must be a finite number, got ${value}`);
    }
  }
  if (closeTime < openTime) {
    throw new DomainValidationError('candle', `closeTime ${closeTime} precedes openTime ${openTime}`);
  }
  if (high < low) {
    throw new DomainValidationError('candle', `high ${high} is below low ${low}`);
  }
  if (high < Math.max(open, close) || low > Math.min(open, close)) {
    throw new DomainValidationError('candle', `open/close outside of [${low}, ${high}]`);
  }
  if (volume < 0) {
    throw new DomainValidationError('candle', `volume ${volume} is negative`);
  }

  return Object.freeze({ openTime, closeTime, open, high, low, close, volume, isClosed: input.isClosed });
}

export function tickObservation(time: number, price: number): PriceObservation {
  if (!isFiniteNumber(time) || !isFiniteNumber(price)) {
    throw new DomainValidationError('observation', `tick needs finite time and price, got ${time} @ ${price}`);
  }
  return Object.freeze({ source: 'tick' as const, time, low: price, high: price });
}

/**
 * The observation of a closed candle spans its whole range and is timed at
 * the candle's close.
 */
export function candleObservation(candle: Candle): PriceObservation {
  if (!candle.isClosed) {
    throw new DomainValidationError('observation', `candle ${candle.openTime} is not closed`);
  }
  return Object.freeze({ source: 'candle' as const, time: candle.closeTime, low: candle.low, high: candle.high });
}

export function gapId(stream: StreamKey, formedAt: number, direction: Direction): string {
  return `${stream.instrument}:${stream.timeframe}:${formedAt}:${direction}`;
}

export function createGap(stream: StreamKey, candidate: GapCandidate): Gap {
  const { direction, lowerBound, upperBound, formedAt } = candidate;
  if (!isFiniteNumber(lowerBound) || !isFiniteNumber(upperBound) || !isFiniteNumber(formedAt)) {
    throw new DomainValidationError('gap', 'bounds and formedAt must be finite numbers');
  }
  if (upperBound <= lowerBound) {
    throw new DomainValidationError('gap', `upperBound ${upperBound} must exceed lowerBound ${lowerBound}`);
  }

  const size = upperBound - lowerBound;
  return Object.freeze({
    id: gapId(stream, formedAt, direction),
    instrument: stream.instrument,
    timeframe: stream.timeframe,
    direction,
    upperBound,
    lowerBound,
    size,
    percentage: lowerBound > 0 ? (size / lowerBound) * 100 : 0,
    midpoint: (upperBound + lowerBound) / 2,
    formedAt,
    state: 'active' as const,
    mitigationStartedAt: null,
    mitigationCompletedAt: null,
  });
}

export interface MarketProvider {
  connect(symbols: string[], timeframes: Timeframe[]): Promise<void>;
  disconnect(): Promise<void>;
  onEvent(cb: (event: import('./events').AnyMarketEvent) => void): void;
}
