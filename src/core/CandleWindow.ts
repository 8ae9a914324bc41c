import type { Candle, StreamKey } from '../domain/types';
import type { InsufficientDataIssue, OutOfOrderInputIssue } from '../domain/errors';

export const MIN_WINDOW_CAPACITY = 3;

export type CandleTriple = readonly [Candle, Candle, Candle];

export type AppendOutcome =
  | { status: 'appended' | 'replaced' | 'unchanged'; becameClosed: boolean }
  | { status: 'rejected'; becameClosed: false; issue: OutOfOrderInputIssue };

export type TripleResult =
  | { ok: true; triple: CandleTriple }
  | { ok: false; issue: InsufficientDataIssue };

/**
 * Rolling buffer of the latest candles of one stream, ordered by openTime.
 */
export class CandleWindow {
  private candles: Candle[] = [];

  constructor(
    private readonly stream: StreamKey,
    private readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < MIN_WINDOW_CAPACITY) {
      throw new RangeError(`CandleWindow capacity must be an integer >= ${MIN_WINDOW_CAPACITY}, got ${capacity}`);
    }
  }

  get size(): number {
    return this.candles.length;
  }

  public latest(): Candle | undefined {
    return this.candles[this.candles.length - 1];
  }

  public append(candle: Candle): AppendOutcome {
    const last = this.latest();

    if (last && candle.openTime < last.openTime) {
      return {
        status: 'rejected',
        becameClosed: false,
        issue: {
          kind: 'OutOfOrderInput',
          stream: this.stream,
          input: 'candle',
          receivedAt: candle.openTime,
          latestAt: last.openTime,
        },
      };
    }

    if (last && candle.openTime === last.openTime) {
      // A closed candle is final: late in-progress updates and exact re-sends are ignored
      if (last.isClosed && (!candle.isClosed || sameCandle(last, candle))) {
        return { status: 'unchanged', becameClosed: false };
      }
      this.candles[this.candles.length - 1] = candle;
      return { status: 'replaced', becameClosed: candle.isClosed && !last.isClosed };
    }

    this.candles.push(candle);
    while (this.candles.length > this.capacity) this.candles.shift();
    return { status: 'appended', becameClosed: candle.isClosed };
  }

  public latestTriple(): TripleResult {
    const closed = this.candles.filter(c => c.isClosed);
    if (closed.length < 3) {
      return {
        ok: false,
        issue: { kind: 'InsufficientData', stream: this.stream, closedCandles: closed.length },
      };
    }
    const [c1, c2, c3] = closed.slice(-3);
    return { ok: true, triple: [c1, c2, c3] };
  }
}

function sameCandle(a: Candle, b: Candle): boolean {
  return a.closeTime === b.closeTime &&
    a.open === b.open && a.high === b.high && a.low === b.low &&
    a.close === b.close && a.volume === b.volume;
}
