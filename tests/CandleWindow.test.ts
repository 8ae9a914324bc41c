import { describe, it, expect } from 'vitest';
import { CandleWindow } from '../src/core/CandleWindow';
import { bar } from './helpers';

const stream = { instrument: 'BTCUSDT', timeframe: '1m' as const };

describe('CandleWindow', () => {
  it('refuses a capacity below three', () => {
    expect(() => new CandleWindow(stream, 2)).toThrow(RangeError);
  });

  it('evicts the oldest candles beyond capacity', () => {
    const window = new CandleWindow(stream, 3);
    for (let i = 1; i <= 5; i++) window.append(bar(i, 10 + i, 5 + i));
    expect(window.size).toBe(3);
    const triple = window.latestTriple();
    expect(triple.ok && triple.triple.map(c => c.openTime)).toEqual([180_000, 240_000, 300_000]);
  });

  it('replaces an in-progress candle with the same open time', () => {
    const window = new CandleWindow(stream, 5);
    expect(window.append(bar(1, 11, 9, false))).toEqual({ status: 'appended', becameClosed: false });
    expect(window.append(bar(1, 12, 9, false))).toEqual({ status: 'replaced', becameClosed: false });
    expect(window.append(bar(1, 13, 9, true))).toEqual({ status: 'replaced', becameClosed: true });
    expect(window.size).toBe(1);
    expect(window.latest()?.high).toBe(13);
  });

  it('keeps a closed candle final', () => {
    const window = new CandleWindow(stream, 5);
    window.append(bar(1, 13, 9));
    expect(window.append(bar(1, 13, 9))).toEqual({ status: 'unchanged', becameClosed: false });
    expect(window.append(bar(1, 14, 9, false))).toEqual({ status: 'unchanged', becameClosed: false });
    expect(window.latest()?.high).toBe(13);
  });

  it('applies a correction to a closed candle without reporting a new close', () => {
    const window = new CandleWindow(stream, 5);
    window.append(bar(1, 13, 9));
    expect(window.append(bar(1, 14, 9))).toEqual({ status: 'replaced', becameClosed: false });
    expect(window.latest()?.high).toBe(14);
  });

  it('rejects candles older than the latest', () => {
    const window = new CandleWindow(stream, 5);
    window.append(bar(5, 13, 9));
    expect(window.append(bar(3, 13, 9))).toEqual({
      status: 'rejected',
      becameClosed: false,
      issue: { kind: 'OutOfOrderInput', stream, input: 'candle', receivedAt: 180_000, latestAt: 300_000 },
    });
    expect(window.size).toBe(1);
  });

  it('needs three closed candles for a triple', () => {
    const window = new CandleWindow(stream, 5);
    window.append(bar(1, 10, 8));
    window.append(bar(2, 12, 11));
    window.append(bar(3, 15, 13, false));
    expect(window.latestTriple()).toEqual({
      ok: false,
      issue: { kind: 'InsufficientData', stream, closedCandles: 2 },
    });
  });

  it('skips in-progress candles when picking the triple', () => {
    const window = new CandleWindow(stream, 5);
    window.append(bar(1, 10, 8));
    window.append(bar(2, 12, 11));
    window.append(bar(3, 15, 13));
    window.append(bar(4, 16, 14, false));
    const triple = window.latestTriple();
    expect(triple.ok && triple.triple.map(c => c.openTime)).toEqual([60_000, 120_000, 180_000]);
  });
});
