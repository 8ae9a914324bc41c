import { describe, it, expect } from 'vitest';
import { parseStreamMessage, streamNames } from '../src/infra/BinanceConnector';

describe('parseStreamMessage', () => {
  it('reads aggregated trades as ticks', () => {
    const raw = JSON.stringify({
      stream: 'btcusdt@aggTrade',
      data: { e: 'aggTrade', E: 1, s: 'BTCUSDT', a: 7, p: '65000.5', q: '0.010', T: 1_700_000_000_123, m: true },
    });
    expect(parseStreamMessage(raw)).toEqual({
      type: 'trade', symbol: 'BTCUSDT', ts: 1_700_000_000_123, price: 65000.5, qty: 0.01,
    });
  });

  it('reads klines with their interval and close flag', () => {
    const raw = JSON.stringify({
      stream: 'btcusdt@kline_15m',
      data: {
        e: 'kline', E: 1, s: 'BTCUSDT',
        k: { t: 1_700_000_000_000, T: 1_700_000_899_999, s: 'BTCUSDT', i: '15m', o: '100', c: '101', h: '102', l: '99', v: '12.5', x: true },
      },
    });
    expect(parseStreamMessage(raw)).toEqual({
      type: 'kline',
      symbol: 'BTCUSDT',
      interval: '15m',
      ts: 1_700_000_000_000,
      open: 100,
      high: 102,
      low: 99,
      close: 101,
      volume: 12.5,
      isClosed: true,
      closeTs: 1_700_000_899_999,
    });
  });

  it('ignores other streams', () => {
    expect(parseStreamMessage(JSON.stringify({ stream: 'btcusdt@markPrice', data: { s: 'BTCUSDT' } }))).toBeNull();
    expect(parseStreamMessage(JSON.stringify({ result: null, id: 1 }))).toBeNull();
  });

  it('throws on malformed payloads', () => {
    expect(() => parseStreamMessage(JSON.stringify({ stream: 'btcusdt@kline_1m', data: {} })))
      .toThrow('kline frame without "k" payload');
    expect(() => parseStreamMessage(JSON.stringify({ stream: 'btcusdt@aggTrade', data: { s: 'BTCUSDT', T: 1, p: 'abc', q: '1' } })))
      .toThrow('expected a number, got abc');
    expect(() => parseStreamMessage('not json')).toThrow(SyntaxError);
  });
});

describe('streamNames', () => {
  it('subscribes one kline stream per timeframe and one trade stream per symbol', () => {
    expect(streamNames(['BTCUSDT'], ['1m', '15m'], true)).toEqual([
      'btcusdt@kline_1m',
      'btcusdt@kline_15m',
      'btcusdt@aggTrade',
    ]);
    expect(streamNames(['BTCUSDT', 'ETHUSDT'], ['1h'], false)).toEqual(['btcusdt@kline_1h', 'ethusdt@kline_1h']);
  });
});
