import { describe, it, expect } from 'vitest';
import { parseKlineRow } from '../src/infra/BinanceHistory';
import { DomainValidationError } from '../src/domain/errors';

const row = [1_700_000_000_000, '100.0', '102.5', '99.5', '101.0', '12.5', 1_700_000_059_999, '1262.5', 42, '6', '606', '0'];

describe('parseKlineRow', () => {
  it('converts a finished kline into a closed candle', () => {
    expect(parseKlineRow(row, 1_700_000_060_000)).toEqual({
      openTime: 1_700_000_000_000,
      closeTime: 1_700_000_059_999,
      open: 100,
      high: 102.5,
      low: 99.5,
      close: 101,
      volume: 12.5,
      isClosed: true,
    });
  });

  it('marks the still-forming kline as not closed', () => {
    expect(parseKlineRow(row, 1_700_000_030_000).isClosed).toBe(false);
  });

  it('rejects short rows', () => {
    expect(() => parseKlineRow([1, '2', '3'], 0)).toThrow('kline row must be an array of at least 7 fields');
    expect(() => parseKlineRow({ t: 1 }, 0)).toThrow();
  });

  it('rejects inconsistent prices', () => {
    const inverted = [...row];
    inverted[2] = '98';
    expect(() => parseKlineRow(inverted, 0)).toThrow(DomainValidationError);
  });
});
