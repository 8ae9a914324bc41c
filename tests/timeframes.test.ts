import { describe, it, expect } from 'vitest';
import { isTimeframe, parseTimeframe } from '../src/domain/timeframes';

describe('timeframes', () => {
  it('accepts exchange notation', () => {
    expect(parseTimeframe('15m')).toBe('15m');
    expect(parseTimeframe(' 4h ')).toBe('4h');
  });

  it('accepts letter-first aliases in any case', () => {
    expect(parseTimeframe('M15')).toBe('15m');
    expect(parseTimeframe('h1')).toBe('1h');
    expect(parseTimeframe('D1')).toBe('1d');
  });

  it('rejects unsupported intervals', () => {
    expect(() => parseTimeframe('M2')).toThrow('Unsupported timeframe: "M2"');
    expect(() => parseTimeframe('1w')).toThrow();
  });

  it('guards strings', () => {
    expect(isTimeframe('30m')).toBe(true);
    expect(isTimeframe('30')).toBe(false);
  });
});
