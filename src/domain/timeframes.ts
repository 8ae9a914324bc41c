export const TIMEFRAMES = ['1m', '3m', '5m', '15m', '30m', '1h', '4h', '1d'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export function isTimeframe(value: string): value is Timeframe {
  return (TIMEFRAMES as readonly string[]).includes(value);
}

/**
 * Accepts exchange notation ('15m', '1h') and the letter-first aliases
 * ('M15', 'H1', 'D1').
 */
export function parseTimeframe(raw: string): Timeframe {
  const value = raw.trim();
  if (isTimeframe(value)) return value;

  const alias = /^([MHD])(\d+)$/i.exec(value);
  if (alias) {
    const candidate = `${Number(alias[2])}${alias[1].toLowerCase()}`;
    if (isTimeframe(candidate)) return candidate;
  }

  throw new Error(`Unsupported timeframe: "${raw}"`);
}
