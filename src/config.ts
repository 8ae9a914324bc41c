import 'dotenv/config';
import { parseTimeframe } from './domain/timeframes';
import type { Timeframe } from './domain/timeframes';

const list = (raw: string | undefined, fallback: string) =>
  (raw || fallback).split(',').map(s => s.trim()).filter(Boolean);

function int(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

const flag = (raw: string | undefined, fallback: boolean) =>
  raw === undefined || raw === '' ? fallback : raw.toLowerCase() === 'true';

export interface AppConfig {
  PORT: number;
  FEED: {
    SYMBOLS: string[];
    TIMEFRAMES: Timeframe[];
    BACKFILL_LIMIT: number;
    MAX_REQ_SEC: number;
    USE_RATE_LIMITER: boolean;
    TRACK_TICKS: boolean;
  };
  ENGINE: {
    WINDOW_CAPACITY: number;
    RETENTION_HOURS: number;
  };
  STATS: {
    INTERVAL_MS: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const symbols = list(env.SYMBOLS, 'BTCUSDT').map(s => s.toUpperCase());
  const timeframes = [...new Set(list(env.TIMEFRAMES, '15m').map(parseTimeframe))];

  return {
    PORT: int(env, 'PORT', 3000, 1),
    FEED: {
      SYMBOLS: symbols,
      TIMEFRAMES: timeframes,
      BACKFILL_LIMIT: int(env, 'BACKFILL_LIMIT', 200),
      MAX_REQ_SEC: int(env, 'MAX_REQ_SEC', 10, 1),
      USE_RATE_LIMITER: flag(env.USE_RATE_LIMITER, true),
      TRACK_TICKS: flag(env.TRACK_TICKS, true),
    },
    ENGINE: {
      WINDOW_CAPACITY: int(env, 'WINDOW_CAPACITY', 200, 3),
      RETENTION_HOURS: int(env, 'RETENTION_HOURS', 0),
    },
    STATS: {
      INTERVAL_MS: int(env, 'STATS_INTERVAL_MS', 5000, 100),
    },
  };
}

export const CONFIG = loadConfig(process.env);
