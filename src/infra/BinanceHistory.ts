import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import * as https from 'https';
import PQueue from 'p-queue';
import { createCandle } from '../domain/types';
import type { Candle, Timeframe } from '../domain/types';

const KLINES_API = 'https://fapi.binance.com/fapi/v1/klines';
const MAX_LIMIT = 1500;

export interface HistoryOptions {
  maxReqPerSec: number;
  useRateLimiter: boolean;
}

/**
 * Converts one row of the klines endpoint:
 * [openTime, open, high, low, close, volume, closeTime, ...].
 * A candle whose close time has not passed yet is still forming.
 */
export function parseKlineRow(row: unknown, now: number): Candle {
  if (!Array.isArray(row) || row.length < 7) {
    throw new Error(`kline row must be an array of at least 7 fields, got ${JSON.stringify(row)}`);
  }
  const [openTime, open, high, low, close, volume, closeTime] = row.slice(0, 7).map(v => Number(v));
  return createCandle({
    openTime, closeTime, open, high, low, close, volume,
    isClosed: closeTime < now,
  });
}

export class BinanceHistory {
  private axios: AxiosInstance;
  private queue: PQueue | null = null;

  constructor(options: HistoryOptions) {
    this.axios = axios.create({
      httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 10 }),
      timeout: 10000
    });

    if (options.useRateLimiter) {
      this.queue = new PQueue({ interval: 1000, intervalCap: options.maxReqPerSec });
    }
  }

  /**
   * Latest `limit` candles of a stream, oldest first.
   */
  public async fetchCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const request = () => this.axios.get<unknown>(KLINES_API, {
      params: { symbol, interval: timeframe, limit: Math.min(limit, MAX_LIMIT) }
    });
    const res = this.queue ? await this.queue.add<AxiosResponse<unknown>>(request, { throwOnTimeout: true }) : await request();

    if (!Array.isArray(res.data)) {
      throw new Error(`[History] Unexpected klines payload for ${symbol} ${timeframe}`);
    }
    const now = Date.now();
    const candles = res.data.map(row => parseKlineRow(row, now));
    console.log(`[History] Loaded ${candles.length} candles for ${symbol} ${timeframe}`);
    return candles.sort((a, b) => a.openTime - b.openTime);
  }
}
