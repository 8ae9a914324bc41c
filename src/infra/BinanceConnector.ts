import WebSocket from 'ws';
import type { MarketProvider } from '../domain/types';
import type { AnyMarketEvent, KlineEvent, TradeEvent } from '../domain/events';
import { isTimeframe } from '../domain/timeframes';
import type { Timeframe } from '../domain/timeframes';

const STREAM_BASE = 'wss://fstream.binance.com/stream';
const BATCH = 30;
const RECONNECT_DELAY_MS = 3000;

type Json = Record<string, unknown>;

const isObject = (v: unknown): v is Json => typeof v === 'object' && v !== null && !Array.isArray(v);

function num(v: unknown): number {
  const n = typeof v === 'number' ? v : typeof v === 'string' ? parseFloat(v) : NaN;
  if (!Number.isFinite(n)) throw new Error(`expected a number, got ${String(v)}`);
  return n;
}

function str(v: unknown): string {
  if (typeof v !== 'string') throw new Error(`expected a string, got ${String(v)}`);
  return v;
}

/**
 * Translates a combined-stream frame into a feed event. Frames of other
 * streams yield null; malformed payloads throw.
 */
export function parseStreamMessage(raw: string): AnyMarketEvent | null {
  const msg: unknown = JSON.parse(raw);
  if (!isObject(msg) || !isObject(msg.data) || typeof msg.stream !== 'string') return null;
  const d = msg.data;

  if (msg.stream.includes('@aggTrade')) {
    const e: TradeEvent = {
      type: 'trade',
      symbol: str(d.s),
      ts: num(d.T), // Trade time
      price: num(d.p),
      qty: num(d.q),
    };
    return e;
  }

  if (msg.stream.includes('@kline_')) {
    const k = d.k;
    if (!isObject(k)) throw new Error('kline frame without "k" payload');
    const interval = str(k.i);
    if (!isTimeframe(interval)) throw new Error(`unsupported kline interval ${interval}`);
    const e: KlineEvent = {
      type: 'kline',
      symbol: str(k.s),
      interval,
      ts: num(k.t),
      open: num(k.o),
      high: num(k.h),
      low: num(k.l),
      close: num(k.c),
      volume: num(k.v),
      isClosed: k.x === true,
      closeTs: num(k.T),
    };
    return e;
  }

  return null;
}

export function streamNames(symbols: string[], timeframes: Timeframe[], withTrades: boolean): string[] {
  return symbols.flatMap(s => {
    const sym = s.toLowerCase();
    const names = timeframes.map(tf => `${sym}@kline_${tf}`);
    if (withTrades) names.push(`${sym}@aggTrade`);
    return names;
  });
}

export class BinanceConnector implements MarketProvider {
  private wsList: WebSocket[] = [];
  private eventCallback: ((e: AnyMarketEvent) => void) | null = null;
  private reconnectTimers = new Set<NodeJS.Timeout>();
  private isRunning = false;

  constructor(private readonly withTrades: boolean) {}

  public onEvent(cb: (event: AnyMarketEvent) => void): void {
    this.eventCallback = cb;
  }

  public async connect(symbols: string[], timeframes: Timeframe[]): Promise<void> {
    this.isRunning = true;
    const streams = streamNames(symbols, timeframes, this.withTrades);
    for (let i = 0; i < streams.length; i += BATCH) {
      this.open(streams.slice(i, i + BATCH));
    }
    console.log(`[Binance] Connected ${streams.length} streams for ${symbols.length} symbols`);
  }

  public async disconnect(): Promise<void> {
    this.isRunning = false;
    this.reconnectTimers.forEach(t => clearTimeout(t));
    this.reconnectTimers.clear();
    this.wsList.forEach(ws => ws.terminate());
    this.wsList = [];
    console.log('[Binance] Disconnected');
  }

  private open(batch: string[]) {
    const ws = new WebSocket(`${STREAM_BASE}?streams=${batch.join('/')}`);
    ws.on('message', (data) => this.handleMessage(data.toString()));
    ws.on('error', (err) => console.error('[Binance] Socket error:', err.message));
    ws.on('close', () => {
      this.wsList = this.wsList.filter(w => w !== ws);
      if (!this.isRunning) return;
      console.warn(`[Binance] Socket closed, reconnecting ${batch.length} streams`);
      const timer = setTimeout(() => {
        this.reconnectTimers.delete(timer);
        if (this.isRunning) this.open(batch);
      }, RECONNECT_DELAY_MS);
      this.reconnectTimers.add(timer);
    });
    this.wsList.push(ws);
  }

  private handleMessage(raw: string) {
    if (!this.eventCallback) return;
    let event: AnyMarketEvent | null;
    try {
      event = parseStreamMessage(raw);
    } catch (err) {
      console.warn('[Binance] Dropped malformed frame:', err instanceof Error ? err.message : err);
      return;
    }
    if (event) this.eventCallback(event);
  }
}
