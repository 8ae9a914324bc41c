import type { Timeframe } from './timeframes';

// Unified feed events handed to the engine wiring
export type MarketEventType = 'trade' | 'kline';

export interface BaseEvent {
  type: MarketEventType;
  symbol: string;
  ts: number; // Unified timestamp (ms)
}

export interface TradeEvent extends BaseEvent {
  type: 'trade';
  price: number;
  qty: number;
}

export interface KlineEvent extends BaseEvent {
  type: 'kline';
  interval: Timeframe;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  isClosed: boolean;
  closeTs: number;
}

export type AnyMarketEvent = TradeEvent | KlineEvent;
