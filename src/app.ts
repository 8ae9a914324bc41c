import { CONFIG } from './config';
import { GapEngine } from './core/GapEngine';
import { summarizeByDirection } from './core/StatsAggregator';
import { createCandle, tickObservation } from './domain/types';
import type { AnyMarketEvent } from './domain/events';
import { BinanceConnector } from './infra/BinanceConnector';
import { BinanceHistory } from './infra/BinanceHistory';
import { StreamBroadcaster } from './infra/StreamBroadcaster';
import { createApi } from './infra/HttpApi';
import http from 'http';

const HOUR_MS = 3600_000;

async function main() {
  const engine = new GapEngine({
    windowCapacity: CONFIG.ENGINE.WINDOW_CAPACITY,
    hooks: {
      onGapFormed: (gap) => streamer.broadcastGap('gap:formed', gap),
      onGapUpdated: (gap) => streamer.broadcastGap('gap:updated', gap),
    },
  });

  // 0. HTTP + Socket.IO
  const app = createApi(engine);
  const server = http.createServer(app);
  const streamer = new StreamBroadcaster(server);

  const { SYMBOLS, TIMEFRAMES } = CONFIG.FEED;

  // 1. Backfill history so the windows and registry start warm
  if (CONFIG.FEED.BACKFILL_LIMIT > 0) {
    const history = new BinanceHistory({
      maxReqPerSec: CONFIG.FEED.MAX_REQ_SEC,
      useRateLimiter: CONFIG.FEED.USE_RATE_LIMITER,
    });
    for (const symbol of SYMBOLS) {
      for (const tf of TIMEFRAMES) {
        try {
          const candles = await history.fetchCandles(symbol, tf, CONFIG.FEED.BACKFILL_LIMIT);
          for (const candle of candles) await engine.ingestCandle(symbol, tf, candle);
        } catch (err) {
          console.error(`[App] Backfill failed for ${symbol} ${tf}:`, err);
        }
      }
    }
  }

  // 2. Live feed -> engine
  const onFailure = (err: unknown) => console.error('[App] Ingest failed:', err);
  const handleEvent = (event: AnyMarketEvent) => {
    switch (event.type) {
      case 'kline': {
        const candle = createCandle({
          openTime: event.ts, closeTime: event.closeTs,
          open: event.open, high: event.high, low: event.low, close: event.close,
          volume: event.volume, isClosed: event.isClosed,
        });
        engine.ingestCandle(event.symbol, event.interval, candle).catch(onFailure);
        break;
      }
      case 'trade': {
        const tick = tickObservation(event.ts, event.price);
        for (const tf of TIMEFRAMES) {
          engine.ingestPriceObservation(event.symbol, tf, tick).catch(onFailure);
        }
        break;
      }
    }
  };

  const connector = new BinanceConnector(CONFIG.FEED.TRACK_TICKS);
  connector.onEvent((event) => {
    try {
      handleEvent(event);
    } catch (err) {
      onFailure(err);
    }
  });
  await connector.connect(SYMBOLS, TIMEFRAMES);

  // 3. Periodic stats + retention
  const statsTimer = setInterval(() => {
    engine.listStreams()
      .then(streams => Promise.all(streams.map(async stream => {
        const gaps = await engine.getSnapshot(stream.instrument, stream.timeframe);
        streamer.broadcastStats(stream, summarizeByDirection(gaps));
      })))
      .catch(err => console.error('[App] Stats broadcast failed:', err));
  }, CONFIG.STATS.INTERVAL_MS);

  const retentionTimer = CONFIG.ENGINE.RETENTION_HOURS > 0
    ? setInterval(() => {
      engine.prune(Date.now() - CONFIG.ENGINE.RETENTION_HOURS * HOUR_MS)
        .then(n => { if (n > 0) console.log(`[App] Pruned ${n} gaps`); })
        .catch(err => console.error('[App] Prune failed:', err));
    }, 60000)
    : null;

  server.listen(CONFIG.PORT, () =>
    console.log(`[App] FVG monitor on ${CONFIG.PORT}: ${SYMBOLS.join(',')} x ${TIMEFRAMES.join(',')}`));

  // Graceful Shutdown
  const shutdown = async () => {
    console.log('[App] Stopping...');
    clearInterval(statsTimer);
    if (retentionTimer) clearInterval(retentionTimer);
    await connector.disconnect();
    await engine.shutdown();
    streamer.shutdown();
    process.exit(0);
  };
  process.on('SIGINT', () => { shutdown().catch(onFailure); });
  process.on('SIGTERM', () => { shutdown().catch(onFailure); });
}

main().catch((err) => {
  console.error('[App] Fatal:', err);
  process.exit(1);
});
