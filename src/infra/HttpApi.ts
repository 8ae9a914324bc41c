import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { GapEngine } from '../core/GapEngine';
import type { StatsFilter } from '../core/StatsAggregator';
import type { GapState } from '../domain/types';
import { isTimeframe } from '../domain/timeframes';

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

const GAP_STATES: readonly GapState[] = ['active', 'partially_mitigated', 'fully_mitigated'];

function single(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function timestamp(raw: string): number | null {
  if (/^\d+$/.test(raw)) return Number(raw);
  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * `direction`, `from` and `to` query parameters. Times are epoch ms or ISO dates.
 */
export function parseStatsFilter(query: Record<string, unknown>): Parsed<StatsFilter> {
  const filter: StatsFilter = {};

  const direction = single(query.direction);
  if (direction !== undefined) {
    if (direction !== 'bullish' && direction !== 'bearish') {
      return { ok: false, error: `direction must be "bullish" or "bearish", got "${direction}"` };
    }
    filter.direction = direction;
  }

  for (const bound of ['from', 'to'] as const) {
    const raw = single(query[bound]);
    if (raw === undefined) continue;
    const ts = timestamp(raw);
    if (ts === null) return { ok: false, error: `${bound} is not a timestamp: "${raw}"` };
    filter[bound] = ts;
  }

  if (filter.from !== undefined && filter.to !== undefined && filter.from > filter.to) {
    return { ok: false, error: 'from must not be later than to' };
  }
  return { ok: true, value: filter };
}

export function parseStateFilter(raw: unknown): Parsed<GapState | undefined> {
  const state = single(raw);
  if (state === undefined) return { ok: true, value: undefined };
  const match = GAP_STATES.find(s => s === state);
  return match ? { ok: true, value: match } : { ok: false, error: `unknown state "${state}"` };
}

type StreamParams = { symbol: string; timeframe: string };

export function createApi(engine: GapEngine): Express {
  const app = express();

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [streams, gaps] = await Promise.all([engine.listStreams(), engine.getAllGaps()]);
      res.json({
        status: 'ok',
        streams: streams.length,
        gaps: gaps.length,
        activeGaps: gaps.filter(g => g.state !== 'fully_mitigated').length,
      });
    } catch (err) {
      next(err);
    }
  });

  app.get('/gaps/:symbol/:timeframe', async (req: Request<StreamParams>, res: Response, next: NextFunction) => {
    const { timeframe } = req.params;
    if (!isTimeframe(timeframe)) {
      res.status(400).json({ error: `unsupported timeframe "${timeframe}"` });
      return;
    }
    const state = parseStateFilter(req.query.state);
    if (!state.ok) {
      res.status(400).json({ error: state.error });
      return;
    }
    try {
      const gaps = await engine.getSnapshot(req.params.symbol.toUpperCase(), timeframe);
      res.json(state.value ? gaps.filter(g => g.state === state.value) : gaps);
    } catch (err) {
      next(err);
    }
  });

  app.get('/stats/:symbol/:timeframe', async (req: Request<StreamParams>, res: Response, next: NextFunction) => {
    const { timeframe } = req.params;
    if (!isTimeframe(timeframe)) {
      res.status(400).json({ error: `unsupported timeframe "${timeframe}"` });
      return;
    }
    const filter = parseStatsFilter(req.query);
    if (!filter.ok) {
      res.status(400).json({ error: filter.error });
      return;
    }
    try {
      res.json(await engine.getStats(req.params.symbol.toUpperCase(), timeframe, filter.value));
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[Api] Request failed:', err);
    res.status(500).json({ error: 'internal error' });
  });

  return app;
}
