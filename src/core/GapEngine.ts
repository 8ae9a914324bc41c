import PQueue from 'p-queue';
import { candleObservation, createGap, streamId } from '../domain/types';
import type { Candle, Gap, GapState, ObservationSource, PriceObservation, StreamKey, Timeframe } from '../domain/types';
import { EngineStoppedError, describeIssue } from '../domain/errors';
import type { EngineIssue } from '../domain/errors';
import { CandleWindow, MIN_WINDOW_CAPACITY } from './CandleWindow';
import { detectGap } from './GapDetector';
import { GapRegistry } from './GapRegistry';
import type { StreamGaps } from './GapRegistry';
import { evaluateMitigation } from './MitigationEvaluator';
import { computeStats } from './StatsAggregator';
import type { StatsFilter, StatsResult } from './StatsAggregator';

interface StreamState {
  stream: StreamKey;
  window: CandleWindow;
  // Latest accepted observation time, per source
  lastObservedAt: Record<ObservationSource, number>;
}

export interface GapEngineHooks {
  onGapFormed?: (gap: Gap) => void;
  onGapUpdated?: (gap: Gap, previous: GapState) => void;
  onIssue?: (issue: EngineIssue) => void;
}

export interface GapEngineOptions {
  windowCapacity: number;
  hooks?: GapEngineHooks;
}

export interface CandleIngestResult {
  status: 'appended' | 'replaced' | 'unchanged' | 'rejected';
  formed: Gap | null;
  updated: Gap[];
  issues: EngineIssue[];
}

export interface ObservationIngestResult {
  status: 'evaluated' | 'rejected';
  updated: Gap[];
  issues: EngineIssue[];
}

function logIssue(issue: EngineIssue) {
  // Expected while a stream warms up
  if (issue.kind === 'InsufficientData') return;
  console.warn(`[GapEngine] ${describeIssue(issue)}`);
}

/**
 * Entry point of the gap lifecycle core.
 *
 * Every call, reads included, goes through one mailbox queue with
 * concurrency 1: operations run whole and in arrival order, so a stream's
 * gaps are inserted in candle order and observations are applied in the
 * order they were received.
 */
export class GapEngine {
  private states = new Map<string, StreamState>();
  private readonly registry = new GapRegistry();
  private readonly mailbox = new PQueue({ concurrency: 1 });
  private readonly hooks: GapEngineHooks;
  private accepting = true;

  constructor(private readonly options: GapEngineOptions) {
    if (!Number.isInteger(options.windowCapacity) || options.windowCapacity < MIN_WINDOW_CAPACITY) {
      throw new RangeError(`windowCapacity must be an integer >= ${MIN_WINDOW_CAPACITY}, got ${options.windowCapacity}`);
    }
    this.hooks = options.hooks ?? {};
  }

  public ingestCandle(instrument: string, timeframe: Timeframe, candle: Candle): Promise<CandleIngestResult> {
    return this.submit(() => this.handleCandle(this.stateOf({ instrument, timeframe }), candle));
  }

  public ingestPriceObservation(
    instrument: string,
    timeframe: Timeframe,
    observation: PriceObservation
  ): Promise<ObservationIngestResult> {
    return this.submit(() => this.handleObservation(this.stateOf({ instrument, timeframe }), observation));
  }

  public getSnapshot(instrument: string, timeframe: Timeframe): Promise<Gap[]> {
    return this.read(() => this.registry.snapshot({ instrument, timeframe }));
  }

  public getStats(instrument: string, timeframe: Timeframe, filter: StatsFilter = {}): Promise<StatsResult> {
    return this.read(() => computeStats(this.registry.snapshot({ instrument, timeframe }), filter));
  }

  public getActiveGaps(): Promise<StreamGaps[]> {
    return this.read(() => this.registry.activeGaps());
  }

  public getAllGaps(): Promise<Gap[]> {
    return this.read(() => this.registry.snapshotAll());
  }

  public listStreams(): Promise<StreamKey[]> {
    return this.read(() => [...this.states.values()].map(s => s.stream));
  }

  public prune(cutoff: number): Promise<number> {
    return this.submit(() => this.registry.pruneBefore(cutoff));
  }

  /**
   * Stops accepting input and resolves once queued operations have finished.
   */
  public async shutdown(): Promise<void> {
    this.accepting = false;
    await this.mailbox.onIdle();
  }

  private submit<T>(task: () => T): Promise<T> {
    if (!this.accepting) return Promise.reject(new EngineStoppedError());
    return this.mailbox.add<T>(task, { throwOnTimeout: true });
  }

  private read<T>(task: () => T): Promise<T> {
    return this.mailbox.add<T>(task, { throwOnTimeout: true });
  }

  private handleCandle(state: StreamState, candle: Candle): CandleIngestResult {
    const outcome = state.window.append(candle);
    const result: CandleIngestResult = { status: outcome.status, formed: null, updated: [], issues: [] };

    if (outcome.status === 'rejected') {
      this.report(result.issues, outcome.issue);
      return result;
    }
    if (!outcome.becameClosed) return result;

    // Existing gaps see the closed range before the triple ending in it is checked
    const observed = this.handleObservation(state, candleObservation(candle));
    result.updated = observed.updated;
    result.issues.push(...observed.issues);

    const triple = state.window.latestTriple();
    if (!triple.ok) {
      this.report(result.issues, triple.issue);
      return result;
    }

    const candidate = detectGap(triple.triple);
    if (!candidate) return result;

    const inserted = this.registry.insert(createGap(state.stream, candidate));
    if (!inserted.inserted) {
      this.report(result.issues, inserted.issue);
      return result;
    }

    const formed = inserted.gap;
    result.formed = formed;
    this.notify('onGapFormed', () => this.hooks.onGapFormed?.(formed));
    return result;
  }

  private handleObservation(state: StreamState, observation: PriceObservation): ObservationIngestResult {
    const result: ObservationIngestResult = { status: 'evaluated', updated: [], issues: [] };

    const latestAt = state.lastObservedAt[observation.source];
    if (observation.time < latestAt) {
      result.status = 'rejected';
      this.report(result.issues, {
        kind: 'OutOfOrderInput',
        stream: state.stream,
        input: observation.source === 'candle' ? 'candle-observation' : 'tick-observation',
        receivedAt: observation.time,
        latestAt,
      });
      return result;
    }
    state.lastObservedAt[observation.source] = observation.time;

    for (const gap of this.registry.activeGapsFor(state.stream)) {
      const verdict = evaluateMitigation(gap, observation);
      if (verdict.kind === 'none') continue;

      const applied = this.registry.applyMitigation(gap.id, verdict);
      if (applied.status === 'unknown') {
        this.report(result.issues, applied.issue);
      } else if (applied.status === 'updated') {
        const { gap: updated, previous } = applied;
        result.updated.push(updated);
        this.notify('onGapUpdated', () => this.hooks.onGapUpdated?.(updated, previous));
      }
    }

    return result;
  }

  // A failing listener must not abort the rest of the mailbox task
  private notify(hook: keyof GapEngineHooks, call: () => void) {
    try {
      call();
    } catch (err) {
      console.error(`[GapEngine] ${hook} hook failed:`, err);
    }
  }

  private report(sink: EngineIssue[], issue: EngineIssue) {
    sink.push(issue);
    this.notify('onIssue', () => (this.hooks.onIssue ?? logIssue)(issue));
  }

  private stateOf(stream: StreamKey): StreamState {
    const key = streamId(stream);
    let state = this.states.get(key);
    if (!state) {
      state = this.createState(stream);
      this.states.set(key, state);
    }
    return state;
  }

  private createState(stream: StreamKey): StreamState {
    return {
      stream,
      window: new CandleWindow(stream, this.options.windowCapacity),
      lastObservedAt: { candle: -Infinity, tick: -Infinity },
    };
  }
}
