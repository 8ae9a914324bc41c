import type { StreamKey } from './types';

export type ValidatedEntity = 'candle' | 'observation' | 'gap';

export class DomainValidationError extends Error {
  constructor(public readonly entity: ValidatedEntity, message: string) {
    super(`Invalid ${entity}: ${message}`);
    this.name = 'DomainValidationError';
  }
}

export class EngineStoppedError extends Error {
  constructor() {
    super('GapEngine is shut down and no longer accepts input');
    this.name = 'EngineStoppedError';
  }
}

// Non-fatal conditions. Returned from engine calls and passed to the onIssue hook.
export interface OutOfOrderInputIssue {
  kind: 'OutOfOrderInput';
  stream: StreamKey;
  input: 'candle' | 'candle-observation' | 'tick-observation';
  receivedAt: number;
  latestAt: number;
}

export interface DuplicateGapIssue {
  kind: 'DuplicateGap';
  gapId: string;
}

export interface InsufficientDataIssue {
  kind: 'InsufficientData';
  stream: StreamKey;
  closedCandles: number;
}

export interface UnknownGapIssue {
  kind: 'UnknownGap';
  gapId: string;
}

export type EngineIssue =
  | OutOfOrderInputIssue
  | DuplicateGapIssue
  | InsufficientDataIssue
  | UnknownGapIssue;

export function describeIssue(issue: EngineIssue): string {
  switch (issue.kind) {
    case 'OutOfOrderInput':
      return `out-of-order ${issue.input} on ${issue.stream.instrument}/${issue.stream.timeframe}: ` +
        `${issue.receivedAt} < ${issue.latestAt}`;
    case 'DuplicateGap':
      return `duplicate gap ${issue.gapId}`;
    case 'InsufficientData':
      return `insufficient data on ${issue.stream.instrument}/${issue.stream.timeframe}: ` +
        `${issue.closedCandles} closed candle(s)`;
    case 'UnknownGap':
      return `unknown gap ${issue.gapId}`;
  }
}
