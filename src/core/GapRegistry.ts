import { streamId } from '../domain/types';
import type { Gap, GapState, StreamKey } from '../domain/types';
import type { DuplicateGapIssue, UnknownGapIssue } from '../domain/errors';
import { applyVerdict } from './MitigationEvaluator';
import type { MitigationVerdict } from './MitigationEvaluator';

export type InsertResult =
  | { inserted: true; gap: Gap }
  | { inserted: false; issue: DuplicateGapIssue };

export type MitigationResult =
  | { status: 'updated'; gap: Gap; previous: GapState }
  | { status: 'unchanged'; gap: Gap }
  | { status: 'unknown'; issue: UnknownGapIssue };

export interface StreamGaps {
  stream: StreamKey;
  gaps: Gap[];
}

interface StreamBook {
  stream: StreamKey;
  // Map keeps insertion order, and set() on an existing id keeps its position
  gaps: Map<string, Gap>;
}

const isOpen = (gap: Gap) => gap.state !== 'fully_mitigated';

/**
 * Owner of every gap, keyed by (instrument, timeframe).
 *
 * Methods are synchronous and run to completion, so no caller can observe a
 * gap mid-transition. Records are frozen and replaced on each transition;
 * reads hand out fresh arrays.
 */
export class GapRegistry {
  private books = new Map<string, StreamBook>();
  private owners = new Map<string, string>(); // gapId -> stream id

  get size(): number {
    return this.owners.size;
  }

  public insert(gap: Gap): InsertResult {
    if (this.owners.has(gap.id)) {
      return { inserted: false, issue: { kind: 'DuplicateGap', gapId: gap.id } };
    }

    const stream: StreamKey = { instrument: gap.instrument, timeframe: gap.timeframe };
    const key = streamId(stream);
    let book = this.books.get(key);
    if (!book) {
      book = { stream, gaps: new Map() };
      this.books.set(key, book);
    }

    const stored: Gap = gap.state === 'active' && gap.mitigationStartedAt === null && gap.mitigationCompletedAt === null
      ? gap
      : Object.freeze({ ...gap, state: 'active' as const, mitigationStartedAt: null, mitigationCompletedAt: null });

    book.gaps.set(stored.id, stored);
    this.owners.set(stored.id, key);
    return { inserted: true, gap: stored };
  }

  public applyMitigation(gapId: string, verdict: MitigationVerdict): MitigationResult {
    const book = this.bookOf(gapId);
    const current = book?.gaps.get(gapId);
    if (!book || !current) {
      return { status: 'unknown', issue: { kind: 'UnknownGap', gapId } };
    }

    const next = applyVerdict(current, verdict);
    if (next === current) return { status: 'unchanged', gap: current };

    book.gaps.set(gapId, next);
    return { status: 'updated', gap: next, previous: current.state };
  }

  public get(gapId: string): Gap | undefined {
    return this.bookOf(gapId)?.gaps.get(gapId);
  }

  public snapshot(stream: StreamKey): Gap[] {
    const book = this.books.get(streamId(stream));
    return book ? [...book.gaps.values()] : [];
  }

  public snapshotAll(): Gap[] {
    const all: Gap[] = [];
    for (const book of this.books.values()) all.push(...book.gaps.values());
    return all;
  }

  public activeGapsFor(stream: StreamKey): Gap[] {
    const book = this.books.get(streamId(stream));
    return book ? [...book.gaps.values()].filter(isOpen) : [];
  }

  public activeGaps(): StreamGaps[] {
    return [...this.books.values()].map(book => ({
      stream: book.stream,
      gaps: [...book.gaps.values()].filter(isOpen),
    }));
  }

  public streams(): StreamKey[] {
    return [...this.books.values()].map(book => book.stream);
  }

  /**
   * Drops gaps formed before the cutoff. The retention horizon belongs to the caller.
   */
  public pruneBefore(cutoff: number): number {
    let removed = 0;
    for (const [key, book] of this.books) {
      for (const [id, gap] of book.gaps) {
        if (gap.formedAt < cutoff) {
          book.gaps.delete(id);
          this.owners.delete(id);
          removed++;
        }
      }
      if (book.gaps.size === 0) this.books.delete(key);
    }
    return removed;
  }

  private bookOf(gapId: string): StreamBook | undefined {
    const key = this.owners.get(gapId);
    return key === undefined ? undefined : this.books.get(key);
  }
}
