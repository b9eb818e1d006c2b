/**
 * One observed environment signal.
 *
 * Records are frozen once created. A batch is ordered by timestamp ascending;
 * duplicate timestamps and duplicate records are kept as-is.
 */
export interface EventRecord {
  /** Seconds since episode start (>= 0) */
  readonly timestamp: number;
  /** Observed signal value (finite) */
  readonly value: number;
}

/**
 * Create an immutable event record.
 */
export function createEventRecord(timestamp: number, value: number): EventRecord {
  return Object.freeze({ timestamp, value });
}

/**
 * A batch that passed validation.
 *
 * Only the validator constructs these; the aggregator only accepts these.
 * Guarantees: every value finite, timestamps finite, non-negative and
 * non-decreasing. An empty batch is flagged through `isEmpty`.
 */
export class ValidatedEventSequence {
  readonly records: readonly EventRecord[];

  constructor(records: readonly EventRecord[]) {
    this.records = Object.freeze([...records]);
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  get length(): number {
    return this.records.length;
  }

  [Symbol.iterator](): Iterator<EventRecord> {
    return this.records[Symbol.iterator]();
  }
}

/**
 * Read-only snapshot handed to collaborators for one tick.
 */
export interface TickContext {
  /** Evaluation session the tick belongs to */
  readonly sessionId: string;
  /** 1-based tick index within the session */
  readonly tick: number;
}
