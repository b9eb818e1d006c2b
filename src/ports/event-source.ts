/**
 * Event Source Port
 *
 * The environment side of the loop. The core never fetches on its own; the
 * session asks the source for the batch belonging to a tick and treats the
 * call as a boundary call (bounded by a timeout, fallback on failure).
 */

import type { EventRecord, TickContext } from '../types/event.js';

export interface IEventSource {
  /** Source name for logs */
  readonly name: string;

  /**
   * Return the chronological batch of events observed during this tick.
   * An empty array is a valid answer.
   */
  nextBatch(context: TickContext): Promise<readonly EventRecord[]>;
}
