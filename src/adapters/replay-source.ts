/**
 * ReplayEventSource - serves pre-recorded batches, one per tick.
 *
 * Tick N receives batch N-1; ticks past the end receive an empty batch.
 */

import type { IEventSource } from '../ports/event-source.js';
import type { EventRecord, TickContext } from '../types/event.js';

export class ReplayEventSource implements IEventSource {
  readonly name: string;
  private readonly batches: readonly (readonly EventRecord[])[];

  constructor(batches: readonly (readonly EventRecord[])[], name = 'replay') {
    this.batches = batches;
    this.name = name;
  }

  get length(): number {
    return this.batches.length;
  }

  nextBatch(context: TickContext): Promise<readonly EventRecord[]> {
    return Promise.resolve(this.batches[context.tick - 1] ?? []);
  }
}
