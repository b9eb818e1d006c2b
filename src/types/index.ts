/**
 * Core type definitions for the reward core.
 */

export type * from './reward.js';
export type * from './metrics.js';
export type * from './logger.js';
export type { EventRecord, TickContext } from './event.js';

export { ValidatedEventSequence, createEventRecord } from './event.js';
