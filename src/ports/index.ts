/**
 * Ports - boundaries between the reward core and its collaborators.
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │ IEventSource     - inbound event batches, one per tick         │
 * │ IRewardConsumer  - outbound rewards (evaluator / trainer)      │
 * │ IDiagnosticSink  - outbound diagnostic records (logging)       │
 * │ Logger           - structured logging (pino, no-op)            │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { IEventSource } from './event-source.js';
export type { IRewardConsumer } from './evaluator.js';
export type { IDiagnosticSink } from './diagnostics.js';
export { createNoOpLogger } from './logger.js';
