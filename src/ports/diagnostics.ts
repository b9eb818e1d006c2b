/**
 * Diagnostic Sink Port
 *
 * Receives one structured record per reward computation. Delivery is
 * best-effort: the orchestrator never waits for it and never fails a call
 * because of it.
 */

import type { RewardDiagnostic } from '../types/reward.js';

export interface IDiagnosticSink {
  record(diagnostic: RewardDiagnostic): void | Promise<void>;
}
