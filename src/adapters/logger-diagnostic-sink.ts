import type { IDiagnosticSink } from '../ports/diagnostics.js';
import type { Logger } from '../types/logger.js';
import type { RewardDiagnostic } from '../types/reward.js';

/**
 * Default diagnostic sink: writes each record through the logger.
 * Clean records go to debug, records carrying warnings go to warn.
 */
export class LoggerDiagnosticSink implements IDiagnosticSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'diagnostics' });
  }

  record(diagnostic: RewardDiagnostic): void {
    if (diagnostic.warnings.length === 0) {
      this.logger.debug({ diagnostic }, 'Reward diagnostic');
      return;
    }
    const codes = diagnostic.warnings.map((w) => w.code).join(', ');
    this.logger.warn({ diagnostic }, `Reward diagnostic with warnings: ${codes}`);
  }
}
