/**
 * Replay runner
 *
 * Scores a recorded episode tick by tick and logs a summary.
 *
 * Usage: node dist/src/replay.js [replay-file]
 */

import 'dotenv/config';

import { LoggerDiagnosticSink } from './adapters/logger-diagnostic-sink.js';
import { loadReplayFile } from './adapters/replay-file.js';
import { ReplayEventSource } from './adapters/replay-source.js';
import { createConfigLoader } from './config/index.js';
import { createLogger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { isSchemaViolation } from './core/reward-errors.js';
import { EvaluationSession } from './reward/session.js';

const DEFAULT_REPLAY_FILE = 'data/replay/sample.json';

async function main(): Promise<void> {
  const replayFile = process.argv[2] ?? DEFAULT_REPLAY_FILE;
  const configLoader = createConfigLoader(process.env['CONFIG_PATH']);
  const config = await configLoader.load();

  const logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
  });
  for (const warning of configLoader.getWarnings()) {
    logger.warn(warning);
  }
  const metrics = new InMemoryMetrics();

  const batches = await loadReplayFile(replayFile);
  const session = new EvaluationSession(
    config.reward,
    {
      logger,
      source: new ReplayEventSource(batches, replayFile),
      diagnostics: new LoggerDiagnosticSink(logger),
      metrics,
    },
    { boundaryTimeoutMs: config.session.boundaryTimeoutMs }
  );

  logger.info(
    { file: replayFile, ticks: batches.length, fingerprint: session.configFingerprint },
    'Replay starting'
  );

  let violations = 0;
  for (let i = 0; i < batches.length; i++) {
    try {
      const result = await session.runTick();
      logger.info(
        { tick: result.tick, value: result.reward.value, raw: result.reward.raw },
        'Tick scored'
      );
    } catch (error) {
      if (!isSchemaViolation(error)) {
        throw error;
      }
      violations++;
      // Already logged by the orchestrator; the episode continues
    }
  }

  const finalState = await session.teardown();
  logger.info(
    { ticks: batches.length, violations, finalState, metrics: metrics.snapshot() },
    'Replay finished'
  );
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Replay failed:', error);
  process.exitCode = 1;
});
