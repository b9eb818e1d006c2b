import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadReplayFile, parseReplay } from '../../../src/adapters/replay-file.js';
import { ReplayEventSource } from '../../../src/adapters/replay-source.js';
import { LoggerDiagnosticSink } from '../../../src/adapters/logger-diagnostic-sink.js';
import { ConfigError } from '../../../src/core/reward-errors.js';
import type { RewardDiagnostic } from '../../../src/types/reward.js';
import { createEvents, createMockLogger, loggedMessages } from '../../helpers/factories.js';

describe('parseReplay', () => {
  it('turns each tick into a frozen batch', () => {
    const batches = parseReplay({
      ticks: [{ events: [{ timestamp: 0, value: 0.5 }] }, { events: [] }],
    });

    expect(batches).toEqual([[{ timestamp: 0, value: 0.5 }], []]);
    expect(Object.isFrozen(batches[0]?.[0])).toBe(true);
  });

  it('leaves ordering checks to the validator', () => {
    const batches = parseReplay({
      ticks: [{ events: [{ timestamp: 2, value: 1 }, { timestamp: 1, value: 1 }] }],
    });
    expect(batches[0]).toHaveLength(2);
  });

  it('rejects the wrong shape with the offending path', () => {
    expect(() => parseReplay({ ticks: [{ events: [{ timestamp: 'soon', value: 1 }] }] }, 'bad.json')).toThrow(
      'Invalid replay file bad.json: ticks.0.events.0.timestamp: Expected number, received string'
    );
  });
});

describe('loadReplayFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reward-replay-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads batches from disk', async () => {
    const filePath = join(dir, 'episode.json');
    await writeFile(
      filePath,
      JSON.stringify({ ticks: [{ events: [{ timestamp: 0.5, value: -0.25 }] }] }),
      'utf-8'
    );

    await expect(loadReplayFile(filePath)).resolves.toEqual([[{ timestamp: 0.5, value: -0.25 }]]);
  });

  it('reports malformed JSON as a config error', async () => {
    const filePath = join(dir, 'broken.json');
    await writeFile(filePath, '{"ticks": [', 'utf-8');

    await expect(loadReplayFile(filePath)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('ReplayEventSource', () => {
  it('serves batch N-1 on tick N and empty batches past the end', async () => {
    const first = createEvents([0, 0.1]);
    const second = createEvents([0, 0.2], [1, 0.3]);
    const source = new ReplayEventSource([first, second], 'episode-1');

    expect(source.name).toBe('episode-1');
    expect(source.length).toBe(2);
    await expect(source.nextBatch({ sessionId: 's', tick: 1 })).resolves.toBe(first);
    await expect(source.nextBatch({ sessionId: 's', tick: 2 })).resolves.toBe(second);
    await expect(source.nextBatch({ sessionId: 's', tick: 3 })).resolves.toEqual([]);
  });
});

describe('LoggerDiagnosticSink', () => {
  const diagnostic: RewardDiagnostic = {
    raw: 0.4,
    normalizedValue: 0.38,
    normalized: true,
    runningMean: 0.2,
    runningVariance: 0.05,
    count: 12,
    configFingerprint: 'abc123def456',
    warnings: [],
    phases: ['validating', 'aggregating', 'normalizing', 'completed'],
    durationMs: 0.3,
  };

  it('logs clean records at debug', () => {
    const logger = createMockLogger();
    new LoggerDiagnosticSink(logger).record(diagnostic);

    expect(logger.calls.debug).toEqual([[{ diagnostic }, 'Reward diagnostic']]);
    expect(logger.calls.warn).toEqual([]);
  });

  it('logs records with warnings at warn', () => {
    const logger = createMockLogger();
    const withWarnings: RewardDiagnostic = {
      ...diagnostic,
      warnings: [
        { code: 'SOURCE_UNAVAILABLE', message: 'source down' },
        { code: 'EMPTY_INPUT', message: 'empty' },
      ],
    };

    new LoggerDiagnosticSink(logger).record(withWarnings);

    expect(loggedMessages(logger, 'warn')).toEqual([
      'Reward diagnostic with warnings: SOURCE_UNAVAILABLE, EMPTY_INPUT',
    ]);
  });
});
