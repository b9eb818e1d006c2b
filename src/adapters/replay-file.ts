import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../core/reward-errors.js';
import { createEventRecord, type EventRecord } from '../types/event.js';

/**
 * Recorded episode file.
 *
 * Only the outer shape is checked here; numeric rules (ordering,
 * non-negative timestamps) belong to the validator and are enforced per tick.
 */
const replayFileSchema = z.object({
  ticks: z.array(
    z.object({
      events: z.array(z.object({ timestamp: z.number(), value: z.number() })),
    })
  ),
});

export type ReplayFile = z.infer<typeof replayFileSchema>;

/**
 * Parse replay JSON into one event batch per tick.
 */
export function parseReplay(json: unknown, origin = 'replay'): EventRecord[][] {
  const result = replayFileSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(
      `Invalid replay file ${origin}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data.ticks.map((tick) =>
    tick.events.map((event) => createEventRecord(event.timestamp, event.value))
  );
}

/**
 * Read and parse a replay file from disk.
 */
export async function loadReplayFile(filePath: string): Promise<EventRecord[][]> {
  const content = await readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse replay file ${filePath}: ${message}`);
  }
  return parseReplay(json, filePath);
}
