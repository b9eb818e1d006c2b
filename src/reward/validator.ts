/**
 * Event batch validation.
 *
 * Checks shape with zod, then ordering. Records come back stripped of unknown
 * properties and frozen. Pure: no I/O, no mutation of the input.
 */

import { z } from 'zod';
import type { ZodIssue } from 'zod';
import { SchemaViolationError } from '../core/reward-errors.js';
import type { SchemaViolationReason } from '../core/reward-errors.js';
import { ValidatedEventSequence, createEventRecord } from '../types/event.js';
import type { EventRecord } from '../types/event.js';

const eventRecordSchema = z.object({
  timestamp: z.number().finite().nonnegative(),
  value: z.number().finite(),
});

const eventBatchSchema = z.array(eventRecordSchema).superRefine((events, ctx) => {
  for (let i = 1; i < events.length; i++) {
    const previous = events[i - 1];
    const current = events[i];
    if (previous && current && current.timestamp < previous.timestamp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'timestamp'],
        message: `timestamp ${String(current.timestamp)} is before previous ${String(previous.timestamp)}`,
        params: { reason: 'out_of_order' },
      });
      // First violation is enough, the call is rejected anyway
      return;
    }
  }
});

/**
 * Validate an incoming batch.
 *
 * @throws SchemaViolationError on the first malformed record
 */
export function validateEvents(events: readonly EventRecord[]): ValidatedEventSequence {
  const result = eventBatchSchema.safeParse(events);
  if (!result.success) {
    throw toSchemaViolation(result.error.issues);
  }
  return new ValidatedEventSequence(
    result.data.map((event) => createEventRecord(event.timestamp, event.value))
  );
}

function toSchemaViolation(issues: ZodIssue[]): SchemaViolationError {
  const issue = issues[0];
  if (!issue) {
    return new SchemaViolationError('invalid_record', -1, 'rejected without detail');
  }
  const [index, field] = issue.path;
  const position = typeof index === 'number' ? index : -1;
  return new SchemaViolationError(classify(issue, field), position, describe(issue, field));
}

function classify(issue: ZodIssue, field: string | number | undefined): SchemaViolationReason {
  if (issue.code === z.ZodIssueCode.custom) {
    return issue.params?.['reason'] === 'out_of_order' ? 'out_of_order' : 'invalid_record';
  }

  const notFinite =
    issue.code === z.ZodIssueCode.not_finite ||
    (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'nan');

  if (field === 'value' && notFinite) {
    return 'non_finite_value';
  }
  if (field === 'timestamp') {
    if (issue.code === z.ZodIssueCode.too_small) return 'negative_timestamp';
    if (notFinite) return 'invalid_timestamp';
  }
  return 'invalid_record';
}

function describe(issue: ZodIssue, field: string | number | undefined): string {
  if (issue.code === z.ZodIssueCode.custom || typeof field !== 'string') {
    return issue.message;
  }
  return `${field}: ${issue.message}`;
}

/**
 * True when the batch would pass validation.
 */
export function isValidBatch(events: readonly EventRecord[]): boolean {
  return eventBatchSchema.safeParse(events).success;
}
