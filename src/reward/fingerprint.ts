import { createHash } from 'node:crypto';
import type { RewardConfig } from '../config/config-schema.js';

const FINGERPRINT_LENGTH = 12;

/**
 * Stable short hash of the reward configuration.
 *
 * Keys are sorted before hashing, so two configs with the same values
 * always share a fingerprint regardless of property order.
 */
export function fingerprintConfig(config: RewardConfig): string {
  return createHash('sha256')
    .update(canonicalJson(config))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

/**
 * JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}
