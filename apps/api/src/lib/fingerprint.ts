/**
 * Operation fingerprints for idempotency comparison.
 *
 * A fingerprint is the SHA-256 of the operation name plus its essential
 * parameters, serialized with sorted keys so property order never matters.
 */

import { createHash } from 'crypto';
import type { CirculationOperation } from '@circulation/domain';

export type FingerprintParams = Record<string, string | number | boolean | null>;

export function stableStringify(params: FingerprintParams): string {
  const keys = Object.keys(params).sort();
  return JSON.stringify(params, keys);
}

export function computeFingerprint(operation: CirculationOperation, params: FingerprintParams): string {
  return createHash('sha256')
    .update(operation)
    .update('\n')
    .update(stableStringify(params))
    .digest('hex');
}
