/**
 * Standard API envelope helpers.
 *
 * All API responses use:
 *   Success: { data: <payload> }
 *   Error:   { error: { code, message, kind?, retryable?, requestId?, details? } }
 */

import { z } from 'zod';
import { ErrorKind } from '@circulation/domain';

/** Wrap a payload schema in the standard `{ data: T }` envelope. */
export function DataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

/**
 * Standard error envelope. `kind` and `retryable` are present on every
 * circulation failure so callers can decide between retry and abandon.
 */
export const ErrorEnvelope = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    kind: ErrorKind.optional(),
    retryable: z.boolean().optional(),
    requestId: z.string().optional(),
    details: z.unknown().optional(),
  }),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelope>;
