import { RunCancelledError, TransportError, errorMessage } from '../errors.js';

/** HTTP statuses worth another attempt: timeouts, conflicts, rate limits, server errors. */
export function isTransientStatus(status: number | undefined): boolean {
  if (status === undefined) return true; // connection-level failure
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

/**
 * Map an SDK failure to the error taxonomy. Aborts become RunCancelledError,
 * everything else a TransportError flagged transient by status.
 */
export function toModelTransportError(
  err: unknown,
  label: string,
  status: number | undefined,
  signal?: AbortSignal,
): Error {
  if (signal?.aborted) return new RunCancelledError();
  return new TransportError(`${label}: ${errorMessage(err)}`, 'model', isTransientStatus(status), status);
}

/** Read a numeric `status` off an SDK error object without trusting its class. */
export function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}
