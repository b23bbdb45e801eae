import { RunCancelledError, TransportError, errorMessage, type TransportSource } from '../errors.js';
import type { Logger } from '../monitoring/logger.js';

export interface RetryPolicy {
  /** Extra attempts after the first one, for transient failures only */
  retries: number;
  /** Per-attempt timeout; expiry counts as a transient TransportError */
  timeoutMs: number;
  /** Linear back-off step between attempts */
  backoffMs?: number;
  source: TransportSource;
  label: string;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError(signal.reason instanceof Error ? signal.reason.message : undefined);
  }
}

/**
 * Race `task` against a timer. The task receives a signal that aborts when
 * the timer fires or the outer signal aborts, so SDK calls can stop early.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  opts: { source: TransportSource; label: string; signal?: AbortSignal },
): Promise<T> {
  throwIfAborted(opts.signal);

  const controller = new AbortController();
  const onOuterAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener('abort', onOuterAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransportError(`${opts.label} timed out after ${ms}ms`, opts.source, true));
      controller.abort();
    }, ms);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        if (opts.signal?.aborted) reject(new RunCancelledError());
      },
      { once: true },
    );
  });

  try {
    return await Promise.race([task(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onOuterAbort);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` with a per-attempt timeout, retrying transient TransportErrors.
 * Anything else (including cancellation) propagates immediately.
 */
export async function withTransportRetry<T>(
  task: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  opts: { signal?: AbortSignal; logger?: Logger; onRetry?: (attempt: number, err: TransportError) => void } = {},
): Promise<T> {
  const attempts = policy.retries + 1;
  let lastError: TransportError | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfAborted(opts.signal);
    try {
      return await withTimeout(task, policy.timeoutMs, {
        source: policy.source,
        label: policy.label,
        signal: opts.signal,
      });
    } catch (err) {
      if (!(err instanceof TransportError) || !err.transient) throw err;
      lastError = err;
      if (attempt === attempts) break;

      opts.logger?.warn('transport_retry', {
        label: policy.label,
        attempt,
        maxAttempts: attempts,
        error: errorMessage(err),
      });
      opts.onRetry?.(attempt, err);
      await sleep((policy.backoffMs ?? 0) * attempt, opts.signal);
    }
  }

  // lastError is always set when the loop exits without returning
  throw lastError ?? new TransportError(`${policy.label} failed`, policy.source, false);
}
