/**
 * Timeout utilities for wrapping async operations
 *
 * Prevents outbound calls from hanging indefinitely. The operation receives an
 * AbortSignal that fires when the deadline passes or the caller aborts, so the
 * underlying request is torn down instead of left to complete in the background.
 */

import { OperationCancelledError, RequestTimeoutError } from '../types/errors.js';

export interface DeadlineOptions {
  /** Name used in error messages */
  operationName?: string;
  /** Caller's signal; aborting it cancels the operation */
  signal?: AbortSignal;
}

/**
 * Throw OperationCancelledError if the signal has already fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, operationName: string = 'Operation'): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${operationName} was cancelled`);
  }
}

/**
 * Run an operation with a deadline
 *
 * Rejects with RequestTimeoutError once `timeoutMs` elapses and with
 * OperationCancelledError when the caller's signal fires, whether or not the
 * operation itself honours the signal it was given.
 *
 * @param operation - Receives the signal to pass to the underlying I/O
 * @param timeoutMs - Timeout in milliseconds
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: DeadlineOptions = {}
): Promise<T> {
  const operationName = options.operationName || 'Operation';
  const parentSignal = options.signal;
  throwIfAborted(parentSignal, operationName);

  const controller = new AbortController();
  let rejectDeadline: (reason: Error) => void = () => undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });
  const fail = (error: Error) => {
    rejectDeadline(error);
    controller.abort(error);
  };

  const timeoutId = setTimeout(() => {
    fail(new RequestTimeoutError(`${operationName} timed out after ${timeoutMs}ms`, { timeoutMs }));
  }, timeoutMs);
  const onParentAbort = () => fail(new OperationCancelledError(`${operationName} was cancelled`));
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), abortPromise]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Wait for `ms` milliseconds, rejecting early with OperationCancelledError if the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError('Wait was cancelled'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError('Wait was cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
