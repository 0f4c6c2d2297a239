// Caller-imposed deadline around a unit of async work.
// The work receives an AbortSignal that fires when the deadline passes.

import { DeadlineExceededError } from '../services/orchestrator/errors.js';

export async function withDeadline<T>(
  ms: number,
  label: string,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(`${label} exceeded ${ms}ms deadline`);
      controller.abort(error);
      reject(error);
    }, ms);

    work(controller.signal).then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof DeadlineExceededError) throw reason;
  throw new DeadlineExceededError(`${label} aborted`);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new DeadlineExceededError('sleep aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new DeadlineExceededError('sleep aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
