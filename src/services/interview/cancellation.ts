/**
 * Every suspend point in a session (synthesis, transcription, scoring,
 * question generation) runs through runCancellable: the call gets its own
 * AbortSignal, linked to the session's token and to a per-call timeout, and
 * the caller gets exactly one tagged outcome. The promise never rejects.
 */
import type { Clock, Timer } from './Clock';
import { CallTimeoutError, toError } from './errors';

export type CallOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'cancelled'; reason: unknown }
  | { status: 'failed'; error: Error };

export interface CallOptions {
  /** 0 or less disables the timeout. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export function runCancellable<T>(
  clock: Clock,
  options: CallOptions,
  task: (signal: AbortSignal) => Promise<T>
): Promise<CallOutcome<T>> {
  const controller = new AbortController();
  const parent = options.signal;

  return new Promise<CallOutcome<T>>((resolve) => {
    let settled = false;
    let timer: Timer | null = null;

    const onParentAbort = (): void => {
      const reason: unknown = parent?.reason;
      controller.abort(reason);
      finish({ status: 'cancelled', reason });
    };

    const finish = (outcome: CallOutcome<T>): void => {
      if (settled) return;
      settled = true;
      timer?.cancel();
      parent?.removeEventListener('abort', onParentAbort);
      resolve(outcome);
    };

    if (parent?.aborted) {
      finish({ status: 'cancelled', reason: parent.reason });
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    if (options.timeoutMs > 0) {
      timer = clock.setTimer(options.timeoutMs, () => {
        controller.abort(new CallTimeoutError(options.timeoutMs));
        finish({ status: 'timeout', timeoutMs: options.timeoutMs });
      });
    }

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }
    pending.then(
      (value) => finish({ status: 'ok', value }),
      (error: unknown) => finish({ status: 'failed', error: toError(error) })
    );
  });
}

/** Resolves when the signal aborts; never rejects. */
export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}
