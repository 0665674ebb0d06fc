import { DeadlineExceededError, TimeoutError } from './errors.js';

export interface TimeoutOptions {
  /** Aborting the parent rejects with the parent's reason. */
  parent?: AbortSignal;
  label?: string;
}

/** Longest delay setTimeout honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new DeadlineExceededError();
}

/**
 * Runs `task` with its own AbortSignal and settles no later than `timeoutMs`,
 * even when the task ignores the signal. The signal is aborted on timeout or
 * when the parent aborts, so cooperative work is cancelled best-effort.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {}
): Promise<T> {
  const { parent, label = 'operation' } = options;
  const controller = new AbortController();

  if (parent?.aborted) {
    return Promise.reject(abortReason(parent));
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const settle = () => {
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    const onParentAbort = () => {
      if (settled || !parent) return;
      settle();
      const reason = abortReason(parent);
      controller.abort(reason);
      reject(reason);
    };

    const timer = setTimeout(() => {
      if (settled) return;
      settle();
      const error = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));

    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (value) => {
        if (settled) return;
        settle();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settle();
        reject(error);
      }
    );
  });
}
