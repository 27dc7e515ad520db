import { createTimeoutError } from '@reasoning-relay/chat-contract';

/** Longest delay `setTimeout` honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type Deadline = {
  readonly signal: AbortSignal;
  readonly expired: boolean;
  readonly timeoutMs: number;
  clear(): void;
};

/**
 * Aborts `signal` with a timeout RelayError once `timeoutMs` elapses.
 * Zero or negative budgets are already expired. Budgets past the timer
 * limit, Infinity included, never expire.
 */
export function createDeadline(timeoutMs: number): Deadline {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
    controller.abort(createTimeoutError(timeoutMs));
  } else if (timeoutMs <= MAX_TIMER_DELAY_MS) {
    timer = setTimeout(() => {
      timer = null;
      controller.abort(createTimeoutError(timeoutMs));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    timeoutMs,
    get expired() {
      return controller.signal.aborted;
    },
    clear() {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
  };
}
