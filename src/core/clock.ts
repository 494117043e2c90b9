import { setTimeout as delay } from "node:timers/promises";

/** Longest delay a Node timer honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/** Clamp a duration into the range Node timers accept. */
export function timerMs(ms: number): number {
  return Math.min(Math.max(Math.floor(ms), 0), MAX_TIMER_MS);
}

/** Time source for polling loops; tests substitute a manual clock. */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, rejects if `signal` aborts first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(timerMs(ms), undefined, { signal });
  },
};
