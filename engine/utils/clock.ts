import { setTimeout as delay } from 'timers/promises';

/**
 * Time source for everything that waits: the tick loop, overlay holds and
 * frame animation. Tests substitute a clock that advances instantly.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
