/**
 * Time source. Everything that compares against "now" takes one,
 * so expiry can be tested without waiting.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface ManualClock extends Clock {
  advance(ms: number): void;
  set(epochMs: number): void;
}

export function createManualClock(start: number | Date = 0): ManualClock {
  let current = typeof start === 'number' ? start : start.getTime();

  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
    set(epochMs: number) {
      current = epochMs;
    },
  };
}
