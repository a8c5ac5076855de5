import type { Clock } from "../utils/clock";

export type ManualClock = Clock & {
  set(now: number): void;
  advance(seconds: number): void;
};

/**
 * Clock that only moves when told to, optionally by a fixed step per read
 */
export function createManualClock(start: number, stepPerRead = 0): ManualClock {
  let current = start;
  return {
    now: () => {
      const value = current;
      current += stepPerRead;
      return value;
    },
    set: (now) => {
      current = now;
    },
    advance: (seconds) => {
      current += seconds;
    },
  };
}
