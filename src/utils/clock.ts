/**
 * Wall-clock source in unix seconds (fractional)
 */
export type Clock = {
  now(): number;
};

export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};
