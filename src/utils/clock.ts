/**
 * Source of the current time in epoch milliseconds
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
