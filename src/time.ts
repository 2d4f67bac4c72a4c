// src/time.ts

/** Returns milliseconds since the Unix epoch. Swappable in tests. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Whole seconds since the Unix epoch, as carried in Message.timestamp. */
export function unixSeconds(clock: Clock = systemClock): number {
  return Math.floor(clock() / 1000);
}
