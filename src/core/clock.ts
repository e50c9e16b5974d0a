/** Milliseconds since the Unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Timestamp for a registration. Never repeats or goes backwards relative to
 * `previous`, even when the wall clock does.
 */
export function nextTimestamp(clock: Clock, previous: number | null): number {
  const now = Math.floor(clock());
  return previous === null ? now : Math.max(now, previous + 1);
}
