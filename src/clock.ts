/**
 * Time source for grace-period and timeout computations.
 * Components take a Clock so tests can move time explicitly.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Age of a timestamp relative to `now`, in milliseconds. */
export function ageMs(since: Date | string, now: Date): number {
  const start = typeof since === 'string' ? new Date(since) : since;
  return now.getTime() - start.getTime();
}
