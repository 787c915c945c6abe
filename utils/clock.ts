/** Source of the current time. Injected so timestamps are testable. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock that always reports `time`. */
export function fixedClock(time: Date | string): Clock {
  const fixed = new Date(time);
  return { now: () => new Date(fixed) };
}

/**
 * Next value for a `lastModified` stamp: the clock's time, or 1ms past
 * `previous` when the clock has not moved past it.
 */
export function nextTimestamp(previous: Date, now: Date): Date {
  return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
}
