/**
 * Injectable time source. Production uses the system clock; tests pin it.
 */
export interface Clock {
  now(): Date;
}

export const CLOCK = 'CLOCK';

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Calendar date (YYYY-MM-DD, UTC) of an instant. */
export function isoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}
