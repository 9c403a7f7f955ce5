import { formatLocalDate, isIsoDate } from './helpers';

/**
 * Source of "today" for notice-period checks.
 */
export interface Clock {
  today(): string; // YYYY-MM-DD
}

export const systemClock: Clock = {
  today: () => formatLocalDate(new Date()),
};

export function fixedClock(date: string): Clock {
  if (!isIsoDate(date)) throw new Error(`Invalid clock date: ${date}`);
  return { today: () => date };
}
