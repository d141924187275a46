import { fromUnixTime, isValid } from 'date-fns';

/**
 * Normalize a schedule time given as a Date or as epoch seconds
 */
export function toScheduleDate(time: Date | number): Date | null {
  const date = typeof time === 'number' ? fromUnixTime(time) : time;
  return isValid(date) ? date : null;
}

/**
 * Delay in seconds must be a finite, non-negative number
 */
export function isValidDelay(delaySeconds: number): boolean {
  return Number.isFinite(delaySeconds) && delaySeconds >= 0;
}
