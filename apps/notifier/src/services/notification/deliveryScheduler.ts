import {
  defaultNotificationConfig,
  type NotificationConfig,
} from '../../config/notifications';
import { getZonedParts, resolveTimeZone, zonedTimeToUtc } from './timeZone';

export type DeliveryWindowConfig = Pick<
  NotificationConfig,
  | 'deliveryWindowHours'
  | 'wakingHourStart'
  | 'wakingHourEnd'
  | 'maxScheduleAttempts'
>;

export type RandomSource = () => number;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const isWakingHour = (
  hour: number,
  config: DeliveryWindowConfig = defaultNotificationConfig,
): boolean => hour >= config.wakingHourStart && hour < config.wakingHourEnd;

/**
 * Picks a random instant in `[matchTime, matchTime + window)` that lands in
 * the follower's waking hours. When every draw lands in quiet hours, delivery
 * moves to the start of waking hours (plus a random minute) on the local day
 * after the match.
 */
export const scheduleDelivery = (
  matchTime: Date,
  timezone: string,
  config: DeliveryWindowConfig = defaultNotificationConfig,
  random: RandomSource = Math.random,
): Date => {
  const timeZone = resolveTimeZone(timezone);
  const start = matchTime.getTime();
  const windowMs = config.deliveryWindowHours * HOUR_MS;

  for (let attempt = 0; attempt < config.maxScheduleAttempts; attempt += 1) {
    const candidate = new Date(start + Math.floor(random() * windowMs));
    if (isWakingHour(getZonedParts(candidate, timeZone).hour, config)) {
      return candidate;
    }
  }

  const nextDay = getZonedParts(new Date(start + DAY_MS), timeZone);
  return zonedTimeToUtc(
    {
      year: nextDay.year,
      month: nextDay.month,
      day: nextDay.day,
      hour: config.wakingHourStart,
      minute: Math.floor(random() * 60),
    },
    timeZone,
  );
};
