import type { Env } from './env';

export interface NotificationConfig {
  /** Percentile values whose crossing, in either direction, is notable. */
  milestones: readonly number[];
  deltaThreshold: number;
  deliveryWindowHours: number;
  /** Local waking hours, `[start, end)`. */
  wakingHourStart: number;
  wakingHourEnd: number;
  maxScheduleAttempts: number;
  dispatchSchedule: string;
  dispatchBatchSize: number;
  pushTitle: string;
  pushTimeoutMs: number;
  listenChannel: string;
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  handlerConcurrency: number;
  handlerQueueLimit: number;
}

export const defaultNotificationConfig: NotificationConfig = {
  milestones: [90, 95, 99],
  deltaThreshold: 10,
  deliveryWindowHours: 12,
  wakingHourStart: 9,
  wakingHourEnd: 22,
  maxScheduleAttempts: 20,
  dispatchSchedule: '*/30 * * * * *',
  dispatchBatchSize: 100,
  pushTitle: 'Stat Alerts',
  pushTimeoutMs: 10_000,
  listenChannel: 'milestone_reached',
  reconnectInitialDelayMs: 5_000,
  reconnectMaxDelayMs: 30_000,
  handlerConcurrency: 8,
  handlerQueueLimit: 1000,
};

export const parseMilestones = (value: string): number[] => {
  const milestones = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part));

  if (
    milestones.length === 0 ||
    milestones.some((milestone) => !Number.isFinite(milestone))
  ) {
    throw new Error(`Invalid milestone list: "${value}"`);
  }
  return [...new Set(milestones)].sort((a, b) => a - b);
};

export const notificationConfigFromEnv = (
  source: Env,
): NotificationConfig => ({
  ...defaultNotificationConfig,
  milestones: parseMilestones(source.NOTIFICATION_MILESTONES),
  deltaThreshold: source.NOTIFICATION_DELTA_THRESHOLD,
  deliveryWindowHours: source.NOTIFICATION_WINDOW_HOURS,
  dispatchSchedule: source.NOTIFICATION_DISPATCH_CRON,
  dispatchBatchSize: source.NOTIFICATION_DISPATCH_BATCH_SIZE,
  pushTitle: source.PUSH_TITLE,
  pushTimeoutMs: source.PUSH_TIMEOUT_MS,
  listenChannel: source.MILESTONE_CHANNEL,
  handlerConcurrency: source.MILESTONE_HANDLER_CONCURRENCY,
  handlerQueueLimit: source.MILESTONE_HANDLER_QUEUE_LIMIT,
});
