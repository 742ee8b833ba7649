export {
  type BackgroundTasks,
  createNotificationPipeline,
  startBackgroundTasks,
} from './app';
export {
  defaultNotificationConfig,
  type NotificationConfig,
  notificationConfigFromEnv,
} from './config/notifications';
export type { DbClient } from './db/types';
export type { MilestoneEvent } from './realtime/types';
export { NotificationError } from './services/notification/errors';
export type {
  Change,
  DispatchResult,
  NotificationPipeline,
  NotificationRunResult,
} from './services/notification/types';
export { createPushSender } from './services/push/pushSender';
export type { PushSender } from './services/push/types';
