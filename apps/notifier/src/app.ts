import {
  defaultNotificationConfig,
  type NotificationConfig,
} from './config/notifications';
import type { DbClient } from './db/types';
import { type JobHandle, startScheduler } from './jobs/scheduler';
import { logger } from './logging/logger';
import { MilestoneHandlerImpl } from './realtime/milestoneHandler';
import { MilestoneListener, type Sleep } from './realtime/milestoneListener';
import type { ListenConnection } from './realtime/types';
import { ChangeDetectorImpl } from './services/notification/changeDetector';
import type { RandomSource } from './services/notification/deliveryScheduler';
import { NotificationDispatcherImpl } from './services/notification/dispatcher';
import { NotificationLookupServiceImpl } from './services/notification/lookupService';
import { NotificationStoreImpl } from './services/notification/notificationStore';
import { NotificationPipelineImpl } from './services/notification/pipeline';
import type { NotificationPipeline } from './services/notification/types';
import type { PushSender } from './services/push/types';

/** Called by ingestion once a fixture's percentiles are recomputed. */
export const createNotificationPipeline = (
  pool: DbClient,
  config: NotificationConfig = defaultNotificationConfig,
  random?: RandomSource,
): NotificationPipeline =>
  new NotificationPipelineImpl(
    new ChangeDetectorImpl(pool, config),
    new NotificationLookupServiceImpl(pool),
    new NotificationStoreImpl(pool),
    { config, random },
  );

type BackgroundTaskOptions = {
  pool: DbClient;
  config: NotificationConfig;
  sender: PushSender;
  createConnection: () => ListenConnection;
  listenerEnabled: boolean;
  signal: AbortSignal;
  sleep?: Sleep;
};

export type BackgroundTasks = {
  scheduler: JobHandle | null;
  listener: MilestoneListener | null;
  /** Settles after the signal aborts and every started task has drained. */
  done: Promise<void>;
};

const waitForAbort = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

const drainScheduler = async (
  scheduler: JobHandle | null,
  signal: AbortSignal,
): Promise<void> => {
  await waitForAbort(signal);
  await scheduler?.stop();
};

export const startBackgroundTasks = (
  options: BackgroundTaskOptions,
): BackgroundTasks => {
  const { pool, config, sender, signal } = options;
  const lookup = new NotificationLookupServiceImpl(pool);
  const dispatcher = new NotificationDispatcherImpl(
    new NotificationStoreImpl(pool),
    lookup,
    sender,
    config,
  );
  const scheduler = startScheduler(dispatcher, {
    schedule: config.dispatchSchedule,
    signal,
  });

  const schedulerDone = drainScheduler(scheduler, signal);

  if (!options.listenerEnabled) {
    logger.info('Milestone listener disabled');
    return { scheduler, listener: null, done: schedulerDone };
  }

  const listener = new MilestoneListener({
    createConnection: options.createConnection,
    handler: new MilestoneHandlerImpl(lookup, sender, config.pushTitle),
    config,
    sleep: options.sleep,
  });
  const done = Promise.all([listener.start(signal), schedulerDone]).then(
    () => undefined,
  );
  return { scheduler, listener, done };
};
