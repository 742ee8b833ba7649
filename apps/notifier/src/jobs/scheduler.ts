import cron from 'node-cron';
import { env } from '../config/env';
import { logger } from '../logging/logger';
import type { NotificationDispatcher } from '../services/notification/types';

export interface JobHandle {
  /** Stops the cron task and resolves once a running tick has finished. */
  stop: () => Promise<void>;
}

type SchedulerOptions = {
  schedule: string;
  signal?: AbortSignal;
};

export const startScheduler = (
  dispatcher: NotificationDispatcher,
  options: SchedulerOptions,
): JobHandle | null => {
  if (env.JOBS_ENABLED !== 'true') {
    logger.info('Job scheduler disabled');
    return null;
  }

  let running: Promise<void> | null = null;
  const runBatch = async () => {
    try {
      const result = await dispatcher.dispatchBatch();
      if (result.sent + result.failed > 0) {
        logger.info(
          { sent: result.sent, failed: result.failed },
          'Dispatch batch',
        );
      }
    } catch (error) {
      logger.error({ err: error }, 'Dispatch error');
    }
  };

  const dispatchTick = (): Promise<void> => {
    if (running) {
      return Promise.resolve();
    }
    const tick = runBatch().finally(() => {
      running = null;
    });
    running = tick;
    return tick;
  };

  const tasks = [
    cron.schedule(options.schedule, dispatchTick, { timezone: 'UTC' }),
  ];

  let stopped: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (stopped) {
      return stopped;
    }
    for (const task of tasks) {
      task.stop();
    }
    stopped = (running ?? Promise.resolve()).then(() => {
      logger.info('Job scheduler stopped');
    });
    return stopped;
  };

  const onAbort = () => {
    void stop();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });
  if (options.signal?.aborted) {
    void stop();
    return { stop };
  }

  logger.info({ schedule: options.schedule }, 'Job scheduler started');
  return { stop };
};
