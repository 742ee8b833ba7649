import {
  defaultNotificationConfig,
  type NotificationConfig,
} from '../../config/notifications';
import { logger } from '../../logging/logger';
import { type RandomSource, scheduleDelivery } from './deliveryScheduler';
import { errorMessage, NotificationError, PendingInsertError } from './errors';
import { buildMessage } from './message';
import type {
  Change,
  ChangeDetector,
  Follower,
  NotificationLookupService,
  NotificationPipeline,
  NotificationRunResult,
  NotificationStore,
  PendingNotification,
} from './types';

type PipelineOptions = {
  config?: NotificationConfig;
  random?: RandomSource;
};

export class NotificationPipelineImpl implements NotificationPipeline {
  private readonly config: NotificationConfig;
  private readonly random: RandomSource;

  constructor(
    private readonly detector: ChangeDetector,
    private readonly lookup: NotificationLookupService,
    private readonly store: NotificationStore,
    options: PipelineOptions = {},
  ) {
    this.config = options.config ?? defaultNotificationConfig;
    this.random = options.random ?? Math.random;
  }

  async run(fixtureId: number): Promise<NotificationRunResult> {
    let changes: Change[];
    try {
      changes = await this.detector.detectChanges(fixtureId);
    } catch (error) {
      throw new NotificationError(
        'CHANGE_DETECTION_FAILED',
        `detect changes: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    if (changes.length === 0) {
      logger.info({ fixtureId }, 'No significant percentile changes');
      return { fixtureId, changes: 0, scheduled: 0 };
    }
    logger.info(
      { fixtureId, count: changes.length },
      'Detected percentile changes',
    );

    let matchTime: Date;
    try {
      matchTime = await this.lookup.getMatchTime(fixtureId);
    } catch (error) {
      throw new NotificationError(
        'MATCH_TIME_UNAVAILABLE',
        `get match time: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const pending: PendingNotification[] = [];
    for (const change of changes) {
      let followers: Follower[];
      try {
        followers = await this.lookup.getFollowers(
          change.entityType,
          change.entityId,
          change.sport,
        );
      } catch (error) {
        logger.warn(
          {
            err: error,
            fixtureId,
            entityType: change.entityType,
            entityId: change.entityId,
          },
          'Get followers failed',
        );
        continue;
      }
      if (followers.length === 0) {
        continue;
      }

      const [entityName, statDisplayName] = await Promise.all([
        this.lookup.getEntityName(
          change.entityType,
          change.entityId,
          change.sport,
        ),
        this.lookup.getStatDisplayName(
          change.sport,
          change.statKey,
          change.entityType,
        ),
      ]);
      const message = buildMessage(entityName, statDisplayName, change);

      for (const follower of followers) {
        pending.push({
          userId: follower.userId,
          entityType: change.entityType,
          entityId: change.entityId,
          sport: change.sport,
          fixtureId,
          statKey: change.statKey,
          percentile: change.newPercentile,
          message,
          scheduledFor: scheduleDelivery(
            matchTime,
            follower.timezone,
            this.config,
            this.random,
          ),
        });
      }
    }

    if (pending.length === 0) {
      logger.info({ fixtureId }, 'No followers to notify');
      return { fixtureId, changes: changes.length, scheduled: 0 };
    }

    let inserted: number;
    try {
      inserted = await this.store.insertPending(pending);
    } catch (error) {
      const partial = error instanceof PendingInsertError ? error.inserted : 0;
      throw new NotificationError(
        'PERSIST_FAILED',
        `insert pending: ${errorMessage(error)}`,
        { cause: error, inserted: partial },
      );
    }
    logger.info({ fixtureId, count: inserted }, 'Notifications scheduled');
    return { fixtureId, changes: changes.length, scheduled: inserted };
  }
}
