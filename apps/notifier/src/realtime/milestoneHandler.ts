import { logger } from '../logging/logger';
import {
  buildMessage,
  buildMilestonePushData,
} from '../services/notification/message';
import type {
  Follower,
  NotificationLookupService,
} from '../services/notification/types';
import type { PushSender } from '../services/push/types';
import type { MilestoneEvent, MilestoneEventHandler } from './types';

/**
 * Sends a milestone straight to each follower's devices. Skips the queue and
 * quiet-hours scheduling, so delivery happens as soon as the event arrives.
 */
export class MilestoneHandlerImpl implements MilestoneEventHandler {
  constructor(
    private readonly lookup: NotificationLookupService,
    private readonly sender: PushSender,
    private readonly title: string,
  ) {}

  async handle(event: MilestoneEvent): Promise<void> {
    let followers: Follower[];
    try {
      followers = await this.lookup.getFollowers(
        event.entityType,
        event.entityId,
        event.sport,
      );
    } catch (error) {
      logger.warn(
        { err: error, entityType: event.entityType, entityId: event.entityId },
        'Failed to get followers for milestone',
      );
      return;
    }
    if (followers.length === 0) {
      return;
    }

    const [entityName, statDisplayName] = await Promise.all([
      this.lookup.getEntityName(event.entityType, event.entityId, event.sport),
      this.lookup.getStatDisplayName(
        event.sport,
        event.statKey,
        event.entityType,
      ),
    ]);
    const message = buildMessage(entityName, statDisplayName, {
      newPercentile: event.percentile,
    });
    const data = buildMilestonePushData(event);

    let sent = 0;
    let failed = 0;
    for (const follower of followers) {
      let tokens: string[];
      try {
        tokens = await this.lookup.getDeviceTokens(follower.userId);
      } catch (error) {
        logger.warn(
          { err: error, userId: follower.userId },
          'Device token lookup failed',
        );
        continue;
      }
      if (tokens.length === 0) {
        continue;
      }

      try {
        await this.sender.sendMulti(tokens, this.title, message, data);
        sent += 1;
      } catch (error) {
        logger.warn(
          { err: error, userId: follower.userId },
          'Milestone push failed',
        );
        failed += 1;
      }
    }

    if (sent + failed > 0) {
      logger.info(
        { message, sent, failed },
        'Milestone notifications dispatched',
      );
    }
  }
}
