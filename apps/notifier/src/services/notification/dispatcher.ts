import {
  defaultNotificationConfig,
  type NotificationConfig,
} from '../../config/notifications';
import { logger } from '../../logging/logger';
import type { PushSender } from '../push/types';
import { errorMessage } from './errors';
import { buildPushData } from './message';
import type {
  ClaimedNotification,
  DispatchResult,
  NotificationDispatcher,
  NotificationLookupService,
  NotificationStore,
} from './types';

export const NO_DEVICE_TOKENS = 'no device tokens';

type Outcome = 'sent' | 'failed';

export class NotificationDispatcherImpl implements NotificationDispatcher {
  constructor(
    private readonly store: NotificationStore,
    private readonly lookup: NotificationLookupService,
    private readonly sender: PushSender,
    private readonly config: Pick<
      NotificationConfig,
      'dispatchBatchSize' | 'pushTitle'
    > = defaultNotificationConfig,
  ) {}

  async dispatchBatch(): Promise<DispatchResult> {
    const claimed = await this.store.claimDue(this.config.dispatchBatchSize);

    let sent = 0;
    let failed = 0;
    for (const notification of claimed) {
      const outcome = await this.deliver(notification);
      if (outcome === 'sent') {
        sent += 1;
      } else {
        failed += 1;
      }
    }
    return { claimed: claimed.length, sent, failed };
  }

  private async deliver(notification: ClaimedNotification): Promise<Outcome> {
    let tokens: string[] = [];
    try {
      tokens = await this.lookup.getDeviceTokens(notification.userId);
    } catch (error) {
      logger.warn(
        { err: error, userId: notification.userId },
        'Device token lookup failed',
      );
    }

    if (tokens.length === 0) {
      logger.warn(
        { userId: notification.userId, notificationId: notification.id },
        'No device tokens',
      );
      await this.record(notification.id, 'failed', NO_DEVICE_TOKENS);
      return 'failed';
    }

    try {
      await this.sender.sendMulti(
        tokens,
        this.config.pushTitle,
        notification.message,
        buildPushData(notification),
      );
    } catch (error) {
      logger.warn(
        { err: error, notificationId: notification.id },
        'Push send failed',
      );
      await this.record(notification.id, 'failed', errorMessage(error));
      return 'failed';
    }

    await this.record(notification.id, 'sent');
    return 'sent';
  }

  private async record(
    id: number,
    outcome: Outcome,
    reason = '',
  ): Promise<void> {
    try {
      const updated =
        outcome === 'sent'
          ? await this.store.markSent(id)
          : await this.store.markFailed(id, reason);
      if (!updated) {
        logger.warn(
          { notificationId: id, outcome },
          'Notification was not in sending state',
        );
      }
    } catch (error) {
      logger.error(
        { err: error, notificationId: id, outcome },
        'Notification status update failed',
      );
    }
  }
}
