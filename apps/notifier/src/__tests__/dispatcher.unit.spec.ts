jest.mock('../logging/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { logger } from '../logging/logger';
import {
  NO_DEVICE_TOKENS,
  NotificationDispatcherImpl,
} from '../services/notification/dispatcher';
import type {
  ClaimedNotification,
  NotificationLookupService,
  NotificationStore,
} from '../services/notification/types';
import type { PushSender } from '../services/push/types';

const claimed = (id: number, userId: string): ClaimedNotification => ({
  id,
  userId,
  entityType: 'player',
  entityId: 7,
  sport: 'football',
  message: 'Test Player is now 91st percentile in Goals',
  scheduledFor: new Date('2025-01-15T14:15:00.000Z'),
});

const tokensByUser: Record<string, string[]> = {
  'user-1': ['token-1'],
  'user-2': ['token-2a', 'token-2b'],
  'user-3': [],
};

const setup = () => {
  const store: jest.Mocked<NotificationStore> = {
    insertPending: jest.fn(),
    claimDue: jest.fn().mockResolvedValue([]),
    markSent: jest.fn().mockResolvedValue(true),
    markFailed: jest.fn().mockResolvedValue(true),
  };
  const lookup: jest.Mocked<NotificationLookupService> = {
    getFollowers: jest.fn(),
    getEntityName: jest.fn(),
    getStatDisplayName: jest.fn(),
    getMatchTime: jest.fn(),
    getDeviceTokens: jest.fn(async (userId: string) => tokensByUser[userId] ?? []),
  };
  const sender: jest.Mocked<PushSender> = {
    sendMulti: jest.fn().mockResolvedValue(undefined),
  };
  const dispatcher = new NotificationDispatcherImpl(store, lookup, sender, {
    dispatchBatchSize: 50,
    pushTitle: 'Stat Alerts',
  });
  return { store, lookup, sender, dispatcher };
};

describe('notification dispatcher', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('sends to followers with devices and fails the rest', async () => {
    const { store, sender, dispatcher } = setup();
    store.claimDue.mockResolvedValue([
      claimed(1, 'user-1'),
      claimed(2, 'user-2'),
      claimed(3, 'user-3'),
    ]);

    const result = await dispatcher.dispatchBatch();

    expect(result).toEqual({ claimed: 3, sent: 2, failed: 1 });
    expect(store.claimDue).toHaveBeenCalledWith(50);
    expect(sender.sendMulti).toHaveBeenCalledTimes(2);
    expect(sender.sendMulti).toHaveBeenCalledWith(
      ['token-2a', 'token-2b'],
      'Stat Alerts',
      'Test Player is now 91st percentile in Goals',
      { entity_type: 'player', entity_id: '7', sport: 'football' },
    );
    expect(store.markSent.mock.calls).toEqual([[1], [2]]);
    expect(store.markFailed).toHaveBeenCalledWith(3, NO_DEVICE_TOKENS);
    expect(NO_DEVICE_TOKENS).toBe('no device tokens');
  });

  test('returns an empty result when nothing is due', async () => {
    const { sender, dispatcher } = setup();

    await expect(dispatcher.dispatchBatch()).resolves.toEqual({
      claimed: 0,
      sent: 0,
      failed: 0,
    });
    expect(sender.sendMulti).not.toHaveBeenCalled();
  });

  test('records the provider error when a send fails', async () => {
    const { store, sender, dispatcher } = setup();
    store.claimDue.mockResolvedValue([claimed(1, 'user-1')]);
    sender.sendMulti.mockRejectedValue(
      new Error('FCM delivery failed for all 1 token(s): unregistered'),
    );

    const result = await dispatcher.dispatchBatch();

    expect(result).toEqual({ claimed: 1, sent: 0, failed: 1 });
    expect(store.markFailed).toHaveBeenCalledWith(
      1,
      'FCM delivery failed for all 1 token(s): unregistered',
    );
    expect(store.markSent).not.toHaveBeenCalled();
  });

  test('treats a token lookup failure as having no devices', async () => {
    const { store, lookup, sender, dispatcher } = setup();
    store.claimDue.mockResolvedValue([claimed(4, 'user-1')]);
    lookup.getDeviceTokens.mockRejectedValueOnce(new Error('timeout'));

    const result = await dispatcher.dispatchBatch();

    expect(result).toEqual({ claimed: 1, sent: 0, failed: 1 });
    expect(sender.sendMulti).not.toHaveBeenCalled();
    expect(store.markFailed).toHaveBeenCalledWith(4, NO_DEVICE_TOKENS);
  });

  test('keeps going when a status update fails', async () => {
    const { store, dispatcher } = setup();
    const failure = new Error('connection reset');
    store.claimDue.mockResolvedValue([
      claimed(1, 'user-1'),
      claimed(2, 'user-2'),
    ]);
    store.markSent.mockRejectedValueOnce(failure).mockResolvedValueOnce(true);

    const result = await dispatcher.dispatchBatch();

    expect(result).toEqual({ claimed: 2, sent: 2, failed: 0 });
    expect(store.markSent).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      { err: failure, notificationId: 1, outcome: 'sent' },
      'Notification status update failed',
    );
  });

  test('warns when a row has already left the sending state', async () => {
    const { store, dispatcher } = setup();
    store.claimDue.mockResolvedValue([claimed(1, 'user-1')]);
    store.markSent.mockResolvedValueOnce(false);

    await dispatcher.dispatchBatch();

    expect(logger.warn).toHaveBeenCalledWith(
      { notificationId: 1, outcome: 'sent' },
      'Notification was not in sending state',
    );
  });

  test('propagates claim failures', async () => {
    const { store, dispatcher } = setup();
    store.claimDue.mockRejectedValue(new Error('database unavailable'));

    await expect(dispatcher.dispatchBatch()).rejects.toThrow(
      'database unavailable',
    );
  });
});
