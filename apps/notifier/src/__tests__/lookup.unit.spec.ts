jest.mock('../logging/logger', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import type { DbClient } from '../db/types';
import { logger } from '../logging/logger';
import { NotificationError } from '../services/notification/errors';
import { NotificationLookupServiceImpl } from '../services/notification/lookupService';

const createLookup = () => {
  const query = jest.fn();
  const lookup = new NotificationLookupServiceImpl({
    query,
  } as unknown as DbClient);
  return { lookup, query };
};

describe('notification lookup service', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('lists followers and defaults a missing timezone to UTC', async () => {
    const { lookup, query } = createLookup();
    query.mockResolvedValueOnce({
      rows: [
        { user_id: 'user-1', timezone: 'Europe/London' },
        { user_id: 'user-2', timezone: null },
      ],
    });

    const followers = await lookup.getFollowers('player', 7, 'football');

    expect(followers).toEqual([
      { userId: 'user-1', timezone: 'Europe/London' },
      { userId: 'user-2', timezone: 'UTC' },
    ]);
    expect(query.mock.calls[0][0]).toContain('FROM user_follows');
    expect(query.mock.calls[0][1]).toEqual(['player', 7, 'football']);
  });

  test('propagates follower query failures', async () => {
    const { lookup, query } = createLookup();
    query.mockRejectedValueOnce(new Error('connection reset'));

    await expect(lookup.getFollowers('team', 3, 'football')).rejects.toThrow(
      'connection reset',
    );
  });

  test('reads entity names from the table for the entity type', async () => {
    const { lookup, query } = createLookup();
    query
      .mockResolvedValueOnce({ rows: [{ name: 'Test Player' }] })
      .mockResolvedValueOnce({ rows: [{ name: 'Test United' }] });

    await expect(lookup.getEntityName('player', 7, 'football')).resolves.toBe(
      'Test Player',
    );
    await expect(lookup.getEntityName('team', 3, 'football')).resolves.toBe(
      'Test United',
    );
    expect(query.mock.calls[0][0]).toContain('FROM players');
    expect(query.mock.calls[0][1]).toEqual([7, 'football']);
    expect(query.mock.calls[1][0]).toContain('FROM teams');
  });

  test('falls back to the entity id when the name is unknown', async () => {
    const { lookup, query } = createLookup();
    query.mockResolvedValueOnce({ rows: [] });

    await expect(lookup.getEntityName('player', 42, 'football')).resolves.toBe(
      '42',
    );
  });

  test('falls back to the entity id when the lookup fails', async () => {
    const { lookup, query } = createLookup();
    const error = new Error('timeout');
    query.mockRejectedValueOnce(error);

    await expect(lookup.getEntityName('team', 9, 'hockey')).resolves.toBe('9');
    expect(logger.warn).toHaveBeenCalledWith(
      { err: error, entityType: 'team', entityId: 9, sport: 'hockey' },
      'Entity name lookup failed',
    );
  });

  test('reads stat display names and falls back to the key', async () => {
    const { lookup, query } = createLookup();
    query
      .mockResolvedValueOnce({ rows: [{ display_name: 'Goals' }] })
      .mockResolvedValueOnce({ rows: [] })
      .mockRejectedValueOnce(new Error('timeout'));

    await expect(
      lookup.getStatDisplayName('football', 'goals', 'player'),
    ).resolves.toBe('Goals');
    await expect(
      lookup.getStatDisplayName('football', 'xg_per_90', 'player'),
    ).resolves.toBe('xg_per_90');
    await expect(
      lookup.getStatDisplayName('football', 'assists', 'player'),
    ).resolves.toBe('assists');
    expect(query.mock.calls[0][1]).toEqual(['football', 'goals', 'player']);
  });

  test('returns the fixture start time', async () => {
    const { lookup, query } = createLookup();
    query.mockResolvedValueOnce({
      rows: [{ start_time: new Date('2025-01-15T03:00:00.000Z') }],
    });

    const matchTime = await lookup.getMatchTime(101);

    expect(matchTime.toISOString()).toBe('2025-01-15T03:00:00.000Z');
    expect(query.mock.calls[0][1]).toEqual([101]);
  });

  test('reports a missing fixture', async () => {
    const { lookup, query } = createLookup();
    query.mockResolvedValueOnce({ rows: [] });

    const error = await lookup.getMatchTime(404).catch((caught) => caught);

    expect(error).toBeInstanceOf(NotificationError);
    expect(error.code).toBe('FIXTURE_NOT_FOUND');
    expect(error.message).toBe('Fixture 404 not found.');
  });

  test('returns active device tokens', async () => {
    const { lookup, query } = createLookup();
    query.mockResolvedValueOnce({
      rows: [{ token: 'token-a' }, { token: 'token-b' }],
    });

    await expect(lookup.getDeviceTokens('user-1')).resolves.toEqual([
      'token-a',
      'token-b',
    ]);
    expect(query.mock.calls[0][0]).toContain('is_active = true');
    expect(query.mock.calls[0][1]).toEqual(['user-1']);
  });
});
