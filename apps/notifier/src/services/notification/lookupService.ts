import { z } from 'zod';
import type { DbClient } from '../../db/types';
import { logger } from '../../logging/logger';
import { NotificationError } from './errors';
import type {
  EntityType,
  Follower,
  NotificationLookupService,
} from './types';

const followerRowSchema = z.object({
  user_id: z.string(),
  timezone: z.string().nullable(),
});

const nameRowSchema = z.object({ name: z.string().min(1) });
const displayNameRowSchema = z.object({ display_name: z.string().min(1) });
const startTimeRowSchema = z.object({ start_time: z.coerce.date() });
const tokenRowSchema = z.object({ token: z.string().min(1) });

const ENTITY_NAME_QUERIES: Record<EntityType, string> = {
  player: 'SELECT name FROM players WHERE id = $1 AND sport = $2',
  team: 'SELECT name FROM teams WHERE id = $1 AND sport = $2',
};

export class NotificationLookupServiceImpl
  implements NotificationLookupService
{
  constructor(private readonly pool: DbClient) {}

  async getFollowers(
    entityType: EntityType,
    entityId: number,
    sport: string,
  ): Promise<Follower[]> {
    const result = await this.pool.query(
      `SELECT uf.user_id, u.timezone
       FROM user_follows uf
       JOIN users u ON u.id = uf.user_id
       WHERE uf.entity_type = $1 AND uf.entity_id = $2 AND uf.sport = $3`,
      [entityType, entityId, sport],
    );
    return result.rows.map((raw) => {
      const row = followerRowSchema.parse(raw);
      return { userId: row.user_id, timezone: row.timezone ?? 'UTC' };
    });
  }

  async getEntityName(
    entityType: EntityType,
    entityId: number,
    sport: string,
  ): Promise<string> {
    const fallback = String(entityId);
    try {
      const result = await this.pool.query(ENTITY_NAME_QUERIES[entityType], [
        entityId,
        sport,
      ]);
      const parsed = nameRowSchema.safeParse(result.rows[0]);
      return parsed.success ? parsed.data.name : fallback;
    } catch (error) {
      logger.warn(
        { err: error, entityType, entityId, sport },
        'Entity name lookup failed',
      );
      return fallback;
    }
  }

  async getStatDisplayName(
    sport: string,
    statKey: string,
    entityType: EntityType,
  ): Promise<string> {
    try {
      const result = await this.pool.query(
        `SELECT display_name FROM stat_definitions
         WHERE sport = $1 AND key_name = $2 AND entity_type = $3`,
        [sport, statKey, entityType],
      );
      const parsed = displayNameRowSchema.safeParse(result.rows[0]);
      return parsed.success ? parsed.data.display_name : statKey;
    } catch (error) {
      logger.warn(
        { err: error, sport, statKey, entityType },
        'Stat display name lookup failed',
      );
      return statKey;
    }
  }

  async getMatchTime(fixtureId: number): Promise<Date> {
    const result = await this.pool.query(
      'SELECT start_time FROM fixtures WHERE id = $1',
      [fixtureId],
    );
    if (result.rows.length === 0) {
      throw new NotificationError(
        'FIXTURE_NOT_FOUND',
        `Fixture ${fixtureId} not found.`,
      );
    }
    return startTimeRowSchema.parse(result.rows[0]).start_time;
  }

  async getDeviceTokens(userId: string): Promise<string[]> {
    const result = await this.pool.query(
      'SELECT token FROM user_devices WHERE user_id = $1 AND is_active = true',
      [userId],
    );
    return result.rows.map((raw) => tokenRowSchema.parse(raw).token);
  }
}
