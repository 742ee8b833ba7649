import { z } from 'zod';
import type { DbClient } from '../../db/types';
import { PendingInsertError } from './errors';
import type {
  ClaimedNotification,
  NotificationStore,
  PendingNotification,
} from './types';

const claimedRowSchema = z.object({
  id: z.coerce.number().int(),
  user_id: z.string(),
  entity_type: z.enum(['player', 'team']),
  entity_id: z.coerce.number().int(),
  sport: z.string(),
  message: z.string(),
  scheduled_for: z.coerce.date(),
});

const getDb = (pool: DbClient, client?: DbClient): DbClient => client ?? pool;

export class NotificationStoreImpl implements NotificationStore {
  constructor(private readonly pool: DbClient) {}

  /**
   * Inserts row by row. The first failure stops the batch; rows written
   * before it stay written and the error carries their count.
   */
  async insertPending(
    pending: PendingNotification[],
    client?: DbClient,
  ): Promise<number> {
    const db = getDb(this.pool, client);
    let inserted = 0;
    for (const notification of pending) {
      try {
        await db.query(
          `INSERT INTO notifications (
             user_id, entity_type, entity_id, sport, fixture_id,
             stat_key, percentile, message, status, scheduled_for
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'scheduled', $9)`,
          [
            notification.userId,
            notification.entityType,
            notification.entityId,
            notification.sport,
            notification.fixtureId,
            notification.statKey,
            notification.percentile,
            notification.message,
            notification.scheduledFor,
          ],
        );
      } catch (error) {
        throw new PendingInsertError(inserted, error);
      }
      inserted += 1;
    }
    return inserted;
  }

  async claimDue(limit: number): Promise<ClaimedNotification[]> {
    const result = await this.pool.query(
      `UPDATE notifications
       SET status = 'sending', updated_at = NOW()
       WHERE id IN (
         SELECT id FROM notifications
         WHERE status = 'scheduled' AND scheduled_for <= NOW()
         ORDER BY scheduled_for
         LIMIT $1
         FOR UPDATE SKIP LOCKED
       )
       RETURNING id, user_id, entity_type, entity_id, sport, message, scheduled_for`,
      [limit],
    );

    return result.rows
      .map((raw) => {
        const row = claimedRowSchema.parse(raw);
        return {
          id: row.id,
          userId: row.user_id,
          entityType: row.entity_type,
          entityId: row.entity_id,
          sport: row.sport,
          message: row.message,
          scheduledFor: row.scheduled_for,
        };
      })
      .sort((a, b) => a.scheduledFor.getTime() - b.scheduledFor.getTime());
  }

  async markSent(id: number): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE notifications
       SET status = 'sent', sent_at = NOW(), updated_at = NOW()
       WHERE id = $1 AND status = 'sending'
       RETURNING id`,
      [id],
    );
    return result.rows.length > 0;
  }

  async markFailed(id: number, reason: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE notifications
       SET status = 'failed', last_error = $2, updated_at = NOW()
       WHERE id = $1 AND status = 'sending'
       RETURNING id`,
      [id, reason],
    );
    return result.rows.length > 0;
  }
}
