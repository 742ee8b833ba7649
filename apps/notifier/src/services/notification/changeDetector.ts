import { z } from 'zod';
import {
  defaultNotificationConfig,
  type NotificationConfig,
} from '../../config/notifications';
import type { DbClient } from '../../db/types';
import { logger } from '../../logging/logger';
import type { Change, ChangeDetector } from './types';

type SignificanceConfig = Pick<
  NotificationConfig,
  'milestones' | 'deltaThreshold'
>;

const changeRowSchema = z.object({
  entity_type: z.enum(['player', 'team']),
  entity_id: z.coerce.number().int(),
  sport: z.string(),
  season: z.coerce.number().int(),
  league_id: z.coerce.number().int().nullable(),
  stat_key: z.string(),
  old_percentile: z.coerce.number().nullable(),
  new_percentile: z.coerce.number(),
  sample_size: z.coerce.number().int(),
});

const getDb = (pool: DbClient, client?: DbClient): DbClient => client ?? pool;

export const isSignificant = (
  change: Pick<Change, 'oldPercentile' | 'newPercentile'>,
  config: SignificanceConfig = defaultNotificationConfig,
): boolean => {
  const { oldPercentile, newPercentile } = change;
  for (const milestone of config.milestones) {
    const crossedUp = oldPercentile < milestone && newPercentile >= milestone;
    const crossedDown = oldPercentile >= milestone && newPercentile < milestone;
    if (crossedUp || crossedDown) {
      return true;
    }
  }
  return Math.abs(newPercentile - oldPercentile) >= config.deltaThreshold;
};

export class ChangeDetectorImpl implements ChangeDetector {
  constructor(
    private readonly pool: DbClient,
    private readonly config: SignificanceConfig = defaultNotificationConfig,
  ) {}

  async detectChanges(fixtureId: number, client?: DbClient): Promise<Change[]> {
    const db = getDb(this.pool, client);
    const result = await db.query(
      'SELECT * FROM detect_percentile_changes($1)',
      [fixtureId],
    );

    const changes: Change[] = [];
    let unbaselined = 0;
    for (const raw of result.rows) {
      const row = changeRowSchema.parse(raw);
      // Stats seen for the first time have no archived percentile to diff.
      if (row.old_percentile === null) {
        unbaselined += 1;
        continue;
      }
      const change: Change = {
        fixtureId,
        entityType: row.entity_type,
        entityId: row.entity_id,
        sport: row.sport,
        season: row.season,
        leagueId: row.league_id,
        statKey: row.stat_key,
        oldPercentile: row.old_percentile,
        newPercentile: row.new_percentile,
        sampleSize: row.sample_size,
      };
      if (isSignificant(change, this.config)) {
        changes.push(change);
      }
    }

    if (unbaselined > 0) {
      logger.debug(
        { fixtureId, unbaselined },
        'Skipped percentile rows without a baseline',
      );
    }
    return changes;
  }
}
