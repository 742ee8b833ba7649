import type { EntityType } from './types';

export const ordinalSuffix = (n: number): string => {
  const lastTwo = Math.abs(n) % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return 'th';
  }
  switch (Math.abs(n) % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
};

/** Shared by the scheduled and real-time delivery paths. */
export const buildMessage = (
  entityName: string,
  statDisplayName: string,
  change: { newPercentile: number },
): string => {
  const percentile = Math.trunc(change.newPercentile);
  return `${entityName} is now ${percentile}${ordinalSuffix(percentile)} percentile in ${statDisplayName}`;
};

type PushTarget = {
  entityType: EntityType;
  entityId: number;
  sport: string;
};

export const buildPushData = (target: PushTarget): Record<string, string> => ({
  entity_type: target.entityType,
  entity_id: String(target.entityId),
  sport: target.sport,
});

export const buildMilestonePushData = (
  target: PushTarget & { statKey: string; percentile: number },
): Record<string, string> => ({
  ...buildPushData(target),
  stat_key: target.statKey,
  percentile: target.percentile.toFixed(1),
});
