import type { DbClient } from '../../db/types';

export type EntityType = 'player' | 'team';

export type NotificationStatus = 'scheduled' | 'sending' | 'sent' | 'failed';

export type Change = {
  fixtureId: number;
  entityType: EntityType;
  entityId: number;
  sport: string;
  season: number;
  leagueId: number | null;
  statKey: string;
  oldPercentile: number;
  newPercentile: number;
  sampleSize: number;
};

export type Follower = {
  userId: string;
  timezone: string;
};

export type PendingNotification = {
  userId: string;
  entityType: EntityType;
  entityId: number;
  sport: string;
  fixtureId: number;
  statKey: string;
  percentile: number;
  message: string;
  scheduledFor: Date;
};

export type ClaimedNotification = {
  id: number;
  userId: string;
  entityType: EntityType;
  entityId: number;
  sport: string;
  message: string;
  scheduledFor: Date;
};

export type NotificationRunResult = {
  fixtureId: number;
  changes: number;
  scheduled: number;
};

export type DispatchResult = {
  claimed: number;
  sent: number;
  failed: number;
};

export interface ChangeDetector {
  detectChanges(fixtureId: number, client?: DbClient): Promise<Change[]>;
}

export interface NotificationLookupService {
  getFollowers(
    entityType: EntityType,
    entityId: number,
    sport: string,
  ): Promise<Follower[]>;
  /** Never rejects; falls back to the raw entity id. */
  getEntityName(
    entityType: EntityType,
    entityId: number,
    sport: string,
  ): Promise<string>;
  /** Never rejects; falls back to the raw stat key. */
  getStatDisplayName(
    sport: string,
    statKey: string,
    entityType: EntityType,
  ): Promise<string>;
  getMatchTime(fixtureId: number): Promise<Date>;
  getDeviceTokens(userId: string): Promise<string[]>;
}

export interface NotificationStore {
  insertPending(
    pending: PendingNotification[],
    client?: DbClient,
  ): Promise<number>;
  claimDue(limit: number): Promise<ClaimedNotification[]>;
  markSent(id: number): Promise<boolean>;
  markFailed(id: number, reason: string): Promise<boolean>;
}

export interface NotificationPipeline {
  run(fixtureId: number): Promise<NotificationRunResult>;
}

export interface NotificationDispatcher {
  dispatchBatch(): Promise<DispatchResult>;
}
