import { z } from 'zod';
import type { EntityType } from '../services/notification/types';

export type ListenerState = 'disconnected' | 'connecting' | 'listening';

export type MilestoneEvent = {
  entityType: EntityType;
  entityId: number;
  sport: string;
  season: number;
  statKey: string;
  percentile: number;
  timestamp: number;
};

export const milestonePayloadSchema = z
  .object({
    entity_type: z.enum(['player', 'team']),
    entity_id: z.number().int(),
    sport: z.string().min(1),
    season: z.number().int(),
    stat_key: z.string().min(1),
    percentile: z.number(),
    ts: z.number(),
  })
  .transform(
    (payload): MilestoneEvent => ({
      entityType: payload.entity_type,
      entityId: payload.entity_id,
      sport: payload.sport,
      season: payload.season,
      statKey: payload.stat_key,
      percentile: payload.percentile,
      timestamp: payload.ts,
    }),
  );

export type ListenNotification = {
  channel: string;
  payload?: string;
};

/** The slice of a `pg` Client a listen session uses. */
export interface ListenConnection {
  connect(): Promise<void>;
  query(text: string): Promise<unknown>;
  on(
    event: 'notification',
    listener: (message: ListenNotification) => void,
  ): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  removeAllListeners(): unknown;
  end(): Promise<void>;
}

export interface MilestoneEventHandler {
  handle(event: MilestoneEvent): Promise<void>;
}
