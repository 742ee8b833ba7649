import { setTimeout as delay } from 'node:timers/promises';
import type { NotificationConfig } from '../config/notifications';
import { logger } from '../logging/logger';
import { TaskPool } from './taskPool';
import {
  type ListenConnection,
  type ListenerState,
  type ListenNotification,
  type MilestoneEvent,
  type MilestoneEventHandler,
  milestonePayloadSchema,
} from './types';

export type ListenerConfig = Pick<
  NotificationConfig,
  | 'listenChannel'
  | 'reconnectInitialDelayMs'
  | 'reconnectMaxDelayMs'
  | 'handlerConcurrency'
  | 'handlerQueueLimit'
>;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

type MilestoneListenerOptions = {
  createConnection: () => ListenConnection;
  handler: MilestoneEventHandler;
  config: ListenerConfig;
  sleep?: Sleep;
};

const CHANNEL_PATTERN = /^[a-z_][a-z0-9_]*$/;

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

export const parseMilestoneEvent = (
  payload: string | undefined,
): MilestoneEvent | null => {
  let raw: unknown;
  try {
    raw = JSON.parse(payload ?? '');
  } catch (error) {
    logger.warn({ err: error, payload }, 'Failed to parse milestone event');
    return null;
  }
  const parsed = milestonePayloadSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { issues: parsed.error.issues, payload },
      'Failed to parse milestone event',
    );
    return null;
  }
  return parsed.data;
};

/**
 * Holds a dedicated LISTEN connection and hands each milestone event to the
 * handler through a bounded pool. Lost connections are retried with
 * exponential backoff until the signal aborts.
 */
export class MilestoneListener {
  private currentState: ListenerState = 'disconnected';
  private readonly pool: TaskPool;
  private readonly sleep: Sleep;

  constructor(private readonly options: MilestoneListenerOptions) {
    if (!CHANNEL_PATTERN.test(options.config.listenChannel)) {
      throw new Error(
        `Invalid listen channel: "${options.config.listenChannel}"`,
      );
    }
    this.sleep = options.sleep ?? abortableSleep;
    this.pool = new TaskPool({
      concurrency: options.config.handlerConcurrency,
      queueLimit: options.config.handlerQueueLimit,
      onError: (error) =>
        logger.error({ err: error }, 'Milestone handler failed'),
    });
  }

  get state(): ListenerState {
    return this.currentState;
  }

  /** Resolves once every accepted event has been handled. */
  onIdle(): Promise<void> {
    return this.pool.onIdle();
  }

  /** Runs until `signal` aborts, then waits for in-flight events. */
  async start(signal: AbortSignal): Promise<void> {
    const { reconnectInitialDelayMs, reconnectMaxDelayMs } =
      this.options.config;
    let backoffMs = reconnectInitialDelayMs;

    while (!signal.aborted) {
      const reachedListening = await this.runSession(signal);
      if (signal.aborted) {
        break;
      }
      if (reachedListening) {
        backoffMs = reconnectInitialDelayMs;
      }
      logger.info({ delayMs: backoffMs }, 'Reconnecting milestone listener');
      await this.sleep(backoffMs, signal);
      backoffMs = Math.min(backoffMs * 2, reconnectMaxDelayMs);
    }

    await this.pool.onIdle();
    logger.info('Milestone listener stopped');
  }

  private async runSession(signal: AbortSignal): Promise<boolean> {
    const channel = this.options.config.listenChannel;
    const connection = this.options.createConnection();
    this.currentState = 'connecting';

    // Listeners go on before connect so an early error is never unhandled.
    const closed = new Promise<Error>((resolve) => {
      connection.on('error', (error) => resolve(error));
      connection.on('end', () => resolve(new Error('connection ended')));
    });
    connection.on('notification', (message) => this.onNotification(message));

    let onAbort = () => {};
    const aborted = new Promise<null>((resolve) => {
      onAbort = () => resolve(null);
      signal.addEventListener('abort', onAbort, { once: true });
    });

    let listening = false;
    try {
      // A connect or LISTEN that hangs must not hold up shutdown.
      await Promise.race([connection.connect(), aborted]);
      if (signal.aborted) {
        return false;
      }
      await Promise.race([connection.query(`LISTEN ${channel}`), aborted]);
      if (signal.aborted) {
        return false;
      }
      listening = true;
      this.currentState = 'listening';
      logger.info({ channel }, 'Listening for milestone events');

      const lost = await Promise.race([closed, aborted]);
      if (lost) {
        logger.warn(
          { err: lost, channel },
          'Milestone listener connection lost',
        );
      }
    } catch (error) {
      logger.warn({ err: error, channel }, 'Milestone listener session failed');
    } finally {
      signal.removeEventListener('abort', onAbort);
      await this.close(connection);
      this.currentState = 'disconnected';
    }
    return listening;
  }

  private onNotification(message: ListenNotification): void {
    if (message.channel !== this.options.config.listenChannel) {
      return;
    }
    const event = parseMilestoneEvent(message.payload);
    if (!event) {
      return;
    }
    const accepted = this.pool.submit(() => this.options.handler.handle(event));
    if (!accepted) {
      logger.warn(
        {
          entityType: event.entityType,
          entityId: event.entityId,
          statKey: event.statKey,
        },
        'Milestone handler queue full, dropping event',
      );
    }
  }

  private async close(connection: ListenConnection): Promise<void> {
    connection.removeAllListeners();
    connection.on('error', (error) =>
      logger.debug({ err: error }, 'Error on closed listen connection'),
    );
    try {
      await connection.end();
    } catch (error) {
      logger.debug({ err: error }, 'Closing listen connection failed');
    }
  }
}
