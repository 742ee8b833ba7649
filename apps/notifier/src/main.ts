import { Client } from 'pg';
import { startBackgroundTasks } from './app';
import { env } from './config/env';
import { notificationConfigFromEnv } from './config/notifications';
import { db } from './db/pool';
import { logger } from './logging/logger';
import { createPushSender } from './services/push/pushSender';

const LISTEN_CONNECT_TIMEOUT_MS = 2_000;

const controller = new AbortController();
const config = notificationConfigFromEnv(env);

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Shutting down notifier');
  controller.abort();
};
process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

const tasks = startBackgroundTasks({
  pool: db,
  config,
  sender: createPushSender(env.FIREBASE_CREDENTIALS_FILE, config.pushTimeoutMs),
  createConnection: () =>
    new Client({
      connectionString: env.DATABASE_URL,
      connectionTimeoutMillis: LISTEN_CONNECT_TIMEOUT_MS,
    }),
  listenerEnabled: env.REALTIME_LISTENER_ENABLED === 'true',
  signal: controller.signal,
});

tasks.done
  .then(() => db.end())
  .then(() => {
    logger.info('Notifier stopped');
  })
  .catch((error) => {
    logger.error({ err: error }, 'Notifier failed');
    process.exit(1);
  });
