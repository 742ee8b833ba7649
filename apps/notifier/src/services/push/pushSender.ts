import { cert, initializeApp } from 'firebase-admin/app';
import { getMessaging } from 'firebase-admin/messaging';
import { logger } from '../../logging/logger';
import type { MulticastClient, PushSender } from './types';

/** FCM rejects multicast messages with more tokens than this. */
export const FCM_MULTICAST_LIMIT = 500;

const DEFAULT_TIMEOUT_MS = 10_000;

const withTimeout = async <T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
};

/** Stands in when no push provider is configured; every send succeeds. */
export class NoopPushSender implements PushSender {
  async sendMulti(
    tokens: string[],
    title: string,
    body: string,
  ): Promise<void> {
    logger.debug(
      { tokens: tokens.length, title, body },
      'Push send skipped (no provider configured)',
    );
  }
}

export class FcmPushSender implements PushSender {
  constructor(
    private readonly client: MulticastClient,
    private readonly timeoutMs = DEFAULT_TIMEOUT_MS,
  ) {}

  async sendMulti(
    tokens: string[],
    title: string,
    body: string,
    data: Record<string, string>,
  ): Promise<void> {
    if (tokens.length === 0) {
      throw new Error('no tokens to send to');
    }

    let succeeded = 0;
    const errors: string[] = [];
    for (const batch of chunk(tokens, FCM_MULTICAST_LIMIT)) {
      const response = await withTimeout(
        this.client.sendEachForMulticast({
          tokens: batch,
          notification: { title, body },
          data,
        }),
        this.timeoutMs,
        'FCM multicast',
      );
      succeeded += response.successCount;
      for (const result of response.responses) {
        if (!result.success && result.error) {
          errors.push(result.error.message);
        }
      }
    }

    if (succeeded === 0) {
      throw new Error(
        `FCM delivery failed for all ${tokens.length} token(s)${
          errors.length > 0 ? `: ${errors[0]}` : ''
        }`,
      );
    }
    if (succeeded < tokens.length) {
      logger.warn(
        { tokens: tokens.length, succeeded, firstError: errors[0] },
        'FCM delivery partially failed',
      );
    }
  }
}

export const createPushSender = (
  credentialsFile: string,
  timeoutMs = DEFAULT_TIMEOUT_MS,
): PushSender => {
  if (!credentialsFile) {
    logger.info('Push delivery disabled (no FIREBASE_CREDENTIALS_FILE)');
    return new NoopPushSender();
  }
  const app = initializeApp({ credential: cert(credentialsFile) }, 'notifier');
  logger.info('Push delivery via FCM');
  return new FcmPushSender(getMessaging(app), timeoutMs);
};
