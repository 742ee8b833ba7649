export type NotificationErrorCode =
  | 'CHANGE_DETECTION_FAILED'
  | 'FIXTURE_NOT_FOUND'
  | 'MATCH_TIME_UNAVAILABLE'
  | 'PERSIST_FAILED';

export class NotificationError extends Error {
  readonly code: NotificationErrorCode;
  readonly inserted: number;

  constructor(
    code: NotificationErrorCode,
    message: string,
    options: { cause?: unknown; inserted?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'NotificationError';
    this.code = code;
    this.inserted = options.inserted ?? 0;
  }
}

export class PendingInsertError extends Error {
  readonly inserted: number;

  constructor(inserted: number, cause: unknown) {
    super(
      `insert notification failed after ${inserted} row(s): ${errorMessage(cause)}`,
      { cause },
    );
    this.name = 'PendingInsertError';
    this.inserted = inserted;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
