export interface PushSender {
  /** Resolves when the batch was accepted; rejects with one error for the batch. */
  sendMulti(
    tokens: string[],
    title: string,
    body: string,
    data: Record<string, string>,
  ): Promise<void>;
}

export type MulticastResponse = {
  successCount: number;
  failureCount: number;
  responses: Array<{ success: boolean; error?: { message: string } }>;
};

export interface MulticastClient {
  sendEachForMulticast(message: {
    tokens: string[];
    notification: { title: string; body: string };
    data: Record<string, string>;
  }): Promise<MulticastResponse>;
}
