export type DbRow = Record<string, unknown>;

export type DbClient = {
  query: (text: string, params?: unknown[]) => Promise<{ rows: DbRow[] }>;
};
