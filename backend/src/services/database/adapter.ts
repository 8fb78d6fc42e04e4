export type StoreRow = Record<string, unknown>;

/**
 * A single checked-out connection. Callers must `release()` it exactly once.
 */
export interface StoreConnection {
  queryOne(sql: string, params?: readonly unknown[]): Promise<StoreRow | null>;
  /** Resolves to the number of affected rows. */
  execute(sql: string, params?: readonly unknown[]): Promise<number>;
  release(): void;
}

export interface EntityStore {
  /** Rejects with {@link StoreUnavailableError} when no connection can be obtained. */
  acquireConnection(): Promise<StoreConnection>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export function databaseErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export const UNIQUE_VIOLATION = '23505';

/**
 * Scoped acquisition: the connection is released on every exit path of `work`.
 */
export async function withConnection<T>(
  store: EntityStore,
  work: (connection: StoreConnection) => Promise<T>,
): Promise<T> {
  const connection = await store.acquireConnection();
  try {
    return await work(connection);
  } finally {
    connection.release();
  }
}
