import { EntityStore } from './adapter';
import { PostgresStore } from './postgresAdapter';

export interface StorePoolOptions {
  min: number;
  max: number;
  connectionTimeoutMillis: number;
  idleTimeoutMillis: number;
}

export function createStore(connectionString: string, options: StorePoolOptions): EntityStore {
  const normalized = connectionString.trim();
  if (!normalized.startsWith('postgresql://') && !normalized.startsWith('postgres://')) {
    const scheme = normalized.split(':')[0] ?? '';
    throw new Error(`Unsupported database connection string scheme: ${scheme || '(none)'}`);
  }

  return new PostgresStore({
    connectionString,
    min: options.min,
    max: options.max,
    connectionTimeoutMillis: options.connectionTimeoutMillis,
    idleTimeoutMillis: options.idleTimeoutMillis,
  });
}
