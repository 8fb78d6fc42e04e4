import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../../util/logger';
import { EntityStore, StoreConnection, StoreRow, StoreUnavailableError } from './adapter';

class PostgresConnection implements StoreConnection {
  private released = false;

  constructor(private readonly client: PoolClient) {}

  async queryOne(sql: string, params: readonly unknown[] = []): Promise<StoreRow | null> {
    const result = await this.client.query<StoreRow>(sql, [...params]);
    return result.rows.length > 0 ? result.rows[0] : null;
  }

  async execute(sql: string, params: readonly unknown[] = []): Promise<number> {
    const result = await this.client.query(sql, [...params]);
    return result.rowCount ?? 0;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release();
  }
}

export class PostgresStore implements EntityStore {
  private pool: Pool;

  constructor(config: PoolConfig) {
    this.pool = new Pool(config);

    this.pool.on('connect', () => {
      logger.debug('[database] opened PostgreSQL connection');
    });

    this.pool.on('error', (error: unknown) => {
      logger.error({ err: error }, '[database] unexpected PostgreSQL error on idle client');
    });
  }

  async acquireConnection(): Promise<StoreConnection> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreUnavailableError('Unable to acquire a PostgreSQL connection.', { cause: error });
    }
    return new PostgresConnection(client);
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error({ err: error }, '[database] health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('[database] PostgreSQL pool closed');
  }
}
