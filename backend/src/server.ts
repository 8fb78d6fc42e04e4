import { createApp } from './app';
import {
  BACKEND_VERSION,
  BUILD_REVISION,
  DATABASE_URL,
  DB_CONNECT_TIMEOUT_MS,
  DB_IDLE_TIMEOUT_MS,
  DB_POOL_MAX,
  DB_POOL_MIN,
  OUTBOUND_USER_AGENT,
  POKEAPI_GRAPHQL_URL,
  POKEAPI_PROBE_ON_STARTUP,
  POKEAPI_TIMEOUT_MS,
  SERVER_HOST,
  SERVER_PORT,
  TRUST_PROXY,
} from './config';
import { createStore } from './services/database/factory';
import { EntityCache } from './services/entity/entityCache';
import { setBuildInfo } from './services/metrics';
import { initializeRemoteClient } from './services/pokeapi';
import { logger } from './util/logger';

async function main(): Promise<void> {
  setBuildInfo(BACKEND_VERSION, BUILD_REVISION);

  const store = createStore(DATABASE_URL, {
    min: DB_POOL_MIN,
    max: DB_POOL_MAX,
    connectionTimeoutMillis: DB_CONNECT_TIMEOUT_MS,
    idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
  });

  // A failed setup is permanent for this process; lookups answer 503 until restart.
  const remote = await initializeRemoteClient({
    url: POKEAPI_GRAPHQL_URL,
    timeoutMs: POKEAPI_TIMEOUT_MS,
    userAgent: OUTBOUND_USER_AGENT,
    probe: POKEAPI_PROBE_ON_STARTUP,
  });

  const entityCache = new EntityCache({ store, remote });
  const app = createApp({ entityCache, store, trustProxy: TRUST_PROXY });

  const server = app.listen(SERVER_PORT, SERVER_HOST, () => {
    logger.info(`Dexcache listening at http://${SERVER_HOST}:${SERVER_PORT}`);
    logger.info(`Database pool configured with min=${DB_POOL_MIN} max=${DB_POOL_MAX}.`);
  });

  let shuttingDown = false;

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info(`Received ${signal}. Shutting down gracefully...`);

    const forcedShutdown = setTimeout(() => {
      logger.error('Forcing shutdown.');
      process.exit(1);
    }, 15000);
    forcedShutdown.unref();

    try {
      await new Promise<void>((resolve) => {
        server.close((err?: Error) => {
          if (err) {
            logger.error({ err }, 'Error closing HTTP server');
            process.exitCode = 1;
          }
          resolve();
        });
      });
      await store.close();
    } catch (error) {
      logger.error({ err: error }, 'Error closing database pool');
      process.exitCode = 1;
    } finally {
      clearTimeout(forcedShutdown);
      const exitCode = typeof process.exitCode === 'number' ? process.exitCode : 0;
      process.exit(exitCode);
    }
  }

  const shutdownSignals = ['SIGINT', 'SIGTERM'] as const;

  shutdownSignals.forEach((signal) => {
    process.on(signal, () => {
      void shutdown(signal);
    });
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start dexcache');
  process.exit(1);
});
