import express from 'express';
import compression from 'compression';
import helmet from 'helmet';
import { createEntityRouter } from './routes/entity';
import { requestId } from './middleware/requestId';
import { HttpError } from './util/httpError';
import { logger } from './util/logger';
import { elapsedMs, sanitizeUrlForLogs } from './util/requestUtils';
import type { EntityStore } from './services/database/adapter';
import type { EntityCache } from './services/entity/entityCache';
import { observeRequest, registry } from './services/metrics';

export interface AppDependencies {
  entityCache: EntityCache;
  store: EntityStore;
  trustProxy?: boolean | number | string;
}

export function createApp({ entityCache, store, trustProxy = false }: AppDependencies): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', trustProxy);
  app.use(helmet({
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin',
    },
    frameguard: {
      action: 'deny',
    },
  }));
  app.use(requestId);
  app.use(compression());

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = elapsedMs(start);
      const routeLabel =
        typeof res.locals.metricsRoute === 'string'
          ? res.locals.metricsRoute
          : req.baseUrl
            ? `${req.baseUrl}${req.route?.path ?? ''}`
            : req.route?.path ?? 'unmatched';
      observeRequest(req.method, routeLabel, res.statusCode, durationMs / 1000);

      const target = sanitizeUrlForLogs(req.originalUrl ?? req.url);
      const message = `[request] ${req.method} ${target} -> ${res.statusCode} (${durationMs.toFixed(2)} ms)`;
      if (res.statusCode >= 500) {
        req.log.error(message);
      } else if (res.statusCode >= 400) {
        req.log.warn(message);
      } else {
        req.log.info(message);
      }
    });
    next();
  });

  app.use('/api/entities', createEntityRouter(entityCache));

  app.get('/healthz', async (_req, res) => {
    res.locals.metricsRoute = '/healthz';
    const databaseHealthy = await store.ping();
    const remoteHealthy = entityCache.remoteAvailable;

    const status: 'ok' | 'degraded' | 'unhealthy' = databaseHealthy
      ? (remoteHealthy ? 'ok' : 'degraded')
      : 'unhealthy';

    res.status(databaseHealthy ? 200 : 503).json({
      status,
      checks: {
        database: databaseHealthy,
        remoteClient: remoteHealthy,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', async (_req, res, next) => {
    res.locals.metricsRoute = '/metrics';
    try {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, _res, next) => {
    next(new HttpError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json(err.toBody());
      return;
    }

    (req.log ?? logger).error({ err }, 'Unexpected error');
    res.status(500).json({ success: false, cause: 'INTERNAL_ERROR', message: 'An unexpected error occurred.' });
  });

  return app;
}
