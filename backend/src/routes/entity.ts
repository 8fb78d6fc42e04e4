import { Router } from 'express';
import type { EntityCache } from '../services/entity/entityCache';
import type { EntityLookup } from '../services/entity/types';
import { HttpError } from '../util/httpError';
import { parseEntityId } from '../util/validation';

export function lookupToHttpError(lookup: Exclude<EntityLookup, { status: 'found' }>): HttpError {
  switch (lookup.status) {
    case 'not_found':
      return new HttpError(404, 'ENTITY_NOT_FOUND', `No entity exists with id ${lookup.id}.`);
    case 'remote_error':
      return new HttpError(
        lookup.error.causeCode === 'REMOTE_TIMEOUT' ? 504 : 502,
        lookup.error.causeCode,
        'The upstream data source could not provide this entity.',
      );
    case 'client_unavailable':
      return new HttpError(503, 'REMOTE_CLIENT_UNAVAILABLE', 'The upstream data source is not configured.');
  }
}

export function createEntityRouter(entityCache: EntityCache): Router {
  const router = Router();

  router.get('/:id', async (req, res, next) => {
    res.locals.metricsRoute = '/api/entities/:id';

    try {
      const id = parseEntityId(req.params.id);
      const lookup = await entityCache.getEntity(id, req.log);

      if (lookup.status !== 'found') {
        next(lookupToHttpError(lookup));
        return;
      }

      res.set('X-Cache', lookup.source === 'cache' ? 'HIT' : 'MISS');
      res.json(lookup.record);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
