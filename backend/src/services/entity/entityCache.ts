import { logger as rootLogger, type Logger } from '../../util/logger';
import { isPositiveSafeInteger } from '../../util/typeChecks';
import type { EntityStore } from '../database/adapter';
import { recordCacheLookup, recordCacheWrite, recordRemoteFetch } from '../metrics';
import type { RemoteClientHandle } from '../pokeapi';
import { CacheReader } from './cacheReader';
import { CacheWriter } from './cacheWriter';
import { RemoteFetcher } from './remoteFetcher';
import type { EntityLookup } from './types';

export interface EntityCacheOptions {
  store: EntityStore;
  remote: RemoteClientHandle;
  logger?: Logger;
}

/**
 * Cache-then-fetch coordinator. Holds no mutable state: concurrent lookups for
 * the same id are reconciled by the store's insert-or-ignore.
 */
export class EntityCache {
  private readonly reader: CacheReader;
  private readonly writer: CacheWriter;
  private readonly fetcher: RemoteFetcher | null;
  private readonly unavailableReason: string;
  private readonly log: Logger;

  constructor(options: EntityCacheOptions) {
    this.reader = new CacheReader(options.store);
    this.writer = new CacheWriter(options.store);
    this.log = options.logger ?? rootLogger;
    if (options.remote.status === 'ready') {
      this.fetcher = new RemoteFetcher(options.remote.client);
      this.unavailableReason = '';
    } else {
      this.fetcher = null;
      this.unavailableReason = options.remote.reason;
    }
  }

  get remoteAvailable(): boolean {
    return this.fetcher !== null;
  }

  async getEntity(id: number, log: Logger = this.log): Promise<EntityLookup> {
    if (!isPositiveSafeInteger(id)) {
      throw new RangeError(`Entity id must be a positive integer, got ${String(id)}`);
    }

    if (!this.fetcher) {
      log.error({ id, reason: this.unavailableReason }, '[entity] GraphQL client unavailable');
      return { status: 'client_unavailable', reason: this.unavailableReason };
    }

    const cached = await this.reader.read(id);
    recordCacheLookup(cached.kind);
    switch (cached.kind) {
      case 'hit':
        log.debug({ id }, '[entity] cache hit');
        return { status: 'found', record: cached.record, source: 'cache' };
      case 'unavailable':
        log.warn({ id, err: cached.error }, '[entity] store unavailable, skipping cache');
        break;
      case 'corrupt':
        log.warn({ id, field: cached.field, reason: cached.reason }, '[entity] cached row is corrupt, refetching');
        break;
      case 'miss':
        log.debug({ id }, '[entity] cache miss');
        break;
    }

    const fetched = await this.fetcher.fetch(id);
    recordRemoteFetch(fetched.kind);
    if (fetched.kind === 'not_found') {
      log.info({ id }, '[entity] no such entity upstream');
      return { status: 'not_found', id };
    }
    if (fetched.kind === 'error') {
      log.error({ id, err: fetched.error, cause: fetched.error.causeCode }, '[entity] remote fetch failed');
      return { status: 'remote_error', id, error: fetched.error };
    }

    const written = await this.writer.write(fetched.record);
    recordCacheWrite(written.kind);
    if (written.kind === 'error') {
      log.error({ id, err: written.error }, '[entity] failed to cache entity; serving fetched record');
    } else {
      log.debug({ id, outcome: written.kind }, '[entity] cache write');
    }

    return { status: 'found', record: fetched.record, source: 'remote' };
  }
}
