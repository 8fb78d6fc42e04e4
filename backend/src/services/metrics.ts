import client from 'prom-client';
import type { CacheReadResult, CacheWriteResult, RemoteFetchResult } from './entity/types';

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

const buildInfo = new client.Gauge({
  name: 'dexcache_build_info',
  help: 'Dexcache backend build metadata.',
  labelNames: ['version', 'revision'],
  registers: [registry],
});

export function setBuildInfo(version: string, revision: string): void {
  buildInfo.reset();
  buildInfo.set(
    {
      version: version || 'dev',
      revision: revision || 'unknown',
    },
    1,
  );
}

export const httpRequestsTotal = new client.Counter({
  name: 'dexcache_http_requests_total',
  help: 'Total HTTP requests received by the dexcache backend.',
  labelNames: ['method', 'route', 'status'],
  registers: [registry],
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: 'dexcache_http_request_duration_seconds',
  help: 'HTTP request duration in seconds.',
  labelNames: ['method', 'route'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const cacheLookupsTotal = new client.Counter({
  name: 'dexcache_cache_lookups_total',
  help: 'Entity cache lookups grouped by outcome.',
  labelNames: ['outcome'],
  registers: [registry],
});

export const remoteFetchesTotal = new client.Counter({
  name: 'dexcache_remote_fetches_total',
  help: 'GraphQL entity fetches grouped by outcome.',
  labelNames: ['outcome'],
  registers: [registry],
});

export const cacheWritesTotal = new client.Counter({
  name: 'dexcache_cache_writes_total',
  help: 'Entity cache inserts grouped by outcome.',
  labelNames: ['outcome'],
  registers: [registry],
});

export function recordCacheLookup(outcome: CacheReadResult['kind']): void {
  cacheLookupsTotal.inc({ outcome });
}

export function recordRemoteFetch(outcome: RemoteFetchResult['kind']): void {
  remoteFetchesTotal.inc({ outcome });
}

export function recordCacheWrite(outcome: CacheWriteResult['kind']): void {
  cacheWritesTotal.inc({ outcome });
}

export function observeRequest(
  method: string,
  route: string,
  status: number,
  durationSeconds: number,
): void {
  httpRequestsTotal.inc({ method, route, status: status.toString() });
  httpRequestDurationSeconds.observe({ method, route }, durationSeconds);
}
