import { describe, it, expect, jest } from '@jest/globals';
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { RemoteError, createGraphqlClient, initializeRemoteClient } from '../../src/services/pokeapi';

const url = 'https://graphql.test/v1beta';

function respondWith(data: unknown, status = 200) {
  return jest.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
    data,
    status,
    statusText: 'OK',
    headers: {},
    config,
  }));
}

function failWith(build: (config: InternalAxiosRequestConfig) => Error) {
  return jest.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    throw build(config);
  });
}

async function captureError(promise: Promise<unknown>): Promise<RemoteError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RemoteError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('createGraphqlClient', () => {
  it('posts the query, variables and operation name', async () => {
    const adapter = respondWith({ data: { pokemon_v2_pokemon: [] } });
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const data = await client.request('query Q($id: Int!) { x }', { id: 25 }, 'Q');

    expect(data).toEqual({ pokemon_v2_pokemon: [] });
    expect(adapter).toHaveBeenCalledTimes(1);
    const config = adapter.mock.calls[0][0];
    expect(config.method).toBe('post');
    expect(config.baseURL).toBe(url);
    expect(config.timeout).toBe(1000);
    expect(config.headers.get('User-Agent')).toBe('Dexcache/test');
    expect(JSON.parse(String(config.data))).toEqual({
      query: 'query Q($id: Int!) { x }',
      variables: { id: 25 },
      operationName: 'Q',
    });
  });

  it('turns a GraphQL errors array into a RemoteError', async () => {
    const adapter = respondWith({ errors: [{ message: 'field "x" not found' }, { message: 'second' }] });
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));

    expect(error.causeCode).toBe('REMOTE_GRAPHQL_ERROR');
    expect(error.message).toBe('field "x" not found; second');
  });

  it('rejects a body without a data member', async () => {
    const adapter = respondWith({ unexpected: true });
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));
    expect(error.causeCode).toBe('REMOTE_MALFORMED_RESPONSE');
  });

  it('rejects a body that is not an object', async () => {
    const adapter = respondWith('<html>bad gateway</html>');
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));
    expect(error.causeCode).toBe('REMOTE_MALFORMED_RESPONSE');
  });

  it('maps an HTTP failure status', async () => {
    const adapter = failWith(
      (config) =>
        new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE, config, null, {
          data: {},
          status: 503,
          statusText: 'Service Unavailable',
          headers: {},
          config,
        }),
    );
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));

    expect(error.causeCode).toBe('REMOTE_HTTP_ERROR');
    expect(error.status).toBe(503);
  });

  it('maps a timeout', async () => {
    const adapter = failWith((config) => new AxiosError('timeout of 1000ms exceeded', AxiosError.ECONNABORTED, config));
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));
    expect(error.causeCode).toBe('REMOTE_TIMEOUT');
  });

  it('maps a network failure', async () => {
    const adapter = failWith((config) => new AxiosError('getaddrinfo ENOTFOUND', 'ENOTFOUND', config));
    const client = createGraphqlClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', adapter });

    const error = await captureError(client.request('{ x }'));
    expect(error.causeCode).toBe('REMOTE_NETWORK_ERROR');
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it('refuses a non-http endpoint', () => {
    expect(() => createGraphqlClient({ url: 'ftp://graphql.test', timeoutMs: 1000, userAgent: 'Dexcache/test' })).toThrow(
      'Unsupported GraphQL endpoint protocol: ftp:',
    );
  });
});

describe('initializeRemoteClient', () => {
  it('returns a ready handle', async () => {
    const handle = await initializeRemoteClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test' });
    expect(handle.status).toBe('ready');
    expect(Object.keys(handle)).toEqual(['status', 'client']);
  });

  it('returns an unavailable handle for an invalid URL', async () => {
    const handle = await initializeRemoteClient({ url: 'not a url', timeoutMs: 1000, userAgent: 'Dexcache/test' });
    expect(handle.status).toBe('unavailable');
  });

  it('probes the endpoint when asked', async () => {
    const adapter = respondWith({ data: { __typename: 'query_root' } });
    const handle = await initializeRemoteClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', probe: true, adapter });

    expect(handle.status).toBe('ready');
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it('marks the handle unavailable when the probe fails', async () => {
    const adapter = failWith((config) => new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config));
    const handle = await initializeRemoteClient({ url, timeoutMs: 1000, userAgent: 'Dexcache/test', probe: true, adapter });

    expect(handle).toEqual({ status: 'unavailable', reason: 'Unable to reach the GraphQL endpoint.' });
  });
});
