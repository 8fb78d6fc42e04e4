import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { logger } from '../util/logger';
import { isNonArrayObject } from '../util/typeChecks';

export type RemoteErrorCode =
  | 'REMOTE_NETWORK_ERROR'
  | 'REMOTE_TIMEOUT'
  | 'REMOTE_HTTP_ERROR'
  | 'REMOTE_GRAPHQL_ERROR'
  | 'REMOTE_MALFORMED_RESPONSE'
  | 'REMOTE_UNEXPECTED_ERROR';

export class RemoteError extends Error {
  public readonly causeCode: RemoteErrorCode;
  public readonly status?: number;

  constructor(causeCode: RemoteErrorCode, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'RemoteError';
    this.causeCode = causeCode;
    this.status = options?.status;
  }
}

export type GraphqlVariables = Record<string, string | number | boolean | null>;

export interface GraphqlClient {
  /** Resolves to the `data` member of the response; rejects with {@link RemoteError}. */
  request(query: string, variables?: GraphqlVariables, operationName?: string): Promise<Record<string, unknown>>;
}

export interface RemoteClientOptions {
  url: string;
  timeoutMs: number;
  userAgent: string;
  /** Send a `{ __typename }` query once before declaring the client ready. */
  probe?: boolean;
  /** Transport override, used by tests to keep requests in process. */
  adapter?: AxiosAdapter;
}

export type RemoteClientHandle =
  | { readonly status: 'ready'; readonly client: GraphqlClient }
  | { readonly status: 'unavailable'; readonly reason: string };

function describeGraphqlErrors(errors: unknown[]): string {
  const messages = errors
    .map((entry) => (isNonArrayObject(entry) && typeof entry.message === 'string' ? entry.message : null))
    .filter((message): message is string => message !== null);
  return messages.length > 0 ? messages.join('; ') : 'Unknown GraphQL error.';
}

function toRemoteError(error: unknown): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      return new RemoteError('REMOTE_HTTP_ERROR', `GraphQL endpoint responded with status ${status}.`, {
        cause: error,
        status,
      });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new RemoteError('REMOTE_TIMEOUT', 'GraphQL endpoint did not respond before timing out.', { cause: error });
    }

    return new RemoteError('REMOTE_NETWORK_ERROR', 'Unable to reach the GraphQL endpoint.', { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new RemoteError('REMOTE_UNEXPECTED_ERROR', `GraphQL request failed: ${message}`, { cause: error });
}

class AxiosGraphqlClient implements GraphqlClient {
  constructor(private readonly http: AxiosInstance) {}

  async request(query: string, variables: GraphqlVariables = {}, operationName?: string): Promise<Record<string, unknown>> {
    let body: unknown;
    try {
      const response = await this.http.post<unknown>('', {
        query,
        variables,
        ...(operationName ? { operationName } : {}),
      });
      body = response.data;
    } catch (error) {
      throw toRemoteError(error);
    }

    if (!isNonArrayObject(body)) {
      throw new RemoteError('REMOTE_MALFORMED_RESPONSE', 'GraphQL response body is not an object.');
    }

    if (Array.isArray(body.errors) && body.errors.length > 0) {
      throw new RemoteError('REMOTE_GRAPHQL_ERROR', describeGraphqlErrors(body.errors));
    }

    if (!isNonArrayObject(body.data)) {
      throw new RemoteError('REMOTE_MALFORMED_RESPONSE', 'GraphQL response is missing its data member.');
    }

    return body.data;
  }
}

export function createGraphqlClient(options: RemoteClientOptions): GraphqlClient {
  const endpoint = new URL(options.url);
  if (endpoint.protocol !== 'https:' && endpoint.protocol !== 'http:') {
    throw new Error(`Unsupported GraphQL endpoint protocol: ${endpoint.protocol}`);
  }

  const http = axios.create({
    baseURL: endpoint.toString(),
    timeout: options.timeoutMs,
    headers: {
      'User-Agent': options.userAgent,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  return new AxiosGraphqlClient(http);
}

/**
 * Builds the process-wide GraphQL handle. Never throws: a failed setup yields an
 * `unavailable` handle, which stays unavailable for the lifetime of the process.
 */
export async function initializeRemoteClient(options: RemoteClientOptions): Promise<RemoteClientHandle> {
  let client: GraphqlClient;
  try {
    client = createGraphqlClient(options);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.fatal({ err: error, url: options.url }, '[pokeapi] failed to configure GraphQL client');
    return { status: 'unavailable', reason };
  }

  if (options.probe) {
    try {
      await client.request('query Probe { __typename }', {}, 'Probe');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.fatal({ err: error, url: options.url }, '[pokeapi] GraphQL endpoint probe failed');
      return { status: 'unavailable', reason };
    }
  }

  logger.info({ url: options.url }, '[pokeapi] GraphQL client initialized');
  return { status: 'ready', client };
}
