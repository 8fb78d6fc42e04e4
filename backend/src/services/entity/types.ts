import type { RemoteError } from '../pokeapi';

export type StatMap = Record<string, number>;

export interface EntityRecord {
  id: number;
  name: string;
  stats: StatMap;
  /** Sum of `stats`, computed once when the record is normalized. */
  total_base_stats: number;
  types: string[];
  image: string | null;
  shiny_image: string | null;
}

export type CacheReadResult =
  | { kind: 'hit'; record: EntityRecord }
  | { kind: 'miss' }
  | { kind: 'corrupt'; field: keyof EntityRecord; reason: string }
  | { kind: 'unavailable'; error: unknown };

export type RemoteFetchResult =
  | { kind: 'found'; record: EntityRecord }
  | { kind: 'not_found' }
  | { kind: 'error'; error: RemoteError };

export class WriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WriteError';
  }
}

export type CacheWriteResult =
  | { kind: 'written' }
  | { kind: 'already_present' }
  | { kind: 'error'; error: WriteError };

export type EntityLookup =
  | { status: 'found'; record: EntityRecord; source: 'cache' | 'remote' }
  | { status: 'not_found'; id: number }
  | { status: 'remote_error'; id: number; error: RemoteError }
  | { status: 'client_unavailable'; reason: string };
