import { EntityStore, StoreRow, withConnection } from '../database/adapter';
import { SELECT_ENTITY_SQL } from '../database/schema';
import { isStatMap, isStringArray, toSafeInteger } from '../../util/typeChecks';
import { decodeStructured } from './decode';
import { CacheReadResult, EntityRecord } from './types';

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function corrupt(field: keyof EntityRecord, reason: string): CacheReadResult {
  return { kind: 'corrupt', field, reason };
}

export function decodeEntityRow(row: StoreRow): CacheReadResult {
  const id = toSafeInteger(row.id);
  if (id === null || id <= 0) {
    return corrupt('id', 'id is not a positive integer');
  }

  if (typeof row.name !== 'string') {
    return corrupt('name', 'name is not a string');
  }

  const stats = decodeStructured(row.stats, isStatMap, 'a mapping of stat names to integers');
  if (!stats.ok) {
    return corrupt('stats', stats.reason);
  }

  const types = decodeStructured(row.types, isStringArray, 'a list of type names');
  if (!types.ok) {
    return corrupt('types', types.reason);
  }

  const totalBaseStats = toSafeInteger(row.total_base_stats);
  if (totalBaseStats === null) {
    return corrupt('total_base_stats', 'total_base_stats is not an integer');
  }

  if (!isNullableString(row.image)) {
    return corrupt('image', 'image is neither a string nor null');
  }

  if (!isNullableString(row.shiny_image)) {
    return corrupt('shiny_image', 'shiny_image is neither a string nor null');
  }

  return {
    kind: 'hit',
    record: {
      id,
      name: row.name,
      stats: stats.value,
      total_base_stats: totalBaseStats,
      types: types.value,
      image: row.image,
      shiny_image: row.shiny_image,
    },
  };
}

export class CacheReader {
  constructor(private readonly store: EntityStore) {}

  /**
   * Read-only lookup. Connection and query failures surface as `unavailable`
   * so the caller can go straight to the remote source.
   */
  async read(id: number): Promise<CacheReadResult> {
    let row: StoreRow | null;
    try {
      row = await withConnection(this.store, (connection) => connection.queryOne(SELECT_ENTITY_SQL, [id]));
    } catch (error) {
      return { kind: 'unavailable', error };
    }

    if (!row) {
      return { kind: 'miss' };
    }

    return decodeEntityRow(row);
  }
}
