import { EntityStore, UNIQUE_VIOLATION, databaseErrorCode, withConnection } from '../database/adapter';
import { INSERT_ENTITY_SQL } from '../database/schema';
import { CacheWriteResult, EntityRecord, WriteError } from './types';

export function toInsertParams(record: EntityRecord): unknown[] {
  return [
    record.id,
    record.name,
    JSON.stringify(record.stats),
    record.total_base_stats,
    JSON.stringify(record.types),
    record.image,
    record.shiny_image,
  ];
}

export class CacheWriter {
  constructor(private readonly store: EntityStore) {}

  /**
   * Insert-or-ignore. Losing a race against a concurrent insert of the same id
   * is reported as `already_present`, never as a failure.
   */
  async write(record: EntityRecord): Promise<CacheWriteResult> {
    try {
      const affected = await withConnection(this.store, (connection) =>
        connection.execute(INSERT_ENTITY_SQL, toInsertParams(record)),
      );
      return affected > 0 ? { kind: 'written' } : { kind: 'already_present' };
    } catch (error) {
      if (databaseErrorCode(error) === UNIQUE_VIOLATION) {
        return { kind: 'already_present' };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'error', error: new WriteError(`Failed to cache entity ${record.id}: ${message}`, { cause: error }) };
    }
  }
}
