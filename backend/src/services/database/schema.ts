export const ENTITY_TABLE = 'pokemon';

/**
 * `stats` and `types` are JSONB today, but rows written by older deployments
 * may hold them as serialized text.
 */
export const ENTITY_COLUMNS = ['id', 'name', 'stats', 'total_base_stats', 'types', 'image', 'shiny_image'] as const;

export const SELECT_ENTITY_SQL = `SELECT ${ENTITY_COLUMNS.join(', ')} FROM ${ENTITY_TABLE} WHERE id = $1`;

export const INSERT_ENTITY_SQL = `
  INSERT INTO ${ENTITY_TABLE} (${ENTITY_COLUMNS.join(', ')})
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (id) DO NOTHING
`;
