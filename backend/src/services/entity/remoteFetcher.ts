import { logger } from '../../util/logger';
import { isNonArrayObject } from '../../util/typeChecks';
import { GraphqlClient, RemoteError } from '../pokeapi';
import { decodeStructured } from './decode';
import { EntityRecord, RemoteFetchResult, StatMap } from './types';

export const ENTITY_DETAILS_QUERY = `
  query GetPokemonDetails($id: Int!) {
    pokemon_v2_pokemon(where: {id: {_eq: $id}}) {
      id name
      pokemon_v2_pokemonstats { base_stat pokemon_v2_stat { name } }
      pokemon_v2_pokemontypes { pokemon_v2_type { name } }
      pokemon_v2_pokemonsprites { sprites }
    }
  }
`;

function malformed(message: string): RemoteError {
  return new RemoteError('REMOTE_MALFORMED_RESPONSE', message);
}

function optionalList(entity: Record<string, unknown>, field: string): unknown[] {
  const value = entity[field];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw malformed(`${field} is not a list.`);
  }
  return value;
}

function normalizeStats(entries: unknown[]): StatMap {
  const stats: Array<[string, number]> = [];
  for (const entry of entries) {
    if (!isNonArrayObject(entry) || !isNonArrayObject(entry.pokemon_v2_stat)) {
      throw malformed('Stat entry is missing its stat object.');
    }
    const name = entry.pokemon_v2_stat.name;
    const baseStat = entry.base_stat;
    if (typeof name !== 'string') {
      throw malformed('Stat entry is missing its name.');
    }
    if (typeof baseStat !== 'number' || !Number.isSafeInteger(baseStat)) {
      throw malformed(`Stat "${name}" has a non-integer base value.`);
    }
    stats.push([name, baseStat]);
  }
  // `__proto__` is a legal stat name; it must land as an own property.
  return Object.fromEntries(stats);
}

function normalizeTypes(entries: unknown[]): string[] {
  return entries.map((entry) => {
    if (!isNonArrayObject(entry) || !isNonArrayObject(entry.pokemon_v2_type)) {
      throw malformed('Type entry is missing its type object.');
    }
    const name = entry.pokemon_v2_type.name;
    if (typeof name !== 'string') {
      throw malformed('Type entry is missing its name.');
    }
    return name;
  });
}

export function sumStats(stats: StatMap): number {
  return Object.values(stats).reduce((total, value) => total + value, 0);
}

export interface SpriteUrls {
  image: string | null;
  shiny_image: string | null;
}

/**
 * The sprite bundle arrives as an object or as JSON text depending on the
 * upstream version. Decode failures fall back to an empty bundle.
 */
export function extractSprites(bundles: unknown[], id: number): SpriteUrls {
  let sprites: Record<string, unknown> = {};

  const first: unknown = bundles[0];
  if (isNonArrayObject(first) && first.sprites !== undefined && first.sprites !== null) {
    const decoded = decodeStructured(first.sprites, isNonArrayObject, 'an object');
    if (decoded.ok) {
      sprites = decoded.value;
    } else {
      logger.warn({ id, reason: decoded.reason }, '[fetcher] ignoring undecodable sprite bundle');
    }
  }

  return {
    image: typeof sprites.front_default === 'string' ? sprites.front_default : null,
    shiny_image: typeof sprites.front_shiny === 'string' ? sprites.front_shiny : null,
  };
}

export function normalizeEntity(data: Record<string, unknown>, id: number): EntityRecord | null {
  const matches = data.pokemon_v2_pokemon;
  if (matches === undefined || matches === null) {
    return null;
  }
  if (!Array.isArray(matches)) {
    throw malformed('pokemon_v2_pokemon is not a list.');
  }
  if (matches.length === 0) {
    return null;
  }

  const entity: unknown = matches[0];
  if (!isNonArrayObject(entity)) {
    throw malformed('Entity is not an object.');
  }
  if (entity.id !== id) {
    throw malformed(`Entity id ${String(entity.id)} does not match requested id ${id}.`);
  }
  if (typeof entity.name !== 'string') {
    throw malformed('Entity name is not a string.');
  }

  const stats = normalizeStats(optionalList(entity, 'pokemon_v2_pokemonstats'));
  const types = normalizeTypes(optionalList(entity, 'pokemon_v2_pokemontypes'));
  const sprites = extractSprites(optionalList(entity, 'pokemon_v2_pokemonsprites'), id);

  return {
    id,
    name: entity.name,
    stats,
    total_base_stats: sumStats(stats),
    types,
    image: sprites.image,
    shiny_image: sprites.shiny_image,
  };
}

export class RemoteFetcher {
  constructor(private readonly client: GraphqlClient) {}

  /** Single attempt; retrying is left to the caller. */
  async fetch(id: number): Promise<RemoteFetchResult> {
    try {
      const data = await this.client.request(ENTITY_DETAILS_QUERY, { id }, 'GetPokemonDetails');
      const record = normalizeEntity(data, id);
      return record ? { kind: 'found', record } : { kind: 'not_found' };
    } catch (error) {
      if (error instanceof RemoteError) {
        return { kind: 'error', error };
      }
      const message = error instanceof Error ? error.message : String(error);
      return {
        kind: 'error',
        error: new RemoteError('REMOTE_UNEXPECTED_ERROR', `Remote fetch failed: ${message}`, { cause: error }),
      };
    }
  }
}
