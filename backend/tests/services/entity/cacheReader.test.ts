import { describe, it, expect, beforeEach } from '@jest/globals';
import { CacheReader, decodeEntityRow } from '../../../src/services/entity/cacheReader';
import { MemoryStore } from '../../helpers/memoryStore';

const bulbasaurRow = {
  id: 1,
  name: 'bulbasaur',
  stats: { hp: 45, attack: 49 },
  total_base_stats: 94,
  types: ['grass', 'poison'],
  image: 'https://img.test/1.png',
  shiny_image: null,
};

describe('decodeEntityRow', () => {
  it('returns a hit for structured columns', () => {
    expect(decodeEntityRow(bulbasaurRow)).toEqual({ kind: 'hit', record: bulbasaurRow });
  });

  it('decodes columns stored as JSON text', () => {
    const result = decodeEntityRow({
      ...bulbasaurRow,
      stats: '{"hp":45,"attack":49}',
      types: '["grass","poison"]',
    });
    expect(result).toEqual({ kind: 'hit', record: bulbasaurRow });
  });

  it('accepts a numeric string total from a BIGINT column', () => {
    const result = decodeEntityRow({ ...bulbasaurRow, total_base_stats: '94' });
    expect(result).toEqual({ kind: 'hit', record: bulbasaurRow });
  });

  it('flags undecodable stats as corrupt', () => {
    const result = decodeEntityRow({ ...bulbasaurRow, stats: 'not json' });
    expect(result.kind).toBe('corrupt');
    if (result.kind === 'corrupt') {
      expect(result.field).toBe('stats');
    }
  });

  it('flags types that are not a list as corrupt', () => {
    expect(decodeEntityRow({ ...bulbasaurRow, types: '{"0":"grass"}' })).toEqual({
      kind: 'corrupt',
      field: 'types',
      reason: 'decoded value is not a list of type names',
    });
  });

  it('flags a null stats column as corrupt', () => {
    expect(decodeEntityRow({ ...bulbasaurRow, stats: null })).toEqual({
      kind: 'corrupt',
      field: 'stats',
      reason: 'unsupported representation: null',
    });
  });

  it('flags fractional stat values as corrupt', () => {
    expect(decodeEntityRow({ ...bulbasaurRow, stats: { hp: 1.5 } })).toEqual({
      kind: 'corrupt',
      field: 'stats',
      reason: 'decoded value is not a mapping of stat names to integers',
    });
  });

  it('reads back a stat named __proto__ from JSON text', () => {
    const result = decodeEntityRow({ ...bulbasaurRow, stats: '{"__proto__":10,"hp":5}', total_base_stats: 15 });
    expect(result.kind).toBe('hit');
    if (result.kind === 'hit') {
      expect(Object.entries(result.record.stats)).toEqual([
        ['__proto__', 10],
        ['hp', 5],
      ]);
    }
  });

  it('flags a non-string image as corrupt', () => {
    expect(decodeEntityRow({ ...bulbasaurRow, image: 12 })).toEqual({
      kind: 'corrupt',
      field: 'image',
      reason: 'image is neither a string nor null',
    });
  });
});

describe('CacheReader', () => {
  let store: MemoryStore;
  let reader: CacheReader;

  beforeEach(() => {
    store = new MemoryStore();
    reader = new CacheReader(store);
  });

  it('reports a miss when no row exists', async () => {
    await expect(reader.read(7)).resolves.toEqual({ kind: 'miss' });
    expect(store.released).toBe(1);
  });

  it('returns the cached record', async () => {
    store.rows.set(1, bulbasaurRow);
    await expect(reader.read(1)).resolves.toEqual({ kind: 'hit', record: bulbasaurRow });
  });

  it('reports unavailable when no connection can be acquired', async () => {
    store.acquireError = new Error('connection refused');
    const result = await reader.read(1);
    expect(result.kind).toBe('unavailable');
    expect(store.acquired).toBe(0);
  });

  it('reports unavailable and releases the connection when the query fails', async () => {
    store.queryError = new Error('relation "pokemon" does not exist');
    const result = await reader.read(1);
    expect(result.kind).toBe('unavailable');
    expect(store.acquired).toBe(1);
    expect(store.released).toBe(1);
  });

  it('never modifies a corrupt row', async () => {
    const corruptRow = { ...bulbasaurRow, stats: '{broken' };
    store.rows.set(1, corruptRow);
    const result = await reader.read(1);
    expect(result.kind).toBe('corrupt');
    expect(store.rows.get(1)).toEqual(corruptRow);
  });
});
