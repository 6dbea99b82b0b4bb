import { ConfigurationError } from '@competency-search/common';
import type { Logger } from 'pino';

import type { PgVectorConfig } from '../config';
import { compileFilters, MATCH_ALL } from '../filter-translator';
import { PgVectorClient, toSparseVectorLiteral } from '../pgvector-client';
import { JAVA_ID, PYTHON_ID, competency, createMockLogger } from './fixtures';

const mockConnect = jest.fn();
const mockRelease = jest.fn();
const mockQuery = jest.fn();

const mockPool = {
  connect: mockConnect,
  end: jest.fn(),
  on: jest.fn()
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool)
}));

jest.mock('pgvector/pg', () => ({
  toSql: jest.fn((vector: number[]) => `[${vector.join(',')}]`)
}));

interface QueryConfig {
  text: string;
  values?: unknown[];
}

function queryText(sql: unknown): string {
  if (typeof sql === 'string') return sql;
  if (sql && typeof sql === 'object' && 'text' in sql && typeof sql.text === 'string') return sql.text;
  return '';
}

function normalize(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}

describe('PgVectorClient', () => {
  let logger: Logger;
  let typmods: { dense: number; sparse: number };

  const baseConfig: PgVectorConfig = {
    host: 'localhost',
    port: 5432,
    database: 'competencies',
    user: 'search',
    password: 'test-secret',
    ssl: false,
    schema: 'search',
    table: 'entities',
    denseDimensions: 4,
    sparseDimensions: 16,
    poolMax: 4,
    poolMin: 0,
    idleTimeoutMs: 30_000,
    connectionTimeoutMs: 5_000,
    statementTimeoutMs: 30_000,
    enableAutoMigrate: false
  };

  beforeEach(() => {
    logger = createMockLogger().logger;
    typmods = { dense: 4, sparse: 16 };

    mockQuery.mockImplementation(async (sql: unknown) => {
      const text = queryText(sql);
      if (text.includes('pg_extension')) {
        return { rowCount: 1, rows: [{ '?column?': 1 }] };
      }
      if (text.includes('information_schema.tables')) {
        return { rowCount: 1, rows: [{ table_name: 'entities' }] };
      }
      if (text.includes('pg_attribute')) {
        return {
          rowCount: 2,
          rows: [
            { attname: 'dense', atttypmod: typmods.dense },
            { attname: 'sparse', atttypmod: typmods.sparse }
          ]
        };
      }
      return { rowCount: 0, rows: [] };
    });

    mockConnect.mockResolvedValue({ query: mockQuery, release: mockRelease });
  });

  it('renders sparse vectors as 1-based sparsevec literals', () => {
    expect(toSparseVectorLiteral({ indices: [0, 5], values: [1, 2.5] }, 10)).toBe('{1:1,6:2.5}/10');
    expect(toSparseVectorLiteral({ indices: [], values: [] }, 10)).toBe('{}/10');
  });

  it('verifies the table when the declared dimensions match', async () => {
    const client = new PgVectorClient(baseConfig, logger);

    await expect(client.verify()).resolves.toBeUndefined();
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });

  it('fails verification when the dense column dimension differs', async () => {
    typmods.dense = 768;
    const client = new PgVectorClient(baseConfig, logger);

    await expect(client.verify()).rejects.toThrow(
      new ConfigurationError(
        'Dense dimensionality mismatch in search.entities: expected vector(4), found vector(768).'
      )
    );
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });

  it('creates the schema objects when auto-migration is enabled', async () => {
    const client = new PgVectorClient({ ...baseConfig, enableAutoMigrate: true }, logger);

    await client.verify();

    const statements = mockQuery.mock.calls.map(([sql]) => normalize(queryText(sql)));
    expect(statements).toContain('CREATE EXTENSION IF NOT EXISTS "vector"');
    expect(statements).toContain(
      "CREATE TABLE IF NOT EXISTS search.entities ( id UUID PRIMARY KEY, dense vector(4) NOT NULL, sparse sparsevec(16) NOT NULL, payload JSONB NOT NULL, updated_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now()) );"
    );
  });

  it('upserts both vectors and the payload in one statement', async () => {
    const client = new PgVectorClient(baseConfig, logger);
    const payload = competency();

    await client.upsert(PYTHON_ID, [1, 0, 0, 0], { indices: [3], values: [0.5] }, payload);

    const [config] = mockQuery.mock.calls[0] as [QueryConfig];
    expect(normalize(config.text)).toContain('ON CONFLICT (id) DO UPDATE SET');
    expect(config.values).toEqual([PYTHON_ID, '[1,0,0,0]', '{4:0.5}/16', JSON.stringify(payload)]);
  });

  it('pushes filters into the dense query after the vector and limit parameters', async () => {
    mockQuery.mockResolvedValueOnce({ rowCount: 1, rows: [{ id: PYTHON_ID, score: '0.75' }] });
    const client = new PgVectorClient(baseConfig, logger);

    const hits = await client.queryDense([1, 0, 0, 0], 5, compileFilters([{ field: 'lang', operator: 'eq', value: 'en' }]));

    const [config] = mockQuery.mock.calls[0] as [QueryConfig];
    expect(normalize(config.text)).toBe(
      'SELECT id, 1 - (dense <=> $1) AS score FROM search.entities WHERE jsonb_path_exists(payload, $3::jsonpath, $4::jsonb) ORDER BY dense <=> $1 ASC, id ASC LIMIT $2;'
    );
    expect(config.values).toEqual(['[1,0,0,0]', 5, '$."lang" ? (@ == $v0)', '{"v0":"en"}']);
    expect(hits).toEqual([{ id: PYTHON_ID, score: 0.75 }]);
  });

  it('negates the inner-product distance for sparse scores', async () => {
    mockQuery.mockResolvedValueOnce({ rowCount: 1, rows: [{ id: PYTHON_ID, score: 2.5 }] });
    const client = new PgVectorClient(baseConfig, logger);

    const hits = await client.querySparse({ indices: [1], values: [2] }, 3, MATCH_ALL);

    const [config] = mockQuery.mock.calls[0] as [QueryConfig];
    expect(normalize(config.text)).toContain('WHERE (sparse <#> $1::sparsevec) < 0 AND TRUE');
    expect(config.values).toEqual(['{2:2}/16', 3]);
    expect(hits).toEqual([{ id: PYTHON_ID, score: 2.5 }]);
  });

  it('skips the database for an empty sparse query or a match-nothing filter', async () => {
    const client = new PgVectorClient(baseConfig, logger);

    expect(await client.querySparse({ indices: [], values: [] }, 3, MATCH_ALL)).toEqual([]);
    expect(
      await client.queryDense([1, 0, 0, 0], 3, compileFilters([{ field: 'unknown', operator: 'eq', value: 1 }]))
    ).toEqual([]);
    expect(mockConnect).not.toHaveBeenCalled();
  });

  it('skips the database for a zero-magnitude dense query', async () => {
    const client = new PgVectorClient(baseConfig, logger);

    expect(await client.queryDense([0, 0, 0, 0], 3, MATCH_ALL)).toEqual([]);
    expect(mockConnect).not.toHaveBeenCalled();
  });

  it('drops dense rows whose cosine distance is undefined', async () => {
    mockQuery.mockResolvedValueOnce({
      rowCount: 2,
      rows: [
        { id: PYTHON_ID, score: '0.5' },
        { id: JAVA_ID, score: 'NaN' }
      ]
    });
    const client = new PgVectorClient(baseConfig, logger);

    expect(await client.queryDense([1, 0, 0, 0], 3, MATCH_ALL)).toEqual([{ id: PYTHON_ID, score: 0.5 }]);
  });

  it('reports whether a delete removed a row', async () => {
    const client = new PgVectorClient(baseConfig, logger);

    expect(await client.delete(PYTHON_ID)).toBe(false);
  });

  it('applies ef_search once per pooled connection', async () => {
    const client = new PgVectorClient({ ...baseConfig, hnswEfSearch: 80 }, logger);

    await client.queryDense([1, 0, 0, 0], 1, MATCH_ALL);
    await client.queryDense([1, 0, 0, 0], 1, MATCH_ALL);

    const settings = mockQuery.mock.calls.filter(([sql]) => queryText(sql).includes('set_config'));
    expect(settings).toEqual([["SELECT set_config('hnsw.ef_search', $1, false)", ['80']]]);
  });

  it('reports an unhealthy store when the count query fails', async () => {
    mockQuery.mockRejectedValueOnce(new Error('connection terminated'));
    const client = new PgVectorClient(baseConfig, logger);

    expect(await client.healthCheck()).toEqual({
      status: 'unhealthy',
      totalEntities: 0,
      message: 'connection terminated'
    });
  });
});
