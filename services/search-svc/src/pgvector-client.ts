import { ConfigurationError } from '@competency-search/common';
import { Pool, type PoolClient, type QueryResultRow } from 'pg';
import { toSql } from 'pgvector/pg';
import type { Logger } from 'pino';

import { competencySchema } from './competency';
import type { PgVectorConfig } from './config';
import { renderSqlPredicate } from './filter-sql';
import type { CompiledPredicate } from './filter-translator';
import type { Competency, DenseVector, ScoredPoint, SparseVector } from './types';
import { isZeroVector, type RepositoryHealth, type VectorRepository } from './vector-repository';

const VECTOR_TYPE_NAME = 'vector';
const SPARSE_VECTOR_TYPE_NAME = 'sparsevec';

interface PayloadRow extends QueryResultRow {
  id: string;
  payload: unknown;
}

interface ScoreRow extends QueryResultRow {
  id: string;
  score: number | string;
}

/** pgvector `sparsevec` literal: 1-based `{index:value}` pairs followed by the dimension. */
export function toSparseVectorLiteral(vector: SparseVector, dimensions: number): string {
  const pairs = vector.indices.map((index, position) => `${index + 1}:${vector.values[position]}`);
  return `{${pairs.join(',')}}/${dimensions}`;
}

export class PgVectorClient implements VectorRepository {
  readonly driver = 'pgvector';
  private readonly pool: Pool;
  private readonly table: string;
  private readonly configuredClients = new WeakSet<PoolClient>();

  constructor(private readonly config: PgVectorConfig, private readonly logger: Logger) {
    this.table = `${config.schema}.${config.table}`;

    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.poolMax,
      min: config.poolMin,
      idleTimeoutMillis: config.idleTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      statement_timeout: config.statementTimeoutMs
    });

    this.pool.on('error', (error) => {
      this.logger.error({ error }, 'Idle pgvector connection failed.');
    });
  }

  /** Creates or checks the table; a dense dimension mismatch is fatal. */
  async verify(): Promise<void> {
    await this.withClient(async (client) => {
      if (this.config.enableAutoMigrate) {
        await this.ensureInfrastructure(client);
      }
      await this.verifyInfrastructure(client);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async upsert(id: string, dense: DenseVector, sparse: SparseVector, payload: Competency): Promise<void> {
    await this.withClient(async (client) => {
      await client.query({
        text: `
          INSERT INTO ${this.table} (id, dense, sparse, payload, updated_at)
          VALUES ($1, $2, $3::${SPARSE_VECTOR_TYPE_NAME}, $4::jsonb, timezone('utc', now()))
          ON CONFLICT (id)
          DO UPDATE SET
            dense = EXCLUDED.dense,
            sparse = EXCLUDED.sparse,
            payload = EXCLUDED.payload,
            updated_at = EXCLUDED.updated_at;
        `,
        values: [id, toSql(dense), toSparseVectorLiteral(sparse, this.config.sparseDimensions), JSON.stringify(payload)]
      });
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.withClient(async (client) => {
      const result = await client.query(`DELETE FROM ${this.table} WHERE id = $1`, [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async get(id: string): Promise<Competency | null> {
    const found = await this.getMany([id]);
    return found.get(id) ?? null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, Competency>> {
    const found = new Map<string, Competency>();
    if (ids.length === 0) {
      return found;
    }

    const result = await this.withClient((client) =>
      client.query<PayloadRow>(`SELECT id, payload FROM ${this.table} WHERE id = ANY($1::uuid[])`, [[...ids]])
    );

    for (const row of result.rows) {
      found.set(row.id, this.parsePayload(row));
    }

    return found;
  }

  async queryDense(vector: DenseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]> {
    if (k <= 0 || predicate.kind === 'matchNothing' || isZeroVector(vector)) {
      return [];
    }

    const filter = renderSqlPredicate(predicate, 'payload', 3);
    const result = await this.withClient((client) =>
      client.query<ScoreRow>({
        text: `
          SELECT id, 1 - (dense <=> $1) AS score
          FROM ${this.table}
          WHERE ${filter.clause}
          ORDER BY dense <=> $1 ASC, id ASC
          LIMIT $2;
        `,
        values: [toSql(vector), k, ...filter.values]
      })
    );

    // rows stored with a zero dense vector come back with a NaN distance
    return result.rows
      .map((row) => ({ id: row.id, score: Number(row.score) }))
      .filter((point) => Number.isFinite(point.score));
  }

  async querySparse(vector: SparseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]> {
    if (k <= 0 || predicate.kind === 'matchNothing' || vector.indices.length === 0) {
      return [];
    }

    // <#> is the negated inner product; only rows sharing a term score below zero
    const filter = renderSqlPredicate(predicate, 'payload', 3);
    const result = await this.withClient((client) =>
      client.query<ScoreRow>({
        text: `
          SELECT id, -(sparse <#> $1::${SPARSE_VECTOR_TYPE_NAME}) AS score
          FROM ${this.table}
          WHERE (sparse <#> $1::${SPARSE_VECTOR_TYPE_NAME}) < 0
            AND ${filter.clause}
          ORDER BY sparse <#> $1::${SPARSE_VECTOR_TYPE_NAME} ASC, id ASC
          LIMIT $2;
        `,
        values: [toSparseVectorLiteral(vector, this.config.sparseDimensions), k, ...filter.values]
      })
    );

    return result.rows.map((row) => ({ id: row.id, score: Number(row.score) }));
  }

  async healthCheck(): Promise<RepositoryHealth> {
    try {
      const total = await this.withClient(async (client) => {
        const result = await client.query<{ total: string | number }>(`SELECT COUNT(*) AS total FROM ${this.table}`);
        return Number(result.rows[0]?.total ?? 0);
      });

      return { status: 'healthy', totalEntities: total };
    } catch (error) {
      this.logger.error({ error }, 'PgVector health check failed.');
      return {
        status: 'unhealthy',
        totalEntities: 0,
        message: error instanceof Error ? error.message : 'Unknown error'
      };
    }
  }

  private parsePayload(row: PayloadRow): Competency {
    const parsed = competencySchema.safeParse(row.payload);
    if (!parsed.success) {
      throw new Error(`Stored payload for ${row.id} is not a valid competency.`);
    }
    return parsed.data;
  }

  private async ensureInfrastructure(client: PoolClient): Promise<void> {
    await client.query(`CREATE EXTENSION IF NOT EXISTS "${VECTOR_TYPE_NAME}"`);
    await client.query(`CREATE SCHEMA IF NOT EXISTS ${this.config.schema}`);
    await client.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id UUID PRIMARY KEY,
        dense ${VECTOR_TYPE_NAME}(${this.config.denseDimensions}) NOT NULL,
        sparse ${SPARSE_VECTOR_TYPE_NAME}(${this.config.sparseDimensions}) NOT NULL,
        payload JSONB NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT timezone('utc', now())
      );
    `);
    await client.query(`
      CREATE INDEX IF NOT EXISTS ${this.config.table}_dense_hnsw_idx
        ON ${this.table} USING hnsw (dense vector_cosine_ops)
        WITH (m = 16, ef_construction = 64);
    `);
    await client.query(`
      CREATE INDEX IF NOT EXISTS ${this.config.table}_payload_idx
        ON ${this.table} USING gin (payload jsonb_path_ops);
    `);
    this.logger.info({ table: this.table }, 'pgvector schema ensured.');
  }

  private async verifyInfrastructure(client: PoolClient): Promise<void> {
    const extension = await client.query(`SELECT 1 FROM pg_extension WHERE extname = $1`, [VECTOR_TYPE_NAME]);
    if (extension.rowCount === 0) {
      throw new ConfigurationError(
        `${VECTOR_TYPE_NAME} extension is not installed. Enable ENABLE_AUTO_MIGRATE or run the migrations.`
      );
    }

    const tableExists = await client.query(
      `SELECT table_name FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
      [this.config.schema, this.config.table]
    );
    if (tableExists.rowCount === 0) {
      throw new ConfigurationError(
        `Table ${this.table} is missing. Run migrations or set ENABLE_AUTO_MIGRATE=true for bootstrap.`
      );
    }

    const columns = await client.query<{ attname: string; atttypmod: number | string }>(
      `SELECT attname, atttypmod FROM pg_attribute WHERE attrelid = $1::regclass AND attname IN ('dense', 'sparse')`,
      [this.table]
    );

    const typmods = new Map(columns.rows.map((row) => [row.attname, Number(row.atttypmod)]));
    const denseTypmod = typmods.get('dense');
    const sparseTypmod = typmods.get('sparse');

    if (denseTypmod === undefined || sparseTypmod === undefined) {
      throw new ConfigurationError(`Columns dense and sparse are required on ${this.table}.`);
    }

    this.logger.info(
      {
        denseDimension: denseTypmod,
        sparseDimension: sparseTypmod,
        expectedDense: this.config.denseDimensions,
        expectedSparse: this.config.sparseDimensions,
        table: this.table
      },
      'Database dimension check'
    );

    if (denseTypmod !== this.config.denseDimensions) {
      throw new ConfigurationError(
        `Dense dimensionality mismatch in ${this.table}: expected vector(${this.config.denseDimensions}), found vector(${denseTypmod}).`
      );
    }

    if (sparseTypmod !== this.config.sparseDimensions) {
      throw new ConfigurationError(
        `Sparse dimensionality mismatch in ${this.table}: expected sparsevec(${this.config.sparseDimensions}), found sparsevec(${sparseTypmod}).`
      );
    }
  }

  private async configureClient(client: PoolClient): Promise<void> {
    if (this.configuredClients.has(client)) {
      return;
    }

    const efSearch = this.config.hnswEfSearch;
    if (typeof efSearch === 'number' && Number.isFinite(efSearch) && efSearch > 0) {
      await client.query(`SELECT set_config('hnsw.ef_search', $1, false)`, [String(Math.round(efSearch))]);
    }
    // pgvector >= 0.8: keep filtered HNSW scans going until k post-filter rows are found
    if (this.config.hnswIterativeScan) {
      await client.query(`SELECT set_config('hnsw.iterative_scan', $1, false)`, [this.config.hnswIterativeScan]);
    }
    this.configuredClients.add(client);
  }

  private async withClient<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await this.configureClient(client);
      return await handler(client);
    } finally {
      client.release();
    }
  }
}
