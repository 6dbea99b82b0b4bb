import {
  ConfigurationError,
  getConfig as getBaseConfig,
  normalizeUrl,
  parseBoolean,
  parseNumber,
  parseOptionalNumber,
  type ServiceConfig
} from '@competency-search/common';

export type VectorStoreDriver = 'pgvector' | 'memory';
export type EncoderProviderName = 'local' | 'tei';

export interface PgVectorConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  schema: string;
  table: string;
  denseDimensions: number;
  sparseDimensions: number;
  poolMax: number;
  poolMin: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
  hnswEfSearch?: number;
  hnswIterativeScan?: 'strict_order' | 'relaxed_order';
  enableAutoMigrate: boolean;
}

export interface EncoderConfig {
  provider: EncoderProviderName;
  denseUrl: string;
  sparseUrl: string;
  authToken?: string;
  timeoutMs: number;
  maxCharacters: number;
  denseDimensions: number;
  sparseDimensions: number;
}

export interface SearchRuntimeConfig {
  /** Per-branch depth multiplier for hybrid retrieval. */
  oversampleFactor: number;
  rrfK: number;
  maxTop: number;
  storageTimeoutMs: number;
}

export interface SearchServiceConfig {
  base: ServiceConfig;
  store: VectorStoreDriver;
  pgvector: PgVectorConfig;
  encoder: EncoderConfig;
  search: SearchRuntimeConfig;
}

let cachedConfig: SearchServiceConfig | null = null;

function resolveStoreDriver(value: string | undefined): VectorStoreDriver {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'pgvector') {
    return 'pgvector';
  }
  if (normalized === 'memory') {
    return 'memory';
  }
  throw new ConfigurationError(`VECTOR_STORE must be "pgvector" or "memory", received "${value}".`);
}

function resolveEncoderProvider(value: string | undefined): EncoderProviderName {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'local') {
    return 'local';
  }
  if (normalized === 'tei') {
    return 'tei';
  }
  throw new ConfigurationError(`ENCODER_PROVIDER must be "local" or "tei", received "${value}".`);
}

function resolveIterativeScan(value: string | undefined): PgVectorConfig['hnswIterativeScan'] {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'off') {
    return undefined;
  }
  if (normalized === 'strict_order' || normalized === 'relaxed_order') {
    return normalized;
  }
  throw new ConfigurationError(`PGVECTOR_HNSW_ITERATIVE_SCAN must be off, strict_order or relaxed_order, received "${value}".`);
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, received ${value}.`);
  }
  return value;
}

export function validateSearchServiceConfig(config: SearchServiceConfig): void {
  requirePositiveInteger('DENSE_DIMENSIONS', config.encoder.denseDimensions);
  requirePositiveInteger('SPARSE_DIMENSIONS', config.encoder.sparseDimensions);
  requirePositiveInteger('SEARCH_MAX_TOP', config.search.maxTop);
  requirePositiveInteger('ENCODER_MAX_CHARACTERS', config.encoder.maxCharacters);

  if (config.pgvector.denseDimensions !== config.encoder.denseDimensions) {
    throw new ConfigurationError(
      `Store dense dimension ${config.pgvector.denseDimensions} does not match encoder dimension ${config.encoder.denseDimensions}.`
    );
  }

  if (!Number.isFinite(config.search.oversampleFactor) || config.search.oversampleFactor < 1) {
    throw new ConfigurationError(`SEARCH_OVERSAMPLE_FACTOR must be at least 1, received ${config.search.oversampleFactor}.`);
  }

  if (!Number.isFinite(config.search.rrfK) || config.search.rrfK <= 0) {
    throw new ConfigurationError(`SEARCH_RRF_K must be positive, received ${config.search.rrfK}.`);
  }

  // A candidate found by both branches at depth k' outscores a single-branch rank 1 only while k' < rrfK + 2.
  const maxDepth = Math.ceil(config.search.oversampleFactor * config.search.maxTop);
  if (maxDepth > config.search.rrfK + 1) {
    throw new ConfigurationError(
      `SEARCH_OVERSAMPLE_FACTOR × SEARCH_MAX_TOP (${maxDepth}) must not exceed SEARCH_RRF_K + 1 (${config.search.rrfK + 1}).`
    );
  }

  if (config.encoder.timeoutMs <= 0 || config.search.storageTimeoutMs <= 0) {
    throw new ConfigurationError('ENCODER_TIMEOUT_MS and STORAGE_TIMEOUT_MS must be positive.');
  }
}

export function getSearchServiceConfig(): SearchServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();
  const denseDimensions = parseNumber(process.env.DENSE_DIMENSIONS, 1024);
  const sparseDimensions = parseNumber(process.env.SPARSE_DIMENSIONS, 1_048_576);

  const pgvector: PgVectorConfig = {
    host: process.env.PGVECTOR_HOST ?? '127.0.0.1',
    port: parseNumber(process.env.PGVECTOR_PORT, 5432),
    database: process.env.PGVECTOR_DATABASE ?? 'competencies',
    user: process.env.PGVECTOR_USER ?? 'postgres',
    password: (process.env.PGVECTOR_PASSWORD ?? '').trim(),
    ssl: parseBoolean(process.env.PGVECTOR_SSL, false),
    schema: process.env.PGVECTOR_SCHEMA ?? 'search',
    table: process.env.PGVECTOR_TABLE ?? 'entities',
    denseDimensions: parseNumber(process.env.PGVECTOR_DIMENSIONS, denseDimensions),
    sparseDimensions,
    poolMax: parseNumber(process.env.PGVECTOR_POOL_MAX, 10),
    poolMin: parseNumber(process.env.PGVECTOR_POOL_MIN, 0),
    idleTimeoutMs: parseNumber(process.env.PGVECTOR_IDLE_TIMEOUT_MS, 30_000),
    connectionTimeoutMs: parseNumber(process.env.PGVECTOR_CONNECTION_TIMEOUT_MS, 5_000),
    statementTimeoutMs: parseNumber(process.env.PGVECTOR_STATEMENT_TIMEOUT_MS, 30_000),
    hnswEfSearch: parseOptionalNumber(process.env.PGVECTOR_HNSW_EF_SEARCH),
    hnswIterativeScan: resolveIterativeScan(process.env.PGVECTOR_HNSW_ITERATIVE_SCAN),
    enableAutoMigrate: parseBoolean(process.env.ENABLE_AUTO_MIGRATE, false)
  };

  const encoder: EncoderConfig = {
    provider: resolveEncoderProvider(process.env.ENCODER_PROVIDER),
    denseUrl: normalizeUrl(process.env.ENCODER_DENSE_URL, 'http://localhost:8082'),
    sparseUrl: normalizeUrl(process.env.ENCODER_SPARSE_URL, 'http://localhost:8083'),
    authToken: process.env.ENCODER_BEARER_TOKEN,
    timeoutMs: parseNumber(process.env.ENCODER_TIMEOUT_MS, 15_000),
    maxCharacters: parseNumber(process.env.ENCODER_MAX_CHARACTERS, 3_000),
    denseDimensions,
    sparseDimensions
  };

  const search: SearchRuntimeConfig = {
    oversampleFactor: parseNumber(process.env.SEARCH_OVERSAMPLE_FACTOR, 3),
    rrfK: parseNumber(process.env.SEARCH_RRF_K, 60),
    maxTop: parseNumber(process.env.SEARCH_MAX_TOP, 20),
    storageTimeoutMs: parseNumber(process.env.STORAGE_TIMEOUT_MS, 10_000)
  };

  const config: SearchServiceConfig = {
    base,
    store: resolveStoreDriver(process.env.VECTOR_STORE),
    pgvector,
    encoder,
    search
  };

  validateSearchServiceConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function resetSearchServiceConfig(): void {
  cachedConfig = null;
}
