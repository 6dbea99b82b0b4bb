import axios, { type AxiosInstance } from 'axios';
import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { EncoderConfig, EncoderProviderName } from './config';
import type { DenseVector, SparseVector } from './types';

export interface DenseEmbeddingProvider {
  readonly name: EncoderProviderName;
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<DenseVector>;
}

export interface SparseEmbeddingProvider {
  readonly name: EncoderProviderName;
  readonly model: string;
  embed(text: string): Promise<SparseVector>;
}

export interface EmbeddingProviders {
  dense: DenseEmbeddingProvider;
  sparse: SparseEmbeddingProvider;
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:[-_.'][\p{L}\p{N}]+)*/gu;

/** Lower-cased word tokens; hyphenated codes such as `esco-s123` stay whole. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/** 32-bit FNV-1a. */
export function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function termFrequencies(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(text)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Bag-of-hashed-tokens embedding. Each token owns a pseudo-random direction,
 * so texts sharing tokens land close under cosine similarity.
 */
export class LocalDenseProvider implements DenseEmbeddingProvider {
  readonly name: EncoderProviderName = 'local';
  readonly model = 'local-hashed-tokens';
  private readonly directions: LRUCache<string, Float64Array>;

  constructor(readonly dimensions: number, maxCachedTokens = 4096) {
    this.directions = new LRUCache<string, Float64Array>({ max: maxCachedTokens });
  }

  get cachedTokens(): number {
    return this.directions.size;
  }

  async embed(text: string): Promise<DenseVector> {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const [token, count] of termFrequencies(text)) {
      const direction = this.direction(token);
      const weight = 1 + Math.log(count);
      for (let i = 0; i < this.dimensions; i += 1) {
        vector[i] += direction[i] * weight;
      }
    }

    const magnitude = Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
    return magnitude > 0 ? vector.map((value) => value / magnitude) : vector;
  }

  private direction(token: string): Float64Array {
    const cached = this.directions.get(token);
    if (cached) {
      return cached;
    }

    const next = mulberry32(hashToken(token));
    const direction = new Float64Array(this.dimensions);
    for (let i = 0; i < this.dimensions; i += 1) {
      direction[i] = next() * 2 - 1;
    }
    this.directions.set(token, direction);
    return direction;
  }
}

/** Hashing term-weight encoder: `1 + ln(tf)` per hashed token bucket. */
class LocalSparseProvider implements SparseEmbeddingProvider {
  readonly name: EncoderProviderName = 'local';
  readonly model = 'local-hashed-terms';

  constructor(private readonly dimensions: number) {}

  async embed(text: string): Promise<SparseVector> {
    const buckets = new Map<number, number>();
    for (const [token, count] of termFrequencies(text)) {
      const index = hashToken(token) % this.dimensions;
      buckets.set(index, (buckets.get(index) ?? 0) + count);
    }

    const indices = [...buckets.keys()].sort((a, b) => a - b);
    return {
      indices,
      values: indices.map((index) => 1 + Math.log(buckets.get(index) ?? 1))
    };
  }
}

const denseResponseSchema = z.array(z.array(z.number())).min(1);
const sparseResponseSchema = z.array(z.array(z.object({ index: z.number().int().nonnegative(), value: z.number() }))).min(1);

function createHttpClient(baseURL: string, config: EncoderConfig): AxiosInstance {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (config.authToken) {
    headers.Authorization = `Bearer ${config.authToken}`;
  }

  return axios.create({ baseURL, timeout: config.timeoutMs, headers });
}

/** Client for a text-embeddings-inference `/embed` endpoint. */
export class TeiDenseProvider implements DenseEmbeddingProvider {
  readonly name: EncoderProviderName = 'tei';
  readonly model: string;
  readonly dimensions: number;
  private readonly http: AxiosInstance;

  constructor(config: EncoderConfig, private readonly logger: Logger) {
    this.http = createHttpClient(config.denseUrl, config);
    this.model = config.denseUrl;
    this.dimensions = config.denseDimensions;
  }

  async embed(text: string): Promise<DenseVector> {
    const started = Date.now();
    const response = await this.http.post('/embed', { inputs: text, truncate: true });
    const parsed = denseResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Dense encoder returned an unexpected payload.');
    }

    this.logger.debug({ latencyMs: Date.now() - started }, 'Dense embedding generated.');
    return parsed.data[0];
  }
}

/** Client for a text-embeddings-inference `/embed_sparse` endpoint (SPLADE style models). */
export class TeiSparseProvider implements SparseEmbeddingProvider {
  readonly name: EncoderProviderName = 'tei';
  readonly model: string;
  private readonly http: AxiosInstance;

  constructor(config: EncoderConfig, private readonly logger: Logger) {
    this.http = createHttpClient(config.sparseUrl, config);
    this.model = config.sparseUrl;
  }

  async embed(text: string): Promise<SparseVector> {
    const started = Date.now();
    const response = await this.http.post('/embed_sparse', { inputs: text, truncate: true });
    const parsed = sparseResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Sparse encoder returned an unexpected payload.');
    }

    this.logger.debug({ latencyMs: Date.now() - started }, 'Sparse embedding generated.');
    const entries = parsed.data[0];
    return {
      indices: entries.map((entry) => entry.index),
      values: entries.map((entry) => entry.value)
    };
  }
}

export function createEmbeddingProviders(config: EncoderConfig, logger: Logger): EmbeddingProviders {
  if (config.provider === 'tei') {
    logger.info({ denseUrl: config.denseUrl, sparseUrl: config.sparseUrl }, 'Using text-embeddings-inference encoders.');
    return {
      dense: new TeiDenseProvider(config, logger),
      sparse: new TeiSparseProvider(config, logger)
    };
  }

  logger.info({ dimensions: config.denseDimensions }, 'Using local deterministic encoders.');
  return {
    dense: new LocalDenseProvider(config.denseDimensions),
    sparse: new LocalSparseProvider(config.sparseDimensions)
  };
}
